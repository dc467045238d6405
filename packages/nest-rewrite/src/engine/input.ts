import { RewriteInputError } from './errors';

/** Default upper bound on the length of a URI handed to the engine. */
export const DEFAULT_MAX_INPUT_LENGTH = 8192;

const CONTROL_CHARACTER = /[\u0000-\u001f\u007f]/;
const LONE_SURROGATE = /[\ud800-\udbff](?![\udc00-\udfff])|(?<![\ud800-\udbff])[\udc00-\udfff]/;

/** Returns the reason a URI cannot be evaluated, or `null` when it can. */
export function checkInput(uri: string, maxLength: number = DEFAULT_MAX_INPUT_LENGTH): RewriteInputError | null {
  if (uri.length === 0) {
    return new RewriteInputError('empty', 'URI is empty');
  }

  if (uri.length > maxLength) {
    return new RewriteInputError('too-long', `URI length ${uri.length} exceeds the limit of ${maxLength}`);
  }

  const control = CONTROL_CHARACTER.exec(uri);
  if (control) {
    const code = control[0].charCodeAt(0).toString(16).padStart(4, '0');
    return new RewriteInputError('control-character', `URI contains control character U+${code.toUpperCase()} at ${control.index}`);
  }

  if (LONE_SURROGATE.test(uri)) {
    return new RewriteInputError('malformed-unicode', 'URI contains an unpaired UTF-16 surrogate');
  }

  return null;
}
