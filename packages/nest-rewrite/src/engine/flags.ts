import { fail, ok, type Result, type RuleParseErrorKind } from './errors';

/** Status used by `R` when no explicit code is given. */
export const DEFAULT_REDIRECT_STATUS = 302;

/** What happens after a rule matches. A rule carries at most one control flag. */
export type FlagSet =
  | { readonly kind: 'continue' }
  | { readonly kind: 'last' }
  | { readonly kind: 'redirect'; readonly status: number }
  | { readonly kind: 'forbidden' };

/** Flag problem reported without line context; the rule parser adds it. */
export interface FlagError {
  kind: Extract<RuleParseErrorKind, 'MalformedFlags' | 'UnknownFlag' | 'InvalidRedirectCode' | 'ConflictingFlags'>;
  detail: string;
}

export const NO_FLAGS: FlagSet = Object.freeze({ kind: 'continue' });

/**
 * Parses the optional bracketed list that trails a rule, e.g. `[R=301]`.
 * An empty string means no flags.
 */
export function parseFlagList(raw: string): Result<FlagSet, FlagError> {
  const text = raw.trim();
  if (!text) {
    return ok(NO_FLAGS);
  }

  if (!text.startsWith('[') || !text.endsWith(']')) {
    return reject('MalformedFlags', `expected a bracketed flag list, got "${text}"`);
  }

  const inner = text.slice(1, -1);
  if (inner.includes('[') || inner.includes(']')) {
    return reject('MalformedFlags', `expected a single bracketed flag list, got "${text}"`);
  }

  const tokens = inner.split(',').map((token) => token.trim());
  if (tokens.length === 1 && tokens[0] === '') {
    return reject('MalformedFlags', 'flag list is empty');
  }

  let flags: FlagSet = NO_FLAGS;
  for (const token of tokens) {
    if (!token) {
      return reject('MalformedFlags', `empty entry in flag list "${text}"`);
    }

    const parsed = parseFlag(token);
    if (!parsed.ok) {
      return parsed;
    }
    if (flags.kind !== 'continue') {
      return reject('ConflictingFlags', `flag "${token}" cannot be combined with ${describeFlags(flags)}`);
    }
    flags = parsed.value;
  }

  return ok<FlagSet>(Object.freeze(flags));
}

function parseFlag(token: string): Result<FlagSet, FlagError> {
  const eq = token.indexOf('=');
  const name = (eq === -1 ? token : token.slice(0, eq)).trim().toLowerCase();
  const arg = eq === -1 ? undefined : token.slice(eq + 1).trim();

  if (name === 'r' || name === 'redirect') {
    if (arg === undefined || arg === '') {
      return ok<FlagSet>({ kind: 'redirect', status: DEFAULT_REDIRECT_STATUS });
    }
    const status = parseStatus(arg);
    if (status === null) {
      return reject('InvalidRedirectCode', `redirect code "${arg}" is not an HTTP status between 100 and 599`);
    }
    return ok<FlagSet>({ kind: 'redirect', status });
  }

  if (name === 'l' || name === 'last' || name === 'f' || name === 'forbidden') {
    if (arg !== undefined) {
      return reject('UnknownFlag', `flag "${token}" does not take a value`);
    }
    return ok<FlagSet>(name.startsWith('l') ? { kind: 'last' } : { kind: 'forbidden' });
  }

  return reject('UnknownFlag', `unknown flag "${token}"`);
}

function reject(kind: FlagError['kind'], detail: string): Result<never, FlagError> {
  return fail({ kind, detail });
}

function parseStatus(value: string): number | null {
  if (!/^\d{3}$/.test(value)) {
    return null;
  }
  const status = Number(value);
  return status >= 100 && status <= 599 ? status : null;
}

/** Renders a flag set back into rule syntax, e.g. `[R=301]`. */
export function describeFlags(flags: FlagSet): string {
  switch (flags.kind) {
    case 'continue':
      return 'no flags';
    case 'last':
      return '[L]';
    case 'redirect':
      return `[R=${flags.status}]`;
    case 'forbidden':
      return '[F]';
  }
}
