/** Outcome of an operation that reports failure as a value instead of throwing. */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}

/** Reasons a rule-set line is rejected during construction. */
export type RuleParseErrorKind =
  | 'UnknownDirective'
  | 'MissingPattern'
  | 'MissingReplacement'
  | 'InvalidPattern'
  | 'BackreferenceOutOfRange'
  | 'MalformedFlags'
  | 'UnknownFlag'
  | 'InvalidRedirectCode'
  | 'ConflictingFlags';

/** Construction-time failure pointing at one line of the rule text. */
export class RuleParseError extends Error {
  override readonly name = 'RuleParseError';

  constructor(
    readonly kind: RuleParseErrorKind,
    /** 1-based line number in the rule text. */
    readonly line: number,
    /** Trimmed text of the offending line. */
    readonly text: string,
    readonly detail: string,
  ) {
    super(`line ${line}: ${detail}`);
  }
}

/** Why a candidate URI was refused by the engine. */
export type InvalidInputReason = 'empty' | 'too-long' | 'control-character' | 'malformed-unicode';

/** Call-time failure: the URI cannot be processed. */
export class RewriteInputError extends Error {
  override readonly name = 'RewriteInputError';
  readonly kind = 'InvalidInput';

  constructor(
    readonly reason: InvalidInputReason,
    message: string,
  ) {
    super(message);
  }
}
