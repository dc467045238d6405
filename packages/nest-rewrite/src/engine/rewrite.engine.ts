import { type Result, ok, fail, type RewriteInputError, type RuleParseError } from './errors';
import { DEFAULT_MAX_INPUT_LENGTH, checkInput } from './input';
import { parseRules, type Rule } from './rule.parser';
import { expandReplacement } from './template';

/** Outcome of one `rewrite` call. */
export type RewriteResult =
  | { readonly kind: 'unchanged' }
  | { readonly kind: 'rewritten'; readonly uri: string }
  | { readonly kind: 'redirected'; readonly status: number; readonly location: string }
  | { readonly kind: 'forbidden' };

export interface RewriteEngineOptions {
  /** Longest URI accepted by `rewrite`, a positive integer. Default: 8192. */
  maxInputLength?: number;
}

const UNCHANGED: RewriteResult = Object.freeze({ kind: 'unchanged' });
const FORBIDDEN: RewriteResult = Object.freeze({ kind: 'forbidden' });

/**
 * Immutable, ready-to-evaluate rule set.
 *
 * Built once from rule text and shared by every request; `rewrite` keeps all
 * of its state in locals, so concurrent callers never interfere.
 */
export class RewriteEngine {
  private readonly maxInputLength: number;

  private constructor(
    private readonly rules: readonly Rule[],
    options: RewriteEngineOptions,
  ) {
    this.maxInputLength = normalizeMaxLength(options.maxInputLength);
    Object.freeze(this);
  }

  /**
   * Parses rule text into an engine. Any malformed line fails the whole construction.
   * Throws when `maxInputLength` is not a positive integer.
   */
  static fromRules(text: string, options: RewriteEngineOptions = {}): Result<RewriteEngine, RuleParseError> {
    const parsed = parseRules(text);
    if (!parsed.ok) {
      return parsed;
    }
    return ok(new RewriteEngine(parsed.value, options));
  }

  /** Returns the parsed rules in evaluation order, disabled ones included. */
  getRules(): readonly Rule[] {
    return this.rules;
  }

  /** Runs the URI through the rules in source order and reports the single resulting outcome. */
  rewrite(uri: string): Result<RewriteResult, RewriteInputError> {
    const invalid = checkInput(uri, this.maxInputLength);
    if (invalid) {
      return fail(invalid);
    }

    let working = uri;

    for (const rule of this.rules) {
      if (!rule.enabled) {
        continue;
      }

      const captures = rule.pattern.match(working);
      if (!captures) {
        continue;
      }

      if (rule.flags.kind === 'forbidden') {
        return ok(FORBIDDEN);
      }

      working = expandReplacement(rule.replacement, captures, working);

      if (rule.flags.kind === 'redirect') {
        return ok<RewriteResult>({ kind: 'redirected', status: rule.flags.status, location: working });
      }
      if (rule.flags.kind === 'last') {
        break;
      }
    }

    return ok<RewriteResult>(working === uri ? UNCHANGED : { kind: 'rewritten', uri: working });
  }
}

function normalizeMaxLength(value: number | undefined): number {
  if (value === undefined) {
    return DEFAULT_MAX_INPUT_LENGTH;
  }
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`[nest-rewrite] maxInputLength must be a positive integer, got ${value}`);
  }
  return value;
}
