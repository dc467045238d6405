/** Capture groups of one match; index 0 is the whole match, non-participating groups are `undefined`. */
export type Captures = readonly (string | undefined)[];

/** A regular expression compiled once at parse time. */
export interface CompiledPattern {
  /** Pattern text as written in the rule. */
  readonly source: string;
  /** Number of capture groups, excluding the whole match. */
  readonly groupCount: number;
  /** Returns the captures of the leftmost match, or `null` when the candidate does not match. */
  match(candidate: string): Captures | null;
}

class RegexPattern implements CompiledPattern {
  readonly groupCount: number;

  constructor(
    readonly source: string,
    private readonly regex: RegExp,
  ) {
    this.groupCount = countGroups(source);
  }

  match(candidate: string): Captures | null {
    // No `g`/`y` flag, so exec ignores lastIndex and the instance holds no per-call state.
    const found = this.regex.exec(candidate);
    if (!found) {
      return null;
    }
    return Array.from(found);
  }
}

/**
 * Compiles rule pattern text. No anchoring is added; `^`/`$` are up to the rule author.
 * Throws `SyntaxError` when the text is not a valid regular expression.
 */
export function compilePattern(source: string): CompiledPattern {
  return new RegexPattern(source, new RegExp(source));
}

function countGroups(source: string): number {
  // An empty alternative always matches '', so exec reports every group of the source.
  const probe = new RegExp(`${source}|`).exec('');
  return probe ? probe.length - 1 : 0;
}
