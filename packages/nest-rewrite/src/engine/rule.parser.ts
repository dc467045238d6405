import { fail, ok, type Result, RuleParseError, type RuleParseErrorKind } from './errors';
import { type FlagSet, parseFlagList } from './flags';
import { compilePattern, type CompiledPattern } from './pattern';
import { parseReplacement, type Replacement } from './template';

/** One parsed `Rewrite` line. Frozen once built. */
export interface Rule {
  /** 1-based line in the rule text. */
  readonly line: number;
  /** Trimmed source line, for logs and diagnostics. */
  readonly source: string;
  readonly pattern: CompiledPattern;
  readonly replacement: Replacement;
  readonly flags: FlagSet;
  /** `false` for rules placed after `RewriteEngine off`. */
  readonly enabled: boolean;
}

const RULE_KEYWORDS = new Set(['rewrite', 'rewriterule', 'rule']);
const ENGINE_KEYWORD = 'rewriteengine';

/**
 * Parses rule-set text into rules in source order.
 *
 * Line grammar: `Rewrite <pattern> <replacement> [<flag>,...]`.
 * Blank lines and lines starting with `#` or `//` are skipped.
 * The first malformed line aborts the whole parse.
 */
export function parseRules(text: string): Result<readonly Rule[], RuleParseError> {
  const rules: Rule[] = [];
  const lines = text.split(/\r?\n/);
  let enabled = true;

  for (let index = 0; index < lines.length; index += 1) {
    const lineNo = index + 1;
    const line = (lines[index] ?? '').trim();
    if (!line || line.startsWith('#') || line.startsWith('//')) {
      continue;
    }

    const [keyword = '', rest] = splitToken(line);
    const directive = keyword.toLowerCase();

    if (directive === ENGINE_KEYWORD) {
      const state = rest.trim().toLowerCase();
      if (state !== 'on' && state !== 'off') {
        return fail(
          new RuleParseError('UnknownDirective', lineNo, line, `RewriteEngine expects "on" or "off", got "${rest.trim()}"`),
        );
      }
      enabled = state === 'on';
      continue;
    }

    if (!RULE_KEYWORDS.has(directive)) {
      return fail(new RuleParseError('UnknownDirective', lineNo, line, `unknown directive "${keyword}"`));
    }

    const parsed = parseRuleBody(rest, lineNo, line, enabled);
    if (!parsed.ok) {
      return parsed;
    }
    rules.push(parsed.value);
  }

  return ok(Object.freeze(rules));
}

function parseRuleBody(body: string, lineNo: number, line: string, enabled: boolean): Result<Rule, RuleParseError> {
  const error = (kind: RuleParseErrorKind, detail: string): Result<never, RuleParseError> =>
    fail(new RuleParseError(kind, lineNo, line, detail));

  const [patternText, afterPattern] = splitToken(body);
  if (!patternText) {
    return error('MissingPattern', 'rule is missing a pattern');
  }

  const [replacementText, afterReplacement] = splitToken(afterPattern);
  if (!replacementText) {
    return error('MissingReplacement', 'rule is missing a replacement');
  }

  let pattern: CompiledPattern;
  try {
    pattern = compilePattern(patternText);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return error('InvalidPattern', `invalid pattern "${patternText}": ${reason}`);
  }

  const replacement = parseReplacement(replacementText);
  if (replacement.kind === 'template' && replacement.maxIndex > pattern.groupCount) {
    return error(
      'BackreferenceOutOfRange',
      `backreference $${replacement.maxIndex} exceeds the ${pattern.groupCount} capture group(s) of "${patternText}"`,
    );
  }

  const flags = parseFlagList(afterReplacement);
  if (!flags.ok) {
    return error(flags.error.kind, flags.error.detail);
  }

  return ok(
    Object.freeze({
      line: lineNo,
      source: line,
      pattern,
      replacement,
      flags: flags.value,
      enabled,
    }),
  );
}

/** Splits off the first whitespace-delimited token; the remainder keeps its inner spacing. */
function splitToken(input: string): [string, string] {
  const trimmed = input.trimStart();
  const match = /^(\S+)([\s\S]*)$/.exec(trimmed);
  if (!match) {
    return ['', ''];
  }
  return [match[1] ?? '', match[2] ?? ''];
}
