import type { Captures } from './pattern';

/** Replacement token that applies a rule's flags without touching the URI. */
export const NO_SUBSTITUTION_TOKEN = '-';

export type TemplateSegment =
  | { readonly type: 'literal'; readonly text: string }
  | { readonly type: 'backreference'; readonly index: number };

/** Replacement text split into literals and `$N` backreferences. */
export interface ReplacementTemplate {
  readonly kind: 'template';
  readonly segments: readonly TemplateSegment[];
  /** Highest backreference index used, 0 when there is none. */
  readonly maxIndex: number;
}

/** The `-` replacement. Kept distinct from an empty template. */
export interface NoSubstitution {
  readonly kind: 'none';
}

export type Replacement = ReplacementTemplate | NoSubstitution;

export const NO_SUBSTITUTION: NoSubstitution = Object.freeze({ kind: 'none' });

/**
 * Parses a replacement token.
 *
 * `$N` takes every digit that follows, `${N}` lets digits follow the reference,
 * `$$` is a literal dollar and any other `$` is kept as-is.
 */
export function parseReplacement(token: string): Replacement {
  if (token === NO_SUBSTITUTION_TOKEN) {
    return NO_SUBSTITUTION;
  }

  const segments: TemplateSegment[] = [];
  let literal = '';
  let maxIndex = 0;
  let i = 0;

  const pushReference = (digits: string): void => {
    if (literal) {
      segments.push({ type: 'literal', text: literal });
      literal = '';
    }
    const index = Number(digits);
    maxIndex = Math.max(maxIndex, index);
    segments.push({ type: 'backreference', index });
  };

  while (i < token.length) {
    const ch = token[i];
    if (ch !== '$') {
      literal += ch;
      i += 1;
      continue;
    }

    const rest = token.slice(i + 1);
    if (rest.startsWith('$')) {
      literal += '$';
      i += 2;
      continue;
    }

    const braced = /^\{(\d+)\}/.exec(rest);
    if (braced?.[1] !== undefined) {
      pushReference(braced[1]);
      i += 1 + braced[0].length;
      continue;
    }

    const bare = /^\d+/.exec(rest);
    if (bare) {
      pushReference(bare[0]);
      i += 1 + bare[0].length;
      continue;
    }

    literal += '$';
    i += 1;
  }

  if (literal) {
    segments.push({ type: 'literal', text: literal });
  }

  return Object.freeze({ kind: 'template', segments: Object.freeze(segments), maxIndex });
}

/** Builds the substituted string; `NO_SUBSTITUTION` yields `current` unchanged. */
export function expandReplacement(replacement: Replacement, captures: Captures, current: string): string {
  if (replacement.kind === 'none') {
    return current;
  }

  let out = '';
  for (const segment of replacement.segments) {
    out += segment.type === 'literal' ? segment.text : captures[segment.index] ?? '';
  }
  return out;
}
