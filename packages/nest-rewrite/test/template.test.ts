import { describe, it, expect } from 'vitest';
import { expandReplacement, NO_SUBSTITUTION, parseReplacement } from '../src/engine/template';

describe('parseReplacement', () => {
  it('turns "-" into the no-substitution marker', () => {
    expect(parseReplacement('-')).toBe(NO_SUBSTITUTION);
  });

  it('splits literals and backreferences', () => {
    expect(parseReplacement('/tmp/$1')).toEqual({
      kind: 'template',
      segments: [
        { type: 'literal', text: '/tmp/' },
        { type: 'backreference', index: 1 },
      ],
      maxIndex: 1,
    });
  });

  it('reads every digit after $', () => {
    const template = parseReplacement('/x/$12');
    expect(template).toEqual({
      kind: 'template',
      segments: [
        { type: 'literal', text: '/x/' },
        { type: 'backreference', index: 12 },
      ],
      maxIndex: 12,
    });
  });

  it('lets digits follow a braced reference', () => {
    expect(parseReplacement('${1}0')).toEqual({
      kind: 'template',
      segments: [
        { type: 'backreference', index: 1 },
        { type: 'literal', text: '0' },
      ],
      maxIndex: 1,
    });
  });

  it('treats $$ as a literal dollar', () => {
    expect(parseReplacement('/price/$$1')).toEqual({
      kind: 'template',
      segments: [{ type: 'literal', text: '/price/$1' }],
      maxIndex: 0,
    });
  });

  it('keeps a dollar that does not start a reference', () => {
    expect(parseReplacement('/a$b/c$')).toEqual({
      kind: 'template',
      segments: [{ type: 'literal', text: '/a$b/c$' }],
      maxIndex: 0,
    });
  });

  it('tracks the highest index used', () => {
    const template = parseReplacement('/$2/$0/$1');
    expect(template.kind === 'template' && template.maxIndex).toBe(2);
  });
});

describe('expandReplacement', () => {
  it('substitutes captures and keeps literals verbatim', () => {
    const template = parseReplacement('/users/$2/posts/$1');
    expect(expandReplacement(template, ['/p/7/ann', '7', 'ann'], '/p/7/ann')).toBe('/users/ann/posts/7');
  });

  it('supports $0 for the whole match', () => {
    const template = parseReplacement('/mirror$0');
    expect(expandReplacement(template, ['/a/b'], '/a/b')).toBe('/mirror/a/b');
  });

  it('expands a non-participating group to an empty string', () => {
    const template = parseReplacement('/x/$1/$2');
    expect(expandReplacement(template, ['m', 'a', undefined], 'm')).toBe('/x/a/');
  });

  it('returns the current URI for the no-substitution marker', () => {
    expect(expandReplacement(NO_SUBSTITUTION, ['/blocked/y', 'y'], '/blocked/y')).toBe('/blocked/y');
  });
});
