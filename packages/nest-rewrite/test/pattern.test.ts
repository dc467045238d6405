import { describe, it, expect } from 'vitest';
import { compilePattern } from '../src/engine/pattern';

describe('compilePattern', () => {
  it('counts capture groups', () => {
    expect(compilePattern('/file/(.*)').groupCount).toBe(1);
    expect(compilePattern('^/(a)/(b)/(c)$').groupCount).toBe(3);
    expect(compilePattern('^/static$').groupCount).toBe(0);
  });

  it('does not count non-capturing groups but counts named ones', () => {
    expect(compilePattern('(?:/api)(/v\\d)').groupCount).toBe(1);
    expect(compilePattern('^/user/(?<id>\\d+)$').groupCount).toBe(1);
  });

  it('keeps the pattern text', () => {
    expect(compilePattern('^/a(.*)').source).toBe('^/a(.*)');
  });

  it('throws SyntaxError for an invalid expression', () => {
    expect(() => compilePattern('/broken(')).toThrow(SyntaxError);
  });
});

describe('CompiledPattern.match', () => {
  it('returns null when nothing matches', () => {
    expect(compilePattern('^/admin').match('/public')).toBeNull();
  });

  it('returns the whole match at index 0 followed by groups', () => {
    expect(compilePattern('/file/(.*)').match('/file/my/document.txt')).toEqual([
      '/file/my/document.txt',
      'my/document.txt',
    ]);
  });

  it('is not anchored implicitly', () => {
    expect(compilePattern('b+').match('abbbc')).toEqual(['bbb']);
    expect(compilePattern('/file/(.*)').match('http://localhost/file/x')).toEqual(['/file/x', 'x']);
  });

  it('reports non-participating groups as undefined', () => {
    expect(compilePattern('^/(a)(b)?').match('/a')).toEqual(['/a', 'a', undefined]);
  });

  it('gives the same answer on repeated calls', () => {
    const pattern = compilePattern('(\\d+)');
    expect(pattern.match('/page/42')).toEqual(['42', '42']);
    expect(pattern.match('/page/42')).toEqual(['42', '42']);
    expect(pattern.match('/page/7')).toEqual(['7', '7']);
  });
});
