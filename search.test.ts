import { describe, expect, it } from 'vitest';

import { compile, search } from './index';

describe('search', () => {
  it('returns the first offset where the program matches', () => {
    expect(search(compile('b+c'), 'aabbc')).toBe(2);
    expect(search(compile('c(ab)*c'), 'xxcababcxx')).toBe(2);
  });

  it('returns 0 when the match starts at the beginning', () => {
    expect(search(compile('ab'), 'abab')).toBe(0);
  });

  it('returns -1 when no offset matches', () => {
    expect(search(compile('abc'), 'ababab')).toBe(-1);
  });

  it('tries the empty suffix at the end of input', () => {
    expect(search(compile('z*'), '')).toBe(0);
    expect(search(compile('a*'), 'bbb')).toBe(0);
  });

  it('passes the thread limit through', () => {
    expect(() => search(compile('ab*c'), 'xac', { maxThreads: 1 })).toThrow('thread limit exceeded: 1');
  });
});
