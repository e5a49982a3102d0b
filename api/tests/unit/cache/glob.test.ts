/**
 * Glob Matching Tests
 * @module tests/unit/cache/glob
 */

import { describe, it, expect } from 'vitest';
import { createGlobMatcher, globToRegExp } from '../../../src/cache/glob.js';

describe('createGlobMatcher', () => {
  it('should match any run of characters for *', () => {
    const matches = createGlobMatcher('flights:*');

    expect(matches('flights:all')).toBe(true);
    expect(matches('flights:status:delayed')).toBe(true);
    expect(matches('flight:detail:1')).toBe(false);
  });

  it('should match exactly one character for ?', () => {
    const matches = createGlobMatcher('flight?');

    expect(matches('flights')).toBe(true);
    expect(matches('flight')).toBe(false);
  });

  it('should support character classes and negation', () => {
    expect(createGlobMatcher('[ab]x')('ax')).toBe(true);
    expect(createGlobMatcher('[ab]x')('cx')).toBe(false);
    expect(createGlobMatcher('[!a]x')('bx')).toBe(true);
    expect(createGlobMatcher('[!a]x')('ax')).toBe(false);
  });

  it('should treat regex metacharacters literally', () => {
    const matches = createGlobMatcher('a.b');

    expect(matches('a.b')).toBe(true);
    expect(matches('axb')).toBe(false);
  });

  it('should match an unterminated bracket literally', () => {
    expect(globToRegExp('a[').test('a[')).toBe(true);
  });
});
