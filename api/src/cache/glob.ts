/**
 * Glob Matching
 * @module cache/glob
 *
 * Compiles the cache-pattern glob dialect (`*`, `?`, `[...]`) into a RegExp
 * matching the same keys the distributed tier's SCAN MATCH would.
 */

const REGEX_SPECIAL = /[\\^$.|+(){}[\]]/;

function escapeChar(ch: string): string {
  return REGEX_SPECIAL.test(ch) ? `\\${ch}` : ch;
}

/**
 * Compile a validated glob pattern to an anchored RegExp
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  let i = 0;

  while (i < pattern.length) {
    const ch = pattern[i];

    if (ch === '*') {
      source += '.*';
    } else if (ch === '?') {
      source += '.';
    } else if (ch === '[') {
      const close = pattern.indexOf(']', i + 1);
      if (close > i + 1) {
        let body = pattern.slice(i + 1, close).replace(/\\/g, '\\\\');
        if (body.startsWith('^') || body.startsWith('!')) {
          body = `^${body.slice(1)}`;
        }
        source += `[${body}]`;
        i = close;
      } else {
        // Unterminated or empty class matches the bracket literally
        source += '\\[';
      }
    } else {
      source += escapeChar(ch);
    }

    i++;
  }

  return new RegExp(`^${source}$`, 's');
}

/**
 * Build a predicate testing keys against a glob pattern
 */
export function createGlobMatcher(pattern: string): (key: string) => boolean {
  const regex = globToRegExp(pattern);
  return (key) => regex.test(key);
}
