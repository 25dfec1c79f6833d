/**
 * Glob matching with Redis pattern semantics
 *
 * Supports `*`, `?`, character classes (`[abc]`, `[a-z]`, `[^a]`) and `\`
 * escapes. Used by the in-process store; Redis matches patterns server side.
 */

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\/]/g;

function escapeRegex(text: string): string {
  return text.replace(REGEX_SPECIAL, '\\$&');
}

export function globToRegExp(pattern: string): RegExp {
  let source = '';
  let i = 0;

  while (i < pattern.length) {
    const ch = pattern[i];

    if (ch === '\\' && i + 1 < pattern.length) {
      source += escapeRegex(pattern[i + 1]);
      i += 2;
      continue;
    }

    if (ch === '*') {
      source += '[\\s\\S]*';
      i++;
      continue;
    }

    if (ch === '?') {
      source += '[\\s\\S]';
      i++;
      continue;
    }

    if (ch === '[') {
      const close = pattern.indexOf(']', i + 2);
      if (close === -1) {
        // Unterminated class matches a literal bracket
        source += '\\[';
        i++;
        continue;
      }

      let body = pattern.slice(i + 1, close);
      let negate = false;
      if (body.startsWith('^') || body.startsWith('!')) {
        negate = true;
        body = body.slice(1);
      }

      const cls = body
        .replace(/\\(.)/g, '$1')
        .split('')
        .map((c, idx, chars) =>
          c === '-' && idx > 0 && idx < chars.length - 1 ? '-' : escapeRegex(c)
        )
        .join('');
      source += `[${negate ? '^' : ''}${cls}]`;
      i = close + 1;
      continue;
    }

    source += escapeRegex(ch);
    i++;
  }

  return new RegExp(`^${source}$`);
}

/**
 * Compiled glob, cached per pattern string
 */
export class GlobMatcher {
  private readonly compiled = new Map<string, RegExp>();

  matches(pattern: string, candidate: string): boolean {
    if (pattern === '*') {
      return true;
    }

    let regex = this.compiled.get(pattern);
    if (!regex) {
      regex = globToRegExp(pattern);
      this.compiled.set(pattern, regex);
    }
    return regex.test(candidate);
  }
}
