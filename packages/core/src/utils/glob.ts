const compiled = new Map<string, RegExp>();
const NEVER = /(?!)/;

/**
 * Shell-style wildcard match over the whole string, case-sensitive.
 *
 * - `*` matches any run of characters, including `/`
 * - `?` matches exactly one character
 * - `[abc]`, `[a-z]` and `[!abc]` match character classes
 * - `\` escapes the following character
 *
 * A pattern that does not compile, such as `[z-a]`, matches nothing.
 *
 * @param pattern - Glob pattern
 * @param value - String to test
 * @returns true if the whole of `value` matches `pattern`
 *
 * @example
 * ```typescript
 * matchGlob('*.example.com', 'app.example.com'); // true
 * matchGlob('https://*.example.com/', 'https://login.example.com/'); // true
 * matchGlob('*.example.com', 'example.com'); // false
 * ```
 */
export function matchGlob(pattern: string, value: string): boolean {
  let expression = compiled.get(pattern);
  if (!expression) {
    try {
      expression = globToRegExp(pattern);
    } catch {
      // malformed patterns such as reversed ranges match nothing
      expression = NEVER;
    }
    // claim values are compiled as patterns too
    if (compiled.size >= 1000) {
      compiled.clear();
    }
    compiled.set(pattern, expression);
  }
  return expression.test(value);
}

export function globToRegExp(pattern: string): RegExp {
  let source = '';
  for (let index = 0; index < pattern.length; index++) {
    const character = pattern[index];
    switch (character) {
      case '*':
        source += '.*';
        break;
      case '?':
        source += '.';
        break;
      case '[': {
        // a ']' straight after the opening bracket (or its negation) is a literal member
        const negated = pattern[index + 1] === '!' || pattern[index + 1] === '^';
        const start = negated ? index + 2 : index + 1;
        const end = pattern.indexOf(']', start + 1);
        if (end === -1) {
          source += '\\[';
          break;
        }
        const members = pattern.slice(start, end).replace(/[\\\]^[]/g, '\\$&');
        source += `[${negated ? '^' : ''}${members}]`;
        index = end;
        break;
      }
      case '\\':
        if (index + 1 < pattern.length) {
          index++;
          source += escapeRegExp(pattern[index]);
        } else {
          source += '\\\\';
        }
        break;
      default:
        source += escapeRegExp(character);
    }
  }
  return new RegExp(`^${source}$`, 's');
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}
