/**
 * Minimal glob matching for file names and paths.
 *
 *  - `*` matches any characters except `/`
 *  - `**` matches across `/`; `**\/` matches zero or more directory segments
 *  - `?` matches one character except `/`
 *  - `{a,b}` matches either alternative
 */

const REGEX_SPECIALS = new Set(['.', '(', ')', '[', ']', '+', '^', '$', '|', '\\']);

export function globToRegex(pattern: string, caseInsensitive = false): RegExp {
  const normalized = pattern.replace(/\\/g, '/');
  let regex = '';
  let braceDepth = 0;
  let i = 0;

  while (i < normalized.length) {
    const char = normalized[i];

    if (char === '*') {
      if (normalized[i + 1] === '*') {
        if (normalized[i + 2] === '/') {
          regex += '(?:.+/)?';
          i += 3;
        } else {
          regex += '.*';
          i += 2;
        }
      } else {
        regex += '[^/]*';
        i += 1;
      }
    } else if (char === '?') {
      regex += '[^/]';
      i += 1;
    } else if (char === '{') {
      regex += '(?:';
      braceDepth++;
      i += 1;
    } else if (char === '}' && braceDepth > 0) {
      regex += ')';
      braceDepth--;
      i += 1;
    } else if (char === ',' && braceDepth > 0) {
      regex += '|';
      i += 1;
    } else if (char === '{' || char === '}' || REGEX_SPECIALS.has(char)) {
      regex += '\\' + char;
      i += 1;
    } else {
      regex += char;
      i += 1;
    }
  }

  // Unbalanced braces: close them so the expression still compiles
  regex += ')'.repeat(braceDepth);

  return new RegExp('^' + regex + '$', caseInsensitive ? 'i' : '');
}

/**
 * Test if a path matches a glob pattern. Backslashes are treated as `/`.
 */
export function matchGlob(pattern: string, filePath: string, caseInsensitive = false): boolean {
  return globToRegex(pattern, caseInsensitive).test(filePath.replace(/\\/g, '/'));
}

export function matchAny(patterns: readonly string[], filePath: string, caseInsensitive = false): boolean {
  return patterns.some((pattern) => matchGlob(pattern, filePath, caseInsensitive));
}
