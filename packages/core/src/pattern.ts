/**
 * Wildcard name patterns
 *
 * `*` matches any run of characters, `?` exactly one. Everything else is
 * literal, including `.` in `Type.Name` patterns.
 */

export function compilePattern(pattern: string): RegExp {
  let source = '';
  for (const ch of pattern) {
    if (ch === '*') {
      source += '.*';
    } else if (ch === '?') {
      source += '.';
    } else {
      source += ch.replace(/[\\^$.*+?()[\]{}|/-]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`);
}

export function matchesPattern(pattern: string, name: string): boolean {
  return compilePattern(pattern).test(name);
}
