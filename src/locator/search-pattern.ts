/**
 * Shell-style filename patterns as produced by the search-target getters:
 * `*` matches any run of characters within one path segment, `?` exactly one.
 * Everything else is literal. As with shell globbing, a leading `.` in a
 * name must be matched by a literal `.`.
 */
export function searchPatternToRegExp(pattern: string): RegExp {
  let source = '';
  for (const ch of pattern) {
    if (ch === '*') source += '[^/]*';
    else if (ch === '?') source += '[^/]';
    else source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
  }
  return new RegExp(`^${source}$`);
}

export function matchesSearchPattern(fileName: string, pattern: string): boolean {
  if (fileName.startsWith('.') && !pattern.startsWith('.')) return false;
  return searchPatternToRegExp(pattern).test(fileName);
}
