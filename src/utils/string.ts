/**
 * String manipulation utilities.
 */

/**
 * Remove the first and last character of a literal's source text.
 *
 * Used to unwrap quoted string literals. The characters are dropped
 * unconditionally, so `'Hello!'` becomes `Hello!` and stripping that
 * again yields `ello`. Strings shorter than two characters become empty.
 */
export function stripQuotes(literal: string): string {
  const chars = Array.from(literal);
  return chars.slice(1, -1).join('');
}

/**
 * Truncate a string to a maximum length, adding ellipsis if truncated.
 */
export function truncateString(str: string, maxLen: number): string {
  if (maxLen < 0) {
    return '';
  }

  if (str.length <= maxLen) {
    return str;
  }

  if (maxLen <= 3) {
    return str.slice(0, maxLen);
  }

  return str.slice(0, maxLen - 3) + '...';
}
