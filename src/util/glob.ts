/**
 * Simple glob matching for alias name filtering.
 * Supports '*' and '?' wildcards only (not full glob syntax).
 */

export function matchesGlob(name: string, pattern: string): boolean {
  // Escape regex specials, then map * to .* and ? to a single character
  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, "\\$&");
  const regex = new RegExp(
    `^${escaped.replace(/\*/g, ".*").replace(/\?/g, ".")}$`,
  );
  return regex.test(name);
}
