/**
 * Case-insensitive wildcard matching ("*" any run, "?" one character)
 */

const patternCache = new Map<string, RegExp>();

const toRegExp = (pattern: string): RegExp => {
  const cached = patternCache.get(pattern);
  if (cached) return cached;

  let source = "";
  for (const ch of pattern) {
    if (ch === "*") source += ".*";
    else if (ch === "?") source += ".";
    else source += ch.replace(/[\\^$.|+()[\]{}]/g, "\\$&");
  }
  const regex = new RegExp(`^${source}$`, "is");
  patternCache.set(pattern, regex);
  return regex;
};

export const hasWildcards = (pattern: string): boolean =>
  pattern.includes("*") || pattern.includes("?");

export const matchWildcard = (pattern: string, text: string): boolean =>
  toRegExp(pattern).test(text);

/**
 * True if any of the texts matches the pattern.
 */
export const matchAnyWildcard = (
  pattern: string,
  texts: readonly string[]
): boolean => texts.some((t) => matchWildcard(pattern, t));
