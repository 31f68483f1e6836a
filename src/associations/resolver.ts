import type { Association } from "../types.js";

/**
 * Unanchored search. `g` and `y` are dropped from a copy of the pattern:
 * `y` would pin the match to index 0 and `g` keeps `lastIndex` between calls.
 */
export function matchesAnywhere(text: string, pattern: RegExp): boolean {
  const re =
    pattern.global || pattern.sticky
      ? new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""))
      : pattern;
  return re.test(text);
}

/** First association whose pattern occurs anywhere in `file`, in table order. */
export function resolveAssociation(
  file: string,
  table: readonly Association[],
): Association | null {
  for (const assoc of table) {
    if (matchesAnywhere(file, assoc.pattern)) return assoc;
  }
  return null;
}
