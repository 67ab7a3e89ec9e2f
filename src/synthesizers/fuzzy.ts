/** Characters dropped from a query and tolerated between its letters. */
const SEPARATOR = /[-\s]/;

/** Optional run of hyphens/whitespace allowed between consecutive query characters. */
const SEPARATOR_RUN = "[-\\s]*";

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\/-]/g, "\\$&");
}

/**
 * Regex source matching `query` with separators ignored: "bowtie" and
 * "bow-tie" both match "bowtie", "bow-tie" and "bow tie". Built from the
 * lower-cased non-separator characters only; with fewer than two such
 * characters the whole query is escaped verbatim.
 */
export function buildFuzzyPattern(query: string): string {
  const parts: string[] = [];
  for (const ch of query.toLowerCase()) {
    if (SEPARATOR.test(ch)) continue;
    parts.push(escapeRegExp(ch));
  }
  if (parts.length > 1) return parts.join(SEPARATOR_RUN);
  return escapeRegExp(query);
}

/** Case-insensitive matcher for {@link buildFuzzyPattern}; pass "gi" to replace every occurrence. */
export function fuzzyRegExp(query: string, flags: "i" | "gi" = "i"): RegExp {
  return new RegExp(buildFuzzyPattern(query), flags);
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

export function escapeHtml(s: string): string {
  return s.replace(/[&<>"']/g, (c) => HTML_ESCAPES[c] ?? c);
}

/** Wrap every fuzzy occurrence of `query` in `html` with <mark>. */
export function highlight(html: string, query: string): string {
  return html.replace(fuzzyRegExp(query, "gi"), "<mark>$&</mark>");
}
