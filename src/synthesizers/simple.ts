import path from "node:path";
import { escapeHtml, fuzzyRegExp, highlight } from "./fuzzy";
import type { AnswerSynthesizer, SynthesisRequest } from "./types";

/** Longest snippet (in characters) before it is cut and suffixed with "...". */
export const MAX_SNIPPET_CHARS = 400;

const LEADING_TAG = /^\[(?:Page|Para|Table) \d+\]\s*/;
const TAG_KINDS = ["Page", "Para", "Table"] as const;

export type LocationKind = (typeof TAG_KINDS)[number];

export interface Location {
  kind: LocationKind;
  num: number;
}

/** Link to the original file for sources that are not plain text. */
export interface DocumentLink {
  kind: "pdf" | "word";
  url: string;
}

/** One matching line. */
export interface TextMatch {
  docId: string;
  /** 1-based line number within the document text. */
  line: number;
  location: Location | null;
  /** Escaped, highlighted snippet (matched line plus the following line). */
  snippetHtml: string;
  viewUrl: string;
  /** Link to the original PDF/Word document, when the source is one. */
  document: DocumentLink | null;
}

/** URL-encode, keeping path separators readable. */
function quote(s: string): string {
  return encodeURIComponent(s).replace(/%2F/gi, "/");
}

export function stripTag(line: string): string {
  return line.replace(LEADING_TAG, "");
}

/** First structural tag found in a raw line, Page taking precedence over Para over Table. */
export function locateTag(line: string): Location | null {
  for (const kind of TAG_KINDS) {
    const m = new RegExp(`\\[${kind} (\\d+)\\]`).exec(line);
    if (m) return { kind, num: Number(m[1]) };
  }
  return null;
}

function snippet(lines: readonly string[], i: number): string {
  const parts = [stripTag(lines[i].trim())];
  if (i + 1 < lines.length) {
    const next = stripTag(lines[i + 1].trim());
    if (next) parts.push(next);
  }
  const chars = Array.from(parts.join("\n"));
  return chars.length > MAX_SNIPPET_CHARS ? chars.slice(0, MAX_SNIPPET_CHARS).join("") + "..." : chars.join("");
}

function documentLink(absPath: string, location: Location | null): DocumentLink | null {
  const lower = absPath.toLowerCase();
  if (lower.endsWith(".pdf")) {
    const page = location?.kind === "Page" ? location.num : 1;
    return { kind: "pdf", url: `/download?file=${quote(absPath)}&page=${page}#page=${page}` };
  }
  if (lower.endsWith(".docx") || lower.endsWith(".doc")) {
    return { kind: "word", url: `/download?file=${quote(absPath)}` };
  }
  return null;
}

/**
 * Every line of every context matching the fuzzy query pattern, in context
 * then line order. Contexts without an id are labelled "Document N".
 */
export function findMatches(
  query: string,
  contexts: readonly string[],
  docIds: readonly string[] = [],
): TextMatch[] {
  const matcher = fuzzyRegExp(query);
  const out: TextMatch[] = [];
  contexts.forEach((text, c) => {
    const docId = docIds[c] ?? `Document ${c + 1}`;
    const absPath = path.resolve(docId);
    const lines = text.split("\n");
    lines.forEach((line, i) => {
      if (!matcher.test(line)) return;
      const location = locateTag(line);
      out.push({
        docId,
        line: i + 1,
        location,
        snippetHtml: highlight(escapeHtml(snippet(lines, i)), query).replace(/\n/g, "<br>"),
        viewUrl: `/view?file=${quote(absPath)}&line=${i + 1}&query=${quote(query)}`,
        document: documentLink(absPath, location),
      });
    });
  });
  return out;
}

export function renderMatch(m: TextMatch): string {
  const where = m.location ? ` (${m.location.kind} ${m.location.num})` : "";
  let docLink = "";
  if (m.document) {
    docLink =
      m.document.kind === "pdf"
        ? ` <a href="${m.document.url}" target="_blank" class="pdf-link" title="Open PDF in browser">📖 Open PDF</a>`
        : ` <a href="${m.document.url}" target="_blank" class="pdf-link" title="Download Word document">📝 Open Doc</a>`;
  }
  return (
    `<div class="result-item">` +
    `<div class="result-file">` +
    `<a href="${m.viewUrl}" target="_blank" title="View extracted text at line ${m.line}">` +
    `📄 ${escapeHtml(path.basename(m.docId))}</a>` +
    `<span class="result-location"> : Line ${m.line}${where}</span>` +
    docLink +
    `</div>` +
    `<div class="result-text">${m.snippetHtml}</div>` +
    `</div>`
  );
}

/**
 * Exhaustive, deterministic text search over all supplied contexts. `topK`
 * never limits what is found; it only appears in the "per page" note.
 */
export function searchAnswer(req: SynthesisRequest): string {
  const { query, contexts, docIds, topK } = req;
  if (!query.trim()) return "No search query provided.";

  const matches = findMatches(query, contexts, docIds);
  if (matches.length === 0) return `No matches found for '${escapeHtml(query)}'.`;

  const total = matches.length;
  const perPage = total > topK ? ` (showing ${Math.min(topK, total)} per page)` : "";
  const header =
    `<div class="search-header">Search results for "<strong>${escapeHtml(query)}</strong>" ` +
    `(${total} total matches${perPage})</div>`;
  return header + matches.map(renderMatch).join("\n");
}

export class SimpleSynthesizer implements AnswerSynthesizer {
  public async synthesize(req: SynthesisRequest): Promise<string> {
    return searchAnswer(req);
  }
}
