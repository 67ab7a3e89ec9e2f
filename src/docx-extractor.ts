import path from "node:path";
import mammoth from "mammoth";

/** Number every non-empty paragraph: `[Para 1] ...`. */
export function tagParagraphs(rawText: string): string {
  return rawText
    .split(/\n+/)
    .map((p) => p.trim())
    .filter(Boolean)
    .map((p, i) => `[Para ${i + 1}] ${p}`)
    .join("\n");
}

/**
 * Word (.docx) text via mammoth's raw-text conversion, one tagged line per
 * paragraph. Failures are logged and yield "" so indexing can continue.
 */
export async function extractDocxText(absPath: string): Promise<string> {
  try {
    const result = await mammoth.extractRawText({ path: absPath });
    return tagParagraphs(result.value);
  } catch (e) {
    console.error(`[DOCX] Failed to read ${path.basename(absPath)}:`, e);
    return "";
  }
}

export function isDocx(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === ".docx";
}
