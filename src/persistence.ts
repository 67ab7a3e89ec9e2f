import fs from "node:fs/promises";
import path from "node:path";
import { IndexFormatError, IndexNotFoundError } from "./errors";
import type { DocRecord, Index } from "./types";
import { parseVectorizerState, restoreVectorizer, type VectorizerState } from "./vectorizer";

/** On-disk format version; bump on incompatible layout changes. */
export const INDEX_FORMAT_VERSION = 1;

/**
 * Serialized layout of an index file. Vectors are base64-encoded little-endian
 * float64 so they decode to exactly the values that were written.
 */
interface StoredIndex {
  version: number;
  meta: {
    modelName: string;
    savedAt: string;
    vectorEncoding: "f64-base64";
    dimension: number;
  };
  docs: DocRecord[];
  vectors: string[];
  vectorizer: VectorizerState;
}

function encodeVector(v: Float64Array): string {
  return Buffer.from(v.buffer, v.byteOffset, v.byteLength).toString("base64");
}

function decodeVector(encoded: string): Float64Array | null {
  const buf = Buffer.from(encoded, "base64");
  if (buf.byteLength % Float64Array.BYTES_PER_ELEMENT !== 0) return null;
  // Copy out of the (possibly unaligned, pooled) Buffer before viewing as float64.
  const bytes = new Uint8Array(buf);
  return new Float64Array(bytes.buffer, 0, bytes.byteLength / Float64Array.BYTES_PER_ELEMENT);
}

/**
 * Persist an index as a single JSON file, creating parent directories. The
 * file is written beside the target and renamed over it so readers never see
 * a partial file.
 */
export async function saveIndex(index: Index, indexPath: string, verbose = false): Promise<void> {
  const out: StoredIndex = {
    version: INDEX_FORMAT_VERSION,
    meta: {
      modelName: index.modelName,
      savedAt: new Date().toISOString(),
      vectorEncoding: "f64-base64",
      dimension: index.vectorizer.dimension(),
    },
    docs: index.docs.map((d) => ({ id: d.id, text: d.text })),
    vectors: index.vectors.map(encodeVector),
    vectorizer: index.vectorizer.toState(),
  };
  await fs.mkdir(path.dirname(indexPath), { recursive: true });
  const tmp = `${indexPath}.${process.pid}.tmp`;
  await fs.writeFile(tmp, JSON.stringify(out));
  await fs.rename(tmp, indexPath);
  if (verbose) console.error(`[RAG][verbose] Persisted index to ${indexPath}`);
}

function parseDocs(value: unknown): DocRecord[] | null {
  if (!Array.isArray(value)) return null;
  const docs: DocRecord[] = [];
  for (const d of value) {
    if (!d || typeof d !== "object") return null;
    const { id, text }: { id?: unknown; text?: unknown } = d;
    if (typeof id !== "string" || typeof text !== "string") return null;
    docs.push({ id, text });
  }
  return docs;
}

/**
 * Load a persisted index.
 *
 * @throws {IndexNotFoundError} if nothing exists at `indexPath`.
 * @throws {IndexFormatError} if the file is not a readable index.
 */
export async function loadIndex(indexPath: string): Promise<Index> {
  let raw: string;
  try {
    raw = await fs.readFile(indexPath, "utf8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") throw new IndexNotFoundError(indexPath);
    throw e;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new IndexFormatError(indexPath, e instanceof Error ? e.message : "unparseable JSON");
  }
  if (!parsed || typeof parsed !== "object") throw new IndexFormatError(indexPath, "not an object");
  const stored: Record<string, unknown> = { ...parsed };

  if (stored.version !== INDEX_FORMAT_VERSION) {
    throw new IndexFormatError(indexPath, `unsupported version ${String(stored.version)}`);
  }
  const docs = parseDocs(stored.docs);
  if (!docs) throw new IndexFormatError(indexPath, "malformed docs");
  const state = parseVectorizerState(stored.vectorizer);
  if (!state) throw new IndexFormatError(indexPath, "malformed vectorizer state");
  if (!Array.isArray(stored.vectors) || stored.vectors.length !== docs.length) {
    throw new IndexFormatError(indexPath, "vectors do not line up with docs");
  }

  const vectorizer = restoreVectorizer(state);
  const vectors: Float64Array[] = [];
  for (const encoded of stored.vectors) {
    const v = typeof encoded === "string" ? decodeVector(encoded) : null;
    if (!v || v.length !== vectorizer.dimension()) {
      throw new IndexFormatError(indexPath, `vector ${vectors.length} has the wrong dimension`);
    }
    vectors.push(v);
  }

  const { modelName } = vectorizer;
  console.error(`[RAG] Loaded persisted index: ${docs.length} documents (${modelName}).`);
  return Object.freeze({ docs: Object.freeze(docs), vectors: Object.freeze(vectors), vectorizer, modelName });
}
