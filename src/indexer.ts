import { EmptyCorpusError } from "./errors";
import { saveIndex } from "./persistence";
import type { CorpusSource, DocRecord, Index } from "./types";
import { createVectorizer } from "./vectorizer";

/** Options for {@link buildIndex}. All optional. */
export interface BuildIndexOptions {
  /** TF-IDF vocabulary cap. */
  maxFeatures?: number;
  verbose?: boolean;
}

/**
 * Keep the first record for every id, in first-seen order, and drop records
 * whose text is blank.
 */
export function normalizeRecords(records: readonly DocRecord[]): DocRecord[] {
  const seen = new Set<string>();
  const out: DocRecord[] = [];
  for (const r of records) {
    if (seen.has(r.id)) continue;
    seen.add(r.id);
    if (r.text.trim()) out.push({ id: r.id, text: r.text });
  }
  return out;
}

/**
 * Full (cold) build: load the corpus, fit a fresh vectorizer on every
 * document, embed, persist to `indexPath` and return the new immutable Index.
 * Nothing is persisted when the build fails.
 *
 * @throws {EmptyCorpusError} when no non-empty documents remain.
 */
export async function buildIndex(
  corpus: CorpusSource,
  indexPath: string,
  opts: BuildIndexOptions = {},
): Promise<Index> {
  const docs = normalizeRecords(await corpus.load());
  if (docs.length === 0) throw new EmptyCorpusError();

  console.error(`[RAG] Found ${docs.length} documents, creating embeddings...`);
  const texts = docs.map((d) => d.text);
  const vectorizer = createVectorizer({ maxFeatures: opts.maxFeatures });
  await vectorizer.fit(texts);
  const vectors = await vectorizer.embed(texts);
  if (opts.verbose) {
    console.error(`[RAG][verbose] Vector dimension: ${vectorizer.dimension()}`);
  }

  const index: Index = Object.freeze({
    docs: Object.freeze(docs),
    vectors: Object.freeze(vectors),
    vectorizer,
    modelName: vectorizer.modelName,
  });
  await saveIndex(index, indexPath, opts.verbose);
  console.error(`[RAG] Index saved to ${indexPath}`);
  return index;
}
