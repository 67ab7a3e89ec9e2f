import type { Vectorizer } from "./vectorizer";

/**
 * A single indexed document. `id` is unique within an index (the absolute file
 * path for file corpora); `text` is the raw extracted content, structural
 * `[Page N]` / `[Para N]` / `[Table N]` tags included.
 */
export interface DocRecord {
  readonly id: string;
  readonly text: string;
}

/**
 * Immutable unit of searchable state. `vectors[i]` belongs to `docs[i]`.
 * A rebuild creates a new Index; live instances are never mutated.
 */
export interface Index {
  readonly docs: readonly DocRecord[];
  readonly vectors: readonly Float64Array[];
  readonly vectorizer: Vectorizer;
  readonly modelName: string;
}

/** One ranked hit returned to query callers. */
export interface QueryResultItem {
  doc_id: string;
  score: number;
  text: string;
}

export interface Pagination {
  current_page: number;
  per_page: number;
  total_results: number;
  total_pages: number;
}

/** Supplies `{id, text}` records for an index build. */
export interface CorpusSource {
  load(): Promise<DocRecord[]>;
}
