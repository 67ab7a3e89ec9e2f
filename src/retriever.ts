import type { Index } from "./types";

export interface RetrievalResult {
  /** Document positions in the index, best first. */
  indices: number[];
  /** Cosine similarity for each entry of `indices`. */
  scores: number[];
}

/** Euclidean norm. */
function norm(v: Float64Array): number {
  let s = 0;
  for (let i = 0; i < v.length; i++) s += v[i] * v[i];
  return Math.sqrt(s);
}

/**
 * Cosine similarity (1 - cosine distance), clamped to [-1, 1] against
 * rounding. A zero vector scores 0 against everything. Length mismatch
 * compares up to the shortest length.
 */
export function cosineSimilarity(a: Float64Array, b: Float64Array, normA = norm(a), normB = norm(b)): number {
  if (normA === 0 || normB === 0) return 0;
  let dot = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) dot += a[i] * b[i];
  return Math.min(1, Math.max(-1, dot / (normA * normB)));
}

/**
 * Exact nearest-neighbour ranking by cosine similarity over every indexed
 * vector. Deterministic: equal scores keep ascending document order.
 */
export class Retriever {
  private readonly vectors: readonly Float64Array[];
  private readonly norms: Float64Array;

  public constructor(vectors: readonly Float64Array[]) {
    this.vectors = vectors;
    this.norms = Float64Array.from(vectors, norm);
  }

  public static fromIndex(index: Index): Retriever {
    return new Retriever(index.vectors);
  }

  public get size(): number {
    return this.vectors.length;
  }

  /** `topK` is clamped to [1, number of documents]. */
  public query(queryVector: Float64Array, topK = 5): RetrievalResult {
    if (this.vectors.length === 0) return { indices: [], scores: [] };
    const k = Math.max(1, Math.min(Math.floor(topK), this.vectors.length));
    const qNorm = norm(queryVector);
    const scored = this.vectors.map((v, i) => ({
      i,
      s: cosineSimilarity(queryVector, v, qNorm, this.norms[i]),
    }));
    scored.sort((a, b) => b.s - a.s || a.i - b.i);
    const top = scored.slice(0, k);
    return { indices: top.map((r) => r.i), scores: top.map((r) => r.s) };
  }
}
