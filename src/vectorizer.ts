import natural from "natural";
import stopwordList from "./data/stopwords.json" with { type: "json" };
import { EmptyCorpusError, NotFittedError } from "./errors";

const { WordTokenizer } = natural;

/** Model name recorded in every index. */
export const TFIDF_MODEL_NAME = "tfidf";

/**
 * Text → fixed-width numeric vector transform. `fit` fixes the vector space
 * (dimension and weights); `embed` maps texts into it. The fitted state is a
 * plain JSON value so a persisted index can be queried without re-fitting.
 */
export interface Vectorizer {
  readonly modelName: string;
  isFitted(): boolean;
  /** Dimension of every vector `embed` returns (0 before fit). */
  dimension(): number;
  fit(corpus: readonly string[]): Promise<void>;
  embed(texts: readonly string[]): Promise<Float64Array[]>;
  toState(): VectorizerState;
}

export interface TfidfState {
  kind: "tfidf";
  /** Column order: vocabulary[i] is the term of column i. */
  vocabulary: string[];
  idf: number[];
  maxFeatures: number;
  maxDf: number;
}

export type VectorizerState = TfidfState;

export interface TfidfOptions {
  /** Vocabulary cap, most frequent terms kept (default 5000). */
  maxFeatures?: number;
  /** Drop terms present in more than this share of documents (default 0.95). */
  maxDf?: number;
}

const STOP_WORDS: ReadonlySet<string> = new Set(stopwordList);
const tokenizer = new WordTokenizer();

function compareTerms(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Lower-cased unigrams (2+ chars, stop words removed) followed by adjacent bigrams. */
export function analyze(text: string): string[] {
  const tokens = tokenizer
    .tokenize(text.toLowerCase())
    .filter((t) => t.length >= 2 && !STOP_WORDS.has(t));
  const terms = [...tokens];
  for (let i = 0; i + 1 < tokens.length; i++) terms.push(`${tokens[i]} ${tokens[i + 1]}`);
  return terms;
}

/**
 * Sparse-vocabulary TF-IDF with smoothed idf and L2 normalization. Weights are
 * plain doubles and survive a JSON round-trip unchanged, so a restored
 * instance embeds bit-for-bit like the one that was saved.
 */
export class TfidfVectorizer implements Vectorizer {
  public readonly modelName = TFIDF_MODEL_NAME;
  private readonly maxFeatures: number;
  private readonly maxDf: number;
  private vocabulary: string[] = [];
  private columns = new Map<string, number>();
  private idf: number[] = [];
  private fitted = false;

  public constructor(opts: TfidfOptions = {}) {
    this.maxFeatures = Math.max(1, Math.floor(opts.maxFeatures ?? 5000));
    this.maxDf = opts.maxDf ?? 0.95;
  }

  public static fromState(state: TfidfState): TfidfVectorizer {
    const v = new TfidfVectorizer({ maxFeatures: state.maxFeatures, maxDf: state.maxDf });
    v.setVocabulary(state.vocabulary, state.idf);
    return v;
  }

  public isFitted(): boolean {
    return this.fitted;
  }

  public dimension(): number {
    return this.vocabulary.length;
  }

  public async fit(corpus: readonly string[]): Promise<void> {
    if (corpus.length === 0) throw new EmptyCorpusError("Cannot fit vectorizer on an empty corpus");
    const n = corpus.length;
    const docFreq = new Map<string, number>();
    const termFreq = new Map<string, number>();
    for (const text of corpus) {
      const seen = new Set<string>();
      for (const term of analyze(text)) {
        termFreq.set(term, (termFreq.get(term) ?? 0) + 1);
        seen.add(term);
      }
      for (const term of seen) docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
    }
    if (docFreq.size === 0) throw new EmptyCorpusError("Corpus contains no indexable terms");

    let terms = [...docFreq.keys()];
    // Pruning that would empty the vocabulary (e.g. a single-document corpus) is skipped.
    const maxDocCount = this.maxDf * n;
    const pruned = terms.filter((t) => (docFreq.get(t) ?? 0) <= maxDocCount);
    if (pruned.length > 0) terms = pruned;
    terms.sort(compareTerms);

    if (terms.length > this.maxFeatures) {
      terms = terms
        .map((term, pos) => ({ term, pos, freq: termFreq.get(term) ?? 0 }))
        .sort((a, b) => b.freq - a.freq || a.pos - b.pos)
        .slice(0, this.maxFeatures)
        .map((r) => r.term)
        .sort(compareTerms);
    }

    const idf = terms.map((t) => Math.log((1 + n) / (1 + (docFreq.get(t) ?? 0))) + 1);
    this.setVocabulary(terms, idf);
  }

  public async embed(texts: readonly string[]): Promise<Float64Array[]> {
    if (!this.fitted) throw new NotFittedError();
    return texts.map((text) => this.transform(text));
  }

  public toState(): TfidfState {
    return {
      kind: "tfidf",
      vocabulary: [...this.vocabulary],
      idf: [...this.idf],
      maxFeatures: this.maxFeatures,
      maxDf: this.maxDf,
    };
  }

  private setVocabulary(vocabulary: string[], idf: number[]): void {
    this.vocabulary = [...vocabulary];
    this.idf = [...idf];
    this.columns = new Map(vocabulary.map((term, col) => [term, col]));
    this.fitted = true;
  }

  private transform(text: string): Float64Array {
    const vec = new Float64Array(this.vocabulary.length);
    for (const term of analyze(text)) {
      const col = this.columns.get(term);
      if (col !== undefined) vec[col] += 1;
    }
    let norm = 0;
    for (let i = 0; i < vec.length; i++) {
      vec[i] *= this.idf[i];
      norm += vec[i] * vec[i];
    }
    if (norm > 0) {
      const scale = Math.sqrt(norm);
      for (let i = 0; i < vec.length; i++) vec[i] /= scale;
    }
    return vec;
  }
}

/** Create an unfitted vectorizer. */
export function createVectorizer(opts: TfidfOptions = {}): Vectorizer {
  return new TfidfVectorizer(opts);
}

/** Rebuild a fitted vectorizer from its persisted state. */
export function restoreVectorizer(state: VectorizerState): Vectorizer {
  return TfidfVectorizer.fromState(state);
}

function isNumberArray(v: unknown): v is number[] {
  return Array.isArray(v) && v.every((x) => typeof x === "number" && Number.isFinite(x));
}

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((x) => typeof x === "string");
}

/** Validate an untrusted (parsed JSON) value as vectorizer state; null when malformed. */
export function parseVectorizerState(value: unknown): VectorizerState | null {
  if (!value || typeof value !== "object") return null;
  const s: Record<string, unknown> = { ...value };
  if (s.kind !== "tfidf") return null;
  const { vocabulary, idf, maxFeatures, maxDf } = s;
  if (!isStringArray(vocabulary) || !isNumberArray(idf) || vocabulary.length !== idf.length) return null;
  if (typeof maxFeatures !== "number" || typeof maxDf !== "number") return null;
  return { kind: "tfidf", vocabulary, idf, maxFeatures, maxDf };
}
