import { z } from "zod";
import {
  IndexNotFoundError,
  IndexNotLoadedError,
  OperationFailedError,
  RagError,
  RebuildInProgressError,
  ValidationError,
} from "./errors";
import { buildIndex as defaultBuildIndex, type BuildIndexOptions } from "./indexer";
import { paginate } from "./pagination";
import { loadIndex as defaultLoadIndex } from "./persistence";
import { Retriever } from "./retriever";
import { statusManager } from "./status";
import { PROVIDERS, type SynthesizerMap } from "./synthesizers";
import type { CorpusSource, Index, Pagination, QueryResultItem } from "./types";

export interface QueryLimits {
  maxQueryLength: number;
  maxResultsPerPage: number;
  defaultResultsPerPage: number;
}

export const DEFAULT_LIMITS: QueryLimits = {
  maxQueryLength: 500,
  maxResultsPerPage: 100,
  defaultResultsPerPage: 10,
};

/** Request schema; `q` is trimmed before its length is checked, `provider` is case-insensitive. */
export function queryRequestSchema(limits: QueryLimits = DEFAULT_LIMITS) {
  return z.object({
    q: z
      .string()
      .trim()
      .min(1, "Query cannot be empty")
      .max(limits.maxQueryLength, `Query exceeds maximum length of ${limits.maxQueryLength} characters`),
    per_page: z.number().int().min(1).max(limits.maxResultsPerPage).default(limits.defaultResultsPerPage),
    page: z.number().int().min(1).default(1),
    provider: z
      .string()
      .transform((s) => s.trim().toLowerCase())
      .pipe(z.enum(PROVIDERS, { errorMap: () => ({ message: `Invalid provider. Must be one of: ${PROVIDERS.join(", ")}` }) }))
      .default("simple"),
    index_path: z.string().min(1).optional(),
  });
}

export type QueryRequest = z.infer<ReturnType<typeof queryRequestSchema>>;

export interface QueryResponse {
  query: string;
  results: QueryResultItem[];
  all_results: QueryResultItem[];
  answer: string;
  pagination: Pagination;
}

export interface RebuildResponse {
  status: "success";
  message: string;
  num_documents: number;
  index_path: string;
}

export interface HealthStatus {
  status: "ok";
  index_loaded: boolean;
  rebuilding: boolean;
  num_documents: number;
}

export interface OrchestratorOptions {
  indexPath: string;
  corpus: CorpusSource;
  synthesizers: SynthesizerMap;
  maxFeatures?: number;
  limits?: QueryLimits;
  /** Build when no index file exists at start(). */
  buildOnStart?: boolean;
  verbose?: boolean;
  loadIndex?: (indexPath: string) => Promise<Index>;
  buildIndex?: (corpus: CorpusSource, indexPath: string, opts: BuildIndexOptions) => Promise<Index>;
}

/** Index plus its retriever, swapped together as one reference. */
interface LiveIndex {
  readonly index: Index;
  readonly retriever: Retriever;
}

function toLive(index: Index): LiveIndex {
  return { index, retriever: Retriever.fromIndex(index) };
}

/**
 * Owns the live index and the rebuild guard. Queries read whatever index is
 * live when they start; a rebuild replaces it with a single assignment once
 * the new index is complete, so readers never block and never see a partial
 * index. At most one rebuild runs at a time; a second request is rejected.
 */
export class QueryOrchestrator {
  private live: LiveIndex | null = null;
  private rebuilding = false;
  private readonly schema: ReturnType<typeof queryRequestSchema>;
  private readonly load: (indexPath: string) => Promise<Index>;
  private readonly build: NonNullable<OrchestratorOptions["buildIndex"]>;

  public constructor(private readonly opts: OrchestratorOptions) {
    this.schema = queryRequestSchema(opts.limits ?? DEFAULT_LIMITS);
    this.load = opts.loadIndex ?? defaultLoadIndex;
    this.build = opts.buildIndex ?? defaultBuildIndex;
  }

  public get indexPath(): string {
    return this.opts.indexPath;
  }

  /** Currently live index, or null before the first load/build. */
  public getIndex(): Index | null {
    return this.live?.index ?? null;
  }

  /**
   * Load the persisted index. A missing or unreadable index is logged and the
   * service starts without one (or builds it when buildOnStart is set).
   */
  public async start(): Promise<void> {
    console.error(`[RAG] Loading index from ${this.opts.indexPath}`);
    try {
      this.swap(await this.load(this.opts.indexPath), false);
      return;
    } catch (e) {
      console.error(`[RAG] Failed to load index: ${e instanceof Error ? e.message : String(e)}`);
      if (!(e instanceof IndexNotFoundError) || !this.opts.buildOnStart) {
        console.error(`[RAG] Starting without an index; rebuild to create one.`);
        return;
      }
    }
    try {
      await this.rebuild();
    } catch (e) {
      console.error(`[RAG] Initial build failed; starting without an index:`, e);
    }
  }

  /** Validate an untrusted request body. */
  public parseRequest(raw: unknown): QueryRequest {
    const parsed = this.schema.safeParse(raw ?? {});
    if (!parsed.success) {
      throw new ValidationError(
        parsed.error.issues.map((i) => `${i.path.join(".") || "request"}: ${i.message}`),
      );
    }
    return parsed.data;
  }

  public async query(raw: unknown): Promise<QueryResponse> {
    const req = this.parseRequest(raw);
    console.error(`[RAG] Query: q='${req.q.slice(0, 50)}', provider=${req.provider}, page=${req.page}`);
    try {
      const live = req.index_path ? toLive(await this.load(req.index_path)) : this.requireLive();
      const { docs, vectorizer } = live.index;
      const [queryVector] = await vectorizer.embed([req.q]);

      // Exact-text search scans every document; model providers get a ranked, over-fetched subset.
      const topK = req.provider === "simple" ? docs.length : req.per_page * 3;
      const { indices, scores } = live.retriever.query(queryVector, topK);
      const allResults: QueryResultItem[] = indices.map((i, rank) => ({
        doc_id: docs[i].id,
        score: scores[rank],
        text: docs[i].text,
      }));

      const answer = await this.opts.synthesizers[req.provider].synthesize({
        query: req.q,
        contexts: allResults.map((r) => r.text),
        docIds: allResults.map((r) => r.doc_id),
        topK: req.per_page,
      });

      const { pagination, start, end } = paginate(allResults.length, req.per_page, req.page);
      return {
        query: req.q,
        results: allResults.slice(start, end),
        all_results: allResults,
        answer,
        pagination,
      };
    } catch (e) {
      if (e instanceof RagError) throw e;
      throw new OperationFailedError("query index", e);
    }
  }

  /**
   * Rebuild from the corpus and swap the result in.
   *
   * @throws {RebuildInProgressError} if a rebuild is already running.
   */
  public async rebuild(): Promise<RebuildResponse> {
    if (this.rebuilding) {
      console.error(`[RAG] Rebuild request rejected: already in progress`);
      throw new RebuildInProgressError();
    }
    this.rebuilding = true;
    try {
      console.error(`[RAG] Starting index rebuild`);
      const index = await this.build(this.opts.corpus, this.opts.indexPath, {
        maxFeatures: this.opts.maxFeatures,
        verbose: this.opts.verbose,
      });
      this.swap(index, true);
      const n = index.docs.length;
      console.error(`[RAG] Index rebuilt successfully: ${n} documents`);
      return {
        status: "success",
        message: `Index rebuilt successfully with ${n} documents`,
        num_documents: n,
        index_path: this.opts.indexPath,
      };
    } catch (e) {
      console.error(`[RAG] Failed to rebuild index:`, e);
      if (e instanceof RagError) throw e;
      throw new OperationFailedError("rebuild index", e);
    } finally {
      this.rebuilding = false;
    }
  }

  public health(): HealthStatus {
    return {
      status: "ok",
      index_loaded: this.live !== null,
      rebuilding: this.rebuilding,
      num_documents: this.live?.index.docs.length ?? 0,
    };
  }

  private requireLive(): LiveIndex {
    if (!this.live) throw new IndexNotLoadedError();
    return this.live;
  }

  private swap(index: Index, built: boolean): void {
    this.live = toLive(index);
    statusManager.setModelName(index.modelName);
    statusManager.recordIndex(index.docs.length, built);
  }
}
