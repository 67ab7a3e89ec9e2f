import { APP_VERSION } from "./config";

/** Counters from the most recent index build or load. */
export interface IndexingStatus {
  /** Files matched by the corpus walk (before empty/duplicate filtering). */
  filesDiscovered: number;
  /** Documents present in the live index. */
  documentsIndexed: number;
  /** ISO timestamp of the last successful build, null if only loaded or never built. */
  lastBuiltAt: string | null;
}

/**
 * Process-level status snapshot exposed by /health and the index_status tool.
 * Index liveness itself is owned by the orchestrator; this holds the
 * surrounding server facts.
 */
export interface ServerStatus {
  version: string;
  dataDir: string;
  indexPath: string;
  modelName: string;
  /** 'stdio' | 'http' | 'unknown'. */
  transport: string;
  startedAt: string;
  indexing: IndexingStatus;
}

export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      dataDir: initial?.dataDir ?? "",
      indexPath: initial?.indexPath ?? "",
      modelName: initial?.modelName ?? "",
      transport: initial?.transport ?? "unknown",
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      indexing: initial?.indexing ?? {
        filesDiscovered: 0,
        documentsIndexed: 0,
        lastBuiltAt: null,
      },
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setPaths(dataDir: string, indexPath: string) {
    this.data.dataDir = dataDir;
    this.data.indexPath = indexPath;
  }

  public setModelName(name: string) {
    this.data.modelName = name;
  }

  public setFilesDiscovered(files: number) {
    this.data.indexing.filesDiscovered = files;
  }

  /** Record the document count of a newly live index; `built` stamps lastBuiltAt. */
  public recordIndex(documents: number, built: boolean) {
    this.data.indexing.documentsIndexed = documents;
    if (built) this.data.indexing.lastBuiltAt = new Date().toISOString();
  }

  /** Copy of the current status (safe to serialize or hand out). */
  public getStatus(): ServerStatus {
    return { ...this.data, indexing: { ...this.data.indexing } };
  }
}

// Singleton instance used across modules (corpus walk, orchestrator, transports).
export const statusManager = new StatusManager();
