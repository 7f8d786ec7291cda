import { APP_VERSION } from "./config";

export type BuildState = "idle" | "walking" | "extracting" | "embedding" | "committing" | "failed";

/**
 * Progress counters for the build in flight (or the last one).
 * Reset at the start of every build.
 */
export interface BuildProgress {
  /** Build mode of the current / last build, null before the first one. */
  mode: "full" | "incremental" | null;
  /** Candidate files the walk produced. */
  filesDiscovered: number;
  /** Files whose hash changed (or every file on a full build). */
  filesQueued: number;
  /** Queued files that reached a terminal outcome (embedded, skipped or failed). */
  filesProcessed: number;
  /** Documents embedded so far. */
  documentsEmbedded: number;
}

/**
 * Mutable in-memory snapshot of server lifecycle and build progress.
 * Exposed read-only to callers via `statusManager.getStatus()`.
 *
 * ready = true once the index store has been opened successfully (or a build
 * has committed). A later build, failed or not, leaves the previous
 * generation servable, so `ready` never flips back to false.
 */
export interface ServerStatus {
  /** Package / server version (kept in sync with package.json). */
  version: string;
  /** Content library root the builder walks (empty when unset). */
  contentRoot: string;
  /** Persistent index directory. */
  indexDir: string;
  /** Embedding backend id (e.g. `transformers:Xenova/all-MiniLM-L6-v2`). */
  backendId: string;
  /** Active transport in use: 'stdio' | 'http' | 'cli' | 'unknown'. */
  transport: string;
  ready: boolean;
  /** ISO timestamp when the process (or StatusManager) started. */
  startedAt: string;
  build: {
    state: BuildState;
    progress: BuildProgress;
    startedAt: string | null;
    finishedAt: string | null;
    /** Message of the error that moved the builder to `failed`. */
    lastError: string | null;
  };
}

function emptyProgress(): BuildProgress {
  return {
    mode: null,
    filesDiscovered: 0,
    filesQueued: 0,
    filesProcessed: 0,
    documentsEmbedded: 0,
  };
}

/**
 * Class wrapper around mutable status state; the builder and transports
 * update it through named transitions instead of ad-hoc mutation.
 */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<Omit<ServerStatus, "build">>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      contentRoot: initial?.contentRoot ?? "",
      indexDir: initial?.indexDir ?? "",
      backendId: initial?.backendId ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      build: {
        state: "idle",
        progress: emptyProgress(),
        startedAt: null,
        finishedAt: null,
        lastError: null,
      },
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setLocations(contentRoot: string, indexDir: string) {
    this.data.contentRoot = contentRoot;
    this.data.indexDir = indexDir;
  }

  public setBackendId(id: string) {
    this.data.backendId = id;
  }

  public markReady() {
    this.data.ready = true;
  }

  public beginBuild(mode: "full" | "incremental") {
    this.data.build = {
      state: "walking",
      progress: { ...emptyProgress(), mode },
      startedAt: new Date().toISOString(),
      finishedAt: null,
      lastError: null,
    };
  }

  /** Mode can change mid-walk when an incompatible store forces a full build. */
  public setBuildMode(mode: "full" | "incremental") {
    this.data.build.progress.mode = mode;
  }

  public setBuildState(state: BuildState) {
    this.data.build.state = state;
  }

  public setBuildTotals(discovered: number, queued: number) {
    this.data.build.progress.filesDiscovered = discovered;
    this.data.build.progress.filesQueued = queued;
  }

  public incProcessed(count = 1) {
    this.data.build.progress.filesProcessed += count;
  }

  public incEmbedded(count = 1) {
    this.data.build.progress.documentsEmbedded += count;
  }

  public endBuild() {
    this.data.build.state = "idle";
    this.data.build.finishedAt = new Date().toISOString();
    this.data.ready = true;
  }

  public failBuild(message: string) {
    this.data.build.state = "failed";
    this.data.build.finishedAt = new Date().toISOString();
    this.data.build.lastError = message;
  }

  /** Live reference to current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }

  public toJSON() {
    return this.data;
  }
}

// Singleton instance used across modules (builder, transports, health checks).
export const statusManager = new StatusManager();
