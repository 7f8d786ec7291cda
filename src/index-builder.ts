import fs from "node:fs/promises";
import type { EmbeddingBackend } from "./backend";
import { Chunker } from "./chunker";
import { fileKey } from "./content-types";
import { discover } from "./discoverer";
import { ParseError, PatternIndexError, describeError, type PatternErrorCode } from "./errors";
import { extractDocuments } from "./extractors";
import { IndexStore } from "./index-store";
import { HashManifest, contentHash } from "./manifest";
import { statusManager, type BuildState, type StatusManager } from "./status";
import {
  CONTENT_TYPES,
  isContentType,
  type CandidateFile,
  type ContentDoc,
  type ContentType,
  type IndexRecord,
} from "./types";
import { parallelMap } from "./worker-pool";

export type BuildMode = "full" | "incremental";

export interface BuildOptions {
  root: string;
  indexDir: string;
  backend: EmbeddingBackend;
  /** Default `incremental`. */
  mode?: BuildMode;
  /** Restrict the walk (and pruning) to these types. */
  types?: readonly ContentType[];
  /** Worker count for extraction and embedding (default 4). */
  concurrency?: number;
  followSymlinks?: boolean;
  /** Keep deprecated items and walk deprecated packs. */
  includeDeprecated?: boolean;
  /** Cap on files walked per type; 0 or omitted means no cap. */
  maxItems?: number;
  chunkSize?: number;
  chunkOverlap?: number;
  embedTimeoutMs?: number;
  /** Cooperative cancellation, checked between files. */
  signal?: AbortSignal;
  verbose?: boolean;
  status?: StatusManager;
}

/** Counts per content type. File counts except `extracted` / `embedded`, which count documents. */
export interface TypeCounts {
  discovered: number;
  extracted: number;
  embedded: number;
  skipped: number;
  failed: number;
  unchanged: number;
}

export interface BuildFailure {
  contentType: ContentType;
  relativePath: string;
  identityKey?: string;
  code: PatternErrorCode | "UNKNOWN";
  message: string;
}

export interface BuildReport {
  mode: BuildMode;
  root: string;
  indexDir: string;
  perType: Record<ContentType, TypeCounts>;
  totals: TypeCounts;
  failures: BuildFailure[];
  warnings: string[];
  /** Record identity keys removed because their file is no longer discoverable. */
  pruned: number;
  cancelled: boolean;
  /** Store generation after the commit. */
  generation: number;
  durationMs: number;
}

interface WorkItem {
  candidate: CandidateFile;
  key: string;
}

interface Embedded extends WorkItem {
  hash: string;
  records: IndexRecord[];
}

type FileOutcome =
  | { ok: true; hash: string; documents: number; records: IndexRecord[] }
  | { ok: false; documents: number; error: unknown; identityKey?: string };

const COUNT_KEYS = [
  "discovered",
  "extracted",
  "embedded",
  "skipped",
  "failed",
  "unchanged",
] as const satisfies readonly (keyof TypeCounts)[];

function emptyCounts(): TypeCounts {
  return { discovered: 0, extracted: 0, embedded: 0, skipped: 0, failed: 0, unchanged: 0 };
}

function emptyPerType(): Record<ContentType, TypeCounts> {
  return {
    playbook: emptyCounts(),
    script: emptyCounts(),
    integration: emptyCounts(),
    classifier: emptyCounts(),
    mapper: emptyCounts(),
    parsing_rule: emptyCounts(),
    modeling_rule: emptyCounts(),
  };
}

function failureCode(e: unknown): BuildFailure["code"] {
  return e instanceof PatternIndexError ? e.code : "UNKNOWN";
}

function unreadable(e: unknown): ParseError {
  return new ParseError(`Unreadable file: ${describeError(e)}`, { cause: e });
}

/** Content type of a `<type>:<relativePath>` file key. */
function keyType(key: string): ContentType | undefined {
  const type = key.slice(0, key.indexOf(":"));
  return isContentType(type) ? type : undefined;
}

/**
 * Orchestrates discover, extract, embed and commit for one build.
 *
 * Walking    discover candidates; incremental builds hash each file to decide what to redo
 * Extracting worker pool over queued files, each read, extracted and embedded in turn
 * Embedding  entered once the first file reaches its embedding step
 * Committing one store batch (upserts, stale and pruned deletes), then the manifest
 *
 * A full build restricted to some types replaces only those types; records
 * and manifest entries of the other types stay as they are.
 *
 * Per-file failures land in the report; only a store failure moves the
 * builder to `failed` and rejects.
 */
export class IndexBuilder {
  private state: BuildState = "idle";
  private readonly status: StatusManager;
  private readonly verbose: boolean;

  public constructor(private readonly opts: BuildOptions) {
    this.status = opts.status ?? statusManager;
    this.verbose = !!opts.verbose;
  }

  public get currentState(): BuildState {
    return this.state;
  }

  /**
   * @throws {StoreUnavailableError} When the store cannot be opened or committed.
   */
  public async build(): Promise<BuildReport> {
    const started = Date.now();
    let mode: BuildMode = this.opts.mode ?? "incremental";
    this.status.beginBuild(mode);
    this.setState("walking");

    const report: BuildReport = {
      mode,
      root: this.opts.root,
      indexDir: this.opts.indexDir,
      perType: emptyPerType(),
      totals: emptyCounts(),
      failures: [],
      warnings: [],
      pruned: 0,
      cancelled: false,
      generation: 0,
      durationMs: 0,
    };

    const scope = new Set<ContentType>(this.opts.types?.length ? this.opts.types : CONTENT_TYPES);
    let clearAll = mode === "full" && scope.size === CONTENT_TYPES.length;

    let store: IndexStore | undefined;
    try {
      store = await IndexStore.open(this.opts.indexDir, {
        backendId: this.opts.backend.id,
        reset: clearAll,
        verbose: this.verbose,
      });
      if (!store.compatible) {
        // Vectors of two backends never share a store, so every type is rebuilt.
        console.error(
          mode === "incremental"
            ? `[index] Index was built with ${store.storedBackendId}; switching to a full build for ${this.opts.backend.id}`
            : `[index] Index was built with ${store.storedBackendId}; clearing every type for ${this.opts.backend.id}`,
        );
        await store.close();
        clearAll = true;
        mode = "full";
        report.mode = mode;
        this.status.setBuildMode(mode);
        store = await IndexStore.open(this.opts.indexDir, {
          backendId: this.opts.backend.id,
          reset: true,
          verbose: this.verbose,
        });
      }
      const manifest = clearAll
        ? HashManifest.empty(this.opts.indexDir)
        : await HashManifest.load(this.opts.indexDir);
      if (mode === "full" && !clearAll) {
        for (const key of manifest.keys()) {
          const type = keyType(key);
          if (type && scope.has(type)) manifest.delete(key);
        }
      }

      const { queue, discoveredKeys } = await this.walk(store, manifest, mode, report);
      console.error(
        `[index] ${mode} build of ${this.opts.root}: ${discoveredKeys.size} files, ${queue.length} to (re)index`,
      );

      this.setState("extracting");
      const embedded = await this.processAll(queue, manifest, report);

      report.cancelled = !!this.opts.signal?.aborted;
      if (report.cancelled) console.error("[index] Build cancelled; committing completed files");

      this.setState("committing");
      await this.commit(store, manifest, { mode, clearAll, scope }, embedded, discoveredKeys, report);
      report.generation = store.generation;

      for (const t of CONTENT_TYPES) {
        for (const k of COUNT_KEYS) {
          report.totals[k] += report.perType[t][k];
        }
      }
      report.durationMs = Date.now() - started;
      this.setState("idle");
      this.status.endBuild();
      console.error(
        `[index] Build finished in ${report.durationMs}ms: ${report.totals.embedded} documents embedded, ${report.totals.unchanged} files unchanged, ${report.totals.failed} failed, ${report.pruned} pruned`,
      );
      return report;
    } catch (e) {
      this.state = "failed";
      this.status.failBuild(describeError(e));
      console.error(`[index] Build failed: ${describeError(e)}`);
      throw e;
    } finally {
      await store?.close();
    }
  }

  private setState(state: BuildState): void {
    this.state = state;
    this.status.setBuildState(state);
    if (this.verbose) console.error(`[index][verbose] State: ${state}`);
  }

  private async walk(
    store: IndexStore,
    manifest: HashManifest,
    mode: BuildMode,
    report: BuildReport,
  ): Promise<{ queue: WorkItem[]; discoveredKeys: Set<string> }> {
    const queue: WorkItem[] = [];
    const discoveredKeys = new Set<string>();
    const candidates = discover(this.opts.root, {
      types: this.opts.types,
      followSymlinks: this.opts.followSymlinks,
      includeDeprecatedPacks: this.opts.includeDeprecated,
      maxPerType: this.opts.maxItems,
      onWarning: (message) => {
        report.warnings.push(message);
        console.error(`[index] ${message}`);
      },
    });

    for await (const candidate of candidates) {
      const counts = report.perType[candidate.contentType];
      const key = fileKey(candidate.contentType, candidate.relativePath);
      counts.discovered++;
      discoveredKeys.add(key);

      const previous = mode === "incremental" ? manifest.get(key) : undefined;
      if (previous && previous.identityKeys.every((k) => store.has(k))) {
        // An unreadable file is queued; its worker records the failure.
        const hash = await fs.readFile(candidate.absolutePath).then(contentHash, () => null);
        if (previous.hash === hash) {
          counts.unchanged++;
          continue;
        }
      }
      queue.push({ candidate, key });
    }

    this.status.setBuildTotals(discoveredKeys.size, queue.length);
    return { queue, discoveredKeys };
  }

  /**
   * Each worker reads one file, hashes what it read, extracts and embeds it;
   * only the resulting records are held until the commit.
   */
  private async processAll(
    queue: readonly WorkItem[],
    manifest: HashManifest,
    report: BuildReport,
  ): Promise<Embedded[]> {
    const chunker = new Chunker(this.opts.backend, {
      chunkSize: this.opts.chunkSize,
      chunkOverlap: this.opts.chunkOverlap,
      timeoutMs: this.opts.embedTimeoutMs,
    });
    let done = 0;
    const results = await parallelMap(
      queue,
      async (item) => {
        const outcome = await this.processFile(item, chunker);
        if (outcome.ok) {
          this.status.incProcessed();
          this.status.incEmbedded(outcome.documents);
          done++;
          if (this.verbose && done % 50 === 0) {
            console.error(`[index][verbose] Embedded ${done}/${queue.length} files`);
          }
        }
        return outcome;
      },
      this.opts.concurrency ?? 4,
      this.opts.signal,
    );

    const out: Embedded[] = [];
    results.forEach((result, i) => {
      const item = queue[i];
      const counts = report.perType[item.candidate.contentType];
      if (result.status === "cancelled") return;
      if (result.status === "rejected") {
        this.recordFailure(item, manifest, report, result.error);
        return;
      }
      const outcome = result.value;
      counts.extracted += outcome.documents;
      if (!outcome.ok) {
        this.recordFailure(item, manifest, report, outcome.error, outcome.identityKey);
        return;
      }
      // A file yielding no documents still commits so its stale records go away.
      if (outcome.documents === 0) counts.skipped++;
      counts.embedded += outcome.documents;
      out.push({ ...item, hash: outcome.hash, records: outcome.records });
    });
    return out;
  }

  private async processFile(item: WorkItem, chunker: Chunker): Promise<FileOutcome> {
    let data: Buffer;
    try {
      data = await fs.readFile(item.candidate.absolutePath);
    } catch (e) {
      return { ok: false, documents: 0, error: unreadable(e) };
    }
    const hash = contentHash(data);

    let docs: ContentDoc[];
    try {
      docs = extractDocuments(item.candidate, data.toString("utf8"), {
        includeDeprecated: this.opts.includeDeprecated,
      });
    } catch (error) {
      return { ok: false, documents: 0, error };
    }

    const records: IndexRecord[] = [];
    for (const doc of docs) {
      if (this.state === "extracting") this.setState("embedding");
      try {
        records.push(...(await chunker.embed(doc)));
      } catch (error) {
        return { ok: false, documents: docs.length, error, identityKey: doc.identityKey };
      }
    }
    return { ok: true, hash, documents: docs.length, records };
  }

  /**
   * A failed file keeps whatever records it already had; dropping its
   * manifest entry makes the next incremental build retry it.
   */
  private recordFailure(
    item: WorkItem,
    manifest: HashManifest,
    report: BuildReport,
    error: unknown,
    identityKey?: string,
  ): void {
    report.perType[item.candidate.contentType].failed++;
    manifest.delete(item.key);
    this.status.incProcessed();
    const failure: BuildFailure = {
      contentType: item.candidate.contentType,
      relativePath: item.candidate.relativePath,
      code: failureCode(error),
      message: describeError(error),
    };
    report.failures.push(identityKey ? { ...failure, identityKey } : failure);
    console.error(`[index] Failed ${item.candidate.relativePath}: ${failure.message}`);
  }

  private async commit(
    store: IndexStore,
    manifest: HashManifest,
    plan: { mode: BuildMode; clearAll: boolean; scope: ReadonlySet<ContentType> },
    embedded: readonly Embedded[],
    discoveredKeys: ReadonlySet<string>,
    report: BuildReport,
  ): Promise<void> {
    const { mode, scope } = plan;
    const batch = store.beginBatch();
    if (plan.clearAll) {
      batch.clear();
    } else if (mode === "full") {
      batch.delete(store.all().flatMap((r) => (scope.has(r.contentType) ? [r.identityKey] : [])));
    }

    const storedByFile = new Map<string, string[]>();
    for (const record of store.all()) {
      const key = fileKey(record.contentType, record.metadata.relativePath);
      const keys = storedByFile.get(key);
      if (keys) keys.push(record.identityKey);
      else storedByFile.set(key, [record.identityKey]);
    }

    for (const item of embedded) {
      const keys = item.records.map((r) => r.identityKey);
      const keep = new Set(keys);
      const stale = (storedByFile.get(item.key) ?? []).filter((k) => !keep.has(k));
      batch.delete(stale).upsert(item.records);
      manifest.set(item.key, { hash: item.hash, identityKeys: keys });
    }

    // Pruning needs a complete walk; a cancelled build leaves it for the next run.
    if (mode === "incremental" && !report.cancelled) {
      const gone: string[] = [];
      for (const record of store.all()) {
        if (!scope.has(record.contentType)) continue;
        if (!discoveredKeys.has(fileKey(record.contentType, record.metadata.relativePath))) {
          gone.push(record.identityKey);
        }
      }
      for (const key of manifest.keys()) {
        const type = keyType(key);
        if (type && scope.has(type) && !discoveredKeys.has(key)) {
          manifest.delete(key);
        }
      }
      batch.delete(gone);
      report.pruned = gone.length;
      if (gone.length) console.error(`[index] Pruning ${gone.length} records of removed files`);
    }

    await batch.commit();
    try {
      await manifest.save();
    } catch (e) {
      const message = `Failed to save hash manifest: ${describeError(e)}`;
      report.warnings.push(message);
      console.error(`[index] ${message}`);
    }
  }
}

/** Convenience wrapper: one build with the given options. */
export function buildIndex(opts: BuildOptions): Promise<BuildReport> {
  return new IndexBuilder(opts).build();
}
