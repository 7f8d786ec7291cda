import fs from "node:fs/promises";
import path from "node:path";
import lockfile from "proper-lockfile";
import { EmbeddingError, StoreUnavailableError, describeError } from "./errors";
import { fileStamp, isNotFound, writeFileAtomic } from "./fs-utils";
import { isJsonObject } from "./json";
import {
  isContentType,
  type ContentType,
  type IndexRecord,
  type IndexStats,
  type RecordMetadata,
  type ScoredRecord,
} from "./types";

const STORE_FILE = "store.json";
const STORE_VERSION = 1;

export interface StoreFilter {
  contentTypes?: readonly ContentType[];
  pack?: string;
}

export interface OpenStoreOptions {
  /** Backend the caller embeds with; a populated store built by another backend is incompatible. */
  backendId: string;
  /** Start from an empty record set (full rebuild). Disk is untouched until the first commit. */
  reset?: boolean;
  verbose?: boolean;
}

interface StoreMeta {
  backendId: string | null;
  dimension: number | null;
  generation: number;
  savedAt: string | null;
}

interface StoreSnapshot {
  meta: StoreMeta;
  records: Map<string, IndexRecord>;
  skipped: number;
}

/**
 * Cosine similarity between two vectors of equal length, in [-1, 1].
 */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  let dot = 0,
    na = 0,
    nb = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i],
      y = b[i];
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  return dot / (Math.sqrt(na) * Math.sqrt(nb) + 1e-10);
}

function emptyPerType(): IndexStats["perType"] {
  return {
    playbook: { records: 0, documents: 0 },
    script: { records: 0, documents: 0 },
    integration: { records: 0, documents: 0 },
    classifier: { records: 0, documents: 0 },
    mapper: { records: 0, documents: 0 },
    parsing_rule: { records: 0, documents: 0 },
    modeling_rule: { records: 0, documents: 0 },
  };
}

function encodeVector(v: Float32Array): string {
  return Buffer.from(v.buffer, v.byteOffset, v.byteLength).toString("base64");
}

function decodeVector(s: string): Float32Array | null {
  const buf = Buffer.from(s, "base64");
  if (buf.byteLength === 0 || buf.byteLength % 4 !== 0) return null;
  // Copy out so the vector owns an aligned buffer.
  const copy = new Uint8Array(buf);
  return new Float32Array(copy.buffer, 0, copy.byteLength / 4);
}

function isStringRecord(v: unknown): v is Record<string, string> {
  return (
    typeof v === "object" &&
    v !== null &&
    !Array.isArray(v) &&
    Object.values(v).every((x) => typeof x === "string")
  );
}

function readMetadata(m: unknown): RecordMetadata | null {
  if (!isJsonObject(m)) return null;
  const { displayName, description, packName, relativePath, chunkIndex, chunkCount, fields } = m;
  if (
    typeof displayName !== "string" ||
    typeof description !== "string" ||
    typeof packName !== "string" ||
    typeof relativePath !== "string" ||
    typeof chunkIndex !== "number" ||
    typeof chunkCount !== "number" ||
    !isStringRecord(fields)
  )
    return null;
  return { displayName, description, packName, relativePath, chunkIndex, chunkCount, fields };
}

function readRecord(d: unknown): IndexRecord | null {
  if (!isJsonObject(d)) return null;
  const { identityKey, parentIdentityKey, contentType, vector, textExcerpt, metadata } = d;
  if (
    typeof identityKey !== "string" ||
    typeof parentIdentityKey !== "string" ||
    typeof contentType !== "string" ||
    !isContentType(contentType) ||
    typeof vector !== "string" ||
    typeof textExcerpt !== "string"
  )
    return null;
  const decoded = decodeVector(vector);
  const meta = readMetadata(metadata);
  if (!decoded || !meta) return null;
  return { identityKey, parentIdentityKey, contentType, vector: decoded, textExcerpt, metadata: meta };
}

/**
 * Staged set of changes applied to the store in one atomic commit. Readers
 * keep seeing the previous generation until {@link commit} resolves.
 */
export class StoreBatch {
  private readonly upserts = new Map<string, IndexRecord>();
  private readonly deletes = new Set<string>();
  private cleared = false;

  public constructor(private readonly store: IndexStore) {}

  /** Drop every existing record when committed. */
  public clear(): this {
    this.cleared = true;
    this.upserts.clear();
    this.deletes.clear();
    return this;
  }

  public upsert(records: Iterable<IndexRecord>): this {
    for (const r of records) {
      this.deletes.delete(r.identityKey);
      this.upserts.set(r.identityKey, r);
    }
    return this;
  }

  public delete(identityKeys: Iterable<string>): this {
    for (const key of identityKeys) {
      this.upserts.delete(key);
      this.deletes.add(key);
    }
    return this;
  }

  public get isCleared(): boolean {
    return this.cleared;
  }

  public get pendingUpserts(): ReadonlyMap<string, IndexRecord> {
    return this.upserts;
  }

  public get pendingDeletes(): ReadonlySet<string> {
    return this.deletes;
  }

  public get size(): number {
    return this.upserts.size + this.deletes.size;
  }

  public commit(): Promise<void> {
    return this.store.applyBatch(this);
  }
}

/**
 * Persistent collection of embedded records kept in `<indexDir>/store.json`.
 *
 * The in-memory record map is replaced wholesale on every commit (never
 * mutated in place) so concurrent readers always observe a complete
 * generation. Commits are serialized in-process through a promise chain and
 * across processes with a lock on the index directory; the file itself is
 * replaced by rename.
 */
export class IndexStore {
  private records: ReadonlyMap<string, IndexRecord> = new Map();
  private meta: StoreMeta = { backendId: null, dimension: null, generation: 0, savedAt: null };
  private stamp: string | null = null;
  private writeChain: Promise<void> = Promise.resolve();
  private closed = false;

  private constructor(
    public readonly indexDir: string,
    private readonly backendId: string,
    private readonly verbose: boolean,
  ) {}

  private get storePath(): string {
    return path.join(this.indexDir, STORE_FILE);
  }

  /**
   * Open (creating if needed) the store at `indexDir`.
   *
   * @throws {StoreUnavailableError} When the directory cannot be created or the store file is unreadable.
   */
  public static async open(indexDir: string, opts: OpenStoreOptions): Promise<IndexStore> {
    const store = new IndexStore(path.resolve(indexDir), opts.backendId, !!opts.verbose);
    try {
      await fs.mkdir(store.indexDir, { recursive: true });
    } catch (e) {
      throw new StoreUnavailableError(`Cannot create index directory ${indexDir}: ${describeError(e)}`, {
        cause: e,
      });
    }
    if (opts.reset) {
      store.meta = { ...store.meta, backendId: opts.backendId };
      store.stamp = await fileStamp(store.storePath);
      // Keep the generation moving forward so other readers notice the rebuild.
      const existing = await store.readFromDisk().catch(() => null);
      if (existing) store.meta.generation = existing.meta.generation;
    } else {
      await store.load();
    }
    return store;
  }

  /** True when the store is empty or was built by the caller's backend. */
  public get compatible(): boolean {
    return this.records.size === 0 || this.meta.backendId === this.backendId;
  }

  public get storedBackendId(): string | null {
    return this.meta.backendId;
  }

  public get dimension(): number | null {
    return this.meta.dimension;
  }

  public get generation(): number {
    return this.meta.generation;
  }

  public get size(): number {
    return this.records.size;
  }

  public has(identityKey: string): boolean {
    return this.records.has(identityKey);
  }

  public get(identityKey: string): IndexRecord | undefined {
    return this.records.get(identityKey);
  }

  /** Snapshot of the current generation's records. */
  public all(): IndexRecord[] {
    return Array.from(this.records.values());
  }

  public beginBatch(): StoreBatch {
    this.assertOpen();
    return new StoreBatch(this);
  }

  /** Insert or replace records by identity key, committed immediately. */
  public upsert(records: Iterable<IndexRecord>): Promise<void> {
    return this.beginBatch().upsert(records).commit();
  }

  public delete(identityKeys: Iterable<string>): Promise<void> {
    return this.beginBatch().delete(identityKeys).commit();
  }

  /**
   * Exact nearest-neighbour scan restricted to records matching `filter`.
   * Scores are cosine similarity in [-1, 1]; ties order by identity key.
   */
  public query(vector: Float32Array, filter: StoreFilter, topK: number): ScoredRecord[] {
    this.assertOpen();
    if (this.meta.dimension !== null && vector.length !== this.meta.dimension) {
      throw new EmbeddingError(
        `Query vector has ${vector.length} dimensions, index has ${this.meta.dimension}`,
      );
    }
    const types = filter.contentTypes?.length ? new Set(filter.contentTypes) : null;
    const scored: ScoredRecord[] = [];
    for (const record of this.records.values()) {
      if (types && !types.has(record.contentType)) continue;
      if (filter.pack !== undefined && record.metadata.packName !== filter.pack) continue;
      scored.push({ record, score: cosineSimilarity(record.vector, vector) });
    }
    scored.sort(
      (a, b) =>
        b.score - a.score ||
        (a.record.identityKey < b.record.identityKey ? -1 : a.record.identityKey > b.record.identityKey ? 1 : 0),
    );
    return scored.slice(0, Math.max(0, topK));
  }

  public stats(): IndexStats {
    this.assertOpen();
    const perType = emptyPerType();
    const parents = new Map<ContentType, Set<string>>();
    for (const r of this.records.values()) {
      perType[r.contentType].records++;
      let set = parents.get(r.contentType);
      if (!set) {
        set = new Set();
        parents.set(r.contentType, set);
      }
      set.add(r.parentIdentityKey);
    }
    let totalDocuments = 0;
    for (const [type, set] of parents) {
      perType[type].documents = set.size;
      totalDocuments += set.size;
    }
    return {
      indexDir: this.indexDir,
      backendId: this.meta.backendId,
      dimension: this.meta.dimension,
      totalRecords: this.records.size,
      totalDocuments,
      perType,
      updatedAt: this.meta.savedAt,
    };
  }

  /**
   * Reload when another process has committed since this handle last read or
   * wrote the store file.
   *
   * @returns Whether a newer generation was loaded.
   */
  public async refresh(): Promise<boolean> {
    this.assertOpen();
    const current = await fileStamp(this.storePath);
    if (current === null || current === this.stamp) return false;
    await this.load();
    return true;
  }

  /** Wait for pending commits and release the handle. */
  public async close(): Promise<void> {
    if (this.closed) return;
    await this.writeChain.catch(() => undefined);
    this.closed = true;
    this.records = new Map();
  }

  /** @internal Applied through {@link StoreBatch.commit}. */
  public applyBatch(batch: StoreBatch): Promise<void> {
    this.assertOpen();
    const run = this.writeChain.then(() => this.commitBatch(batch));
    this.writeChain = run.catch(() => undefined);
    return run;
  }

  private async commitBatch(batch: StoreBatch): Promise<void> {
    if (batch.size === 0 && !batch.isCleared) return;
    const release = await this.acquireLock();
    try {
      // Another process may have committed since we loaded; build on its generation.
      let generation = this.meta.generation;
      if (batch.isCleared) {
        const onDisk = await this.readFromDisk().catch(() => null);
        if (onDisk) generation = Math.max(generation, onDisk.meta.generation);
      } else {
        const stamp = await fileStamp(this.storePath);
        const onDisk = await this.readFromDisk();
        if (onDisk && (onDisk.meta.generation !== this.meta.generation || stamp !== this.stamp)) {
          this.adopt(onDisk, stamp);
        }
        generation = this.meta.generation;
        if (!this.compatible) {
          throw new StoreUnavailableError(
            `Index was built with backend ${this.meta.backendId}; run a full build to switch to ${this.backendId}`,
          );
        }
      }

      const next = batch.isCleared ? new Map<string, IndexRecord>() : new Map(this.records);
      for (const key of batch.pendingDeletes) next.delete(key);

      let dimension = batch.isCleared || next.size === 0 ? null : this.meta.dimension;
      for (const record of batch.pendingUpserts.values()) {
        if (dimension === null) dimension = record.vector.length;
        if (record.vector.length !== dimension) {
          throw new EmbeddingError(
            `Record ${record.identityKey} has ${record.vector.length} dimensions, index has ${dimension}`,
          );
        }
        next.set(record.identityKey, record);
      }

      const meta: StoreMeta = {
        backendId: next.size > 0 || batch.isCleared ? this.backendId : this.meta.backendId,
        dimension: next.size > 0 ? dimension : null,
        generation: generation + 1,
        savedAt: new Date().toISOString(),
      };
      try {
        await writeFileAtomic(this.storePath, this.serialize(next, meta));
      } catch (e) {
        throw new StoreUnavailableError(`Failed to persist index store: ${describeError(e)}`, {
          cause: e,
        });
      }
      this.records = next;
      this.meta = meta;
      this.stamp = await fileStamp(this.storePath);
      if (this.verbose) {
        console.error(
          `[store] Committed generation ${meta.generation}: ${next.size} records (${batch.pendingUpserts.size} upserted, ${batch.pendingDeletes.size} deleted)`,
        );
      }
    } finally {
      await release().catch((e: unknown) =>
        console.error(`[store] Failed to release index lock: ${describeError(e)}`),
      );
    }
  }

  private async acquireLock(): Promise<() => Promise<void>> {
    try {
      return await lockfile.lock(this.indexDir, {
        lockfilePath: path.join(this.indexDir, ".lock"),
        stale: 30_000,
        retries: { retries: 20, factor: 1.5, minTimeout: 25, maxTimeout: 1000 },
      });
    } catch (e) {
      throw new StoreUnavailableError(`Index store is locked: ${describeError(e)}`, { cause: e });
    }
  }

  private serialize(records: ReadonlyMap<string, IndexRecord>, meta: StoreMeta): string {
    return JSON.stringify({
      version: STORE_VERSION,
      meta: { ...meta, embEncoding: "f32-base64" },
      records: Array.from(records.values(), (r) => ({
        identityKey: r.identityKey,
        parentIdentityKey: r.parentIdentityKey,
        contentType: r.contentType,
        vector: encodeVector(r.vector),
        textExcerpt: r.textExcerpt,
        metadata: r.metadata,
      })),
    });
  }

  private async readFromDisk(): Promise<StoreSnapshot | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.storePath, "utf8");
    } catch (e) {
      if (isNotFound(e)) return null;
      throw new StoreUnavailableError(`Cannot read index store: ${describeError(e)}`, { cause: e });
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new StoreUnavailableError(`Index store is corrupt: ${describeError(e)}`, { cause: e });
    }
    if (!isJsonObject(parsed)) {
      throw new StoreUnavailableError("Index store is corrupt: expected an object");
    }
    const { version, meta: m, records } = parsed;
    if (version !== STORE_VERSION || !Array.isArray(records) || !isJsonObject(m)) {
      throw new StoreUnavailableError(`Unsupported index store format (version ${String(version)})`);
    }
    const out = new Map<string, IndexRecord>();
    let skipped = 0;
    for (const d of records) {
      const record = readRecord(d);
      if (record) out.set(record.identityKey, record);
      else skipped++;
    }
    return {
      meta: {
        backendId: typeof m.backendId === "string" ? m.backendId : null,
        dimension: typeof m.dimension === "number" ? m.dimension : null,
        generation: typeof m.generation === "number" ? m.generation : 0,
        savedAt: typeof m.savedAt === "string" ? m.savedAt : null,
      },
      records: out,
      skipped,
    };
  }

  private async load(): Promise<void> {
    const stamp = await fileStamp(this.storePath);
    const loaded = await this.readFromDisk();
    if (!loaded) {
      this.records = new Map();
      this.stamp = null;
      return;
    }
    this.adopt(loaded, stamp);
  }

  private adopt(loaded: StoreSnapshot, stamp: string | null): void {
    if (loaded.skipped > 0) {
      console.error(`[store] Ignored ${loaded.skipped} malformed records in ${this.storePath}`);
    }
    this.records = loaded.records;
    this.meta = loaded.meta;
    this.stamp = stamp;
    if (this.verbose) {
      console.error(`[store] Loaded ${loaded.records.size} records (generation ${loaded.meta.generation})`);
    }
  }

  private assertOpen(): void {
    if (this.closed) throw new StoreUnavailableError("Index store is closed");
  }
}

/**
 * Scoped acquisition: open the store, run `fn`, always close.
 */
export async function withIndexStore<T>(
  indexDir: string,
  opts: OpenStoreOptions,
  fn: (store: IndexStore) => Promise<T>,
): Promise<T> {
  const store = await IndexStore.open(indexDir, opts);
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}
