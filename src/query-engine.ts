import { embedWithTimeout, type EmbeddingBackend } from "./backend";
import type { ContentSource } from "./content-source";
import { InvalidQueryError, StoreUnavailableError } from "./errors";
import type { IndexStore } from "./index-store";
import type { PatternMatch, PatternQuery, QueryResult, ScoredRecord } from "./types";

export const DEFAULT_TOP_K = 5;
export const MAX_TOP_K = 50;

/** Clamp a requested result count into 1..50; non-numbers fall back to the default. */
export function clampTopK(topK: number | undefined): number {
  if (topK === undefined || !Number.isFinite(topK)) return DEFAULT_TOP_K;
  return Math.max(1, Math.min(MAX_TOP_K, Math.floor(topK)));
}

export interface QueryEngineOptions {
  store: IndexStore;
  backend: EmbeddingBackend;
  /** External checkout for full-text hydration; absence means metadata-only results. */
  contentSource?: ContentSource;
  timeoutMs?: number;
}

/**
 * Embeds the query, retrieves candidates from the store and collapses chunks
 * to their parent document (best-scoring chunk wins).
 */
export class QueryEngine {
  private readonly store: IndexStore;
  private readonly backend: EmbeddingBackend;
  private readonly contentSource?: ContentSource;
  private readonly timeoutMs: number;

  public constructor(opts: QueryEngineOptions) {
    this.store = opts.store;
    this.backend = opts.backend;
    this.contentSource = opts.contentSource;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
  }

  /**
   * @throws {InvalidQueryError} Empty query text.
   * @throws {EmbeddingError} Query embedding failed or timed out.
   * @throws {StoreUnavailableError} Store unreadable or built by another backend.
   * @throws {PathTraversalError} A stored path escapes the content checkout during hydration.
   */
  public async search(query: PatternQuery): Promise<QueryResult> {
    const text = query.text.trim();
    if (!text) throw new InvalidQueryError("Missing query text");
    const topK = clampTopK(query.topK);

    await this.store.refresh();
    if (!this.store.compatible) {
      throw new StoreUnavailableError(
        `Index was built with backend ${this.store.storedBackendId}, not ${this.backend.id}`,
      );
    }

    const vector = await embedWithTimeout(this.backend, text, this.timeoutMs);
    const filter = { contentTypes: query.contentTypes, pack: query.pack };

    // Chunks of one document may crowd the head of the ranking; widen until
    // enough distinct documents surface or the filtered set is exhausted.
    let limit = topK * 4;
    let groups: ScoredRecord[];
    for (;;) {
      const hits = this.store.query(vector, filter, limit);
      groups = QueryEngine.bestPerParent(hits);
      if (groups.length >= topK || hits.length < limit) break;
      limit *= 2;
    }

    const matches: PatternMatch[] = [];
    for (const { record, score } of groups.slice(0, topK)) {
      const match: PatternMatch = {
        identityKey: record.parentIdentityKey,
        displayName: record.metadata.displayName,
        contentType: record.contentType,
        packName: record.metadata.packName,
        relativePath: record.metadata.relativePath,
        description: record.metadata.description,
        score,
        textExcerpt: record.textExcerpt,
        metadata: record.metadata.fields,
      };
      if (query.includeFullText && this.contentSource) {
        const fullText = await this.contentSource.readText(record.metadata.relativePath);
        matches.push(fullText === undefined ? match : { ...match, fullText });
      } else {
        matches.push(match);
      }
    }
    return { query: text, topK, matches };
  }

  /**
   * Keep the highest-scoring record per parent document, ordered by that
   * score (input must already be sorted descending).
   */
  public static bestPerParent(hits: readonly ScoredRecord[]): ScoredRecord[] {
    const seen = new Set<string>();
    const out: ScoredRecord[] = [];
    for (const hit of hits) {
      if (seen.has(hit.record.parentIdentityKey)) continue;
      seen.add(hit.record.parentIdentityKey);
      out.push(hit);
    }
    return out;
  }
}
