/**
 * Shared types used throughout the discovery, extraction, embedding and
 * persistence layers.
 */

/** Closed set of supported content categories, in enumeration (discovery) order. */
export const CONTENT_TYPES = [
  "playbook",
  "script",
  "integration",
  "classifier",
  "mapper",
  "parsing_rule",
  "modeling_rule",
] as const;

export type ContentType = (typeof CONTENT_TYPES)[number];

export function isContentType(value: string): value is ContentType {
  return (CONTENT_TYPES as readonly string[]).includes(value);
}

/** A file matched by a content type's glob rules. Never persisted. */
export interface CandidateFile {
  readonly contentType: ContentType;
  /** Absolute, path-guarded location on disk. */
  readonly absolutePath: string;
  /** Root-relative path using forward slashes. */
  readonly relativePath: string;
}

/**
 * Normalized extraction result for one logical content item, prior to
 * embedding.
 */
export interface ContentDoc {
  readonly contentType: ContentType;
  /** Upsert key: `<type>:<relativePath>` plus `#<name>` for sub-items. */
  readonly identityKey: string;
  readonly displayName: string;
  readonly description: string;
  readonly packName: string;
  readonly relativePath: string;
  readonly searchableText: string;
  /** Display / filter facts; never used for ranking. */
  readonly structuredMetadata: Readonly<Record<string, string>>;
}

/** Metadata persisted alongside each embedded record. */
export interface RecordMetadata {
  readonly displayName: string;
  readonly description: string;
  readonly packName: string;
  readonly relativePath: string;
  /** 0-based window ordinal within the parent document. */
  readonly chunkIndex: number;
  readonly chunkCount: number;
  readonly fields: Readonly<Record<string, string>>;
}

/** The embedded, persisted unit stored for retrieval. */
export interface IndexRecord {
  readonly identityKey: string;
  /** Identity key of the document this record (or chunk) belongs to. */
  readonly parentIdentityKey: string;
  readonly contentType: ContentType;
  readonly vector: Float32Array;
  readonly metadata: RecordMetadata;
  readonly textExcerpt: string;
}

/** A stored record paired with its similarity to a query vector. */
export interface ScoredRecord {
  readonly record: IndexRecord;
  /** Cosine similarity in [-1, 1]. */
  readonly score: number;
}

export interface PatternQuery {
  readonly text: string;
  /** Restrict to one or more content types. Empty or omitted means all. */
  readonly contentTypes?: readonly ContentType[];
  readonly pack?: string;
  /** Number of document groups to return; clamped to 1..50, default 5. */
  readonly topK?: number;
  /** Attach raw source text when a content source is configured. */
  readonly includeFullText?: boolean;
}

export interface PatternMatch {
  readonly identityKey: string;
  readonly displayName: string;
  readonly contentType: ContentType;
  readonly packName: string;
  readonly relativePath: string;
  readonly description: string;
  readonly score: number;
  readonly textExcerpt: string;
  readonly metadata: Readonly<Record<string, string>>;
  readonly fullText?: string;
}

export interface QueryResult {
  readonly query: string;
  readonly topK: number;
  readonly matches: PatternMatch[];
}

/** Per content type record / document totals. */
export interface IndexStats {
  readonly indexDir: string;
  readonly backendId: string | null;
  readonly dimension: number | null;
  readonly totalRecords: number;
  readonly totalDocuments: number;
  readonly perType: Record<ContentType, { records: number; documents: number }>;
  readonly updatedAt: string | null;
}
