import { embedWithTimeout, type EmbeddingBackend } from "./backend";
import type { ContentDoc, IndexRecord } from "./types";

/** Characters of chunk text kept on each record for display. */
export const EXCERPT_CHARS = 500;

export interface ChunkerOptions {
  chunkSize?: number; // window size for oversize text (default 800)
  chunkOverlap?: number; // trailing overlap between windows (default 120)
  timeoutMs?: number; // per embedding call (default 30000)
}

/**
 * Converts documents into embedded index records. Text within the backend's
 * input limit becomes one record keyed by the document identity; longer text
 * is split into overlapping windows keyed `<identity>::<ordinal>`, all
 * sharing the document identity as parent.
 */
export class Chunker {
  private readonly windowSize: number;
  private readonly overlap: number;
  private readonly timeoutMs: number;

  public constructor(
    private readonly backend: EmbeddingBackend,
    opts: ChunkerOptions = {},
  ) {
    this.windowSize = Math.max(1, Math.min(opts.chunkSize ?? 800, backend.maxInputChars));
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    let overlap = opts.chunkOverlap ?? 120;
    // Overlap must stay below the window for forward progress.
    if (overlap >= this.windowSize) {
      const fallback = Math.max(0, Math.floor(this.windowSize * 0.15));
      console.error(
        `[index] chunkOverlap (=${overlap}) >= window size (=${this.windowSize}). Using fallback overlap ${fallback}.`,
      );
      overlap = fallback;
    }
    this.overlap = overlap;
  }

  /**
   * Split text into fixed-size overlapping windows. The final window may be
   * shorter.
   */
  public static splitChunks(text: string, size = 800, overlap = 120): string[] {
    const out: string[] = [];
    let i = 0;
    while (i < text.length) {
      out.push(text.slice(i, i + size));
      if (i + size >= text.length) break;
      i += Math.max(1, size - overlap);
    }
    return out;
  }

  /** Windows a document's searchable text is embedded as. */
  public windows(text: string): string[] {
    if (text.length <= this.backend.maxInputChars) return [text];
    return Chunker.splitChunks(text, this.windowSize, this.overlap);
  }

  /**
   * Embed every window of a document. Any failed window fails the whole
   * document.
   *
   * @throws {EmbeddingError}
   */
  public async embed(doc: ContentDoc): Promise<IndexRecord[]> {
    const windows = this.windows(doc.searchableText);
    const chunked = windows.length > 1;
    const records: IndexRecord[] = [];
    for (let idx = 0; idx < windows.length; idx++) {
      const text = windows[idx];
      const vector = await embedWithTimeout(this.backend, text, this.timeoutMs);
      records.push({
        identityKey: chunked ? `${doc.identityKey}::${idx}` : doc.identityKey,
        parentIdentityKey: doc.identityKey,
        contentType: doc.contentType,
        vector,
        textExcerpt: text.slice(0, EXCERPT_CHARS),
        metadata: {
          displayName: doc.displayName,
          description: doc.description,
          packName: doc.packName,
          relativePath: doc.relativePath,
          chunkIndex: idx,
          chunkCount: windows.length,
          fields: doc.structuredMetadata,
        },
      });
    }
    return records;
  }
}
