import crypto from "node:crypto";
import type { EmbeddingBackend } from "./backend";

/**
 * Deterministic local embedding using SHA-256 feature hashing over
 * lower-cased word tokens. Vectors are L2-normalized so cosine similarity is
 * a plain dot product. Needs no model download.
 */
export class HashEmbeddings implements EmbeddingBackend {
  public readonly id: string;
  public readonly maxInputChars: number;
  private readonly dim: number;
  private readonly tokenRegex = /[a-z0-9_]+/g;

  public constructor(opts: { dim?: number; maxInputChars?: number } = {}) {
    this.dim = opts.dim ?? 384;
    this.maxInputChars = opts.maxInputChars ?? 1000;
    this.id = `hash:${this.dim}`;
  }

  public async embed(text: string): Promise<Float32Array> {
    const vector = new Float32Array(this.dim);
    const tokens = text.toLowerCase().match(this.tokenRegex) ?? [];
    for (const token of tokens) {
      const h = this.hash(token);
      const sign = (h & 1) === 0 ? 1 : -1;
      const base = (h >>> 1) % this.dim;
      vector[base] += sign;
      vector[(base + 97) % this.dim] += sign * 0.5;
    }
    let norm = 0;
    for (const v of vector) norm += v * v;
    norm = Math.sqrt(norm);
    if (norm > 0) {
      for (let i = 0; i < vector.length; i++) vector[i] /= norm;
    } else {
      // Token-free text still needs a usable direction.
      vector[0] = 1;
    }
    return vector;
  }

  private hash(token: string): number {
    return crypto.createHash("sha256").update(token).digest().readUInt32BE(0);
  }
}
