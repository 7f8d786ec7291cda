import fs from "node:fs/promises";
import path from "node:path";
import { env, pipeline, type FeatureExtractionPipeline } from "@xenova/transformers";
import type { EmbeddingBackend } from "./backend";
import { EmbeddingError } from "./errors";

export interface TransformersEmbeddingsOptions {
  modelName?: string;
  maxInputChars?: number;
  /** Model download cache; defaults to `.cache/transformers` under the working directory. */
  cacheDir?: string;
}

/**
 * Sentence embeddings through a local transformers feature-extraction
 * pipeline (mean pooling + L2 normalization). The model loads on first
 * {@link init}; concurrent callers share one load.
 */
export class TransformersEmbeddings implements EmbeddingBackend {
  public readonly id: string;
  public readonly maxInputChars: number;
  private readonly modelName: string;
  private readonly cacheDir: string;
  private embedder: FeatureExtractionPipeline | null = null;
  private loading: Promise<FeatureExtractionPipeline> | null = null;

  public constructor(opts: TransformersEmbeddingsOptions = {}) {
    this.modelName = opts.modelName?.trim() || "Xenova/all-MiniLM-L6-v2";
    this.maxInputChars = opts.maxInputChars ?? 1000;
    this.cacheDir = opts.cacheDir?.trim() || path.resolve(process.cwd(), ".cache/transformers");
    this.id = `transformers:${this.modelName}`;
  }

  public async init(): Promise<void> {
    if (this.embedder) return;
    if (!this.loading) this.loading = this.load();
    try {
      this.embedder = await this.loading;
    } catch (e) {
      this.loading = null;
      throw new EmbeddingError(`Cannot load model ${this.modelName}`, { cause: e });
    }
  }

  /**
   * @throws {EmbeddingError} Before {@link init} or when the model yields an unexpected tensor.
   */
  public async embed(text: string): Promise<Float32Array> {
    if (!this.embedder) throw new EmbeddingError("Embedder not initialized. Call init() first.");
    const output = await this.embedder(text.slice(0, this.maxInputChars), {
      pooling: "mean",
      normalize: true,
    });
    const data: unknown = output.data;
    if (!(data instanceof Float32Array)) {
      throw new EmbeddingError(`Model ${this.modelName} returned a non-float32 tensor`);
    }
    return data;
  }

  private async load(): Promise<FeatureExtractionPipeline> {
    // The cache must be configured before the first pipeline is created.
    await fs.mkdir(this.cacheDir, { recursive: true });
    env.useBrowserCache = false;
    env.cacheDir = this.cacheDir;
    env.allowLocalModels = true;
    console.error(`[embed] Using transformers cache at ${this.cacheDir}`);
    console.error(`[embed] Loading embedding model: ${this.modelName}`);
    const extractor = await pipeline("feature-extraction", this.modelName);
    console.error(`[embed] Model ready: ${this.modelName}`);
    return extractor;
  }
}
