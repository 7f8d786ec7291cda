import { RetryingBackend, type EmbeddingBackend } from "./backend";
import type { Config } from "./config";
import { HashEmbeddings } from "./hash-embeddings";

/**
 * Build the configured embedding backend, warmed up and wrapped for retries
 * when EMBED_RETRIES > 0. The transformers module is loaded on demand so the
 * hash backend never pulls in the ONNX runtime.
 */
export async function createBackend(
  config: Pick<
    Config,
    | "EMBEDDING_BACKEND"
    | "MODEL_NAME"
    | "EMBED_MAX_CHARS"
    | "TRANSFORMERS_CACHE"
    | "EMBED_RETRIES"
    | "EMBED_TIMEOUT_MS"
  >,
): Promise<EmbeddingBackend> {
  let backend: EmbeddingBackend;
  if (config.EMBEDDING_BACKEND === "hash") {
    backend = new HashEmbeddings({ maxInputChars: config.EMBED_MAX_CHARS });
  } else {
    const { TransformersEmbeddings } = await import("./embeddings");
    backend = new TransformersEmbeddings({
      modelName: config.MODEL_NAME,
      maxInputChars: config.EMBED_MAX_CHARS,
      cacheDir: config.TRANSFORMERS_CACHE,
    });
  }
  if (config.EMBED_RETRIES > 0) {
    backend = new RetryingBackend(backend, config.EMBED_RETRIES, 250, config.EMBED_TIMEOUT_MS);
  }
  await backend.init?.();
  return backend;
}
