import { EmbeddingError, describeError } from "./errors";

/**
 * Capability the chunker and query engine depend on. Concrete backends may be
 * local (hashing, ONNX via transformers) or remote.
 */
export interface EmbeddingBackend {
  /** Stable identifier recorded in the index; backends with different ids never mix. */
  readonly id: string;
  /** Longest text (in characters) embedded in a single call. */
  readonly maxInputChars: number;
  /** Optional one-time warm-up (model download / load). */
  init?(): Promise<void>;
  embed(text: string): Promise<Float32Array>;
}

/**
 * Run one embedding call under a deadline. A timeout, a backend failure or an
 * empty / non-finite vector all surface as {@link EmbeddingError}. For a
 * {@link RetryingBackend} the deadline applies to each attempt.
 */
export async function embedWithTimeout(
  backend: EmbeddingBackend,
  text: string,
  timeoutMs: number,
): Promise<Float32Array> {
  if (backend instanceof RetryingBackend) return backend.embedWithin(text, timeoutMs);
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new EmbeddingError(`Embedding timed out after ${timeoutMs}ms`)),
      timeoutMs,
    );
  });
  try {
    const vector = await Promise.race([backend.embed(text), deadline]);
    if (vector.length === 0) throw new EmbeddingError("Backend returned an empty vector");
    for (const v of vector) {
      if (!Number.isFinite(v)) throw new EmbeddingError("Backend returned a non-finite value");
    }
    return vector;
  } catch (e) {
    if (e instanceof EmbeddingError) throw e;
    throw new EmbeddingError(`Embedding failed: ${describeError(e)}`, { cause: e });
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Explicit bounded-count retry wrapper. Each attempt runs under its own
 * deadline; a hung attempt is abandoned (its promise is left to settle on
 * its own) and the next one starts.
 */
export class RetryingBackend implements EmbeddingBackend {
  public readonly id: string;
  public readonly maxInputChars: number;

  public constructor(
    private readonly inner: EmbeddingBackend,
    private readonly retries: number,
    private readonly delayMs = 250,
    private readonly attemptTimeoutMs = 30_000,
  ) {
    this.id = inner.id;
    this.maxInputChars = inner.maxInputChars;
  }

  public async init(): Promise<void> {
    await this.inner.init?.();
  }

  public embed(text: string): Promise<Float32Array> {
    return this.embedWithin(text, this.attemptTimeoutMs);
  }

  /**
   * @throws {EmbeddingError} The last attempt's failure once retries run out.
   */
  public async embedWithin(text: string, timeoutMs: number): Promise<Float32Array> {
    let lastError: unknown;
    for (let attempt = 0; attempt <= this.retries; attempt++) {
      try {
        return await embedWithTimeout(this.inner, text, timeoutMs);
      } catch (e) {
        lastError = e;
        if (attempt < this.retries) {
          console.error(`[embed] Attempt ${attempt + 1} failed, retrying: ${describeError(e)}`);
          await new Promise((r) => setTimeout(r, this.delayMs * (attempt + 1)));
        }
      }
    }
    throw lastError;
  }
}
