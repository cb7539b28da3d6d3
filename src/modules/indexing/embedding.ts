import { withRetries, withTimeout } from "../../lib/async.js";

/** External embedding provider. Implementations should honour `signal`. */
export type EmbeddingFunction = (text: string, signal: AbortSignal) => Promise<number[]>;

export class EmbeddingError extends Error {
  readonly attempts: number;

  constructor(message: string, options: { attempts: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "EmbeddingError";
    this.attempts = options.attempts;
  }
}

export class InvalidEmbeddingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidEmbeddingError";
  }
}

/** Raised when the query itself cannot be embedded; distinct from a timeout. */
export class QueryEmbeddingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "QueryEmbeddingError";
  }
}

export const validateEmbedding = (vector: unknown, expectedDimension: number | null): number[] => {
  if (!Array.isArray(vector) || vector.length === 0) {
    throw new InvalidEmbeddingError("Embedding must be a non-empty array.");
  }
  const values: number[] = [];
  for (const value of vector) {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new InvalidEmbeddingError("Embedding contains a non-finite value.");
    }
    values.push(value);
  }
  if (expectedDimension !== null && values.length !== expectedDimension) {
    throw new InvalidEmbeddingError(
      `Embedding dimension ${values.length} does not match expected dimension ${expectedDimension}.`
    );
  }
  return values;
};

export interface EmbedWithRetryOptions {
  timeoutMs: number;
  maxAttempts: number;
  retryDelayMs?: number;
  /** Read before each attempt so concurrent calls can agree on the first dimension seen. */
  expectedDimension?: () => number | null;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
  onAttemptFailed?: (error: unknown, attempt: number) => void;
}

/**
 * Embeds `text` with a per-attempt timeout. A malformed vector counts as a
 * failed attempt. Throws `EmbeddingError` once attempts are exhausted.
 */
export async function embedWithRetry(
  embed: EmbeddingFunction,
  text: string,
  options: EmbedWithRetryOptions
): Promise<number[]> {
  let attemptsMade = 0;
  try {
    return await withRetries(
      async (attempt) => {
        attemptsMade = attempt;
        const vector = await withTimeout((signal) => embed(text, signal), options.timeoutMs, options.signal);
        return validateEmbedding(vector, options.expectedDimension?.() ?? null);
      },
      {
        attempts: options.maxAttempts,
        delayMs: options.retryDelayMs ?? 0,
        sleep: options.sleep,
        shouldRetry: () => !options.signal?.aborted,
        onAttemptFailed: options.onAttemptFailed
      }
    );
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new EmbeddingError(`Embedding failed after ${attemptsMade} attempt(s): ${reason}`, {
      attempts: attemptsMade,
      cause: error
    });
  }
}
