export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms.`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `operation` with an abort signal that fires after `timeoutMs` or when
 * `parentSignal` aborts. Settles on the first of those even if the operation
 * ignores its signal.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parentSignal?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const abortFromParent = (): void => controller.abort(parentSignal?.reason);
  if (parentSignal?.aborted) {
    controller.abort(parentSignal.reason);
  } else {
    parentSignal?.addEventListener("abort", abortFromParent, { once: true });
  }

  let timeoutHandle: NodeJS.Timeout | undefined;
  const aborted = new Promise<never>((_, reject) => {
    if (controller.signal.aborted) {
      reject(controller.signal.reason);
      return;
    }
    controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
    timeoutHandle = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), aborted]);
  } finally {
    clearTimeout(timeoutHandle);
    parentSignal?.removeEventListener("abort", abortFromParent);
  }
}

export interface RetryOptions {
  attempts: number;
  delayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  shouldRetry?: (error: unknown) => boolean;
  onAttemptFailed?: (error: unknown, attempt: number) => void;
}

export async function withRetries<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const sleep = options.sleep ?? delay;
  const delayMs = options.delayMs ?? 0;
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.attempts; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      options.onAttemptFailed?.(error, attempt);
      if (options.shouldRetry && !options.shouldRetry(error)) {
        break;
      }
      if (attempt < options.attempts && delayMs > 0) {
        await sleep(delayMs * attempt);
      }
    }
  }

  throw lastError;
}

/** Maps with at most `limit` operations in flight; results keep input order. */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  operation: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  // Workers pull from one shared iterator.
  const pending = items.entries();

  const worker = async (): Promise<void> => {
    for (const [index, item] of pending) {
      results[index] = await operation(item, index);
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

/**
 * Serializes async work per key. Work for different keys runs concurrently;
 * a failed task does not block the next one for the same key.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
