import { describe, expect, it, vi } from "vitest";
import {
  EmbeddingError,
  InvalidEmbeddingError,
  embedWithRetry,
  validateEmbedding
} from "../../src/modules/indexing/embedding.js";

describe("modules/indexing/embedding", () => {
  it("validates vectors against the expected dimension", () => {
    expect(validateEmbedding([0.1, 0.2], 2)).toEqual([0.1, 0.2]);
    expect(validateEmbedding([0.1, 0.2, 0.3], null)).toEqual([0.1, 0.2, 0.3]);
    expect(() => validateEmbedding([], null)).toThrow(InvalidEmbeddingError);
    expect(() => validateEmbedding([0.1, Number.NaN], null)).toThrow("Embedding contains a non-finite value.");
    expect(() => validateEmbedding([0.1, 0.2], 3)).toThrow(
      "Embedding dimension 2 does not match expected dimension 3."
    );
    expect(() => validateEmbedding("not a vector", null)).toThrow(InvalidEmbeddingError);
  });

  it("retries a failing provider and returns the first good vector", async () => {
    const embed = vi
      .fn()
      .mockRejectedValueOnce(new Error("rate limited"))
      .mockResolvedValueOnce([0.5, 0.5]);
    const onAttemptFailed = vi.fn();

    const vector = await embedWithRetry(embed, "mətn", { timeoutMs: 1000, maxAttempts: 3, onAttemptFailed });

    expect(vector).toEqual([0.5, 0.5]);
    expect(embed).toHaveBeenCalledTimes(2);
    expect(onAttemptFailed).toHaveBeenCalledTimes(1);
  });

  it("counts a malformed vector as a failed attempt", async () => {
    const embed = vi.fn().mockResolvedValue([1, 2, 3]);

    const failure = embedWithRetry(embed, "mətn", {
      timeoutMs: 1000,
      maxAttempts: 2,
      expectedDimension: () => 2
    });

    await expect(failure).rejects.toBeInstanceOf(EmbeddingError);
    await expect(failure).rejects.toMatchObject({ attempts: 2 });
    expect(embed).toHaveBeenCalledTimes(2);
  });

  it("times out a provider that never answers", async () => {
    const embed = vi.fn(
      (_text: string, signal: AbortSignal) =>
        new Promise<number[]>((_resolve, reject) => {
          signal.addEventListener("abort", () => reject(signal.reason));
        })
    );

    await expect(embedWithRetry(embed, "mətn", { timeoutMs: 10, maxAttempts: 1 })).rejects.toThrow(
      "Embedding failed after 1 attempt(s): Operation timed out after 10ms."
    );
  });

  it("waits between attempts with a growing delay", async () => {
    const embed = vi.fn().mockRejectedValue(new Error("down"));
    const sleep = vi.fn().mockResolvedValue(undefined);

    await expect(
      embedWithRetry(embed, "mətn", { timeoutMs: 1000, maxAttempts: 3, retryDelayMs: 100, sleep })
    ).rejects.toThrow("Embedding failed after 3 attempt(s): down");

    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });
});
