import Fastify from "fastify";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  isLogLevelEnabled,
  logDebug,
  logError,
  logInfo,
  parseConfiguredLogLevel,
  serializeError
} from "../../src/observability/logger.js";
import {
  getMetricsSnapshot,
  recordErrorRate,
  recordIngestion,
  recordSearch,
  registerMetricsRoutes,
  registerRequestMetricsHooks,
  resetMetrics
} from "../../src/observability/metrics.js";
import {
  registerRequestTraceHooks,
  resolveRequestTraceMode,
  summarizeBody
} from "../../src/observability/request-tracing.js";

describe("observability/logger", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("writes one JSON line with correlation ids", () => {
    vi.stubEnv("LOG_LEVEL", "info");
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-03-01T10:00:00.000Z"));
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);

    logInfo("search.completed", { requestId: "req-1", conversationId: "conv-1" }, { hits: 2 });

    expect(info).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(info.mock.calls[0]?.[0]))).toEqual({
      ts: "2026-03-01T10:00:00.000Z",
      level: "info",
      event: "search.completed",
      request_id: "req-1",
      conversation_id: "conv-1",
      document_id: null,
      hits: 2
    });
  });

  it("drops entries below the configured level", () => {
    vi.stubEnv("LOG_LEVEL", "warn");
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    logInfo("ignored", {});
    logDebug("ignored", {});
    logError("kept", { documentId: "doc-1" });

    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
    expect(isLogLevelEnabled("warn")).toBe(true);
    expect(isLogLevelEnabled("info")).toBe(false);
  });

  it("derives the level from request tracing when LOG_LEVEL is blank", () => {
    vi.stubEnv("LOG_LEVEL", " ");
    vi.stubEnv("BACKEND_REQUEST_TRACE_MODE", "trace");

    expect(isLogLevelEnabled("trace")).toBe(true);

    vi.stubEnv("BACKEND_REQUEST_TRACE_MODE", "");
    vi.stubEnv("BACKEND_REQUEST_TRACE", "yes");
    expect(isLogLevelEnabled("trace")).toBe(false);
    expect(isLogLevelEnabled("debug")).toBe(true);
  });

  it("parses configured levels", () => {
    expect(parseConfiguredLogLevel(" DEBUG ")).toBe("debug");
    expect(parseConfiguredLogLevel("verbose")).toBe("info");
    expect(parseConfiguredLogLevel(undefined)).toBe("info");
  });

  it("serializes errors with their cause", () => {
    expect(serializeError(new TypeError("bad", { cause: new Error("root") }))).toEqual({
      error_name: "TypeError",
      error_message: "bad",
      error_cause: { name: "Error", message: "root" }
    });
    expect(serializeError(new Error("plain", { cause: 42 }))).toEqual({
      error_name: "Error",
      error_message: "plain",
      error_cause: 42
    });
    expect(serializeError("text")).toEqual({ error_raw: "text" });
  });
});

describe("observability/metrics", () => {
  afterEach(() => {
    resetMetrics();
  });

  it("summarizes latencies and counters", () => {
    recordSearch("success", 10);
    recordSearch("success", 15);
    recordSearch("no_results", 5);
    recordIngestion({ durationMs: 40, indexedChunks: 3, skippedChunks: 1 });
    recordIngestion({ durationMs: Number.NaN, indexedChunks: 2, skippedChunks: 0 });
    recordErrorRate("http_503");

    expect(getMetricsSnapshot()).toEqual({
      request_latency: { count: 0, avgMs: 0, minMs: 0, maxMs: 0 },
      ingestion_latency: { count: 2, avgMs: 20, minMs: 0, maxMs: 40 },
      embedding_latency: { count: 0, avgMs: 0, minMs: 0, maxMs: 0 },
      search_latency: { count: 3, avgMs: 10, minMs: 5, maxMs: 15 },
      ingestion: { documents: 2, indexed_chunks: 5, skipped_chunks: 1 },
      search_outcomes: { success: 2, no_results: 1 },
      error_rates: { http_503: 1 }
    });
  });

  it("records request ids and error statuses through hooks", async () => {
    const app = Fastify({ logger: false });
    registerRequestMetricsHooks(app);
    await registerMetricsRoutes(app);
    app.get("/missing", async (_request, reply) => reply.code(404).send({ detail: "none" }));

    try {
      const missing = await app.inject({ method: "GET", url: "/missing" });
      expect(missing.statusCode).toBe(404);
      expect(missing.headers["x-request-id"]).toEqual(expect.any(String));

      const metrics = await app.inject({ method: "GET", url: "/metrics" });
      expect(metrics.statusCode).toBe(200);
      expect(metrics.json()).toMatchObject({
        request_latency: { count: 1 },
        error_rates: { http_404: 1 }
      });
    } finally {
      await app.close();
    }
  });
});

describe("observability/request-tracing", () => {
  it("resolves the trace mode", () => {
    expect(resolveRequestTraceMode({ BACKEND_REQUEST_TRACE_MODE: " Trace " })).toBe("trace");
    expect(resolveRequestTraceMode({ BACKEND_REQUEST_TRACE_MODE: "verbose" })).toBe("off");
    expect(resolveRequestTraceMode({})).toBe("off");
  });

  it("summarizes bodies without their text", () => {
    expect(summarizeBody(undefined)).toBeNull();
    expect(summarizeBody(null)).toEqual({ type: "null" });
    expect(summarizeBody("abc")).toEqual({ type: "string", length: 3 });
    expect(summarizeBody([1, 2])).toEqual({ type: "array", length: 2 });
    expect(summarizeBody({ document_id: "doc-1", raw_text: "Hakim" })).toEqual({
      type: "object",
      keys: ["document_id", "raw_text"],
      raw_text_length: 5
    });
    expect(summarizeBody(7)).toEqual({ type: "number" });
  });

  it("logs request start and completion in trace mode", async () => {
    vi.stubEnv("LOG_LEVEL", "trace");
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const app = Fastify({ logger: false });
    registerRequestTraceHooks(app, "trace");
    app.post("/documents", async () => ({ ok: true }));

    try {
      await app.inject({ method: "POST", url: "/documents", payload: { raw_text: "Hakim" } });
    } finally {
      await app.close();
    }

    const events = info.mock.calls.map((call) => JSON.parse(String(call[0])).event);
    expect(events).toEqual([
      "http.trace.enabled",
      "http.request.start",
      "http.request.pre_handler",
      "http.request.complete"
    ]);
    const preHandler = JSON.parse(String(info.mock.calls[2]?.[0]));
    expect(preHandler.body).toEqual({ type: "object", keys: ["raw_text"], raw_text_length: 5 });
    expect(preHandler.route).toBe("/documents");
  });

  it("registers nothing when tracing is off", async () => {
    vi.stubEnv("LOG_LEVEL", "trace");
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const app = Fastify({ logger: false });
    registerRequestTraceHooks(app, "off");
    app.get("/ping", async () => ({ ok: true }));

    try {
      await app.inject({ method: "GET", url: "/ping" });
    } finally {
      await app.close();
    }

    expect(info).not.toHaveBeenCalled();
  });
});
