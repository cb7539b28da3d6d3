import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { logDebug, logInfo, logTrace } from "./logger.js";

export type RequestTraceMode = "off" | "debug" | "trace";

const traceStartTimes = new WeakMap<FastifyRequest, number>();

export const resolveRequestTraceMode = (rawEnv: NodeJS.ProcessEnv = process.env): RequestTraceMode => {
  const explicit = rawEnv.BACKEND_REQUEST_TRACE_MODE?.trim().toLowerCase();
  if (explicit === "off" || explicit === "debug" || explicit === "trace") {
    return explicit;
  }
  return "off";
};

// Ingestion bodies carry whole rulings; only their shape is traced.
export const summarizeBody = (body: unknown): Record<string, unknown> | null => {
  if (body === undefined) {
    return null;
  }
  if (body === null) {
    return { type: "null" };
  }
  if (typeof body === "string") {
    return { type: "string", length: body.length };
  }
  if (Array.isArray(body)) {
    return { type: "array", length: body.length };
  }
  if (typeof body === "object") {
    const keys = Object.keys(body);
    const rawText = "raw_text" in body ? body.raw_text : undefined;
    return {
      type: "object",
      keys: keys.slice(0, 20),
      raw_text_length: typeof rawText === "string" ? rawText.length : null
    };
  }
  return { type: typeof body };
};

const getRoutePath = (request: FastifyRequest): string | null => {
  const routeUrl = request.routeOptions.url;
  return typeof routeUrl === "string" ? routeUrl : null;
};

const traceRequest = (
  mode: RequestTraceMode,
  request: FastifyRequest,
  reply: FastifyReply,
  event: string,
  fields: Record<string, unknown> = {}
): void => {
  const baseFields: Record<string, unknown> = {
    method: request.method,
    url: request.url,
    route: getRoutePath(request),
    status_code: reply.statusCode || null,
    ...fields
  };

  if (mode === "trace") {
    logTrace(event, { requestId: request.id }, baseFields);
    return;
  }
  logDebug(event, { requestId: request.id }, baseFields);
};

export const registerRequestTraceHooks = (app: FastifyInstance, mode = resolveRequestTraceMode()): void => {
  if (mode === "off") {
    return;
  }

  logInfo("http.trace.enabled", {}, { mode });

  app.addHook("onRequest", async (request, reply) => {
    traceStartTimes.set(request, Date.now());
    traceRequest(mode, request, reply, "http.request.start", { query: request.query ?? null });
  });

  if (mode === "trace") {
    app.addHook("preHandler", async (request, reply) => {
      traceRequest(mode, request, reply, "http.request.pre_handler", {
        params: request.params ?? null,
        body: summarizeBody(request.body)
      });
    });
  }

  app.addHook("onError", async (request, reply, error) => {
    traceRequest(mode, request, reply, "http.request.error", {
      error_name: error.name,
      error_message: error.message
    });
  });

  app.addHook("onResponse", async (request, reply) => {
    const startedAt = traceStartTimes.get(request);
    traceRequest(mode, request, reply, "http.request.complete", {
      duration_ms: typeof startedAt === "number" ? Date.now() - startedAt : null
    });
  });
};
