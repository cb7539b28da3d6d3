import type { FastifyReply, FastifyRequest } from "fastify";
import type { z } from "zod";
import { DocumentNotFoundError } from "../modules/documents/types.js";
import { ChunkStoreError } from "../modules/indexing/chunk-store.js";
import { QueryEmbeddingError } from "../modules/indexing/embedding.js";
import { logError, logWarn, serializeError, type CorrelationContext } from "../observability/logger.js";

export type ValidationSource = "params" | "query" | "body";

export const toValidationError = (error: z.ZodError, source: ValidationSource) => ({
  detail: error.issues.map((issue) => ({
    type: issue.code,
    loc: [source, ...issue.path],
    msg: issue.message
  }))
});

export const resolveRequestId = (request: FastifyRequest): string => {
  const headerRequestId = request.headers["x-request-id"];
  if (typeof headerRequestId === "string" && headerRequestId.trim().length > 0) {
    return headerRequestId.trim();
  }
  return request.id;
};

/** Parses one part of the request, replying 422 when it does not validate. */
export const parseOrReply = <Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  value: unknown,
  source: ValidationSource,
  reply: FastifyReply
): Output | null => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    reply.code(422).send(toValidationError(parsed.error, source));
    return null;
  }
  return parsed.data;
};

/** Maps domain errors to HTTP statuses; anything unrecognized is a 500. */
export const sendServiceError = (reply: FastifyReply, error: unknown, context: CorrelationContext, event: string) => {
  if (error instanceof DocumentNotFoundError) {
    return reply.code(404).send({ detail: `Sənəd tapılmadı: ${error.documentId}` });
  }
  if (error instanceof QueryEmbeddingError || error instanceof ChunkStoreError) {
    logWarn(event, context, serializeError(error));
    return reply.code(503).send({ detail: error.message });
  }
  logError(event, context, serializeError(error));
  return reply.code(500).send({ detail: "Internal server error" });
};
