import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { getCourtSearchService } from "../../modules/court-search-factory.js";
import type { CourtSearchService } from "../../modules/court-search-service.js";
import { logInfo } from "../../observability/logger.js";
import { parseOrReply, resolveRequestId, sendServiceError } from "../http.js";
import {
  metadataPatchSchema,
  toMetadataPatch,
  toWireDocument,
  toWireDocumentSummary,
  toWireReport
} from "../wire.js";

export interface DocumentRoutesDependencies {
  getService?: () => Promise<CourtSearchService>;
}

const MAX_BATCH_SIZE = 100;

const documentParamsSchema = z.object({
  documentId: z.string().trim().min(1, "documentId is required").max(200)
});

const intakeSchema = z.object({
  document_id: z.string().trim().min(1, "document_id is required").max(200),
  raw_text: z.string().max(5_000_000),
  source_filename: z.string().trim().min(1, "source_filename is required").max(500)
});

const batchBodySchema = z.object({
  documents: z.array(intakeSchema).min(1, "documents is required").max(MAX_BATCH_SIZE)
});

const listQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().positive().max(500).optional()
});

const toIntake = (body: z.infer<typeof intakeSchema>) => ({
  documentId: body.document_id,
  rawText: body.raw_text,
  sourceFilename: body.source_filename
});

export async function registerDocumentRoutes(
  app: FastifyInstance,
  dependencies?: DocumentRoutesDependencies
): Promise<void> {
  const getService = dependencies?.getService ?? getCourtSearchService;

  app.post("/documents", async (request, reply) => {
    const body = parseOrReply(intakeSchema, request.body, "body", reply);
    if (body === null) {
      return reply;
    }
    const context = { requestId: resolveRequestId(request), documentId: body.document_id };
    try {
      const service = await getService();
      const report = await service.ingest(toIntake(body), context);
      return reply.code(201).send(toWireReport(report));
    } catch (error) {
      return sendServiceError(reply, error, context, "documents.ingest.failed");
    }
  });

  app.post("/documents/batch", async (request, reply) => {
    const body = parseOrReply(batchBodySchema, request.body, "body", reply);
    if (body === null) {
      return reply;
    }
    const context = { requestId: resolveRequestId(request) };
    try {
      const service = await getService();
      const items = await service.ingestMany(body.documents.map(toIntake), context);
      const failed = items.filter((item) => item.status === "failed").length;
      logInfo("documents.batch.completed", context, { documents: items.length, failed });
      return {
        ingested: items.length - failed,
        failed,
        items: items.map((item) =>
          item.status === "ingested"
            ? { status: item.status, document_id: item.documentId, report: toWireReport(item.report) }
            : { status: item.status, document_id: item.documentId, error: item.error }
        )
      };
    } catch (error) {
      return sendServiceError(reply, error, context, "documents.batch.failed");
    }
  });

  app.get("/documents", async (request, reply) => {
    const query = parseOrReply(listQuerySchema, request.query, "query", reply);
    if (query === null) {
      return reply;
    }
    const context = { requestId: resolveRequestId(request) };
    try {
      const service = await getService();
      const page = await service.listDocuments({ cursor: query.cursor, limit: query.limit });
      return {
        items: page.items.map(toWireDocumentSummary),
        next_cursor: page.nextCursor
      };
    } catch (error) {
      return sendServiceError(reply, error, context, "documents.list.failed");
    }
  });

  app.get("/documents/:documentId", async (request, reply) => {
    const params = parseOrReply(documentParamsSchema, request.params, "params", reply);
    if (params === null) {
      return reply;
    }
    const context = { requestId: resolveRequestId(request), documentId: params.documentId };
    try {
      const service = await getService();
      return toWireDocument(await service.getDocument(params.documentId));
    } catch (error) {
      return sendServiceError(reply, error, context, "documents.get.failed");
    }
  });

  app.patch("/documents/:documentId/metadata", async (request, reply) => {
    const params = parseOrReply(documentParamsSchema, request.params, "params", reply);
    if (params === null) {
      return reply;
    }
    const body = parseOrReply(metadataPatchSchema, request.body, "body", reply);
    if (body === null) {
      return reply;
    }
    const context = { requestId: resolveRequestId(request), documentId: params.documentId };
    try {
      const service = await getService();
      const updated = await service.correctMetadata(params.documentId, toMetadataPatch(body), context);
      return toWireDocumentSummary(updated);
    } catch (error) {
      return sendServiceError(reply, error, context, "documents.metadata.failed");
    }
  });

  app.delete("/documents/:documentId", async (request, reply) => {
    const params = parseOrReply(documentParamsSchema, request.params, "params", reply);
    if (params === null) {
      return reply;
    }
    const context = { requestId: resolveRequestId(request), documentId: params.documentId };
    try {
      const service = await getService();
      await service.removeDocument(params.documentId, context);
      return reply.code(204).send();
    } catch (error) {
      return sendServiceError(reply, error, context, "documents.remove.failed");
    }
  });
}
