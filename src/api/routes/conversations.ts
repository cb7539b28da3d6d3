import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { getCourtSearchService } from "../../modules/court-search-factory.js";
import type { CourtSearchService } from "../../modules/court-search-service.js";
import { MAX_SEARCH_LIMIT } from "../../modules/search/hybrid-search.js";
import { parseOrReply, resolveRequestId, sendServiceError } from "../http.js";
import { conversationStateSchema, fromWireState, toWireAnalysis, toWireOutcome } from "../wire.js";

export interface ConversationRoutesDependencies {
  getService?: () => Promise<CourtSearchService>;
}

const analyzeBodySchema = z.object({
  conversation_id: z.string().trim().min(1).max(200).optional(),
  utterance: z.string().max(2000),
  state: conversationStateSchema.optional()
});

const respondBodySchema = analyzeBodySchema.extend({
  limit: z.number().int().positive().max(MAX_SEARCH_LIMIT).optional(),
  offset: z.number().int().nonnegative().optional()
});

const suggestionsQuerySchema = z.object({
  q: z.string().max(200).default(""),
  limit: z.coerce.number().int().positive().max(20).optional()
});

export async function registerConversationRoutes(
  app: FastifyInstance,
  dependencies?: ConversationRoutesDependencies
): Promise<void> {
  const getService = dependencies?.getService ?? getCourtSearchService;

  app.post("/conversations/analyze", async (request, reply) => {
    const body = parseOrReply(analyzeBodySchema, request.body, "body", reply);
    if (body === null) {
      return reply;
    }
    const context = { requestId: resolveRequestId(request), conversationId: body.conversation_id ?? null };
    try {
      const service = await getService();
      return toWireAnalysis(service.analyze(body.utterance, fromWireState(body.state)));
    } catch (error) {
      return sendServiceError(reply, error, context, "conversations.analyze.failed");
    }
  });

  app.post("/conversations/respond", async (request, reply) => {
    const body = parseOrReply(respondBodySchema, request.body, "body", reply);
    if (body === null) {
      return reply;
    }
    const context = { requestId: resolveRequestId(request), conversationId: body.conversation_id ?? null };
    try {
      const service = await getService();
      const turn = await service.converse(
        body.utterance,
        fromWireState(body.state),
        { limit: body.limit, offset: body.offset },
        context
      );
      return {
        ...toWireAnalysis(turn.analysis),
        outcome: turn.outcome ? toWireOutcome(turn.outcome) : null
      };
    } catch (error) {
      return sendServiceError(reply, error, context, "conversations.respond.failed");
    }
  });

  app.get("/conversations/suggestions", async (request, reply) => {
    const query = parseOrReply(suggestionsQuerySchema, request.query, "query", reply);
    if (query === null) {
      return reply;
    }
    const context = { requestId: resolveRequestId(request) };
    try {
      const service = await getService();
      return { suggestions: service.suggestQueries(query.q, query.limit) };
    } catch (error) {
      return sendServiceError(reply, error, context, "conversations.suggestions.failed");
    }
  });
}
