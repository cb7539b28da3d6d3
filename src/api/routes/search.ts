import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { getCourtSearchService } from "../../modules/court-search-factory.js";
import type { CourtSearchService } from "../../modules/court-search-service.js";
import { MAX_SEARCH_LIMIT } from "../../modules/search/hybrid-search.js";
import { parseOrReply, resolveRequestId, sendServiceError } from "../http.js";
import { searchFiltersSchema, toSearchFilters, toWireFacets, toWireOutcome } from "../wire.js";

export interface SearchRoutesDependencies {
  getService?: () => Promise<CourtSearchService>;
}

const searchBodySchema = z.object({
  query: z.string().max(2000).default(""),
  filters: searchFiltersSchema.optional(),
  limit: z.number().int().positive().max(MAX_SEARCH_LIMIT).optional(),
  offset: z.number().int().nonnegative().optional()
});

export async function registerSearchRoutes(app: FastifyInstance, dependencies?: SearchRoutesDependencies): Promise<void> {
  const getService = dependencies?.getService ?? getCourtSearchService;

  app.post("/search", async (request, reply) => {
    const body = parseOrReply(searchBodySchema, request.body ?? {}, "body", reply);
    if (body === null) {
      return reply;
    }
    const context = { requestId: resolveRequestId(request) };
    try {
      const service = await getService();
      const outcome = await service.search(
        {
          query: body.query,
          filters: toSearchFilters(body.filters),
          limit: body.limit,
          offset: body.offset
        },
        context
      );
      return toWireOutcome(outcome);
    } catch (error) {
      return sendServiceError(reply, error, context, "search.failed");
    }
  });

  app.get("/facets", async (request, reply) => {
    const context = { requestId: resolveRequestId(request) };
    try {
      const service = await getService();
      return { facets: toWireFacets(service.facets()) };
    } catch (error) {
      return sendServiceError(reply, error, context, "facets.failed");
    }
  });
}
