import type { FastifyInstance } from "fastify";
import { getCourtSearchService } from "../../modules/court-search-factory.js";
import type { CourtSearchService } from "../../modules/court-search-service.js";
import { resolveRequestId, sendServiceError } from "../http.js";
import { toWireFieldCounts } from "../wire.js";

export interface AdminRoutesDependencies {
  getService?: () => Promise<CourtSearchService>;
}

export async function registerAdminRoutes(app: FastifyInstance, dependencies?: AdminRoutesDependencies): Promise<void> {
  const getService = dependencies?.getService ?? getCourtSearchService;

  app.post("/admin/reindex", async (request, reply) => {
    const context = { requestId: resolveRequestId(request) };
    try {
      const service = await getService();
      const report = service.reindex(context);
      return { documents: report.documents, facet_values: toWireFieldCounts(report.facetValues) };
    } catch (error) {
      return sendServiceError(reply, error, context, "admin.reindex.failed");
    }
  });

  app.post("/admin/hydrate", async (request, reply) => {
    const context = { requestId: resolveRequestId(request) };
    try {
      const service = await getService();
      const report = await service.hydrate(context);
      return { documents: report.documents, chunks: report.chunks, failed_documents: report.failedDocuments };
    } catch (error) {
      return sendServiceError(reply, error, context, "admin.hydrate.failed");
    }
  });

  app.get("/admin/stats", async (request, reply) => {
    const context = { requestId: resolveRequestId(request) };
    try {
      const service = await getService();
      const stats = service.stats();
      return {
        documents: stats.documents,
        chunks: stats.chunks,
        dimension: stats.dimension,
        facet_values: toWireFieldCounts(stats.facetValues)
      };
    } catch (error) {
      return sendServiceError(reply, error, context, "admin.stats.failed");
    }
  });
}
