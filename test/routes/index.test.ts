import Fastify from "fastify";
import { describe, expect, it, vi } from "vitest";
import { registerHealthRoute } from "../../src/api/routes/health.js";
import { registerApiRoutes } from "../../src/api/routes/index.js";
import { CREDIT_RULING, buildTestService } from "../../tests/helpers/court-search.js";

describe("registerApiRoutes", () => {
  it("serves every route group from the injected service", async () => {
    const harness = buildTestService();
    const getService = vi.fn(async () => harness.service);
    const app = Fastify();

    try {
      await registerHealthRoute(app);
      await registerApiRoutes(app, {
        admin: { getService },
        conversations: { getService },
        documents: { getService },
        search: { getService }
      });

      const health = await app.inject({ method: "GET", url: "/health" });
      expect(health.json()).toEqual({ status: "ok" });

      const ingest = await app.inject({
        method: "POST",
        url: "/documents",
        payload: { document_id: "doc-credit", raw_text: CREDIT_RULING, source_filename: "credit.txt" }
      });
      expect(ingest.statusCode).toBe(201);

      const search = await app.inject({ method: "POST", url: "/search", payload: { query: "kredit" } });
      expect(search.json()).toMatchObject({ status: "ok", total_matches: 1 });

      const stats = await app.inject({ method: "GET", url: "/admin/stats" });
      expect(stats.json()).toMatchObject({ documents: 1, chunks: 1 });

      const suggestions = await app.inject({ method: "GET", url: "/conversations/suggestions" });
      expect(suggestions.statusCode).toBe(200);

      expect(getService).toHaveBeenCalledTimes(4);
    } finally {
      await app.close();
    }
  });

  it("does not expose the health route by itself", async () => {
    const app = Fastify();
    try {
      await registerApiRoutes(app, {});

      const response = await app.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(404);
    } finally {
      await app.close();
    }
  });
});
