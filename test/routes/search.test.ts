import Fastify from "fastify";
import { describe, expect, it } from "vitest";
import { registerSearchRoutes } from "../../src/api/routes/search.js";
import type { EmbeddingFunction } from "../../src/modules/indexing/embedding.js";
import {
  ALIMONY_RULING,
  CREDIT_RULING,
  SEARCH_VOCABULARY,
  buildTestService,
  keywordEmbedding
} from "../../tests/helpers/court-search.js";

const setup = async (embed?: EmbeddingFunction) => {
  const harness = buildTestService({ embed });
  await harness.service.ingest({ documentId: "doc-credit", rawText: CREDIT_RULING, sourceFilename: "credit.txt" });
  await harness.service.ingest({ documentId: "doc-alimony", rawText: ALIMONY_RULING, sourceFilename: "alimony.txt" });
  const app = Fastify();
  await registerSearchRoutes(app, { getService: async () => harness.service });
  return app;
};

describe("registerSearchRoutes", () => {
  it("returns ranked hits in wire format", async () => {
    const app = await setup();
    try {
      const response = await app.inject({ method: "POST", url: "/search", payload: { query: "kredit" } });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body).toMatchObject({ status: "ok", mode: "semantic", total_matches: 1 });
      expect(body.hits).toHaveLength(1);
      expect(body.hits[0]).toMatchObject({
        document_id: "doc-credit",
        chunk_id: "doc-credit:0",
        score: 1,
        partially_ambiguous: false
      });
      expect(body.hits[0].metadata.judge).toBe("Əli Məmmədov");
    } finally {
      await app.close();
    }
  });

  it("reports no results for filters nothing matches", async () => {
    const app = await setup();
    try {
      const response = await app.inject({
        method: "POST",
        url: "/search",
        payload: { query: "kredit", filters: { judge: "Naməlum Hakim" } }
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: "no_results", elapsed_ms: expect.any(Number), hits: [] });
    } finally {
      await app.close();
    }
  });

  it("browses by filters when no query is given", async () => {
    const app = await setup();
    try {
      const response = await app.inject({ method: "POST", url: "/search", payload: { filters: { year: "2022" } } });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.mode).toBe("browse");
      expect(body.hits.map((hit: { document_id: string; score: number | null }) => [hit.document_id, hit.score])).toEqual([
        ["doc-alimony", null]
      ]);
    } finally {
      await app.close();
    }
  });

  it("rejects unknown filter fields", async () => {
    const app = await setup();
    try {
      const response = await app.inject({
        method: "POST",
        url: "/search",
        payload: { query: "kredit", filters: { color: "qırmızı" } }
      });

      expect(response.statusCode).toBe(422);
      expect(response.json()).toEqual({
        detail: [
          { type: "unrecognized_keys", loc: ["body", "filters"], msg: "Unrecognized key(s) in object: 'color'" }
        ]
      });
    } finally {
      await app.close();
    }
  });

  it("rejects limits above the maximum", async () => {
    const app = await setup();
    try {
      const response = await app.inject({ method: "POST", url: "/search", payload: { query: "kredit", limit: 101 } });

      expect(response.statusCode).toBe(422);
      expect(response.json().detail[0].loc).toEqual(["body", "limit"]);
    } finally {
      await app.close();
    }
  });

  it("answers 503 when the query cannot be embedded", async () => {
    const keywords = keywordEmbedding(SEARCH_VOCABULARY);
    const app = await setup(async (text, signal) => {
      if (text === "sorğu xətası") {
        throw new Error("provider down");
      }
      return keywords(text, signal);
    });
    try {
      const response = await app.inject({ method: "POST", url: "/search", payload: { query: "sorğu xətası" } });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toEqual({ detail: "Query embedding failed: provider down" });
    } finally {
      await app.close();
    }
  });

  it("lists facet values per field", async () => {
    const app = await setup();
    try {
      const response = await app.inject({ method: "GET", url: "/facets" });

      expect(response.statusCode).toBe(200);
      const { facets } = response.json();
      expect(facets.year).toEqual(["2022", "2023"]);
      expect(facets.judge).toHaveLength(2);
      expect(facets.judge).toEqual(expect.arrayContaining(["Əli Məmmədov", "Kamran Əliyev"]));
      expect(facets.court_name).toEqual([]);
    } finally {
      await app.close();
    }
  });
});
