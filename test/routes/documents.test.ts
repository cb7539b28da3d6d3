import Fastify from "fastify";
import { describe, expect, it } from "vitest";
import { registerDocumentRoutes } from "../../src/api/routes/documents.js";
import { ALIMONY_RULING, CREDIT_RULING, buildTestService } from "../../tests/helpers/court-search.js";

const setup = async () => {
  const harness = buildTestService();
  const app = Fastify();
  await registerDocumentRoutes(app, { getService: async () => harness.service });
  return { app, harness };
};

const creditBody = { document_id: "doc-credit", raw_text: CREDIT_RULING, source_filename: "credit.txt" };

describe("registerDocumentRoutes", () => {
  it("ingests a ruling and returns the report", async () => {
    const { app } = await setup();
    try {
      const response = await app.inject({ method: "POST", url: "/documents", payload: creditBody });

      expect(response.statusCode).toBe(201);
      const body = response.json();
      expect(body).toMatchObject({
        document_id: "doc-credit",
        indexed_chunks: 1,
        skipped_chunks: 0,
        warnings: [],
        replaced_previous: false
      });
      expect(body.metadata).toMatchObject({ judge: "Əli Məmmədov", year: "2023", court_name: "unknown", parties: [] });
    } finally {
      await app.close();
    }
  });

  it("rejects an intake without a document id", async () => {
    const { app } = await setup();
    try {
      const response = await app.inject({
        method: "POST",
        url: "/documents",
        payload: { raw_text: "mətn", source_filename: "a.txt" }
      });

      expect(response.statusCode).toBe(422);
      expect(response.json()).toEqual({
        detail: [{ type: "invalid_type", loc: ["body", "document_id"], msg: "Required" }]
      });
    } finally {
      await app.close();
    }
  });

  it("ingests a batch and reports each item", async () => {
    const { app } = await setup();
    try {
      const response = await app.inject({
        method: "POST",
        url: "/documents/batch",
        payload: {
          documents: [
            creditBody,
            { document_id: "doc-alimony", raw_text: ALIMONY_RULING, source_filename: "alimony.txt" }
          ]
        }
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.ingested).toBe(2);
      expect(body.failed).toBe(0);
      expect(body.items.map((item: { document_id: string }) => item.document_id)).toEqual(["doc-credit", "doc-alimony"]);
    } finally {
      await app.close();
    }
  });

  it("lists, reads, corrects and deletes documents", async () => {
    const { app } = await setup();
    try {
      await app.inject({ method: "POST", url: "/documents", payload: creditBody });

      const list = await app.inject({ method: "GET", url: "/documents?limit=5" });
      expect(list.statusCode).toBe(200);
      expect(list.json().next_cursor).toBeNull();
      expect(list.json().items).toHaveLength(1);
      expect(list.json().items[0]).toMatchObject({ document_id: "doc-credit", source_filename: "credit.txt" });

      const read = await app.inject({ method: "GET", url: "/documents/doc-credit" });
      expect(read.statusCode).toBe(200);
      expect(read.json().raw_text).toBe(CREDIT_RULING);

      const patched = await app.inject({
        method: "PATCH",
        url: "/documents/doc-credit/metadata",
        payload: { judge: "Rauf Quliyev", decision_type: "QƏRAR" }
      });
      expect(patched.statusCode).toBe(200);
      expect(patched.json().metadata).toMatchObject({ judge: "Rauf Quliyev", decision_type: "QƏRAR" });

      const removed = await app.inject({ method: "DELETE", url: "/documents/doc-credit" });
      expect(removed.statusCode).toBe(204);

      const missing = await app.inject({ method: "GET", url: "/documents/doc-credit" });
      expect(missing.statusCode).toBe(404);
      expect(missing.json()).toEqual({ detail: "Sənəd tapılmadı: doc-credit" });
    } finally {
      await app.close();
    }
  });

  it("rejects an empty metadata patch", async () => {
    const { app } = await setup();
    try {
      const response = await app.inject({ method: "PATCH", url: "/documents/doc-credit/metadata", payload: {} });

      expect(response.statusCode).toBe(422);
      expect(response.json()).toEqual({
        detail: [{ type: "custom", loc: ["body"], msg: "At least one field must be provided" }]
      });
    } finally {
      await app.close();
    }
  });

  it("rejects a malformed year correction", async () => {
    const { app } = await setup();
    try {
      const response = await app.inject({
        method: "PATCH",
        url: "/documents/doc-credit/metadata",
        payload: { year: "23" }
      });

      expect(response.statusCode).toBe(422);
      expect(response.json().detail[0]).toEqual({
        type: "invalid_string",
        loc: ["body", "year"],
        msg: "year must be four digits"
      });
    } finally {
      await app.close();
    }
  });

  it("rejects years out of range and dates that do not exist", async () => {
    const { app } = await setup();
    try {
      const response = await app.inject({
        method: "PATCH",
        url: "/documents/doc-credit/metadata",
        payload: { year: "0001", decision_date: "2023-02-31" }
      });

      expect(response.statusCode).toBe(422);
      expect(response.json()).toEqual({
        detail: [
          { type: "custom", loc: ["body", "year"], msg: "year must be between 1900 and next year" },
          {
            type: "custom",
            loc: ["body", "decision_date"],
            msg: "decision_date must be a calendar date between 1900 and next year"
          }
        ]
      });
    } finally {
      await app.close();
    }
  });

  it("flags a corrected year that disagrees with the decision date", async () => {
    const { app } = await setup();
    try {
      await app.inject({ method: "POST", url: "/documents", payload: creditBody });

      const response = await app.inject({
        method: "PATCH",
        url: "/documents/doc-credit/metadata",
        payload: { year: "2019", decision_date: "2023-03-12" }
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().metadata).toMatchObject({
        year: "2023",
        decision_date: "2023-03-12",
        partially_ambiguous: true,
        ambiguities: ["year"]
      });
    } finally {
      await app.close();
    }
  });

  it("returns 404 when correcting an unknown document", async () => {
    const { app } = await setup();
    try {
      const response = await app.inject({
        method: "PATCH",
        url: "/documents/nope/metadata",
        payload: { judge: "Rauf Quliyev" }
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ detail: "Sənəd tapılmadı: nope" });
    } finally {
      await app.close();
    }
  });

  it("maps unexpected service failures to 500", async () => {
    const app = Fastify();
    try {
      await registerDocumentRoutes(app, {
        getService: async () => {
          throw new Error("database offline");
        }
      });

      const response = await app.inject({ method: "GET", url: "/documents" });

      expect(response.statusCode).toBe(500);
      expect(response.json()).toEqual({ detail: "Internal server error" });
    } finally {
      await app.close();
    }
  });
});
