import { describe, expect, it } from "vitest";
import { assembleCourtSearchService } from "../../src/modules/court-search-factory.js";
import { createConversationState } from "../../src/modules/dialogue/dialogue-controller.js";
import { DocumentNotFoundError } from "../../src/modules/documents/types.js";
import {
  ALIMONY_RULING,
  CREDIT_RULING,
  FIXED_NOW,
  SEARCH_VOCABULARY,
  buildTestService,
  keywordEmbedding,
  testSettings
} from "../../tests/helpers/court-search.js";

const ingestBoth = async (harness: ReturnType<typeof buildTestService>) => {
  await harness.service.ingest({ documentId: "doc-credit", rawText: CREDIT_RULING, sourceFilename: "credit.txt" });
  await harness.service.ingest({ documentId: "doc-alimony", rawText: ALIMONY_RULING, sourceFilename: "alimony.txt" });
};

describe("CourtSearchService", () => {
  it("ingests a batch and reports failed items without stopping", async () => {
    const { service } = buildTestService();

    const results = await service.ingestMany([
      { documentId: "doc-credit", rawText: CREDIT_RULING, sourceFilename: "credit.txt" },
      { documentId: "   ", rawText: "Boş", sourceFilename: "blank.txt" },
      { documentId: "doc-alimony", rawText: ALIMONY_RULING, sourceFilename: "alimony.txt" }
    ]);

    expect(results.map((item) => item.status)).toEqual(["ingested", "failed", "ingested"]);
    expect(results[1]).toEqual({ status: "failed", documentId: "   ", error: "documentId is required" });
    expect(service.stats()).toMatchObject({ documents: 2, chunks: 2, dimension: 3 });
  });

  it("searches ingested rulings semantically", async () => {
    const harness = buildTestService();
    await ingestBoth(harness);

    const outcome = await harness.service.search({ query: "kredit" });

    expect(outcome.status).toBe("ok");
    expect(outcome.status === "ok" ? outcome.hits.map((hit) => [hit.documentId, hit.score]) : []).toEqual([
      ["doc-credit", 1]
    ]);
  });

  it("turns a judge hint into a filter and searches with the remaining words", async () => {
    const harness = buildTestService();
    await ingestBoth(harness);

    const turn = await harness.service.converse("Kamranın aliment işləri", createConversationState());

    expect(turn.analysis.filters).toEqual({ judge: "Kamran Əliyev" });
    expect(turn.analysis.residualQuery).toBe("aliment işləri");
    expect(turn.outcome?.status).toBe("ok");
    expect(turn.outcome?.status === "ok" ? turn.outcome.hits.map((hit) => hit.documentId) : []).toEqual([
      "doc-alimony"
    ]);
  });

  it("does not search while a clarification is pending", async () => {
    const harness = buildTestService();
    await ingestBoth(harness);
    await harness.service.ingest({
      documentId: "doc-land",
      rawText: "Hakim: Kamran Həsənov\n\nİl: 2021\n\nTorpaq sahəsi barədə mübahisə.",
      sourceFilename: "land.txt"
    });

    const turn = await harness.service.converse("Kamranın qərarları", createConversationState());

    expect(turn.outcome).toBeNull();
    expect(turn.analysis.clarificationField).toBe("judge");
    expect(turn.analysis.nextState.status).toBe("awaiting-clarification");
  });

  it("rebuilds facets from the index on reindex", async () => {
    const harness = buildTestService();
    await ingestBoth(harness);
    harness.facets.remove("doc-credit");
    expect(harness.service.facets().judge).toEqual(["Kamran Əliyev"]);

    const report = harness.service.reindex();

    expect(report.documents).toBe(2);
    expect(report.facetValues).toMatchObject({ judge: 2, year: 2 });
    expect(harness.service.facets().judge).toContain("Əli Məmmədov");
  });

  it("suggests queries from the busiest judges and canned examples", async () => {
    const harness = buildTestService();
    await ingestBoth(harness);

    expect(harness.service.suggestQueries("kamran")).toEqual(["Hakim Kamran Əliyev tərəfindən çıxarılan qərarlar"]);
    expect(harness.service.suggestQueries("ALİMENT")).toEqual(["Aliment tutulması haqqında qətnamələr"]);

    const all = harness.service.suggestQueries("", 3);
    expect(all).toHaveLength(3);
    expect(all).toEqual(
      expect.arrayContaining([
        "Hakim Əli Məmmədov tərəfindən çıxarılan qərarlar",
        "Hakim Kamran Əliyev tərəfindən çıxarılan qərarlar",
        "Mülki işlər üzrə qətnamələr"
      ])
    );
    expect(harness.service.suggestQueries("kredit", 0)).toEqual([]);
  });

  it("removes a document from search and raises not-found afterwards", async () => {
    const harness = buildTestService();
    await ingestBoth(harness);

    await harness.service.removeDocument("doc-credit");

    const outcome = await harness.service.search({ query: "kredit" });
    expect(outcome.status).toBe("no_relevant_results");
    await expect(harness.service.getDocument("doc-credit")).rejects.toBeInstanceOf(DocumentNotFoundError);
    await expect(harness.service.removeDocument("doc-credit")).rejects.toBeInstanceOf(DocumentNotFoundError);
  });

  it("serves corrected metadata to filters", async () => {
    const harness = buildTestService();
    await ingestBoth(harness);

    await harness.service.correctMetadata("doc-credit", { judge: "Rauf Quliyev" });

    const outcome = await harness.service.search({ query: "", filters: { judge: "rauf quliyev" } });
    expect(outcome.status === "ok" ? outcome.hits.map((hit) => hit.documentId) : []).toEqual(["doc-credit"]);
    expect((await harness.service.getDocument("doc-credit")).metadata.judge).toBe("Rauf Quliyev");
  });

  it("hydrates a fresh service from persisted documents and chunks", async () => {
    const harness = buildTestService();
    await ingestBoth(harness);
    const restarted = assembleCourtSearchService(
      {
        repository: harness.repository,
        chunkStore: harness.chunkStore,
        embed: keywordEmbedding(SEARCH_VOCABULARY),
        now: () => FIXED_NOW
      },
      testSettings()
    );

    const report = await restarted.hydrate();

    expect(report).toEqual({ documents: 2, chunks: 2, failedDocuments: [] });
    const outcome = await restarted.search({ query: "aliment" });
    expect(outcome.status === "ok" ? outcome.hits.map((hit) => hit.documentId) : []).toEqual(["doc-alimony"]);
    expect(restarted.facets().year).toEqual(["2022", "2023"]);
  });

  it("lists documents through the repository", async () => {
    const harness = buildTestService();
    await ingestBoth(harness);

    const page = await harness.service.listDocuments({ limit: 10 });

    expect(page.items.map((document) => document.documentId).sort()).toEqual(["doc-alimony", "doc-credit"]);
    expect(page.nextCursor).toBeNull();
  });
});
