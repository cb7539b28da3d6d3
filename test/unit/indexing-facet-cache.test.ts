import { describe, expect, it } from "vitest";
import { FacetCache } from "../../src/modules/indexing/facet-cache.js";
import {
  InMemoryVectorIndex,
  cosineSimilarity,
  createIndexedDocument
} from "../../src/modules/indexing/vector-index.js";
import { metadataWith } from "../../tests/helpers/court-search.js";

describe("modules/indexing/facet-cache", () => {
  it("counts documents per distinct value and keeps the first spelling", () => {
    const facets = new FacetCache();
    facets.update("doc-1", metadataWith({ judge: "Kamran Əliyev", parties: ["Rauf Həsənov", "Kapital Bank"] }));
    facets.update("doc-2", metadataWith({ judge: "KAMRAN ƏLİYEV", parties: ["Kapital Bank"] }));

    expect(facets.values("judge")).toEqual([{ value: "Kamran Əliyev", documentCount: 2 }]);
    expect(facets.values("parties")).toEqual([
      { value: "Kapital Bank", documentCount: 2 },
      { value: "Rauf Həsənov", documentCount: 1 }
    ]);
    expect([...facets.documentsWith("judge", "kamran əliyev")].sort()).toEqual(["doc-1", "doc-2"]);
    expect(facets.documentCount()).toBe(2);
  });

  it("drops a value with its last backing document", () => {
    const facets = new FacetCache();
    facets.update("doc-1", metadataWith({ courtName: "Bakı İnzibati Məhkəməsi" }));
    facets.update("doc-2", metadataWith({ courtName: "Bakı İnzibati Məhkəməsi" }));

    facets.remove("doc-1");
    expect(facets.values("courtName")).toEqual([{ value: "Bakı İnzibati Məhkəməsi", documentCount: 1 }]);

    facets.update("doc-2", metadataWith({ courtName: "Sumqayıt Şəhər Məhkəməsi" }));
    expect(facets.values("courtName")).toEqual([{ value: "Sumqayıt Şəhər Məhkəməsi", documentCount: 1 }]);
    expect(facets.documentsWith("courtName", "Bakı İnzibati Məhkəməsi").size).toBe(0);
  });

  it("rebuilds from scratch", () => {
    const facets = new FacetCache();
    facets.update("stale", metadataWith({ year: "2020" }));

    facets.rebuild([{ documentId: "doc-1", metadata: metadataWith({ year: "2023" }) }]);

    expect(facets.snapshot().year).toEqual(["2023"]);
    expect(facets.snapshot().judge).toEqual([]);
    expect(facets.documentCount()).toBe(1);
  });
});

describe("modules/indexing/vector-index", () => {
  const unit = (documentId: string, generation: string, vectors: number[][]) =>
    createIndexedDocument({
      documentId,
      generation,
      metadata: metadataWith({}),
      chunks: vectors.map((embedding, sequence) => ({ sequence, text: `chunk ${sequence}`, embedding }))
    });

  it("keeps an earlier snapshot unchanged by later publishes", () => {
    const index = new InMemoryVectorIndex();
    index.publish(unit("doc-1", "g1", [[1, 0]]));
    const before = index.snapshot();

    const replaced = index.publish(unit("doc-1", "g2", [[0, 1], [1, 1]]));
    index.publish(unit("doc-2", "g1", [[1, 0]]));

    expect(replaced?.generation).toBe("g1");
    expect(before.get("doc-1")?.generation).toBe("g1");
    expect(before.size).toBe(1);
    expect(index.stats()).toEqual({ documents: 2, chunks: 3, dimension: 2 });
  });

  it("removes and clears", () => {
    const index = new InMemoryVectorIndex();
    index.publish(unit("doc-1", "g1", [[1, 0]]));

    expect(index.remove("missing")).toBeNull();
    expect(index.remove("doc-1")?.documentId).toBe("doc-1");
    index.publish(unit("doc-2", "g1", []));
    expect(index.dimension()).toBeNull();
    index.clear();
    expect(index.stats()).toEqual({ documents: 0, chunks: 0, dimension: null });
  });

  it("orders chunks by sequence and derives chunk ids", () => {
    const document = createIndexedDocument({
      documentId: "doc-1",
      generation: "g1",
      metadata: metadataWith({}),
      chunks: [
        { sequence: 1, text: "b", embedding: [0, 1] },
        { sequence: 0, text: "a", embedding: [1, 0] }
      ]
    });

    expect(document.chunks.map((chunk) => chunk.chunkId)).toEqual(["doc-1:0", "doc-1:1"]);
  });

  it("computes cosine similarity and treats degenerate vectors as unrelated", () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
  });
});
