import { describe, expect, it } from "vitest";
import { extractMetadata, reconcileMetadata } from "../../src/modules/extraction/metadata-extractor.js";
import type { FieldStrategy } from "../../src/modules/extraction/field-strategies.js";
import { normalizeText } from "../../src/modules/extraction/text-normalizer.js";
import { metadataWith } from "../../tests/helpers/court-search.js";

const now = () => new Date("2026-03-01T00:00:00.000Z");

const extract = (raw: string) => extractMetadata(normalizeText(raw), { now });

describe("modules/extraction/metadata-extractor", () => {
  it("reads labelled judge and year and leaves everything else unknown", () => {
    const metadata = extract("Hakim: Əli Məmmədov\nİl: 2023");

    expect(metadata).toEqual(
      metadataWith({
        judge: "Əli Məmmədov",
        year: "2023"
      })
    );
  });

  it("extracts a full ruling header", () => {
    const metadata = extract(
      [
        "Bakı Apellyasiya Məhkəməsi",
        "İş № 2-1234/2023",
        "QƏRAR",
        "15 mart 2023-cü il",
        "İddiaçı: Həsənov Rauf",
        "Cavabdeh: Kapital Bank ASC"
      ].join("\n\n")
    );

    expect(metadata.courtName).toBe("Bakı Apellyasiya Məhkəməsi");
    expect(metadata.caseNumber).toBe("2-1234/2023");
    expect(metadata.decisionType).toBe("QƏRAR");
    expect(metadata.decisionDate).toBe("2023-03-15");
    expect(metadata.year).toBe("2023");
    expect(metadata.parties).toEqual(["Həsənov Rauf", "Kapital Bank ASC"]);
    expect(metadata.judge).toBeNull();
    expect(metadata.district).toBeNull();
    expect(metadata.partiallyAmbiguous).toBe(false);
  });

  it("reads a judge named in the genitive before the presiding phrase", () => {
    expect(extract("Hakim Rauf Quliyevin sədrliyi ilə").judge).toBe("Rauf Quliyev");
  });

  it("prefers the decision date year and flags the conflict", () => {
    const metadata = extract("İl: 2022\n\nQərarın tarixi: 15.03.2023");

    expect(metadata.year).toBe("2023");
    expect(metadata.decisionDate).toBe("2023-03-15");
    expect(metadata.partiallyAmbiguous).toBe(true);
    expect(metadata.ambiguities).toEqual(["year"]);
  });

  it("rejects years outside the plausible range", () => {
    expect(extract("İl: 1850").year).toBeNull();
    expect(extract("İl: 2030").year).toBeNull();
  });

  it("returns an all-unknown record for text without anchors", () => {
    expect(extract("Bu mətndə heç bir rekvizit yoxdur")).toEqual(metadataWith({}));
  });

  it("keeps other fields when one strategy throws", () => {
    const strategies: FieldStrategy[] = [
      {
        field: "judge",
        patterns: [/Hakim: (?<value>.+)/u],
        normalize: () => {
          throw new Error("strategy failure");
        }
      },
      {
        field: "year",
        patterns: [/İl: (?<value>\d{4})/u],
        normalize: (value) => value
      }
    ];

    const metadata = extractMetadata("Hakim: Əli Məmmədov İl: 2023", { strategies, now });

    expect(metadata.judge).toBeNull();
    expect(metadata.year).toBe("2023");
  });

  it("reconciles an implausible decision date away", () => {
    const reconciled = reconcileMetadata(metadataWith({ year: "2021", decisionDate: "1800-01-01" }), now());

    expect(reconciled.decisionDate).toBeNull();
    expect(reconciled.year).toBe("2021");
    expect(reconciled.partiallyAmbiguous).toBe(false);
  });
});
