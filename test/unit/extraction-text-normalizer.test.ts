import { describe, expect, it } from "vitest";
import { baseFoldText, foldText, normalizeText, tokenize } from "../../src/modules/extraction/text-normalizer.js";

describe("modules/extraction/text-normalizer", () => {
  it("collapses whitespace inside paragraphs and keeps paragraph breaks", () => {
    expect(normalizeText("  Birinci   sətir\r\nardı\r\n\r\n\r\nİkinci\tabzas  ")).toBe("Birinci sətir ardı\n\nİkinci abzas");
  });

  it("replaces lookalike characters and drops invisible ones", () => {
    expect(normalizeText("M\u04D9hk\u04D9m\u04D9\u00A0\u201Cqərar\u201D\u200B \u2013 2023")).toBe('Məhkəmə "qərar" - 2023');
  });

  it("is idempotent", () => {
    const once = normalizeText("Hakim: Əli  Məmmədov\n\n\nİl: 2023");
    expect(normalizeText(once)).toBe(once);
  });

  it("returns an empty string for blank input", () => {
    expect(normalizeText(" \n\n \t ")).toBe("");
  });

  it("folds case with Azerbaijani rules and merges dotted and dotless i", () => {
    expect(foldText("  İSMAYILOV   Əli ")).toBe("ismayilov əli");
    expect(foldText("Qərarı")).toBe(foldText("QƏRARI"));
  });

  it("drops diacritics in the base fold", () => {
    expect(baseFoldText("Şəki Gəncə Ağdaş Füzuli Göyçay")).toBe("seki gence agdas fuzuli goycay");
  });

  it("tokenizes on anything that is not a letter or digit", () => {
    expect(tokenize("İş № 2-1234/2023, Bakı.")).toEqual(["iş", "2", "1234", "2023", "baki"]);
  });
});
