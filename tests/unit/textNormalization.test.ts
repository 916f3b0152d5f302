/**
 * Unit tests for text normalization helpers
 */

import { describe, it, expect } from "vitest";
import { normalizeText, parseTagList } from "@/utils/text/textNormalization";

describe("normalizeText", () => {
  it("should trim and lowercase", () => {
    expect(normalizeText("  Very Rare\t")).toBe("very rare");
  });

  it("should keep inner whitespace", () => {
    expect(normalizeText("Wondrous  Item")).toBe("wondrous  item");
  });
});

describe("parseTagList", () => {
  it("should return an empty list for empty or missing input", () => {
    expect(parseTagList("")).toEqual([]);
    expect(parseTagList(undefined)).toEqual([]);
    expect(parseTagList(null)).toEqual([]);
  });

  it("should split on commas, trim, lowercase and drop empty tokens", () => {
    expect(parseTagList(" Cursed, ,FIRE,cursed,")).toEqual([
      "cursed",
      "fire",
      "cursed",
    ]);
  });
});
