import { describe, expect, it } from "vitest";

import {
  FuzzyGuessEvaluator,
  similarityRatio,
} from "../../src/domain/entities/GuessEvaluator.js";
import { createTestCatalog } from "../support/mocks.js";

const planets = createTestCatalog().itemsOf("Planets") ?? [];
const evaluator = new FuzzyGuessEvaluator(85);

describe("similarityRatio", () => {
  it("scores identical and empty strings as 100", () => {
    expect(similarityRatio("neon", "neon")).toBe(100);
    expect(similarityRatio("", "")).toBe(100);
  });

  it("rounds the indel similarity to an integer", () => {
    expect(similarityRatio("abc", "abd")).toBe(67);
    expect(similarityRatio("mercuri", "mercury")).toBe(86);
    expect(similarityRatio("venis", "venus")).toBe(80);
  });
});

describe("FuzzyGuessEvaluator", () => {
  it("matches an alias exactly after normalisation", () => {
    const verdict = evaluator.evaluate("  MERCURY ", planets, new Set());
    expect(verdict).toMatchObject({ kind: "exact", item: { displayName: "Mercury" } });
  });

  it("accepts a typo at or above the threshold", () => {
    const verdict = evaluator.evaluate("mercuri", planets, new Set());
    expect(verdict).toMatchObject({
      kind: "fuzzy",
      item: { displayName: "Mercury" },
      score: 86,
    });
  });

  it("rejects a typo below the threshold", () => {
    expect(evaluator.evaluate("venis", planets, new Set())).toEqual({ kind: "not-found" });
  });

  it("reports an exact alias of a named item as already named", () => {
    const verdict = evaluator.evaluate("Venus", planets, new Set(["Venus"]));
    expect(verdict).toEqual({ kind: "already-named" });
  });

  it("never resolves to a named item", () => {
    const verdict = evaluator.evaluate("mercuri", planets, new Set(["Mercury"]));
    expect(verdict).toEqual({ kind: "not-found" });
  });

  it("treats blank input as not found", () => {
    expect(evaluator.evaluate("   ", planets, new Set())).toEqual({ kind: "not-found" });
  });

  it("accepts a weaker typo under a lower threshold", () => {
    const lenient = new FuzzyGuessEvaluator(80);
    expect(lenient.evaluate("venis", planets, new Set())).toMatchObject({
      kind: "fuzzy",
      item: { displayName: "Venus" },
      score: 80,
    });
  });
});
