import type { GuessEvaluator, GuessVerdict } from "../ports/GuessEvaluator.js";
import { normalizeText, type CatalogItem } from "./Catalog.js";

/**
 * Similarity of two strings on a 0–100 scale, based on the indel distance
 * (insertions and deletions only). Identical strings score 100.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  return Math.round((200 * longestCommonSubsequence(a, b)) / total);
}

function longestCommonSubsequence(a: string, b: string): number {
  let previous = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i += 1) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j += 1) {
      current[j] =
        a[i - 1] === b[j - 1]
          ? (previous[j - 1] ?? 0) + 1
          : Math.max(previous[j] ?? 0, current[j - 1] ?? 0);
    }
    previous = current;
  }

  return previous[b.length] ?? 0;
}

export class FuzzyGuessEvaluator implements GuessEvaluator {
  constructor(private readonly threshold: number) {}

  evaluate(
    input: string,
    candidates: readonly CatalogItem[],
    namedKeys: ReadonlySet<string>,
  ): GuessVerdict {
    const guess = normalizeText(input);
    if (guess.length === 0) {
      return { kind: "not-found" };
    }

    const open = candidates.filter((item) => !namedKeys.has(item.canonicalKey));

    const exact = open.find((item) => item.aliases.has(guess));
    if (exact) {
      return { kind: "exact", item: exact };
    }

    let best: CatalogItem | undefined;
    let bestScore = 0;
    for (const item of open) {
      for (const alias of item.aliases) {
        const score = similarityRatio(guess, alias);
        if (score > bestScore) {
          bestScore = score;
          best = item;
        }
      }
    }

    if (best && bestScore >= this.threshold) {
      return { kind: "fuzzy", item: best, score: bestScore };
    }

    if (candidates.some((item) => item.aliases.has(guess))) {
      return { kind: "already-named" };
    }

    return { kind: "not-found" };
  }
}
