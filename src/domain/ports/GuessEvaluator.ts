import type { CatalogItem } from "../entities/Catalog.js";

export type GuessVerdict =
  | { readonly kind: "exact"; readonly item: CatalogItem }
  | { readonly kind: "fuzzy"; readonly item: CatalogItem; readonly score: number }
  | { readonly kind: "already-named" }
  | { readonly kind: "not-found" };

/**
 * Decides which item, if any, a free-text guess refers to.
 *
 * `candidates` is the full item set of the round; `namedKeys` holds the canonical keys already
 * claimed. Implementations must be pure: the same input always yields the same verdict.
 */
export interface GuessEvaluator {
  evaluate(
    input: string,
    candidates: readonly CatalogItem[],
    namedKeys: ReadonlySet<string>,
  ): GuessVerdict;
}
