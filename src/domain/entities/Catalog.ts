import { randomPermutation } from "./RoundRules.js";

/** One answerable item of a category. */
export interface CatalogItem {
  readonly displayName: string;
  /** Unique within its category; used to track which items were named. */
  readonly canonicalKey: string;
  /** Shortest accepted form, shown in round summaries. */
  readonly primaryName: string;
  /** Normalised accepted spellings, the primary name included. */
  readonly aliases: ReadonlySet<string>;
}

export function normalizeText(value: string): string {
  return value.trim().toLowerCase().replaceAll("ё", "е");
}

/**
 * Read-only registry of topics: the answerable items of every category.
 * Built once at startup and shared by every match.
 */
export class Catalog {
  readonly #byCategory: ReadonlyMap<string, readonly CatalogItem[]>;

  constructor(byCategory: ReadonlyMap<string, readonly CatalogItem[]>) {
    const sorted = new Map<string, readonly CatalogItem[]>();
    for (const [category, items] of byCategory) {
      if (items.length > 0) {
        sorted.set(category, [...items].sort(compareByPrimaryName));
      }
    }
    this.#byCategory = sorted;
  }

  /**
   * Parses flat catalog text: one item per line as
   * `display name, category, alias, alias, ...`.
   */
  static parse(text: string): Catalog {
    const byCategory = new Map<string, Map<string, CatalogItem>>();

    for (const line of text.split(/\r?\n/)) {
      const [rawName, rawCategory, ...rawAliases] = splitCsvLine(line);
      const displayName = rawName?.trim() ?? "";
      const category = rawCategory?.trim() ?? "";
      if (displayName.length === 0 || category.length === 0) continue;

      const primaryName = displayName.split(/\s+/).at(-1) ?? displayName;
      const aliases = new Set<string>([normalizeText(primaryName)]);
      for (const alias of rawAliases) {
        const normalized = normalizeText(alias);
        if (normalized.length > 0) aliases.add(normalized);
      }

      let items = byCategory.get(category);
      if (!items) {
        items = new Map<string, CatalogItem>();
        byCategory.set(category, items);
      }
      items.set(displayName, {
        displayName,
        canonicalKey: displayName,
        primaryName,
        aliases,
      });
    }

    return new Catalog(
      new Map([...byCategory].map(([category, items]) => [category, [...items.values()]])),
    );
  }

  get size(): number {
    return this.#byCategory.size;
  }

  categories(): string[] {
    return [...this.#byCategory.keys()].sort((a, b) => a.localeCompare(b));
  }

  has(category: string): boolean {
    return this.#byCategory.has(category);
  }

  /** Items of a category ordered by primary name, or undefined for unknown categories. */
  itemsOf(category: string): readonly CatalogItem[] | undefined {
    return this.#byCategory.get(category);
  }

  /** Draws `count` distinct categories out of `pool` (all categories by default). */
  sampleCategories(
    count: number,
    random: () => number,
    pool: readonly string[] = this.categories(),
  ): string[] {
    const known = pool.filter((category) => this.has(category));
    const order = randomPermutation(known.length, random);
    return order
      .slice(0, Math.min(count, known.length))
      .flatMap((index) => {
        const category = known[index];
        return category === undefined ? [] : [category];
      });
  }
}

function compareByPrimaryName(a: CatalogItem, b: CatalogItem): number {
  return a.primaryName.localeCompare(b.primaryName);
}

function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let quoted = false;

  for (let index = 0; index < line.length; index += 1) {
    const char = line[index];
    if (quoted) {
      if (char === '"' && line[index + 1] === '"') {
        current += '"';
        index += 1;
      } else if (char === '"') {
        quoted = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ",") {
      fields.push(current);
      current = "";
    } else {
      current += char;
    }
  }

  fields.push(current);
  return fields;
}
