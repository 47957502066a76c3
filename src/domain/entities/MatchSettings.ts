import type { GameConfig } from "../GameConfig.js";
import type { MatchMode } from "../typedefs.js";
import type { Catalog } from "./Catalog.js";
import { accepted, rejected, type Result } from "./Outcome.js";

/** Settings a match is played with; reused verbatim by rematches. */
export interface MatchSettings {
  readonly mode: MatchMode;
  /** Thinking time each participant gets per round. */
  readonly timeBankMs: number;
  readonly roundCount: number;
  /** Categories the topic sequence is drawn from. */
  readonly categories: readonly string[];
}

/**
 * Validates client-supplied settings against the catalog and config.
 *
 * Accepted fields: `mode`, `timeBankSeconds`, `roundCount`, `selectedCategories`. Omitting both
 * `roundCount` and `selectedCategories` plays every category once.
 */
export function resolveSettings(
  input: unknown,
  catalog: Catalog,
  config: GameConfig,
): Result<MatchSettings> {
  const raw: Record<string, unknown> | undefined = isRecord(input) ? input : undefined;
  if (input !== undefined && raw === undefined) {
    return rejected("malformed-settings");
  }

  const mode = raw?.["mode"] ?? "competitive";
  if (!isMatchMode(mode)) {
    return rejected("malformed-settings");
  }
  const minimumRounds =
    mode === "practice" ? config.minPracticeRounds : config.minCompetitiveRounds;

  const timeBankSeconds = raw?.["timeBankSeconds"];
  let timeBankMs = config.defaultTimeBankMs;
  if (timeBankSeconds !== undefined) {
    if (typeof timeBankSeconds !== "number" || !Number.isFinite(timeBankSeconds)) {
      return rejected("malformed-settings");
    }
    timeBankMs = clamp(
      Math.round(timeBankSeconds * 1000),
      config.minTimeBankMs,
      config.maxTimeBankMs,
    );
  }

  const selected = raw?.["selectedCategories"];
  let pool = catalog.categories();
  if (selected !== undefined) {
    if (!Array.isArray(selected)) {
      return rejected("malformed-settings");
    }
    const names = selected.filter((entry): entry is string => typeof entry === "string");
    if (names.length !== selected.length) {
      return rejected("malformed-settings");
    }
    pool = [...new Set(names.filter((category) => catalog.has(category)))];
    if (pool.length < minimumRounds) {
      return rejected("too-few-rounds");
    }
  }

  const requestedRounds = raw?.["roundCount"];
  let roundCount = pool.length;
  if (requestedRounds !== undefined) {
    if (typeof requestedRounds !== "number" || !Number.isInteger(requestedRounds)) {
      return rejected("malformed-settings");
    }
    if (requestedRounds < minimumRounds) {
      return rejected("too-few-rounds");
    }
    roundCount = Math.min(requestedRounds, pool.length);
  }

  if (roundCount < minimumRounds) {
    return rejected("too-few-rounds");
  }

  return accepted({ mode, timeBankMs, roundCount, categories: pool });
}

/** Draws the ordered topic sequence of a new match. */
export function drawTopicSequence(
  settings: MatchSettings,
  catalog: Catalog,
  random: () => number,
): string[] {
  return catalog.sampleCategories(settings.roundCount, random, settings.categories);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function isMatchMode(value: unknown): value is MatchMode {
  return value === "practice" || value === "competitive";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
