import { GameCommandInputError } from "./errors/GameCommandInputError.js";

export interface GameConfig {
  readonly pauseBetweenRoundsMs: number;
  readonly typoThreshold: number;
  readonly defaultTimeBankMs: number;
  readonly minTimeBankMs: number;
  readonly maxTimeBankMs: number;
  readonly minCompetitiveRounds: number;
  readonly minPracticeRounds: number;
  readonly leaderboardSize: number;
  readonly initialRating: number;
}

export type GameConfigOverrides = Partial<GameConfig>;

export function createGameConfig(overrides: GameConfigOverrides = {}): GameConfig {
  const config: GameConfig = {
    pauseBetweenRoundsMs: overrides.pauseBetweenRoundsMs ?? 10_000,
    typoThreshold: overrides.typoThreshold ?? 85,
    defaultTimeBankMs: overrides.defaultTimeBankMs ?? 90_000,
    minTimeBankMs: overrides.minTimeBankMs ?? 30_000,
    maxTimeBankMs: overrides.maxTimeBankMs ?? 300_000,
    minCompetitiveRounds: overrides.minCompetitiveRounds ?? 3,
    minPracticeRounds: overrides.minPracticeRounds ?? 1,
    leaderboardSize: overrides.leaderboardSize ?? 100,
    initialRating: overrides.initialRating ?? 1500,
  };

  const issues = validateConfig(config);
  if (issues.length > 0) {
    throw GameCommandInputError.because(issues);
  }

  return config;
}

function validateConfig(config: GameConfig): readonly string[] {
  const issues: string[] = [];

  if (!isPositiveDuration(config.pauseBetweenRoundsMs)) {
    issues.push("pauseBetweenRoundsMs must be greater than 0");
  }

  if (!isPositiveDuration(config.minTimeBankMs)) {
    issues.push("minTimeBankMs must be greater than 0");
  }

  if (!(config.maxTimeBankMs >= config.minTimeBankMs)) {
    issues.push("maxTimeBankMs must not be lower than minTimeBankMs");
  }

  if (
    !(config.defaultTimeBankMs >= config.minTimeBankMs) ||
    !(config.defaultTimeBankMs <= config.maxTimeBankMs)
  ) {
    issues.push("defaultTimeBankMs must lie within [minTimeBankMs, maxTimeBankMs]");
  }

  if (!(config.typoThreshold >= 0 && config.typoThreshold <= 100)) {
    issues.push("typoThreshold must lie within [0, 100]");
  }

  if (!Number.isInteger(config.minCompetitiveRounds) || config.minCompetitiveRounds < 1) {
    issues.push("minCompetitiveRounds must be an integer greater than or equal to 1");
  }

  if (!Number.isInteger(config.minPracticeRounds) || config.minPracticeRounds < 1) {
    issues.push("minPracticeRounds must be an integer greater than or equal to 1");
  }

  if (!Number.isInteger(config.leaderboardSize) || config.leaderboardSize < 1) {
    issues.push("leaderboardSize must be an integer greater than or equal to 1");
  }

  return issues;
}

function isPositiveDuration(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}
