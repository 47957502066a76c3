import { createGameConfig, type GameConfig } from "./core.js";

export interface ServerConfig {
  readonly port: number;
  readonly catalogPath: string;
  readonly debug: boolean;
  /** Fixes topic draws and openers for reproducible sessions; unset means Math.random. */
  readonly seed: number | undefined;
  readonly game: GameConfig;
}

const DEFAULT_PORT = 8787;
const DEFAULT_CATALOG_PATH = "data/catalog.csv";

/** Reads server settings from the environment; unparsable numbers fall back to defaults. */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const pauseBetweenRoundsMs = readNumber(env["PAUSE_BETWEEN_ROUNDS_MS"]);
  const typoThreshold = readNumber(env["TYPO_THRESHOLD"]);

  return {
    port: readNumber(env["PORT"]) ?? DEFAULT_PORT,
    catalogPath: env["CATALOG_PATH"] || DEFAULT_CATALOG_PATH,
    debug: Boolean(env["DEBUG"]),
    seed: readNumber(env["RANDOM_SEED"]),
    game: createGameConfig({
      ...(pauseBetweenRoundsMs !== undefined ? { pauseBetweenRoundsMs } : {}),
      ...(typoThreshold !== undefined ? { typoThreshold } : {}),
    }),
  };
}

function readNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}
