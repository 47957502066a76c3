import { Hono } from "hono";
import type { Context, Next } from "hono";

import type { Catalog, GameConfig, Logger, SessionRegistry, UserGateway } from "./core.js";

export interface CreateServerAppOptions {
  readonly port: number;
  readonly registry: SessionRegistry;
  readonly catalog: Catalog;
  readonly users: UserGateway;
  readonly config: GameConfig;
  readonly logger: Logger;
  readonly now?: () => number;
}

/** Read-only HTTP surface next to the socket: health, catalog, leaderboard and lobby views. */
export function createServerApp({
  port,
  registry,
  catalog,
  users,
  config,
  logger,
  now = Date.now,
}: CreateServerAppOptions): Hono {
  const app = new Hono();

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", "Content-Type");
    c.header("Access-Control-Allow-Methods", "GET,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  app.get("/api/health", (c: Context) =>
    c.json({ ok: true, timestamp: now(), config: { port } }),
  );

  app.get("/api/categories", (c: Context) =>
    c.json({
      categories: catalog.categories().map((name) => ({
        name,
        items: catalog.itemsOf(name)?.length ?? 0,
      })),
    }),
  );

  app.get("/api/leaderboard", async (c: Context) => {
    try {
      const leaderboard = await users.topRatings(config.leaderboardSize);
      return c.json({ leaderboard });
    } catch (error) {
      logger.error("Failed to load leaderboard", { error });
      return c.json({ error: "Leaderboard unavailable" }, 503);
    }
  });

  app.get("/api/lobby", (c: Context) =>
    c.json({
      stats: registry.stats(),
      offers: registry.offerListings(),
      matches: registry.matchListings(),
    }),
  );

  app.get("/api/matches/:id", (c: Context) => {
    const matchId = c.req.param("id");
    const entry = matchId ? registry.session(matchId) : undefined;
    if (!entry) {
      return c.json({ error: "Match not found" }, 404);
    }
    return c.json({
      state: entry.match.snapshot(now()),
      spectators: entry.spectators.length,
      pauseEndsAt: entry.pauseEndsAt,
    });
  });

  return app;
}
