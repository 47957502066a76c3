import { describe, expect, it } from "vitest";

import { createServerApp } from "../src/app.js";
import type { UserGateway } from "../src/core.js";
import { Harness } from "../../../tests/support/harness.js";
import { createLoggerMock, createUserGatewayMock } from "../../../tests/support/mocks.js";

const NOW = 1_234;

function createApp(harness: Harness, users: UserGateway = harness.users) {
  const logger = createLoggerMock();
  const app = createServerApp({
    port: 4321,
    registry: harness.registry,
    catalog: harness.context.catalog,
    users,
    config: harness.context.config,
    logger,
    now: () => NOW,
  });
  return { app, logger };
}

describe("server HTTP routes", () => {
  it("reports health status", async () => {
    const { app } = createApp(new Harness());

    const response = await app.request("/api/health");

    expect(response.status).toBe(200);
    expect(response.headers.get("Access-Control-Allow-Origin")).toBe("*");
    expect(await response.json()).toEqual({
      ok: true,
      timestamp: NOW,
      config: { port: 4321 },
    });
  });

  it("answers preflight requests", async () => {
    const { app } = createApp(new Harness());

    const response = await app.request("/api/lobby", { method: "OPTIONS" });

    expect(response.status).toBe(200);
    expect(response.headers.get("Access-Control-Allow-Methods")).toBe("GET,OPTIONS");
  });

  it("lists catalog categories with their sizes", async () => {
    const { app } = createApp(new Harness());

    const response = await app.request("/api/categories");

    expect(await response.json()).toEqual({
      categories: [
        { name: "Chess pieces", items: 2 },
        { name: "Noble gases", items: 2 },
        { name: "Planets", items: 2 },
      ],
    });
  });

  it("serves the leaderboard", async () => {
    const harness = new Harness();
    await harness.connect("c1", "carol");
    await harness.connect("c2", "alice");
    const { app } = createApp(harness);

    const response = await app.request("/api/leaderboard");

    expect(await response.json()).toEqual({
      leaderboard: [
        { nickname: "alice", rating: 1500, gamesPlayed: 0 },
        { nickname: "carol", rating: 1500, gamesPlayed: 0 },
      ],
    });
  });

  it("reports an unavailable leaderboard", async () => {
    const users = createUserGatewayMock();
    users.topRatings.mockRejectedValue(new Error("store offline"));
    const { app, logger } = createApp(new Harness(), users);

    const response = await app.request("/api/leaderboard");

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({ error: "Leaderboard unavailable" });
    expect(logger.error).toHaveBeenCalledWith(
      "Failed to load leaderboard",
      expect.objectContaining({ error: expect.any(Error) }),
    );
  });

  it("describes the lobby and live matches", async () => {
    const harness = new Harness();
    await harness.startDuel();
    const { app } = createApp(harness);

    const response = await app.request("/api/lobby");

    expect(await response.json()).toEqual({
      stats: { inLobby: 0, competitive: 2, practice: 0, spectating: 0 },
      offers: [],
      matches: [
        {
          matchId: "match-1",
          mode: "competitive",
          nicknames: ["alice", "bob"],
          scores: [0, 0],
          spectators: 0,
        },
      ],
    });
  });

  it("loads a match snapshot", async () => {
    const harness = new Harness();
    const matchId = await harness.startDuel();
    const { app } = createApp(harness);

    const response = await app.request(`/api/matches/${matchId}`);

    expect(response.status).toBe(200);
    const body: unknown = await response.json();
    expect(body).toMatchObject({
      state: {
        matchId: "match-1",
        mode: "competitive",
        phase: "round-in-progress",
        category: "Noble gases",
        turnOwner: 0,
        scores: [0, 0],
      },
      spectators: 0,
      pauseEndsAt: null,
    });
  });

  it("returns 404 for unknown matches", async () => {
    const { app } = createApp(new Harness());

    const response = await app.request("/api/matches/match-404");

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: "Match not found" });
  });
});
