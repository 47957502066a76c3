import { describe, expect, it } from "vitest";

import { SubmitGuess } from "../src/domain/commands/SubmitGuess.js";
import { Surrender } from "../src/domain/commands/Surrender.js";
import { Harness } from "./support/harness.js";

describe("Integration: play a full competitive match", () => {
  it("walks through a timeout, a completed round and a surrender", async () => {
    const harness = new Harness();
    const { bus, registry, users } = harness;
    const matchId = await harness.startDuel({ mode: "competitive", timeBankSeconds: 90 });

    // Round 1: alice opens and lets her clock run out.
    await harness.advance(90_000);

    expect(bus.lastFor("c2", "turn_expired")).toEqual({
      type: "turn_expired",
      matchId,
      loser: 0,
      reason: "timeout",
      timeBudgets: [0, 90_000],
      scores: [0, 1],
      at: 90_000,
    });
    expect(bus.lastFor("c1", "round_settled")).toEqual({
      type: "round_settled",
      matchId,
      round: {
        roundNumber: 1,
        category: "Noble gases",
        namedCounts: [0, 0],
        endReason: "timeout",
        actorNickname: "alice",
        winner: 1,
        items: [
          { displayName: "Argon", namedBy: null },
          { displayName: "Neon", namedBy: null },
        ],
      },
      scores: [0, 1],
      pauseEndsAt: 100_000,
      matchOverAfterPause: false,
      at: 90_000,
    });

    // Round 2: the loser opens; both name one planet.
    await harness.advance(10_000);
    expect(bus.lastFor("c2", "turn_updated")).toMatchObject({
      state: { roundNumber: 2, category: "Planets", turnOwner: 0, turnDeadline: 190_000 },
    });

    await harness.advance(5_000);
    await harness.run(new SubmitGuess("c1", matchId, "Mercury", harness.now));
    expect(bus.lastFor("c1", "guess_result")).toEqual({
      type: "guess_result",
      matchId,
      verdict: "exact",
      item: "Mercury",
      at: 105_000,
    });
    expect(bus.lastFor("c2", "turn_updated")).toMatchObject({
      state: { turnOwner: 1, timeBudgets: [85_000, 90_000], turnDeadline: 195_000 },
    });

    await harness.advance(5_000);
    await harness.run(new SubmitGuess("c2", matchId, "venus", harness.now));
    expect(bus.lastFor("c1", "round_settled")).toMatchObject({
      round: {
        roundNumber: 2,
        namedCounts: [1, 1],
        endReason: "completed",
        actorNickname: null,
        winner: "draw",
      },
      scores: [0.5, 1.5],
      pauseEndsAt: 120_000,
      matchOverAfterPause: false,
    });

    // Round 3: bob named the last item, so alice opens and surrenders.
    await harness.advance(10_000);
    expect(bus.lastFor("c1", "turn_updated")).toMatchObject({
      state: { roundNumber: 3, category: "Chess pieces", turnOwner: 0 },
    });

    await harness.run(new Surrender("c1", matchId, harness.now));
    expect(bus.lastFor("c2", "round_settled")).toMatchObject({
      round: { roundNumber: 3, endReason: "surrender", actorNickname: "alice", winner: 1 },
      scores: [0.5, 2.5],
      pauseEndsAt: 130_000,
      matchOverAfterPause: true,
    });

    await harness.advance(10_000);

    const ended = bus.lastFor("c1", "match_ended");
    expect(ended).toMatchObject({
      matchId,
      terminationReason: "completed-all-rounds",
      scores: [0.5, 2.5],
      winner: 1,
      ratingChanges: [
        { nickname: "alice", before: 1500, after: 1484 },
        { nickname: "bob", before: 1500, after: 1516 },
      ],
      ratingStatus: "applied",
      at: 130_000,
    });
    expect(ended?.["history"]).toHaveLength(3);
    expect(bus.on("lobby", "leaderboard_updated").at(-1)).toEqual({
      type: "leaderboard_updated",
      leaderboard: [
        { nickname: "bob", rating: 1516, gamesPlayed: 1 },
        { nickname: "alice", rating: 1484, gamesPlayed: 1 },
      ],
    });

    expect(await users.findUserByHandle("handle-alice")).toEqual({
      handle: "handle-alice",
      nickname: "alice",
      rating: 1484,
      gamesPlayed: 1,
    });
    expect(registry.connection("c2")?.rating).toBe(1516);
    expect(registry.session(matchId)).toBeUndefined();
    expect(registry.idleConnections()).toEqual(["c1", "c2"]);
    expect(registry.rematch(matchId)?.parties).toEqual(["c1", "c2"]);

    // Superseded turn deadlines still fire but change nothing.
    const published = bus.messages.length;
    await harness.advance(100_000);
    expect(bus.messages).toHaveLength(published);
    expect(harness.scheduler.pending).toEqual([]);
  });
});
