import { describe, expect, it, vi } from "vitest";

import { CreateOffer } from "../src/domain/commands/CreateOffer.js";
import { SkipVote } from "../src/domain/commands/SkipVote.js";
import { Surrender } from "../src/domain/commands/Surrender.js";
import type { RatingService } from "../src/domain/ports/RatingService.js";
import { Harness } from "./support/harness.js";

describe("Match end", () => {
  it("sends the summary without rating changes when ratings cannot be stored", async () => {
    const ratings: RatingService = {
      applyOutcome: vi.fn().mockRejectedValue(new Error("store offline")),
    };
    const harness = new Harness({ ratings });
    const matchId = await harness.startDuel();

    await harness.run(new Surrender("c1", matchId, 0));
    await harness.run(new SkipVote("c1", matchId, 0));
    await harness.run(new SkipVote("c2", matchId, 0));
    await harness.run(new Surrender("c1", matchId, 0));
    await harness.advance(10_000);

    expect(harness.bus.lastFor("c2", "match_ended")).toMatchObject({
      terminationReason: "score-unreachable",
      winner: 1,
      ratingChanges: null,
      ratingStatus: "unavailable",
    });
    expect(harness.bus.on("lobby", "leaderboard_updated")).toEqual([]);
    expect(harness.logger.error).toHaveBeenCalledWith(
      "Rating update failed; sending summary without rating changes",
      expect.objectContaining({ matchId }),
    );
    expect((await harness.users.findUserByHandle("handle-bob"))?.rating).toBe(1500);
    expect(harness.registry.rematch(matchId)).toBeDefined();
  });

  it("keeps stored and session ratings untouched when the result cannot be recorded", async () => {
    const harness = new Harness();
    const record = vi
      .spyOn(harness.users, "recordMatchResult")
      .mockRejectedValue(new Error("User handle-bob not found"));
    const matchId = await harness.startDuel();

    await harness.run(new Surrender("c1", matchId, 0));
    await harness.run(new SkipVote("c1", matchId, 0));
    await harness.run(new SkipVote("c2", matchId, 0));
    await harness.run(new Surrender("c1", matchId, 0));
    await harness.advance(10_000);

    expect(record).toHaveBeenCalledWith([
      { handle: "handle-alice", rating: 1484 },
      { handle: "handle-bob", rating: 1516 },
    ]);
    expect(harness.bus.lastFor("c1", "match_ended")).toMatchObject({
      ratingChanges: null,
      ratingStatus: "unavailable",
    });
    for (const handle of ["handle-alice", "handle-bob"]) {
      expect(await harness.users.findUserByHandle(handle)).toMatchObject({
        rating: 1500,
        gamesPlayed: 0,
      });
    }
    expect(harness.registry.connection("c1")?.rating).toBe(1500);
    expect(harness.registry.connection("c2")?.rating).toBe(1500);
  });

  it("leaves practice matches unrated and without a rematch offer", async () => {
    const harness = new Harness();
    await harness.connect("c1", "alice");
    await harness.run(
      new CreateOffer("c1", { mode: "practice", selectedCategories: ["Planets"] }, 0),
    );

    await harness.run(new Surrender("c1", "match-1", 1_000));
    expect(harness.bus.lastFor("c1", "round_settled")).toMatchObject({
      round: { endReason: "surrender", winner: null },
      scores: [0],
      matchOverAfterPause: true,
    });

    await harness.run(new SkipVote("c1", "match-1", 2_000));

    expect(harness.bus.lastFor("c1", "match_ended")).toMatchObject({
      terminationReason: "completed-all-rounds",
      scores: [0],
      winner: null,
      ratingChanges: null,
      ratingStatus: "unrated",
      at: 2_000,
    });
    expect(harness.registry.rematch("match-1")).toBeUndefined();
    expect(harness.registry.isIdle("c1")).toBe(true);
  });
});
