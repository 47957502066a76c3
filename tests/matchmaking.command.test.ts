import { describe, expect, it } from "vitest";

import { CancelOffer } from "../src/domain/commands/CancelOffer.js";
import { CreateOffer } from "../src/domain/commands/CreateOffer.js";
import { JoinOffer } from "../src/domain/commands/JoinOffer.js";
import { Spectate } from "../src/domain/commands/Spectate.js";
import { Unspectate } from "../src/domain/commands/Unspectate.js";
import { Harness } from "./support/harness.js";

describe("Offers and matchmaking", () => {
  it("opens a competitive offer and lists it to idle connections", async () => {
    const harness = new Harness();
    await harness.connect("c1", "alice");
    await harness.connect("c2", "bob");

    const outcome = await harness.run(
      new CreateOffer("c1", { mode: "competitive", timeBankSeconds: 60 }, 0),
    );

    expect(outcome).toEqual({ ok: true });
    expect(harness.bus.lastFor("c1", "offer_created")).toEqual({
      type: "offer_created",
      offerId: "offer-1",
      settings: { mode: "competitive", timeBankSeconds: 60, roundCount: 3 },
      at: 0,
    });
    expect(harness.bus.lastFor("c2", "offer_list_updated")).toEqual({
      type: "offer_list_updated",
      offers: [
        {
          offerId: "offer-1",
          creator: "alice",
          rating: 1500,
          settings: { mode: "competitive", timeBankSeconds: 60, roundCount: 3 },
        },
      ],
      matches: [],
    });
    expect(harness.bus.on("lobby", "lobby_stats").at(-1)).toEqual({
      type: "lobby_stats",
      inLobby: 2,
      competitive: 0,
      practice: 0,
      spectating: 0,
    });
  });

  it("refuses a second offer and invalid settings", async () => {
    const harness = new Harness();
    await harness.connect("c1", "alice");

    expect(await harness.run(new CreateOffer("c1", { roundCount: 2 }, 0))).toEqual({
      ok: false,
      reason: "too-few-rounds",
    });
    expect(await harness.run(new CreateOffer("c1", { mode: "blitz" }, 0))).toEqual({
      ok: false,
      reason: "malformed-settings",
    });

    await harness.run(new CreateOffer("c1", undefined, 0));
    expect(await harness.run(new CreateOffer("c1", undefined, 0))).toEqual({
      ok: false,
      reason: "busy",
    });
    expect(await harness.run(new CreateOffer("c9", undefined, 0))).toEqual({
      ok: false,
      reason: "not-connected",
    });
  });

  it("cancels an open offer", async () => {
    const harness = new Harness();
    await harness.connect("c1", "alice");
    await harness.run(new CreateOffer("c1", undefined, 0));

    expect(await harness.run(new CancelOffer("c1", 5))).toEqual({ ok: true });
    expect(harness.bus.lastFor("c1", "offer_cancelled")).toEqual({
      type: "offer_cancelled",
      offerId: "offer-1",
      at: 5,
    });
    expect(harness.registry.isIdle("c1")).toBe(true);
    expect(await harness.run(new CancelOffer("c1", 6))).toEqual({
      ok: false,
      reason: "offer-not-found",
    });
  });

  it("seats the creator first when an offer is joined", async () => {
    const harness = new Harness();
    const matchId = await harness.startDuel();

    expect(matchId).toBe("match-1");
    expect(harness.registry.occupancyOf("c1")).toEqual({
      kind: "participant",
      matchId,
      index: 0,
    });
    expect(harness.registry.occupancyOf("c2")).toEqual({
      kind: "participant",
      matchId,
      index: 1,
    });
    expect(harness.registry.openOffers()).toEqual([]);

    for (const connectionId of ["c1", "c2"]) {
      expect(harness.bus.lastFor(connectionId, "match_started")).toEqual({
        type: "match_started",
        matchId,
        mode: "competitive",
        participants: [
          { nickname: "alice", rating: 1500 },
          { nickname: "bob", rating: 1500 },
        ],
        totalRounds: 3,
        timeBankMs: 90_000,
        at: 0,
      });
    }
    expect(harness.bus.lastFor("c1", "turn_updated")).toMatchObject({
      matchId,
      state: {
        roundNumber: 1,
        category: "Noble gases",
        turnOwner: 0,
        turnDeadline: 90_000,
      },
    });
    expect(harness.bus.on("lobby", "lobby_stats").at(-1)).toMatchObject({
      inLobby: 0,
      competitive: 2,
    });
  });

  it("refuses to join an own or missing offer", async () => {
    const harness = new Harness();
    await harness.connect("c1", "alice");
    await harness.connect("c2", "bob");
    await harness.run(new CreateOffer("c1", undefined, 0));

    expect(await harness.run(new JoinOffer("c1", "offer-1", 0))).toEqual({
      ok: false,
      reason: "cannot-join-own-offer",
    });
    expect(await harness.run(new JoinOffer("c2", "offer-2", 0))).toEqual({
      ok: false,
      reason: "offer-not-found",
    });

    await harness.run(new CreateOffer("c2", undefined, 0));
    expect(await harness.run(new JoinOffer("c2", "offer-1", 0))).toEqual({
      ok: false,
      reason: "busy",
    });
    expect(harness.registry.occupancyOf("c1")).toEqual({ kind: "offer", offerId: "offer-1" });
  });

  it("starts a practice match without an offer", async () => {
    const harness = new Harness();
    await harness.connect("c1", "alice");

    await harness.run(
      new CreateOffer("c1", { mode: "practice", selectedCategories: ["Planets"] }, 0),
    );

    expect(harness.registry.openOffers()).toEqual([]);
    expect(harness.registry.occupancyOf("c1")).toEqual({
      kind: "participant",
      matchId: "match-1",
      index: 0,
    });
    expect(harness.bus.lastFor("c1", "match_started")).toMatchObject({
      mode: "practice",
      totalRounds: 1,
    });
    expect(harness.registry.stats()).toEqual({
      inLobby: 0,
      competitive: 0,
      practice: 1,
      spectating: 0,
    });
    expect(harness.registry.matchListings()).toEqual([]);
  });

  it("lets idle connections watch a match", async () => {
    const harness = new Harness();
    const matchId = await harness.startDuel();
    await harness.connect("c3", "carol");

    expect(await harness.run(new Spectate("c3", matchId, 10))).toEqual({ ok: true });
    expect(harness.bus.lastFor("c3", "spectate_started")).toMatchObject({
      matchId,
      state: { category: "Noble gases", timeBudgets: [89_990, 90_000] },
    });
    expect(harness.bus.lastFor("c1", "spectator_count_changed")).toEqual({
      type: "spectator_count_changed",
      matchId,
      count: 1,
      spectators: ["carol"],
      at: 10,
    });

    expect(await harness.run(new Spectate("c3", matchId, 11))).toEqual({
      ok: false,
      reason: "busy",
    });
    expect(await harness.run(new Spectate("c1", matchId, 11))).toEqual({
      ok: false,
      reason: "busy",
    });

    expect(await harness.run(new Unspectate("c3", 20))).toEqual({ ok: true });
    expect(harness.bus.lastFor("c3", "spectate_ended")).toEqual({
      type: "spectate_ended",
      matchId,
      at: 20,
    });
    expect(harness.bus.lastFor("c2", "spectator_count_changed")).toMatchObject({
      count: 0,
      spectators: [],
    });
    expect(await harness.run(new Unspectate("c3", 21))).toEqual({
      ok: false,
      reason: "not-spectating",
    });
    expect(await harness.run(new Spectate("c3", "match-9", 22))).toEqual({
      ok: false,
      reason: "match-not-found",
    });
  });
});
