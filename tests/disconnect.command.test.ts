import { describe, expect, it } from "vitest";

import { CreateOffer } from "../src/domain/commands/CreateOffer.js";
import { Disconnect } from "../src/domain/commands/Disconnect.js";
import { Spectate } from "../src/domain/commands/Spectate.js";
import { Harness } from "./support/harness.js";

describe("Disconnect command", () => {
  it("abandons a running match without touching ratings", async () => {
    const harness = new Harness();
    const { bus, registry, users } = harness;
    const matchId = await harness.startDuel();
    await harness.connect("c3", "carol");
    await harness.run(new Spectate("c3", matchId, 0));

    const outcome = await harness.run(new Disconnect("c2", 5_000));

    expect(outcome).toEqual({ ok: true });
    const abandoned = {
      type: "match_abandoned",
      matchId,
      departed: "bob",
      scores: [0, 0],
      at: 5_000,
    };
    expect(bus.lastFor("c1", "match_abandoned")).toEqual(abandoned);
    expect(bus.lastFor("c3", "match_abandoned")).toEqual(abandoned);
    expect(bus.eventsFor("c2", "match_abandoned")).toEqual([]);

    expect(registry.session(matchId)).toBeUndefined();
    expect(registry.isConnected("c2")).toBe(false);
    expect(registry.idleConnections()).toEqual(["c1", "c3"]);
    expect(registry.rematch(matchId)).toBeUndefined();
    expect((await users.findUserByHandle("handle-alice"))?.gamesPlayed).toBe(0);
    expect(bus.on("lobby", "lobby_stats").at(-1)).toEqual({
      type: "lobby_stats",
      inLobby: 2,
      competitive: 0,
      practice: 0,
      spectating: 0,
    });

    const published = bus.messages.length;
    await harness.advance(90_000);
    expect(bus.messages).toHaveLength(published);
  });

  it("withdraws an open offer", async () => {
    const harness = new Harness();
    await harness.connect("c1", "alice");
    await harness.connect("c2", "bob");
    await harness.run(new CreateOffer("c1", undefined, 0));

    await harness.run(new Disconnect("c1", 1_000));

    expect(harness.registry.openOffers()).toEqual([]);
    expect(harness.bus.lastFor("c2", "offer_list_updated")).toEqual({
      type: "offer_list_updated",
      offers: [],
      matches: [],
    });
  });

  it("updates the spectator count when a viewer leaves", async () => {
    const harness = new Harness();
    const matchId = await harness.startDuel();
    await harness.connect("c3", "carol");
    await harness.run(new Spectate("c3", matchId, 0));

    await harness.run(new Disconnect("c3", 2_000));

    expect(harness.bus.lastFor("c1", "spectator_count_changed")).toEqual({
      type: "spectator_count_changed",
      matchId,
      count: 0,
      spectators: [],
      at: 2_000,
    });
    expect(harness.registry.requireSession(matchId).spectators).toEqual([]);
  });

  it("does nothing for connections that never completed the handshake", async () => {
    const harness = new Harness();

    expect(await harness.run(new Disconnect("c9", 0))).toEqual({ ok: true });
    expect(harness.bus.messages).toEqual([]);
  });
});
