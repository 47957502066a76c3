import { describe, expect, it } from "vitest";

import { Connect } from "../src/domain/commands/Connect.js";
import { GameCommandInputError } from "../src/domain/errors/GameCommandInputError.js";
import { createCommandContext } from "./support/mocks.js";

const NOW = 1_700_000_000_000;

describe("Connect command", () => {
  it("registers a new user and announces the session", async () => {
    const context = createCommandContext();
    const { users, bus, registry } = context;
    users.findUserByHandle.mockResolvedValue(undefined);
    users.findUserByNickname.mockResolvedValue(undefined);
    users.createUser.mockResolvedValue({
      handle: "handle-1",
      nickname: "alice",
      rating: 1500,
      gamesPlayed: 0,
    });

    const outcome = await new Connect("c1", "handle-1", " alice ", NOW).execute(context);

    expect(outcome).toEqual({ ok: true });
    expect(users.createUser).toHaveBeenCalledWith("handle-1", "alice", 1500);
    expect(registry.occupancyOf("c1")).toEqual({ kind: "idle" });
    expect(bus.publish).toHaveBeenNthCalledWith(1, "connection:c1", {
      type: "session_ready",
      connectionId: "c1",
      nickname: "alice",
      rating: 1500,
      gamesPlayed: 0,
      at: NOW,
    });
    expect(bus.publish).toHaveBeenNthCalledWith(2, "lobby", {
      type: "lobby_stats",
      inLobby: 1,
      competitive: 0,
      practice: 0,
      spectating: 0,
    });
    expect(bus.publish).toHaveBeenNthCalledWith(3, "connection:c1", {
      type: "offer_list_updated",
      offers: [],
      matches: [],
    });
  });

  it("restores a returning user under the stored nickname", async () => {
    const context = createCommandContext();
    const { users, registry } = context;
    users.findUserByHandle.mockResolvedValue({
      handle: "handle-1",
      nickname: "alice",
      rating: 1612,
      gamesPlayed: 14,
    });

    await new Connect("c7", "handle-1", undefined, NOW).execute(context);

    expect(users.createUser).not.toHaveBeenCalled();
    expect(registry.connection("c7")).toEqual({
      id: "c7",
      handle: "handle-1",
      nickname: "alice",
      rating: 1612,
    });
  });

  it("rejects nicknames outside the allowed pattern", async () => {
    const context = createCommandContext();
    context.users.findUserByHandle.mockResolvedValue(undefined);

    for (const nickname of [undefined, "al", "alice smith", "a".repeat(21)]) {
      const outcome = await new Connect("c1", "handle-1", nickname, NOW).execute(context);
      expect(outcome).toEqual({ ok: false, reason: "invalid-nickname" });
    }
    expect(context.registry.isConnected("c1")).toBe(false);
  });

  it("rejects a nickname already owned by another handle", async () => {
    const context = createCommandContext();
    context.users.findUserByHandle.mockResolvedValue(undefined);
    context.users.findUserByNickname.mockResolvedValue({
      handle: "handle-2",
      nickname: "Alice",
      rating: 1500,
      gamesPlayed: 3,
    });

    const outcome = await new Connect("c1", "handle-1", "alice", NOW).execute(context);

    expect(outcome).toEqual({ ok: false, reason: "nickname-taken" });
    expect(context.users.createUser).not.toHaveBeenCalled();
  });

  it("refuses a second live session for the same handle", async () => {
    const context = createCommandContext();
    context.registry.register({ id: "c1", handle: "handle-1", nickname: "alice", rating: 1500 });

    const outcome = await new Connect("c2", "handle-1", "alice", NOW).execute(context);

    expect(outcome).toEqual({ ok: false, reason: "duplicate-session" });
    expect(context.users.findUserByHandle).not.toHaveBeenCalled();
    expect(context.bus.publish).not.toHaveBeenCalled();
  });

  it("validates identifiers on construction", () => {
    expect(() => new Connect("c1", "", "alice", NOW)).toThrow(GameCommandInputError);
    expect(() => new Connect("c 1", "handle-1", "alice", NOW)).toThrow(
      "connectionId must be a non-empty string without whitespace",
    );
  });
});
