import type { SessionEntry } from "../entities/SessionRegistry.js";
import type { ConnectionId, MatchId, TimePoint } from "../typedefs.js";
import type { CommandContext } from "./Command.js";

export const LOBBY_CHANNEL = "lobby";

export function connectionChannel(connectionId: ConnectionId): string {
  return `connection:${connectionId}`;
}

export async function publishToConnection(
  ctx: CommandContext,
  connectionId: ConnectionId,
  event: object,
): Promise<void> {
  await ctx.bus.publish(connectionChannel(connectionId), event);
}

export async function publishToConnections(
  ctx: CommandContext,
  connectionIds: Iterable<ConnectionId>,
  event: object,
): Promise<void> {
  for (const connectionId of connectionIds) {
    await publishToConnection(ctx, connectionId, event);
  }
}

/** Sends an event to every seated participant still present and every spectator. */
export async function publishToMatch(
  ctx: CommandContext,
  matchId: MatchId,
  event: object,
): Promise<void> {
  await publishToConnections(ctx, ctx.registry.audienceOf(matchId), event);
}

export async function publishSpectatorCount(
  ctx: CommandContext,
  entry: SessionEntry,
  at: TimePoint,
): Promise<void> {
  const nicknames = entry.spectators.flatMap((connectionId) => {
    const profile = ctx.registry.connection(connectionId);
    return profile ? [profile.nickname] : [];
  });

  await publishToMatch(ctx, entry.match.id, {
    type: "spectator_count_changed",
    matchId: entry.match.id,
    count: entry.spectators.length,
    spectators: nicknames,
    at,
  });
}

/**
 * Recomputes the lobby view: aggregate counts for everyone, and the open offers and
 * spectatable matches for every idle connection.
 */
export async function publishLobbyUpdate(ctx: CommandContext): Promise<void> {
  const { registry, bus } = ctx;

  await bus.publish(LOBBY_CHANNEL, { type: "lobby_stats", ...registry.stats() });

  const listing = {
    type: "offer_list_updated",
    offers: registry.offerListings(),
    matches: registry.matchListings(),
  };
  await publishToConnections(ctx, registry.idleConnections(), listing);
}
