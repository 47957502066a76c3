import type { RematchOffer } from "../entities/SessionRegistry.js";
import type { ConnectionId, TimePoint } from "../typedefs.js";
import { publishSpectatorCount, publishToConnections, publishToMatch } from "./Broadcasts.js";
import type { CommandContext } from "./Command.js";
import { createMatch, startMatch } from "./MatchFlow.js";

/**
 * A connection leaves the post-match screen: every rematch offer it is a party to collapses,
 * and it is dropped from the spectators carried over by the others.
 */
export async function leavePostMatch(
  ctx: CommandContext,
  connectionId: ConnectionId,
  at: TimePoint,
): Promise<void> {
  for (const offer of ctx.registry.rematchesInvolving(connectionId)) {
    if (offer.parties.includes(connectionId)) {
      await collapseRematch(ctx, offer, [connectionId], at);
    } else {
      offer.spectators.delete(connectionId);
    }
  }
}

/** Deletes a rematch offer and tells everyone left behind. */
export async function collapseRematch(
  ctx: CommandContext,
  offer: RematchOffer,
  departed: readonly ConnectionId[],
  at: TimePoint,
): Promise<void> {
  const { registry, logger } = ctx;
  registry.closeRematch(offer.previousMatchId);

  const remains = (connectionId: ConnectionId) =>
    !departed.includes(connectionId) && registry.isConnected(connectionId);

  logger?.info?.("Rematch offer collapsed", {
    previousMatchId: offer.previousMatchId,
    departed,
    at,
  });

  await publishToConnections(ctx, offer.parties.filter(remains), {
    type: "rematch_collapsed",
    previousMatchId: offer.previousMatchId,
    reason: "opponent_left",
    at,
  });
  await publishToConnections(ctx, [...offer.spectators].filter(remains), {
    type: "rematch_collapsed",
    previousMatchId: offer.previousMatchId,
    reason: "player_left",
    at,
  });
}

/**
 * Both parties asked for a rematch. Parties and carried-over spectators are re-validated; a
 * party that is gone or busy aborts the handshake.
 */
export async function spawnRematch(
  ctx: CommandContext,
  offer: RematchOffer,
  at: TimePoint,
): Promise<void> {
  const { registry, logger } = ctx;

  const unavailable = offer.parties.filter(
    (connectionId) => !registry.isConnected(connectionId) || !registry.isIdle(connectionId),
  );
  const [first, second] = offer.parties.map((connectionId) =>
    registry.connection(connectionId),
  );
  if (unavailable.length > 0 || !first || !second) {
    await collapseRematch(ctx, offer, unavailable, at);
    return;
  }

  registry.closeRematch(offer.previousMatchId);

  const match = createMatch(ctx, offer.settings, [first, second], at);
  const entry = registry.startSession(match);
  for (const spectator of offer.spectators) {
    if (registry.isConnected(spectator) && registry.isIdle(spectator)) {
      registry.addSpectator(spectator, match.id);
    }
  }

  logger?.info?.("Rematch started", {
    previousMatchId: offer.previousMatchId,
    matchId: match.id,
    spectators: entry.spectators.length,
  });

  await publishToMatch(ctx, match.id, {
    type: "rematch_started",
    previousMatchId: offer.previousMatchId,
    matchId: match.id,
    at,
  });

  await startMatch(entry, ctx, at);
  if (entry.spectators.length > 0) {
    await publishSpectatorCount(ctx, entry, at);
  }
}
