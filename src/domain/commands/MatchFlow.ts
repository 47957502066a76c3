import { Match, type Participant, type RoundSummary, type TurnExpiry } from "../entities/Match.js";
import { drawTopicSequence, type MatchSettings } from "../entities/MatchSettings.js";
import type { ConnectionProfile, SessionEntry } from "../entities/SessionRegistry.js";
import type { ParticipantIndex, TimePoint } from "../typedefs.js";
import {
  LOBBY_CHANNEL,
  publishLobbyUpdate,
  publishToMatch,
} from "./Broadcasts.js";
import type { CommandContext } from "./Command.js";

export interface RatingChange {
  readonly nickname: string;
  readonly before: number;
  readonly after: number;
}

type RatingResult =
  | { readonly status: "applied"; readonly changes: readonly RatingChange[] }
  | { readonly status: "unavailable" | "unrated"; readonly changes: null };

/** Builds a match for the given connections, seated in the order given. */
export function createMatch(
  ctx: CommandContext,
  settings: MatchSettings,
  profiles: readonly ConnectionProfile[],
  at: TimePoint,
): Match {
  const participants: Participant[] = profiles.map((profile) => ({
    kind: "human",
    connectionId: profile.id,
    handle: profile.handle,
    nickname: profile.nickname,
    rating: profile.rating,
  }));

  return new Match(
    {
      id: ctx.registry.nextMatchId(),
      settings,
      participants,
      topicSequence: drawTopicSequence(settings, ctx.catalog, ctx.random),
      createdAt: at,
    },
    ctx.catalog,
  );
}

export async function startMatch(
  entry: SessionEntry,
  ctx: CommandContext,
  at: TimePoint,
): Promise<void> {
  const { match } = entry;

  ctx.logger?.info?.("Match started", {
    matchId: match.id,
    mode: match.mode,
    topics: match.state.topicSequence,
    at,
  });

  await publishToMatch(ctx, match.id, {
    type: "match_started",
    matchId: match.id,
    mode: match.mode,
    participants: match.participants.map((participant) => ({
      nickname: participant.nickname,
      rating: participant.kind === "human" ? participant.rating : null,
    })),
    totalRounds: match.state.topicSequence.length,
    timeBankMs: match.settings.timeBankMs,
    at,
  });

  await openNextRound(entry, ctx, at);
}

/** Leaves the pause (if any) and deals the next round, or ends the match. */
export async function openNextRound(
  entry: SessionEntry,
  ctx: CommandContext,
  at: TimePoint,
): Promise<void> {
  entry.pauseToken = null;
  entry.pauseEndsAt = null;
  entry.skipVotes.clear();

  const opening = entry.match.beginRound(ctx.random);
  if (opening.status === "over") {
    await finishMatch(entry, ctx, at);
    return;
  }

  ctx.logger?.info?.("Round opened", {
    matchId: entry.match.id,
    round: entry.match.state.roundIndex + 1,
    category: opening.category,
    turnOwner: opening.turnOwner,
    at,
  });

  await startTurn(entry, ctx, at);
}

/**
 * Arms the turn clock for the current turn owner. An owner with no time left expires on the
 * spot instead of waiting for a callback.
 */
export async function startTurn(
  entry: SessionEntry,
  ctx: CommandContext,
  at: TimePoint,
): Promise<void> {
  const { match } = entry;
  const remaining = match.startTurn(at);

  if (remaining <= 0) {
    entry.turnToken = null;
    await resolveExpiry(entry, ctx, at, match.expireTurn());
    return;
  }

  const token = ctx.registry.armTurnClock(entry);
  await ctx.scheduler.scheduleTimeout(match.id, "turn", token, remaining);

  await publishToMatch(ctx, match.id, {
    type: "turn_updated",
    matchId: match.id,
    state: match.snapshot(at),
    at,
  });
}

export async function resolveExpiry(
  entry: SessionEntry,
  ctx: CommandContext,
  at: TimePoint,
  expiry: TurnExpiry,
): Promise<void> {
  const { match } = entry;
  entry.turnToken = null;

  ctx.logger?.info?.("Turn expired", {
    matchId: match.id,
    loser: expiry.loser,
    reason: expiry.reason,
    at,
  });

  await publishToMatch(ctx, match.id, {
    type: "turn_expired",
    matchId: match.id,
    loser: expiry.loser,
    reason: expiry.reason,
    timeBudgets: [...match.state.timeBudgets],
    scores: [...match.state.scores],
    at,
  });

  await settleRound(entry, ctx, at, expiry.summary);
}

/** Announces the settled round and arms the pause clock. */
export async function settleRound(
  entry: SessionEntry,
  ctx: CommandContext,
  at: TimePoint,
  summary: RoundSummary,
): Promise<void> {
  const { match } = entry;
  const pauseMs = ctx.config.pauseBetweenRoundsMs;

  entry.turnToken = null;
  entry.skipVotes.clear();
  entry.pauseEndsAt = at + pauseMs;
  const token = ctx.registry.armPauseClock(entry);
  await ctx.scheduler.scheduleTimeout(match.id, "pause", token, pauseMs);

  await publishToMatch(ctx, match.id, {
    type: "round_settled",
    matchId: match.id,
    round: summary,
    scores: [...match.state.scores],
    pauseEndsAt: entry.pauseEndsAt,
    matchOverAfterPause: match.terminationPreview() !== "ongoing",
    at,
  });
}

/**
 * Final bookkeeping of a match that reached its termination predicate: ratings (competitive
 * only), the summary broadcast, release of every member to the idle pool and the rematch offer.
 */
export async function finishMatch(
  entry: SessionEntry,
  ctx: CommandContext,
  at: TimePoint,
): Promise<void> {
  const { match } = entry;
  entry.turnToken = null;
  entry.pauseToken = null;

  const rating: RatingResult =
    match.mode === "competitive"
      ? await applyRatings(entry, ctx)
      : { status: "unrated", changes: null };

  await publishToMatch(ctx, match.id, {
    type: "match_ended",
    matchId: match.id,
    terminationReason: match.state.terminationReason,
    scores: [...match.state.scores],
    winner: match.winner(),
    history: [...match.state.history],
    ratingChanges: rating.changes,
    ratingStatus: rating.status,
    at,
  });

  const spectators = [...entry.spectators];
  ctx.registry.endSession(match.id);

  ctx.logger?.info?.("Match finished", {
    matchId: match.id,
    reason: match.state.terminationReason,
    scores: match.state.scores,
  });

  const [first, second] = match.participants;
  if (match.mode === "competitive" && first?.kind === "human" && second?.kind === "human") {
    ctx.registry.openRematch({
      previousMatchId: match.id,
      parties: [first.connectionId, second.connectionId],
      spectators: new Set(
        spectators.filter((connectionId) => ctx.registry.isConnected(connectionId)),
      ),
      settings: match.settings,
      requested: new Set(),
    });
  }

  if (rating.status === "applied") {
    await ctx.bus.publish(LOBBY_CHANNEL, {
      type: "leaderboard_updated",
      leaderboard: await ctx.users.topRatings(ctx.config.leaderboardSize),
    });
  }

  await publishLobbyUpdate(ctx);
}

/**
 * Ends a match because a participant left. No round is settled and no rating is applied.
 */
export async function abandonMatch(
  entry: SessionEntry,
  ctx: CommandContext,
  departed: ParticipantIndex,
  at: TimePoint,
): Promise<void> {
  const { match } = entry;
  const nickname = match.participants[departed]?.nickname ?? null;

  match.markAbsent(departed);
  match.abandon();
  entry.turnToken = null;
  entry.pauseToken = null;

  ctx.logger?.warn?.("Match abandoned", { matchId: match.id, departed: nickname, at });

  await publishToMatch(ctx, match.id, {
    type: "match_abandoned",
    matchId: match.id,
    departed: nickname,
    scores: [...match.state.scores],
    at,
  });

  ctx.registry.endSession(match.id);
}

async function applyRatings(
  entry: SessionEntry,
  ctx: CommandContext,
): Promise<RatingResult> {
  const { match } = entry;
  const { users, ratings, registry, logger } = ctx;
  const [first, second] = match.participants;

  if (first?.kind !== "human" || second?.kind !== "human") {
    return { status: "unrated", changes: null };
  }

  try {
    const [userA, userB] = await Promise.all([
      users.findUserByHandle(first.handle),
      users.findUserByHandle(second.handle),
    ]);
    if (!userA || !userB) {
      throw new Error("Rated participant has no stored user");
    }

    const update = await ratings.applyOutcome(userA, userB, match.outcomeForFirst());

    await users.recordMatchResult([
      { handle: userA.handle, rating: update.newRatingA },
      { handle: userB.handle, rating: update.newRatingB },
    ]);

    registry.updateRating(first.connectionId, update.newRatingA);
    registry.updateRating(second.connectionId, update.newRatingB);

    return {
      status: "applied",
      changes: [
        { nickname: first.nickname, before: userA.rating, after: update.newRatingA },
        { nickname: second.nickname, before: userB.rating, after: update.newRatingB },
      ],
    };
  } catch (error) {
    logger?.error?.("Rating update failed; sending summary without rating changes", {
      matchId: match.id,
      error,
    });
    return { status: "unavailable", changes: null };
  }
}
