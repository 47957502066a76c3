import { ACCEPTED, rejected, type Outcome } from "../entities/Outcome.js";
import type { ConnectionId, MatchId, TimePoint } from "../typedefs.js";
import { publishToMatch } from "./Broadcasts.js";
import { Command, type CommandContext } from "./Command.js";
import { requireIdentifiers } from "./inputValidation.js";
import { openNextRound } from "./MatchFlow.js";

/**
 * Request to cut the pause between rounds short. Practice skips at once; competitive matches
 * need a vote from every participant.
 */
export class SkipVote extends Command {
  readonly type = "SkipVote" as const;

  constructor(
    public readonly connectionId: ConnectionId,
    public readonly matchId: MatchId,
    public readonly at: TimePoint,
  ) {
    super();
    requireIdentifiers({ connectionId, matchId });
  }

  async execute(ctx: CommandContext): Promise<Outcome> {
    const entry = ctx.registry.session(this.matchId);
    if (!entry) return rejected("match-not-found");

    const seat = entry.match.participantIndexOf(this.connectionId);
    if (seat === undefined) return rejected("not-a-participant");
    if (entry.pauseToken === null) return rejected("not-paused");

    if (entry.match.mode === "practice") {
      await openNextRound(entry, ctx, this.at);
      return ACCEPTED;
    }

    entry.skipVotes.add(seat);
    const required = entry.match.participants.length;

    await publishToMatch(ctx, this.matchId, {
      type: "skip_vote_update",
      matchId: this.matchId,
      votes: entry.skipVotes.size,
      required,
      at: this.at,
    });

    if (entry.skipVotes.size >= required) {
      ctx.logger?.info?.("Pause skipped by vote", { matchId: this.matchId });
      await openNextRound(entry, ctx, this.at);
    }

    return ACCEPTED;
  }
}
