import { ACCEPTED, type Outcome } from "../entities/Outcome.js";
import type { ClockKind, ClockToken, MatchId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { openNextRound, resolveExpiry } from "./MatchFlow.js";

/**
 * Delivered by the scheduler when a turn or pause deadline passes. Honoured only while its
 * token is still the one stored for that clock; anything else is a superseded deadline.
 */
export class ClockExpired extends Command {
  readonly type = "ClockExpired" as const;

  constructor(
    public readonly matchId: MatchId,
    public readonly clock: ClockKind,
    public readonly token: ClockToken,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute(ctx: CommandContext): Promise<Outcome> {
    const { registry, logger } = ctx;

    const entry = registry.session(this.matchId);
    const current =
      entry === undefined
        ? undefined
        : this.clock === "turn"
          ? entry.turnToken
          : entry.pauseToken;

    if (entry === undefined || current !== this.token) {
      logger?.debug?.("Stale clock callback ignored", {
        type: this.type,
        matchId: this.matchId,
        clock: this.clock,
        token: this.token,
      });
      return ACCEPTED;
    }

    if (this.clock === "turn") {
      entry.turnToken = null;
      await resolveExpiry(entry, ctx, this.at, entry.match.expireTurn());
    } else {
      await openNextRound(entry, ctx, this.at);
    }

    return ACCEPTED;
  }
}
