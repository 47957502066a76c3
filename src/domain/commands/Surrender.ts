import { ACCEPTED, rejected, type Outcome } from "../entities/Outcome.js";
import type { ConnectionId, MatchId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { requireIdentifiers } from "./inputValidation.js";
import { resolveExpiry } from "./MatchFlow.js";

/** The turn owner gives up the round; resolved like a timeout of their clock. */
export class Surrender extends Command {
  readonly type = "Surrender" as const;

  constructor(
    public readonly connectionId: ConnectionId,
    public readonly matchId: MatchId,
    public readonly at: TimePoint,
  ) {
    super();
    requireIdentifiers({ connectionId, matchId });
  }

  async execute(ctx: CommandContext): Promise<Outcome> {
    const { registry, logger } = ctx;

    const entry = registry.session(this.matchId);
    if (!entry) return rejected("match-not-found");

    const seat = entry.match.participantIndexOf(this.connectionId);
    if (seat === undefined) return rejected("not-a-participant");

    const result = entry.match.surrender(seat);
    if (!result.ok) {
      logger?.warn?.("Surrender ignored", {
        type: this.type,
        matchId: this.matchId,
        seat,
        reason: result.reason,
      });
      return result;
    }

    await resolveExpiry(entry, ctx, this.at, result.value);
    return ACCEPTED;
  }
}
