import { ACCEPTED, rejected, type Outcome } from "../entities/Outcome.js";
import type { ConnectionId, MatchId, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { requireIdentifiers } from "./inputValidation.js";
import { collapseRematch } from "./RematchFlow.js";

/** Leaving the post-match screen of one ended match. */
export class LeavePostMatch extends Command {
  readonly type = "LeavePostMatch" as const;

  constructor(
    public readonly connectionId: ConnectionId,
    public readonly previousMatchId: MatchId,
    public readonly at: TimePoint,
  ) {
    super();
    requireIdentifiers({ connectionId, previousMatchId });
  }

  async execute(ctx: CommandContext): Promise<Outcome> {
    const offer = ctx.registry.rematch(this.previousMatchId);
    if (!offer) return rejected("rematch-not-found");

    if (offer.parties.includes(this.connectionId)) {
      await collapseRematch(ctx, offer, [this.connectionId], this.at);
      return ACCEPTED;
    }

    if (offer.spectators.delete(this.connectionId)) {
      return ACCEPTED;
    }

    return rejected("not-a-participant");
  }
}
