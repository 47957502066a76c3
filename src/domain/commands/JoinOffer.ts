import { ACCEPTED, rejected, type Outcome } from "../entities/Outcome.js";
import type { ConnectionId, OfferId, TimePoint } from "../typedefs.js";
import { publishLobbyUpdate } from "./Broadcasts.js";
import { Command, type CommandContext } from "./Command.js";
import { requireIdentifiers } from "./inputValidation.js";
import { createMatch, startMatch } from "./MatchFlow.js";
import { leavePostMatch } from "./RematchFlow.js";

/** Takes an open offer; the creator sits at seat 0, the joiner at seat 1. */
export class JoinOffer extends Command {
  readonly type = "JoinOffer" as const;

  constructor(
    public readonly connectionId: ConnectionId,
    public readonly offerId: OfferId,
    public readonly at: TimePoint,
  ) {
    super();
    requireIdentifiers({ connectionId, offerId });
  }

  async execute(ctx: CommandContext): Promise<Outcome> {
    const { registry, logger } = ctx;

    const joiner = registry.connection(this.connectionId);
    if (!joiner) return rejected("not-connected");

    const taken = registry.takeOffer(this.connectionId, this.offerId);
    if (!taken.ok) {
      logger?.info?.("Join refused", {
        type: this.type,
        offerId: this.offerId,
        connectionId: this.connectionId,
        reason: taken.reason,
      });
      return taken;
    }

    const creator = registry.connection(taken.value.creator);
    if (!creator) {
      throw new Error(`Offer ${taken.value.id} belongs to an unknown connection`);
    }

    await leavePostMatch(ctx, this.connectionId, this.at);

    const match = createMatch(ctx, taken.value.settings, [creator, joiner], this.at);
    const entry = registry.startSession(match);

    logger?.info?.("Offer joined", {
      type: this.type,
      offerId: taken.value.id,
      matchId: match.id,
    });

    await startMatch(entry, ctx, this.at);
    await publishLobbyUpdate(ctx);

    return ACCEPTED;
  }
}
