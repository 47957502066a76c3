import { ACCEPTED, type Outcome } from "../entities/Outcome.js";
import type { ConnectionId, TimePoint } from "../typedefs.js";
import { publishLobbyUpdate, publishToConnection } from "./Broadcasts.js";
import { Command, type CommandContext } from "./Command.js";
import { requireIdentifiers } from "./inputValidation.js";

export class CancelOffer extends Command {
  readonly type = "CancelOffer" as const;

  constructor(
    public readonly connectionId: ConnectionId,
    public readonly at: TimePoint,
  ) {
    super();
    requireIdentifiers({ connectionId });
  }

  async execute(ctx: CommandContext): Promise<Outcome> {
    const withdrawn = ctx.registry.withdrawOffer(this.connectionId);
    if (!withdrawn.ok) return withdrawn;

    ctx.logger?.info?.("Offer cancelled", {
      type: this.type,
      offerId: withdrawn.value.id,
    });

    await publishToConnection(ctx, this.connectionId, {
      type: "offer_cancelled",
      offerId: withdrawn.value.id,
      at: this.at,
    });
    await publishLobbyUpdate(ctx);

    return ACCEPTED;
  }
}
