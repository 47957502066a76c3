import { ACCEPTED, type Outcome } from "../entities/Outcome.js";
import type { ConnectionId, TimePoint } from "../typedefs.js";
import { publishLobbyUpdate, publishSpectatorCount } from "./Broadcasts.js";
import { Command, type CommandContext } from "./Command.js";
import { requireIdentifiers } from "./inputValidation.js";
import { abandonMatch } from "./MatchFlow.js";
import { leavePostMatch } from "./RematchFlow.js";

/**
 * A connection vanished. Its offer is withdrawn, a match it plays in is abandoned without a
 * rating update, and any rematch offer it is part of collapses.
 */
export class Disconnect extends Command {
  readonly type = "Disconnect" as const;

  constructor(
    public readonly connectionId: ConnectionId,
    public readonly at: TimePoint,
  ) {
    super();
    requireIdentifiers({ connectionId });
  }

  async execute(ctx: CommandContext): Promise<Outcome> {
    const { registry, logger } = ctx;

    const slot = registry.occupancyOf(this.connectionId);
    if (!registry.isConnected(this.connectionId) || slot === undefined) {
      return ACCEPTED;
    }

    switch (slot.kind) {
      case "offer":
        registry.withdrawOffer(this.connectionId);
        break;

      case "participant": {
        // a seat always belongs to a live session
        await abandonMatch(registry.requireSession(slot.matchId), ctx, slot.index, this.at);
        break;
      }

      case "spectator": {
        const removed = registry.removeSpectator(this.connectionId);
        if (removed.ok) {
          await publishSpectatorCount(ctx, removed.value, this.at);
        }
        break;
      }

      case "idle":
        break;
    }

    await leavePostMatch(ctx, this.connectionId, this.at);
    registry.unregister(this.connectionId);

    logger?.info?.("Connection closed", {
      type: this.type,
      connectionId: this.connectionId,
      slot: slot.kind,
    });

    await publishLobbyUpdate(ctx);
    return ACCEPTED;
  }
}
