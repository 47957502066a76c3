import { ACCEPTED, rejected, type Outcome } from "../entities/Outcome.js";
import type { ConnectionId, MatchId, TimePoint } from "../typedefs.js";
import { publishLobbyUpdate, publishToConnections } from "./Broadcasts.js";
import { Command, type CommandContext } from "./Command.js";
import { requireIdentifiers } from "./inputValidation.js";
import { spawnRematch } from "./RematchFlow.js";

export class RequestRematch extends Command {
  readonly type = "RequestRematch" as const;

  constructor(
    public readonly connectionId: ConnectionId,
    public readonly previousMatchId: MatchId,
    public readonly at: TimePoint,
  ) {
    super();
    requireIdentifiers({ connectionId, previousMatchId });
  }

  async execute(ctx: CommandContext): Promise<Outcome> {
    const { registry, logger } = ctx;

    const requester = registry.connection(this.connectionId);
    if (!requester) return rejected("not-connected");

    const offer = registry.rematch(this.previousMatchId);
    if (!offer) return rejected("rematch-not-found");

    const [first, second] = offer.parties;
    const seat =
      first === this.connectionId ? 0 : second === this.connectionId ? 1 : undefined;
    if (seat === undefined) return rejected("not-a-participant");

    offer.requested.add(seat);
    logger?.info?.("Rematch requested", {
      type: this.type,
      previousMatchId: this.previousMatchId,
      seat,
      requests: offer.requested.size,
    });

    if (offer.requested.size < offer.parties.length) {
      await publishToConnections(
        ctx,
        [...offer.parties, ...offer.spectators].filter((connectionId) =>
          registry.isConnected(connectionId),
        ),
        {
          type: "rematch_pending",
          previousMatchId: this.previousMatchId,
          requestedBy: requester.nickname,
          requests: offer.requested.size,
          at: this.at,
        },
      );
      return ACCEPTED;
    }

    await spawnRematch(ctx, offer, this.at);
    await publishLobbyUpdate(ctx);
    return ACCEPTED;
  }
}
