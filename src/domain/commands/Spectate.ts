import { ACCEPTED, rejected, type Outcome } from "../entities/Outcome.js";
import type { ConnectionId, MatchId, TimePoint } from "../typedefs.js";
import {
  publishLobbyUpdate,
  publishSpectatorCount,
  publishToConnection,
} from "./Broadcasts.js";
import { Command, type CommandContext } from "./Command.js";
import { requireIdentifiers } from "./inputValidation.js";
import { leavePostMatch } from "./RematchFlow.js";

export class Spectate extends Command {
  readonly type = "Spectate" as const;

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
    if (!registry.isConnected(this.connectionId)) return rejected("not-connected");

    const added = registry.addSpectator(this.connectionId, this.matchId);
    if (!added.ok) return added;

    await leavePostMatch(ctx, this.connectionId, this.at);

    logger?.info?.("Spectator joined", {
      type: this.type,
      matchId: this.matchId,
      connectionId: this.connectionId,
    });

    await publishToConnection(ctx, this.connectionId, {
      type: "spectate_started",
      matchId: this.matchId,
      state: added.value.match.snapshot(this.at),
      at: this.at,
    });
    await publishSpectatorCount(ctx, added.value, this.at);
    await publishLobbyUpdate(ctx);

    return ACCEPTED;
  }
}
