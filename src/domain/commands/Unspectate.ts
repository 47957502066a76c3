import { ACCEPTED, type Outcome } from "../entities/Outcome.js";
import type { ConnectionId, TimePoint } from "../typedefs.js";
import {
  publishLobbyUpdate,
  publishSpectatorCount,
  publishToConnection,
} from "./Broadcasts.js";
import { Command, type CommandContext } from "./Command.js";
import { requireIdentifiers } from "./inputValidation.js";

export class Unspectate extends Command {
  readonly type = "Unspectate" as const;

  constructor(
    public readonly connectionId: ConnectionId,
    public readonly at: TimePoint,
  ) {
    super();
    requireIdentifiers({ connectionId });
  }

  async execute(ctx: CommandContext): Promise<Outcome> {
    const removed = ctx.registry.removeSpectator(this.connectionId);
    if (!removed.ok) return removed;

    const matchId = removed.value.match.id;
    await publishToConnection(ctx, this.connectionId, {
      type: "spectate_ended",
      matchId,
      at: this.at,
    });
    await publishSpectatorCount(ctx, removed.value, this.at);
    await publishLobbyUpdate(ctx);

    return ACCEPTED;
  }
}
