import { ACCEPTED, rejected, type Outcome } from "../entities/Outcome.js";
import type { ConnectionId, TimePoint, UserHandle } from "../typedefs.js";
import { publishLobbyUpdate, publishToConnection } from "./Broadcasts.js";
import { Command, type CommandContext } from "./Command.js";
import { requireIdentifiers } from "./inputValidation.js";

const NICKNAME_PATTERN = /^[A-Za-z0-9_-]{3,20}$/;

/**
 * Identity handshake of a fresh connection. Unknown handles register with the given nickname;
 * a handle already bound to a live connection is refused.
 */
export class Connect extends Command {
  readonly type = "Connect" as const;

  constructor(
    public readonly connectionId: ConnectionId,
    public readonly handle: UserHandle,
    public readonly nickname: string | undefined,
    public readonly at: TimePoint,
  ) {
    super();
    requireIdentifiers({ connectionId, handle });
  }

  async execute(ctx: CommandContext): Promise<Outcome> {
    const { registry, users, config, logger } = ctx;

    if (
      registry.isConnected(this.connectionId) ||
      registry.connectionByHandle(this.handle) !== undefined
    ) {
      logger?.warn?.("Connect refused; handle already has a live session", {
        type: this.type,
        connectionId: this.connectionId,
        handle: this.handle,
      });
      return rejected("duplicate-session");
    }

    let user = await users.findUserByHandle(this.handle);
    if (!user) {
      const nickname = this.nickname?.trim() ?? "";
      if (!NICKNAME_PATTERN.test(nickname)) {
        return rejected("invalid-nickname");
      }
      if ((await users.findUserByNickname(nickname)) !== undefined) {
        return rejected("nickname-taken");
      }

      user = await users.createUser(this.handle, nickname, config.initialRating);
      logger?.info?.("User registered", {
        type: this.type,
        handle: this.handle,
        nickname,
      });
    }

    registry.register({
      id: this.connectionId,
      handle: user.handle,
      nickname: user.nickname,
      rating: user.rating,
    });

    await publishToConnection(ctx, this.connectionId, {
      type: "session_ready",
      connectionId: this.connectionId,
      nickname: user.nickname,
      rating: user.rating,
      gamesPlayed: user.gamesPlayed,
      at: this.at,
    });
    await publishLobbyUpdate(ctx);

    return ACCEPTED;
  }
}
