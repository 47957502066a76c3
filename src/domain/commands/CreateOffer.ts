import { resolveSettings } from "../entities/MatchSettings.js";
import { ACCEPTED, rejected, type Outcome } from "../entities/Outcome.js";
import type { ConnectionId, TimePoint } from "../typedefs.js";
import { publishLobbyUpdate, publishToConnection } from "./Broadcasts.js";
import { Command, type CommandContext } from "./Command.js";
import { requireIdentifiers } from "./inputValidation.js";
import { createMatch, startMatch } from "./MatchFlow.js";
import { leavePostMatch } from "./RematchFlow.js";

/**
 * Opens a competitive offer, or starts a practice match right away.
 * `settings` is the raw client payload; it is validated here.
 */
export class CreateOffer extends Command {
  readonly type = "CreateOffer" as const;

  constructor(
    public readonly connectionId: ConnectionId,
    public readonly settings: unknown,
    public readonly at: TimePoint,
  ) {
    super();
    requireIdentifiers({ connectionId });
  }

  async execute(ctx: CommandContext): Promise<Outcome> {
    const { registry, catalog, config, logger } = ctx;

    const creator = registry.connection(this.connectionId);
    if (!creator) return rejected("not-connected");
    if (!registry.isIdle(this.connectionId)) return rejected("busy");

    const settings = resolveSettings(this.settings, catalog, config);
    if (!settings.ok) {
      logger?.info?.("Offer refused; invalid settings", {
        type: this.type,
        connectionId: this.connectionId,
        reason: settings.reason,
      });
      return settings;
    }

    await leavePostMatch(ctx, this.connectionId, this.at);

    if (settings.value.mode === "practice") {
      const match = createMatch(ctx, settings.value, [creator], this.at);
      const entry = registry.startSession(match);
      await startMatch(entry, ctx, this.at);
      await publishLobbyUpdate(ctx);
      return ACCEPTED;
    }

    const offer = registry.openOffer(this.connectionId, settings.value, this.at);
    if (!offer.ok) return offer;

    logger?.info?.("Offer opened", {
      type: this.type,
      offerId: offer.value.id,
      creator: creator.nickname,
    });

    await publishToConnection(ctx, this.connectionId, {
      type: "offer_created",
      offerId: offer.value.id,
      settings: {
        mode: settings.value.mode,
        timeBankSeconds: Math.round(settings.value.timeBankMs / 1000),
        roundCount: settings.value.roundCount,
      },
      at: this.at,
    });
    await publishLobbyUpdate(ctx);

    return ACCEPTED;
  }
}
