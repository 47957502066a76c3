import type { Catalog } from "../entities/Catalog.js";
import type { Outcome } from "../entities/Outcome.js";
import type { SessionRegistry } from "../entities/SessionRegistry.js";
import type { GameConfig } from "../GameConfig.js";
import type { GuessEvaluator } from "../ports/GuessEvaluator.js";
import type { Logger } from "../ports/Logger.js";
import type { MessageBus } from "../ports/MessageBus.js";
import type { RatingService } from "../ports/RatingService.js";
import type { Scheduler } from "../ports/Scheduler.js";
import type { UserGateway } from "../ports/UserGateway.js";
import type { TimePoint } from "../typedefs.js";

export interface CommandContext {
  readonly registry: SessionRegistry;
  readonly catalog: Catalog;
  readonly evaluator: GuessEvaluator;
  readonly users: UserGateway;
  readonly ratings: RatingService;
  readonly bus: MessageBus;
  readonly scheduler: Scheduler;
  readonly config: GameConfig;
  /** Source of randomness for topic draws and the first opener. */
  readonly random: () => number;
  readonly logger?: Logger;
}

export abstract class Command {
  abstract readonly type: string;
  abstract readonly at: TimePoint;
  abstract execute(ctx: CommandContext): Promise<Outcome>;
}
