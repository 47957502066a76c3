export type {
  Command,
  CommandContext,
} from "@quiz-duel/core/domain/commands/Command.js";
export { CancelOffer } from "@quiz-duel/core/domain/commands/CancelOffer.js";
export { ClockExpired } from "@quiz-duel/core/domain/commands/ClockExpired.js";
export { Connect } from "@quiz-duel/core/domain/commands/Connect.js";
export { CreateOffer } from "@quiz-duel/core/domain/commands/CreateOffer.js";
export { Disconnect } from "@quiz-duel/core/domain/commands/Disconnect.js";
export { JoinOffer } from "@quiz-duel/core/domain/commands/JoinOffer.js";
export { LeavePostMatch } from "@quiz-duel/core/domain/commands/LeavePostMatch.js";
export { RequestRematch } from "@quiz-duel/core/domain/commands/RequestRematch.js";
export { SkipVote } from "@quiz-duel/core/domain/commands/SkipVote.js";
export { Spectate } from "@quiz-duel/core/domain/commands/Spectate.js";
export { SubmitGuess } from "@quiz-duel/core/domain/commands/SubmitGuess.js";
export { Surrender } from "@quiz-duel/core/domain/commands/Surrender.js";
export { Unspectate } from "@quiz-duel/core/domain/commands/Unspectate.js";
export {
  LOBBY_CHANNEL,
  connectionChannel,
} from "@quiz-duel/core/domain/commands/Broadcasts.js";
export { dispatchCommand } from "@quiz-duel/core/domain/commands/dispatchCommand.js";
export { Catalog } from "@quiz-duel/core/domain/entities/Catalog.js";
export { FuzzyGuessEvaluator } from "@quiz-duel/core/domain/entities/GuessEvaluator.js";
export type { MatchSnapshot } from "@quiz-duel/core/domain/entities/Match.js";
export {
  SILENT_REJECTIONS,
  type Outcome,
  type RejectionReason,
} from "@quiz-duel/core/domain/entities/Outcome.js";
export { mulberry32 } from "@quiz-duel/core/domain/entities/RoundRules.js";
export { SessionRegistry } from "@quiz-duel/core/domain/entities/SessionRegistry.js";
export { CatalogLoadError } from "@quiz-duel/core/domain/errors/CatalogLoadError.js";
export { GameCommandInputError } from "@quiz-duel/core/domain/errors/GameCommandInputError.js";
export type { GameConfig } from "@quiz-duel/core/domain/GameConfig.js";
export { createGameConfig } from "@quiz-duel/core/domain/GameConfig.js";
export type { CatalogSource } from "@quiz-duel/core/domain/ports/CatalogSource.js";
export type { Logger } from "@quiz-duel/core/domain/ports/Logger.js";
export type { MessageBus } from "@quiz-duel/core/domain/ports/MessageBus.js";
export type { Scheduler } from "@quiz-duel/core/domain/ports/Scheduler.js";
export type { UserGateway } from "@quiz-duel/core/domain/ports/UserGateway.js";
export type {
  ClockKind,
  ClockToken,
  ConnectionId,
  MatchId,
  TimePoint,
} from "@quiz-duel/core/domain/typedefs.js";
export { InMemoryUserGateway } from "@quiz-duel/core/adapters/in-memory/InMemoryUserGateway.js";
export { EloRatingService } from "@quiz-duel/core/adapters/rating/EloRatingService.js";
