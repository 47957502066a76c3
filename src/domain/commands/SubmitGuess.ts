import { GameCommandInputError } from "../errors/GameCommandInputError.js";
import { ACCEPTED, rejected, type Outcome } from "../entities/Outcome.js";
import type { ConnectionId, MatchId, TimePoint } from "../typedefs.js";
import { publishToConnection } from "./Broadcasts.js";
import { Command, type CommandContext } from "./Command.js";
import { requireIdentifiers } from "./inputValidation.js";
import { resolveExpiry, settleRound, startTurn } from "./MatchFlow.js";

const MAX_GUESS_LENGTH = 200;

export class SubmitGuess extends Command {
  readonly type = "SubmitGuess" as const;

  constructor(
    public readonly connectionId: ConnectionId,
    public readonly matchId: MatchId,
    public readonly text: string,
    public readonly at: TimePoint,
  ) {
    super();
    requireIdentifiers({ connectionId, matchId });

    if (typeof text !== "string" || text.length > MAX_GUESS_LENGTH) {
      throw GameCommandInputError.because([
        `Guess must be a string of at most ${MAX_GUESS_LENGTH} characters`,
      ]);
    }
  }

  async execute(ctx: CommandContext): Promise<Outcome> {
    const { registry, evaluator, logger } = ctx;

    const entry = registry.session(this.matchId);
    if (!entry) return rejected("match-not-found");

    const seat = entry.match.participantIndexOf(this.connectionId);
    if (seat === undefined) {
      logger?.warn?.("Guess from a non-participant ignored", {
        type: this.type,
        matchId: this.matchId,
        connectionId: this.connectionId,
      });
      return rejected("not-a-participant");
    }

    const result = entry.match.submitGuess(seat, this.text, this.at, evaluator);
    if (!result.ok) {
      logger?.warn?.("Guess ignored", {
        type: this.type,
        matchId: this.matchId,
        seat,
        reason: result.reason,
      });
      return result;
    }

    const resolution = result.value;
    switch (resolution.kind) {
      case "missed":
        await publishToConnection(ctx, this.connectionId, {
          type: "guess_result",
          matchId: this.matchId,
          verdict: resolution.verdict,
          at: this.at,
        });
        break;

      case "too-late":
        await publishToConnection(ctx, this.connectionId, {
          type: "guess_result",
          matchId: this.matchId,
          verdict: "too-late",
          at: this.at,
        });
        await resolveExpiry(entry, ctx, this.at, resolution.expiry);
        break;

      case "accepted":
      case "completed":
        await publishToConnection(ctx, this.connectionId, {
          type: "guess_result",
          matchId: this.matchId,
          verdict: resolution.verdict,
          item: resolution.item.displayName,
          at: this.at,
        });
        if (resolution.kind === "completed") {
          await settleRound(entry, ctx, this.at, resolution.summary);
        } else {
          await startTurn(entry, ctx, this.at);
        }
        break;
    }

    return ACCEPTED;
  }
}
