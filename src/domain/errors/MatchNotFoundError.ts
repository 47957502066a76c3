import type { MatchId } from "../typedefs.js";

export class MatchNotFoundError extends Error {
  constructor(matchId: MatchId) {
    super(`Match not found: ${matchId}`);
    this.name = "MatchNotFoundError";
  }
}
