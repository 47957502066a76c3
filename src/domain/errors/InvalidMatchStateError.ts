import type { MatchId } from "../typedefs.js";

export class InvalidMatchStateError extends Error {
  constructor(
    public readonly reason: string,
    public readonly matchId: MatchId,
  ) {
    super(`Invalid match state (${matchId}): ${reason}`);
    this.name = "InvalidMatchStateError";
  }
}
