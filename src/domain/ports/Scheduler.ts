import type { ClockKind, ClockToken, MatchId } from "../typedefs.js";

/**
 * Infrastructure abstraction responsible for delivering clock expiries to the domain.
 *
 * Implementations may rely on in-memory timers, job queues, or external schedulers. Superseded
 * deadlines are never cancelled: each delivery carries the token it was scheduled with and the
 * domain discards deliveries whose token is no longer current.
 */
export interface Scheduler {
  scheduleTimeout(
    matchId: MatchId,
    clock: ClockKind,
    token: ClockToken,
    delayMs: number,
  ): Promise<void>;
}
