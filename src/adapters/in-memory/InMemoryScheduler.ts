/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { ClockExpired } from "../../domain/commands/ClockExpired.js";
import type { Scheduler } from "../../domain/ports/Scheduler.js";
import type { ClockKind, ClockToken, MatchId, TimePoint } from "../../domain/typedefs.js";

type Dispatch = (command: ClockExpired) => Promise<unknown> | void;

/** Earlier deadlines first; deadlines due at the same instant in the order their tokens were minted. */
function firesBefore(a: ClockExpired, b: ClockExpired): boolean {
  return a.at < b.at || (a.at === b.at && a.token < b.token);
}

/**
 * Virtual turn and pause clocks for tests. Deadlines are kept as the {@link ClockExpired}
 * commands they turn into; {@link runFor} moves the clock forward and hands every deadline that
 * falls due to `dispatch`, one at a time. Superseded deadlines stay queued and are delivered
 * like any other, so tests see the same stale-token deliveries the timer-backed scheduler
 * produces.
 */
export class InMemoryScheduler implements Scheduler {
  readonly #dispatch: Dispatch;
  #now: TimePoint;
  #deadlines: ClockExpired[] = [];

  constructor(dispatch: Dispatch, startAt: TimePoint = 0) {
    this.#dispatch = dispatch;
    this.#now = startAt;
  }

  /** Current virtual time. */
  get now(): TimePoint {
    return this.#now;
  }

  /** Deadlines not yet delivered, in firing order, superseded ones included. */
  get pending(): readonly ClockExpired[] {
    return [...this.#deadlines];
  }

  async scheduleTimeout(
    matchId: MatchId,
    clock: ClockKind,
    token: ClockToken,
    delayMs: number,
  ): Promise<void> {
    if (delayMs < 0) {
      throw new Error("Timeout delay must be non-negative");
    }

    const deadline = new ClockExpired(matchId, clock, token, this.#now + delayMs);
    const position = this.#deadlines.findIndex((queued) => firesBefore(deadline, queued));
    if (position === -1) {
      this.#deadlines.push(deadline);
    } else {
      this.#deadlines.splice(position, 0, deadline);
    }
  }

  /**
   * Advances the clock by `milliseconds`. Deadlines scheduled while a delivery runs are
   * delivered in the same call when they fall due before the target time.
   */
  async runFor(milliseconds: number): Promise<void> {
    if (milliseconds < 0) {
      throw new Error("Cannot run scheduler backwards in time");
    }

    const targetTime = this.#now + milliseconds;
    for (let next = this.#deadlines[0]; next && next.at <= targetTime; next = this.#deadlines[0]) {
      this.#deadlines.shift();
      this.#now = next.at;
      await this.#dispatch(next);
    }
    this.#now = targetTime;
  }
}
