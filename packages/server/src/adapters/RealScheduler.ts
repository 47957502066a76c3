/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type {
  ClockKind,
  ClockToken,
  CommandContext,
  Logger,
  MatchId,
  Outcome,
  Scheduler,
} from "../core.js";
import { ClockExpired, dispatchCommand } from "../core.js";

interface RealSchedulerOptions {
  readonly dispatch?: (command: ClockExpired, ctx: CommandContext) => Promise<Outcome>;
  readonly contextFactory: () => Promise<CommandContext>;
  readonly logger?: Logger;
  readonly now?: () => number;
}

/**
 * Timer-backed scheduler. Superseded deadlines are left to fire; the token they carry is
 * stale by then and the domain ignores them. Timers are only cleared by {@link dispose}.
 */
export class RealScheduler implements Scheduler {
  #timers: Set<ReturnType<typeof setTimeout>> = new Set();
  readonly #dispatch: NonNullable<RealSchedulerOptions["dispatch"]>;
  readonly #contextFactory: RealSchedulerOptions["contextFactory"];
  readonly #logger: Logger | undefined;
  readonly #now: () => number;

  constructor(options: RealSchedulerOptions) {
    this.#dispatch = options.dispatch ?? dispatchCommand;
    this.#contextFactory = options.contextFactory;
    this.#logger = options.logger;
    this.#now = options.now ?? Date.now;
  }

  get pending(): number {
    return this.#timers.size;
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

    const timer = setTimeout(async () => {
      this.#timers.delete(timer);
      try {
        const context = await this.#contextFactory();
        await this.#dispatch(new ClockExpired(matchId, clock, token, this.#now()), context);
      } catch (error) {
        this.#logger?.error?.("Failed to dispatch clock expiry", {
          matchId,
          clock,
          token,
          error,
        });
      }
    }, delayMs);

    this.#timers.add(timer);
    this.#logger?.debug?.("Timeout scheduled", { matchId, clock, token, delayMs });
  }

  /** Clears every outstanding timer; used at shutdown. */
  dispose(): void {
    for (const timer of this.#timers) {
      clearTimeout(timer);
    }
    this.#timers.clear();
  }
}
