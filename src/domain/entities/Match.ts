import { InvalidMatchStateError } from "../errors/InvalidMatchStateError.js";
import type { GuessEvaluator } from "../ports/GuessEvaluator.js";
import type {
  ConnectionId,
  MatchId,
  MatchMode,
  MatchPhase,
  ParticipantIndex,
  RoundEndReason,
  TerminationReason,
  TimePoint,
  UserHandle,
} from "../typedefs.js";
import type { Catalog, CatalogItem } from "./Catalog.js";
import type { MatchSettings } from "./MatchSettings.js";
import { accepted, rejected, type Result } from "./Outcome.js";
import {
  assertMatchInvariants,
  opponentOf,
  resolveOpeningTurn,
  terminationReasonFor,
  type PreviousRound,
} from "./RoundRules.js";

export type Participant =
  | {
      readonly kind: "human";
      readonly connectionId: ConnectionId;
      readonly handle: UserHandle;
      readonly nickname: string;
      readonly rating: number;
    }
  | {
      readonly kind: "absent";
      readonly handle: UserHandle;
      readonly nickname: string;
    };

export interface NamedItem {
  readonly item: CatalogItem;
  readonly by: ParticipantIndex;
}

export interface RoundInPlay {
  readonly category: string;
  readonly items: readonly CatalogItem[];
  readonly named: NamedItem[];
  readonly remaining: CatalogItem[];
}

export type RoundWinner = ParticipantIndex | "draw" | null;

export interface RoundSummary {
  readonly roundNumber: number;
  readonly category: string;
  /** Items named per seat. */
  readonly namedCounts: readonly number[];
  readonly endReason: RoundEndReason;
  /** Who timed out or surrendered; null for completed rounds. */
  readonly actorNickname: string | null;
  readonly winner: RoundWinner;
  readonly items: ReadonlyArray<{
    readonly displayName: string;
    readonly namedBy: ParticipantIndex | null;
  }>;
}

export interface MatchState {
  readonly id: MatchId;
  readonly mode: MatchMode;
  readonly settings: MatchSettings;
  readonly participants: Participant[];
  readonly scores: number[];
  readonly topicSequence: readonly string[];
  readonly createdAt: TimePoint;
  roundIndex: number;
  phase: MatchPhase;
  turnOwner: ParticipantIndex;
  timeBudgets: number[];
  turnStartedAt: TimePoint | null;
  round: RoundInPlay | null;
  lastCorrectGuesser: ParticipantIndex | null;
  previousRound: PreviousRound | null;
  readonly history: RoundSummary[];
  terminationReason: TerminationReason;
}

export interface MatchInit {
  readonly id: MatchId;
  readonly settings: MatchSettings;
  readonly participants: readonly Participant[];
  readonly topicSequence: readonly string[];
  readonly createdAt: TimePoint;
}

export type RoundOpening =
  | {
      readonly status: "opened";
      readonly category: string;
      readonly turnOwner: ParticipantIndex;
    }
  | { readonly status: "over"; readonly terminationReason: TerminationReason };

export interface TurnExpiry {
  readonly loser: ParticipantIndex;
  readonly reason: "timeout" | "surrender";
  readonly summary: RoundSummary;
}

export type GuessResolution =
  | { readonly kind: "missed"; readonly verdict: "already-named" | "not-found" }
  | {
      readonly kind: "accepted";
      readonly verdict: "exact" | "fuzzy";
      readonly item: CatalogItem;
    }
  | {
      readonly kind: "completed";
      readonly verdict: "exact" | "fuzzy";
      readonly item: CatalogItem;
      readonly summary: RoundSummary;
    }
  | { readonly kind: "too-late"; readonly expiry: TurnExpiry };

export interface MatchSnapshot {
  readonly matchId: MatchId;
  readonly mode: MatchMode;
  readonly phase: MatchPhase;
  readonly roundNumber: number;
  readonly totalRounds: number;
  readonly category: string | null;
  readonly participants: ReadonlyArray<{
    readonly nickname: string;
    readonly present: boolean;
  }>;
  readonly scores: readonly number[];
  readonly turnOwner: ParticipantIndex;
  readonly timeBudgets: readonly number[];
  readonly turnDeadline: TimePoint | null;
  readonly namedItems: ReadonlyArray<{
    readonly displayName: string;
    readonly by: ParticipantIndex;
  }>;
  readonly remainingCount: number;
  readonly history: readonly RoundSummary[];
  readonly terminationReason: TerminationReason;
}

/**
 * State machine of one match:
 * awaiting-round → round-in-progress → round-settling → (round-in-progress | match-over).
 *
 * Every operation is synchronous and runs to completion; scheduling deadlines around it is the
 * caller's job.
 */
export class Match {
  readonly #state: MatchState;
  readonly #catalog: Catalog;

  constructor(init: MatchInit, catalog: Catalog) {
    this.#catalog = catalog;
    this.#state = {
      id: init.id,
      mode: init.settings.mode,
      settings: init.settings,
      participants: [...init.participants],
      scores: init.participants.map(() => 0),
      topicSequence: [...init.topicSequence],
      createdAt: init.createdAt,
      roundIndex: -1,
      phase: "awaiting-round",
      turnOwner: 0,
      timeBudgets: init.participants.map(() => init.settings.timeBankMs),
      turnStartedAt: null,
      round: null,
      lastCorrectGuesser: null,
      previousRound: null,
      history: [],
      terminationReason: "ongoing",
    };
    assertMatchInvariants(this.#state);
  }

  get id(): MatchId {
    return this.#state.id;
  }

  get mode(): MatchMode {
    return this.#state.mode;
  }

  get phase(): MatchPhase {
    return this.#state.phase;
  }

  get settings(): MatchSettings {
    return this.#state.settings;
  }

  get state(): Readonly<MatchState> {
    return this.#state;
  }

  get participants(): readonly Participant[] {
    return this.#state.participants;
  }

  participantIndexOf(connectionId: ConnectionId): ParticipantIndex | undefined {
    const index = this.#state.participants.findIndex(
      (participant) =>
        participant.kind === "human" && participant.connectionId === connectionId,
    );
    return index === 0 ? 0 : index === 1 ? 1 : undefined;
  }

  /**
   * Opens the next round, or ends the match when the termination predicate holds.
   */
  beginRound(random: () => number): RoundOpening {
    const state = this.#state;

    if (state.phase === "match-over") {
      return { status: "over", terminationReason: state.terminationReason };
    }
    if (state.phase === "round-in-progress") {
      throw new InvalidMatchStateError("a round is already in progress", state.id);
    }

    const reason = terminationReasonFor(
      state.mode,
      state.scores,
      state.roundIndex,
      state.topicSequence.length,
    );
    if (reason !== "ongoing") {
      this.#terminate(reason);
      return { status: "over", terminationReason: reason };
    }

    const roundIndex = state.roundIndex + 1;
    const category = state.topicSequence[roundIndex];
    const items = category === undefined ? undefined : this.#catalog.itemsOf(category);
    if (category === undefined || items === undefined || items.length === 0) {
      this.#terminate("internal-error");
      return { status: "over", terminationReason: "internal-error" };
    }

    state.roundIndex = roundIndex;
    state.round = { category, items, named: [], remaining: [...items] };
    state.timeBudgets = state.participants.map(() => state.settings.timeBankMs);
    state.turnOwner = resolveOpeningTurn(
      state.mode,
      roundIndex,
      state.previousRound,
      random,
    );
    state.turnStartedAt = null;
    state.lastCorrectGuesser = null;
    state.phase = "round-in-progress";

    assertMatchInvariants(state);
    return { status: "opened", category, turnOwner: state.turnOwner };
  }

  /** Starts the turn owner's clock and returns the thinking time left to them. */
  startTurn(at: TimePoint): number {
    this.#requireRoundInProgress();
    this.#state.turnStartedAt = at;
    return this.#state.timeBudgets[this.#state.turnOwner] ?? 0;
  }

  turnDeadline(): TimePoint | null {
    const { turnStartedAt, timeBudgets, turnOwner } = this.#state;
    if (turnStartedAt === null) return null;
    return turnStartedAt + (timeBudgets[turnOwner] ?? 0);
  }

  submitGuess(
    actor: ParticipantIndex,
    text: string,
    at: TimePoint,
    evaluator: GuessEvaluator,
  ): Result<GuessResolution> {
    const state = this.#state;
    const round = state.round;

    if (state.phase !== "round-in-progress" || round === null) {
      return rejected("round-not-in-progress");
    }
    if (actor !== state.turnOwner) {
      return rejected("not-your-turn");
    }

    const namedKeys = new Set(round.named.map((entry) => entry.item.canonicalKey));
    const verdict = evaluator.evaluate(text, round.items, namedKeys);
    if (verdict.kind === "already-named" || verdict.kind === "not-found") {
      return accepted<GuessResolution>({ kind: "missed", verdict: verdict.kind });
    }

    const elapsed =
      state.turnStartedAt === null ? 0 : Math.max(0, at - state.turnStartedAt);
    const budget = (state.timeBudgets[actor] ?? 0) - elapsed;
    if (budget < 0) {
      return accepted<GuessResolution>({
        kind: "too-late",
        expiry: this.#expire(actor, "timeout"),
      });
    }

    const position = round.remaining.findIndex(
      (item) => item.canonicalKey === verdict.item.canonicalKey,
    );
    if (position === -1) {
      throw new InvalidMatchStateError(
        `guess resolved to an item outside the round: ${verdict.item.canonicalKey}`,
        state.id,
      );
    }

    state.timeBudgets[actor] = budget;
    round.remaining.splice(position, 1);
    round.named.push({ item: verdict.item, by: actor });
    state.lastCorrectGuesser = actor;
    state.turnStartedAt = null;

    if (round.remaining.length === 0) {
      const summary = this.#completeRound();
      return accepted<GuessResolution>({
        kind: "completed",
        verdict: verdict.kind,
        item: verdict.item,
        summary,
      });
    }

    if (state.mode === "competitive") {
      state.turnOwner = opponentOf(actor);
    }

    assertMatchInvariants(state);
    return accepted<GuessResolution>({
      kind: "accepted",
      verdict: verdict.kind,
      item: verdict.item,
    });
  }

  surrender(actor: ParticipantIndex): Result<TurnExpiry> {
    const state = this.#state;
    if (state.phase !== "round-in-progress") {
      return rejected("round-not-in-progress");
    }
    if (actor !== state.turnOwner) {
      return rejected("not-your-turn");
    }
    return accepted(this.#expire(actor, "surrender"));
  }

  /** Resolves the running turn as a timeout of its owner. */
  expireTurn(): TurnExpiry {
    this.#requireRoundInProgress();
    return this.#expire(this.#state.turnOwner, "timeout");
  }

  /** What `beginRound` would decide right now. */
  terminationPreview(): TerminationReason {
    const state = this.#state;
    if (state.phase === "match-over") return state.terminationReason;
    return terminationReasonFor(
      state.mode,
      state.scores,
      state.roundIndex,
      state.topicSequence.length,
    );
  }

  /** Ends the match because a participant left; no round is settled. */
  abandon(): void {
    this.#terminate("abandoned");
  }

  markAbsent(index: ParticipantIndex): void {
    const participant = this.#state.participants[index];
    if (!participant || participant.kind === "absent") return;
    this.#state.participants[index] = {
      kind: "absent",
      handle: participant.handle,
      nickname: participant.nickname,
    };
  }

  /** 1 for a win, 0 for a loss, 0.5 for a draw, seen from seat 0. */
  outcomeForFirst(): 0 | 0.5 | 1 {
    const [first = 0, second = 0] = this.#state.scores;
    if (first > second) return 1;
    if (first < second) return 0;
    return 0.5;
  }

  winner(): RoundWinner {
    if (this.#state.mode === "practice") return null;
    const outcome = this.outcomeForFirst();
    return outcome === 1 ? 0 : outcome === 0 ? 1 : "draw";
  }

  snapshot(now: TimePoint): MatchSnapshot {
    const state = this.#state;
    const running = state.phase === "round-in-progress" && state.turnStartedAt !== null;
    const elapsed = running && state.turnStartedAt !== null ? now - state.turnStartedAt : 0;

    return {
      matchId: state.id,
      mode: state.mode,
      phase: state.phase,
      roundNumber: state.roundIndex + 1,
      totalRounds: state.topicSequence.length,
      category: state.round?.category ?? null,
      participants: state.participants.map((participant) => ({
        nickname: participant.nickname,
        present: participant.kind === "human",
      })),
      scores: [...state.scores],
      turnOwner: state.turnOwner,
      timeBudgets: state.timeBudgets.map((budget, index) =>
        index === state.turnOwner ? Math.max(0, budget - elapsed) : budget,
      ),
      turnDeadline: running ? this.turnDeadline() : null,
      namedItems: (state.round?.named ?? []).map((entry) => ({
        displayName: entry.item.displayName,
        by: entry.by,
      })),
      remainingCount: state.round?.remaining.length ?? 0,
      history: [...state.history],
      terminationReason: state.terminationReason,
    };
  }

  #completeRound(): RoundSummary {
    const state = this.#state;
    if (state.mode === "competitive") {
      state.scores.forEach((score, index) => {
        state.scores[index] = score + 0.5;
      });
    }
    state.previousRound = {
      endReason: "completed",
      loser: null,
      lastCorrectGuesser: state.lastCorrectGuesser,
    };
    return this.#settle(
      "completed",
      null,
      state.mode === "competitive" ? "draw" : null,
    );
  }

  #expire(loser: ParticipantIndex, reason: "timeout" | "surrender"): TurnExpiry {
    const state = this.#state;
    state.timeBudgets[loser] = 0;

    let winner: RoundWinner = null;
    if (state.mode === "competitive") {
      winner = opponentOf(loser);
      state.scores[winner] = (state.scores[winner] ?? 0) + 1;
    }

    state.previousRound = {
      endReason: reason,
      loser,
      lastCorrectGuesser: state.lastCorrectGuesser,
    };
    const actor = state.participants[loser]?.nickname ?? null;
    return { loser, reason, summary: this.#settle(reason, actor, winner) };
  }

  #settle(
    endReason: RoundEndReason,
    actorNickname: string | null,
    winner: RoundWinner,
  ): RoundSummary {
    const state = this.#state;
    const round = state.round;
    if (round === null) {
      throw new InvalidMatchStateError("no round to settle", state.id);
    }

    const summary: RoundSummary = {
      roundNumber: state.roundIndex + 1,
      category: round.category,
      namedCounts: state.participants.map(
        (_, index) => round.named.filter((entry) => entry.by === index).length,
      ),
      endReason,
      actorNickname,
      winner,
      items: round.items.map((item) => ({
        displayName: item.displayName,
        namedBy:
          round.named.find((entry) => entry.item.canonicalKey === item.canonicalKey)?.by ??
          null,
      })),
    };

    state.history.push(summary);
    state.turnStartedAt = null;
    state.phase = "round-settling";

    assertMatchInvariants(state);
    return summary;
  }

  #terminate(reason: TerminationReason): void {
    this.#state.terminationReason = reason;
    this.#state.phase = "match-over";
    this.#state.turnStartedAt = null;
  }

  #requireRoundInProgress(): void {
    if (this.#state.phase !== "round-in-progress") {
      throw new InvalidMatchStateError(
        `expected a round in progress, found ${this.#state.phase}`,
        this.#state.id,
      );
    }
  }
}
