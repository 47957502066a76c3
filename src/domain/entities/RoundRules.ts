import { InvalidMatchStateError } from "../errors/InvalidMatchStateError.js";
import type {
  MatchMode,
  ParticipantIndex,
  RoundEndReason,
  TerminationReason,
} from "../typedefs.js";
import type { MatchState } from "./Match.js";

export function mulberry32(seed: number) {
  return function mulberry32Generator() {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomPermutation(n: number, rng: () => number): number[] {
  const permutation = Array.from({ length: n }, (_, index) => index);
  for (let i = n - 1; i > 0; i -= 1) {
    const j = Math.floor(rng() * (i + 1));
    const atI = permutation[i];
    const atJ = permutation[j];
    if (atI === undefined || atJ === undefined) continue;
    permutation[i] = atJ;
    permutation[j] = atI;
  }
  return permutation;
}

export function opponentOf(index: ParticipantIndex): ParticipantIndex {
  return index === 0 ? 1 : 0;
}

/** How the round before the one being opened came to an end. */
export interface PreviousRound {
  readonly endReason: RoundEndReason;
  /** Participant who timed out or surrendered. */
  readonly loser: ParticipantIndex | null;
  readonly lastCorrectGuesser: ParticipantIndex | null;
}

/**
 * Picks who opens a round. The first round is drawn at random; later rounds go to the
 * loser of the previous round, else to whoever did not make its last correct guess, else
 * alternate by round parity. Practice matches always start with seat 0.
 */
export function resolveOpeningTurn(
  mode: MatchMode,
  roundIndex: number,
  previous: PreviousRound | null,
  random: () => number,
): ParticipantIndex {
  if (mode === "practice") return 0;
  if (roundIndex === 0) return random() < 0.5 ? 0 : 1;
  if (previous && previous.loser !== null) return previous.loser;
  if (previous?.endReason === "completed" && previous.lastCorrectGuesser !== null) {
    return opponentOf(previous.lastCorrectGuesser);
  }
  return roundIndex % 2 === 0 ? 0 : 1;
}

/**
 * Termination predicate evaluated before a round is opened. `roundIndex` is the index of the
 * last opened round (-1 before the first). The remaining playable rounds are the ones not yet
 * opened.
 */
export function terminationReasonFor(
  mode: MatchMode,
  scores: readonly number[],
  roundIndex: number,
  plannedRounds: number,
): TerminationReason {
  const nextRoundIndex = roundIndex + 1;
  if (nextRoundIndex >= plannedRounds) return "completed-all-rounds";

  if (mode === "competitive") {
    const gap = Math.abs((scores[0] ?? 0) - (scores[1] ?? 0));
    const roundsLeft = plannedRounds - nextRoundIndex;
    if (gap > roundsLeft) return "score-unreachable";
  }

  return "ongoing";
}

// -----------------------------------------------------------------------------
//  Assertion function: runtime check of the structural invariants of a match
// -----------------------------------------------------------------------------
export function assertMatchInvariants(state: Readonly<MatchState>): void {
  const fail = (reason: string): never => {
    throw new InvalidMatchStateError(reason, state.id);
  };

  const seats = state.mode === "practice" ? 1 : 2;
  if (state.participants.length !== seats) fail("participant count does not fit the mode");
  if (state.scores.length !== seats) fail("score table does not fit the participants");
  if (state.timeBudgets.length !== seats) fail("time budgets do not fit the participants");
  if (state.turnOwner >= seats) fail("turn owner is not seated");

  for (const score of state.scores) {
    if (!Number.isFinite(score) || score < 0) fail("invalid score value");
  }

  if (state.topicSequence.length === 0) fail("empty topic sequence");

  if (state.terminationReason === "ongoing") {
    if (state.phase === "match-over") fail("match over without a termination reason");
    if (state.roundIndex >= state.topicSequence.length) fail("round index out of range");
  }

  if (state.phase === "round-in-progress" && state.round === null) {
    fail("round in progress without round data");
  }

  const round = state.round;
  if (round) {
    const named = new Set(round.named.map((entry) => entry.item.canonicalKey));
    const remaining = new Set(round.remaining.map((item) => item.canonicalKey));

    for (const key of named) {
      if (remaining.has(key)) fail(`item ${key} is both named and remaining`);
    }
    if (named.size + remaining.size !== round.items.length) {
      fail("named and remaining items do not cover the round");
    }
    for (const item of round.items) {
      if (!named.has(item.canonicalKey) && !remaining.has(item.canonicalKey)) {
        fail(`item ${item.canonicalKey} is neither named nor remaining`);
      }
    }
  }
}
