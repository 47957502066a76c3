/**
 * Identifier and enum aliases shared by the match engine, the registry and the server.
 */

/** Identifier of one live transport connection */
export type ConnectionId = string;

/** Stable identity of a user across connections */
export type UserHandle = string;

/** Unique identifier of a match */
export type MatchId = string;

/** Unique identifier of an open offer */
export type OfferId = string;

/** Absolute time point in milliseconds since Unix epoch */
export type TimePoint = number;

/** Monotonically increasing tag attached to every scheduled deadline */
export type ClockToken = number;

/** Seat of a participant inside a match; stable for the match's lifetime */
export type ParticipantIndex = 0 | 1;

export type MatchMode = "practice" | "competitive";

export type MatchPhase =
  | "awaiting-round"
  | "round-in-progress"
  | "round-settling"
  | "match-over";

export type TerminationReason =
  | "ongoing"
  | "completed-all-rounds"
  | "score-unreachable"
  | "internal-error"
  | "abandoned";

export type RoundEndReason = "timeout" | "surrender" | "completed";

/** Which of the two per-match deadlines a scheduled callback belongs to */
export type ClockKind = "turn" | "pause";
