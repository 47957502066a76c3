export type RejectionReason =
  | "busy"
  | "malformed"
  | "malformed-settings"
  | "too-few-rounds"
  | "offer-not-found"
  | "cannot-join-own-offer"
  | "match-not-found"
  | "not-spectating"
  | "not-your-turn"
  | "round-not-in-progress"
  | "not-a-participant"
  | "not-paused"
  | "rematch-not-found"
  | "not-connected"
  | "duplicate-session"
  | "invalid-nickname"
  | "nickname-taken";

export interface Rejected {
  readonly ok: false;
  readonly reason: RejectionReason;
}

export type Outcome = { readonly ok: true } | Rejected;

export type Result<T> = { readonly ok: true; readonly value: T } | Rejected;

export const ACCEPTED: Outcome = { ok: true };

export function rejected(reason: RejectionReason): Rejected {
  return { ok: false, reason };
}

export function accepted<T>(value: T): Result<T> {
  return { ok: true, value };
}

/** Rejections that only ever come from stale or misbehaving clients. */
export const SILENT_REJECTIONS: ReadonlySet<RejectionReason> = new Set([
  "not-your-turn",
  "round-not-in-progress",
  "not-a-participant",
]);
