import type { UserHandle } from "../typedefs.js";

export interface User {
  readonly handle: UserHandle;
  readonly nickname: string;
  readonly rating: number;
  readonly gamesPlayed: number;
}

export interface MatchResultEntry {
  readonly handle: UserHandle;
  readonly rating: number;
}

export interface LeaderboardEntry {
  readonly nickname: string;
  readonly rating: number;
  readonly gamesPlayed: number;
}

/**
 * Persistent user storage. Only identities, ratings and play counts cross this boundary;
 * match state is never persisted.
 */
export interface UserGateway {
  findUserByHandle(handle: UserHandle): Promise<User | undefined>;
  findUserByNickname(nickname: string): Promise<User | undefined>;
  createUser(handle: UserHandle, nickname: string, rating: number): Promise<User>;
  /**
   * Stores the new rating of every entry and counts one more game for each. Either every
   * entry is written or, when the call rejects, none is.
   */
  recordMatchResult(results: readonly MatchResultEntry[]): Promise<User[]>;
  /** Highest ratings first. */
  topRatings(limit: number): Promise<LeaderboardEntry[]>;
}
