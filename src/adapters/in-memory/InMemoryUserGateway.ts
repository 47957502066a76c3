/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type {
  LeaderboardEntry,
  MatchResultEntry,
  User,
  UserGateway,
} from "../../domain/ports/UserGateway.js";
import type { UserHandle } from "../../domain/typedefs.js";

export class InMemoryUserGateway implements UserGateway {
  #users = new Map<UserHandle, User>();

  async findUserByHandle(handle: UserHandle): Promise<User | undefined> {
    const user = this.#users.get(handle);
    return user ? this.#clone(user) : undefined;
  }

  async findUserByNickname(nickname: string): Promise<User | undefined> {
    const wanted = nickname.toLowerCase();
    for (const user of this.#users.values()) {
      if (user.nickname.toLowerCase() === wanted) {
        return this.#clone(user);
      }
    }
    return undefined;
  }

  async createUser(handle: UserHandle, nickname: string, rating: number): Promise<User> {
    if (this.#users.has(handle)) {
      throw new Error(`User ${handle} already exists`);
    }
    const user: User = { handle, nickname, rating, gamesPlayed: 0 };
    this.#users.set(handle, user);
    return this.#clone(user);
  }

  async recordMatchResult(results: readonly MatchResultEntry[]): Promise<User[]> {
    // every handle is resolved before anything is written
    const updated = results.map(({ handle, rating }): User => {
      const user = this.#require(handle);
      return { ...user, rating, gamesPlayed: user.gamesPlayed + 1 };
    });

    for (const user of updated) {
      this.#users.set(user.handle, user);
    }
    return updated.map((user) => this.#clone(user));
  }

  async topRatings(limit: number): Promise<LeaderboardEntry[]> {
    return [...this.#users.values()]
      .sort((a, b) => b.rating - a.rating || a.nickname.localeCompare(b.nickname))
      .slice(0, Math.max(0, limit))
      .map(({ nickname, rating, gamesPlayed }) => ({ nickname, rating, gamesPlayed }));
  }

  #require(handle: UserHandle): User {
    const user = this.#users.get(handle);
    if (!user) {
      throw new Error(`User ${handle} not found`);
    }
    return user;
  }

  #clone(user: User): User {
    return { ...user };
  }
}
