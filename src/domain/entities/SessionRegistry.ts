/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { InvalidMatchStateError } from "../errors/InvalidMatchStateError.js";
import { MatchNotFoundError } from "../errors/MatchNotFoundError.js";
import type {
  ClockToken,
  ConnectionId,
  MatchId,
  MatchMode,
  OfferId,
  ParticipantIndex,
  TimePoint,
  UserHandle,
} from "../typedefs.js";
import type { Match } from "./Match.js";
import type { MatchSettings } from "./MatchSettings.js";
import { accepted, rejected, type Result } from "./Outcome.js";

export interface ConnectionProfile {
  readonly id: ConnectionId;
  readonly handle: UserHandle;
  readonly nickname: string;
  rating: number;
}

/** The one slot a connection occupies; a connection is always in exactly one. */
export type Occupancy =
  | { readonly kind: "idle" }
  | { readonly kind: "offer"; readonly offerId: OfferId }
  | {
      readonly kind: "participant";
      readonly matchId: MatchId;
      readonly index: ParticipantIndex;
    }
  | { readonly kind: "spectator"; readonly matchId: MatchId };

export interface Offer {
  readonly id: OfferId;
  readonly creator: ConnectionId;
  readonly settings: MatchSettings;
  readonly createdAt: TimePoint;
}

/** Bookkeeping held per live match next to the match itself. */
export interface SessionEntry {
  readonly match: Match;
  turnToken: ClockToken | null;
  pauseToken: ClockToken | null;
  pauseEndsAt: TimePoint | null;
  readonly skipVotes: Set<ParticipantIndex>;
  /** In order of arrival. */
  readonly spectators: ConnectionId[];
}

export interface RematchOffer {
  readonly previousMatchId: MatchId;
  /** Seat order of the ended match. */
  readonly parties: readonly [ConnectionId, ConnectionId];
  readonly spectators: Set<ConnectionId>;
  readonly settings: MatchSettings;
  readonly requested: Set<ParticipantIndex>;
}

export interface LobbyStats {
  /** Idle connections and offer creators. */
  readonly inLobby: number;
  readonly competitive: number;
  readonly practice: number;
  readonly spectating: number;
}

export interface OfferListing {
  readonly offerId: OfferId;
  readonly creator: string;
  readonly rating: number;
  readonly settings: {
    readonly mode: MatchMode;
    readonly timeBankSeconds: number;
    readonly roundCount: number;
  };
}

export interface MatchListing {
  readonly matchId: MatchId;
  readonly mode: MatchMode;
  readonly nicknames: readonly string[];
  readonly scores: readonly number[];
  readonly spectators: number;
}

const IDLE: Occupancy = { kind: "idle" };

/**
 * Process-wide registry of connections, open offers, live matches and rematch offers.
 *
 * Occupancy is stored as a single slot per connection, so a connection can never be idle,
 * offering, playing and spectating at the same time. All methods are synchronous.
 */
export class SessionRegistry {
  #connections = new Map<ConnectionId, ConnectionProfile>();
  #occupancy = new Map<ConnectionId, Occupancy>();
  #offers = new Map<OfferId, Offer>();
  #sessions = new Map<MatchId, SessionEntry>();
  #rematches = new Map<MatchId, RematchOffer>();
  #nextOfferId = 1;
  #nextMatchId = 1;
  #nextToken = 1;

  // --- connections -----------------------------------------------------------

  register(profile: ConnectionProfile): void {
    if (this.#connections.has(profile.id)) {
      throw new Error(`Connection ${profile.id} is already registered`);
    }
    this.#connections.set(profile.id, { ...profile });
    this.#occupancy.set(profile.id, IDLE);
  }

  /** Drops a connection; callers release its offer, seat or spectator slot first. */
  unregister(connectionId: ConnectionId): void {
    this.#connections.delete(connectionId);
    this.#occupancy.delete(connectionId);
  }

  connection(connectionId: ConnectionId): ConnectionProfile | undefined {
    return this.#connections.get(connectionId);
  }

  connectionByHandle(handle: UserHandle): ConnectionProfile | undefined {
    for (const profile of this.#connections.values()) {
      if (profile.handle === handle) return profile;
    }
    return undefined;
  }

  isConnected(connectionId: ConnectionId): boolean {
    return this.#connections.has(connectionId);
  }

  occupancyOf(connectionId: ConnectionId): Occupancy | undefined {
    return this.#occupancy.get(connectionId);
  }

  isIdle(connectionId: ConnectionId): boolean {
    return this.#occupancy.get(connectionId)?.kind === "idle";
  }

  idleConnections(): ConnectionId[] {
    return [...this.#occupancy]
      .filter(([, slot]) => slot.kind === "idle")
      .map(([connectionId]) => connectionId);
  }

  updateRating(connectionId: ConnectionId, rating: number): void {
    const profile = this.#connections.get(connectionId);
    if (profile) profile.rating = rating;
  }

  // --- offers ----------------------------------------------------------------

  openOffer(
    creator: ConnectionId,
    settings: MatchSettings,
    at: TimePoint,
  ): Result<Offer> {
    if (!this.isIdle(creator)) return rejected("busy");

    const offer: Offer = {
      id: `offer-${this.#nextOfferId++}`,
      creator,
      settings,
      createdAt: at,
    };
    this.#offers.set(offer.id, offer);
    this.#occupancy.set(creator, { kind: "offer", offerId: offer.id });
    return accepted(offer);
  }

  withdrawOffer(creator: ConnectionId): Result<Offer> {
    const slot = this.#occupancy.get(creator);
    if (slot?.kind !== "offer") return rejected("offer-not-found");

    const offer = this.#offers.get(slot.offerId);
    this.#offers.delete(slot.offerId);
    this.#occupancy.set(creator, IDLE);
    return offer ? accepted(offer) : rejected("offer-not-found");
  }

  /**
   * Removes an open offer on behalf of a joiner. The creator returns to the idle pool until
   * the caller seats both parties with {@link startSession}.
   */
  takeOffer(joiner: ConnectionId, offerId: OfferId): Result<Offer> {
    const offer = this.#offers.get(offerId);
    if (!offer) return rejected("offer-not-found");

    const creator = this.#connections.get(offer.creator);
    const candidate = this.#connections.get(joiner);
    if (
      joiner === offer.creator ||
      (creator !== undefined && creator.handle === candidate?.handle)
    ) {
      return rejected("cannot-join-own-offer");
    }
    if (!this.isIdle(joiner)) return rejected("busy");

    this.#offers.delete(offerId);
    this.#occupancy.set(offer.creator, IDLE);
    return accepted(offer);
  }

  openOffers(): Offer[] {
    return [...this.#offers.values()];
  }

  // --- live matches ----------------------------------------------------------

  nextMatchId(): MatchId {
    return `match-${this.#nextMatchId++}`;
  }

  /** Seats every participant of a freshly created match; all of them must be idle. */
  startSession(match: Match): SessionEntry {
    if (this.#sessions.has(match.id)) {
      throw new InvalidMatchStateError("session already registered", match.id);
    }

    match.participants.forEach((participant) => {
      if (participant.kind !== "human" || !this.isIdle(participant.connectionId)) {
        throw new InvalidMatchStateError(
          `participant ${participant.nickname} cannot be seated`,
          match.id,
        );
      }
    });

    match.participants.forEach((participant, index) => {
      if (participant.kind === "human") {
        this.#occupancy.set(participant.connectionId, {
          kind: "participant",
          matchId: match.id,
          index: index === 0 ? 0 : 1,
        });
      }
    });

    const entry: SessionEntry = {
      match,
      turnToken: null,
      pauseToken: null,
      pauseEndsAt: null,
      skipVotes: new Set(),
      spectators: [],
    };
    this.#sessions.set(match.id, entry);
    return entry;
  }

  session(matchId: MatchId): SessionEntry | undefined {
    return this.#sessions.get(matchId);
  }

  requireSession(matchId: MatchId): SessionEntry {
    const entry = this.#sessions.get(matchId);
    if (!entry) throw new MatchNotFoundError(matchId);
    return entry;
  }

  sessions(): SessionEntry[] {
    return [...this.#sessions.values()];
  }

  /**
   * Removes a live match. Every connection still seated in it or watching it returns to the
   * idle pool; the released connections are returned in seat order, spectators last.
   */
  endSession(matchId: MatchId): ConnectionId[] {
    const entry = this.#sessions.get(matchId);
    if (!entry) return [];

    this.#sessions.delete(matchId);
    entry.turnToken = null;
    entry.pauseToken = null;

    const released: ConnectionId[] = [];
    const members = [
      ...entry.match.participants.flatMap((participant) =>
        participant.kind === "human" ? [participant.connectionId] : [],
      ),
      ...entry.spectators,
    ];
    for (const connectionId of members) {
      const slot = this.#occupancy.get(connectionId);
      if (
        (slot?.kind === "participant" || slot?.kind === "spectator") &&
        slot.matchId === matchId
      ) {
        this.#occupancy.set(connectionId, IDLE);
        released.push(connectionId);
      }
    }
    return released;
  }

  /** Connections that receive a match's broadcasts: seated humans, then spectators. */
  audienceOf(matchId: MatchId): ConnectionId[] {
    const entry = this.#sessions.get(matchId);
    if (!entry) return [];
    return [
      ...entry.match.participants.flatMap((participant) =>
        participant.kind === "human" && this.#connections.has(participant.connectionId)
          ? [participant.connectionId]
          : [],
      ),
      ...entry.spectators,
    ];
  }

  // --- spectators ------------------------------------------------------------

  addSpectator(viewer: ConnectionId, matchId: MatchId): Result<SessionEntry> {
    const entry = this.#sessions.get(matchId);
    if (!entry) return rejected("match-not-found");
    if (!this.isIdle(viewer)) return rejected("busy");

    entry.spectators.push(viewer);
    this.#occupancy.set(viewer, { kind: "spectator", matchId });
    return accepted(entry);
  }

  removeSpectator(viewer: ConnectionId): Result<SessionEntry> {
    const slot = this.#occupancy.get(viewer);
    if (slot?.kind !== "spectator") return rejected("not-spectating");

    this.#occupancy.set(viewer, IDLE);
    const entry = this.#sessions.get(slot.matchId);
    if (!entry) return rejected("match-not-found");

    const position = entry.spectators.indexOf(viewer);
    if (position !== -1) entry.spectators.splice(position, 1);
    return accepted(entry);
  }

  // --- clock tokens ----------------------------------------------------------

  mintToken(): ClockToken {
    return this.#nextToken++;
  }

  armTurnClock(entry: SessionEntry): ClockToken {
    entry.turnToken = this.mintToken();
    return entry.turnToken;
  }

  armPauseClock(entry: SessionEntry): ClockToken {
    entry.pauseToken = this.mintToken();
    return entry.pauseToken;
  }

  // --- rematch offers --------------------------------------------------------

  openRematch(offer: RematchOffer): void {
    this.#rematches.set(offer.previousMatchId, offer);
  }

  rematch(previousMatchId: MatchId): RematchOffer | undefined {
    return this.#rematches.get(previousMatchId);
  }

  closeRematch(previousMatchId: MatchId): RematchOffer | undefined {
    const offer = this.#rematches.get(previousMatchId);
    this.#rematches.delete(previousMatchId);
    return offer;
  }

  /** Rematch offers a connection takes part in, as a party or a carried-over spectator. */
  rematchesInvolving(connectionId: ConnectionId): RematchOffer[] {
    return [...this.#rematches.values()].filter(
      (offer) =>
        offer.parties.includes(connectionId) || offer.spectators.has(connectionId),
    );
  }

  // --- lobby -----------------------------------------------------------------

  stats(): LobbyStats {
    let inLobby = 0;
    let competitive = 0;
    let practice = 0;
    let spectating = 0;

    for (const slot of this.#occupancy.values()) {
      if (slot.kind === "idle" || slot.kind === "offer") {
        inLobby += 1;
      } else if (slot.kind === "spectator") {
        spectating += 1;
      } else if (this.#sessions.get(slot.matchId)?.match.mode === "practice") {
        practice += 1;
      } else {
        competitive += 1;
      }
    }

    return { inLobby, competitive, practice, spectating };
  }

  offerListings(): OfferListing[] {
    return this.openOffers().map((offer) => {
      const creator = this.#connections.get(offer.creator);
      return {
        offerId: offer.id,
        creator: creator?.nickname ?? "unknown",
        rating: creator?.rating ?? 0,
        settings: {
          mode: offer.settings.mode,
          timeBankSeconds: Math.round(offer.settings.timeBankMs / 1000),
          roundCount: offer.settings.roundCount,
        },
      };
    });
  }

  /** Live competitive matches open to spectators. */
  matchListings(): MatchListing[] {
    return this.sessions()
      .filter((entry) => entry.match.mode === "competitive")
      .map((entry) => ({
        matchId: entry.match.id,
        mode: entry.match.mode,
        nicknames: entry.match.participants.map((participant) => participant.nickname),
        scores: [...entry.match.state.scores],
        spectators: entry.spectators.length,
      }));
  }
}
