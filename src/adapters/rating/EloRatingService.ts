import type {
  RatedPlayer,
  RatingService,
  RatingUpdate,
} from "../../domain/ports/RatingService.js";

const K_NEW = 32;
const K_ESTABLISHED = 16;
const NEW_PLAYER_THRESHOLD = 30;
const RATING_FLOOR = 100;

function kFactor(gamesPlayed: number): number {
  return gamesPlayed < NEW_PLAYER_THRESHOLD ? K_NEW : K_ESTABLISHED;
}

export function expectedScore(ratingA: number, ratingB: number): number {
  return 1 / (1 + Math.pow(10, (ratingB - ratingA) / 400));
}

/**
 * Rating collaborator consulted once per finished competitive duel. Each side moves by its own
 * step size times the gap between the result and the expected score; a player with fewer than
 * {@link NEW_PLAYER_THRESHOLD} games moves twice as far. Results are whole points, never below
 * {@link RATING_FLOOR}.
 */
export class EloRatingService implements RatingService {
  async applyOutcome(
    playerA: RatedPlayer,
    playerB: RatedPlayer,
    outcomeForA: 0 | 0.5 | 1,
  ): Promise<RatingUpdate> {
    const expectedA = expectedScore(playerA.rating, playerB.rating);
    const expectedB = 1 - expectedA;
    const outcomeForB = 1 - outcomeForA;

    const changeA = Math.round(kFactor(playerA.gamesPlayed) * (outcomeForA - expectedA));
    const changeB = Math.round(kFactor(playerB.gamesPlayed) * (outcomeForB - expectedB));

    return {
      newRatingA: Math.max(RATING_FLOOR, playerA.rating + changeA),
      newRatingB: Math.max(RATING_FLOOR, playerB.rating + changeB),
    };
  }
}
