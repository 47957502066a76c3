export interface RatedPlayer {
  readonly rating: number;
  readonly gamesPlayed: number;
}

export interface RatingUpdate {
  readonly newRatingA: number;
  readonly newRatingB: number;
}

/** Maps two ratings and the result for player A (1 win, 0.5 draw, 0 loss) to new ratings. */
export interface RatingService {
  applyOutcome(
    playerA: RatedPlayer,
    playerB: RatedPlayer,
    outcomeForA: 0 | 0.5 | 1,
  ): Promise<RatingUpdate>;
}
