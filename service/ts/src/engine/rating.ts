import { P } from './params.js';
import type { RatingDeltaInput, SessionDeltaResult, SessionStanding } from './types.js';

const clamp = (x: number, a: number, b: number) => Math.max(a, Math.min(b, x));

/**
 * Rating change for one participant of a settled session.
 *
 * Each participant is compared against the field average of the room, not
 * against individual opponents: the performance term rewards the share of the
 * room leader's wins, the difference term rewards beating a stronger field.
 * This is not a pairwise Elo update and deltas only sum to zero when the room
 * is symmetric.
 */
export function ratingDelta({ rating, wins, averageRating, maxWins, k = P.K }: RatingDeltaInput): number {
  const performance = wins / Math.max(1, maxWins) - 0.5;
  const diffTerm = (averageRating - rating) / P.ratingScale;
  return k * (performance + diffTerm);
}

/**
 * Starting season rating derived from lifetime experience. Every raw value
 * below the floor (zero, negative or small positive) falls back to the floor.
 */
export function seedRating(experience: number): number {
  if (!Number.isFinite(experience)) return P.seed.floor;
  return clamp(experience - P.seed.offset, P.seed.floor, P.seed.ceiling);
}

export function computeSessionDeltas(standings: SessionStanding[], k: number = P.K): SessionDeltaResult {
  if (!standings.length) {
    return { averageRating: 0, maxWins: 1, deltas: [] };
  }

  const averageRating = standings.reduce((s, p) => s + p.rating, 0) / standings.length;
  const maxWins = Math.max(1, ...standings.map((p) => p.wins));

  return {
    averageRating,
    maxWins,
    deltas: standings.map((p) => ({
      participantId: p.participantId,
      ratingBefore: p.rating,
      wins: p.wins,
      delta: ratingDelta({ rating: p.rating, wins: p.wins, averageRating, maxWins, k }),
    })),
  };
}
