export type TeamSide = 'A' | 'B';

export const isTeamSide = (value: unknown): value is TeamSide => value === 'A' || value === 'B';

export interface BalanceEntry {
  participantId: string;
  wins: number;
}

export interface TeamSplit {
  A: string[];
  B: string[];
  /** |winsA - winsB| of the chosen split. */
  imbalance: number;
}

export interface RatingDeltaInput {
  rating: number;
  wins: number;
  averageRating: number;
  maxWins: number;
  k?: number;
}

export interface SessionStanding {
  participantId: string;
  rating: number;
  wins: number;
}

export interface SessionDelta {
  participantId: string;
  ratingBefore: number;
  wins: number;
  delta: number;
}

export interface SessionDeltaResult {
  averageRating: number;
  maxWins: number;
  deltas: SessionDelta[];
}
