import type { ParticipantRepository } from './participants.js';
import type { PoolRepository } from './pools.js';
import type { SeasonRepository } from './seasons.js';
import type { MatchRepository, SessionRepository, SessionStatRepository } from './sessions.js';
import type { StandingRepository } from './standings.js';

export interface LeagueTransaction {
  seasons: SeasonRepository;
  participants: ParticipantRepository;
  pools: PoolRepository;
  sessions: SessionRepository;
  matches: MatchRepository;
  stats: SessionStatRepository;
  standings: StandingRepository;
}

/** Transaction view for components that must not touch ratings or points. */
export type LeagueScope = Omit<LeagueTransaction, 'standings'>;

export interface LeagueStore {
  /**
   * Runs `work` atomically. Operations sharing a scope key (`season:<id>`,
   * `session:<id>`, `pool:<id>`) are serialised; a thrown error discards every
   * write made by `work`.
   */
  transaction<T>(scopes: string[], work: (tx: LeagueTransaction) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
