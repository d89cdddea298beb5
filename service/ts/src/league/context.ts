import type {
  LeagueScope,
  LeagueTransaction,
  ParticipantRecord,
  SeasonRecord,
  SessionMemberRecord,
  SessionRecord,
} from '../store/types.js';
import { NotFoundError } from './errors.js';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const seasonScope = (seasonId: string) => `season:${seasonId}`;
export const sessionScope = (sessionId: string) => `session:${sessionId}`;
export const poolScope = (poolId: string) => `pool:${poolId}`;

export const withoutStandings = (tx: LeagueTransaction): LeagueScope => ({
  seasons: tx.seasons,
  participants: tx.participants,
  pools: tx.pools,
  sessions: tx.sessions,
  matches: tx.matches,
  stats: tx.stats,
});

export const loadSeason = async (tx: Pick<LeagueScope, 'seasons'>, seasonId: string): Promise<SeasonRecord> => {
  const season = await tx.seasons.get(seasonId);
  if (!season) throw new NotFoundError('season', seasonId);
  return season;
};

export const loadSession = async (tx: Pick<LeagueScope, 'sessions'>, sessionId: string): Promise<SessionRecord> => {
  const session = await tx.sessions.get(sessionId);
  if (!session) throw new NotFoundError('session', sessionId);
  return session;
};

export const loadParticipant = async (
  tx: Pick<LeagueScope, 'participants'>,
  participantId: string
): Promise<ParticipantRecord> => {
  const participant = await tx.participants.get(participantId);
  if (!participant) throw new NotFoundError('participant', participantId);
  return participant;
};

export const confirmedMembers = (members: SessionMemberRecord[]) => members.filter((m) => m.status === 'confirmed');

/** Chronological session order: scheduled time, then id. */
export const compareSessions = (a: SessionRecord, b: SessionRecord) =>
  a.scheduledAt.getTime() - b.scheduledAt.getTime() || a.sessionId.localeCompare(b.sessionId);
