import type { TeamSide } from '../../engine/types.js';

export type SessionStatus = 'pending' | 'scheduled' | 'live' | 'canceled' | 'finished';
export type MembershipStatus = 'confirmed' | 'withdrawn';
export type FinishReason = 'threshold' | 'manual';

export const PENDING_ROOM_LABEL = 'PENDING';

export interface SessionRecord {
  sessionId: string;
  seasonId: string;
  poolId: string | null;
  week: number;
  roomLabel: string;
  capacity: number;
  status: SessionStatus;
  scheduledAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
  finishReason: FinishReason | null;
}

export interface SessionCreateInput {
  seasonId: string;
  poolId: string | null;
  week: number;
  roomLabel: string;
  capacity: number;
  status: SessionStatus;
  scheduledAt: Date;
}

export type SessionUpdateInput = Partial<
  Pick<SessionRecord, 'roomLabel' | 'status' | 'scheduledAt' | 'startedAt' | 'finishedAt' | 'finishReason'>
>;

export interface SessionMemberRecord {
  sessionId: string;
  participantId: string;
  seat: number;
  status: MembershipStatus;
  joinedAt: Date;
}

export interface MatchRecord {
  matchId: string;
  sessionId: string;
  index: number;
  teamA: string[];
  teamB: string[];
  winner: TeamSide | null;
  stage: string;
  createdAt: Date;
  decidedAt: Date | null;
}

export interface MatchCreateInput {
  sessionId: string;
  index: number;
  teamA: string[];
  teamB: string[];
  createdAt: Date;
}

export type MatchUpdateInput = Pick<MatchRecord, 'winner' | 'stage' | 'decidedAt'>;

export interface SessionStatRecord {
  sessionId: string;
  participantId: string;
  wins: number;
}

export interface SessionRepository {
  create(input: SessionCreateInput): Promise<SessionRecord>;
  get(sessionId: string): Promise<SessionRecord | null>;
  findPlaceholder(poolId: string): Promise<SessionRecord | null>;
  /** Ordered by scheduledAt, then sessionId. */
  listBySeason(seasonId: string): Promise<SessionRecord[]>;
  update(sessionId: string, input: SessionUpdateInput): Promise<SessionRecord>;
  /** Ordered by seat. */
  listMembers(sessionId: string): Promise<SessionMemberRecord[]>;
  saveMember(record: SessionMemberRecord): Promise<void>;
}

export interface MatchRepository {
  create(input: MatchCreateInput): Promise<MatchRecord>;
  /** Ordered by index. */
  listBySession(sessionId: string): Promise<MatchRecord[]>;
  update(matchId: string, input: MatchUpdateInput): Promise<MatchRecord>;
  delete(matchId: string): Promise<void>;
}

export interface SessionStatRepository {
  list(sessionId: string): Promise<SessionStatRecord[]>;
  save(record: SessionStatRecord): Promise<void>;
  delete(sessionId: string, participantId: string): Promise<void>;
}
