import { splitTeams } from '../engine/balance.js';
import { isTeamSide, type TeamSide } from '../engine/types.js';
import type {
  EntryPoolRecord,
  LeagueScope,
  MatchRecord,
  SeasonRecord,
  SessionMemberRecord,
  SessionRecord,
  SessionStatRecord,
} from '../store/types.js';
import { PENDING_ROOM_LABEL } from '../store/types.js';
import {
  confirmedMembers,
  loadParticipant,
  loadSeason,
  loadSession,
  seasonScope,
  sessionScope,
  systemClock,
  type Clock,
} from './context.js';
import {
  CapacityViolationError,
  guard,
  InvalidStateError,
  NotFoundError,
  ValidationError,
  type LeagueResult,
} from './errors.js';
import type { BoundLedger, RollbackReport, ScopedStore, SettlementReport } from './settlement-ledger.js';

/** `'open'` resolves to the session's open match; a number names a match index. */
export type MatchRef = 'open' | number;

export interface SessionDetail {
  session: SessionRecord;
  members: SessionMemberRecord[];
  matches: MatchRecord[];
  stats: SessionStatRecord[];
}

export interface StartResult {
  status: 'started' | 'already_live' | 'already_finished';
  message: string;
  session: SessionRecord;
}

export interface RecordOutcomeResult {
  session: SessionRecord;
  match: MatchRecord;
  finished: boolean;
  nextMatch: MatchRecord | null;
  settlement: SettlementReport | null;
}

export interface ReconcileOutcome {
  session: SessionRecord;
  reopened: boolean;
  finished: boolean;
  settlement: SettlementReport | null;
  rollback: RollbackReport | null;
  nextMatch: MatchRecord | null;
}

export interface CorrectOutcomeResult extends ReconcileOutcome {
  match: MatchRecord;
  previousWinner: TeamSide;
  changed: boolean;
}

export interface UndoOutcomeResult extends ReconcileOutcome {
  match: MatchRecord;
  discardedMatchIndexes: number[];
}

export interface FinishResult {
  session: SessionRecord;
  settlement: SettlementReport;
  discardedMatchIndexes: number[];
}

export interface LeaveResult {
  session: SessionRecord;
  participantId: string;
  openSeats: number;
  discardedMatchIndexes: number[];
}

export interface RefillResult {
  session: SessionRecord;
  member: SessionMemberRecord;
  openSeats: number;
  match: MatchRecord | null;
}

export interface CancelRefillResult {
  session: SessionRecord;
  /** Members left behind by the canceled room; the caller bumps their admission priority. */
  priorityBumpIds: string[];
}

export interface ScheduledRoom {
  session: SessionRecord;
  members: string[];
  match: MatchRecord;
}

interface SessionWork {
  tx: LeagueScope;
  ledger: BoundLedger;
  session: SessionRecord;
  season: SeasonRecord;
}

const isPlayable = (session: SessionRecord) => session.status === 'scheduled' || session.status === 'live';

const roster = (match: MatchRecord, side: TeamSide) => (side === 'A' ? match.teamA : match.teamB);

const assertWinner = (winner: unknown): TeamSide => {
  if (!isTeamSide(winner)) {
    throw new ValidationError(`Winner must be "A" or "B", got ${String(winner)}`, 'invalid_winner');
  }
  return winner;
};

const assertPlayable = (session: SessionRecord) => {
  if (session.status === 'finished') {
    throw new InvalidStateError(`Session ${session.sessionId} is already finished`, 'already_finished');
  }
  if (!isPlayable(session)) {
    throw new InvalidStateError(`Session ${session.sessionId} is ${session.status}`, 'session_not_playable');
  }
};

/**
 * Match sequencing for one room. Every public operation is one store
 * transaction; the ones that can settle also hold the season scope so they
 * serialise with other ledger writers.
 */
export class SessionLifecycle {
  constructor(
    private readonly store: ScopedStore,
    private readonly clock: Clock = systemClock
  ) {}

  getSession(sessionId: string): Promise<LeagueResult<SessionDetail>> {
    return guard(() =>
      this.store.transaction([], async (tx) => {
        const session = await loadSession(tx, sessionId);
        return {
          session,
          members: await tx.sessions.listMembers(sessionId),
          matches: await tx.matches.listBySession(sessionId),
          stats: await tx.stats.list(sessionId),
        };
      })
    );
  }

  start(sessionId: string): Promise<LeagueResult<StartResult>> {
    return this.run(sessionId, { seasonLock: false }, async ({ tx, session }) => {
      if (session.status === 'finished') {
        return { status: 'already_finished', message: `Session ${sessionId} is already finished`, session };
      }
      if (session.status === 'live') {
        return { status: 'already_live', message: `Session ${sessionId} is already live`, session };
      }
      if (session.status !== 'scheduled') {
        throw new InvalidStateError(`Session ${sessionId} is ${session.status} and cannot start`, 'session_not_playable');
      }

      const members = confirmedMembers(await tx.sessions.listMembers(sessionId));
      if (members.length !== session.capacity) {
        throw new CapacityViolationError(
          `Session ${sessionId} has ${members.length} of ${session.capacity} players`,
          'insufficient_players',
          { expected: session.capacity, actual: members.length }
        );
      }
      for (const member of members) {
        await tx.stats.save({ sessionId, participantId: member.participantId, wins: 0 });
      }

      const started = await tx.sessions.update(sessionId, { status: 'live', startedAt: this.clock() });
      return { status: 'started', message: `Session ${sessionId} started`, session: started };
    });
  }

  createNextMatch(sessionId: string): Promise<LeagueResult<MatchRecord>> {
    return this.run(sessionId, { seasonLock: false }, ({ tx, session }) => this.createNextMatchWithin(tx, session));
  }

  recordOutcome(
    sessionId: string,
    matchRef: MatchRef,
    winner: TeamSide,
    stage = ''
  ): Promise<LeagueResult<RecordOutcomeResult>> {
    return this.run(sessionId, { seasonLock: true }, async ({ tx, ledger, session, season }) => {
      const side = assertWinner(winner);
      assertPlayable(session);

      const open = (await tx.matches.listBySession(sessionId)).filter((m) => m.winner === null);
      let match: MatchRecord | undefined;
      if (matchRef === 'open') {
        match = open[0];
      } else {
        match = await this.findMatch(tx, sessionId, matchRef);
        if (match.winner !== null) {
          throw new InvalidStateError(
            `Match #${matchRef} already has a result; correct it instead`,
            'match_decided'
          );
        }
      }
      if (!match) {
        throw new InvalidStateError(`Session ${sessionId} has no open match`, 'no_open_match');
      }

      const now = this.clock();
      const decided = await tx.matches.update(match.matchId, { winner: side, stage, decidedAt: now });
      await this.addWins(tx, sessionId, roster(decided, side), 1);

      let current = session;
      if (current.status === 'scheduled') {
        current = await tx.sessions.update(sessionId, { status: 'live', startedAt: now });
      }

      if (await this.thresholdReached(tx, current, season)) {
        const settlement = await ledger.settle(current);
        const finished = await tx.sessions.update(sessionId, {
          status: 'finished',
          finishedAt: now,
          finishReason: 'threshold',
        });
        return { session: finished, match: decided, finished: true, nextMatch: null, settlement };
      }

      const nextMatch = await this.createNextMatchWithin(tx, current);
      return { session: current, match: decided, finished: false, nextMatch, settlement: null };
    });
  }

  correctOutcome(
    sessionId: string,
    matchIndex: number,
    winner: TeamSide,
    stage?: string
  ): Promise<LeagueResult<CorrectOutcomeResult>> {
    return this.run(sessionId, { seasonLock: true }, async ({ tx, ledger, session, season }) => {
      const side = assertWinner(winner);
      const match = await this.findMatch(tx, sessionId, matchIndex);
      const previousWinner = match.winner;
      if (previousWinner === null) {
        throw new InvalidStateError(`Match #${matchIndex} has no result to correct`, 'match_open');
      }

      await ledger.assertEditable(session);

      const unchanged: ReconcileOutcome = {
        session,
        reopened: false,
        finished: session.status === 'finished',
        settlement: null,
        rollback: null,
        nextMatch: null,
      };

      if (previousWinner === side) {
        const nextStage = stage ?? match.stage;
        const updated =
          nextStage === match.stage
            ? match
            : await tx.matches.update(match.matchId, { winner: side, stage: nextStage, decidedAt: match.decidedAt });
        return { ...unchanged, match: updated, previousWinner, changed: false };
      }

      const updated = await tx.matches.update(match.matchId, {
        winner: side,
        stage: stage ?? match.stage,
        decidedAt: this.clock(),
      });
      await this.addWins(tx, sessionId, roster(match, previousWinner), -1);
      await this.addWins(tx, sessionId, roster(match, side), 1);

      const outcome = await this.reconcile(tx, ledger, session, season, { keepMatchId: null });
      return { ...outcome, match: updated, previousWinner, changed: true };
    });
  }

  undoLastOutcome(sessionId: string): Promise<LeagueResult<UndoOutcomeResult>> {
    return this.run(sessionId, { seasonLock: true }, async ({ tx, ledger, session, season }) => {
      const matches = await tx.matches.listBySession(sessionId);
      const decided = matches.filter((m) => m.winner !== null);
      const last = decided[decided.length - 1];
      if (!last || last.winner === null) {
        throw new InvalidStateError(`Session ${sessionId} has no recorded result`, 'no_decided_match');
      }

      await ledger.assertEditable(session);

      const discardedMatchIndexes = await this.discardOpenMatches(tx, sessionId);
      const cleared = await tx.matches.update(last.matchId, { winner: null, stage: '', decidedAt: null });
      await this.addWins(tx, sessionId, roster(last, last.winner), -1);

      const outcome = await this.reconcile(tx, ledger, session, season, { keepMatchId: cleared.matchId });
      return { ...outcome, match: cleared, discardedMatchIndexes };
    });
  }

  finish(sessionId: string): Promise<LeagueResult<FinishResult>> {
    return this.run(sessionId, { seasonLock: true }, async ({ tx, ledger, session }) => {
      assertPlayable(session);
      if (session.status !== 'live') {
        throw new InvalidStateError(`Session ${sessionId} has not started`, 'session_not_playable');
      }

      const discardedMatchIndexes = await this.discardOpenMatches(tx, sessionId);
      const settlement = await ledger.settle(session);
      const finished = await tx.sessions.update(sessionId, {
        status: 'finished',
        finishedAt: this.clock(),
        finishReason: 'manual',
      });
      return { session: finished, settlement, discardedMatchIndexes };
    });
  }

  leave(sessionId: string, participantId: string): Promise<LeagueResult<LeaveResult>> {
    return this.run(sessionId, { seasonLock: false }, async ({ tx, session }) => {
      if (session.status !== 'scheduled') {
        throw new InvalidStateError(
          `Session ${sessionId} is ${session.status}; members can only drop out before it goes live`,
          'session_not_joinable'
        );
      }

      const members = await tx.sessions.listMembers(sessionId);
      const member = confirmedMembers(members).find((m) => m.participantId === participantId);
      if (!member) {
        throw new NotFoundError('participant', `${participantId} in session ${sessionId}`);
      }

      await tx.sessions.saveMember({ ...member, status: 'withdrawn' });
      await tx.stats.delete(sessionId, participantId);
      const discardedMatchIndexes = await this.discardOpenMatches(tx, sessionId);

      return {
        session,
        participantId,
        openSeats: session.capacity - (confirmedMembers(members).length - 1),
        discardedMatchIndexes,
      };
    });
  }

  refill(sessionId: string, participantId: string): Promise<LeagueResult<RefillResult>> {
    return this.run(sessionId, { seasonLock: false }, async ({ tx, session }) => {
      const reenterable =
        session.status === 'canceled' && session.startedAt === null && session.roomLabel !== PENDING_ROOM_LABEL;
      if (session.status !== 'scheduled' && !reenterable) {
        throw new InvalidStateError(`Session ${sessionId} is ${session.status} and cannot take players`, 'session_not_joinable');
      }

      await loadParticipant(tx, participantId);
      if (!(await tx.seasons.isEnrolled(session.seasonId, participantId))) {
        throw new InvalidStateError(`Participant ${participantId} is not enrolled in this season`, 'not_eligible');
      }

      const members = await tx.sessions.listMembers(sessionId);
      const confirmed = confirmedMembers(members);
      if (confirmed.some((m) => m.participantId === participantId)) {
        throw new InvalidStateError(`Participant ${participantId} is already in session ${sessionId}`, 'already_member');
      }
      if (confirmed.length >= session.capacity) {
        throw new CapacityViolationError(`Session ${sessionId} is full`, 'session_full', {
          expected: session.capacity,
          actual: confirmed.length,
        });
      }

      const now = this.clock();
      const withdrawn = members.find((m) => m.participantId === participantId);
      const member: SessionMemberRecord = withdrawn
        ? { ...withdrawn, status: 'confirmed', joinedAt: now }
        : {
            sessionId,
            participantId,
            seat: members.reduce((max, m) => Math.max(max, m.seat), 0) + 1,
            status: 'confirmed',
            joinedAt: now,
          };
      await tx.sessions.saveMember(member);
      await tx.stats.save({ sessionId, participantId, wins: 0 });

      const openSeats = session.capacity - confirmed.length - 1;
      let current = session;
      let match: MatchRecord | null = null;
      if (openSeats === 0) {
        if (current.status === 'canceled') {
          current = await tx.sessions.update(sessionId, { status: 'scheduled' });
        }
        const hasOpen = (await tx.matches.listBySession(sessionId)).some((m) => m.winner === null);
        if (!hasOpen) {
          match = await this.createNextMatchWithin(tx, current);
        }
      }

      return { session: current, member, openSeats, match };
    });
  }

  cancelRefill(sessionId: string): Promise<LeagueResult<CancelRefillResult>> {
    return this.run(sessionId, { seasonLock: false }, async ({ tx, session }) => {
      if (session.status !== 'scheduled') {
        throw new InvalidStateError(`Session ${sessionId} is ${session.status}`, 'session_not_joinable');
      }

      const confirmed = confirmedMembers(await tx.sessions.listMembers(sessionId));
      if (confirmed.length >= session.capacity) {
        throw new CapacityViolationError(`Session ${sessionId} is full; there is no refill to cancel`, 'session_full', {
          expected: session.capacity,
          actual: confirmed.length,
        });
      }

      await this.discardOpenMatches(tx, sessionId);
      const canceled = await tx.sessions.update(sessionId, { status: 'canceled' });
      return { session: canceled, priorityBumpIds: confirmed.map((m) => m.participantId) };
    });
  }

  /**
   * Turns admitted groups into rooms. The pool's placeholder becomes room 1;
   * every room starts with zeroed counters and its first open match.
   */
  async scheduleRoomsWithin(
    tx: LeagueScope,
    pool: EntryPoolRecord,
    season: SeasonRecord,
    rooms: string[][]
  ): Promise<ScheduledRoom[]> {
    const placeholder = await tx.sessions.findPlaceholder(pool.poolId);
    const now = this.clock();
    const scheduled: ScheduledRoom[] = [];

    for (const [i, participantIds] of rooms.entries()) {
      const roomLabel = String(i + 1);
      const session =
        i === 0 && placeholder?.status === 'pending'
          ? await tx.sessions.update(placeholder.sessionId, { roomLabel, status: 'scheduled', scheduledAt: now })
          : await tx.sessions.create({
              seasonId: season.seasonId,
              poolId: pool.poolId,
              week: pool.week,
              roomLabel,
              capacity: season.roomCapacity,
              status: 'scheduled',
              scheduledAt: now,
            });

      for (const [seat, participantId] of participantIds.entries()) {
        await tx.sessions.saveMember({
          sessionId: session.sessionId,
          participantId,
          seat: seat + 1,
          status: 'confirmed',
          joinedAt: now,
        });
        await tx.stats.save({ sessionId: session.sessionId, participantId, wins: 0 });
      }

      const match = await this.createNextMatchWithin(tx, session);
      scheduled.push({ session, members: participantIds, match });
    }

    return scheduled;
  }

  async cancelPlaceholderWithin(tx: LeagueScope, poolId: string): Promise<SessionRecord | null> {
    const placeholder = await tx.sessions.findPlaceholder(poolId);
    if (!placeholder || placeholder.status !== 'pending') return null;
    return tx.sessions.update(placeholder.sessionId, { status: 'canceled' });
  }

  async createNextMatchWithin(tx: LeagueScope, session: SessionRecord): Promise<MatchRecord> {
    assertPlayable(session);
    const { sessionId } = session;

    const matches = await tx.matches.listBySession(sessionId);
    const open = matches.find((m) => m.winner === null);
    if (open) {
      throw new InvalidStateError(`Match #${open.index} of session ${sessionId} is still open`, 'match_open');
    }

    const members = confirmedMembers(await tx.sessions.listMembers(sessionId));
    if (members.length !== session.capacity) {
      throw new CapacityViolationError(
        `Session ${sessionId} has ${members.length} of ${session.capacity} players`,
        'insufficient_players',
        { expected: session.capacity, actual: members.length }
      );
    }

    const wins = new Map((await tx.stats.list(sessionId)).map((s) => [s.participantId, s.wins] as const));
    for (const member of members) {
      if (!wins.has(member.participantId)) {
        await tx.stats.save({ sessionId, participantId: member.participantId, wins: 0 });
      }
    }

    const split = splitTeams(
      members.map((m) => ({ participantId: m.participantId, wins: wins.get(m.participantId) ?? 0 }))
    );
    const last = matches[matches.length - 1];

    return tx.matches.create({
      sessionId,
      index: last ? last.index + 1 : 1,
      teamA: split.A,
      teamB: split.B,
      createdAt: this.clock(),
    });
  }

  /**
   * Brings a session whose counters just changed back in line with the win
   * threshold: reopens a finished session that no longer qualifies, resettles
   * one that still does, and finishes a live one that now does.
   */
  private async reconcile(
    tx: LeagueScope,
    ledger: BoundLedger,
    session: SessionRecord,
    season: SeasonRecord,
    options: { keepMatchId: string | null }
  ): Promise<ReconcileOutcome> {
    const ending = await this.thresholdReached(tx, session, season);
    const base: ReconcileOutcome = {
      session,
      reopened: false,
      finished: session.status === 'finished',
      settlement: null,
      rollback: null,
      nextMatch: null,
    };

    if (session.status === 'finished') {
      const keepFinished = options.keepMatchId === null && (ending || session.finishReason === 'manual');
      if (keepFinished) {
        return { ...base, settlement: await ledger.settle(session) };
      }

      const rollback = await ledger.rollback(session);
      const reopened = await tx.sessions.update(session.sessionId, {
        status: 'live',
        finishedAt: null,
        finishReason: null,
      });
      await this.discardOpenMatches(tx, session.sessionId, options.keepMatchId);
      const nextMatch = options.keepMatchId === null ? await this.createNextMatchWithin(tx, reopened) : null;
      return { ...base, session: reopened, reopened: true, finished: false, rollback, nextMatch };
    }

    if (ending) {
      await this.discardOpenMatches(tx, session.sessionId);
      const settlement = await ledger.settle(session);
      const finished = await tx.sessions.update(session.sessionId, {
        status: 'finished',
        finishedAt: this.clock(),
        finishReason: 'threshold',
      });
      return { ...base, session: finished, finished: true, settlement };
    }

    return base;
  }

  private run<T>(
    sessionId: string,
    options: { seasonLock: boolean },
    work: (context: SessionWork) => Promise<T>
  ): Promise<LeagueResult<T>> {
    return guard(async () => {
      const located = await this.store.transaction([], (tx) => loadSession(tx, sessionId));
      const scopes = options.seasonLock
        ? [seasonScope(located.seasonId), sessionScope(sessionId)]
        : [sessionScope(sessionId)];

      return this.store.transaction(scopes, async (tx, ledger) => {
        const session = await loadSession(tx, sessionId);
        const season = await loadSeason(tx, session.seasonId);
        return work({ tx, ledger, session, season });
      });
    });
  }

  private async findMatch(tx: LeagueScope, sessionId: string, index: number): Promise<MatchRecord> {
    if (!Number.isInteger(index) || index < 1) {
      throw new ValidationError(`Match index must be a positive integer, got ${index}`, 'invalid_match_index');
    }
    const match = (await tx.matches.listBySession(sessionId)).find((m) => m.index === index);
    if (!match) throw new NotFoundError('match', `${sessionId}#${index}`);
    return match;
  }

  // Win counters never drop below zero.
  private async addWins(tx: LeagueScope, sessionId: string, participantIds: string[], delta: number) {
    const stats = new Map((await tx.stats.list(sessionId)).map((s) => [s.participantId, s.wins] as const));
    for (const participantId of participantIds) {
      const wins = Math.max(0, (stats.get(participantId) ?? 0) + delta);
      await tx.stats.save({ sessionId, participantId, wins });
    }
  }

  private async thresholdReached(tx: LeagueScope, session: SessionRecord, season: SeasonRecord) {
    return (await tx.stats.list(session.sessionId)).some((s) => s.wins >= season.winThreshold);
  }

  private async discardOpenMatches(tx: LeagueScope, sessionId: string, keepMatchId: string | null = null) {
    const discarded: number[] = [];
    for (const match of await tx.matches.listBySession(sessionId)) {
      if (match.winner === null && match.matchId !== keepMatchId) {
        await tx.matches.delete(match.matchId);
        discarded.push(match.index);
      }
    }
    return discarded;
  }
}
