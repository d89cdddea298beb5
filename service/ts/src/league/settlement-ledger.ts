import { computeSessionDeltas, seedRating } from '../engine/rating.js';
import type {
  LeagueScope,
  LeagueStore,
  LeagueTransaction,
  MatchRecord,
  SeasonStandingRecord,
  SessionMemberRecord,
  SessionRecord,
  SettlementEntryRecord,
} from '../store/types.js';
import {
  compareSessions,
  confirmedMembers,
  loadParticipant,
  loadSeason,
  loadSession,
  seasonScope,
  sessionScope,
  systemClock,
  withoutStandings,
  type Clock,
} from './context.js';
import { guard, InvalidStateError, StaleEditError, type LeagueResult } from './errors.js';

type LedgerScope = Pick<LeagueTransaction, 'seasons' | 'participants' | 'sessions' | 'matches' | 'stats' | 'standings'>;

/** Ledger writes bound to one open transaction. */
export interface BoundLedger {
  /** Rolls back any earlier settlement of the session, then settles it from its stored win counters. */
  settle(session: SessionRecord): Promise<SettlementReport>;
  rollback(session: SessionRecord): Promise<RollbackReport>;
  assertEditable(session: SessionRecord): Promise<void>;
  ensureStanding(seasonId: string, participantId: string): Promise<SeasonStandingRecord>;
  currentRating(seasonId: string, participantId: string): Promise<number>;
  adjustEntryPoints(seasonId: string, participantId: string, delta: number): Promise<number>;
}

/**
 * Transactions for components that must not touch ratings or points: the
 * standings repository is withheld and reachable only through `ledger`.
 */
export interface ScopedStore {
  transaction<T>(scopes: string[], work: (tx: LeagueScope, ledger: BoundLedger) => Promise<T>): Promise<T>;
}

export interface SettlementReport {
  seasonId: string;
  sessionId: string;
  averageRating: number;
  maxWins: number;
  /** Entries of an earlier settlement of the same session that were reversed first. */
  rolledBack: number;
  entries: SettlementEntryRecord[];
}

export interface RollbackReport {
  seasonId: string;
  sessionId: string;
  entriesRemoved: number;
  participants: string[];
}

export interface RecomputeReport {
  seasonId: string;
  sessionsReplayed: number;
  standingsReset: number;
  entriesWritten: number;
  /** Finished sessions whose stored win counters disagreed with their match history. */
  driftedSessionIds: string[];
  replayFrom: string | null;
  replayTo: string | null;
}

export interface StandingEntry {
  rank: number;
  participantId: string;
  displayName: string;
  seedRating: number;
  rating: number;
  winPoints: number;
  entryPoints: number;
  totalPoints: number;
}

const sortIds = (ids: Iterable<string>) => [...new Set(ids)].sort((a, b) => a.localeCompare(b));

/** Wins per participant counted from decided matches only. */
export const countMatchWins = (members: SessionMemberRecord[], matches: MatchRecord[]) => {
  const wins = new Map<string, number>();
  for (const member of confirmedMembers(members)) wins.set(member.participantId, 0);
  for (const match of matches) {
    for (const id of [...match.teamA, ...match.teamB]) {
      if (!wins.has(id)) wins.set(id, 0);
    }
    if (!match.winner) continue;
    for (const id of match.winner === 'A' ? match.teamA : match.teamB) {
      wins.set(id, (wins.get(id) ?? 0) + 1);
    }
  }
  return wins;
};

/**
 * Source of truth for what each session contributed to season standings.
 * Ratings, win points and entry points are written here and nowhere else;
 * every rating or win change is attributed to a settlement entry so it can be
 * reversed exactly.
 */
export class SettlementLedger {
  constructor(
    private readonly store: LeagueStore,
    private readonly clock: Clock = systemClock
  ) {}

  scoped(): ScopedStore {
    return {
      transaction: <T>(scopes: string[], work: (tx: LeagueScope, ledger: BoundLedger) => Promise<T>) =>
        this.store.transaction(scopes, (tx) => work(withoutStandings(tx), this.bind(tx))),
    };
  }

  settle(seasonId: string, sessionId: string): Promise<LeagueResult<SettlementReport>> {
    return guard(() =>
      this.store.transaction([seasonScope(seasonId), sessionScope(sessionId)], async (tx) => {
        const session = await this.loadSeasonSession(tx, seasonId, sessionId);
        if (session.status !== 'finished') {
          throw new InvalidStateError(`Session ${sessionId} is ${session.status}, not finished`, 'not_finished');
        }
        return this.settleWithin(tx, session);
      })
    );
  }

  rollback(seasonId: string, sessionId: string): Promise<LeagueResult<RollbackReport>> {
    return guard(() =>
      this.store.transaction([seasonScope(seasonId), sessionScope(sessionId)], async (tx) => {
        await this.loadSeasonSession(tx, seasonId, sessionId);
        return this.rollbackWithin(tx, seasonId, sessionId);
      })
    );
  }

  recomputeSeason(seasonId: string): Promise<LeagueResult<RecomputeReport>> {
    return guard(() =>
      this.store.transaction([seasonScope(seasonId)], async (tx) => {
        await loadSeason(tx, seasonId);
        const at = this.clock();

        await tx.standings.deleteEntries({ seasonId });
        const standings = await tx.standings.listBySeason(seasonId);
        for (const standing of standings) {
          await tx.standings.save({ ...standing, rating: standing.seedRating, winPoints: 0, updatedAt: at });
        }

        const sessions = (await tx.sessions.listBySeason(seasonId))
          .filter((s) => s.status === 'finished')
          .sort(compareSessions);

        const driftedSessionIds: string[] = [];
        let entriesWritten = 0;

        for (const session of sessions) {
          const members = await tx.sessions.listMembers(session.sessionId);
          const matches = await tx.matches.listBySession(session.sessionId);
          const wins = countMatchWins(members, matches);

          const stored = await tx.stats.list(session.sessionId);
          const drifted =
            stored.length !== wins.size || stored.some((s) => wins.get(s.participantId) !== s.wins);
          if (drifted) driftedSessionIds.push(session.sessionId);

          const report = await this.applySettlement(tx, session, wins, at);
          entriesWritten += report.entries.length;
        }

        return {
          seasonId,
          sessionsReplayed: sessions.length,
          standingsReset: standings.length,
          entriesWritten,
          driftedSessionIds,
          replayFrom: sessions.length ? sessions[0].scheduledAt.toISOString() : null,
          replayTo: sessions.length ? sessions[sessions.length - 1].scheduledAt.toISOString() : null,
        };
      })
    );
  }

  standings(seasonId: string): Promise<LeagueResult<StandingEntry[]>> {
    return guard(() =>
      this.store.transaction([], async (tx) => {
        await loadSeason(tx, seasonId);
        const standings = await tx.standings.listBySeason(seasonId);
        const participants = await tx.participants.getMany(standings.map((s) => s.participantId));

        return standings
          .map((s) => ({
            participantId: s.participantId,
            displayName: participants.get(s.participantId)?.displayName ?? s.participantId,
            seedRating: s.seedRating,
            rating: s.rating,
            winPoints: s.winPoints,
            entryPoints: s.entryPoints,
            totalPoints: s.entryPoints + s.winPoints,
          }))
          .sort(
            (a, b) =>
              b.totalPoints - a.totalPoints || b.rating - a.rating || a.displayName.localeCompare(b.displayName)
          )
          .map((entry, i) => ({ rank: i + 1, ...entry }));
      })
    );
  }

  private bind(tx: LedgerScope): BoundLedger {
    return {
      settle: (session) => this.settleWithin(tx, session),
      rollback: (session) => this.rollbackWithin(tx, session.seasonId, session.sessionId),
      assertEditable: (session) => this.assertEditable(tx, session),
      ensureStanding: (seasonId, participantId) => this.ensureStanding(tx, seasonId, participantId),
      currentRating: (seasonId, participantId) => this.currentRating(tx, seasonId, participantId),
      adjustEntryPoints: (seasonId, participantId, delta) =>
        this.adjustEntryPoints(tx, seasonId, participantId, delta),
    };
  }

  private async settleWithin(tx: LedgerScope, session: SessionRecord): Promise<SettlementReport> {
    const stats = await tx.stats.list(session.sessionId);
    const wins = new Map(stats.map((s) => [s.participantId, s.wins] as const));
    return this.applySettlement(tx, session, wins, this.clock());
  }

  private async rollbackWithin(tx: LedgerScope, seasonId: string, sessionId: string): Promise<RollbackReport> {
    const entries = await tx.standings.listEntries({ seasonId, sessionId });
    const at = this.clock();

    for (const entry of entries) {
      const standing = await tx.standings.get(seasonId, entry.participantId);
      if (!standing) {
        throw new Error(`settlement entry without standing: ${seasonId}/${entry.participantId}`);
      }
      await tx.standings.save({
        ...standing,
        rating: standing.rating - entry.rateDelta,
        winPoints: standing.winPoints - entry.winDelta,
        updatedAt: at,
      });
    }

    const entriesRemoved = entries.length ? await tx.standings.deleteEntries({ seasonId, sessionId }) : 0;
    return {
      seasonId,
      sessionId,
      entriesRemoved,
      participants: sortIds(entries.map((e) => e.participantId)),
    };
  }

  /**
   * Refuses edits to a session whose members already carry a nonzero rating
   * change from a later session of the same season. This only looks at later
   * settlements, not at which ratings those settlements actually read.
   */
  private async assertEditable(tx: LedgerScope, session: SessionRecord): Promise<void> {
    const members = await tx.sessions.listMembers(session.sessionId);
    const stats = await tx.stats.list(session.sessionId);
    const participantIds = sortIds([
      ...confirmedMembers(members).map((m) => m.participantId),
      ...stats.map((s) => s.participantId),
    ]);
    if (!participantIds.length) return;

    const entries = await tx.standings.listEntries({ seasonId: session.seasonId, participantIds });
    const candidates = entries.filter((e) => e.sessionId !== session.sessionId && e.rateDelta !== 0);
    if (!candidates.length) return;

    const sessions = new Map(
      (await tx.sessions.listBySeason(session.seasonId)).map((s) => [s.sessionId, s] as const)
    );
    const blocking = sortIds(
      candidates
        .filter((e) => {
          const other = sessions.get(e.sessionId);
          return other !== undefined && compareSessions(other, session) > 0;
        })
        .map((e) => e.sessionId)
    );

    if (blocking.length) {
      throw new StaleEditError(session.sessionId, blocking);
    }
  }

  private async ensureStanding(tx: LedgerScope, seasonId: string, participantId: string): Promise<SeasonStandingRecord> {
    const existing = await tx.standings.get(seasonId, participantId);
    if (existing) return existing;

    const participant = await loadParticipant(tx, participantId);
    const seed = seedRating(participant.experience);
    const standing: SeasonStandingRecord = {
      seasonId,
      participantId,
      seedRating: seed,
      rating: seed,
      winPoints: 0,
      entryPoints: 0,
      updatedAt: this.clock(),
    };
    await tx.standings.save(standing);
    return standing;
  }

  private async currentRating(tx: LedgerScope, seasonId: string, participantId: string): Promise<number> {
    const standing = await tx.standings.get(seasonId, participantId);
    if (standing) return standing.rating;
    return seedRating((await loadParticipant(tx, participantId)).experience);
  }

  private async adjustEntryPoints(tx: LedgerScope, seasonId: string, participantId: string, delta: number): Promise<number> {
    const standing = await this.ensureStanding(tx, seasonId, participantId);
    const entryPoints = standing.entryPoints + delta;
    await tx.standings.save({ ...standing, entryPoints, updatedAt: this.clock() });
    return entryPoints;
  }

  private async applySettlement(
    tx: LedgerScope,
    session: SessionRecord,
    wins: Map<string, number>,
    at: Date
  ): Promise<SettlementReport> {
    const { seasonId, sessionId } = session;
    const rollback = await this.rollbackWithin(tx, seasonId, sessionId);

    const participantIds = sortIds(wins.keys());
    const standings = new Map<string, SeasonStandingRecord>();
    for (const id of participantIds) {
      standings.set(id, await this.ensureStanding(tx, seasonId, id));
    }

    const { averageRating, maxWins, deltas } = computeSessionDeltas(
      participantIds.map((id) => ({
        participantId: id,
        rating: standings.get(id)?.rating ?? 0,
        wins: wins.get(id) ?? 0,
      }))
    );

    const entries: SettlementEntryRecord[] = [];
    for (const { participantId, wins: winDelta, delta } of deltas) {
      const standing = standings.get(participantId);
      if (!standing) continue;
      await tx.standings.save({
        ...standing,
        rating: standing.rating + delta,
        winPoints: standing.winPoints + winDelta,
        updatedAt: at,
      });
      entries.push({ seasonId, sessionId, participantId, winDelta, rateDelta: delta, calculatedAt: at });
    }
    await tx.standings.insertEntries(entries);

    return { seasonId, sessionId, averageRating, maxWins, rolledBack: rollback.entriesRemoved, entries };
  }

  private async loadSeasonSession(tx: LedgerScope, seasonId: string, sessionId: string) {
    await loadSeason(tx, seasonId);
    const session = await loadSession(tx, sessionId);
    if (session.seasonId !== seasonId) {
      throw new InvalidStateError(`Session ${sessionId} does not belong to season ${seasonId}`, 'session_mismatch');
    }
    return session;
  }
}
