import { randomUUID } from 'crypto';
import type {
  EnrollmentRecord,
  EntryApplicationRecord,
  EntryPoolRecord,
  LeagueStore,
  LeagueTransaction,
  MatchRecord,
  ParticipantRecord,
  SeasonRecord,
  SeasonStandingRecord,
  SessionMemberRecord,
  SessionRecord,
  SessionStatRecord,
  SettlementEntryQuery,
  SettlementEntryRecord,
} from './types.js';
import { PENDING_ROOM_LABEL } from './types.js';

interface MemoryState {
  seasons: Map<string, SeasonRecord>;
  enrollments: Map<string, EnrollmentRecord>;
  participants: Map<string, ParticipantRecord>;
  pools: Map<string, EntryPoolRecord>;
  applications: Map<string, EntryApplicationRecord>;
  sessions: Map<string, SessionRecord>;
  members: Map<string, SessionMemberRecord>;
  matches: Map<string, MatchRecord>;
  stats: Map<string, SessionStatRecord>;
  standings: Map<string, SeasonStandingRecord>;
  entries: Map<string, SettlementEntryRecord>;
}

const emptyState = (): MemoryState => ({
  seasons: new Map(),
  enrollments: new Map(),
  participants: new Map(),
  pools: new Map(),
  applications: new Map(),
  sessions: new Map(),
  members: new Map(),
  matches: new Map(),
  stats: new Map(),
  standings: new Map(),
  entries: new Map(),
});

const pairKey = (a: string, b: string) => `${a}::${b}`;

const byTimeThenId = <T>(time: (x: T) => Date, id: (x: T) => string) => (a: T, b: T) =>
  time(a).getTime() - time(b).getTime() || id(a).localeCompare(id(b));

const copyMatch = (match: MatchRecord): MatchRecord => ({
  ...match,
  teamA: [...match.teamA],
  teamB: [...match.teamB],
});

const mustGet = <T>(value: T | undefined, label: string): T => {
  if (value === undefined) {
    throw new Error(`${label} does not exist`);
  }
  return value;
};

const createMemoryTransaction = (state: MemoryState): LeagueTransaction => ({
  seasons: {
    async create(input) {
      const season: SeasonRecord = { seasonId: randomUUID(), isActive: true, ...input };
      state.seasons.set(season.seasonId, season);
      return { ...season };
    },
    async get(seasonId) {
      const season = state.seasons.get(seasonId);
      return season ? { ...season } : null;
    },
    async getByName(name) {
      const season = [...state.seasons.values()].find((s) => s.name === name);
      return season ? { ...season } : null;
    },
    async findActive() {
      const season = [...state.seasons.values()].find((s) => s.isActive);
      return season ? { ...season } : null;
    },
    async deactivateAll() {
      for (const season of state.seasons.values()) season.isActive = false;
    },
    async enroll(record) {
      const key = pairKey(record.seasonId, record.participantId);
      if (state.enrollments.has(key)) return false;
      state.enrollments.set(key, { ...record });
      return true;
    },
    async isEnrolled(seasonId, participantId) {
      return state.enrollments.has(pairKey(seasonId, participantId));
    },
  },

  participants: {
    async create(input) {
      const participant: ParticipantRecord = { participantId: randomUUID(), priority: 0, ...input };
      state.participants.set(participant.participantId, participant);
      return { ...participant };
    },
    async get(participantId) {
      const participant = state.participants.get(participantId);
      return participant ? { ...participant } : null;
    },
    async getMany(participantIds) {
      const result = new Map<string, ParticipantRecord>();
      for (const id of participantIds) {
        const participant = state.participants.get(id);
        if (participant) result.set(id, { ...participant });
      }
      return result;
    },
    async setPriority(participantId, priority) {
      mustGet(state.participants.get(participantId), `participant ${participantId}`).priority = priority;
    },
    async incrementPriority(participantId) {
      const participant = mustGet(state.participants.get(participantId), `participant ${participantId}`);
      participant.priority += 1;
      return participant.priority;
    },
  },

  pools: {
    async create(input) {
      const pool: EntryPoolRecord = { poolId: randomUUID(), status: 'open', closedAt: null, ...input };
      state.pools.set(pool.poolId, pool);
      return { ...pool };
    },
    async get(poolId) {
      const pool = state.pools.get(poolId);
      return pool ? { ...pool } : null;
    },
    async find(seasonId, week) {
      const pool = [...state.pools.values()].find((p) => p.seasonId === seasonId && p.week === week);
      return pool ? { ...pool } : null;
    },
    async setStatus(poolId, status, at) {
      const pool = mustGet(state.pools.get(poolId), `pool ${poolId}`);
      pool.status = status;
      pool.closedAt = status === 'open' ? null : at;
      return { ...pool };
    },
    async getApplication(poolId, participantId) {
      const application = state.applications.get(pairKey(poolId, participantId));
      return application ? { ...application } : null;
    },
    async saveApplication(record) {
      state.applications.set(pairKey(record.poolId, record.participantId), { ...record });
    },
    async listApplications(poolId) {
      return [...state.applications.values()]
        .filter((a) => a.poolId === poolId)
        .sort(byTimeThenId((a) => a.submittedAt, (a) => a.participantId))
        .map((a) => ({ ...a }));
    },
  },

  sessions: {
    async create(input) {
      const session: SessionRecord = {
        sessionId: randomUUID(),
        startedAt: null,
        finishedAt: null,
        finishReason: null,
        ...input,
      };
      state.sessions.set(session.sessionId, session);
      return { ...session };
    },
    async get(sessionId) {
      const session = state.sessions.get(sessionId);
      return session ? { ...session } : null;
    },
    async findPlaceholder(poolId) {
      const session = [...state.sessions.values()].find(
        (s) => s.poolId === poolId && s.roomLabel === PENDING_ROOM_LABEL
      );
      return session ? { ...session } : null;
    },
    async listBySeason(seasonId) {
      return [...state.sessions.values()]
        .filter((s) => s.seasonId === seasonId)
        .sort(byTimeThenId((s) => s.scheduledAt, (s) => s.sessionId))
        .map((s) => ({ ...s }));
    },
    async update(sessionId, input) {
      const session = mustGet(state.sessions.get(sessionId), `session ${sessionId}`);
      Object.assign(session, input);
      return { ...session };
    },
    async listMembers(sessionId) {
      return [...state.members.values()]
        .filter((m) => m.sessionId === sessionId)
        .sort((a, b) => a.seat - b.seat)
        .map((m) => ({ ...m }));
    },
    async saveMember(record) {
      state.members.set(pairKey(record.sessionId, record.participantId), { ...record });
    },
  },

  matches: {
    async create(input) {
      const match: MatchRecord = {
        matchId: randomUUID(),
        winner: null,
        stage: '',
        decidedAt: null,
        ...input,
        teamA: [...input.teamA],
        teamB: [...input.teamB],
      };
      state.matches.set(match.matchId, match);
      return copyMatch(match);
    },
    async listBySession(sessionId) {
      return [...state.matches.values()]
        .filter((m) => m.sessionId === sessionId)
        .sort((a, b) => a.index - b.index)
        .map(copyMatch);
    },
    async update(matchId, input) {
      const match = mustGet(state.matches.get(matchId), `match ${matchId}`);
      Object.assign(match, input);
      return copyMatch(match);
    },
    async delete(matchId) {
      state.matches.delete(matchId);
    },
  },

  stats: {
    async list(sessionId) {
      return [...state.stats.values()]
        .filter((s) => s.sessionId === sessionId)
        .sort((a, b) => a.participantId.localeCompare(b.participantId))
        .map((s) => ({ ...s }));
    },
    async save(record) {
      state.stats.set(pairKey(record.sessionId, record.participantId), { ...record });
    },
    async delete(sessionId, participantId) {
      state.stats.delete(pairKey(sessionId, participantId));
    },
  },

  standings: {
    async get(seasonId, participantId) {
      const standing = state.standings.get(pairKey(seasonId, participantId));
      return standing ? { ...standing } : null;
    },
    async listBySeason(seasonId) {
      return [...state.standings.values()]
        .filter((s) => s.seasonId === seasonId)
        .sort((a, b) => a.participantId.localeCompare(b.participantId))
        .map((s) => ({ ...s }));
    },
    async save(record) {
      state.standings.set(pairKey(record.seasonId, record.participantId), { ...record });
    },
    async listEntries(query: SettlementEntryQuery) {
      const participants = query.participantIds ? new Set(query.participantIds) : null;
      return [...state.entries.values()]
        .filter(
          (e) =>
            e.seasonId === query.seasonId &&
            (!query.sessionId || e.sessionId === query.sessionId) &&
            (!participants || participants.has(e.participantId))
        )
        .map((e) => ({ ...e }));
    },
    async insertEntries(records) {
      for (const record of records) {
        const key = `${record.seasonId}::${record.sessionId}::${record.participantId}`;
        if (state.entries.has(key)) {
          throw new Error(`duplicate settlement entry ${key}`);
        }
        state.entries.set(key, { ...record });
      }
    },
    async deleteEntries(query) {
      let removed = 0;
      for (const [key, entry] of state.entries) {
        if (entry.seasonId === query.seasonId && (!query.sessionId || entry.sessionId === query.sessionId)) {
          state.entries.delete(key);
          removed += 1;
        }
      }
      return removed;
    },
  },
});

/**
 * In-process store. Transactions run one at a time against a cloned state that
 * replaces the live state only when the work resolves, so scope keys need no
 * finer locking here.
 */
export class MemoryStore implements LeagueStore {
  private state: MemoryState = emptyState();
  private tail: Promise<void> = Promise.resolve();

  transaction<T>(_scopes: string[], work: (tx: LeagueTransaction) => Promise<T>): Promise<T> {
    const run = async () => {
      const draft = structuredClone(this.state);
      const result = await work(createMemoryTransaction(draft));
      this.state = draft;
      return result;
    };

    const next = this.tail.then(run);
    this.tail = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  async close(): Promise<void> {
    await this.tail;
  }
}
