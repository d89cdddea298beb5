import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import type { TeamSide } from '../../src/engine/types.js';
import {
  addPlayers,
  createTestLeague,
  expectFailure,
  scheduleRoom,
  standingOf,
  unwrap,
  type TestLeague,
} from '../helpers/league.js';

type Snapshot = Map<string, { rating: number; winPoints: number; entryPoints: number }>;

const snapshot = async ({ league, season }: TestLeague): Promise<Snapshot> =>
  new Map(
    unwrap(await league.ledger.standings(season.seasonId)).map((s) => [
      s.participantId,
      { rating: s.rating, winPoints: s.winPoints, entryPoints: s.entryPoints },
    ])
  );

const assertSameStandings = (actual: Snapshot, expected: Snapshot) => {
  assert.deepEqual([...actual.keys()].sort(), [...expected.keys()].sort());
  for (const [id, want] of expected) {
    const got = actual.get(id);
    assert.ok(got, `missing standing ${id}`);
    assert.ok(Math.abs(got.rating - want.rating) < 1e-6, `rating of ${id}: ${got.rating} vs ${want.rating}`);
    assert.equal(got.winPoints, want.winPoints);
    assert.equal(got.entryPoints, want.entryPoints);
  }
};

const playUntilFinished = async ({ league }: TestLeague, sessionId: string, winners: TeamSide[]) => {
  for (let i = 0; i < 50; i += 1) {
    const result = unwrap(await league.sessions.recordOutcome(sessionId, 'open', winners[i % winners.length]));
    if (result.finished) return;
  }
  assert.fail(`session ${sessionId} never reached the threshold`);
};

/** Four players with spread seeds, two finished weekly rooms. */
const playedSeason = async () => {
  const ctx = await createTestLeague({ roomCapacity: 4, winThreshold: 3 });
  const players = await addPlayers(ctx, ['Ash', 'Birch', 'Cedar', 'Dogwood'], [2000, 2300, 2600, 3100]);

  const week1 = await scheduleRoom(ctx, 1, players);
  await playUntilFinished(ctx, week1.session.sessionId, ['A', 'B', 'A']);
  const week2 = await scheduleRoom(ctx, 2, players);
  await playUntilFinished(ctx, week2.session.sessionId, ['B', 'B', 'A']);

  return { ctx, players, week1: week1.session.sessionId, week2: week2.session.sessionId };
};

describe('SettlementLedger', () => {
  it('seeds standings from experience on enrollment', async () => {
    const ctx = await createTestLeague();
    await addPlayers(ctx, ['Ash', 'Birch', 'Cedar'], [2000, 2600, 5000]);
    const standings = unwrap(await ctx.league.ledger.standings(ctx.season.seasonId));
    assert.deepEqual(
      standings.map((s) => [s.displayName, s.seedRating, s.rating]),
      [
        ['Cedar', 2500, 2500],
        ['Birch', 1600, 1600],
        ['Ash', 1000, 1000],
      ]
    );
  });

  it('rollback restores standings and settle reapplies them exactly', async () => {
    const { ctx, week2 } = await playedSeason();
    const { league, season } = ctx;
    const settled = await snapshot(ctx);

    const rolledBack = unwrap(await league.ledger.rollback(season.seasonId, week2));
    assert.equal(rolledBack.entriesRemoved, 4);

    const reapplied = unwrap(await league.ledger.settle(season.seasonId, week2));
    assert.equal(reapplied.rolledBack, 0);
    assertSameStandings(await snapshot(ctx), settled);

    const twice = unwrap(await league.ledger.settle(season.seasonId, week2));
    assert.equal(twice.rolledBack, 4);
    assertSameStandings(await snapshot(ctx), settled);
  });

  it('rolling back every session returns to seed ratings', async () => {
    const { ctx, week1, week2 } = await playedSeason();
    const { league, season } = ctx;

    unwrap(await league.ledger.rollback(season.seasonId, week2));
    unwrap(await league.ledger.rollback(season.seasonId, week1));

    for (const standing of unwrap(await league.ledger.standings(season.seasonId))) {
      assert.ok(Math.abs(standing.rating - standing.seedRating) < 1e-6);
      assert.equal(standing.winPoints, 0);
      assert.equal(standing.entryPoints, 1);
    }

    const empty = unwrap(await league.ledger.rollback(season.seasonId, week2));
    assert.equal(empty.entriesRemoved, 0);
  });

  it('recompute reproduces incremental settlement and is repeatable', async () => {
    const { ctx } = await playedSeason();
    const { league, season } = ctx;
    const incremental = await snapshot(ctx);

    const first = unwrap(await league.ledger.recomputeSeason(season.seasonId));
    assert.equal(first.sessionsReplayed, 2);
    assert.equal(first.standingsReset, 4);
    assert.equal(first.entriesWritten, 8);
    assert.deepEqual(first.driftedSessionIds, []);
    assertSameStandings(await snapshot(ctx), incremental);

    const second = unwrap(await league.ledger.recomputeSeason(season.seasonId));
    assert.deepEqual(second, first);
    assertSameStandings(await snapshot(ctx), incremental);
  });

  it('recompute counts wins from match history and reports drifted counters', async () => {
    const { ctx, players, week1 } = await playedSeason();
    const { league, season, store } = ctx;
    const incremental = await snapshot(ctx);

    await store.transaction([], async (tx) => {
      await tx.stats.save({ sessionId: week1, participantId: players[0].participantId, wins: 40 });
    });

    const report = unwrap(await league.ledger.recomputeSeason(season.seasonId));
    assert.deepEqual(report.driftedSessionIds, [week1]);
    assertSameStandings(await snapshot(ctx), incremental);
  });

  it('settles only finished sessions of the named season', async () => {
    const ctx = await createTestLeague({ roomCapacity: 2, winThreshold: 2 });
    const { league, season } = ctx;
    const players = await addPlayers(ctx, ['Ash', 'Birch']);
    const room = await scheduleRoom(ctx, 1, players);

    expectFailure(await league.ledger.settle(season.seasonId, room.session.sessionId), 'invalid_state', 'not_finished');

    const other = unwrap(await league.seasons.createSeason({ name: 'Summer' }));
    expectFailure(
      await league.ledger.settle(other.seasonId, room.session.sessionId),
      'invalid_state',
      'session_mismatch'
    );
    expectFailure(await league.ledger.recomputeSeason('missing'), 'not_found', 'season_not_found');
  });

  it('scoped transactions withhold standings and write them through the bound ledger', async () => {
    const ctx = await createTestLeague();
    const { league, season } = ctx;
    const [player] = await addPlayers(ctx, ['Ash']);
    const scoped = league.ledger.scoped();

    const repositories = await scoped.transaction([], async (tx) => Object.keys(tx).sort());
    assert.deepEqual(repositories, ['matches', 'participants', 'pools', 'seasons', 'sessions', 'stats']);

    const entryPoints = await scoped.transaction([], (_tx, ledger) =>
      ledger.adjustEntryPoints(season.seasonId, player.participantId, 0.5)
    );
    assert.equal(entryPoints, 0.5);
    assert.equal((await standingOf(ctx, player.participantId)).entryPoints, 0.5);
  });

  it('orders standings by total points, then rating', async () => {
    const ctx = await createTestLeague({ roomCapacity: 2, winThreshold: 1 });
    const { league, season } = ctx;
    const players = await addPlayers(ctx, ['Ash', 'Birch', 'Cedar'], [2000, 2000, 2500]);
    const room = await scheduleRoom(ctx, 1, players.slice(0, 2));
    unwrap(await league.sessions.recordOutcome(room.session.sessionId, 'open', 'A'));
    const [winnerId] = room.match.teamA;

    const standings = unwrap(await league.ledger.standings(season.seasonId));
    assert.deepEqual(
      standings.map((s) => [s.rank, s.participantId, s.totalPoints]),
      [
        [1, winnerId, 1.5],
        [2, room.match.teamB[0], 0.5],
        [3, players[2].participantId, 0],
      ]
    );
  });
});
