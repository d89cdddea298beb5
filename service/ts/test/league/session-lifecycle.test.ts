import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { StaleEditError } from '../../src/league/errors.js';
import {
  addPlayers,
  createTestLeague,
  expectFailure,
  scheduleRoom,
  standingOf,
  unwrap,
  type TestLeague,
} from '../helpers/league.js';

const winsBy = async ({ league }: TestLeague, sessionId: string) => {
  const detail = unwrap(await league.sessions.getSession(sessionId));
  return Object.fromEntries(detail.stats.map((s) => [s.participantId, s.wins]));
};

/** Two-player room; `first` is the player seated on team A of match 1. */
const duel = async () => {
  const ctx = await createTestLeague({ roomCapacity: 2, winThreshold: 2 });
  const players = await addPlayers(ctx, ['P1', 'P2']);
  const room = await scheduleRoom(ctx, 1, players);
  const [first] = room.match.teamA;
  const [second] = room.match.teamB;
  return { ctx, room, sessionId: room.session.sessionId, first, second };
};

describe('SessionLifecycle', () => {
  it('finishes at the win threshold and settles the room', async () => {
    const { ctx, sessionId, first, second } = await duel();
    const { league } = ctx;

    const opening = unwrap(await league.sessions.recordOutcome(sessionId, 'open', 'A'));
    assert.equal(opening.finished, false);
    assert.equal(opening.session.status, 'live');
    assert.equal(opening.match.winner, 'A');
    assert.equal(opening.nextMatch?.index, 2);
    assert.deepEqual(opening.nextMatch?.teamA, [first]);

    const closing = unwrap(await league.sessions.recordOutcome(sessionId, 'open', 'A'));
    assert.equal(closing.finished, true);
    assert.equal(closing.session.status, 'finished');
    assert.equal(closing.session.finishReason, 'threshold');
    assert.equal(closing.nextMatch, null);
    assert.equal(closing.settlement?.maxWins, 2);
    assert.equal(closing.settlement?.averageRating, 1000);

    const winner = await standingOf(ctx, first);
    const loser = await standingOf(ctx, second);
    assert.equal(winner.winPoints, 2);
    assert.equal(winner.rating, 1010);
    assert.equal(winner.totalPoints, 2.5);
    assert.equal(winner.rank, 1);
    assert.equal(loser.winPoints, 0);
    assert.equal(loser.rating, 990);

    expectFailure(await league.sessions.recordOutcome(sessionId, 'open', 'B'), 'invalid_state', 'already_finished');
  });

  it('reports an already live session on a second start', async () => {
    const { ctx, sessionId } = await duel();
    const started = unwrap(await ctx.league.sessions.start(sessionId));
    assert.equal(started.status, 'started');
    assert.equal(started.session.status, 'live');

    const again = unwrap(await ctx.league.sessions.start(sessionId));
    assert.equal(again.status, 'already_live');
  });

  it('correcting a deciding result reopens the session and reverses its settlement', async () => {
    const { ctx, sessionId, first, second } = await duel();
    const { league } = ctx;
    unwrap(await league.sessions.recordOutcome(sessionId, 'open', 'A'));
    unwrap(await league.sessions.recordOutcome(sessionId, 'open', 'A'));

    const corrected = unwrap(await league.sessions.correctOutcome(sessionId, 2, 'B'));
    assert.equal(corrected.changed, true);
    assert.equal(corrected.previousWinner, 'A');
    assert.equal(corrected.reopened, true);
    assert.equal(corrected.session.status, 'live');
    assert.equal(corrected.rollback?.entriesRemoved, 2);
    assert.equal(corrected.nextMatch?.index, 3);
    assert.deepEqual(await winsBy(ctx, sessionId), { [first]: 1, [second]: 1 });

    const winner = await standingOf(ctx, first);
    assert.equal(winner.rating, 1000);
    assert.equal(winner.winPoints, 0);

    const decider = unwrap(await league.sessions.recordOutcome(sessionId, 'open', 'B'));
    assert.equal(decider.finished, true);
    assert.equal((await standingOf(ctx, second)).rating, 1010);
    assert.equal((await standingOf(ctx, second)).winPoints, 2);
    // One win out of the leader's two sits exactly at the midpoint.
    assert.equal((await standingOf(ctx, first)).rating, 1000);
    assert.equal((await standingOf(ctx, first)).winPoints, 1);
  });

  it('correcting to the same winner changes nothing', async () => {
    const { ctx, sessionId, first, second } = await duel();
    unwrap(await ctx.league.sessions.recordOutcome(sessionId, 'open', 'A'));

    const result = unwrap(await ctx.league.sessions.correctOutcome(sessionId, 1, 'A'));
    assert.equal(result.changed, false);
    assert.equal(result.settlement, null);
    assert.deepEqual(await winsBy(ctx, sessionId), { [first]: 1, [second]: 0 });

    expectFailure(await ctx.league.sessions.correctOutcome(sessionId, 2, 'A'), 'invalid_state', 'match_open');
    expectFailure(await ctx.league.sessions.correctOutcome(sessionId, 9, 'A'), 'not_found', 'match_not_found');
    expectFailure(await ctx.league.sessions.correctOutcome(sessionId, 0, 'A'), 'validation_error', 'invalid_match_index');
  });

  it('refuses edits once a later session has settled the same players', async () => {
    const ctx = await createTestLeague({ roomCapacity: 2, winThreshold: 1 });
    const { league } = ctx;
    const players = await addPlayers(ctx, ['P1', 'P2']);

    const earlier = await scheduleRoom(ctx, 1, players);
    unwrap(await league.sessions.recordOutcome(earlier.session.sessionId, 'open', 'A'));
    const later = await scheduleRoom(ctx, 2, players);
    unwrap(await league.sessions.recordOutcome(later.session.sessionId, 'open', 'A'));

    const refused = expectFailure(
      await league.sessions.correctOutcome(earlier.session.sessionId, 1, 'B'),
      'stale_edit',
      'stale_edit'
    );
    assert.ok(refused instanceof StaleEditError);
    assert.deepEqual(refused.blockingSessionIds, [later.session.sessionId]);

    expectFailure(await league.sessions.undoLastOutcome(earlier.session.sessionId), 'stale_edit');
    unwrap(await league.sessions.correctOutcome(later.session.sessionId, 1, 'B'));
  });

  it('a correction that reaches the threshold finishes a live session', async () => {
    const { ctx, sessionId, first, second } = await duel();
    const { league } = ctx;
    unwrap(await league.sessions.recordOutcome(sessionId, 'open', 'A'));
    const tied = unwrap(await league.sessions.recordOutcome(sessionId, 'open', 'B'));
    assert.equal(tied.finished, false);
    assert.equal(tied.nextMatch?.index, 3);

    const corrected = unwrap(await league.sessions.correctOutcome(sessionId, 2, 'A'));
    assert.equal(corrected.changed, true);
    assert.equal(corrected.previousWinner, 'B');
    assert.equal(corrected.reopened, false);
    assert.equal(corrected.finished, true);
    assert.equal(corrected.session.status, 'finished');
    assert.equal(corrected.session.finishReason, 'threshold');
    assert.equal(corrected.rollback, null);
    assert.equal(corrected.nextMatch, null);
    assert.equal(corrected.settlement?.maxWins, 2);
    assert.equal(corrected.settlement?.rolledBack, 0);

    const detail = unwrap(await league.sessions.getSession(sessionId));
    assert.deepEqual(
      detail.matches.map((m) => [m.index, m.winner]),
      [
        [1, 'A'],
        [2, 'A'],
      ]
    );
    assert.equal((await standingOf(ctx, first)).rating, 1010);
    assert.equal((await standingOf(ctx, first)).winPoints, 2);
    assert.equal((await standingOf(ctx, second)).rating, 990);
  });

  it('correcting an earlier match of a session still over the threshold resettles it', async () => {
    const { ctx, sessionId, first, second } = await duel();
    const { league } = ctx;
    unwrap(await league.sessions.recordOutcome(sessionId, 'open', 'B'));
    unwrap(await league.sessions.recordOutcome(sessionId, 'open', 'A'));
    const closing = unwrap(await league.sessions.recordOutcome(sessionId, 'open', 'A'));
    assert.equal(closing.finished, true);
    assert.equal((await standingOf(ctx, second)).rating, 1000);

    const corrected = unwrap(await league.sessions.correctOutcome(sessionId, 1, 'A'));
    assert.equal(corrected.changed, true);
    assert.equal(corrected.reopened, false);
    assert.equal(corrected.finished, true);
    assert.equal(corrected.session.status, 'finished');
    assert.equal(corrected.session.finishReason, 'threshold');
    assert.equal(corrected.rollback, null);
    assert.equal(corrected.settlement?.rolledBack, 2);
    assert.equal(corrected.settlement?.maxWins, 3);
    assert.deepEqual(await winsBy(ctx, sessionId), { [first]: 3, [second]: 0 });

    const winner = await standingOf(ctx, first);
    assert.equal(winner.rating, 1010);
    assert.equal(winner.winPoints, 3);
    const loser = await standingOf(ctx, second);
    assert.equal(loser.rating, 990);
    assert.equal(loser.winPoints, 0);
  });

  it('later settlements that left a shared player unrated do not block edits', async () => {
    const ctx = await createTestLeague({ roomCapacity: 2, winThreshold: 2 });
    const { league } = ctx;
    const [ash, birch, cedar] = await addPlayers(ctx, ['Ash', 'Birch', 'Cedar']);

    const earlier = await scheduleRoom(ctx, 1, [birch, cedar]);
    unwrap(await league.sessions.recordOutcome(earlier.session.sessionId, 'open', 'A'));

    const later = await scheduleRoom(ctx, 2, [ash, birch]);
    const birchSide = later.match.teamA.includes(birch.participantId) ? 'A' : 'B';
    const ashSide = birchSide === 'A' ? 'B' : 'A';
    unwrap(await league.sessions.recordOutcome(later.session.sessionId, 'open', birchSide));
    unwrap(await league.sessions.recordOutcome(later.session.sessionId, 'open', ashSide));
    const closing = unwrap(await league.sessions.recordOutcome(later.session.sessionId, 'open', ashSide));
    assert.equal(closing.finished, true);

    const birchEntry = closing.settlement?.entries.find((e) => e.participantId === birch.participantId);
    assert.equal(birchEntry?.rateDelta, 0);
    assert.equal(birchEntry?.winDelta, 1);

    const corrected = unwrap(await league.sessions.correctOutcome(earlier.session.sessionId, 1, 'B'));
    assert.equal(corrected.changed, true);
    assert.equal(corrected.session.status, 'live');
    assert.deepEqual(await winsBy(ctx, earlier.session.sessionId), {
      [earlier.match.teamA[0]]: 0,
      [earlier.match.teamB[0]]: 1,
    });
  });

  it('undo clears the last result and discards the open match', async () => {
    const { ctx, sessionId, first, second } = await duel();
    const { league } = ctx;
    unwrap(await league.sessions.recordOutcome(sessionId, 'open', 'A'));

    const undone = unwrap(await league.sessions.undoLastOutcome(sessionId));
    assert.equal(undone.match.index, 1);
    assert.equal(undone.match.winner, null);
    assert.deepEqual(undone.discardedMatchIndexes, [2]);
    assert.equal(undone.reopened, false);
    assert.deepEqual(await winsBy(ctx, sessionId), { [first]: 0, [second]: 0 });

    const replayed = unwrap(await league.sessions.recordOutcome(sessionId, 'open', 'B'));
    assert.equal(replayed.match.index, 1);
    assert.equal(replayed.match.winner, 'B');

    unwrap(await league.sessions.undoLastOutcome(sessionId));
    expectFailure(await league.sessions.undoLastOutcome(sessionId), 'invalid_state', 'no_decided_match');
  });

  it('undo on a finished session reopens it and rolls back its settlement', async () => {
    const { ctx, sessionId, first } = await duel();
    const { league } = ctx;
    unwrap(await league.sessions.recordOutcome(sessionId, 'open', 'A'));
    unwrap(await league.sessions.recordOutcome(sessionId, 'open', 'A'));

    const undone = unwrap(await league.sessions.undoLastOutcome(sessionId));
    assert.equal(undone.reopened, true);
    assert.equal(undone.session.status, 'live');
    assert.equal(undone.session.finishedAt, null);
    assert.equal(undone.nextMatch, null);
    assert.equal(undone.match.index, 2);
    assert.equal((await standingOf(ctx, first)).rating, 1000);

    const detail = unwrap(await league.sessions.getSession(sessionId));
    assert.deepEqual(
      detail.matches.map((m) => [m.index, m.winner]),
      [
        [1, 'A'],
        [2, null],
      ]
    );
  });

  it('manual finish settles current wins and drops the open match', async () => {
    const { ctx, sessionId, first, second } = await duel();
    const { league } = ctx;
    expectFailure(await league.sessions.finish(sessionId), 'invalid_state', 'session_not_playable');

    unwrap(await league.sessions.recordOutcome(sessionId, 'open', 'A'));
    const finished = unwrap(await league.sessions.finish(sessionId));
    assert.equal(finished.session.status, 'finished');
    assert.equal(finished.session.finishReason, 'manual');
    assert.deepEqual(finished.discardedMatchIndexes, [2]);
    assert.equal(finished.settlement.maxWins, 1);
    assert.equal((await standingOf(ctx, first)).rating, 1010);
    assert.equal((await standingOf(ctx, second)).rating, 990);
  });

  it('refills a seat after a dropout and creates a fresh opening match', async () => {
    const ctx = await createTestLeague({ roomCapacity: 2, winThreshold: 2 });
    const { league } = ctx;
    const [a, b, c] = await addPlayers(ctx, ['A', 'B', 'C']);
    const room = await scheduleRoom(ctx, 1, [a, b]);
    const sessionId = room.session.sessionId;
    const [stays] = room.members;
    const leaves = room.members[1];

    const left = unwrap(await league.sessions.leave(sessionId, leaves));
    assert.equal(left.openSeats, 1);
    assert.deepEqual(left.discardedMatchIndexes, [1]);

    expectFailure(await league.sessions.start(sessionId), 'capacity_violation', 'insufficient_players');
    expectFailure(await league.sessions.refill(sessionId, stays), 'invalid_state', 'already_member');

    const refilled = unwrap(await league.sessions.refill(sessionId, c.participantId));
    assert.equal(refilled.openSeats, 0);
    assert.equal(refilled.member.seat, 3);
    assert.equal(refilled.match?.index, 1);
    assert.deepEqual(refilled.match?.teamA, [stays]);
    assert.deepEqual(refilled.match?.teamB, [c.participantId]);

    expectFailure(await league.sessions.refill(sessionId, leaves), 'capacity_violation', 'session_full');
    expectFailure(await league.sessions.cancelRefill(sessionId), 'capacity_violation', 'session_full');
  });

  it('canceling a refill strands the remaining members for a priority bump', async () => {
    const ctx = await createTestLeague({ roomCapacity: 2, winThreshold: 2 });
    const { league } = ctx;
    const [a, b, c] = await addPlayers(ctx, ['A', 'B', 'C']);
    const room = await scheduleRoom(ctx, 1, [a, b]);
    const sessionId = room.session.sessionId;
    const [stays, leaves] = room.members;

    unwrap(await league.sessions.leave(sessionId, leaves));
    const canceled = unwrap(await league.sessions.cancelRefill(sessionId));
    assert.equal(canceled.session.status, 'canceled');
    assert.deepEqual(canceled.priorityBumpIds, [stays]);

    // A canceled room that never started can still be filled again.
    const revived = unwrap(await league.sessions.refill(sessionId, c.participantId));
    assert.equal(revived.session.status, 'scheduled');
    assert.equal(revived.match?.index, 1);
  });

  it('members can only leave before the session goes live', async () => {
    const { ctx, sessionId, first } = await duel();
    unwrap(await ctx.league.sessions.start(sessionId));
    expectFailure(await ctx.league.sessions.leave(sessionId, first), 'invalid_state', 'session_not_joinable');
  });

  it('explicit match indexes must refer to undecided matches', async () => {
    const { ctx, sessionId } = await duel();
    unwrap(await ctx.league.sessions.recordOutcome(sessionId, 1, 'A'));
    expectFailure(await ctx.league.sessions.recordOutcome(sessionId, 1, 'B'), 'invalid_state', 'match_decided');
    expectFailure(await ctx.league.sessions.createNextMatch(sessionId), 'invalid_state', 'match_open');
    expectFailure(await ctx.league.sessions.getSession('missing'), 'not_found', 'session_not_found');
  });
});
