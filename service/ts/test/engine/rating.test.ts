import { test } from 'node:test';
import assert from 'node:assert/strict';

import { computeSessionDeltas, ratingDelta, seedRating } from '../../src/engine/rating.js';

test('room leader gains half of K against an even field', () => {
  assert.equal(ratingDelta({ rating: 1000, wins: 2, averageRating: 1000, maxWins: 2 }), 10);
  assert.equal(ratingDelta({ rating: 1000, wins: 0, averageRating: 1000, maxWins: 2 }), -10);
  assert.equal(ratingDelta({ rating: 1000, wins: 1, averageRating: 1000, maxWins: 2 }), 0);
});

test('rating above the room average is penalised by the difference term', () => {
  assert.equal(ratingDelta({ rating: 1200, wins: 1, averageRating: 1000, maxWins: 2 }), -10);
  assert.equal(ratingDelta({ rating: 800, wins: 1, averageRating: 1000, maxWins: 2 }), 10);
});

test('a session without wins treats the leader total as one', () => {
  assert.equal(ratingDelta({ rating: 1000, wins: 0, averageRating: 1000, maxWins: 0 }), -10);
});

test('custom K scales the delta', () => {
  assert.equal(ratingDelta({ rating: 1000, wins: 2, averageRating: 1000, maxWins: 2, k: 40 }), 20);
});

test('seed rating clamps experience minus offset into the seed band', () => {
  assert.equal(seedRating(2000), 1000);
  assert.equal(seedRating(2600.5), 1600.5);
  assert.equal(seedRating(3000), 2000);
  assert.equal(seedRating(4000), 2500);
  assert.equal(seedRating(500), 1000);
  assert.equal(seedRating(0), 1000);
  assert.equal(seedRating(-250), 1000);
  assert.equal(seedRating(Number.NaN), 1000);
});

test('session deltas use the field average and the leader wins', () => {
  const result = computeSessionDeltas([
    { participantId: 'p1', rating: 1100, wins: 3 },
    { participantId: 'p2', rating: 900, wins: 1 },
  ]);

  assert.equal(result.averageRating, 1000);
  assert.equal(result.maxWins, 3);
  assert.deepEqual(
    result.deltas.map((d) => [d.participantId, d.ratingBefore, d.wins]),
    [
      ['p1', 1100, 3],
      ['p2', 900, 1],
    ]
  );
  assert.ok(Math.abs(result.deltas[0].delta - 5) < 1e-9);
  assert.ok(Math.abs(result.deltas[1].delta - (20 * (1 / 3 - 0.5) + 5)) < 1e-9);
});

test('empty session yields no deltas', () => {
  assert.deepEqual(computeSessionDeltas([]), { averageRating: 0, maxWins: 1, deltas: [] });
});
