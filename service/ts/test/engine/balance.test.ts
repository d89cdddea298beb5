import { test } from 'node:test';
import assert from 'node:assert/strict';

import { splitTeams } from '../../src/engine/balance.js';
import type { BalanceEntry } from '../../src/engine/types.js';
import { CapacityViolationError } from '../../src/league/errors.js';

const party = (wins: number[]): BalanceEntry[] => wins.map((w, i) => ({ participantId: `p${i + 1}`, wins: w }));

const winsOf = (players: BalanceEntry[], ids: string[]) =>
  ids.reduce((sum, id) => sum + (players.find((p) => p.participantId === id)?.wins ?? 0), 0);

// Brute force over every bitmask with exactly n/2 bits set.
const bestImbalance = (players: BalanceEntry[]) => {
  const n = players.length;
  const total = players.reduce((s, p) => s + p.wins, 0);
  let best = Number.POSITIVE_INFINITY;
  for (let mask = 0; mask < 1 << n; mask += 1) {
    let size = 0;
    let sum = 0;
    for (let i = 0; i < n; i += 1) {
      if (mask & (1 << i)) {
        size += 1;
        sum += players[i].wins;
      }
    }
    if (size === n / 2) best = Math.min(best, Math.abs(total - 2 * sum));
  }
  return best;
};

test('finds a perfectly balanced split and stops there', () => {
  const players = party([3, 1, 2, 0]);
  assert.deepEqual(splitTeams(players), { A: ['p1', 'p4'], B: ['p2', 'p3'], imbalance: 0 });
});

test('all-zero party keeps the first half on team A', () => {
  assert.deepEqual(splitTeams(party([0, 0, 0, 0, 0, 0])), {
    A: ['p1', 'p2', 'p3'],
    B: ['p4', 'p5', 'p6'],
    imbalance: 0,
  });
});

test('ties keep the earliest subset in input order', () => {
  assert.deepEqual(splitTeams(party([1, 0])), { A: ['p1'], B: ['p2'], imbalance: 1 });
});

test('split is disjoint, complete and minimal for every generated party', () => {
  let seed = 7;
  const next = () => {
    seed = (seed * 48271) % 2147483647;
    return seed;
  };

  for (let round = 0; round < 60; round += 1) {
    const size = 2 * (1 + (next() % 5));
    const players = party(Array.from({ length: size }, () => next() % 7));
    const split = splitTeams(players);

    assert.equal(split.A.length, size / 2);
    assert.equal(split.B.length, size / 2);
    assert.equal(new Set([...split.A, ...split.B]).size, size);
    assert.equal(split.imbalance, Math.abs(winsOf(players, split.A) - winsOf(players, split.B)));
    assert.equal(split.imbalance, bestImbalance(players), `party ${JSON.stringify(players)}`);
  }
});

test('rejects parties that cannot form two equal teams', () => {
  for (const size of [0, 3, 18]) {
    assert.throws(
      () => splitTeams(party(Array.from({ length: size }, () => 0))),
      (err: unknown) => err instanceof CapacityViolationError && err.code === 'invalid_party_kind'
    );
  }
});

test('rejects duplicate participants', () => {
  assert.throws(
    () =>
      splitTeams([
        { participantId: 'p1', wins: 0 },
        { participantId: 'p1', wins: 1 },
      ]),
    (err: unknown) => err instanceof CapacityViolationError && err.code === 'invalid_team'
  );
});
