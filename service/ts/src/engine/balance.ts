import { CapacityViolationError } from '../league/errors.js';
import { P } from './params.js';
import type { BalanceEntry, TeamSplit } from './types.js';

// Advances `combo` to the next k-subset of [0, n) in lexicographic order.
const nextCombination = (combo: number[], n: number): boolean => {
  const k = combo.length;
  let i = k - 1;
  while (i >= 0 && combo[i] === n - k + i) i -= 1;
  if (i < 0) return false;
  combo[i] += 1;
  for (let j = i + 1; j < k; j += 1) combo[j] = combo[j - 1] + 1;
  return true;
};

/**
 * Splits an even party into two halves with the smallest difference in
 * session wins.
 *
 * Every subset of size n/2 is enumerated, so the cost is C(n, n/2). Room
 * capacity is small (8 players give 70 candidates); parties above `P.maxBalanceParty`
 * are rejected rather than enumerated. Ties keep the first subset in
 * lexicographic order of input positions, which makes the split stable for a
 * given member order.
 */
export function splitTeams(players: BalanceEntry[]): TeamSplit {
  const n = players.length;
  if (n === 0 || n % 2 !== 0 || n > P.maxBalanceParty) {
    throw new CapacityViolationError(
      `Team split needs a positive even party of at most ${P.maxBalanceParty} players, got ${n}`,
      'invalid_party_kind',
      { actual: n }
    );
  }

  const ids = new Set(players.map((p) => p.participantId));
  if (ids.size !== n) {
    throw new CapacityViolationError('Team split received duplicate participants', 'invalid_team', {
      expected: n,
      actual: ids.size,
    });
  }

  const total = players.reduce((s, p) => s + p.wins, 0);
  const half = n / 2;
  const combo = Array.from({ length: half }, (_, i) => i);
  let best = [...combo];
  let bestDiff = Number.POSITIVE_INFINITY;

  do {
    const sumA = combo.reduce((s, i) => s + players[i].wins, 0);
    const diff = Math.abs(total - 2 * sumA);
    if (diff < bestDiff) {
      bestDiff = diff;
      best = [...combo];
    }
  } while (bestDiff > 0 && nextCombination(combo, n));

  const chosen = new Set(best);
  return {
    A: best.map((i) => players[i].participantId),
    B: players.filter((_, i) => !chosen.has(i)).map((p) => p.participantId),
    imbalance: bestDiff,
  };
}
