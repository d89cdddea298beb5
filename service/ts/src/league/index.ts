import { P } from '../engine/params.js';
import type { LeagueStore } from '../store/types.js';
import { systemClock, type Clock } from './context.js';
import { EntryQueue } from './entry-queue.js';
import { SeasonRegistry, type SeasonDefaults } from './seasons.js';
import { SessionLifecycle } from './session-lifecycle.js';
import { SettlementLedger } from './settlement-ledger.js';

export interface League {
  seasons: SeasonRegistry;
  entries: EntryQueue;
  sessions: SessionLifecycle;
  ledger: SettlementLedger;
}

export interface LeagueOptions {
  clock?: Clock;
  defaults?: SeasonDefaults;
}

export const createLeague = (store: LeagueStore, options: LeagueOptions = {}): League => {
  const clock = options.clock ?? systemClock;
  const ledger = new SettlementLedger(store, clock);
  // Only the ledger sees the raw store; everyone else gets standings-free transactions.
  const scoped = ledger.scoped();
  const sessions = new SessionLifecycle(scoped, clock);
  return {
    seasons: new SeasonRegistry(scoped, clock, options.defaults ?? P.defaults),
    entries: new EntryQueue(scoped, sessions, clock),
    sessions,
    ledger,
  };
};

export * from './errors.js';
export type { Clock } from './context.js';
export * from './entry-queue.js';
export * from './seasons.js';
export * from './session-lifecycle.js';
export * from './settlement-ledger.js';
