import type { LeagueStore } from './types.js';
import { MemoryStore } from './memory.js';
import { PostgresStore } from './postgres.js';
import { getPool } from '../db/client.js';

export * from './types.js';
export { MemoryStore, PostgresStore };

let store: LeagueStore | null = null;

export const getStore = (databaseUrl = process.env.DATABASE_URL): LeagueStore => {
  if (!store) {
    store = databaseUrl ? new PostgresStore(getPool(databaseUrl)) : new MemoryStore();
  }
  return store;
};
