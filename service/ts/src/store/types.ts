export * from './contracts/seasons.js';
export * from './contracts/participants.js';
export * from './contracts/pools.js';
export * from './contracts/sessions.js';
export * from './contracts/standings.js';
export * from './contracts/store.js';
