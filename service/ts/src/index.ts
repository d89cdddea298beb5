import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { getStore } from './store/index.js';

const config = loadConfig();
const store = getStore(config.databaseUrl);
const app = createApp(store, { defaults: config.seasonDefaults });

export { app };

if (process.env.NODE_ENV !== 'test') {
  app.listen(config.port, () =>
    console.log(`League service listening on :${config.port} (${config.databaseUrl ? 'postgres' : 'memory'} store)`)
  );
}
