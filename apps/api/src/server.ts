import 'dotenv/config';
import { createServer } from 'http';

import { buildApp } from './app.js';
import { loadApiConfig } from './config/env.js';

function main(): void {
  const config = loadApiConfig();
  const app = buildApp({ config });
  const httpServer = createServer(app);

  httpServer.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port}`);
  });

  const shutdown = () => {
    console.log('[server] shutting down...');
    httpServer.close((err) => {
      if (err) {
        console.error('[server] error while closing', err);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

try {
  main();
} catch (err) {
  console.error('[server] fatal startup error', err);
  process.exit(1);
}
