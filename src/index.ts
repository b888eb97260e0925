// server/src/index.ts
import { createApp } from './app';
import { getConfig } from './config/env';
import { pool } from './db/db';

const config = getConfig();
const app = createApp();

const server = app.listen(config.port, () => {
  console.log(`🚀 ${config.appName} v${config.appVersion} listening on port ${config.port}`);
  if (config.quotaCheckEnabled) console.log('📏 Quota check enabled');
});

let shuttingDown = false;

function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`🛑 ${signal} received, shutting down`);

  server.close((err) => {
    if (err) console.error('❌ HTTP server close error:', err);
    pool
      .end()
      .then(() => {
        console.log('✅ Database pool closed');
        process.exit(err ? 1 : 0);
      })
      .catch((poolErr: unknown) => {
        console.error('❌ Database pool close error:', poolErr);
        process.exit(1);
      });
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
