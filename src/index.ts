import { config, validateEnv } from './config.js';
import { ActivityDirectory } from './activities/directory.js';
import { seedActivities } from './activities/seed.js';
import { createActivityServer } from './api/server.js';

validateEnv();

const directory = new ActivityDirectory(seedActivities());
const server = createActivityServer(directory, {
  staticDir: config.STATIC_DIR,
  logRequests: config.LOG_REQUESTS,
});

function shutdown(signal: string): void {
  console.log(`\n[Shutdown] ${signal} received, closing server. Signups are not persisted.`);
  server.close((err) => {
    if (err) {
      console.error('[Shutdown] Close failed:', err);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

server.listen(config.PORT, config.HOST, () => {
  const count = Object.keys(directory.list()).length;
  console.log(`[Server] Activity signups listening on http://${config.HOST}:${config.PORT}`);
  console.log(`[Server] ${count} activities loaded, static files from ${config.STATIC_DIR}`);
});
