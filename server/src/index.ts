import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { openDatabase } from './db.js';
import { createRepository } from './repo.js';

const config = loadConfig();
const db = openDatabase(config.databasePath);
const app = createApp({ config, repo: createRepository(db) });

const server = app.listen(config.port, () => {
  console.log(`API server running on http://localhost:${config.port}`);
});

function shutdown(signal: string): void {
  console.log(`Received ${signal}, shutting down`);
  server.close(() => {
    db.close();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
