import { Ledger } from '../../src/domain/ledger.js';
import { SqliteGateway } from '../../src/db/sqliteGateway.js';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { openDatabase } from './db.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const db = openDatabase(config.dbPath);
  const ledger = await Ledger.load(new SqliteGateway(db));
  const app = createApp(ledger, { targetHours: config.targetHours });

  const server = app.listen(config.port, () => {
    console.log(`[API] Hours ledger listening on http://localhost:${config.port} (db: ${config.dbPath})`);
  });

  const shutdown = (): void => {
    server.close(() => {
      db.close();
      console.log('[API] Stopped');
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error('[API] Failed to start:', error);
  process.exit(1);
});
