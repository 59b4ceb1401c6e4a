// ---------------------------------------------------------------------------
// directory-sync entry point
// ---------------------------------------------------------------------------

import fs from 'fs';
import { buildServer } from './app';
import { config } from './config';
import { createDb, initDb } from './db';
import { createLogger, loggerOptions } from './logger';
import { createHttpAgent } from './okta/api-client';
import { createProvider } from './providers';
import { SyncErrorReporter } from './sync/error-reporter';
import { SyncOrchestrator } from './sync/orchestrator';
import { SyncScheduler } from './sync/scheduler';
import { SyncStore } from './sync/store';

async function start(): Promise<void> {
  const logger = createLogger(config.logLevel);

  // ── Database ──────────────────────────────────────────────────────────────
  const db = createDb(config.databasePath);
  await initDb(db);
  logger.info({ databasePath: config.databasePath }, 'Database initialised');

  // ── Sync engine ───────────────────────────────────────────────────────────
  const agent = createHttpAgent(config.http);
  const store = new SyncStore(db);
  const reporter = new SyncErrorReporter(store, { autoDisable: config.sync.autoDisable, logger });
  const orchestrator = new SyncOrchestrator({
    store,
    reporter,
    createProvider,
    provider: { http: config.http, dispatcher: agent },
    logger,
  });
  const scheduler = new SyncScheduler(orchestrator, store, {
    intervalMs: config.sync.intervalMinutes * 60_000,
    logger,
  });

  // ── HTTP ──────────────────────────────────────────────────────────────────
  const server = await buildServer({
    apiKey: config.apiKey,
    logger: loggerOptions(config.logLevel),
    https: config.ssl
      ? { key: fs.readFileSync(config.ssl.keyPath), cert: fs.readFileSync(config.ssl.certPath) }
      : null,
    store,
    orchestrator,
    scheduler,
  });

  // ── Shutdown ──────────────────────────────────────────────────────────────
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down');
    await scheduler.stop();
    await server.close();
    await agent.close();
    await db.destroy();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  // ── Start ─────────────────────────────────────────────────────────────────
  await server.listen({ port: config.port, host: config.host });
  scheduler.start();
}

start().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
