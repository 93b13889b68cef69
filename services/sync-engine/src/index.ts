import { serve } from '@hono/node-server';
import { closeDatabase, closeRedis, createLogger } from '@marketsync/process-lib';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createContainer } from './container.js';
import { startInlineSweep, startWorkers, type WorkerSet } from './workers.js';

const bootLogger = createLogger('sync-engine');

async function main() {
  const config = loadConfig();
  const logger = createLogger('sync-engine', { level: config.LOG_LEVEL });
  const { core, dispatcher, durable, queued } = createContainer(config, logger);

  if (!durable) logger.warn({}, 'DATABASE_URL is not set; using in-memory stores');

  let workerSet: WorkerSet | null = null;
  let stopSweep: (() => void) | null = null;
  if (queued) {
    workerSet = await startWorkers({
      orchestrator: core.orchestrator,
      webhooks: core.webhooks,
      sweepCron: config.WEBHOOK_SWEEP_CRON,
      sweepMinAgeMs: config.WEBHOOK_SWEEP_MIN_AGE_MS,
      logger,
    });
  } else {
    logger.warn({}, 'REDIS_URL is not set; sync jobs and webhooks run in-process');
    stopSweep = startInlineSweep(core.webhooks, {
      intervalMs: Math.max(config.WEBHOOK_SWEEP_MIN_AGE_MS, 60_000),
      minAgeMs: config.WEBHOOK_SWEEP_MIN_AGE_MS,
      logger,
    });
  }

  const app = createApp({
    integrations: core.integrations,
    orderImport: core.orderImport,
    orchestrator: core.orchestrator,
    webhooks: core.webhooks,
    dispatcher,
    logger,
  });

  const server = serve({ fetch: app.fetch, port: config.PORT }, (info) => {
    logger.info({ port: info.port, publicBaseUrl: config.PUBLIC_BASE_URL }, 'Sync engine listening');
  });

  const shutdown = async () => {
    logger.info('Shutting down');
    stopSweep?.();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    if (workerSet) {
      await Promise.all(workerSet.workers.map((worker) => worker.close()));
      await workerSet.scheduler.close();
      await closeRedis();
    }
    await closeDatabase();
    logger.info('Shutdown complete');
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((error: unknown) => {
  bootLogger.fatal({ err: error }, 'Fatal error');
  process.exit(1);
});
