import {
  createWorker,
  registerScheduledJobs,
  type JobHandler,
} from '@marketsync/process-lib';
import type {
  Logger,
  SyncOrchestrator,
  WebhookIngestion,
  WebhookOutcome,
} from '@marketsync/integrations-domain';
import type { Job, Queue, Worker } from 'bullmq';
import { QUEUE_NAMES, type SyncRunData, type WebhookProcessData } from './infrastructure/queues.js';

export interface SyncRunSummary {
  jobId: string;
  status: string;
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
}

export function syncRunHandler(orchestrator: SyncOrchestrator): JobHandler<SyncRunData, SyncRunSummary> {
  return {
    name: 'sync:run',
    concurrency: 2,
    async process(job: Job<SyncRunData>) {
      const { job: result } = await orchestrator.executeJob(job.data.jobId);
      return { jobId: result.id, status: result.status, ...result.counts };
    },
  };
}

export function webhookProcessHandler(
  webhooks: WebhookIngestion,
): JobHandler<WebhookProcessData, WebhookOutcome | null> {
  return {
    name: 'webhooks:process',
    concurrency: 10,
    async process(job: Job<WebhookProcessData>) {
      return webhooks.process(job.data.eventId);
    },
  };
}

export function webhookSweepHandler(
  webhooks: WebhookIngestion,
  minAgeMs: number,
): JobHandler<Record<string, unknown>, number> {
  return {
    name: 'webhooks:sweep',
    concurrency: 1,
    async process() {
      return webhooks.sweep({ minAgeMs });
    },
  };
}

export interface WorkerSet {
  workers: Worker[];
  scheduler: Queue;
}

export async function startWorkers(deps: {
  orchestrator: SyncOrchestrator;
  webhooks: WebhookIngestion;
  sweepCron: string;
  sweepMinAgeMs: number;
  logger: Logger;
}): Promise<WorkerSet> {
  const workers: Worker[] = [
    createWorker(QUEUE_NAMES.syncRun, syncRunHandler(deps.orchestrator)),
    createWorker(QUEUE_NAMES.webhookProcess, webhookProcessHandler(deps.webhooks)),
    createWorker(QUEUE_NAMES.webhookSweep, webhookSweepHandler(deps.webhooks, deps.sweepMinAgeMs)),
  ];

  const scheduler = await registerScheduledJobs(QUEUE_NAMES.webhookSweep, [
    { name: 'webhooks:sweep', pattern: deps.sweepCron },
  ], deps.logger);

  for (const worker of workers) {
    worker.on('completed', (job) => {
      deps.logger.debug({ jobId: job.id, queue: worker.name }, 'Job completed');
    });

    worker.on('failed', (job, err) => {
      deps.logger.error({ jobId: job?.id, queue: worker.name, err }, 'Job failed');
    });
  }

  return { workers, scheduler };
}

/** Database-only fallback for the sweep when no Redis is configured. */
export function startInlineSweep(
  webhooks: WebhookIngestion,
  options: { intervalMs: number; minAgeMs: number; logger: Logger },
): () => void {
  const timer = setInterval(() => {
    void webhooks.sweep({ minAgeMs: options.minAgeMs }).catch((error: unknown) => {
      options.logger.error({ err: error }, 'webhook sweep failed');
    });
  }, options.intervalMs);
  timer.unref();
  return () => clearInterval(timer);
}
