import { createQueue } from '@marketsync/process-lib';
import type { Logger, WebhookDispatchQueue } from '@marketsync/integrations-domain';
import type { Queue } from 'bullmq';

export const QUEUE_NAMES = {
  syncRun: 'sync-run',
  webhookProcess: 'webhooks-process',
  webhookSweep: 'webhooks-sweep',
} as const;

export interface SyncRunData {
  jobId: string;
}

export interface WebhookProcessData {
  eventId: string;
}

/** Hands a persisted sync job to whatever runs `SyncOrchestrator.executeJob`. */
export interface SyncDispatcher {
  dispatch(jobId: string): Promise<void>;
}

export class BullSyncDispatcher implements SyncDispatcher {
  constructor(private readonly queue: Queue<SyncRunData> = createQueue<SyncRunData>(QUEUE_NAMES.syncRun)) {}

  async dispatch(jobId: string): Promise<void> {
    // The job id doubles as the BullMQ id so a repeated dispatch is a no-op.
    await this.queue.add('sync:run', { jobId }, { jobId, removeOnComplete: 1000, removeOnFail: 5000 });
  }
}

/** Runs jobs in this process after the request has returned. */
export class InlineSyncDispatcher implements SyncDispatcher {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly run: (jobId: string) => Promise<unknown>,
    private readonly logger: Logger,
  ) {}

  async dispatch(jobId: string): Promise<void> {
    const task = Promise.resolve()
      .then(() => this.run(jobId))
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.error({ err: error, jobId }, 'inline sync job failed');
        },
      );
    this.pending.add(task);
    void task.then(() => this.pending.delete(task));
  }

  async drain(): Promise<void> {
    while (this.pending.size > 0) await Promise.all([...this.pending]);
  }
}

export class BullWebhookQueue implements WebhookDispatchQueue {
  constructor(
    private readonly queue: Queue<WebhookProcessData> = createQueue<WebhookProcessData>(
      QUEUE_NAMES.webhookProcess,
    ),
  ) {}

  async enqueue(eventId: string): Promise<void> {
    // Finished jobs are removed so the sweep can queue the same event again.
    await this.queue.add(
      'webhooks:process',
      { eventId },
      { jobId: eventId, removeOnComplete: true, removeOnFail: true },
    );
  }
}
