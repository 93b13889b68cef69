import { Queue } from 'bullmq';
import type { LogSink } from '../logger/logger.js';
import { getRedis } from '../redis/connection.js';

export interface ScheduledJob {
  name: string;
  pattern: string;
  data?: Record<string, unknown>;
}

/**
 * Upserts one scheduler per job and removes schedulers on the queue that are
 * no longer listed, so a renamed or dropped schedule stops firing.
 */
export async function registerScheduledJobs(
  queueName: string,
  jobs: ScheduledJob[],
  logger?: LogSink,
): Promise<Queue> {
  const queue = new Queue(queueName, { connection: getRedis() });
  const wanted = new Set(jobs.map((job) => job.name));

  for (const existing of await queue.getJobSchedulers()) {
    if (!wanted.has(existing.key)) {
      await queue.removeJobScheduler(existing.key);
      logger?.info({ queue: queueName, scheduler: existing.key }, 'Removed stale job scheduler');
    }
  }

  for (const job of jobs) {
    await queue.upsertJobScheduler(job.name, { pattern: job.pattern }, { name: job.name, data: job.data ?? {} });
    logger?.info({ queue: queueName, scheduler: job.name, pattern: job.pattern }, 'Registered job scheduler');
  }
  return queue;
}
