import { Queue, Worker, type Job } from 'bullmq';
import { getRedis } from '../redis/connection.js';

export interface JobHandler<TData = unknown, TResult = void> {
  name: string;
  process(job: Job<TData>): Promise<TResult>;
  concurrency?: number;
}

export function createQueue<TData = unknown>(name: string): Queue<TData> {
  return new Queue<TData>(name, { connection: getRedis() });
}

/**
 * Handlers must tolerate redelivery: a job id can run again after a stalled
 * worker or, for webhooks, after the sweep re-queues it.
 */
export function createWorker<TData, TResult = void>(
  queueName: string,
  handler: JobHandler<TData, TResult>,
): Worker<TData, TResult> {
  return new Worker<TData, TResult>(queueName, async (job) => handler.process(job), {
    connection: getRedis(),
    concurrency: handler.concurrency ?? 5,
  });
}
