// Logging
export { createLogger, REDACTED_PATHS } from './logger/logger.js';
export type { CreateLoggerOptions, LogSink } from './logger/logger.js';

// Redis
export { getRedis, closeRedis } from './redis/connection.js';
export type { RedisConnectionOptions } from './redis/connection.js';

// BullMQ
export { createQueue, createWorker } from './bullmq/job-processor.js';
export type { JobHandler } from './bullmq/job-processor.js';

// Database
export { createDatabase, closeDatabase } from './database/connection.js';
export type { Database, DbExecutor } from './database/connection.js';
export { withTransaction } from './database/transaction.js';

// Scheduler
export { registerScheduledJobs } from './scheduler/cron.js';
export type { ScheduledJob } from './scheduler/cron.js';
