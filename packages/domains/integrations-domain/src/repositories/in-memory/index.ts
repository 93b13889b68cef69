export * from './in-memory-integration-repository.js';
export * from './in-memory-credential-repository.js';
export * from './in-memory-mapping-repository.js';
export * from './in-memory-sync-job-repository.js';
export * from './in-memory-sync-log-repository.js';
export * from './in-memory-circuit-breaker-state-repository.js';
export * from './in-memory-webhook-event-repository.js';
export * from './in-memory-catalog.js';
