export * from './integration-repository.js';
export * from './credential-repository.js';
export * from './mapping-repository.js';
export * from './sync-job-repository.js';
export * from './sync-log-repository.js';
export * from './circuit-breaker-state-repository.js';
export * from './webhook-event-repository.js';
export * from './catalog-source.js';
