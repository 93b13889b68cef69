export * from './integration-settings.js';
export * from './integration.js';
export * from './mapping-record.js';
export * from './sync-job.js';
export * from './sync-log.js';
export * from './circuit-breaker-state.js';
export * from './webhook-event.js';
