export * from './sync-entities.js';
export * from './mapping-store.js';
export * from './integration-registry.js';
export * from './sync-orchestrator.js';
export * from './webhook-handlers.js';
export * from './order-status-reconciler.js';
export * from './webhook-ingestion.js';
export * from './integration-service.js';
export * from './integration-core.js';
export * from './order-import.js';
