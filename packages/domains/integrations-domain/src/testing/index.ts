export * from '../repositories/in-memory/index.js';
export * from './manual-clock.js';
export * from './fake-fetch.js';
export * from './recording-logger.js';
export * from './test-core.js';
