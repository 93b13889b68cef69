export * from './clock.js';
export * from './keyed-mutex.js';
export * from './semaphore.js';
export * from './token-bucket.js';
export * from './retry-policy.js';
export * from './circuit-breaker.js';
export * from './resilience-layer.js';
