export * from './types.js';
export * from './connector.js';
export * from './auth.js';
export * from './http-transport.js';
export * from './signing.js';
export * from './catalog.js';
export * from './trendyol.js';
export * from './n11.js';
export * from './etsy.js';
export * from './stripe.js';
export * from './platforms.js';
