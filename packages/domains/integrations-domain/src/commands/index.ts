export * from './trigger-sync.js';
export * from './create-integration.js';
export * from './update-settings.js';
export * from './configure-credentials.js';
