export * from './cipher.js';
export * from './credential-handle.js';
export * from './credential-validation.js';
export * from './credential-vault.js';
