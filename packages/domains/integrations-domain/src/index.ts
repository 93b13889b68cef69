// Integrations Domain

export * from './logger.js';
export * from './errors/connector-errors.js';

// Entities
export * from './entities/index.js';

// Repository Interfaces
export * from './repositories/index.js';

// In-memory stores for database-less runs
export * from './repositories/in-memory/index.js';

// Commands
export * from './commands/index.js';

// Connectors
export * from './connectors/index.js';

// Resilience
export * from './resilience/index.js';

// Credential Vault
export * from './vault/index.js';

// Services
export * from './services/index.js';
