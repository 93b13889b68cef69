import type { Integration, PlatformName } from '../entities/integration.js';

export interface IntegrationRepository {
  save(integration: Integration): Promise<void>;
  findById(id: string): Promise<Integration | null>;
  /** Excludes soft-deleted rows unless asked. */
  findAll(options?: { includeDeleted?: boolean }): Promise<Integration[]>;
  findByPlatform(platformName: PlatformName): Promise<Integration[]>;
  update(integration: Integration): Promise<void>;
}
