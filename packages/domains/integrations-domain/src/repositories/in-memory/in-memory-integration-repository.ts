import { Integration, type IntegrationProps, type PlatformName } from '../../entities/integration.js';
import type { IntegrationRepository } from '../integration-repository.js';

export class InMemoryIntegrationRepository implements IntegrationRepository {
  private readonly rows = new Map<string, IntegrationProps>();

  async save(integration: Integration): Promise<void> {
    this.rows.set(integration.id, { ...integration.toProps() });
  }

  async findById(id: string): Promise<Integration | null> {
    const row = this.rows.get(id);
    return row ? Integration.reconstitute(row) : null;
  }

  async findAll(options: { includeDeleted?: boolean } = {}): Promise<Integration[]> {
    return [...this.rows.values()]
      .filter((row) => options.includeDeleted || row.deletedAt === null)
      .map((row) => Integration.reconstitute(row));
  }

  async findByPlatform(platformName: PlatformName): Promise<Integration[]> {
    return (await this.findAll()).filter((integration) => integration.platformName === platformName);
  }

  async update(integration: Integration): Promise<void> {
    await this.save(integration);
  }
}
