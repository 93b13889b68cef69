import {
  Integration,
  IntegrationPropsSchema,
  type IntegrationRepository,
  type PlatformName,
} from '@marketsync/integrations-domain';
import { integrations } from '@marketsync/integrations-domain/drizzle';
import type { Database } from '@marketsync/process-lib';
import { and, asc, eq, isNull } from 'drizzle-orm';

export type IntegrationRow = typeof integrations.$inferSelect;

export function toIntegration(row: IntegrationRow): Integration {
  return Integration.reconstitute(IntegrationPropsSchema.parse(row));
}

function toRow(integration: Integration) {
  const props = integration.toProps();
  return {
    id: props.id,
    platformName: props.platformName,
    category: props.category,
    name: props.name,
    credentialsRef: props.credentialsRef,
    enabled: props.enabled,
    sandboxMode: props.sandboxMode,
    settings: props.settings,
    lastSyncAt: props.lastSyncAt,
    syncWatermarks: props.syncWatermarks,
    healthState: props.healthState,
    lastHealthCheckAt: props.lastHealthCheckAt,
    deletedAt: props.deletedAt,
    createdAt: props.createdAt,
    updatedAt: props.updatedAt,
  };
}

export class DrizzleIntegrationRepository implements IntegrationRepository {
  constructor(private readonly db: Database) {}

  async save(integration: Integration): Promise<void> {
    await this.db.insert(integrations).values(toRow(integration));
  }

  async findById(id: string): Promise<Integration | null> {
    const [row] = await this.db.select().from(integrations).where(eq(integrations.id, id));
    return row ? toIntegration(row) : null;
  }

  async findAll(options: { includeDeleted?: boolean } = {}): Promise<Integration[]> {
    const rows = await this.db
      .select()
      .from(integrations)
      .where(options.includeDeleted ? undefined : isNull(integrations.deletedAt))
      .orderBy(asc(integrations.createdAt));
    return rows.map(toIntegration);
  }

  async findByPlatform(platformName: PlatformName): Promise<Integration[]> {
    const rows = await this.db
      .select()
      .from(integrations)
      .where(and(eq(integrations.platformName, platformName), isNull(integrations.deletedAt)))
      .orderBy(asc(integrations.createdAt));
    return rows.map(toIntegration);
  }

  async update(integration: Integration): Promise<void> {
    const { id, ...changes } = toRow(integration);
    await this.db.update(integrations).set(changes).where(eq(integrations.id, id));
  }
}
