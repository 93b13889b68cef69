import { z } from 'zod';
import { InvariantViolation } from '@marketsync/domain-kernel';
import {
  IntegrationSettingsPatchSchema,
  type IntegrationSettingsPatch,
} from './integration-settings.js';
import { SyncEntityTypeSchema, type SyncEntityType } from './sync-job.js';

export const PlatformNameSchema = z.enum(['trendyol', 'n11', 'etsy', 'stripe']);
export type PlatformName = z.infer<typeof PlatformNameSchema>;

export const IntegrationCategorySchema = z.enum([
  'marketplace',
  'payment',
  'shipping',
  'einvoice',
]);
export type IntegrationCategory = z.infer<typeof IntegrationCategorySchema>;

export const HealthStateSchema = z.enum(['unknown', 'healthy', 'degraded', 'unreachable']);
export type HealthState = z.infer<typeof HealthStateSchema>;

export const IntegrationPropsSchema = z.object({
  id: z.string().uuid(),
  platformName: PlatformNameSchema,
  category: IntegrationCategorySchema,
  name: z.string().min(1),
  credentialsRef: z.string().nullable(),
  enabled: z.boolean(),
  sandboxMode: z.boolean(),
  settings: IntegrationSettingsPatchSchema,
  lastSyncAt: z.coerce.date().nullable(),
  /** Per entity type: the requestedAt of the last delta or full sync that finished. */
  syncWatermarks: z.record(SyncEntityTypeSchema, z.coerce.date()),
  healthState: HealthStateSchema,
  lastHealthCheckAt: z.coerce.date().nullable(),
  deletedAt: z.coerce.date().nullable(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export type IntegrationProps = z.infer<typeof IntegrationPropsSchema>;

export class Integration {
  private constructor(private props: IntegrationProps) {}

  static create(input: {
    platformName: PlatformName;
    category: IntegrationCategory;
    name: string;
    settings?: IntegrationSettingsPatch;
  }): Integration {
    const { enabled, sandboxMode, ...settings } = input.settings ?? {};
    return new Integration(
      IntegrationPropsSchema.parse({
        id: crypto.randomUUID(),
        platformName: input.platformName,
        category: input.category,
        name: input.name,
        credentialsRef: null,
        enabled: enabled ?? true,
        sandboxMode: sandboxMode ?? false,
        settings,
        lastSyncAt: null,
        syncWatermarks: {},
        healthState: 'unknown',
        lastHealthCheckAt: null,
        deletedAt: null,
        createdAt: new Date(),
        updatedAt: new Date(),
      }),
    );
  }

  static reconstitute(props: IntegrationProps): Integration {
    return new Integration(IntegrationPropsSchema.parse(props));
  }

  get id(): string {
    return this.props.id;
  }
  get platformName(): PlatformName {
    return this.props.platformName;
  }
  get category(): IntegrationCategory {
    return this.props.category;
  }
  get name(): string {
    return this.props.name;
  }
  get credentialsRef(): string | null {
    return this.props.credentialsRef;
  }
  get enabled(): boolean {
    return this.props.enabled;
  }
  get sandboxMode(): boolean {
    return this.props.sandboxMode;
  }
  get lastSyncAt(): Date | null {
    return this.props.lastSyncAt;
  }
  watermarkFor(entityType: SyncEntityType): Date | null {
    return this.props.syncWatermarks[entityType] ?? null;
  }
  get healthState(): HealthState {
    return this.props.healthState;
  }
  get lastHealthCheckAt(): Date | null {
    return this.props.lastHealthCheckAt;
  }
  get deletedAt(): Date | null {
    return this.props.deletedAt;
  }
  get createdAt(): Date {
    return this.props.createdAt;
  }
  get updatedAt(): Date {
    return this.props.updatedAt;
  }

  /** Stored overrides, including the enabled and sandbox flags. */
  get settingsOverrides(): IntegrationSettingsPatch {
    return {
      ...this.props.settings,
      enabled: this.props.enabled,
      sandboxMode: this.props.sandboxMode,
    };
  }

  isActive(): boolean {
    return this.props.enabled && this.props.deletedAt === null;
  }

  updateSettings(patch: IntegrationSettingsPatch): void {
    this.assertNotDeleted();
    const { enabled, sandboxMode, ...rest } = IntegrationSettingsPatchSchema.parse(patch);
    if (enabled !== undefined) this.props.enabled = enabled;
    if (sandboxMode !== undefined) this.props.sandboxMode = sandboxMode;
    this.props.settings = { ...this.props.settings, ...rest };
    this.props.updatedAt = new Date();
  }

  rename(name: string): void {
    this.assertNotDeleted();
    this.props.name = z.string().min(1).parse(name);
    this.props.updatedAt = new Date();
  }

  attachCredentials(credentialsRef: string): void {
    this.assertNotDeleted();
    this.props.credentialsRef = credentialsRef;
    this.props.updatedAt = new Date();
  }

  /** Watermarks only move forward. */
  markSynced(entityType: SyncEntityType, at: Date = new Date()): void {
    const current = this.props.syncWatermarks[entityType];
    if (current && current >= at) return;
    this.props.syncWatermarks = { ...this.props.syncWatermarks, [entityType]: at };
    if (!this.props.lastSyncAt || this.props.lastSyncAt < at) this.props.lastSyncAt = at;
    this.props.updatedAt = new Date();
  }

  recordHealth(state: HealthState, at: Date = new Date()): void {
    this.props.healthState = state;
    this.props.lastHealthCheckAt = at;
    this.props.updatedAt = new Date();
  }

  softDelete(): void {
    if (this.props.deletedAt) return;
    this.props.deletedAt = new Date();
    this.props.enabled = false;
    this.props.updatedAt = new Date();
  }

  toProps(): Readonly<IntegrationProps> {
    return Object.freeze({ ...this.props });
  }

  private assertNotDeleted(): void {
    if (this.props.deletedAt) {
      throw new InvariantViolation(`Integration ${this.props.id} has been deleted`);
    }
  }
}
