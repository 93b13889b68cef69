import {
  boolean,
  index,
  integer,
  jsonb,
  pgSchema,
  text,
  timestamp,
  uniqueIndex,
  uuid,
  varchar,
} from 'drizzle-orm/pg-core';

export const integrationsSchema = pgSchema('integrations');

// Configured platform accounts
export const integrations = integrationsSchema.table('integrations', {
  id: uuid('id').primaryKey().defaultRandom(),
  platformName: varchar('platform_name', { length: 50 }).notNull(), // trendyol/n11/etsy/stripe
  category: varchar('category', { length: 30 }).notNull(), // marketplace/payment/shipping/einvoice
  name: varchar('name', { length: 255 }).notNull(),
  credentialsRef: varchar('credentials_ref', { length: 100 }),
  enabled: boolean('enabled').default(true).notNull(),
  sandboxMode: boolean('sandbox_mode').default(false).notNull(),
  settings: jsonb('settings').notNull(), // IntegrationSettingsPatch
  lastSyncAt: timestamp('last_sync_at'),
  syncWatermarks: jsonb('sync_watermarks').notNull(), // { [entityType]: ISO timestamp }
  healthState: varchar('health_state', { length: 20 }).notNull(), // unknown/healthy/degraded/unreachable
  lastHealthCheckAt: timestamp('last_health_check_at'),
  deletedAt: timestamp('deleted_at'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});

// AES-256-GCM encrypted credential sets, one per integration
export const integrationCredentials = integrationsSchema.table('integration_credentials', {
  ref: varchar('ref', { length: 100 }).primaryKey(),
  integrationId: uuid('integration_id')
    .notNull()
    .unique()
    .references(() => integrations.id, { onDelete: 'cascade' }),
  ciphertext: text('ciphertext').notNull(),
  keyVersion: integer('key_version').notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});

// Internal entity <-> platform listing/order
export const mappingRecords = integrationsSchema.table(
  'mapping_records',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    internalEntityId: text('internal_entity_id').notNull(),
    entityKind: varchar('entity_kind', { length: 20 }).notNull(), // product/order
    integrationId: uuid('integration_id')
      .notNull()
      .references(() => integrations.id, { onDelete: 'cascade' }),
    externalId: text('external_id'),
    payloadHashes: jsonb('payload_hashes').notNull(), // { [aspect]: sha256 hex }
    aspectStates: jsonb('aspect_states').default({}).notNull(), // { [aspect]: synced/error }
    lastSyncedAt: timestamp('last_synced_at'),
    syncState: varchar('sync_state', { length: 20 }).notNull(), // pending/synced/error, summary of aspect_states
    lastError: text('last_error'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    entityIntegrationIdx: uniqueIndex('mapping_records_entity_integration_idx').on(
      table.internalEntityId,
      table.integrationId,
    ),
    // One internal entity per platform id; rows without an external id are exempt.
    externalIdx: uniqueIndex('mapping_records_external_idx').on(table.integrationId, table.externalId),
  }),
);

export const syncJobs = integrationsSchema.table('sync_jobs', {
  id: uuid('id').primaryKey().defaultRandom(),
  entityType: varchar('entity_type', { length: 30 }).notNull(), // product/stock/price/order_status
  scope: jsonb('scope').notNull(), // SyncScope
  integrationIds: jsonb('integration_ids').notNull(), // string[]; empty means all active
  trigger: varchar('trigger', { length: 20 }).notNull(), // manual/delta/schedule
  status: varchar('status', { length: 30 }).notNull(),
  total: integer('total').default(0).notNull(),
  succeeded: integer('succeeded').default(0).notNull(),
  failed: integer('failed').default(0).notNull(),
  skipped: integer('skipped').default(0).notNull(),
  error: text('error'),
  requestedAt: timestamp('requested_at').defaultNow().notNull(),
  startedAt: timestamp('started_at'),
  completedAt: timestamp('completed_at'),
  cancelRequestedAt: timestamp('cancel_requested_at'),
});

// One terminal entry per (job, integration, item)
export const syncLogs = integrationsSchema.table(
  'sync_logs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    jobId: uuid('job_id')
      .notNull()
      .references(() => syncJobs.id, { onDelete: 'cascade' }),
    integrationId: uuid('integration_id').notNull(),
    itemId: text('item_id').notNull(),
    entityType: varchar('entity_type', { length: 30 }).notNull(),
    status: varchar('status', { length: 20 }).notNull(), // success/failed/skipped
    errorKind: varchar('error_kind', { length: 40 }),
    errorMessage: text('error_message'),
    externalId: text('external_id'),
    attempt: integer('attempt').default(0).notNull(),
    durationMs: integer('duration_ms').default(0).notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  (table) => ({
    pairIdx: uniqueIndex('sync_logs_job_pair_idx').on(table.jobId, table.integrationId, table.itemId),
  }),
);

export const circuitBreakerStates = integrationsSchema.table('circuit_breaker_states', {
  integrationId: uuid('integration_id')
    .primaryKey()
    .references(() => integrations.id, { onDelete: 'cascade' }),
  state: varchar('state', { length: 20 }).notNull(), // closed/open/half_open
  consecutiveFailures: integer('consecutive_failures').default(0).notNull(),
  openCount: integer('open_count').default(0).notNull(),
  openedAt: timestamp('opened_at'),
  nextTrialAt: timestamp('next_trial_at'),
  trialStartedAt: timestamp('trial_started_at'),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});

export const webhookEvents = integrationsSchema.table(
  'webhook_events',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    integrationId: uuid('integration_id')
      .notNull()
      .references(() => integrations.id, { onDelete: 'cascade' }),
    platformEventId: text('platform_event_id').notNull(),
    idempotencyKey: text('idempotency_key').notNull().unique(),
    eventType: varchar('event_type', { length: 100 }).notNull(),
    signatureValid: boolean('signature_valid').notNull(),
    payload: jsonb('payload').notNull(),
    event: jsonb('event'), // normalized InboundEvent, null for unhandled types
    receivedAt: timestamp('received_at').defaultNow().notNull(),
    processedAt: timestamp('processed_at'),
    outcome: varchar('outcome', { length: 20 }), // processed/ignored/unmapped
    attempts: integer('attempts').default(0).notNull(),
    lastError: text('last_error'),
  },
  (table) => ({
    unprocessedIdx: index('webhook_events_unprocessed_idx').on(table.processedAt, table.receivedAt),
  }),
);

// Internal catalog the outbound sync reads from
export const catalogItems = integrationsSchema.table(
  'catalog_items',
  {
    id: text('id').primaryKey(),
    payload: jsonb('payload').notNull(), // NormalizedProduct
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    updatedIdx: index('catalog_items_updated_idx').on(table.updatedAt),
  }),
);

// Internal order state, written by inbound status events
export const orderStates = integrationsSchema.table(
  'order_states',
  {
    id: text('id').primaryKey(),
    status: varchar('status', { length: 30 }).notNull(),
    trackingNumber: text('tracking_number'),
    carrier: varchar('carrier', { length: 100 }),
    source: jsonb('source'), // { integrationId, externalId } of the last inbound change
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    updatedIdx: index('order_states_updated_idx').on(table.updatedAt),
  }),
);
