import { z } from 'zod';

/**
 * Per-integration operational settings. Stored as JSON on the integration
 * row and merged over the platform defaults at resolve time.
 */
export const IntegrationSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  sandboxMode: z.boolean().default(false),
  baseUrl: z.string().url().optional(),
  rateLimitPerSecond: z.number().positive().default(10),
  rateLimitBurst: z.number().int().positive().optional(),
  rateLimitTimeoutMs: z.number().int().nonnegative().default(30_000),
  circuitBreakerThreshold: z.number().int().min(1).default(5),
  circuitBreakerBaseBackoffMs: z.number().int().positive().default(5_000),
  circuitBreakerMaxBackoffMs: z.number().int().positive().default(300_000),
  retryMaxAttempts: z.number().int().min(1).max(10).default(3),
  retryBaseDelayMs: z.number().int().nonnegative().default(500),
  requestTimeoutMs: z.number().int().positive().default(30_000),
  maxConcurrency: z.number().int().min(1).default(4),
});

export type IntegrationSettings = z.infer<typeof IntegrationSettingsSchema>;
export type IntegrationSettingsInput = z.input<typeof IntegrationSettingsSchema>;

export const IntegrationSettingsPatchSchema = z
  .object({
    enabled: z.boolean(),
    sandboxMode: z.boolean(),
    baseUrl: z.string().url(),
    rateLimitPerSecond: z.number().positive(),
    rateLimitBurst: z.number().int().positive(),
    rateLimitTimeoutMs: z.number().int().nonnegative(),
    circuitBreakerThreshold: z.number().int().min(1),
    circuitBreakerBaseBackoffMs: z.number().int().positive(),
    circuitBreakerMaxBackoffMs: z.number().int().positive(),
    retryMaxAttempts: z.number().int().min(1).max(10),
    retryBaseDelayMs: z.number().int().nonnegative(),
    requestTimeoutMs: z.number().int().positive(),
    maxConcurrency: z.number().int().min(1),
  })
  .partial();

export type IntegrationSettingsPatch = z.infer<typeof IntegrationSettingsPatchSchema>;

export function resolveSettings(
  defaults: IntegrationSettingsPatch,
  overrides: IntegrationSettingsPatch,
): IntegrationSettings {
  return IntegrationSettingsSchema.parse({ ...defaults, ...overrides });
}
