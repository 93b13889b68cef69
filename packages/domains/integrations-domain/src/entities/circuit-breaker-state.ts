import { z } from 'zod';

export const CircuitStateSchema = z.enum(['closed', 'open', 'half_open']);
export type CircuitState = z.infer<typeof CircuitStateSchema>;

export const CircuitBreakerStateSchema = z.object({
  integrationId: z.string().uuid(),
  state: CircuitStateSchema,
  consecutiveFailures: z.number().int().nonnegative(),
  /** Times the circuit has opened since it last closed; drives the backoff exponent. */
  openCount: z.number().int().nonnegative(),
  openedAt: z.coerce.date().nullable(),
  nextTrialAt: z.coerce.date().nullable(),
  /** Set while a half-open trial is in flight. */
  trialStartedAt: z.coerce.date().nullable(),
  updatedAt: z.coerce.date(),
});

export type CircuitBreakerState = z.infer<typeof CircuitBreakerStateSchema>;

export function initialCircuitState(integrationId: string, now: Date = new Date()): CircuitBreakerState {
  return {
    integrationId,
    state: 'closed',
    consecutiveFailures: 0,
    openCount: 0,
    openedAt: null,
    nextTrialAt: null,
    trialStartedAt: null,
    updatedAt: now,
  };
}
