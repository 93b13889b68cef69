import {
  CircuitBreakerStateSchema,
  type CircuitBreakerState,
  type CircuitBreakerStateRepository,
} from '@marketsync/integrations-domain';
import { circuitBreakerStates } from '@marketsync/integrations-domain/drizzle';
import type { Database } from '@marketsync/process-lib';
import { eq } from 'drizzle-orm';

export class DrizzleCircuitBreakerStateRepository implements CircuitBreakerStateRepository {
  constructor(private readonly db: Database) {}

  async find(integrationId: string): Promise<CircuitBreakerState | null> {
    const [row] = await this.db
      .select()
      .from(circuitBreakerStates)
      .where(eq(circuitBreakerStates.integrationId, integrationId));
    return row ? CircuitBreakerStateSchema.parse(row) : null;
  }

  async save(state: CircuitBreakerState): Promise<void> {
    const { integrationId, ...changes } = state;
    await this.db
      .insert(circuitBreakerStates)
      .values(state)
      .onConflictDoUpdate({ target: circuitBreakerStates.integrationId, set: changes });
  }
}
