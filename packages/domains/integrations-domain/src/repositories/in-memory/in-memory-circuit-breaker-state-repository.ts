import type { CircuitBreakerState } from '../../entities/circuit-breaker-state.js';
import type { CircuitBreakerStateRepository } from '../circuit-breaker-state-repository.js';

export class InMemoryCircuitBreakerStateRepository implements CircuitBreakerStateRepository {
  private readonly rows = new Map<string, CircuitBreakerState>();

  async find(integrationId: string): Promise<CircuitBreakerState | null> {
    const row = this.rows.get(integrationId);
    return row ? { ...row } : null;
  }

  async save(state: CircuitBreakerState): Promise<void> {
    this.rows.set(state.integrationId, { ...state });
  }
}
