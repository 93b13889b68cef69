import type { CircuitBreakerState } from '../entities/circuit-breaker-state.js';

export interface CircuitBreakerStateRepository {
  find(integrationId: string): Promise<CircuitBreakerState | null>;
  save(state: CircuitBreakerState): Promise<void>;
}
