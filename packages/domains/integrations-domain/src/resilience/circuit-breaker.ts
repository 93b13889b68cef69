import { Result } from '@marketsync/domain-kernel';
import {
  initialCircuitState,
  type CircuitBreakerState,
} from '../entities/circuit-breaker-state.js';
import {
  CircuitOpenError,
  countsTowardCircuit,
  type ConnectorError,
} from '../errors/connector-errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { CircuitBreakerStateRepository } from '../repositories/circuit-breaker-state-repository.js';
import { systemClock, type Clock } from './clock.js';
import { KeyedMutex } from './keyed-mutex.js';

export interface CircuitBreakerPolicy {
  threshold: number;
  baseBackoffMs: number;
  maxBackoffMs: number;
  /** A half-open trial older than this is presumed lost and another is allowed. */
  trialTimeoutMs: number;
}

export type CallOutcome = 'success' | 'failure' | 'neutral';

export type AdmissionDecision =
  | { allowed: true; trial: boolean; state: CircuitBreakerState }
  | { allowed: false; state: CircuitBreakerState };

export interface Admission {
  trial: boolean;
}

export function classifyOutcome(error: ConnectorError | null): CallOutcome {
  if (error === null) return 'success';
  return countsTowardCircuit(error) ? 'failure' : 'neutral';
}

export function backoffFor(openCount: number, policy: CircuitBreakerPolicy): number {
  return Math.min(policy.maxBackoffMs, policy.baseBackoffMs * 2 ** openCount);
}

function trialInFlight(state: CircuitBreakerState, policy: CircuitBreakerPolicy, now: Date): boolean {
  return (
    state.trialStartedAt !== null &&
    now.getTime() - state.trialStartedAt.getTime() < policy.trialTimeoutMs
  );
}

/** Would a call be rejected right now? Read-only. */
export function isBlocked(
  state: CircuitBreakerState,
  policy: CircuitBreakerPolicy,
  now: Date,
): boolean {
  if (state.state === 'open') {
    return state.nextTrialAt === null || now < state.nextTrialAt;
  }
  if (state.state === 'half_open') return trialInFlight(state, policy, now);
  return false;
}

export function evaluateAdmission(
  state: CircuitBreakerState,
  policy: CircuitBreakerPolicy,
  now: Date,
): AdmissionDecision {
  switch (state.state) {
    case 'closed':
      return { allowed: true, trial: false, state };
    case 'open':
      if (state.nextTrialAt !== null && now >= state.nextTrialAt) {
        return {
          allowed: true,
          trial: true,
          state: { ...state, state: 'half_open', trialStartedAt: now, updatedAt: now },
        };
      }
      return { allowed: false, state };
    case 'half_open':
      if (trialInFlight(state, policy, now)) return { allowed: false, state };
      return {
        allowed: true,
        trial: true,
        state: { ...state, trialStartedAt: now, updatedAt: now },
      };
  }
}

function trip(state: CircuitBreakerState, policy: CircuitBreakerPolicy, now: Date): CircuitBreakerState {
  return {
    ...state,
    state: 'open',
    openCount: state.openCount + 1,
    openedAt: now,
    nextTrialAt: new Date(now.getTime() + backoffFor(state.openCount, policy)),
    trialStartedAt: null,
    updatedAt: now,
  };
}

export function applyOutcome(
  state: CircuitBreakerState,
  outcome: CallOutcome,
  admission: Admission,
  policy: CircuitBreakerPolicy,
  now: Date,
): CircuitBreakerState {
  switch (state.state) {
    case 'closed': {
      if (outcome === 'success') {
        return state.consecutiveFailures === 0
          ? state
          : { ...state, consecutiveFailures: 0, updatedAt: now };
      }
      if (outcome === 'neutral') return state;
      const failed = { ...state, consecutiveFailures: state.consecutiveFailures + 1, updatedAt: now };
      return failed.consecutiveFailures >= policy.threshold ? trip(failed, policy, now) : failed;
    }
    case 'half_open': {
      // Results of calls admitted before the circuit opened do not decide the trial.
      if (!admission.trial) return state;
      if (outcome === 'failure') {
        return trip({ ...state, consecutiveFailures: state.consecutiveFailures + 1 }, policy, now);
      }
      return { ...initialCircuitState(state.integrationId, now) };
    }
    case 'open':
      return state;
  }
}

export interface CircuitBreakerDeps {
  repository: CircuitBreakerStateRepository;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Persistent per-integration breaker. Every read-modify-write of a state row
 * happens under that integration's lock.
 */
export class CircuitBreaker {
  private readonly mutex = new KeyedMutex();
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(private readonly deps: CircuitBreakerDeps) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? silentLogger;
  }

  async getState(integrationId: string): Promise<CircuitBreakerState> {
    return (
      (await this.deps.repository.find(integrationId)) ??
      initialCircuitState(integrationId, new Date(this.clock.now()))
    );
  }

  /** Fails fast without taking the lock or a rate-limit token. */
  async precheck(
    integrationId: string,
    policy: CircuitBreakerPolicy,
  ): Promise<CircuitOpenError | null> {
    const state = await this.getState(integrationId);
    return isBlocked(state, policy, new Date(this.clock.now()))
      ? new CircuitOpenError(integrationId, state.nextTrialAt)
      : null;
  }

  async admit(
    integrationId: string,
    policy: CircuitBreakerPolicy,
  ): Promise<Result<Admission, CircuitOpenError>> {
    return this.mutex.run<Result<Admission, CircuitOpenError>>(integrationId, async () => {
      const current = await this.getState(integrationId);
      const decision = evaluateAdmission(current, policy, new Date(this.clock.now()));
      if (!decision.allowed) {
        return Result.fail(new CircuitOpenError(integrationId, current.nextTrialAt));
      }
      if (decision.state !== current) {
        await this.deps.repository.save(decision.state);
        if (decision.trial) {
          this.logger.info({ integrationId }, 'circuit half-open, probing');
        }
      }
      return Result.ok({ trial: decision.trial });
    });
  }

  async record(
    integrationId: string,
    policy: CircuitBreakerPolicy,
    outcome: CallOutcome,
    admission: Admission,
  ): Promise<CircuitBreakerState> {
    return this.mutex.run(integrationId, async () => {
      const current = await this.getState(integrationId);
      const next = applyOutcome(current, outcome, admission, policy, new Date(this.clock.now()));
      if (next !== current) {
        await this.deps.repository.save(next);
        if (next.state !== current.state) {
          this.logger.warn(
            {
              integrationId,
              from: current.state,
              to: next.state,
              consecutiveFailures: next.consecutiveFailures,
              nextTrialAt: next.nextTrialAt?.toISOString() ?? null,
            },
            'circuit state changed',
          );
        }
      }
      return next;
    });
  }

  async reset(integrationId: string): Promise<void> {
    await this.mutex.run(integrationId, () =>
      this.deps.repository.save(initialCircuitState(integrationId, new Date(this.clock.now()))),
    );
  }
}
