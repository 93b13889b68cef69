import { NotFoundError } from '@marketsync/domain-kernel';
import { supports } from '../connectors/connector.js';
import type { Integration } from '../entities/integration.js';
import {
  SyncJob,
  type SyncCounts,
  type SyncEntityType,
  type SyncScope,
  type SyncTrigger,
} from '../entities/sync-job.js';
import {
  createSyncLogEntry,
  type SyncErrorKind,
  type SyncLogEntry,
  type SyncLogStatus,
} from '../entities/sync-log.js';
import {
  MappingConflictError,
  UnsupportedOperationError,
  type NotConfiguredError,
} from '../errors/connector-errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { CatalogSource } from '../repositories/catalog-source.js';
import type { IntegrationRepository } from '../repositories/integration-repository.js';
import type { SyncJobRepository } from '../repositories/sync-job-repository.js';
import type { SyncLogRepository } from '../repositories/sync-log-repository.js';
import type { ResilienceLayer } from '../resilience/resilience-layer.js';
import { Semaphore } from '../resilience/semaphore.js';
import type { IntegrationRegistry, ResolvedIntegration } from './integration-registry.js';
import type { MappingStore } from './mapping-store.js';
import { ENTITY_ASPECT, ENTITY_CAPABILITY, ENTITY_KIND, loadWork, type SyncWork } from './sync-entities.js';

export interface SyncOrchestratorDeps {
  jobs: SyncJobRepository;
  logs: SyncLogRepository;
  integrations: IntegrationRepository;
  registry: IntegrationRegistry;
  resilience: ResilienceLayer;
  mappings: MappingStore;
  catalog: CatalogSource;
  logger?: Logger;
  globalConcurrency?: number;
  /** When set, running jobs re-read their row this often to pick up cancellations from other processes. */
  cancelPollIntervalMs?: number;
}

export interface SyncRequest {
  entityType: SyncEntityType;
  scope: SyncScope;
  /** Empty targets every active integration that supports the entity type. */
  integrationIds?: string[];
  trigger?: SyncTrigger;
}

export interface SyncJobResult {
  job: SyncJob;
  entries: SyncLogEntry[];
}

interface ReadyTarget {
  kind: 'ready';
  integrationId: string;
  resolved: ResolvedIntegration;
  limiter: Semaphore;
}

interface UnavailableTarget {
  kind: 'unavailable';
  integrationId: string;
  error: NotConfiguredError;
}

type Target = ReadyTarget | UnavailableTarget;

interface PairOutcome {
  status: SyncLogStatus;
  errorKind?: SyncErrorKind;
  errorMessage?: string;
  externalId?: string | null;
  attempt?: number;
  durationMs?: number;
}

function tally(entries: SyncLogEntry[]): SyncCounts {
  const counts: SyncCounts = { total: entries.length, succeeded: 0, failed: 0, skipped: 0 };
  for (const entry of entries) {
    if (entry.status === 'success') counts.succeeded++;
    else if (entry.status === 'failed') counts.failed++;
    else counts.skipped++;
  }
  return counts;
}

/**
 * Fans a sync job out over (item, integration) pairs. Each pair ends in
 * exactly one log entry; a failing pair never stops the others.
 */
export class SyncOrchestrator {
  private readonly global: Semaphore;
  private readonly limiters = new Map<string, { limit: number; semaphore: Semaphore }>();
  private readonly running = new Map<string, AbortController>();
  private readonly logger: Logger;

  constructor(private readonly deps: SyncOrchestratorDeps) {
    this.global = new Semaphore(deps.globalConcurrency ?? 16);
    this.logger = deps.logger ?? silentLogger;
  }

  /** Persists a pending job; `executeJob` runs it. */
  async createJob(request: SyncRequest & { requestedAt?: Date }): Promise<SyncJob> {
    const job = SyncJob.create(request);
    await this.deps.jobs.save(job);
    this.logger.info(
      { jobId: job.id, entityType: job.entityType, scope: job.scope.kind, trigger: job.trigger },
      'sync job created',
    );
    return job;
  }

  async runSync(
    entityType: SyncEntityType,
    scope: SyncScope,
    integrationIds: string[] = [],
  ): Promise<SyncJobResult> {
    const job = await this.createJob({ entityType, scope, integrationIds });
    return this.executeJob(job.id);
  }

  /**
   * Builds a job covering items changed since each target's watermark plus
   * every item whose last push of this entity type is pending or failed.
   */
  async createDeltaJob(entityType: SyncEntityType, integrationIds: string[] = []): Promise<SyncJob> {
    const requestedAt = new Date();
    const targets = await this.deltaTargets(integrationIds);
    const kind = ENTITY_KIND[entityType];
    const aspect = ENTITY_ASPECT[entityType];

    const ids = new Set<string>();
    let earliest: Date | null = null;
    let full = targets.length === 0;
    for (const integration of targets) {
      const since = integration.watermarkFor(entityType);
      if (!since) {
        full = true;
        break;
      }
      if (!earliest || since < earliest) earliest = since;
      for (const id of await this.deps.catalog.listChangedSince(kind, since)) ids.add(id);
      for (const id of await this.deps.mappings.findUnsynced(integration.id, aspect)) ids.add(id);
    }

    let scope: SyncScope;
    if (full || !earliest) scope = { kind: 'all' };
    else if (ids.size > 0) scope = { kind: 'ids', ids: [...ids] };
    else scope = { kind: 'changed_since', since: earliest };

    return this.createJob({ entityType, scope, integrationIds, trigger: 'delta', requestedAt });
  }

  async runDeltaSync(entityType: SyncEntityType, integrationIds: string[] = []): Promise<SyncJobResult> {
    const job = await this.createDeltaJob(entityType, integrationIds);
    return this.executeJob(job.id);
  }

  async executeJob(jobId: string): Promise<SyncJobResult> {
    const job = await this.deps.jobs.findById(jobId);
    if (!job) throw new NotFoundError('SyncJob', jobId);
    if (job.isTerminal()) return { job, entries: await this.deps.logs.findByJob(jobId) };

    job.start();
    await this.deps.jobs.update(job);
    const controller = new AbortController();
    this.running.set(job.id, controller);
    const log = this.logger.child({ jobId: job.id, entityType: job.entityType });
    log.info({ scope: job.scope.kind, trigger: job.trigger }, 'sync job started');
    const poll = this.watchCancellation(job.id, controller, log);

    try {
      const targets = await this.resolveTargets(job, log);
      const work = await loadWork(this.deps.catalog, job.entityType, job.scope);
      const settled = await Promise.allSettled(
        work.flatMap((item) =>
          targets.map((target) => this.dispatch(job, target, item, controller.signal, log)),
        ),
      );
      // Every pair has finished by now; a pair whose log write threw fails the job.
      const rejected = settled.find((result): result is PromiseRejectedResult => result.status === 'rejected');
      if (rejected) throw rejected.reason;
      const entries = settled.flatMap((result) => (result.status === 'fulfilled' ? [result.value] : []));

      const latest = await this.deps.jobs.findById(job.id);
      if (controller.signal.aborted || latest?.cancelRequestedAt) job.requestCancel();
      job.complete(tally(entries));
      await this.deps.jobs.update(job);

      if (job.status !== 'cancelled' && (job.trigger === 'delta' || job.scope.kind === 'all')) {
        await this.advanceWatermarks(job, targets);
      }
      log.info({ status: job.status, ...job.counts }, 'sync job finished');
      return { job, entries };
    } catch (error) {
      log.error({ err: error }, 'sync job aborted by an unexpected error');
      job.fail(error instanceof Error ? error.message : String(error));
      await this.deps.jobs.update(job);
      return { job, entries: await this.deps.logs.findByJob(job.id) };
    } finally {
      if (poll) clearInterval(poll);
      this.running.delete(job.id);
    }
  }

  /**
   * Pending jobs are cancelled at once. Running jobs stop dispatching new
   * pairs; calls already in flight finish.
   */
  async cancel(jobId: string): Promise<SyncJob> {
    const job = await this.deps.jobs.findById(jobId);
    if (!job) throw new NotFoundError('SyncJob', jobId);
    job.requestCancel();
    await this.deps.jobs.update(job);
    this.running.get(jobId)?.abort();
    this.logger.info({ jobId, status: job.status }, 'sync job cancellation requested');
    return job;
  }

  async getJob(jobId: string): Promise<SyncJobResult | null> {
    const job = await this.deps.jobs.findById(jobId);
    if (!job) return null;
    return { job, entries: await this.deps.logs.findByJob(jobId) };
  }

  private watchCancellation(
    jobId: string,
    controller: AbortController,
    log: Logger,
  ): ReturnType<typeof setInterval> | null {
    const interval = this.deps.cancelPollIntervalMs;
    if (!interval) return null;
    const timer = setInterval(() => {
      void this.deps.jobs.findById(jobId).then(
        (latest) => {
          if (latest?.cancelRequestedAt && !controller.signal.aborted) {
            log.info({}, 'cancellation picked up from the job row');
            controller.abort();
          }
        },
        (error: unknown) => log.warn({ err: error }, 'cancellation check failed'),
      );
    }, interval);
    timer.unref();
    return timer;
  }

  private async deltaTargets(integrationIds: string[]): Promise<Integration[]> {
    if (integrationIds.length === 0) return this.deps.registry.active();
    const found = await Promise.all(integrationIds.map((id) => this.deps.integrations.findById(id)));
    return found.filter((integration): integration is Integration => integration !== null);
  }

  private async resolveTargets(job: SyncJob, log: Logger): Promise<Target[]> {
    const explicit = job.integrationIds.length > 0;
    const ids = explicit
      ? job.integrationIds
      : (await this.deps.registry.active()).map((integration) => integration.id);
    const capability = ENTITY_CAPABILITY[job.entityType];

    const targets: Target[] = [];
    for (const integrationId of ids) {
      const resolved = await this.deps.registry.resolve(integrationId);
      if (resolved.isFailure) {
        if (explicit) targets.push({ kind: 'unavailable', integrationId, error: resolved.getError() });
        else log.warn({ integrationId, reason: resolved.getError().message }, 'integration skipped');
        continue;
      }
      const value = resolved.getValue();
      if (!explicit && !supports(value.connector, capability)) continue;
      targets.push({
        kind: 'ready',
        integrationId,
        resolved: value,
        limiter: this.limiterFor(integrationId, value.settings.maxConcurrency),
      });
    }
    return targets;
  }

  private async dispatch(
    job: SyncJob,
    target: Target,
    work: SyncWork,
    signal: AbortSignal,
    log: Logger,
  ): Promise<SyncLogEntry> {
    let outcome: PairOutcome;
    if (target.kind === 'unavailable') {
      outcome = signal.aborted
        ? { status: 'skipped', errorKind: 'cancelled', errorMessage: 'Job cancelled before dispatch' }
        : { status: 'failed', errorKind: 'not_configured', errorMessage: target.error.message };
    } else {
      try {
        outcome = await target.limiter.run(() =>
          this.global.run(() => this.processPair(target, work, signal)),
        );
      } catch (error) {
        log.error(
          { err: error, integrationId: target.integrationId, itemId: work.itemId },
          'sync pair failed unexpectedly',
        );
        outcome = {
          status: 'failed',
          errorKind: 'internal',
          errorMessage: error instanceof Error ? error.message : String(error),
        };
      }
    }

    if (outcome.status === 'failed') {
      log.warn(
        { integrationId: target.integrationId, itemId: work.itemId, kind: outcome.errorKind },
        outcome.errorMessage,
      );
    }
    const entry = createSyncLogEntry({
      jobId: job.id,
      integrationId: target.integrationId,
      itemId: work.itemId,
      entityType: job.entityType,
      ...outcome,
    });
    await this.deps.logs.append(entry);
    return entry;
  }

  private async processPair(
    target: ReadyTarget,
    work: SyncWork,
    signal: AbortSignal,
  ): Promise<PairOutcome> {
    if (signal.aborted) {
      return { status: 'skipped', errorKind: 'cancelled', errorMessage: 'Job cancelled before dispatch' };
    }
    const { integrationId, resolved } = target;
    const platformName = resolved.integration.platformName;
    const call = work.prepare(resolved.connector.operations);
    if (!call) {
      return {
        status: 'skipped',
        errorKind: 'unsupported_operation',
        errorMessage: new UnsupportedOperationError(platformName, work.capability).message,
      };
    }

    return this.deps.mappings.withLock<PairOutcome>(integrationId, work.itemId, async () => {
      const mapping = await this.deps.mappings.find(work.itemId, integrationId);
      const externalId = mapping?.externalId ?? null;
      if (work.requiresExternalId && externalId === null) {
        return {
          status: 'skipped',
          errorKind: 'unmapped',
          errorMessage: `${work.itemId} has no ${platformName} counterpart yet`,
        };
      }
      if (mapping?.isUpToDate(work.aspect, work.hash)) {
        return { status: 'skipped', errorKind: 'unchanged', externalId };
      }

      const outcome = await this.deps.resilience.invoke(resolved.target, work.capability, (ctx) =>
        call({ externalId }, { signal: ctx.signal }),
      );
      const timing = { attempt: outcome.attempts, durationMs: outcome.durationMs };

      if (outcome.result.isFailure) {
        const error = outcome.result.getError();
        await this.deps.mappings.recordFailure({
          internalEntityId: work.itemId,
          entityKind: work.entityKind,
          integrationId,
          aspect: work.aspect,
          message: error.message,
        });
        return { ...timing, status: 'failed', errorKind: error.kind, errorMessage: error.message, externalId };
      }

      const assigned = outcome.result.getValue().externalId ?? externalId;
      try {
        await this.deps.mappings.recordSuccess({
          internalEntityId: work.itemId,
          entityKind: work.entityKind,
          integrationId,
          externalId: assigned,
          hashes: work.hashes,
        });
      } catch (error) {
        if (!(error instanceof MappingConflictError)) throw error;
        return { ...timing, status: 'failed', errorKind: 'mapping_conflict', errorMessage: error.message, externalId };
      }
      return { ...timing, status: 'success', externalId: assigned };
    });
  }

  private async advanceWatermarks(job: SyncJob, targets: Target[]): Promise<void> {
    for (const target of targets) {
      if (target.kind !== 'ready') continue;
      const integration = await this.deps.integrations.findById(target.integrationId);
      if (!integration) continue;
      integration.markSynced(job.entityType, job.requestedAt);
      await this.deps.integrations.update(integration);
    }
  }

  private limiterFor(integrationId: string, limit: number): Semaphore {
    const existing = this.limiters.get(integrationId);
    if (existing && existing.limit === limit) return existing.semaphore;
    const semaphore = new Semaphore(limit);
    this.limiters.set(integrationId, { limit, semaphore });
    return semaphore;
  }
}
