import {
  createTestCore,
  type FakeHandler,
  type TestCore,
} from '@marketsync/integrations-domain/testing';
import { createApp } from '../app.js';
import { InlineSyncDispatcher, type SyncDispatcher } from '../infrastructure/queues.js';

export interface TestApp {
  app: ReturnType<typeof createApp>;
  core: TestCore;
  dispatcher: InlineSyncDispatcher;
}

/** The HTTP app over an in-memory core; sync jobs run inline unless a dispatcher is given. */
export function createTestApp(options: { handler?: FakeHandler; dispatcher?: SyncDispatcher } = {}): TestApp {
  const core = createTestCore(options.handler);
  const dispatcher = new InlineSyncDispatcher((jobId) => core.orchestrator.executeJob(jobId), core.logger);
  const app = createApp({
    integrations: core.integrations,
    orderImport: core.orderImport,
    orchestrator: core.orchestrator,
    webhooks: core.webhooks,
    dispatcher: options.dispatcher ?? dispatcher,
    logger: core.logger,
  });
  return { app, core, dispatcher };
}

export function jsonRequest(method: string, body?: unknown, headers: Record<string, string> = {}): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json', ...headers },
    body: body === undefined ? undefined : JSON.stringify(body),
  };
}
