/**
 * Inkline API Server
 *
 * Wires configuration, the Job Store, the Executor and the Job Runner onto
 * one Event Bus and serves them over HTTP. Producers are supplied by the
 * caller; the server never generates content itself.
 */

import type { Server } from 'http';
import type { Express } from 'express';
import { EventBus, createLogger } from '@inkline/shared';
import type { Logger } from '@inkline/shared';
import { PipelineExecutor, PlanBuilder, loadConfig } from '@inkline/pipeline';
import type { EngineConfig, Producers } from '@inkline/pipeline';
import { JobRunner, JobStore } from '@inkline/jobs';
import { createApp } from './app.js';

const PURGE_INTERVAL_MS = 15 * 60 * 1000;

export interface ServerOptions {
  producers: Producers;
  config?: EngineConfig;
  logger?: Logger;
  purgeIntervalMs?: number;
}

export interface RunningServer {
  app: Express;
  server: Server;
  port: number;
  runner: JobRunner;
  store: JobStore;
  close(): Promise<void>;
}

export async function startServer(options: ServerOptions): Promise<RunningServer> {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger({ level: config.logging.level, service: 'api' });

  const bus = new EventBus({ logger: logger.child({ component: 'event-bus' }) });
  const planBuilder = new PlanBuilder(config.workflows ?? undefined);
  const executor = PipelineExecutor.fromConfig(options.producers, config, {
    bus,
    logger: logger.child({ component: 'pipeline' }),
  });
  const store = new JobStore(config.jobs.dbPath, { ttlHours: config.jobs.ttlHours });
  const runner = new JobRunner(store, executor, { bus, logger: logger.child({ component: 'jobs' }) });

  const app = createApp({ runner, planBuilder, logger, corsOrigins: config.server.corsOrigins });
  const server = await listen(app, config.server.port);
  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : config.server.port;

  const purgeTimer = setInterval(() => {
    runner.purgeExpired().catch((err: unknown) => {
      logger.error({ error: err }, 'job purge failed');
    });
  }, options.purgeIntervalMs ?? PURGE_INTERVAL_MS);
  purgeTimer.unref();

  logger.info({ port, dbPath: config.jobs.dbPath, strictGates: config.gates.strict }, 'API server listening');

  return {
    app,
    server,
    port,
    runner,
    store,
    async close() {
      clearInterval(purgeTimer);
      await new Promise<void>((resolve, reject) => {
        server.close(err => (err ? reject(err) : resolve()));
      });
      await runner.drain();
      runner.close();
      store.close();
      logger.info({}, 'API server stopped');
    },
  };
}

function listen(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => resolve(server));
    server.on('error', reject);
  });
}
