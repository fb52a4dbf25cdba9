/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency injection.
 */

import express from 'express';
import { AppConfig, DEFAULT_CONFIG } from './config';
import { createGraphRoutes } from './api/graphs';
import { errorHandler, requestLogger } from './api/middleware';
import { NodeRegistry } from './engine/registry';
import { IdGenerator, WorkflowService } from './engine/workflow-service';
import { createDefaultRegistry } from './nodes';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';

export const VERSION = '0.1.0';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  config: AppConfig;
  registry: NodeRegistry;
  store: Store;
  service: WorkflowService;
}

export interface AppContextOptions {
  config?: Partial<AppConfig>;
  registry?: NodeRegistry;
  store?: Store;
  generateId?: IdGenerator;
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions = {}): AppContext {
  const config = { ...DEFAULT_CONFIG, ...options.config };
  const registry = options.registry ?? createDefaultRegistry();
  const store = options.store ?? createMemoryStore();
  const service = new WorkflowService({
    registry,
    store,
    generateId: options.generateId,
    executor: { maxSteps: config.maxSteps },
  });

  return { config, registry, store, service };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.use(express.json({ limit: '10mb' }));
  app.use(requestLogger());

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptimeMs: Date.now() - startTime,
    });
  });

  app.get('/nodes', (_req, res) => {
    res.json({ nodes: ctx.service.listNodes() });
  });

  app.use('/graph', createGraphRoutes(ctx.service));

  app.use(errorHandler);

  return app;
}
