import cors from 'cors';
import express, { type Express } from 'express';
import type { ServerConfig } from './config.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestLogger } from './middleware/requestLogger.js';
import { createHealthRouter } from './routes/health.js';
import { createMetricsRouter } from './routes/metrics.js';
import { createRunsRouter } from './routes/runs.js';
import { PrometheusSnapshotStore } from './services/prometheusState.js';
import { RunStateStore } from './services/runState.js';

export interface AppDeps {
  runState?: RunStateStore;
  prometheusStore?: PrometheusSnapshotStore;
  logRequests?: boolean;
}

export function createApp(config: ServerConfig, deps: AppDeps = {}): Express {
  const app = express();
  const runState = deps.runState ?? new RunStateStore();
  const prometheusStore = deps.prometheusStore ?? new PrometheusSnapshotStore();

  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: '1mb' }));
  if (deps.logRequests ?? true) {
    app.use(requestLogger);
  }

  app.use(
    '/metrics',
    createMetricsRouter({
      runState,
      prometheus: config.prometheus,
      prometheusStore
    })
  );
  app.use(
    '/runs',
    createRunsRouter({
      runState,
      runner: { logLevel: config.logLevel, ...(config.seed ? { seed: config.seed } : {}) },
      prometheus: config.prometheus,
      prometheusStore
    })
  );
  app.use('/health', createHealthRouter({ runState, prometheus: config.prometheus }));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
