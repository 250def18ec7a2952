import { Router } from 'express';
import { formatIssues } from '../../simulation/config/schema.js';
import { pushSnapshotToPushgateway, shouldExposeScrape, shouldPushToGateway, type PrometheusConfig } from '../services/prometheus.js';
import type { PrometheusSnapshotStore } from '../services/prometheusState.js';
import type { RunStateStore } from '../services/runState.js';
import { executeRun, type RunnerOptions } from '../services/simulationRunner.js';
import { HttpError, runRequestSchema } from '../types.js';

interface RunsDeps {
  runState: RunStateStore;
  runner: RunnerOptions;
  prometheus: PrometheusConfig;
  prometheusStore: PrometheusSnapshotStore;
}

export function createRunsRouter(deps: RunsDeps): Router {
  const router = Router();

  router.post('/', (req, res, next) => {
    try {
      const parsed = runRequestSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new HttpError(400, `Expected { scenario, until?, seed? }: ${formatIssues(parsed.error).join('; ')}`);
      }

      const record = executeRun(parsed.data, deps.runner);
      deps.runState.save(record);
      console.log(`[runs] runId=${record.runId} status=${record.status} durationMs=${record.durationMs}`);

      const { snapshot } = record;
      if (snapshot && shouldExposeScrape(deps.prometheus)) {
        deps.prometheusStore.setLatest(snapshot);
      }
      if (snapshot && shouldPushToGateway(deps.prometheus) && deps.prometheus.pushgatewayUrl) {
        void pushSnapshotToPushgateway(snapshot, deps.prometheus.pushgatewayUrl, deps.prometheus.jobName).catch(
          (err) => {
            console.error('[runs] pushgateway error:', err);
          }
        );
      }

      res.status(201).json(record);
    } catch (err) {
      next(err);
    }
  });

  router.get('/', (_req, res) => {
    res.status(200).json({ runs: deps.runState.list() });
  });

  router.get('/:runId', (req, res, next) => {
    const record = deps.runState.get(req.params.runId);
    if (!record) {
      next(new HttpError(404, `Run not found: ${req.params.runId}`));
      return;
    }
    res.status(200).json(record);
  });

  return router;
}
