import { Router } from 'express';
import type { PrometheusSnapshotStore } from '../services/prometheusState.js';
import { type PrometheusConfig, shouldExposeScrape } from '../services/prometheus.js';
import type { RunStateStore } from '../services/runState.js';
import { HttpError, isSimulationSnapshot } from '../types.js';

interface MetricsDeps {
  runState: RunStateStore;
  prometheus: PrometheusConfig;
  prometheusStore: PrometheusSnapshotStore;
}

export function createMetricsRouter(deps: MetricsDeps): Router {
  const router = Router();

  router.get('/prometheus', (_req, res) => {
    if (!shouldExposeScrape(deps.prometheus)) {
      res.status(404).json({ error: 'Prometheus scrape mode is disabled' });
      return;
    }

    res
      .status(200)
      .set('Content-Type', 'text/plain; version=0.0.4; charset=utf-8')
      .send(deps.prometheusStore.getText());
  });

  // Snapshots from runs driven elsewhere (e.g. the CLI) can be published for scraping too.
  router.post('/snapshot', (req, res, next) => {
    try {
      if (!isSimulationSnapshot(req.body)) throw new HttpError(400, 'Invalid SimulationSnapshot payload');
      const snapshot = req.body;

      const decision = deps.runState.evaluateSnapshot(snapshot);
      if (!decision.accept) {
        console.log(`[metrics/snapshot] skipped runId=${snapshot.runId} reason=${decision.reason}`);
        res.status(200).json({ ok: true, accepted: false, reason: decision.reason });
        return;
      }

      if (shouldExposeScrape(deps.prometheus)) {
        deps.prometheusStore.setLatest(snapshot);
      }
      res.status(200).json({ ok: true, accepted: true });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
