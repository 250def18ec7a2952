import { SetupError, describeError } from '../../simulation/engine/errors.js';
import { SimulationEngine } from '../../simulation/engine/SimulationEngine.js';
import type { LogLevel } from '../../simulation/types/simulation.js';
import { HttpError, type RunRecord, type RunRequest } from '../types.js';

export interface RunnerOptions {
  logLevel: LogLevel;
  seed?: string;
}

// Builds and runs one scenario to completion. Setup problems are the caller's fault (400);
// anything thrown while running is recorded on the run as a failure.
export function executeRun(request: RunRequest, options: RunnerOptions): RunRecord {
  const startedAt = new Date();
  const seed = request.seed ?? options.seed;

  let engine: SimulationEngine;
  try {
    engine = SimulationEngine.fromScenario(request.scenario, {
      logLevel: options.logLevel,
      ...(seed !== undefined ? { seed } : {})
    });
  } catch (err) {
    if (err instanceof SetupError) throw new HttpError(400, err.message);
    throw err;
  }

  const base = {
    runId: engine.runId,
    scenarioName: engine.scenario.name ?? null,
    startedAt: startedAt.toISOString()
  };

  try {
    const snapshot = engine.run(request.until);
    const finishedAt = new Date();
    return {
      ...base,
      status: 'completed',
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      snapshot
    };
  } catch (err) {
    const finishedAt = new Date();
    console.error(`[runs] runId=${base.runId} failed:`, err);
    return {
      ...base,
      status: 'failed',
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      snapshot: engine.snapshot(),
      error: describeError(err)
    };
  } finally {
    engine.close();
  }
}
