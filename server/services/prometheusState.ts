import type { SimulationSnapshot } from '../types.js';
import { toPrometheusText } from './prometheus.js';

const MAX_RUNS = 20;

// Latest snapshot per run, oldest run evicted first. Scrapes render every retained run.
export class PrometheusSnapshotStore {
  private readonly latestByRun = new Map<string, SimulationSnapshot>();

  constructor(private readonly maxRuns = MAX_RUNS) {}

  setLatest(snapshot: SimulationSnapshot): void {
    this.latestByRun.delete(snapshot.runId);
    this.latestByRun.set(snapshot.runId, snapshot);
    for (const runId of this.latestByRun.keys()) {
      if (this.latestByRun.size <= this.maxRuns) break;
      this.latestByRun.delete(runId);
    }
  }

  clear(): void {
    this.latestByRun.clear();
  }

  runIds(): string[] {
    return [...this.latestByRun.keys()];
  }

  getText(): string {
    if (this.latestByRun.size === 0) {
      return '# No snapshots recorded yet\n';
    }
    return toPrometheusText([...this.latestByRun.values()]);
  }
}
