import type { RunRecord, RunSummary, SimulationSnapshot } from '../types.js';

const DEFAULT_CAPACITY = 100;

function snapshotFingerprint(snapshot: SimulationSnapshot): string {
  const elements = [...snapshot.elements].sort((a, b) => a.elementId.localeCompare(b.elementId));
  return JSON.stringify({
    runId: snapshot.runId,
    simTime: snapshot.simTime,
    scheduler: snapshot.scheduler,
    channels: snapshot.channels,
    policies: snapshot.policies,
    elements
  });
}

export class RunStateStore {
  private readonly runs = new Map<string, RunRecord>();
  private readonly lastSnapshotHashByRun = new Map<string, string>();

  constructor(private readonly capacity = DEFAULT_CAPACITY) {}

  get size(): number {
    return this.runs.size;
  }

  save(record: RunRecord): void {
    this.runs.delete(record.runId);
    this.runs.set(record.runId, record);
    if (record.snapshot) {
      this.lastSnapshotHashByRun.set(record.runId, snapshotFingerprint(record.snapshot));
    }
    while (this.runs.size > this.capacity) {
      const oldest = this.runs.keys().next();
      if (oldest.done) break;
      this.runs.delete(oldest.value);
      this.lastSnapshotHashByRun.delete(oldest.value);
    }
  }

  get(runId: string): RunRecord | undefined {
    return this.runs.get(runId);
  }

  list(): RunSummary[] {
    return [...this.runs.values()].map(({ snapshot, ...rest }) => ({
      ...rest,
      simTime: snapshot?.simTime ?? null
    }));
  }

  evaluateSnapshot(snapshot: SimulationSnapshot): { accept: boolean; reason: string } {
    if (snapshot.elements.length === 0) return { accept: false, reason: 'empty_elements' };

    const nextHash = snapshotFingerprint(snapshot);
    const prevHash = this.lastSnapshotHashByRun.get(snapshot.runId);
    if (prevHash === nextHash) return { accept: false, reason: 'duplicate' };

    this.lastSnapshotHashByRun.set(snapshot.runId, nextHash);
    return { accept: true, reason: 'accepted' };
  }
}
