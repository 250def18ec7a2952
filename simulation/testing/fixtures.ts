import { EventScheduler } from '../engine/EventScheduler';
import { MemoryLogWriter } from '../engine/Logger';
import { createObservability, type Observability } from '../engine/Observability';
import type { LogLevel } from '../types/simulation';

export interface TestHarness {
  scheduler: EventScheduler;
  observability: Observability;
  logs: MemoryLogWriter;
}

// Scheduler wired to an in-memory log so tests can assert on what was reported.
export function createHarness(level: LogLevel = 'debug'): TestHarness {
  const logs = new MemoryLogWriter();
  const observability = createObservability({ runId: 'test-run', level, writer: logs });
  return { scheduler: new EventScheduler(observability), observability, logs };
}
