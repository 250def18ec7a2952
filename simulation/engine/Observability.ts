import type { LogLevel, SimTime } from '../types/simulation';
import { generateId } from '../utils/id';
import { describeError } from './errors';
import { createLogger, type Logger, type LogWriter } from './Logger';
import { MetricsCollector } from './MetricsCollector';

export interface ObservabilityOptions {
  runId?: string;
  level?: LogLevel;
  writer?: LogWriter;
}

/**
 * Logging and metrics sink for exactly one simulation run.
 *
 * Components receive it explicitly instead of reaching for process-wide state.
 * `close()` detaches metric listeners and turns every later log or metric call into a no-op.
 */
export class Observability {
  readonly runId: string;
  readonly logger: Logger;
  readonly metrics: MetricsCollector;
  private closed = false;

  constructor(options: ObservabilityOptions = {}) {
    this.runId = options.runId ?? generateId();
    this.logger = createLogger('sim', { level: options.level, writer: options.writer });
    this.metrics = new MetricsCollector((err, record) => {
      this.logger.error(`metric listener failed on ${record.name}: ${describeError(err)}`);
    });
  }

  bindClock(clock: () => SimTime): void {
    this.logger.setClock(clock);
  }

  isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.logger.close();
    this.metrics.close();
  }
}

export function createObservability(options: ObservabilityOptions = {}): Observability {
  return new Observability(options);
}
