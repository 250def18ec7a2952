import type { SchedulerStats, SimTime } from '../types/simulation';
import { CallbackError, InvalidArgumentError } from './errors';
import { EventQueue } from './EventQueue';
import type { Logger } from './Logger';
import { createObservability, type Observability } from './Observability';

export const DEFAULT_PROCESS_INTERVAL = 0.1;

export interface ProcessHandle {
  readonly id: string;
  readonly interval: number;
  stop(): void;
  isActive(): boolean;
}

// Owns the virtual clock. Every component schedules through it; callbacks run synchronously,
// one at a time, ordered by fire time and then by insertion sequence.
export class EventScheduler {
  private readonly queue = new EventQueue();
  private readonly logger: Logger;
  private clock: SimTime = 0;
  private nextSequence = 0;
  private nextProcessId = 0;
  private processed = 0;
  private callbackErrors = 0;
  private running = false;
  readonly observability: Observability;

  constructor(observability: Observability = createObservability()) {
    this.observability = observability;
    this.logger = observability.logger.child('scheduler');
    observability.bindClock(() => this.clock);
  }

  get now(): SimTime {
    return this.clock;
  }

  get pendingCount(): number {
    return this.queue.size;
  }

  get processedCount(): number {
    return this.processed;
  }

  peekNextTime(): SimTime | undefined {
    return this.queue.peek()?.fireTime;
  }

  schedule<TArgs extends unknown[]>(delay: number, callback: (...args: TArgs) => void, ...args: TArgs): void {
    this.scheduleLabelled(callback.name || 'anonymous', delay, callback, ...args);
  }

  scheduleLabelled<TArgs extends unknown[]>(
    label: string,
    delay: number,
    callback: (...args: TArgs) => void,
    ...args: TArgs
  ): void {
    if (!Number.isFinite(delay) || delay < 0) {
      throw new InvalidArgumentError(`delay must be a non-negative finite number, got ${delay}`);
    }
    this.queue.push({
      fireTime: this.clock + delay,
      sequence: this.nextSequence,
      label,
      invoke: () => callback(...args),
    });
    this.nextSequence += 1;
  }

  run(until: SimTime): void {
    if (!Number.isFinite(until) || until <= this.clock) {
      throw new InvalidArgumentError(`run target ${until} must be greater than current time ${this.clock}`);
    }
    if (this.running) {
      throw new InvalidArgumentError('run() called from inside a scheduled callback');
    }

    this.running = true;
    try {
      for (;;) {
        const next = this.queue.peek();
        if (!next || next.fireTime > until) {
          break;
        }
        this.queue.pop();
        this.clock = next.fireTime;
        this.observability.metrics.setCurrentSimTime(this.clock);
        this.invoke(next.label, next.invoke);
      }
      this.clock = until;
      this.observability.metrics.setCurrentSimTime(this.clock);
    } finally {
      this.running = false;
    }
  }

  /**
   * Starts a self-rescheduling process: `action(interval)` fires every `interval` time units,
   * first at `now + interval`. A stopped process is skipped when its pending event comes due.
   */
  every(interval: number, action: (elapsed: number) => void, label = action.name || 'process'): ProcessHandle {
    if (!Number.isFinite(interval) || interval <= 0) {
      throw new InvalidArgumentError(`process interval must be positive, got ${interval}`);
    }

    this.nextProcessId += 1;
    const id = `${label}#${this.nextProcessId}`;
    let active = true;

    const tick = (): void => {
      if (!active) {
        return;
      }
      try {
        action(interval);
      } finally {
        if (active) {
          this.scheduleLabelled(id, interval, tick);
        }
      }
    };

    this.scheduleLabelled(id, interval, tick);

    return {
      id,
      interval,
      stop: () => {
        active = false;
      },
      isActive: () => active,
    };
  }

  stats(): SchedulerStats {
    return {
      simTime: this.clock,
      processed: this.processed,
      pending: this.queue.size,
      callbackErrors: this.callbackErrors,
    };
  }

  private invoke(label: string, fn: () => void): void {
    this.processed += 1;
    this.observability.metrics.increment('scheduler.events');
    try {
      fn();
    } catch (err) {
      const wrapped = new CallbackError(label, this.clock, err);
      this.callbackErrors += 1;
      this.observability.metrics.increment('scheduler.callbackErrors');
      this.logger.error(wrapped.message, { label, simTime: this.clock });
    }
  }
}
