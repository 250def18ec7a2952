import type { ChannelStats, SimTime } from '../types/simulation';

export type MetricName =
  | 'scheduler.events'
  | 'scheduler.callbackErrors'
  | 'policy.created'
  | 'policy.distributed'
  | 'policy.received'
  | 'policy.rejected'
  | 'policy.enforced'
  | 'mobility.ticks'
  | 'validation.errors'
  | 'metrics.listenerErrors'
  | `channel.${string}.${keyof ChannelStats}`;

export interface MetricRecord {
  name: MetricName;
  value: number;
  delta: number;
  simTime: SimTime;
}

export type MetricListener = (record: MetricRecord) => void;

export type ListenerErrorHandler = (err: unknown, record: MetricRecord) => void;

// Run-scoped counters. External collectors either poll counters() or subscribe with onRecord().
export class MetricsCollector {
  private readonly values = new Map<MetricName, number>();
  private readonly listeners = new Set<MetricListener>();
  private currentSimTime: SimTime = 0;
  private closed = false;

  constructor(private readonly onListenerError?: ListenerErrorHandler) {}

  setCurrentSimTime(simTime: SimTime): void {
    this.currentSimTime = simTime;
  }

  increment(name: MetricName, delta = 1): void {
    if (this.closed) {
      return;
    }
    const value = (this.values.get(name) ?? 0) + delta;
    this.values.set(name, value);
    const record: MetricRecord = { name, value, delta, simTime: this.currentSimTime };
    for (const listener of [...this.listeners]) {
      try {
        listener(record);
      } catch (err) {
        // counted without notifying, so a failing listener cannot recurse
        this.values.set('metrics.listenerErrors', this.get('metrics.listenerErrors') + 1);
        this.onListenerError?.(err, record);
      }
    }
  }

  recordChannel(channel: string, field: keyof ChannelStats): void {
    this.increment(`channel.${channel}.${field}`);
  }

  get(name: MetricName): number {
    return this.values.get(name) ?? 0;
  }

  channelStats(channel: string): ChannelStats {
    return {
      sent: this.get(`channel.${channel}.sent`),
      delivered: this.get(`channel.${channel}.delivered`),
      failed: this.get(`channel.${channel}.failed`),
      dropped: this.get(`channel.${channel}.dropped`),
    };
  }

  channels(): string[] {
    const names = new Set<string>();
    for (const key of this.values.keys()) {
      const match = /^channel\.(.+)\.(sent|delivered|failed|dropped)$/.exec(key);
      if (match?.[1]) {
        names.add(match[1]);
      }
    }
    return [...names].sort();
  }

  counters(): Record<string, number> {
    return Object.fromEntries([...this.values.entries()].sort(([a], [b]) => a.localeCompare(b)));
  }

  onRecord(listener: MetricListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  clear(): void {
    this.values.clear();
    this.currentSimTime = 0;
  }

  close(): void {
    this.closed = true;
    this.listeners.clear();
  }
}
