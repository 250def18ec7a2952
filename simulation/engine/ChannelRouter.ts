import type { Receiver, SimTime } from '../types/simulation';
import { normal, type RandomSource } from '../utils/random';
import { AddressError, CallbackError } from './errors';
import type { EventScheduler } from './EventScheduler';
import type { Logger } from './Logger';
import { NodeRegistry } from './NodeRegistry';
import type { Observability } from './Observability';

export type DelaySampler = () => number;

export interface ChannelOptions {
  name: string;
  scheduler: EventScheduler;
  delay?: DelaySampler;
}

export interface SendOptions {
  delay?: number;
}

export interface Envelope<TMessage> {
  id: number;
  channel: string;
  message: TMessage;
  sourceId: string;
  destinationId: string;
  sentAt: SimTime;
  deliverAt: SimTime;
}

export type Subscriber<TMessage> = (message: TMessage, originId: string) => void;

export function fixedDelay(delay: number): DelaySampler {
  return () => delay;
}

// Transport latency with jitter, floored so deliveries never go back in time.
export function normalDelay(
  params: { mean: number; std: number; jitterStd?: number; floor?: number },
  rng: RandomSource,
): DelaySampler {
  const { mean, std, jitterStd = 0, floor = 0 } = params;
  return () => Math.max(floor, 0, normal(rng, mean, std) + normal(rng, 0, jitterStd));
}

abstract class Channel {
  readonly name: string;
  protected readonly scheduler: EventScheduler;
  protected readonly observability: Observability;
  protected readonly logger: Logger;
  private readonly sampler: DelaySampler | undefined;

  protected constructor(options: ChannelOptions) {
    this.name = options.name;
    this.scheduler = options.scheduler;
    this.observability = options.scheduler.observability;
    this.logger = this.observability.logger.child(`channel:${options.name}`);
    this.sampler = options.delay;
  }

  protected deliveryDelay(options?: SendOptions): number {
    if (options?.delay !== undefined) {
      return options.delay;
    }
    return this.sampler ? Math.max(0, this.sampler()) : 0;
  }

  protected record(field: 'sent' | 'delivered' | 'failed' | 'dropped'): void {
    this.observability.metrics.recordChannel(this.name, field);
  }
}

/**
 * Point-to-point channel over a registry of endpoints.
 * `send` fails fast on unknown ids; at delivery time the destination is resolved again and
 * problems are logged instead of thrown, so one bad delivery never blocks the others.
 */
export class PointToPointRouter<TMessage> extends Channel {
  private readonly registry: NodeRegistry<Receiver<TMessage>>;
  private readonly inFlight = new Map<number, Envelope<TMessage>>();
  private nextEnvelopeId = 0;

  constructor(options: ChannelOptions) {
    super(options);
    this.registry = new NodeRegistry(options.name, this.observability);
  }

  get pending(): number {
    return this.inFlight.size;
  }

  register(id: string, handle: Receiver<TMessage>): boolean {
    return this.registry.register(id, handle);
  }

  unregister(id: string): boolean {
    return this.registry.unregister(id);
  }

  isRegistered(id: string): boolean {
    return this.registry.has(id);
  }

  endpoints(): string[] {
    return this.registry.ids();
  }

  send(message: TMessage, sourceId: string, destinationId: string, options?: SendOptions): Envelope<TMessage> {
    if (!this.registry.has(sourceId)) {
      throw new AddressError(this.name, sourceId, 'source');
    }
    if (!this.registry.has(destinationId)) {
      throw new AddressError(this.name, destinationId, 'destination');
    }

    const delay = this.deliveryDelay(options);
    this.nextEnvelopeId += 1;
    const envelope: Envelope<TMessage> = {
      id: this.nextEnvelopeId,
      channel: this.name,
      message,
      sourceId,
      destinationId,
      sentAt: this.scheduler.now,
      deliverAt: this.scheduler.now + delay,
    };

    this.scheduler.scheduleLabelled(`${this.name}:deliver`, delay, this.deliver, envelope);
    this.inFlight.set(envelope.id, envelope);
    this.record('sent');
    this.logger.debug(`queued ${sourceId} -> ${destinationId}`, { envelope: envelope.id, delay });
    return envelope;
  }

  private readonly deliver = (envelope: Envelope<TMessage>): void => {
    this.inFlight.delete(envelope.id);
    const target = this.registry.resolve(envelope.destinationId);
    if (!target) {
      const err = new AddressError(this.name, envelope.destinationId, 'destination');
      this.record('dropped');
      this.logger.warn(`dropped envelope ${envelope.id}: ${err.message}`);
      return;
    }

    try {
      target.receive(envelope.message, envelope.sourceId);
      this.record('delivered');
    } catch (cause) {
      const err = new CallbackError(`${this.name}:${envelope.destinationId}`, this.scheduler.now, cause);
      this.record('failed');
      this.logger.error(err.message, { envelope: envelope.id, sourceId: envelope.sourceId });
    }
  };
}

/**
 * Publish/subscribe channel. The subscriber set is captured when `publish` is called, and every
 * subscriber gets its own scheduled, independently isolated delivery.
 */
export class PubSubRouter<TMessage> extends Channel {
  private readonly subscribers = new Map<string, Subscriber<TMessage>>();

  constructor(options: ChannelOptions) {
    super(options);
  }

  subscribe(subscriberId: string, callback: Subscriber<TMessage>): boolean {
    if (this.subscribers.has(subscriberId)) {
      this.logger.warn(`subscriber ${subscriberId} already subscribed to ${this.name}`);
      return false;
    }
    this.subscribers.set(subscriberId, callback);
    this.logger.debug(`subscriber ${subscriberId} subscribed to ${this.name}`);
    return true;
  }

  unsubscribe(subscriberId: string): boolean {
    if (!this.subscribers.delete(subscriberId)) {
      this.logger.warn(`attempted to unsubscribe unknown subscriber ${subscriberId}`);
      return false;
    }
    this.logger.debug(`subscriber ${subscriberId} unsubscribed from ${this.name}`);
    return true;
  }

  subscriberIds(): string[] {
    return [...this.subscribers.keys()];
  }

  publish(message: TMessage, originId: string, options?: SendOptions): number {
    const snapshot = [...this.subscribers.entries()];
    const delay = this.deliveryDelay(options);

    for (const [subscriberId, callback] of snapshot) {
      this.scheduler.scheduleLabelled(`${this.name}:${subscriberId}`, delay, () => {
        try {
          callback(message, originId);
          this.record('delivered');
        } catch (cause) {
          const err = new CallbackError(`${this.name}:${subscriberId}`, this.scheduler.now, cause);
          this.record('failed');
          this.logger.error(err.message, { subscriberId, originId });
        }
      });
      this.record('sent');
    }

    return snapshot.length;
  }
}
