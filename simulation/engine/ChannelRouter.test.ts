import { describe, expect, it } from 'vitest';
import { createHarness } from '../testing/fixtures';
import type { Receiver } from '../types/simulation';
import { createRng } from '../utils/random';
import { fixedDelay, normalDelay, PointToPointRouter, PubSubRouter } from './ChannelRouter';
import type { EventScheduler } from './EventScheduler';
import { AddressError } from './errors';

class Recorder implements Receiver<string> {
  readonly received: Array<{ message: string; from: string; at: number }> = [];

  constructor(private readonly scheduler: EventScheduler) {}

  receive(message: string, sourceId: string): void {
    this.received.push({ message, from: sourceId, at: this.scheduler.now });
  }
}

describe('PointToPointRouter', () => {
  function setup(delay = 0.5) {
    const harness = createHarness();
    const router = new PointToPointRouter<string>({
      name: 'x2',
      scheduler: harness.scheduler,
      delay: fixedDelay(delay),
    });
    const a = new Recorder(harness.scheduler);
    const b = new Recorder(harness.scheduler);
    router.register('a', a);
    router.register('b', b);
    return { ...harness, router, a, b };
  }

  it('delivers through the scheduler after the sampled delay', () => {
    const { scheduler, router, b } = setup(0.5);

    const envelope = router.send('hello', 'a', 'b');

    expect(envelope.deliverAt).toBe(0.5);
    expect(router.pending).toBe(1);
    expect(b.received).toEqual([]);

    scheduler.run(1);

    expect(b.received).toEqual([{ message: 'hello', from: 'a', at: 0.5 }]);
    expect(router.pending).toBe(0);
  });

  it('uses an explicit per-send delay over the sampler', () => {
    const { scheduler, router, b } = setup(0.5);
    router.send('fast', 'a', 'b', { delay: 0.1 });

    scheduler.run(0.2);

    expect(b.received.map((r) => r.at)).toEqual([0.1]);
  });

  it('throws for an unknown destination and queues nothing', () => {
    const { scheduler, router, observability } = setup();

    expect(() => router.send('lost', 'a', 'nobody')).toThrow(AddressError);
    expect(() => router.send('lost', 'a', 'nobody')).toThrow('x2: destination nobody is not registered');
    expect(scheduler.pendingCount).toBe(0);
    expect(observability.metrics.channelStats('x2').sent).toBe(0);
  });

  it('throws for an unknown source', () => {
    const { router } = setup();
    expect(() => router.send('spoofed', 'ghost', 'b')).toThrow('x2: source ghost is not registered');
  });

  it('drops a delivery whose destination left while in flight', () => {
    const { scheduler, router, b, observability, logs } = setup(1);
    router.send('late', 'a', 'b');
    router.unregister('b');

    scheduler.run(2);

    expect(b.received).toEqual([]);
    expect(observability.metrics.channelStats('x2')).toEqual({ sent: 1, delivered: 0, failed: 0, dropped: 1 });
    expect(logs.messages('warn')).toContain('dropped envelope 1: x2: destination b is not registered');
  });

  it('isolates a throwing receiver from the other deliveries', () => {
    const { scheduler, router, a, observability } = setup(0);
    router.register('broken', {
      receive() {
        throw new Error('receiver crashed');
      },
    });
    router.send('one', 'b', 'broken');
    router.send('two', 'b', 'a');

    scheduler.run(1);

    expect(a.received.map((r) => r.message)).toEqual(['two']);
    expect(observability.metrics.channelStats('x2')).toEqual({ sent: 2, delivered: 1, failed: 1, dropped: 0 });
  });

  it('keeps the first handle when an id registers twice', () => {
    const { router, scheduler, a, b } = setup(0);
    expect(router.register('a', b)).toBe(false);

    router.send('ping', 'b', 'a');
    scheduler.run(1);

    expect(a.received).toHaveLength(1);
    expect(b.received).toHaveLength(0);
  });
});

describe('PubSubRouter', () => {
  function setup() {
    const harness = createHarness();
    const channel = new PubSubRouter<string>({ name: 'e2-indications', scheduler: harness.scheduler });
    return { ...harness, channel };
  }

  it('fans out one scheduled delivery per subscriber', () => {
    const { scheduler, channel } = setup();
    const seen: string[] = [];
    channel.subscribe('s1', (message, origin) => seen.push(`s1:${message}:${origin}`));
    channel.subscribe('s2', (message, origin) => seen.push(`s2:${message}:${origin}`));

    expect(channel.publish('load', 'du-1')).toBe(2);
    expect(seen).toEqual([]);

    scheduler.run(1);
    expect(seen).toEqual(['s1:load:du-1', 's2:load:du-1']);
  });

  it('returns zero when nobody listens', () => {
    const { channel } = setup();
    expect(channel.publish('void', 'origin')).toBe(0);
  });

  it('lets a subscriber unsubscribe itself during delivery', () => {
    const { scheduler, channel } = setup();
    const seen: string[] = [];
    channel.subscribe('once', (message) => {
      seen.push(`once:${message}`);
      channel.unsubscribe('once');
    });
    channel.subscribe('always', (message) => seen.push(`always:${message}`));

    channel.publish('first', 'o');
    scheduler.run(1);
    channel.publish('second', 'o');
    scheduler.run(2);

    expect(seen).toEqual(['once:first', 'always:first', 'always:second']);
    expect(channel.subscriberIds()).toEqual(['always']);
  });

  it('captures the subscriber set when publishing', () => {
    const { scheduler, channel } = setup();
    const seen: string[] = [];
    channel.subscribe('early', (message) => {
      seen.push(`early:${message}`);
      channel.subscribe('late', (m) => seen.push(`late:${m}`));
    });

    channel.publish('first', 'o');
    scheduler.run(1);
    channel.publish('second', 'o');
    scheduler.run(2);

    expect(seen).toEqual(['early:first', 'early:second', 'late:second']);
  });

  it('keeps delivering to healthy subscribers when one throws', () => {
    const { scheduler, channel, observability, logs } = setup();
    const seen: string[] = [];
    channel.subscribe('faulty', () => {
      throw new Error('observer bug');
    });
    channel.subscribe('healthy', (message) => seen.push(message));

    channel.publish('report', 'du-1');
    scheduler.run(1);

    expect(seen).toEqual(['report']);
    expect(observability.metrics.channelStats('e2-indications')).toEqual({
      sent: 2,
      delivered: 1,
      failed: 1,
      dropped: 0,
    });
    expect(logs.messages('error')).toEqual(['callback e2-indications:faulty failed at t=0: observer bug']);
  });

  it('warns on duplicate subscriptions and unknown unsubscribes', () => {
    const { channel, logs } = setup();
    expect(channel.subscribe('s', () => {})).toBe(true);
    expect(channel.subscribe('s', () => {})).toBe(false);
    expect(channel.unsubscribe('ghost')).toBe(false);
    expect(logs.messages('warn')).toEqual([
      'subscriber s already subscribed to e2-indications',
      'attempted to unsubscribe unknown subscriber ghost',
    ]);
  });
});

describe('delay samplers', () => {
  it('returns the mean when there is no spread', () => {
    const sample = normalDelay({ mean: 0.1, std: 0 }, createRng(1));
    expect(sample()).toBe(0.1);
  });

  it('never goes below the floor or zero', () => {
    expect(normalDelay({ mean: -1, std: 0 }, createRng(1))()).toBe(0);
    expect(normalDelay({ mean: 0.1, std: 0, floor: 0.2 }, createRng(1))()).toBe(0.2);
  });

  it('draws the same sequence for the same seed', () => {
    const a = normalDelay({ mean: 0.1, std: 0.02, jitterStd: 0.005 }, createRng('fronthaul'));
    const b = normalDelay({ mean: 0.1, std: 0.02, jitterStd: 0.005 }, createRng('fronthaul'));
    const drawsA = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(drawsA);
    for (const draw of drawsA) {
      expect(draw).toBeGreaterThanOrEqual(0);
    }
  });
});
