import { describe, expect, it } from 'vitest';
import { createHarness } from '../testing/fixtures';
import { CallbackError, InvalidArgumentError, ValidationError } from './errors';
import { EventScheduler } from './EventScheduler';

describe('EventScheduler', () => {
  it('starts at time zero with nothing queued', () => {
    const { scheduler } = createHarness();
    expect(scheduler.now).toBe(0);
    expect(scheduler.pendingCount).toBe(0);
    expect(scheduler.peekNextTime()).toBeUndefined();
  });

  it('runs events at 1.0 and 3.0 and leaves the clock at the run target', () => {
    const { scheduler } = createHarness();
    let counter = 0;
    const times: number[] = [];
    const bump = (): void => {
      counter += 1;
      times.push(scheduler.now);
    };
    scheduler.schedule(1.0, bump);
    scheduler.schedule(3.0, bump);

    scheduler.run(4.0);

    expect(counter).toBe(2);
    expect(times).toEqual([1.0, 3.0]);
    expect(scheduler.now).toBe(4.0);
    expect(scheduler.processedCount).toBe(2);
  });

  it('orders by fire time and breaks ties by insertion order', () => {
    const { scheduler } = createHarness();
    const order: string[] = [];
    scheduler.schedule(2, (name: string) => order.push(name), 'late');
    scheduler.schedule(1, (name: string) => order.push(name), 'first-tie');
    scheduler.schedule(1, (name: string) => order.push(name), 'second-tie');
    scheduler.schedule(0, (name: string) => order.push(name), 'now');

    scheduler.run(5);

    expect(order).toEqual(['now', 'first-tie', 'second-tie', 'late']);
  });

  it('replays identically for identical schedules', () => {
    const trace = (): string[] => {
      const scheduler = new EventScheduler(createHarness().observability);
      const seen: string[] = [];
      for (const [delay, name] of [
        [0.5, 'a'],
        [0.5, 'b'],
        [0.2, 'c'],
        [0.9, 'd'],
      ] as const) {
        scheduler.scheduleLabelled(name, delay, () => seen.push(`${name}@${scheduler.now}`));
      }
      scheduler.run(1);
      return seen;
    };

    expect(trace()).toEqual(trace());
    expect(trace()).toEqual(['c@0.2', 'a@0.5', 'b@0.5', 'd@0.9']);
  });

  it('rejects negative and non-finite delays without queueing anything', () => {
    const { scheduler } = createHarness();
    const noop = (): void => {};

    expect(() => scheduler.schedule(-0.1, noop)).toThrow(InvalidArgumentError);
    expect(() => scheduler.schedule(Number.NaN, noop)).toThrow(InvalidArgumentError);
    expect(() => scheduler.schedule(Number.POSITIVE_INFINITY, noop)).toThrow(InvalidArgumentError);
    expect(scheduler.pendingCount).toBe(0);
  });

  it('reports misuse as both an invalid argument and a validation error', () => {
    const { scheduler } = createHarness();
    let caught: unknown;
    try {
      scheduler.schedule(-1, () => {});
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidArgumentError);
    expect(caught).toBeInstanceOf(ValidationError);
  });

  it('refuses a run target that does not advance the clock', () => {
    const { scheduler } = createHarness();
    expect(() => scheduler.run(0)).toThrow(InvalidArgumentError);

    scheduler.run(2);
    expect(() => scheduler.run(2)).toThrow(InvalidArgumentError);
    expect(() => scheduler.run(1)).toThrow(InvalidArgumentError);
    expect(scheduler.now).toBe(2);
  });

  it('finishes a run when a metrics listener throws', () => {
    const { scheduler, observability, logs } = createHarness();
    observability.metrics.onRecord(() => {
      throw new Error('collector down');
    });
    const fired: number[] = [];
    scheduler.schedule(1, () => fired.push(scheduler.now));
    scheduler.schedule(2, () => fired.push(scheduler.now));

    scheduler.run(3);

    expect(fired).toEqual([1, 2]);
    expect(scheduler.now).toBe(3);
    expect(scheduler.stats().callbackErrors).toBe(0);
    expect(observability.metrics.get('scheduler.events')).toBe(2);
    expect(logs.messages('error')).toEqual([
      'metric listener failed on scheduler.events: collector down',
      'metric listener failed on scheduler.events: collector down',
    ]);
  });

  it('leaves events after the run target queued for the next run', () => {
    const { scheduler } = createHarness();
    const fired: number[] = [];
    scheduler.schedule(1, () => fired.push(1));
    scheduler.schedule(5, () => fired.push(5));

    scheduler.run(2);
    expect(fired).toEqual([1]);
    expect(scheduler.pendingCount).toBe(1);
    expect(scheduler.peekNextTime()).toBe(5);

    scheduler.run(6);
    expect(fired).toEqual([1, 5]);
  });

  it('runs events scheduled by a callback within the same run', () => {
    const { scheduler } = createHarness();
    const fired: string[] = [];
    scheduler.schedule(1, () => {
      fired.push(`outer@${scheduler.now}`);
      scheduler.schedule(0, () => fired.push(`same-instant@${scheduler.now}`));
      scheduler.schedule(0.5, () => fired.push(`later@${scheduler.now}`));
    });

    scheduler.run(2);

    expect(fired).toEqual(['outer@1', 'same-instant@1', 'later@1.5']);
  });

  it('logs a failing callback and keeps processing the queue', () => {
    const { scheduler, observability, logs } = createHarness();
    const fired: string[] = [];
    scheduler.scheduleLabelled('explode', 1, () => {
      throw new Error('boom');
    });
    scheduler.schedule(2, () => fired.push('after'));

    scheduler.run(3);

    expect(fired).toEqual(['after']);
    expect(scheduler.stats()).toEqual({ simTime: 3, processed: 2, pending: 0, callbackErrors: 1 });
    expect(observability.metrics.get('scheduler.callbackErrors')).toBe(1);
    expect(logs.messages('error')).toEqual(['callback explode failed at t=1: boom']);
  });

  it('does not allow run to be re-entered from a callback', () => {
    const { scheduler } = createHarness();
    let caught: unknown;
    scheduler.schedule(1, () => {
      try {
        scheduler.run(10);
      } catch (err) {
        caught = err;
      }
    });

    scheduler.run(2);

    expect(caught).toBeInstanceOf(InvalidArgumentError);
    expect(scheduler.now).toBe(2);
  });

  it('wraps callback failures with label and time', () => {
    const err = new CallbackError('tick', 1.5, new Error('nope'));
    expect(err.message).toBe('callback tick failed at t=1.5: nope');
    expect(err.code).toBe('callback');
    expect(err.name).toBe('CallbackError');
  });

  describe('every', () => {
    it('fires once per interval starting one interval from now', () => {
      const { scheduler } = createHarness();
      const times: number[] = [];
      scheduler.every(1, () => times.push(scheduler.now), 'ticker');

      scheduler.run(3.5);

      expect(times).toEqual([1, 2, 3]);
      expect(scheduler.pendingCount).toBe(1);
    });

    it('passes the interval as the elapsed time', () => {
      const { scheduler } = createHarness();
      const elapsed: number[] = [];
      scheduler.every(0.25, (dt) => elapsed.push(dt));

      scheduler.run(0.5);

      expect(elapsed).toEqual([0.25, 0.25]);
    });

    it('stops firing once stopped, even with an event already queued', () => {
      const { scheduler } = createHarness();
      const times: number[] = [];
      const handle = scheduler.every(1, () => times.push(scheduler.now));
      scheduler.schedule(2.5, () => handle.stop());

      scheduler.run(6);

      expect(times).toEqual([1, 2]);
      expect(handle.isActive()).toBe(false);
      expect(scheduler.pendingCount).toBe(0);
    });

    it('can stop itself from inside its own action', () => {
      const { scheduler } = createHarness();
      let count = 0;
      const handle = scheduler.every(1, () => {
        count += 1;
        if (count === 2) {
          handle.stop();
        }
      });

      scheduler.run(10);

      expect(count).toBe(2);
    });

    it('keeps ticking after an action throws', () => {
      const { scheduler } = createHarness();
      let count = 0;
      scheduler.every(1, () => {
        count += 1;
        throw new Error('flaky');
      });

      scheduler.run(3);

      expect(count).toBe(3);
      expect(scheduler.stats().callbackErrors).toBe(3);
    });

    it('rejects a non-positive interval', () => {
      const { scheduler } = createHarness();
      expect(() => scheduler.every(0, () => {})).toThrow(InvalidArgumentError);
      expect(() => scheduler.every(-1, () => {})).toThrow(InvalidArgumentError);
    });
  });
});
