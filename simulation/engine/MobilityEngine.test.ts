import { describe, expect, it } from 'vitest';
import { createHarness } from '../testing/fixtures';
import type { Position } from '../types/simulation';
import { MobilityEngine, type MobileEntity } from './MobilityEngine';

class Drifter implements MobileEntity {
  position: Position = { x: 0, y: 0 };

  readonly steps: number[] = [];

  constructor(readonly id: string) {}

  updatePosition(elapsed: number): void {
    this.steps.push(elapsed);
    this.position = { x: this.position.x + elapsed, y: this.position.y };
  }
}

describe('MobilityEngine', () => {
  it('updates each admitted entity once per interval', () => {
    const { scheduler, observability } = createHarness();
    const engine = new MobilityEngine(scheduler);
    const entity = new Drifter('ue-1');

    expect(engine.admit(entity, 0.25)).toBe(true);
    scheduler.run(1);

    expect(entity.steps).toEqual([0.25, 0.25, 0.25, 0.25]);
    expect(engine.positionOf('ue-1')).toEqual({ x: 1, y: 0 });
    expect(engine.ticksOf('ue-1')).toBe(4);
    expect(observability.metrics.get('mobility.ticks')).toBe(4);
  });

  it('ignores a second admission of the same id', () => {
    const { scheduler, logs } = createHarness();
    const engine = new MobilityEngine(scheduler);
    engine.admit(new Drifter('ue-1'), 0.5);

    expect(engine.admit(new Drifter('ue-1'), 0.5)).toBe(false);
    expect(logs.messages('warn')).toEqual(['entity ue-1 is already tracked']);
    expect(engine.trackedIds()).toEqual(['ue-1']);
  });

  it('stops updating a removed entity', () => {
    const { scheduler } = createHarness();
    const engine = new MobilityEngine(scheduler);
    const entity = new Drifter('ue-1');
    engine.admit(entity, 0.5);
    scheduler.run(1);

    expect(engine.remove('ue-1')).toBe(true);
    scheduler.run(3);

    expect(entity.steps).toHaveLength(2);
    expect(engine.positionOf('ue-1')).toBeUndefined();
    expect(engine.remove('ue-1')).toBe(false);
  });
});
