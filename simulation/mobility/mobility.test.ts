import { describe, expect, it } from 'vitest';
import type { Position } from '../types/simulation';
import type { RandomSource } from '../utils/random';
import { ManhattanModel } from './ManhattanModel';
import { advanceToward, distanceBetween } from './MobilityModel';
import { RandomWalkModel } from './RandomWalkModel';
import { RandomWaypointModel } from './RandomWaypointModel';

function scripted(...values: number[]): RandomSource {
  const queue = [...values];
  return () => queue.shift() ?? 0;
}

function walk(model: { nextPosition(p: Position, dt: number): Position }, start: Position, ticks: number, dt = 1): Position[] {
  const path: Position[] = [];
  let current = start;
  for (let i = 0; i < ticks; i += 1) {
    current = model.nextPosition(current, dt);
    path.push(current);
  }
  return path;
}

describe('geometry helpers', () => {
  it('measures straight-line distance', () => {
    expect(distanceBetween({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
  });

  it('snaps onto the target when it is within reach', () => {
    expect(advanceToward({ x: 0, y: 0 }, { x: 3, y: 4 }, 5)).toEqual({ position: { x: 3, y: 4 }, arrived: true });
    expect(advanceToward({ x: 0, y: 0 }, { x: 10, y: 0 }, 4)).toEqual({ position: { x: 4, y: 0 }, arrived: false });
  });
});

describe('RandomWalkModel', () => {
  it('moves stepSize times elapsed along the drawn heading', () => {
    const model = new RandomWalkModel(2, scripted(0));
    expect(model.nextPosition({ x: 1, y: 1 }, 0.5)).toEqual({ x: 2, y: 1 });
  });

  it('keeps the displacement length for any heading', () => {
    const model = new RandomWalkModel(3, scripted(0.3));
    const next = model.nextPosition({ x: 0, y: 0 }, 1);
    expect(distanceBetween({ x: 0, y: 0 }, next)).toBeCloseTo(3, 10);
  });
});

describe('RandomWaypointModel', () => {
  // Targets land on the x axis: uniform(0, 100) with draws 0.5 and 0 gives (50, 0).
  function model(pauseMean = 1) {
    return new RandomWaypointModel(
      { speed: 25, area: [100, 100], pauseMean, pauseStd: 0 },
      scripted(0.5, 0, 0.5, 0, 0.75, 0),
    );
  }

  it('only draws a target and pauses on the first tick', () => {
    const m = model();
    expect(m.nextPosition({ x: 0, y: 0 }, 1)).toEqual({ x: 0, y: 0 });
    expect(m.state).toEqual({ phase: 'paused', target: { x: 50, y: 0 }, elapsed: 0, duration: 1 });
  });

  it('draws a new target when the pause ends, then travels and snaps onto it', () => {
    const path = walk(model(), { x: 0, y: 0 }, 4);
    expect(path).toEqual([
      { x: 0, y: 0 },
      { x: 0, y: 0 },
      { x: 25, y: 0 },
      { x: 50, y: 0 },
    ]);
  });

  it('does not move while paused', () => {
    const m = model(3);
    const path = walk(m, { x: 0, y: 0 }, 9);
    // Tick 1 pauses for 3, tick 4 resumes toward (50, 0), tick 6 arrives and pauses again.
    expect(path.slice(5, 8)).toEqual([
      { x: 50, y: 0 },
      { x: 50, y: 0 },
      { x: 50, y: 0 },
    ]);
    expect(path[8]).toEqual({ x: 50, y: 0 });
    expect(m.state).toEqual({ phase: 'moving', target: { x: 75, y: 0 } });
  });

  it('stays put for any mix of elapsed times until the pause runs out', () => {
    const m = model(100);
    const start = { x: 3, y: 4 };
    m.nextPosition(start, 1);

    for (const elapsed of [0.5, 40, 7.25, 0, 52]) {
      expect(m.nextPosition(start, elapsed)).toEqual(start);
    }
    expect(m.state).toEqual({ phase: 'paused', target: { x: 50, y: 0 }, elapsed: 99.75, duration: 100 });

    expect(m.nextPosition(start, 0.25)).toEqual(start);
    expect(m.state.phase).toBe('moving');
  });
});

describe('ManhattanModel', () => {
  it('maps positions to clamped grid cells', () => {
    const m = new ManhattanModel({ grid: [10, 10], blockSize: 10 });
    expect(m.cellOf({ x: 25, y: 12 })).toEqual({ row: 1, col: 2 });
    expect(m.cellOf({ x: 250, y: -3 })).toEqual({ row: 0, col: 9 });
  });

  it('only offers in-bounds neighbours', () => {
    const m = new ManhattanModel({ grid: [10, 10] });
    expect(m.neighbours({ row: 0, col: 0 })).toEqual([
      { row: 1, col: 0 },
      { row: 0, col: 1 },
    ]);
    expect(m.neighbours({ row: 5, col: 5 })).toHaveLength(4);
  });

  it('picks a neighbouring corner without moving on that tick', () => {
    const m = new ManhattanModel({ speed: 4, grid: [10, 10], blockSize: 10 }, scripted(0.9));
    expect(m.nextPosition({ x: 0, y: 0 }, 1)).toEqual({ x: 0, y: 0 });
    expect(m.currentTarget).toEqual({ x: 10, y: 0 });
  });

  it('moves along x before y and clears the target on arrival', () => {
    const m = new ManhattanModel({ speed: 3, grid: [10, 10], blockSize: 10 }, scripted(0));
    const path = walk(m, { x: 5, y: 5 }, 5);
    expect(path).toEqual([
      { x: 5, y: 5 },
      { x: 2, y: 5 },
      { x: 0, y: 6 },
      { x: 0, y: 9 },
      { x: 0, y: 10 },
    ]);
    expect(m.currentTarget).toBeNull();
  });
});
