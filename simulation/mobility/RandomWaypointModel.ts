import type { Position } from '../types/simulation';
import { normal, uniform, type RandomSource } from '../utils/random';
import { advanceToward, distanceBetween, type MobilityModel } from './MobilityModel';

export interface RandomWaypointOptions {
  speed?: number;
  area?: readonly [number, number];
  pauseMean?: number;
  pauseStd?: number;
  tolerance?: number;
}

export type WaypointState =
  | { phase: 'moving'; target: Position | null }
  | { phase: 'paused'; target: Position; elapsed: number; duration: number };

// Random waypoint: travel to a uniformly drawn point at constant speed, pause for a normally
// distributed time, repeat. The very first tick only draws a target and pauses, so it never moves.
export class RandomWaypointModel implements MobilityModel {
  readonly type = 'random_waypoint' as const;
  readonly speed: number;
  readonly area: readonly [number, number];
  readonly pauseMean: number;
  readonly pauseStd: number;
  readonly tolerance: number;
  private current: WaypointState = { phase: 'moving', target: null };

  constructor(options: RandomWaypointOptions = {}, private readonly rng: RandomSource = Math.random) {
    this.speed = options.speed ?? 1;
    this.area = options.area ?? [100, 100];
    this.pauseMean = options.pauseMean ?? 5;
    this.pauseStd = options.pauseStd ?? 2;
    this.tolerance = options.tolerance ?? 1e-6;
  }

  get state(): Readonly<WaypointState> {
    return this.current;
  }

  nextPosition(position: Position, elapsed: number): Position {
    const state = this.current;

    if (state.phase === 'paused') {
      const waited = state.elapsed + elapsed;
      if (waited >= state.duration) {
        this.current = { phase: 'moving', target: this.drawTarget() };
      } else {
        this.current = { ...state, elapsed: waited };
      }
      return position;
    }

    if (state.target === null) {
      this.pause(this.drawTarget());
      return position;
    }

    if (distanceBetween(position, state.target) < this.tolerance) {
      this.pause(state.target);
      return { x: state.target.x, y: state.target.y };
    }

    const step = advanceToward(position, state.target, this.speed * elapsed);
    if (step.arrived) {
      this.pause(state.target);
    }
    return step.position;
  }

  private pause(target: Position): void {
    this.current = {
      phase: 'paused',
      target,
      elapsed: 0,
      duration: Math.max(0, normal(this.rng, this.pauseMean, this.pauseStd)),
    };
  }

  private drawTarget(): Position {
    return {
      x: uniform(this.rng, 0, this.area[0]),
      y: uniform(this.rng, 0, this.area[1]),
    };
  }
}
