import type { Position } from '../types/simulation';
import { uniform, type RandomSource } from '../utils/random';
import type { MobilityModel } from './MobilityModel';

// Random walk: fresh uniform heading every tick, displacement proportional to elapsed time.
export class RandomWalkModel implements MobilityModel {
  readonly type = 'random_walk' as const;

  constructor(
    readonly stepSize = 1,
    private readonly rng: RandomSource = Math.random,
  ) {}

  nextPosition(current: Position, elapsed: number): Position {
    const angle = uniform(this.rng, 0, 2 * Math.PI);
    return {
      x: current.x + this.stepSize * Math.cos(angle) * elapsed,
      y: current.y + this.stepSize * Math.sin(angle) * elapsed,
    };
  }
}
