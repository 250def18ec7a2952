import type { Position } from '../types/simulation';

export type MobilityModelType = 'random_walk' | 'random_waypoint' | 'manhattan';

// Movement strategy: given where the entity is and how much time passed, where is it now.
export interface MobilityModel {
  readonly type: MobilityModelType;
  nextPosition(current: Position, elapsed: number): Position;
}

export function distanceBetween(a: Position, b: Position): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

// Moves `distance` along the straight line from `from` to `to`, snapping exactly onto `to`
// when it is within reach.
export function advanceToward(from: Position, to: Position, distance: number): { position: Position; arrived: boolean } {
  const remaining = distanceBetween(from, to);
  if (remaining <= distance) {
    return { position: { x: to.x, y: to.y }, arrived: true };
  }
  const ratio = distance / remaining;
  return {
    position: { x: from.x + (to.x - from.x) * ratio, y: from.y + (to.y - from.y) * ratio },
    arrived: false,
  };
}
