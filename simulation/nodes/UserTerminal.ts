import type { NodeConfig } from '../config/schema';
import type { MobileEntity } from '../engine/MobilityEngine';
import type { EventScheduler } from '../engine/EventScheduler';
import type { MobilityModel } from '../mobility/MobilityModel';
import type { Position } from '../types/simulation';
import { BaseElement } from './BaseElement';

export class UserTerminal extends BaseElement implements MobileEntity {
  readonly elementClass = 'ue' as const;
  private current: Position;
  servingDuId: string | null = null;

  constructor(
    id: string,
    scheduler: EventScheduler,
    initialPosition: Position,
    readonly mobility: MobilityModel,
  ) {
    super(id, scheduler);
    this.current = { ...initialPosition };
  }

  get position(): Position {
    return this.current;
  }

  updatePosition(elapsed: number): void {
    this.current = this.mobility.nextPosition(this.current, elapsed);
  }

  protected onConfig(_config: NodeConfig): void {}
}
