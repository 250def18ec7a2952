import type { Position } from '../types/simulation';
import { DEFAULT_PROCESS_INTERVAL, type EventScheduler, type ProcessHandle } from './EventScheduler';
import type { Logger } from './Logger';

export interface MobileEntity {
  readonly id: string;
  readonly position: Position;
  updatePosition(elapsed: number): void;
}

interface TrackedEntity {
  entity: MobileEntity;
  process: ProcessHandle;
  ticks: number;
}

// Drives every admitted entity with its own periodic position-update process.
export class MobilityEngine {
  private readonly tracked = new Map<string, TrackedEntity>();
  private readonly logger: Logger;

  constructor(private readonly scheduler: EventScheduler) {
    this.logger = scheduler.observability.logger.child('mobility');
  }

  admit(entity: MobileEntity, interval = DEFAULT_PROCESS_INTERVAL): boolean {
    if (this.tracked.has(entity.id)) {
      this.logger.warn(`entity ${entity.id} is already tracked`);
      return false;
    }

    const entry: TrackedEntity = {
      entity,
      ticks: 0,
      process: this.scheduler.every(
        interval,
        (elapsed) => {
          entry.ticks += 1;
          this.scheduler.observability.metrics.increment('mobility.ticks');
          entity.updatePosition(elapsed);
        },
        `mobility:${entity.id}`,
      ),
    };
    this.tracked.set(entity.id, entry);
    this.logger.info(`tracking ${entity.id} every ${interval}`, { position: entity.position });
    return true;
  }

  remove(entityId: string): boolean {
    const entry = this.tracked.get(entityId);
    if (!entry) {
      this.logger.warn(`entity ${entityId} is not tracked`);
      return false;
    }
    entry.process.stop();
    this.tracked.delete(entityId);
    this.logger.info(`stopped tracking ${entityId}`);
    return true;
  }

  trackedIds(): string[] {
    return [...this.tracked.keys()];
  }

  positionOf(entityId: string): Position | undefined {
    return this.tracked.get(entityId)?.entity.position;
  }

  ticksOf(entityId: string): number {
    return this.tracked.get(entityId)?.ticks ?? 0;
  }

  stopAll(): void {
    for (const entry of this.tracked.values()) {
      entry.process.stop();
    }
    this.tracked.clear();
  }
}
