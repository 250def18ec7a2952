import type { NodeConfig } from '../config/schema';
import type { PointToPointRouter } from '../engine/ChannelRouter';
import type { EventScheduler } from '../engine/EventScheduler';
import type { PeerMessage } from '../types/messages';
import { BaseElement } from './BaseElement';

// Central unit half: terminates F1 from distributed units and counts traffic per message type.
abstract class CentralUnit extends BaseElement {
  schedulers: string[];
  private readonly f1Counts = new Map<string, number>();
  private f1: PointToPointRouter<PeerMessage> | undefined;

  constructor(id: string, scheduler: EventScheduler, schedulers: string[] = []) {
    super(id, scheduler);
    this.schedulers = schedulers;
  }

  connectF1(router: PointToPointRouter<PeerMessage>): void {
    this.f1 = router;
  }

  sendF1(destinationId: string, messageType: string, payload: Record<string, unknown> = {}): void {
    if (!this.f1) {
      this.logger.warn(`no F1 link; dropping ${messageType} to ${destinationId}`);
      return;
    }
    this.sendPeer(this.f1, destinationId, messageType, payload);
  }

  f1MessageCount(messageType?: string): number {
    if (messageType) {
      return this.f1Counts.get(messageType) ?? 0;
    }
    return [...this.f1Counts.values()].reduce((sum, n) => sum + n, 0);
  }

  protected override onPeerMessage(message: PeerMessage, sourceId: string): void {
    this.f1Counts.set(message.messageType, (this.f1Counts.get(message.messageType) ?? 0) + 1);
    super.onPeerMessage(message, sourceId);
  }
}

export class CuControlPlane extends CentralUnit {
  readonly elementClass = 'o-cu-cp' as const;

  protected onConfig(config: NodeConfig): void {
    if (config.controlSchedulers) {
      this.schedulers = [...config.controlSchedulers];
    }
  }
}

export class CuUserPlane extends CentralUnit {
  readonly elementClass = 'o-cu-up' as const;

  protected onConfig(config: NodeConfig): void {
    if (config.qosSchedulers) {
      this.schedulers = [...config.qosSchedulers];
    }
  }
}
