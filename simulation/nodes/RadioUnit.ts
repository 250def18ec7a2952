import type { NodeConfig } from '../config/schema';
import type { PointToPointRouter } from '../engine/ChannelRouter';
import type { EventScheduler } from '../engine/EventScheduler';
import type { ElementMessage } from './BaseElement';
import { BaseElement } from './BaseElement';

export interface RadioUnitConfig {
  frequency: number;
  bandwidth: number;
  txPower: number;
  iqSamplesPerSlot: number;
}

const DEFAULTS: RadioUnitConfig = {
  frequency: 3.5e9,
  bandwidth: 100e6,
  txPower: 46,
  iqSamplesPerSlot: 1024,
};

// Radio unit: emits one IQ burst per slot towards its distributed unit over fronthaul.
// Only the burst size travels; signal content is out of scope. Transport delay comes from the fronthaul channel.
export class RadioUnit extends BaseElement {
  readonly elementClass = 'o-ru' as const;
  readonly config: RadioUnitConfig;
  private fronthaul: PointToPointRouter<ElementMessage> | undefined;
  private slot = 0;

  constructor(id: string, scheduler: EventScheduler, config: Partial<RadioUnitConfig> = {}) {
    super(id, scheduler);
    this.config = { ...DEFAULTS, ...config };
  }

  get slotsTransmitted(): number {
    return this.slot;
  }

  connectFronthaul(router: PointToPointRouter<ElementMessage>): void {
    this.fronthaul = router;
  }

  transmitIq(duId: string): void {
    if (!this.fronthaul) {
      this.logger.warn(`no fronthaul connected; dropping slot ${this.slot}`);
      return;
    }
    this.fronthaul.send({ kind: 'iq', ruId: this.id, samples: this.config.iqSamplesPerSlot, slot: this.slot }, this.id, duId);
    this.slot += 1;
  }

  protected onConfig(config: NodeConfig): void {
    if (config.frequency !== undefined) {
      this.config.frequency = config.frequency;
    }
    if (config.bandwidth !== undefined) {
      this.config.bandwidth = config.bandwidth;
    }
    if (config.txPower !== undefined) {
      this.config.txPower = config.txPower;
    }
    if (config.iqSamplesPerSlot !== undefined) {
      this.config.iqSamplesPerSlot = config.iqSamplesPerSlot;
    }
  }
}
