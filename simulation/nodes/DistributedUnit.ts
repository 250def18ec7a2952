import type { NodeConfig } from '../config/schema';
import type { Policy } from '../control/Policy';
import type { EventScheduler } from '../engine/EventScheduler';
import type { ControlMessage, IqBurst } from '../types/messages';
import { BaseElement } from './BaseElement';

export interface DistributedUnitConfig {
  cellId: string;
  maxUes: number;
  txPower: number;
}

export interface HandoverParameters {
  hysteresis: number;
  timeToTrigger: number;
}

export interface SteeringDirective {
  policyId: string;
  targetDu: string;
  intensity: string;
}

// Distributed unit: serves UEs, consumes fronthaul IQ and reports load and handover KPIs upstream.
// Handover tuning arrives as control messages; traffic steering arrives as policy.
export class DistributedUnit extends BaseElement {
  readonly elementClass = 'o-du' as const;
  readonly config: DistributedUnitConfig;
  readonly handover: HandoverParameters = { hysteresis: 0, timeToTrigger: 0 };
  private readonly connectedUes = new Set<string>();
  private steering: SteeringDirective | undefined;
  iqBurstsReceived = 0;
  iqSamplesReceived = 0;

  constructor(id: string, scheduler: EventScheduler, config: Partial<DistributedUnitConfig> = {}) {
    super(id, scheduler);
    this.config = { cellId: id, maxUes: 100, txPower: 46, ...config };
  }

  get load(): number {
    return this.config.maxUes === 0 ? 1 : this.connectedUes.size / this.config.maxUes;
  }

  get steeringDirective(): SteeringDirective | undefined {
    return this.steering;
  }

  attachUe(ueId: string): boolean {
    if (this.connectedUes.has(ueId) || this.connectedUes.size >= this.config.maxUes) {
      return false;
    }
    this.connectedUes.add(ueId);
    return true;
  }

  detachUe(ueId: string): boolean {
    return this.connectedUes.delete(ueId);
  }

  ues(): string[] {
    return [...this.connectedUes];
  }

  reportLoad(): boolean {
    return this.indicate('CELL_LOAD', {
      cellId: this.config.cellId,
      load: this.load,
      connectedUes: this.connectedUes.size,
    });
  }

  reportHandover(attempts: number, successes: number): boolean {
    return this.indicate('HANDOVER_REPORT', {
      cellId: this.config.cellId,
      attempts,
      successes,
      successRate: attempts === 0 ? 1 : successes / attempts,
    });
  }

  protected override onIq(burst: IqBurst, sourceId: string): void {
    this.iqBurstsReceived += 1;
    this.iqSamplesReceived += burst.samples;
    this.logger.debug(`IQ slot ${burst.slot} from ${sourceId}`, { samples: burst.samples });
  }

  protected override onControl(control: ControlMessage, sourceId: string): void {
    if (control.messageType !== 'HANDOVER_PARAMETER_ADJUSTMENT') {
      super.onControl(control, sourceId);
      return;
    }
    const actions = Array.isArray(control.payload.actions) ? control.payload.actions : [];
    for (const action of actions) {
      if (!action || typeof action !== 'object') {
        continue;
      }
      const entry = action as Record<string, unknown>;
      if (typeof entry.value !== 'number') {
        continue;
      }
      if (entry.parameter === 'hysteresis') {
        this.handover.hysteresis += entry.value;
      } else if (entry.parameter === 'timeToTrigger') {
        this.handover.timeToTrigger += entry.value;
      }
    }
    this.logger.info(`handover parameters adjusted by ${sourceId}`, { ...this.handover });
  }

  protected override onPolicy(policy: Policy): void {
    if (policy.content.action !== 'steer_traffic' || policy.content.sourceDu !== this.id) {
      return;
    }
    this.steering = {
      policyId: policy.policyId,
      targetDu: String(policy.content.targetDu ?? ''),
      intensity: String(policy.content.intensity ?? 'normal'),
    };
  }

  protected onConfig(config: NodeConfig): void {
    if (config.maxUes !== undefined) {
      this.config.maxUes = config.maxUes;
    }
    if (config.txPower !== undefined) {
      this.config.txPower = config.txPower;
    }
  }
}
