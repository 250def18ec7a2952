import type { GlobalController } from '../control/GlobalController';
import type { ProcessHandle } from '../engine/EventScheduler';
import type { Logger } from '../engine/Logger';

export interface LoadBalancingOptions {
  loadThreshold?: number;
  interval?: number;
}

export interface SteeringDecision {
  policyId: string;
  version: number;
  sourceDu: string;
  targetDu: string;
  localControllerId: string;
}

/**
 * Global-tier load balancer. Every `interval` it collects the latest `CELL_LOAD` report of each
 * distributed unit from the managed local controllers. For every unit above `loadThreshold` it
 * steers traffic to the least loaded unit through a `steer_traffic` policy, pushed to the local
 * controller that manages the overloaded unit.
 *
 * One policy is kept per overloaded unit; a later decision with a different target bumps its version.
 */
export class LoadBalancingApp {
  readonly id: string;
  private readonly global: GlobalController;
  private readonly logger: Logger;
  private readonly loadThreshold: number;
  private readonly interval: number;
  private readonly active = new Map<string, SteeringDecision>();
  private process: ProcessHandle | undefined;

  constructor(id: string, global: GlobalController, logger: Logger, options: LoadBalancingOptions = {}) {
    this.id = id;
    this.global = global;
    this.logger = logger.child(`app:${id}`);
    this.loadThreshold = options.loadThreshold ?? 0.8;
    this.interval = options.interval ?? 5;
  }

  start(): ProcessHandle {
    this.stop();
    this.process = this.global.scheduler.every(this.interval, () => this.monitor(), `app:${this.id}`);
    return this.process;
  }

  stop(): void {
    this.process?.stop();
    this.process = undefined;
  }

  decisions(): SteeringDecision[] {
    return [...this.active.values()];
  }

  reportedLoads(): Map<string, number> {
    const loads = new Map<string, number>();
    for (const controller of this.global.managedControllers()) {
      for (const indication of controller.latestIndications('CELL_LOAD')) {
        const { load } = indication.payload;
        if (typeof load === 'number') {
          loads.set(indication.elementId, load);
        }
      }
    }
    return loads;
  }

  monitor(): SteeringDecision[] {
    const loads = this.reportedLoads();
    const overloaded = [...loads.entries()].filter(([, load]) => load > this.loadThreshold).map(([duId]) => duId);
    if (overloaded.length === 0) {
      this.logger.debug('no distributed unit above threshold', { threshold: this.loadThreshold });
      return [];
    }

    let targetDu: string | undefined;
    let lowest = Infinity;
    for (const [duId, load] of loads) {
      if (load < lowest) {
        lowest = load;
        targetDu = duId;
      }
    }

    const issued: SteeringDecision[] = [];
    for (const sourceDu of overloaded) {
      if (!targetDu || targetDu === sourceDu) {
        this.logger.warn(`no less loaded unit to offload ${sourceDu} to`);
        continue;
      }
      const decision = this.steer(sourceDu, targetDu);
      if (decision) {
        issued.push(decision);
      }
    }
    return issued;
  }

  private steer(sourceDu: string, targetDu: string): SteeringDecision | undefined {
    const controller = this.global.managedControllerFor(sourceDu);
    if (!controller) {
      this.logger.warn(`no managed local controller holds ${sourceDu}`);
      return undefined;
    }

    const previous = this.active.get(sourceDu);
    if (previous && previous.targetDu === targetDu && previous.localControllerId === controller.id) {
      return undefined;
    }

    const content = { action: 'steer_traffic', sourceDu, targetDu, ueGroup: 'high_load_ues', intensity: 'high' };
    const policy =
      previous && this.global.getPolicy(previous.policyId)
        ? this.global.updatePolicy(previous.policyId, content)
        : this.global.createPolicy('POLICY-TYPE-2', content, 'o-du');
    this.global.distributePolicy(policy, controller.id);

    const decision: SteeringDecision = {
      policyId: policy.policyId,
      version: policy.version,
      sourceDu,
      targetDu,
      localControllerId: controller.id,
    };
    this.active.set(sourceDu, decision);
    this.logger.info(`steering ${sourceDu} -> ${targetDu} via ${policy.policyId} v${policy.version}`);
    return decision;
  }
}
