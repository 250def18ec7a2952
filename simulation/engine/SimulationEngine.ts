import { HandoverObserver } from '../apps/HandoverObserver';
import { LoadBalancingApp } from '../apps/LoadBalancingApp';
import { ConfigService } from '../config/ConfigService';
import { formatIssues } from '../config/schema';
import { scenarioSchema, type DelaySpec, type ElementSpec, type Scenario, type ScenarioAction } from '../config/scenario';
import { GlobalController } from '../control/GlobalController';
import { LocalController } from '../control/LocalController';
import { ManhattanModel } from '../mobility/ManhattanModel';
import type { MobilityModel } from '../mobility/MobilityModel';
import { RandomWalkModel } from '../mobility/RandomWalkModel';
import { RandomWaypointModel } from '../mobility/RandomWaypointModel';
import type { ElementMessage } from '../nodes/BaseElement';
import { CuControlPlane, CuUserPlane } from '../nodes/CentralUnit';
import { DistributedUnit } from '../nodes/DistributedUnit';
import { RadioUnit } from '../nodes/RadioUnit';
import { UserTerminal } from '../nodes/UserTerminal';
import type { A1Message, PeerMessage } from '../types/messages';
import type { LogLevel, SimTime, SimulationSnapshot } from '../types/simulation';
import { createRng, type RandomSource } from '../utils/random';
import { fixedDelay, normalDelay, PointToPointRouter, type DelaySampler } from './ChannelRouter';
import { SetupError } from './errors';
import { EventScheduler } from './EventScheduler';
import type { Logger } from './Logger';
import { MetricsAggregator } from './MetricsAggregator';
import { MobilityEngine } from './MobilityEngine';
import { createObservability, type Observability } from './Observability';

export type NetworkElement = RadioUnit | DistributedUnit | CuControlPlane | CuUserPlane | UserTerminal;

export interface EngineOptions {
  observability?: Observability;
  logLevel?: LogLevel;
  seed?: string | number;
  runId?: string;
}

type PeerChannel = 'f1' | 'x2' | 'xn';

const FRONTHAUL_DELAY = { mean: 0.1, std: 0.02, jitterStd: 0.005 };

// Builds one simulation run from a validated scenario: clock, channels, controllers, elements,
// observers and timed actions. Any dangling reference is a SetupError raised here, before the first run.
export class SimulationEngine {
  readonly scenario: Scenario;
  readonly observability: Observability;
  readonly scheduler: EventScheduler;
  readonly mobility: MobilityEngine;
  readonly configs: ConfigService;
  readonly a1: PointToPointRouter<A1Message>;
  readonly fronthaul: PointToPointRouter<ElementMessage>;
  readonly peers: Record<PeerChannel, PointToPointRouter<PeerMessage>>;
  readonly global: GlobalController | undefined;
  readonly handoverObservers: HandoverObserver[] = [];
  readonly loadBalancer: LoadBalancingApp | undefined;
  private readonly logger: Logger;
  private readonly rng: RandomSource;
  private readonly aggregator = new MetricsAggregator();
  private readonly locals = new Map<string, LocalController>();
  private readonly elements = new Map<string, NetworkElement>();

  static fromScenario(input: unknown, options: EngineOptions = {}): SimulationEngine {
    const parsed = scenarioSchema.safeParse(input);
    if (!parsed.success) {
      throw new SetupError(`invalid scenario:\n  ${formatIssues(parsed.error).join('\n  ')}`);
    }
    return new SimulationEngine(parsed.data, options);
  }

  constructor(scenario: Scenario, options: EngineOptions = {}) {
    this.scenario = scenario;
    this.observability =
      options.observability ?? createObservability({ level: options.logLevel, runId: options.runId });
    this.scheduler = new EventScheduler(this.observability);
    this.logger = this.observability.logger.child('engine');
    this.rng = createRng(options.seed ?? scenario.seed);
    this.mobility = new MobilityEngine(this.scheduler);
    this.configs = new ConfigService(this.observability.logger, this.observability.metrics);

    this.a1 = this.router<A1Message>('a1');
    this.fronthaul = new PointToPointRouter<ElementMessage>({
      name: 'fronthaul',
      scheduler: this.scheduler,
      delay: this.sampler(scenario.delays.fronthaul) ?? normalDelay(FRONTHAUL_DELAY, this.rng),
    });
    this.peers = {
      f1: this.router<PeerMessage>('f1'),
      x2: this.router<PeerMessage>('x2'),
      xn: this.router<PeerMessage>('xn'),
    };

    if (scenario.globalController) {
      this.global = new GlobalController(scenario.globalController.id, { scheduler: this.scheduler, a1: this.a1 });
    }

    for (const spec of scenario.localControllers) {
      this.addLocalController(spec);
    }
    for (const spec of scenario.elements) {
      this.addElement(spec);
    }
    for (const spec of scenario.elements) {
      this.wireElement(spec);
    }

    const loadBalancing = scenario.globalController?.loadBalancing;
    if (this.global && loadBalancing) {
      this.loadBalancer = new LoadBalancingApp(loadBalancing.id, this.global, this.observability.logger, loadBalancing);
      this.loadBalancer.start();
    }

    if (scenario.nodeConfigs.length > 0) {
      this.configs.load(scenario.nodeConfigs);
      this.applyNodeConfigs();
    }

    scenario.actions.forEach((action, index) => this.scheduleAction(action, index));
    this.logger.info(
      `scenario ${scenario.name ?? '(unnamed)'} ready: ${this.elements.size} element(s), ${this.locals.size} local controller(s)`,
      { runId: this.observability.runId },
    );
  }

  get runId(): string {
    return this.observability.runId;
  }

  get now(): SimTime {
    return this.scheduler.now;
  }

  element(id: string): NetworkElement | undefined {
    return this.elements.get(id);
  }

  localController(id: string): LocalController | undefined {
    return this.locals.get(id);
  }

  localControllers(): LocalController[] {
    return [...this.locals.values()];
  }

  applyNodeConfigs(): string[] {
    return this.configs.applyConfigs(this.elements.values());
  }

  run(until: SimTime = this.scenario.until): SimulationSnapshot {
    this.logger.info(`running until t=${until}`);
    this.scheduler.run(until);
    return this.snapshot();
  }

  snapshot(): SimulationSnapshot {
    return this.aggregator.computeSnapshot({
      runId: this.runId,
      scheduler: this.scheduler,
      metrics: this.observability.metrics,
      elements: this.elements.values(),
      mobility: this.mobility,
    });
  }

  close(): void {
    this.mobility.stopAll();
    this.loadBalancer?.stop();
    for (const local of this.locals.values()) {
      local.stopEnforcement();
    }
    this.observability.close();
  }

  private router<TMessage>(name: 'a1' | PeerChannel): PointToPointRouter<TMessage> {
    return new PointToPointRouter<TMessage>({
      name,
      scheduler: this.scheduler,
      delay: this.sampler(this.scenario.delays[name]),
    });
  }

  private sampler(spec: DelaySpec | undefined): DelaySampler | undefined {
    if (!spec) {
      return undefined;
    }
    return 'fixed' in spec ? fixedDelay(spec.fixed) : normalDelay(spec, this.rng);
  }

  private addLocalController(spec: Scenario['localControllers'][number]): void {
    if (this.locals.has(spec.id)) {
      throw new SetupError(`duplicate local controller id ${spec.id}`);
    }
    const local = new LocalController(spec.id, {
      scheduler: this.scheduler,
      e2Delay: this.sampler(this.scenario.delays.e2),
    });
    if (this.global && !this.global.addManagedLocalController(local)) {
      throw new SetupError(`local controller ${spec.id} cannot join a1: the id is already in use`);
    }
    this.locals.set(spec.id, local);

    if (spec.enforcementInterval !== undefined) {
      local.startEnforcement(spec.enforcementInterval);
    }
    if (spec.handoverObserver) {
      const observer = new HandoverObserver(
        spec.handoverObserver.id,
        local,
        this.observability.logger,
        spec.handoverObserver,
      );
      observer.register();
      this.handoverObservers.push(observer);
    }
  }

  private addElement(spec: ElementSpec): void {
    if (this.elements.has(spec.id)) {
      throw new SetupError(`duplicate element id ${spec.id}`);
    }
    const element = this.createElement(spec);
    this.elements.set(spec.id, element);

    if (spec.controller !== undefined) {
      const local = this.locals.get(spec.controller);
      if (!local) {
        throw new SetupError(`element ${spec.id} references unknown local controller ${spec.controller}`);
      }
      if (!local.registerElement(element)) {
        throw new SetupError(`element ${spec.id} could not be registered with ${spec.controller}`);
      }
    }
  }

  private createElement(spec: ElementSpec): NetworkElement {
    switch (spec.class) {
      case 'o-ru':
        return new RadioUnit(spec.id, this.scheduler, {
          ...(spec.frequency !== undefined ? { frequency: spec.frequency } : {}),
          ...(spec.bandwidth !== undefined ? { bandwidth: spec.bandwidth } : {}),
          ...(spec.txPower !== undefined ? { txPower: spec.txPower } : {}),
          ...(spec.iqSamplesPerSlot !== undefined ? { iqSamplesPerSlot: spec.iqSamplesPerSlot } : {}),
        });
      case 'o-du':
        return new DistributedUnit(spec.id, this.scheduler, {
          ...(spec.cellId !== undefined ? { cellId: spec.cellId } : {}),
          ...(spec.maxUes !== undefined ? { maxUes: spec.maxUes } : {}),
          ...(spec.txPower !== undefined ? { txPower: spec.txPower } : {}),
        });
      case 'o-cu-cp':
        return new CuControlPlane(spec.id, this.scheduler, spec.schedulers);
      case 'o-cu-up':
        return new CuUserPlane(spec.id, this.scheduler, spec.schedulers);
      case 'ue':
        return new UserTerminal(spec.id, this.scheduler, spec.position, this.mobilityModel(spec.mobility));
    }
  }

  private mobilityModel(spec: Extract<ElementSpec, { class: 'ue' }>['mobility']): MobilityModel {
    if (!spec) {
      return new RandomWalkModel(0, this.rng);
    }
    switch (spec.model) {
      case 'random-waypoint':
        return new RandomWaypointModel(spec, this.rng);
      case 'manhattan':
        return new ManhattanModel(spec, this.rng);
      case 'random-walk':
        return new RandomWalkModel(spec.stepSize, this.rng);
    }
  }

  // Second pass: links that need every element to exist.
  private wireElement(spec: ElementSpec): void {
    const element = this.elements.get(spec.id);
    switch (spec.class) {
      case 'o-ru': {
        if (!(element instanceof RadioUnit)) {
          return;
        }
        this.fronthaul.register(element.id, element);
        element.connectFronthaul(this.fronthaul);
        if (spec.du !== undefined) {
          const duId = spec.du;
          this.requireDu(duId, `radio unit ${spec.id}`);
          if (spec.transmitInterval !== undefined) {
            this.scheduler.every(spec.transmitInterval, () => element.transmitIq(duId), `iq:${spec.id}`);
          }
        }
        return;
      }
      case 'o-du': {
        if (!(element instanceof DistributedUnit)) {
          return;
        }
        this.fronthaul.register(element.id, element);
        this.registerPeer(element);
        if (spec.reportInterval !== undefined) {
          this.scheduler.every(spec.reportInterval, () => element.reportLoad(), `load:${spec.id}`);
        }
        return;
      }
      case 'o-cu-cp':
      case 'o-cu-up': {
        if (!(element instanceof CuControlPlane || element instanceof CuUserPlane)) {
          return;
        }
        this.registerPeer(element);
        element.connectF1(this.peers.f1);
        return;
      }
      case 'ue': {
        if (!(element instanceof UserTerminal)) {
          return;
        }
        if (spec.servingDu !== undefined) {
          const du = this.requireDu(spec.servingDu, `user terminal ${spec.id}`);
          if (du.attachUe(element.id)) {
            element.servingDuId = du.id;
          } else {
            this.logger.warn(`${du.id} has no capacity for ${element.id}`);
          }
        }
        if (spec.mobility) {
          this.mobility.admit(element, spec.updateInterval);
        }
        return;
      }
    }
  }

  private registerPeer(element: DistributedUnit | CuControlPlane | CuUserPlane): void {
    for (const router of Object.values(this.peers)) {
      router.register(element.id, element);
    }
  }

  private requireDu(id: string, referrer: string): DistributedUnit {
    const du = this.elements.get(id);
    if (!(du instanceof DistributedUnit)) {
      throw new SetupError(`${referrer} references ${id}, which is not a distributed unit`);
    }
    return du;
  }

  private requireUe(id: string, referrer: string): UserTerminal {
    const ue = this.elements.get(id);
    if (!(ue instanceof UserTerminal)) {
      throw new SetupError(`${referrer} references ${id}, which is not a user terminal`);
    }
    return ue;
  }

  private requireGlobal(referrer: string): GlobalController {
    if (!this.global) {
      throw new SetupError(`${referrer} needs a global controller`);
    }
    return this.global;
  }

  private requireLocals(ids: readonly string[], referrer: string): void {
    for (const id of ids) {
      if (!this.locals.has(id)) {
        throw new SetupError(`${referrer} references unknown local controller ${id}`);
      }
    }
  }

  private scheduleAction(action: ScenarioAction, index: number): void {
    const label = `action#${index}:${action.kind}`;
    switch (action.kind) {
      case 'policy': {
        const global = this.requireGlobal(label);
        this.requireLocals(action.to, label);
        const { policyType, content, target, to } = action;
        this.scheduler.scheduleLabelled(label, action.at, () => {
          const policy = global.createPolicy(policyType, content, target);
          for (const localId of to) {
            global.distributePolicy(policy, localId);
          }
        });
        return;
      }
      case 'revoke': {
        const global = this.requireGlobal(label);
        this.requireLocals(action.to, label);
        const { policyId, to } = action;
        this.scheduler.scheduleLabelled(label, action.at, () => {
          for (const localId of to) {
            global.revokePolicy(policyId, localId);
          }
        });
        return;
      }
      case 'handover-report': {
        const du = this.requireDu(action.du, label);
        const { attempts, successes } = action;
        this.scheduler.scheduleLabelled(label, action.at, () => {
          du.reportHandover(attempts, successes);
        });
        return;
      }
      case 'attach':
      case 'detach': {
        const du = this.requireDu(action.du, label);
        const ue = this.requireUe(action.ue, label);
        const attach = action.kind === 'attach';
        this.scheduler.scheduleLabelled(label, action.at, () => {
          if (attach && du.attachUe(ue.id)) {
            ue.servingDuId = du.id;
          } else if (!attach && du.detachUe(ue.id) && ue.servingDuId === du.id) {
            ue.servingDuId = null;
          }
        });
        return;
      }
      case 'peer': {
        const router = this.peers[action.channel];
        for (const id of [action.from, action.to]) {
          if (!router.isRegistered(id)) {
            throw new SetupError(`${label}: ${id} is not an endpoint of ${action.channel}`);
          }
        }
        const { messageType, payload, from, to } = action;
        this.scheduler.scheduleLabelled(label, action.at, () => {
          router.send({ kind: 'peer', messageType, payload }, from, to);
        });
        return;
      }
    }
  }
}
