import { PointToPointRouter, PubSubRouter, type DelaySampler, type Subscriber } from '../engine/ChannelRouter';
import { AddressError, ValidationError } from '../engine/errors';
import type { EventScheduler, ProcessHandle } from '../engine/EventScheduler';
import type { Logger } from '../engine/Logger';
import type { MetricsCollector } from '../engine/MetricsCollector';
import type { A1Message, ControlMessage, E2Message, Indication, IndicationType } from '../types/messages';
import { ELEMENT_CLASSES, type ElementClass, type Receiver } from '../types/simulation';
import { parsePolicy, type Policy } from './Policy';

export interface ManagedElement extends Receiver<E2Message> {
  readonly id: string;
  readonly elementClass: ElementClass;
  readonly controllerId: string | null;
  connectController(router: PointToPointRouter<E2Message>, controllerId: string): void;
  disconnectController(): void;
}

export interface LocalControllerOptions {
  scheduler: EventScheduler;
  e2Delay?: DelaySampler;
}

export interface PolicyApplication {
  policyId: string;
  version: number;
  elementId: string;
}

const KNOWN_CLASSES = new Set<string>(ELEMENT_CLASSES);

/**
 * Fast-tier controller. Holds the policies pushed down from the global controller and the
 * elements it manages, and turns stored policies into per-element control deliveries.
 *
 * Elements talk to it over its own `e2` channel; their indications are re-published to
 * observers on `e2-indications`, so a failing observer never affects the others.
 */
export class LocalController implements Receiver<A1Message | E2Message> {
  readonly id: string;
  readonly e2: PointToPointRouter<E2Message>;
  readonly indications: PubSubRouter<Indication>;
  private readonly scheduler: EventScheduler;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly elements = new Map<string, ManagedElement>();
  private readonly policies = new Map<string, Policy>();
  private readonly latest = new Map<IndicationType, Map<string, Indication>>();
  private enforcement: ProcessHandle | undefined;

  constructor(id: string, options: LocalControllerOptions) {
    this.id = id;
    this.scheduler = options.scheduler;
    this.logger = options.scheduler.observability.logger.child(`local:${id}`);
    this.metrics = options.scheduler.observability.metrics;
    this.e2 = new PointToPointRouter<E2Message>({ name: 'e2', scheduler: options.scheduler, delay: options.e2Delay });
    this.indications = new PubSubRouter<Indication>({ name: 'e2-indications', scheduler: options.scheduler });
    this.e2.register(id, this);
  }

  registerElement(element: ManagedElement): boolean {
    if (!KNOWN_CLASSES.has(element.elementClass)) {
      const err = new ValidationError(`element ${element.id} declares unknown class ${String(element.elementClass)}`);
      this.metrics.increment('validation.errors');
      this.logger.error(err.message);
      return false;
    }
    if (element.controllerId !== null && element.controllerId !== this.id) {
      const err = new ValidationError(`element ${element.id} is already managed by ${element.controllerId}`);
      this.metrics.increment('validation.errors');
      this.logger.error(err.message);
      return false;
    }
    if (this.elements.has(element.id) || !this.e2.register(element.id, element)) {
      this.logger.warn(`element ${element.id} already registered`);
      return false;
    }
    this.elements.set(element.id, element);
    element.connectController(this.e2, this.id);
    this.logger.info(`element ${element.id} (${element.elementClass}) registered`);
    return true;
  }

  removeElement(elementId: string): boolean {
    const element = this.elements.get(elementId);
    if (!element) {
      this.logger.warn(`element ${elementId} not managed here`);
      return false;
    }
    this.elements.delete(elementId);
    this.e2.unregister(elementId);
    element.disconnectController();
    this.logger.info(`element ${elementId} removed`);
    return true;
  }

  hasElement(elementId: string): boolean {
    return this.elements.has(elementId);
  }

  elementIds(): string[] {
    return [...this.elements.keys()];
  }

  /** Validates and stores a policy copy. Invalid input is reported and dropped; a repeated id replaces the stored policy. */
  receivePolicy(candidate: unknown): boolean {
    const parsed = parsePolicy(candidate);
    if (!parsed.ok) {
      const err = new ValidationError('invalid policy received', parsed.issues);
      this.metrics.increment('validation.errors');
      this.metrics.increment('policy.rejected');
      this.logger.error(err.message, { issues: err.issues });
      return false;
    }

    const { policy } = parsed;
    const previous = this.policies.get(policy.policyId);
    this.policies.set(policy.policyId, policy);
    this.metrics.increment('policy.received');
    this.logger.info(
      previous
        ? `policy ${policy.policyId} replaced (v${previous.version} -> v${policy.version})`
        : `policy ${policy.policyId} stored (${policy.policyType}, target ${policy.target})`,
    );
    return true;
  }

  removePolicy(policyId: string): boolean {
    if (!this.policies.delete(policyId)) {
      this.logger.warn(`policy ${policyId} not found`);
      return false;
    }
    this.logger.info(`policy ${policyId} removed`);
    return true;
  }

  getPolicy(policyId: string): Policy | undefined {
    return this.policies.get(policyId);
  }

  storedPolicies(): Policy[] {
    return [...this.policies.values()];
  }

  /**
   * Sends every stored policy to every registered element of the policy's target class.
   * Re-running it with no state change schedules the same applications again.
   */
  enforcePolicies(): PolicyApplication[] {
    const applications: PolicyApplication[] = [];
    for (const policy of this.policies.values()) {
      for (const element of this.elements.values()) {
        if (element.elementClass !== policy.target) {
          continue;
        }
        this.e2.send({ kind: 'policy', policy }, this.id, element.id);
        this.metrics.increment('policy.enforced');
        applications.push({ policyId: policy.policyId, version: policy.version, elementId: element.id });
      }
    }
    this.logger.debug(`enforcement pass scheduled ${applications.length} application(s)`);
    return applications;
  }

  startEnforcement(interval: number): ProcessHandle {
    this.stopEnforcement();
    this.enforcement = this.scheduler.every(interval, () => this.enforcePolicies(), `enforce:${this.id}`);
    return this.enforcement;
  }

  stopEnforcement(): void {
    this.enforcement?.stop();
    this.enforcement = undefined;
  }

  addObserver(observerId: string, callback: Subscriber<Indication>): boolean {
    const added = this.indications.subscribe(observerId, callback);
    if (added) {
      this.logger.info(`observer ${observerId} registered`);
    }
    return added;
  }

  removeObserver(observerId: string): boolean {
    return this.indications.unsubscribe(observerId);
  }

  sendControl(control: ControlMessage, elementId: string): void {
    if (!this.elements.has(elementId)) {
      throw new AddressError('e2', elementId, 'element');
    }
    this.e2.send({ kind: 'control', control }, this.id, elementId);
  }

  latestIndications(messageType: IndicationType): Indication[] {
    return [...(this.latest.get(messageType)?.values() ?? [])];
  }

  receive(message: A1Message | E2Message, sourceId: string): void {
    switch (message.kind) {
      case 'policy_put':
        this.receivePolicy(message.policy);
        return;
      case 'policy_delete':
        this.removePolicy(message.policyId);
        return;
      case 'indication':
        this.onIndication(message.indication, sourceId);
        return;
      case 'policy':
      case 'control':
        this.logger.warn(`unexpected ${message.kind} message from ${sourceId}`);
        return;
    }
  }

  private onIndication(indication: Indication, sourceId: string): void {
    const byElement = this.latest.get(indication.messageType) ?? new Map<string, Indication>();
    byElement.set(indication.elementId, indication);
    this.latest.set(indication.messageType, byElement);
    this.logger.debug(`${indication.messageType} from ${sourceId}`, indication.payload);
    this.indications.publish(indication, sourceId);
  }
}
