import type { PointToPointRouter } from '../engine/ChannelRouter';
import { AddressError, ValidationError } from '../engine/errors';
import type { EventScheduler } from '../engine/EventScheduler';
import type { Logger } from '../engine/Logger';
import type { MetricsCollector } from '../engine/MetricsCollector';
import type { A1Message } from '../types/messages';
import type { ElementClass, Receiver } from '../types/simulation';
import type { LocalController } from './LocalController';
import { clonePolicy, freezePolicy, type Policy, type PolicyContent, type PolicyType } from './Policy';

export interface GlobalControllerOptions {
  scheduler: EventScheduler;
  a1: PointToPointRouter<A1Message>;
}

// Slow-tier controller: authors policies and pushes value copies of them to the local
// controllers it manages over the a1 channel.
export class GlobalController implements Receiver<A1Message> {
  readonly id: string;
  readonly scheduler: EventScheduler;
  private readonly a1: PointToPointRouter<A1Message>;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly policies = new Map<string, Policy>();
  private readonly managed = new Map<string, LocalController>();
  private policyCounter = 0;

  constructor(id: string, options: GlobalControllerOptions) {
    this.id = id;
    this.scheduler = options.scheduler;
    this.a1 = options.a1;
    this.logger = options.scheduler.observability.logger.child(`global:${id}`);
    this.metrics = options.scheduler.observability.metrics;
    this.a1.register(id, this);
  }

  createPolicy(policyType: PolicyType, content: PolicyContent, target: ElementClass): Policy {
    this.policyCounter += 1;
    const policy = freezePolicy({
      policyId: `policy-${this.policyCounter}`,
      policyType,
      content: structuredClone(content),
      version: 1,
      target,
    });
    this.policies.set(policy.policyId, policy);
    this.metrics.increment('policy.created');
    this.logger.info(`created ${policyType} policy ${policy.policyId} for ${target}`);
    return policy;
  }

  /** Replaces a policy's content and bumps its version. Stored policies are never mutated in place. */
  updatePolicy(policyId: string, content: PolicyContent): Policy {
    const current = this.policies.get(policyId);
    if (!current) {
      throw new ValidationError(`policy ${policyId} does not exist on ${this.id}`);
    }
    const next = freezePolicy({ ...current, content: structuredClone(content), version: current.version + 1 });
    this.policies.set(policyId, next);
    this.logger.info(`updated policy ${policyId} to v${next.version}`);
    return next;
  }

  deletePolicy(policyId: string): boolean {
    const deleted = this.policies.delete(policyId);
    if (!deleted) {
      this.logger.warn(`policy ${policyId} not found`);
    }
    return deleted;
  }

  getPolicy(policyId: string): Policy | undefined {
    return this.policies.get(policyId);
  }

  authoredPolicies(): Policy[] {
    return [...this.policies.values()];
  }

  addManagedLocalController(controller: LocalController): boolean {
    if (this.managed.has(controller.id)) {
      return false;
    }
    if (!this.a1.register(controller.id, controller)) {
      const err = new ValidationError(`a1 endpoint ${controller.id} is already taken`);
      this.metrics.increment('validation.errors');
      this.logger.error(err.message);
      return false;
    }
    this.managed.set(controller.id, controller);
    this.logger.info(`managing local controller ${controller.id}`);
    return true;
  }

  managedControllers(): LocalController[] {
    return [...this.managed.values()];
  }

  managedControllerFor(elementId: string): LocalController | undefined {
    return this.managedControllers().find((controller) => controller.hasElement(elementId));
  }

  distributePolicy(policy: Policy, localControllerId: string): void {
    if (!this.managed.has(localControllerId)) {
      throw new AddressError('a1', localControllerId, 'controller');
    }
    this.a1.send({ kind: 'policy_put', policy: clonePolicy(policy) }, this.id, localControllerId);
    this.metrics.increment('policy.distributed');
    this.logger.info(`sent policy ${policy.policyId} v${policy.version} to ${localControllerId}`);
  }

  revokePolicy(policyId: string, localControllerId: string): void {
    if (!this.managed.has(localControllerId)) {
      throw new AddressError('a1', localControllerId, 'controller');
    }
    this.a1.send({ kind: 'policy_delete', policyId }, this.id, localControllerId);
    this.logger.info(`revoked policy ${policyId} on ${localControllerId}`);
  }

  receive(message: A1Message, sourceId: string): void {
    this.logger.warn(`ignoring ${message.kind} from ${sourceId}`);
  }
}
