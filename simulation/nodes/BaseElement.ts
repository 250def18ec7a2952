import type { NodeConfig } from '../config/schema';
import type { Policy } from '../control/Policy';
import type { PointToPointRouter } from '../engine/ChannelRouter';
import type { EventScheduler } from '../engine/EventScheduler';
import type { Logger } from '../engine/Logger';
import type {
  ControlMessage,
  E2Message,
  IndicationType,
  IqBurst,
  PeerMessage,
} from '../types/messages';
import type { ElementClass, Receiver, SimTime } from '../types/simulation';

export type ElementMessage = E2Message | PeerMessage | IqBurst;

export interface AppliedPolicy {
  policyId: string;
  version: number;
  appliedAt: SimTime;
}

export interface InboxEntry {
  message: ElementMessage;
  fromNodeId: string;
  receivedAt: SimTime;
}

const INBOX_LIMIT = 256;

// Base contract shared by all simulated network elements.
// It keeps inbox and applied-policy bookkeeping and the uplink to the managing controller.
// Concrete elements react to controls, peer traffic and configuration through the protected hooks.
export abstract class BaseElement implements Receiver<ElementMessage> {
  abstract readonly elementClass: ElementClass;
  readonly id: string;
  messagesReceived = 0;
  protected readonly scheduler: EventScheduler;
  protected readonly logger: Logger;
  protected inbox: InboxEntry[] = [];
  private readonly applied: AppliedPolicy[] = [];
  private readonly parameters = new Map<string, unknown>();
  private uplink: { router: PointToPointRouter<E2Message>; controllerId: string } | undefined;

  constructor(id: string, scheduler: EventScheduler) {
    this.id = id;
    this.scheduler = scheduler;
    this.logger = scheduler.observability.logger.child(`element:${id}`);
  }

  get controllerId(): string | null {
    return this.uplink?.controllerId ?? null;
  }

  connectController(router: PointToPointRouter<E2Message>, controllerId: string): void {
    this.uplink = { router, controllerId };
  }

  disconnectController(): void {
    this.uplink = undefined;
  }

  receive(message: ElementMessage, sourceId: string): void {
    this.messagesReceived += 1;
    this.inbox.push({ message, fromNodeId: sourceId, receivedAt: this.scheduler.now });
    if (this.inbox.length > INBOX_LIMIT) {
      this.inbox.shift();
    }

    switch (message.kind) {
      case 'policy':
        this.applyPolicy(message.policy);
        return;
      case 'control':
        this.onControl(message.control, sourceId);
        return;
      case 'indication':
        this.logger.warn(`unexpected indication from ${sourceId}`);
        return;
      case 'iq':
        this.onIq(message, sourceId);
        return;
      case 'peer':
        this.onPeerMessage(message, sourceId);
        return;
    }
  }

  // Content keys overwrite earlier values, so of two policies touching one parameter the later delivery wins.
  applyPolicy(policy: Policy): void {
    for (const [key, value] of Object.entries(policy.content)) {
      this.parameters.set(key, value);
    }
    this.applied.push({ policyId: policy.policyId, version: policy.version, appliedAt: this.scheduler.now });
    this.logger.info(`applied policy ${policy.policyId} v${policy.version} (${policy.policyType})`);
    this.onPolicy(policy);
  }

  applyConfig(config: NodeConfig): void {
    this.onConfig(config);
    this.logger.info('configuration applied', { nodeId: config.nodeId });
  }

  appliedPolicies(): readonly AppliedPolicy[] {
    return this.applied;
  }

  parameter(key: string): unknown {
    return this.parameters.get(key);
  }

  recentMessages(): readonly InboxEntry[] {
    return this.inbox;
  }

  protected indicate(messageType: IndicationType, payload: Record<string, unknown>): boolean {
    if (!this.uplink) {
      this.logger.warn(`cannot send ${messageType}: no controller connected`);
      return false;
    }
    this.uplink.router.send(
      {
        kind: 'indication',
        indication: { messageType, elementId: this.id, timestamp: this.scheduler.now, payload },
      },
      this.id,
      this.uplink.controllerId,
    );
    return true;
  }

  protected sendPeer(
    router: PointToPointRouter<PeerMessage>,
    destinationId: string,
    messageType: string,
    payload: Record<string, unknown> = {},
  ): void {
    router.send({ kind: 'peer', messageType, payload }, this.id, destinationId);
  }

  protected onPolicy(_policy: Policy): void {}

  protected onControl(control: ControlMessage, sourceId: string): void {
    this.logger.warn(`ignoring control ${control.messageType} from ${sourceId}`);
  }

  protected onIq(_burst: IqBurst, sourceId: string): void {
    this.logger.warn(`ignoring IQ burst from ${sourceId}`);
  }

  protected onPeerMessage(message: PeerMessage, sourceId: string): void {
    this.logger.debug(`peer message ${message.messageType} from ${sourceId}`);
  }

  protected abstract onConfig(config: NodeConfig): void;
}
