export type SimTime = number;

export const ELEMENT_CLASSES = ['o-ru', 'o-du', 'o-cu-cp', 'o-cu-up', 'ue'] as const;

export type ElementClass = (typeof ELEMENT_CLASSES)[number];

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Position {
  x: number;
  y: number;
}

export interface Receiver<TMessage> {
  receive(message: TMessage, sourceId: string): void;
}

export interface ChannelStats {
  sent: number;
  delivered: number;
  failed: number;
  dropped: number;
}

export interface SchedulerStats {
  simTime: SimTime;
  processed: number;
  pending: number;
  callbackErrors: number;
}

export interface PolicyStats {
  created: number;
  distributed: number;
  received: number;
  rejected: number;
  enforced: number;
}

export interface ElementSnapshot {
  elementId: string;
  elementClass: ElementClass;
  controllerId: string | null;
  messagesReceived: number;
  policiesApplied: number;
  position?: Position;
}

export interface SimulationSnapshot {
  runId: string;
  simTime: SimTime;
  scheduler: SchedulerStats;
  channels: Record<string, ChannelStats>;
  policies: PolicyStats;
  mobilityTicks: number;
  validationErrors: number;
  elements: ElementSnapshot[];
}
