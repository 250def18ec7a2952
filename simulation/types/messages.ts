import type { Policy } from '../control/Policy';

export type IndicationType = 'CELL_LOAD' | 'HANDOVER_REPORT' | 'IQ_SUMMARY';

export type ControlType = 'HANDOVER_PARAMETER_ADJUSTMENT' | 'CONFIG_UPDATE';

// Global controller -> local controller.
export type A1Message =
  | { kind: 'policy_put'; policy: Policy }
  | { kind: 'policy_delete'; policyId: string };

export interface Indication {
  messageType: IndicationType;
  elementId: string;
  timestamp: number;
  payload: Record<string, unknown>;
}

export interface ControlMessage {
  messageType: ControlType;
  payload: Record<string, unknown>;
}

// Local controller <-> managed element.
export type E2Message =
  | { kind: 'policy'; policy: Policy }
  | { kind: 'control'; control: ControlMessage }
  | { kind: 'indication'; indication: Indication };

export interface IqBurst {
  kind: 'iq';
  ruId: string;
  samples: number;
  slot: number;
}

// Element <-> element (F1, X2, Xn).
export interface PeerMessage {
  kind: 'peer';
  messageType: string;
  payload: Record<string, unknown>;
}
