import type { SimTime } from '../types/simulation';

export type SimulationErrorCode =
  | 'validation'
  | 'invalid_argument'
  | 'address'
  | 'callback'
  | 'setup';

export class SimulationError extends Error {
  readonly code: SimulationErrorCode;

  constructor(code: SimulationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// Malformed policy, bad registration, bad config. Non-fatal: callers report and discard.
export class ValidationError extends SimulationError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], code: SimulationErrorCode = 'validation') {
    super(code, message);
    this.issues = issues;
  }
}

// Scheduler misuse. Always thrown at the call site.
export class InvalidArgumentError extends ValidationError {
  constructor(message: string) {
    super(message, [], 'invalid_argument');
  }
}

export class AddressError extends SimulationError {
  readonly channel: string;
  readonly address: string;

  constructor(channel: string, address: string, role: 'source' | 'destination' | 'controller' | 'element') {
    super('address', `${channel}: ${role} ${address} is not registered`);
    this.channel = channel;
    this.address = address;
  }
}

export class CallbackError extends SimulationError {
  readonly simTime: SimTime;
  readonly label: string;

  constructor(label: string, simTime: SimTime, cause: unknown) {
    super('callback', `callback ${label} failed at t=${simTime}: ${describeError(cause)}`, { cause });
    this.simTime = simTime;
    this.label = label;
  }
}

export class SetupError extends SimulationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('setup', message, options);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
