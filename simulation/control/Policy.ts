import { z } from 'zod';
import { formatIssues } from '../config/schema';
import { ELEMENT_CLASSES, type ElementClass } from '../types/simulation';

export const POLICY_TYPES = ['POLICY-TYPE-1', 'POLICY-TYPE-2', 'POLICY-TYPE-3'] as const;

export type PolicyType = (typeof POLICY_TYPES)[number];

export type PolicyContent = Readonly<Record<string, unknown>>;

export interface Policy {
  readonly policyId: string;
  readonly policyType: PolicyType;
  readonly content: PolicyContent;
  readonly version: number;
  readonly target: ElementClass;
}

export const policySchema = z.object({
  policyId: z.string().trim().min(1, 'policyId must be non-empty'),
  policyType: z.enum(POLICY_TYPES),
  content: z.record(z.unknown()),
  version: z.number().int().positive(),
  target: z.enum(ELEMENT_CLASSES),
});

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

export function freezePolicy(policy: Policy): Policy {
  return deepFreeze(policy);
}

// Copies a policy across a controller boundary so neither side shares mutable state with the other.
export function clonePolicy(policy: Policy): Policy {
  return deepFreeze(structuredClone(policy));
}

export function parsePolicy(candidate: unknown): { ok: true; policy: Policy } | { ok: false; issues: string[] } {
  const result = policySchema.safeParse(candidate);
  if (!result.success) {
    return { ok: false, issues: formatIssues(result.error) };
  }
  return { ok: true, policy: clonePolicy(result.data) };
}
