import { z } from 'zod';
import { POLICY_TYPES } from '../control/Policy';
import { ELEMENT_CLASSES } from '../types/simulation';

const positiveTime = z.number().finite().positive();

const nonNegativeTime = z.number().finite().min(0);

const identifier = z.string().trim().min(1);

const positionSchema = z.object({ x: z.number().finite(), y: z.number().finite() });

export const delaySchema = z.union([
  z.object({ fixed: nonNegativeTime }).strict(),
  z
    .object({
      mean: nonNegativeTime,
      std: nonNegativeTime,
      jitterStd: nonNegativeTime.optional(),
      floor: nonNegativeTime.optional(),
    })
    .strict(),
]);

export const PEER_CHANNELS = ['f1', 'x2', 'xn'] as const;

const mobilitySchema = z.discriminatedUnion('model', [
  z.object({ model: z.literal('random-walk'), stepSize: positiveTime.optional() }),
  z.object({
    model: z.literal('random-waypoint'),
    speed: positiveTime.optional(),
    area: z.tuple([positiveTime, positiveTime]).optional(),
    pauseMean: nonNegativeTime.optional(),
    pauseStd: nonNegativeTime.optional(),
  }),
  z.object({
    model: z.literal('manhattan'),
    speed: positiveTime.optional(),
    grid: z.tuple([z.number().int().positive(), z.number().int().positive()]).optional(),
    blockSize: positiveTime.optional(),
  }),
]);

const elementBase = {
  id: identifier,
  controller: identifier.optional(),
};

export const elementSpecSchema = z.discriminatedUnion('class', [
  z.object({
    ...elementBase,
    class: z.literal('o-ru'),
    du: identifier.optional(),
    transmitInterval: positiveTime.optional(),
    frequency: z.number().min(0).optional(),
    bandwidth: z.number().min(0).optional(),
    txPower: z.number().min(-30).max(50).optional(),
    iqSamplesPerSlot: z.number().int().positive().optional(),
  }),
  z.object({
    ...elementBase,
    class: z.literal('o-du'),
    cellId: identifier.optional(),
    maxUes: z.number().int().min(0).optional(),
    txPower: z.number().min(-30).max(50).optional(),
    reportInterval: positiveTime.optional(),
  }),
  z.object({ ...elementBase, class: z.literal('o-cu-cp'), schedulers: z.array(z.string()).optional() }),
  z.object({ ...elementBase, class: z.literal('o-cu-up'), schedulers: z.array(z.string()).optional() }),
  z.object({
    ...elementBase,
    class: z.literal('ue'),
    position: positionSchema.default({ x: 0, y: 0 }),
    mobility: mobilitySchema.optional(),
    updateInterval: positiveTime.optional(),
    servingDu: identifier.optional(),
  }),
]);

export const actionSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('policy'),
    at: nonNegativeTime,
    policyType: z.enum(POLICY_TYPES),
    target: z.enum(ELEMENT_CLASSES),
    content: z.record(z.unknown()),
    to: z.array(identifier).min(1),
  }),
  z.object({ kind: z.literal('revoke'), at: nonNegativeTime, policyId: identifier, to: z.array(identifier).min(1) }),
  z.object({
    kind: z.literal('handover-report'),
    at: nonNegativeTime,
    du: identifier,
    attempts: z.number().int().min(0),
    successes: z.number().int().min(0),
  }),
  z.object({ kind: z.literal('attach'), at: nonNegativeTime, du: identifier, ue: identifier }),
  z.object({ kind: z.literal('detach'), at: nonNegativeTime, du: identifier, ue: identifier }),
  z.object({
    kind: z.literal('peer'),
    at: nonNegativeTime,
    channel: z.enum(PEER_CHANNELS),
    from: identifier,
    to: identifier,
    messageType: identifier,
    payload: z.record(z.unknown()).default({}),
  }),
]);

export const scenarioSchema = z
  .object({
    name: z.string().optional(),
    seed: z.union([z.string(), z.number().int()]).optional(),
    until: positiveTime,
    delays: z.record(z.enum(['a1', 'e2', 'fronthaul', 'f1', 'x2', 'xn']), delaySchema).default({}),
    globalController: z
      .object({
        id: identifier,
        loadBalancing: z
          .object({
            id: identifier.default('load-balancer'),
            loadThreshold: z.number().min(0).optional(),
            interval: positiveTime.optional(),
          })
          .optional(),
      })
      .optional(),
    localControllers: z
      .array(
        z.object({
          id: identifier,
          enforcementInterval: positiveTime.optional(),
          handoverObserver: z
            .object({
              id: identifier.default('handover-observer'),
              successThreshold: z.number().min(0).max(1).optional(),
              minAttempts: z.number().int().min(0).optional(),
              hysteresisStep: z.number().optional(),
              timeToTriggerStep: z.number().optional(),
            })
            .optional(),
        }),
      )
      .default([]),
    elements: z.array(elementSpecSchema).default([]),
    actions: z.array(actionSchema).default([]),
    nodeConfigs: z.array(z.unknown()).default([]),
  })
  .strict();

export type Scenario = z.infer<typeof scenarioSchema>;

export type ScenarioInput = z.input<typeof scenarioSchema>;

export type ElementSpec = z.infer<typeof elementSpecSchema>;

export type ScenarioAction = z.infer<typeof actionSchema>;

export type DelaySpec = z.infer<typeof delaySchema>;
