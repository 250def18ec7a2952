import { z } from 'zod';

export const NODE_TYPES = ['o-ru', 'o-du', 'o-cu-cp', 'o-cu-up', 'ue', 'local-controller', 'global-controller'] as const;

export const cellSchema = z.object({
  cellId: z.string().min(1),
  duId: z.string().optional(),
  maxUes: z.number().int().min(0).optional(),
});

// Per-node configuration as delivered by the management plane.
export const nodeConfigSchema = z
  .object({
    nodeId: z.string().min(1),
    nodeType: z.enum(NODE_TYPES).optional(),
    frequency: z.number().min(0).optional(),
    bandwidth: z.number().min(0).optional(),
    txPower: z.number().min(-30).max(50).optional(),
    maxUes: z.number().int().min(0).optional(),
    iqSamplesPerSlot: z.number().int().positive().optional(),
    cells: z.array(cellSchema).optional(),
    schedulers: z.array(z.string()).optional(),
    supportedOperations: z.array(z.string()).optional(),
    controlSchedulers: z.array(z.string()).optional(),
    qosSchedulers: z.array(z.string()).optional(),
    observers: z.array(z.string()).optional(),
    managedControllers: z.array(z.string()).optional(),
  })
  .strict();

export type NodeConfig = z.infer<typeof nodeConfigSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
