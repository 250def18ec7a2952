import { z } from 'zod';
import type {
  ChannelStats,
  ElementSnapshot,
  PolicyStats,
  SchedulerStats,
  SimulationSnapshot
} from '../simulation/types/simulation.js';

export type { ChannelStats, ElementSnapshot, PolicyStats, SchedulerStats, SimulationSnapshot };

export type RunStatus = 'completed' | 'failed';

export interface RunRecord {
  runId: string;
  scenarioName: string | null;
  status: RunStatus;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  snapshot: SimulationSnapshot | null;
  error?: string;
}

export type RunSummary = Omit<RunRecord, 'snapshot'> & { simTime: number | null };

export const runRequestSchema = z
  .object({
    scenario: z.unknown(),
    until: z.number().finite().positive().optional(),
    seed: z.union([z.string(), z.number().int()]).optional()
  })
  .strict();

export type RunRequest = z.infer<typeof runRequestSchema>;

export class HttpError extends Error {
  status: number;

  constructor(status: number, message: string) {
    super(message);
    this.status = status;
  }
}

export function isSimulationSnapshot(value: unknown): value is SimulationSnapshot {
  if (!value || typeof value !== 'object') return false;
  const v = value as Record<string, unknown>;
  if (typeof v.runId !== 'string' || typeof v.simTime !== 'number') return false;
  if (!v.scheduler || typeof v.scheduler !== 'object') return false;
  if (!v.channels || typeof v.channels !== 'object') return false;
  if (!v.policies || typeof v.policies !== 'object') return false;
  return Array.isArray(v.elements) && typeof v.mobilityTicks === 'number' && typeof v.validationErrors === 'number';
}
