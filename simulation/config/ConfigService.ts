import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { describeError, ValidationError } from '../engine/errors';
import type { Logger } from '../engine/Logger';
import type { MetricsCollector } from '../engine/MetricsCollector';
import { formatIssues, nodeConfigSchema, type NodeConfig } from './schema';

export type ConfigStatus = 'applied' | 'rolled_back' | 'committed';

export interface ConfigState {
  status: ConfigStatus;
  version: number;
}

export interface Configurable {
  readonly id: string;
  applyConfig(config: NodeConfig): void;
}

export interface ConfigProvider {
  getConfig(nodeId: string): NodeConfig | undefined;
}

const configFileSchema = z.union([z.array(z.unknown()), z.object({ nodes: z.array(z.unknown()) })]);

// Management-plane store of per-node configuration with version history, rollback and commit.
export class ConfigService implements ConfigProvider {
  private readonly current = new Map<string, NodeConfig>();
  private readonly history = new Map<string, NodeConfig[]>();
  private readonly states = new Map<string, ConfigState>();
  private readonly logger: Logger;

  constructor(
    logger: Logger,
    private readonly metrics?: MetricsCollector,
  ) {
    this.logger = logger.child('config');
  }

  /** Validates each candidate and stores the valid ones. Returns the node ids that were stored. */
  load(candidates: readonly unknown[]): string[] {
    const stored: string[] = [];
    candidates.forEach((candidate, index) => {
      const result = nodeConfigSchema.safeParse(candidate);
      if (!result.success) {
        const err = new ValidationError(`node config #${index} rejected`, formatIssues(result.error));
        this.metrics?.increment('validation.errors');
        this.logger.error(err.message, { issues: err.issues });
        return;
      }
      this.store(result.data);
      stored.push(result.data.nodeId);
    });
    return stored;
  }

  async loadFile(path: string): Promise<string[]> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf8'));
    } catch (err) {
      throw new ValidationError(`cannot read node configs from ${path}: ${describeError(err)}`);
    }
    const parsed = configFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(`${path} must hold an array of node configs or { "nodes": [...] }`);
    }
    const stored = this.load(Array.isArray(parsed.data) ? parsed.data : parsed.data.nodes);
    this.logger.info(`loaded ${stored.length} node config(s) from ${path}`);
    return stored;
  }

  getConfig(nodeId: string): NodeConfig | undefined {
    return this.current.get(nodeId);
  }

  status(nodeId: string): ConfigState | undefined {
    return this.states.get(nodeId);
  }

  versions(nodeId: string): readonly NodeConfig[] {
    return this.history.get(nodeId) ?? [];
  }

  nodeIds(): string[] {
    return [...this.current.keys()];
  }

  applyConfig(node: Configurable): boolean {
    const config = this.current.get(node.id);
    if (!config) {
      this.logger.warn(`no configuration for node ${node.id}`);
      return false;
    }
    try {
      node.applyConfig(config);
    } catch (err) {
      this.logger.error(`failed to apply config to ${node.id}: ${describeError(err)}`);
      return false;
    }
    return true;
  }

  applyConfigs(nodes: Iterable<Configurable>): string[] {
    const applied: string[] = [];
    for (const node of nodes) {
      if (this.applyConfig(node)) {
        applied.push(node.id);
      }
    }
    return applied;
  }

  /** Restores an earlier version; without `version`, the one before the latest. */
  rollback(nodeId: string, version?: number): NodeConfig {
    const versions = this.history.get(nodeId);
    if (!versions) {
      throw new ValidationError(`no configuration history for node ${nodeId}`);
    }
    const target = version ?? versions.length - 2;
    const config = versions[target];
    if (!Number.isInteger(target) || !config) {
      throw new ValidationError(
        version === undefined
          ? `no previous configuration to roll back to for node ${nodeId}`
          : `invalid version ${version} for node ${nodeId}`,
      );
    }
    this.current.set(nodeId, config);
    this.states.set(nodeId, { status: 'rolled_back', version: target });
    this.logger.info(`node ${nodeId} rolled back to version ${target}`);
    return config;
  }

  commit(nodeId: string): ConfigState {
    const state = this.states.get(nodeId);
    if (!state) {
      throw new ValidationError(`cannot commit: no configuration for node ${nodeId}`);
    }
    const committed: ConfigState = { ...state, status: 'committed' };
    this.states.set(nodeId, committed);
    this.logger.info(`node ${nodeId} configuration committed at version ${committed.version}`);
    return committed;
  }

  // Later fields overlay earlier ones; history keeps every submitted document as-is.
  private store(config: NodeConfig): void {
    const merged: NodeConfig = { ...this.current.get(config.nodeId), ...config };
    this.current.set(config.nodeId, merged);
    const versions = this.history.get(config.nodeId) ?? [];
    versions.push(config);
    this.history.set(config.nodeId, versions);
    this.states.set(config.nodeId, { status: 'applied', version: versions.length - 1 });
  }
}
