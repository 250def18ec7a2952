import { ValidationError } from './errors';
import type { Observability } from './Observability';
import type { Logger } from './Logger';

// Logical id -> handle for one channel. Ids are unique; registering an id twice keeps the first handle.
export class NodeRegistry<THandle> {
  private readonly handles = new Map<string, THandle>();
  private readonly logger: Logger;

  constructor(
    readonly channel: string,
    private readonly observability: Observability,
  ) {
    this.logger = observability.logger.child(`registry:${channel}`);
  }

  get size(): number {
    return this.handles.size;
  }

  register(id: string, handle: THandle): boolean {
    if (id.trim().length === 0) {
      const err = new ValidationError(`${this.channel}: endpoint id must be a non-empty string`);
      this.observability.metrics.increment('validation.errors');
      this.logger.warn(err.message);
      return false;
    }
    if (this.handles.has(id)) {
      this.logger.warn(`node ${id} already registered on ${this.channel}; keeping existing handle`);
      return false;
    }
    this.handles.set(id, handle);
    this.logger.debug(`node ${id} registered on ${this.channel}`);
    return true;
  }

  unregister(id: string): boolean {
    if (!this.handles.delete(id)) {
      this.logger.warn(`node ${id} not found on ${this.channel}`);
      return false;
    }
    this.logger.debug(`node ${id} unregistered from ${this.channel}`);
    return true;
  }

  has(id: string): boolean {
    return this.handles.has(id);
  }

  resolve(id: string): THandle | undefined {
    return this.handles.get(id);
  }

  ids(): string[] {
    return [...this.handles.keys()];
  }

  entries(): Array<[string, THandle]> {
    return [...this.handles.entries()];
  }
}
