import { Result } from "better-result";

/**
 * @vnetlab/runtime
 *
 * Shared runtime interface for supervised simulator processes
 */

/**
 * Runtime type discriminator
 */
export type RuntimeType = "vpcs";

/**
 * Lifecycle status. "deleted" is terminal.
 */
export type RuntimeStatus = "stopped" | "starting" | "running" | "failed" | "deleted";

/**
 * Runtime instance information
 */
export interface RuntimeInfo {
  id: number;
  name: string;
  status: RuntimeStatus;
  pid: number | null;
  startedAt?: string;
}

/**
 * Core runtime interface that all supervised devices implement
 */
export interface Runtime<E extends Error = Error> {
  readonly type: RuntimeType;

  /**
   * Identity of this instance, unique among live instances
   */
  readonly id: number;

  /**
   * Start the process. A no-op while it is already running
   */
  start(): Promise<Result<void, E>>;

  /**
   * Ask the process to exit and forget its handle
   */
  stop(): Promise<Result<void, E>>;

  /**
   * Stop the process and release the identity
   */
  delete(): Promise<Result<void, E>>;

  /**
   * Check if the process answers on its control channel
   */
  isRunning(): Promise<boolean>;

  getPid(): number | null;

  getInfo(): Promise<RuntimeInfo>;
}

/**
 * Handler function type for runtime lifecycle
 */
export type RuntimeHandler<T, E extends Error = Error> = (runtime: T) => Promise<Result<void, E>>;

/**
 * Ordered, named handler chain. `run` stops at the first failing handler.
 */
export class HandlerList<T, E extends Error = Error> {
  private handlers: Map<string, RuntimeHandler<T, E>> = new Map();
  private order: string[] = [];

  append(name: string, handler: RuntimeHandler<T, E>): this {
    if (!this.handlers.has(name)) {
      this.order.push(name);
    }
    this.handlers.set(name, handler);
    return this;
  }

  prepend(name: string, handler: RuntimeHandler<T, E>): this {
    if (this.handlers.has(name)) {
      this.order = this.order.filter((n) => n !== name);
    }
    this.handlers.set(name, handler);
    this.order.unshift(name);
    return this;
  }

  remove(name: string): this {
    this.handlers.delete(name);
    this.order = this.order.filter((n) => n !== name);
    return this;
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  clear(): this {
    this.handlers.clear();
    this.order = [];
    return this;
  }

  async run(runtime: T): Promise<Result<void, E>> {
    for (const name of this.order) {
      const handler = this.handlers.get(name);
      if (handler) {
        const result = await handler(runtime);
        if (result.isErr()) {
          return result;
        }
      }
    }
    return Result.ok(undefined);
  }

  list(): string[] {
    return [...this.order];
  }
}
