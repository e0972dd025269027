/**
 * Context Pool
 * Freelist of reusable execution scopes, bounded by a maximum capacity.
 */

import { PoolConfig } from '../spec/types';
import { ExecutionContext } from './context';

export const DEFAULT_POOL_CONFIG: PoolConfig = {
  initialSize: 16,
  maxSize: 1024,
};

export class ContextPool {
  private free: ExecutionContext[] = [];

  constructor(private readonly config: PoolConfig = DEFAULT_POOL_CONFIG) {
    const preallocate = Math.max(0, Math.min(config.initialSize, config.maxSize));
    for (let i = 0; i < preallocate; i++) {
      this.free.push(new ExecutionContext());
    }
  }

  static withDefault(): ContextPool {
    return new ContextPool(DEFAULT_POOL_CONFIG);
  }

  /**
   * Take a cleared scope, allocating a fresh one when the pool is empty.
   */
  acquire(): ExecutionContext {
    const ctx = this.free.pop();
    if (!ctx) {
      return new ExecutionContext();
    }
    ctx.reset();
    return ctx;
  }

  /**
   * Return a scope. Overflow beyond maxSize is dropped.
   */
  release(ctx: ExecutionContext): void {
    if (this.free.length < this.config.maxSize) {
      ctx.reset();
      this.free.push(ctx);
    }
  }

  /**
   * Run `fn` with a pooled scope, releasing it on every exit path.
   */
  use<T>(fn: (ctx: ExecutionContext) => T): T {
    const ctx = this.acquire();
    try {
      return fn(ctx);
    } finally {
      this.release(ctx);
    }
  }

  availableCount(): number {
    return this.free.length;
  }

  clear(): void {
    this.free = [];
  }
}
