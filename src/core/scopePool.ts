// src/core/scopePool.ts
//
// Frame pool for function calls. One pool per Engine; engines are never shared
// between worker threads, so the pool needs no locking.
//
// Only frames of closure-free functions are borrowed (the parser marks those
// as poolable): nothing can hold a reference to such a frame once the call
// returns, so clearing and reusing it is unobservable.

import type { Logger } from "../utils/logger";
import { silentLogger } from "../utils/logger";
import { Scope } from "./scope";
import type { ScopeOptions } from "./scope";

export type ScopePoolStats = {
  borrowed: number;
  reused: number;
  fallbacks: number;
  idle: number;
};

export class ScopePool {
  private readonly idle: Scope[] = [];
  private readonly logger: Logger;
  private borrowed = 0;
  private reused = 0;
  private fallbacks = 0;

  constructor(
    private readonly maxIdle = 64,
    logger?: Logger,
  ) {
    this.logger = logger ?? silentLogger();
  }

  public borrow(parent: Scope, options: ScopeOptions = {}): Scope {
    this.borrowed++;
    const candidate = this.idle.pop();
    if (!candidate) return new Scope(parent, options);

    if (parent === candidate || parent.hasAncestor(candidate)) {
      // reuse would make the frame its own ancestor
      this.fallbacks++;
      this.logger.trace("scope pool fallback", { frame: candidate.frameId });
      this.idle.push(candidate);
      return new Scope(parent, options);
    }

    this.reused++;
    candidate.attach(parent, options);
    return candidate;
  }

  public release(scope: Scope): void {
    scope.clear();
    if (this.idle.length < this.maxIdle) this.idle.push(scope);
  }

  public stats(): ScopePoolStats {
    return { borrowed: this.borrowed, reused: this.reused, fallbacks: this.fallbacks, idle: this.idle.length };
  }
}
