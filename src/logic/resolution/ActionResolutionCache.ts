import type { ActionCache } from './ActionCache';
import type { ActionId } from '@/types';

export interface ResolutionSource {
  resolve(inputId: ActionId): ActionId;
  /** True while any consulted rule depends on conditions that change within a TTL window. */
  hasDynamicRules(): boolean;
}

/**
 * Memoizing front of the rule engine. Static rule sets go through the TTL
 * cache; dynamic ones through a per-input memo scoped to one frame stamp.
 */
export class ActionResolutionCache {
  private memoFrame = 0;
  private readonly memo = new Map<ActionId, ActionId>();

  constructor(
    private readonly cache: ActionCache,
    private readonly source: ResolutionSource,
    private readonly currentFrame: () => number,
  ) {}

  resolve(inputId: ActionId): ActionId {
    if (this.source.hasDynamicRules()) {
      const frame = this.currentFrame();
      if (frame !== this.memoFrame) {
        this.memo.clear();
        this.memoFrame = frame;
      }
      const memoized = this.memo.get(inputId);
      if (memoized !== undefined) {
        return memoized;
      }
      const resolved = this.source.resolve(inputId);
      this.memo.set(inputId, resolved);
      return resolved;
    }

    const cached = this.cache.get(inputId);
    if (cached !== undefined) {
      return cached;
    }
    const resolved = this.source.resolve(inputId);
    this.cache.set(inputId, resolved);
    return resolved;
  }

  clear(): void {
    this.cache.clear();
  }

  clearAll(): void {
    this.cache.clear();
    this.memo.clear();
    this.memoFrame = 0;
  }
}
