import type { Clock } from './clock';
import { SENTINEL, EFFECT_KINDS, type EffectId, type EffectKind } from '@/types';

/** `null` marks an id that is tracked but has never been observed. */
type Expiry = number | null;

export interface TrackingLists {
  readonly actorBuffs: readonly EffectId[];
  readonly targetDebuffs: readonly EffectId[];
  readonly actionCooldowns: readonly EffectId[];
}

export const EMPTY_TRACKING: TrackingLists = {
  actorBuffs: [],
  targetDebuffs: [],
  actionCooldowns: [],
};

/** Remaining seconds per id; the value `SENTINEL` keeps an id unobserved. */
export type EffectBatch = ReadonlyMap<EffectId, number> | Iterable<readonly [EffectId, number]>;

export class EffectExpiryRegistry {
  private readonly expiries: Record<EffectKind, Map<EffectId, Expiry>> = {
    actorBuff: new Map(),
    targetDebuff: new Map(),
    actionCooldown: new Map(),
  };

  constructor(private readonly clock: Clock) {}

  trackIfAbsent(kind: EffectKind, id: EffectId): void {
    const map = this.expiries[kind];
    if (!map.has(id)) {
      map.set(id, null);
    }
  }

  isTracked(kind: EffectKind, id: EffectId): boolean {
    return this.expiries[kind].has(id);
  }

  trackedIds(kind: EffectKind): EffectId[] {
    return Array.from(this.expiries[kind].keys());
  }

  seed(lists: TrackingLists): void {
    for (const id of lists.actorBuffs) this.trackIfAbsent('actorBuff', id);
    for (const id of lists.targetDebuffs) this.trackIfAbsent('targetDebuff', id);
    for (const id of lists.actionCooldowns) this.trackIfAbsent('actionCooldown', id);
  }

  /**
   * Applies one observation batch for a kind. Ids missing from the batch that
   * hold a concrete expiry are treated as gone and expire now.
   */
  update(kind: EffectKind, batch: EffectBatch): void {
    const map = this.expiries[kind];
    const now = this.clock.now();
    const incoming = new Map<EffectId, number>(batch);

    for (const id of incoming.keys()) {
      this.trackIfAbsent(kind, id);
    }

    for (const [id, expiry] of map) {
      const seconds = incoming.get(id);
      if (seconds === undefined) {
        if (expiry !== null) {
          map.set(id, now);
        }
        continue;
      }
      map.set(id, seconds === SENTINEL ? null : now + Math.max(0, seconds) * 1000);
    }
  }

  recordActionUsed(actionId: EffectId, cooldownSeconds: number): void {
    this.expiries.actionCooldown.set(actionId, this.clock.now() + Math.max(0, cooldownSeconds) * 1000);
  }

  /** `SENTINEL` when unobserved, 0 when untracked, otherwise clamped seconds left. */
  remaining(kind: EffectKind, id: EffectId): number {
    const expiry = this.expiries[kind].get(id);
    if (expiry === undefined) {
      return 0;
    }
    if (expiry === null) {
      return SENTINEL;
    }
    return Math.max(0, (expiry - this.clock.now()) / 1000);
  }

  isActive(kind: EffectKind, id: EffectId): boolean {
    return this.remaining(kind, id) > 0;
  }

  /** Cooldown readiness. Unknown (untracked or unobserved) is never ready. */
  ready(actionId: EffectId): boolean {
    const expiry = this.expiries.actionCooldown.get(actionId);
    if (expiry === undefined || expiry === null) {
      return false;
    }
    return expiry - this.clock.now() <= 0;
  }

  clear(): void {
    for (const kind of EFFECT_KINDS) {
      this.expiries[kind].clear();
    }
  }
}
