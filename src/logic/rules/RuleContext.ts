import type { EffectExpiryRegistry } from '@/core/EffectExpiryRegistry';
import type { StateStoreApi } from '@/core/store';
import { StateFlag, type ActionId, type EffectId, type StateSnapshot } from '@/types';
import { computeWeaveSlots } from './AuxiliarySuggestionEngine';

/** Read-only view handed to rule predicates and resolvers. */
export interface RuleContext {
  readonly snapshot: StateSnapshot;
  canProcess(): boolean;
  canWeave(slots?: number): boolean;
  /** Auxiliary actions that still fit before the next primary action (0 to 2). */
  weaveSlots(): number;
  isMoving(): boolean;
  isResourceLow(): boolean;
  hasBuff(id: EffectId): boolean;
  buffRemaining(id: EffectId): number;
  /** Seconds left on a target debuff; `SENTINEL` when never observed. */
  debuffRemaining(id: EffectId): number;
  isActionReady(id: ActionId): boolean;
  /** Ready and the engine is allowed to act at all. */
  isAuxiliaryReady(id: ActionId): boolean;
}

export interface RuleTuning {
  readonly weaveBudgetSeconds: number;
  readonly weaveLockSeconds: number;
  readonly weaveSafetySeconds: number;
  readonly lowResourceFraction: number;
}

export class StoreRuleContext implements RuleContext {
  constructor(
    private readonly store: StateStoreApi,
    private readonly effects: EffectExpiryRegistry,
    private readonly tuning: RuleTuning,
  ) {}

  get snapshot(): StateSnapshot {
    return this.store.getState().snapshot;
  }

  canProcess(): boolean {
    return this.store.getState().canProcess();
  }

  canWeave(slots = 1): boolean {
    return this.store.getState().canWeave(slots, this.tuning.weaveBudgetSeconds);
  }

  weaveSlots(): number {
    const { weaveLockSeconds, weaveSafetySeconds } = this.tuning;
    return computeWeaveSlots(this.snapshot.timeToNextAction, weaveLockSeconds, weaveSafetySeconds);
  }

  isMoving(): boolean {
    return this.store.getState().hasFlag(StateFlag.IsMoving);
  }

  isResourceLow(): boolean {
    return this.store.getState().isResourceLow(this.tuning.lowResourceFraction);
  }

  hasBuff(id: EffectId): boolean {
    return this.effects.isActive('actorBuff', id);
  }

  buffRemaining(id: EffectId): number {
    return this.effects.remaining('actorBuff', id);
  }

  debuffRemaining(id: EffectId): number {
    return this.effects.remaining('targetDebuff', id);
  }

  isActionReady(id: ActionId): boolean {
    return this.effects.ready(id);
  }

  isAuxiliaryReady(id: ActionId): boolean {
    return this.canProcess() && this.effects.ready(id);
  }
}
