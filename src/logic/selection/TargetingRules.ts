import type { EntitySelectionCache, SelectionOptions } from './EntitySelectionCache';
import type { RuleContext } from '../rules/RuleContext';
import type { ActionId, EffectId, EntityId, TargetingMode } from '@/types';

export interface TargetingRule {
  readonly actionId: ActionId;
  readonly mode: TargetingMode;
  readonly displayName: string;
  /** Upgraded action used while `requiredBuffId` is active on the actor. */
  readonly secondaryActionId?: ActionId;
  readonly requiredBuffId?: EffectId;
}

export class TargetingRuleTable {
  private readonly byAction = new Map<ActionId, TargetingRule>();

  constructor(rules: readonly TargetingRule[] = []) {
    for (const rule of rules) {
      this.byAction.set(rule.actionId, rule);
      if (rule.secondaryActionId !== undefined && rule.secondaryActionId !== 0) {
        this.byAction.set(rule.secondaryActionId, rule);
      }
    }
  }

  get size(): number {
    return this.byAction.size;
  }

  get(actionId: ActionId): TargetingRule | undefined {
    return this.byAction.get(actionId);
  }

  has(actionId: ActionId): boolean {
    return this.byAction.has(actionId);
  }
}

/** Swaps a base action for its secondary while the required buff is up. */
export function resolveTargetedAction(rule: TargetingRule, inputId: ActionId, context: RuleContext): ActionId {
  if (inputId !== rule.actionId || rule.secondaryActionId === undefined || rule.requiredBuffId === undefined) {
    return inputId;
  }
  return context.hasBuff(rule.requiredBuffId) ? rule.secondaryActionId : inputId;
}

export function selectRecipient(
  rule: TargetingRule,
  selection: EntitySelectionCache,
  currentTargetId: EntityId,
  options: SelectionOptions,
): EntityId {
  switch (rule.mode) {
    case 'smart':
      return selection.resolveTarget(options);
    case 'ground':
    case 'groundSpecial':
      return selection.resolveGroundTarget(currentTargetId);
    case 'cleanse':
      return selection.resolveCleanseTarget(options);
    default: {
      const exhaustive: never = rule.mode;
      throw new Error(`Unhandled targeting mode: ${String(exhaustive)}`);
    }
  }
}
