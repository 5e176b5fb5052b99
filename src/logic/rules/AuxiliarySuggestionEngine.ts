import type { RuleContext } from './RuleContext';
import type { ActionId } from '@/types';

export interface AuxiliaryRule {
  readonly label: string;
  /** Lower runs first. */
  readonly priority: number;
  readonly condition: (context: RuleContext) => boolean;
  readonly actionId: ActionId | ((context: RuleContext) => ActionId);
}

export interface SuggestionGates {
  readonly canProcess: boolean;
  readonly canWeave: boolean;
  readonly enabledForJob: boolean;
}

export const MAX_SUGGESTION_BUFFER = 8;

/**
 * Weave slots left before the next primary action: none while the lock would
 * overrun it, two once two locks plus the safety margin fit.
 */
export function computeWeaveSlots(timeToNextAction: number, lockSeconds = 0.7, safetySeconds = 0.05): number {
  if (timeToNextAction <= 0) {
    return 2;
  }
  if (timeToNextAction < lockSeconds + safetySeconds) {
    return 0;
  }
  if (timeToNextAction >= lockSeconds * 2 + safetySeconds) {
    return 2;
  }
  return 1;
}

export function sortByPriority(rules: readonly AuxiliaryRule[]): AuxiliaryRule[] {
  return [...rules].sort((a, b) => a.priority - b.priority);
}

export class AuxiliarySuggestionEngine {
  private readonly buffer: ActionId[] = new Array<ActionId>(MAX_SUGGESTION_BUFFER).fill(0);
  private cachedFrame = -1;
  private cachedKey = -1;
  private cached: readonly ActionId[] = [];

  constructor(
    private readonly maxRulesPerCall = 8,
    private readonly onFault?: (rule: AuxiliaryRule, error: unknown) => void,
  ) {}

  /**
   * Fills the internal buffer and returns the count written. Rules must be
   * priority-sorted; evaluation stops after `maxRulesPerCall` rules.
   */
  suggestInto(rules: readonly AuxiliaryRule[], maxCount: number, gates: SuggestionGates, context: RuleContext): number {
    if (!gates.canProcess || !gates.canWeave || !gates.enabledForJob) {
      return 0;
    }
    const limit = Math.min(maxCount, MAX_SUGGESTION_BUFFER);
    const evaluated = Math.min(rules.length, this.maxRulesPerCall);
    let count = 0;
    for (let i = 0; i < evaluated && count < limit; i += 1) {
      const rule = rules[i];
      try {
        if (!rule.condition(context)) {
          continue;
        }
        const id = typeof rule.actionId === 'number' ? rule.actionId : rule.actionId(context);
        if (id <= 0 || this.contains(id, count)) {
          continue;
        }
        this.buffer[count] = id;
        count += 1;
      } catch (error) {
        this.onFault?.(rule, error);
      }
    }
    return count;
  }

  suggest(rules: readonly AuxiliaryRule[], maxCount: number, gates: SuggestionGates, context: RuleContext): ActionId[] {
    const count = this.suggestInto(rules, maxCount, gates, context);
    return this.buffer.slice(0, count);
  }

  /** Same as `suggest`, but computed at most once per frame and key. */
  suggestForFrame(
    frame: number,
    key: number,
    rules: readonly AuxiliaryRule[],
    maxCount: number,
    gates: SuggestionGates,
    context: RuleContext,
  ): readonly ActionId[] {
    if (this.cachedFrame === frame && this.cachedKey === key) {
      return this.cached;
    }
    this.cached = this.suggest(rules, maxCount, gates, context);
    this.cachedFrame = frame;
    this.cachedKey = key;
    return this.cached;
  }

  invalidate(): void {
    this.cachedFrame = -1;
    this.cachedKey = -1;
    this.cached = [];
  }

  private contains(id: ActionId, count: number): boolean {
    for (let i = 0; i < count; i += 1) {
      if (this.buffer[i] === id) {
        return true;
      }
    }
    return false;
  }
}
