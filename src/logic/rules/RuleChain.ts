import type { RuleContext } from './RuleContext';
import type { ActionId } from '@/types';

export type RulePredicate = (context: RuleContext) => boolean;
export type RuleResolver = (context: RuleContext, inputId: ActionId) => ActionId;

export interface PriorityRule {
  /** Name shown to configuration; also the enable/disable key. */
  readonly label: string;
  readonly condition: RulePredicate;
  readonly resolve: RuleResolver | ActionId;
  /** Always part of the chain, regardless of configuration. */
  readonly fallback?: boolean;
}

export interface RuleChainDefinition {
  readonly name: string;
  readonly triggers: readonly ActionId[];
  readonly rules: readonly PriorityRule[];
}

export type RuleFaultHandler = (chain: RuleChain, rule: PriorityRule, error: unknown) => void;

export const PASSTHROUGH_RULE: PriorityRule = {
  label: 'passthrough',
  condition: () => true,
  resolve: (_context, inputId) => inputId,
  fallback: true,
};

export class RuleChain {
  readonly name: string;
  readonly triggers: ReadonlySet<ActionId>;
  readonly rules: readonly PriorityRule[];

  constructor(name: string, triggers: Iterable<ActionId>, rules: readonly PriorityRule[]) {
    this.name = name;
    this.triggers = new Set(triggers);
    this.rules = [...rules, PASSTHROUGH_RULE];
  }

  claims(inputId: ActionId): boolean {
    return this.triggers.has(inputId);
  }

  /** Rules a user may toggle: everything except fallbacks. */
  configurableRules(): PriorityRule[] {
    return this.rules.filter((rule) => !rule.fallback);
  }
}

/**
 * Builds a chain from its definition, keeping fallback rules and the
 * configurable rules `isEnabled` accepts.
 */
export function buildRuleChain(
  definition: RuleChainDefinition,
  isEnabled: (label: string) => boolean = () => true,
): RuleChain {
  const rules = definition.rules.filter((rule) => rule.fallback === true || isEnabled(rule.label));
  return new RuleChain(definition.name, definition.triggers, rules);
}

/**
 * First matching rule wins. A rule that throws, or resolves to 0, is treated
 * as not matching; the terminal passthrough returns the input unchanged.
 */
export function evaluateChain(
  chain: RuleChain,
  inputId: ActionId,
  context: RuleContext,
  onFault?: RuleFaultHandler,
): ActionId {
  for (const rule of chain.rules) {
    try {
      if (!rule.condition(context)) {
        continue;
      }
      const resolved = typeof rule.resolve === 'number' ? rule.resolve : rule.resolve(context, inputId);
      if (resolved > 0) {
        return resolved;
      }
    } catch (error) {
      onFault?.(chain, rule, error);
    }
  }
  return inputId;
}
