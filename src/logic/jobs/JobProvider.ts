import type { TrackingLists } from '@/core/EffectExpiryRegistry';
import type { NamedRuleCatalog } from '@/config/JobConfigurationStore';
import type { AuxiliaryRule } from '../rules/AuxiliarySuggestionEngine';
import type { RuleChainDefinition } from '../rules/RuleChain';
import type { RuleContext } from '../rules/RuleContext';
import type { TargetingRule } from '../selection/TargetingRules';
import type { JobId } from '@/types';

/**
 * Rule content for one job. Providers are registered explicitly at startup;
 * every hook is optional.
 */
export interface JobProvider {
  readonly jobId: JobId;
  readonly name: string;
  readonly chains: readonly RuleChainDefinition[];
  readonly auxiliaryRules?: readonly AuxiliaryRule[];
  readonly targetingRules?: readonly TargetingRule[];
  readonly tracking?: TrackingLists;
  onLevelChanged?(level: number): void;
  onCombatChanged?(inCombat: boolean): void;
  onRestrictedAreaChanged?(inRestrictedArea: boolean): void;
  describe?(context: RuleContext): string;
}

export function catalogOf(provider: JobProvider): NamedRuleCatalog {
  return {
    chains: provider.chains.map((chain) => ({
      name: chain.name,
      ruleLabels: chain.rules.filter((rule) => !rule.fallback).map((rule) => rule.label),
    })),
    auxiliaryRules: (provider.auxiliaryRules ?? []).map((rule) => rule.label),
    targetingRules: (provider.targetingRules ?? []).map((rule) => rule.displayName),
  };
}
