import type { JobConfigurationStoreApi } from '@/config/JobConfigurationStore';
import { createLogger, describeError } from '@/utils/log';
import { AuxiliarySuggestionEngine, sortByPriority, type AuxiliaryRule } from '../rules/AuxiliarySuggestionEngine';
import { buildRuleChain, evaluateChain, type RuleChain, type RuleFaultHandler } from '../rules/RuleChain';
import type { RuleContext } from '../rules/RuleContext';
import { TargetingRuleTable, resolveTargetedAction, type TargetingRule } from '../selection/TargetingRules';
import type { JobProvider } from './JobProvider';
import type { ActionId, JobId } from '@/types';

const log = createLogger('jobs');

interface BuiltRules {
  readonly jobId: JobId;
  readonly version: number;
  readonly level: number;
  readonly byTrigger: ReadonlyMap<ActionId, RuleChain>;
  readonly auxiliary: readonly AuxiliaryRule[];
  readonly auxiliaryEnabled: boolean;
  readonly targeting: TargetingRuleTable;
  readonly targetingEnabled: boolean;
}

const logRuleFault: RuleFaultHandler = (chain, rule, error) => {
  log.debug(`rule '${chain.name}.${rule.label}' skipped: ${describeError(error)}`);
};

function passthroughRules(jobId: JobId, version: number, level: number): BuiltRules {
  return {
    jobId,
    version,
    level,
    byTrigger: new Map(),
    auxiliary: [],
    auxiliaryEnabled: false,
    targeting: new TargetingRuleTable(),
    targetingEnabled: false,
  };
}

/**
 * Explicit table of job providers. The active provider's enabled rules are
 * built once per (job, configuration version, level) and reused until one of
 * those changes.
 */
export class JobProviderRegistry {
  private readonly providers = new Map<JobId, JobProvider>();
  private activeProvider: JobProvider | null = null;
  private built: BuiltRules | null = null;

  constructor(
    private readonly config: JobConfigurationStoreApi,
    private readonly auxiliary: AuxiliarySuggestionEngine,
    private readonly maxSuggestions = 2,
  ) {}

  register(...providers: JobProvider[]): void {
    for (const provider of providers) {
      if (this.providers.has(provider.jobId)) {
        log.warn(`replacing provider for job ${provider.jobId}`);
      }
      this.providers.set(provider.jobId, provider);
    }
  }

  provider(jobId: JobId): JobProvider | undefined {
    return this.providers.get(jobId);
  }

  get registeredJobIds(): JobId[] {
    return Array.from(this.providers.keys());
  }

  get active(): JobProvider | null {
    return this.activeProvider;
  }

  activate(jobId: JobId): JobProvider | null {
    this.activeProvider = this.providers.get(jobId) ?? null;
    this.invalidate();
    if (this.activeProvider) {
      log.debug(`activated provider '${this.activeProvider.name}' for job ${jobId}`);
    } else {
      log.debug(`no provider for job ${jobId}`);
    }
    return this.activeProvider;
  }

  invalidate(): void {
    this.built = null;
    this.auxiliary.invalidate();
  }

  hasDynamicRules(level: number): boolean {
    const built = this.rulesFor(level);
    return built.auxiliaryEnabled && built.auxiliary.length > 0;
  }

  targetingRuleFor(actionId: ActionId, level: number): TargetingRule | undefined {
    const built = this.rulesFor(level);
    return built.targetingEnabled ? built.targeting.get(actionId) : undefined;
  }

  /**
   * Targeting swap first, then the chain claiming the input, then the first
   * auxiliary suggestion when the chain left the input unchanged.
   */
  resolveAction(inputId: ActionId, context: RuleContext): ActionId {
    if (!context.canProcess()) {
      return inputId;
    }
    const built = this.rulesFor(context.snapshot.level);

    if (built.targetingEnabled) {
      const targeting = built.targeting.get(inputId);
      if (targeting) {
        const swapped = resolveTargetedAction(targeting, inputId, context);
        if (swapped !== inputId) {
          return swapped;
        }
      }
    }

    const chain = built.byTrigger.get(inputId);
    if (!chain) {
      return inputId;
    }
    const resolved = evaluateChain(chain, inputId, context, logRuleFault);
    if (resolved !== inputId) {
      return resolved;
    }
    if (context.canWeave()) {
      const suggestions = this.suggestAuxiliary(context, this.maxSuggestions);
      if (suggestions.length > 0) {
        return suggestions[0];
      }
    }
    return resolved;
  }

  suggestAuxiliary(context: RuleContext, maxCount = this.maxSuggestions): readonly ActionId[] {
    const built = this.rulesFor(context.snapshot.level);
    if (built.auxiliary.length === 0) {
      return [];
    }
    const gates = {
      canProcess: context.canProcess(),
      canWeave: context.canWeave(),
      enabledForJob: built.auxiliaryEnabled,
    };
    const key = built.version * 16 + Math.min(maxCount, 15);
    return this.auxiliary.suggestForFrame(context.snapshot.frameStamp, key, built.auxiliary, maxCount, gates, context);
  }

  private rulesFor(level: number): BuiltRules {
    const provider = this.activeProvider;
    const jobId = provider?.jobId ?? 0;
    const version = this.config.getState().version;
    const current = this.built;
    if (current && current.jobId === jobId && current.version === version && current.level === level) {
      return current;
    }
    this.auxiliary.invalidate();
    this.built = provider ? this.build(provider, version, level) : passthroughRules(jobId, version, level);
    return this.built;
  }

  private build(provider: JobProvider, version: number, level: number): BuiltRules {
    try {
      const config = this.config.getState();
      const jobId = provider.jobId;
      const byTrigger = new Map<ActionId, RuleChain>();
      for (const definition of provider.chains) {
        if (!config.isChainEnabled(jobId, definition.name)) {
          continue;
        }
        const chain = buildRuleChain(definition, (label) => config.isChainRuleEnabled(jobId, definition.name, label));
        for (const trigger of chain.triggers) {
          // earlier chains keep their claim
          if (!byTrigger.has(trigger)) {
            byTrigger.set(trigger, chain);
          }
        }
      }

      const auxiliary = sortByPriority(
        (provider.auxiliaryRules ?? []).filter((rule) => config.isAuxiliaryRuleEnabled(jobId, rule.label)),
      );
      const targeting = new TargetingRuleTable(
        (provider.targetingRules ?? []).filter((rule) => config.isTargetingRuleEnabled(jobId, rule.displayName)),
      );
      const settings = config.settingsFor(jobId);

      log.debug(
        `built rules for job ${jobId} at level ${level}: ${byTrigger.size} triggers, ${auxiliary.length} auxiliary, ${targeting.size} targeting`,
      );
      return {
        jobId,
        version,
        level,
        byTrigger,
        auxiliary,
        auxiliaryEnabled: settings.auxiliaryEnabled,
        targeting,
        targetingEnabled: settings.targetingEnabled,
      };
    } catch (error) {
      log.error(`failed to build rules for job ${provider.jobId}: ${describeError(error)}`);
      return passthroughRules(provider.jobId, version, level);
    }
  }
}
