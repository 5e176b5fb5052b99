import { systemClock, type Clock } from '@/core/clock';
import { EffectExpiryRegistry, EMPTY_TRACKING, type EffectBatch } from '@/core/EffectExpiryRegistry';
import { EngineLifecycleError } from '@/core/errors';
import { createStateStore, type StateStoreApi, type StateTransition } from '@/core/store';
import { loadEngineConfig, type EngineConfig, type EngineConfigOverrides } from '@/config/engineConfig';
import { createJobConfigurationStore, type JobConfigurationStoreApi } from '@/config/JobConfigurationStore';
import { createLogger, describeError, setLogLevel } from '@/utils/log';
import { EventDispatcher } from './events/EventDispatcher';
import { EngineEvent, type EngineEventPayloads } from './events/EngineEvents';
import type { JobProvider } from './jobs/JobProvider';
import { JobProviderRegistry } from './jobs/JobProviderRegistry';
import { PerformanceController } from './PerformanceController';
import { ActionCache } from './resolution/ActionCache';
import { ActionResolutionCache } from './resolution/ActionResolutionCache';
import { AuxiliarySuggestionEngine } from './rules/AuxiliarySuggestionEngine';
import { StoreRuleContext } from './rules/RuleContext';
import { EntitySelectionCache, type SelectionOptions } from './selection/EntitySelectionCache';
import { selectRecipient } from './selection/TargetingRules';
import {
  NO_ENTITY,
  StateFlag,
  type ActionId,
  type CoreStateInput,
  type EffectKind,
  type EntityId,
  type InterceptionMode,
  type JobId,
} from '@/types';

const log = createLogger('engine');

export interface ResolutionEngineOptions {
  clock?: Clock;
  config?: EngineConfigOverrides;
  providers?: readonly JobProvider[];
  jobConfiguration?: JobConfigurationStoreApi;
}

/**
 * Process-wide state cache and action resolver. The tick driver feeds the
 * update methods once per frame; call sites then resolve as often as they
 * like within that frame.
 */
export class ResolutionEngine {
  readonly config: EngineConfig;
  readonly clock: Clock;
  readonly state: StateStoreApi;
  readonly effects: EffectExpiryRegistry;
  readonly selection: EntitySelectionCache;
  readonly jobConfiguration: JobConfigurationStoreApi;
  readonly registry: JobProviderRegistry;
  readonly performance: PerformanceController;
  readonly events = new EventDispatcher<EngineEventPayloads>();

  private readonly context: StoreRuleContext;
  private readonly resolution: ActionResolutionCache;
  private initialized = false;
  private activeJobId: JobId = -1;
  private mode: InterceptionMode = 'standard';
  private unsubscribeConfiguration: (() => void) | null = null;

  constructor(options: ResolutionEngineOptions = {}) {
    this.config = loadEngineConfig(options.config);
    this.clock = options.clock ?? systemClock;
    this.state = createStateStore(this.clock);
    this.effects = new EffectExpiryRegistry(this.clock);
    this.selection = new EntitySelectionCache(() => this.frameStamp, this.config.companionGraceFrames);
    this.jobConfiguration = options.jobConfiguration ?? createJobConfigurationStore(this.config.companionOverrideDelta);
    this.performance = new PerformanceController(this.config.performance);
    this.context = new StoreRuleContext(this.state, this.effects, this.config);

    const auxiliary = new AuxiliarySuggestionEngine(this.config.maxAuxiliaryRules, (rule, error) => {
      log.debug(`auxiliary rule '${rule.label}' skipped: ${describeError(error)}`);
    });
    this.registry = new JobProviderRegistry(this.jobConfiguration, auxiliary, this.config.maxSuggestions);
    this.registry.register(...(options.providers ?? []));

    const cache = new ActionCache(
      this.clock,
      this.config.cacheTtlMs,
      this.config.cacheSets,
      () => this.jobConfiguration.getState().version,
    );
    this.resolution = new ActionResolutionCache(
      cache,
      {
        resolve: (inputId) => this.registry.resolveAction(inputId, this.context),
        hasDynamicRules: () => this.registry.hasDynamicRules(this.state.getState().snapshot.level),
      },
      () => this.frameStamp,
    );
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  get frameStamp(): number {
    return this.state.getState().snapshot.frameStamp;
  }

  get interceptionMode(): InterceptionMode {
    return this.mode;
  }

  initialize(): void {
    if (this.initialized) {
      throw new EngineLifecycleError('ResolutionEngine is already initialized; dispose it first');
    }
    setLogLevel(this.config.logLevel);
    this.unsubscribeConfiguration = this.jobConfiguration.subscribe((next, previous) => {
      if (next.version !== previous.version) {
        this.onConfigurationChanged(next.version);
      }
    });
    this.initialized = true;
    log.info(`initialized with ${this.registry.registeredJobIds.length} job provider(s)`);
  }

  dispose(): void {
    if (!this.initialized) {
      return;
    }
    this.unsubscribeConfiguration?.();
    this.unsubscribeConfiguration = null;
    this.clearState();
    this.activeJobId = -1;
    this.events.clear();
    this.initialized = false;
    log.info('disposed');
  }

  /** Clears every tier and re-seeds sentinels for the active provider. */
  resetForTesting(): void {
    this.clearState();
    this.mode = 'standard';
    const provider = this.registry.active;
    this.effects.seed(provider?.tracking ?? EMPTY_TRACKING);
  }

  // update boundary

  updateCoreState(input: CoreStateInput): StateTransition[] {
    const transitions = this.state.getState().updateCoreState(input);
    this.selection.setRestrictedArea(input.inRestrictedArea);
    for (const transition of transitions) {
      this.applyTransition(transition);
    }
    // baseline update, or a job switch while uninitialized
    this.ensureActiveJob(input.jobId);
    return transitions;
  }

  updateScalarState(timeToNextAction: number, resourceCurrent: number, resourceMax: number): void {
    this.state.getState().updateScalarState(timeToNextAction, resourceCurrent, resourceMax);
  }

  updateJobGauge(jobId: JobId, word1: number, word2: number): boolean {
    return this.state.getState().updateJobGauge(jobId, word1, word2);
  }

  updateEffects(kind: EffectKind, batch: EffectBatch): void {
    this.effects.update(kind, batch);
  }

  recordActionUsed(actionId: ActionId, cooldownSeconds: number): void {
    this.effects.recordActionUsed(actionId, cooldownSeconds);
  }

  updateEntityCandidates(
    ids: ArrayLike<EntityId>,
    hp: ArrayLike<number>,
    flags: ArrayLike<number>,
    count: number,
  ): boolean {
    return this.selection.updateCandidates(ids, hp, flags, count);
  }

  updateHardTarget(id: EntityId, valid: boolean): void {
    this.selection.updateHardTarget(id, valid);
  }

  /** Skipped while companion scanning is disabled for the job or throttled this frame. */
  updateCompanion(id: EntityId, hp: number, valid: boolean): boolean {
    const settings = this.jobConfiguration.getState().settingsFor(this.state.getState().snapshot.jobId);
    this.selection.setCompanionScanEnabled(settings.companionScanEnabled);
    if (!settings.companionScanEnabled || !this.performance.shouldRunCompanionScan(this.frameStamp)) {
      return false;
    }
    this.selection.updateCompanion(id, hp, valid);
    return true;
  }

  setCleansable(ids: Iterable<EntityId>): void {
    this.selection.setCleansable(ids);
  }

  beginFrame(): void {
    this.performance.startFrame(this.clock.now());
  }

  endFrame(workMs: number): void {
    const inCombat = this.state.getState().hasFlag(StateFlag.InCombat);
    if (this.performance.endFrame(workMs, inCombat)) {
      const level = this.performance.level;
      log.info(`performance level changed to ${level}`);
      this.events.dispatch(EngineEvent.DegradedChanged, { level });
    }
  }

  // resolution boundary

  resolve(inputId: ActionId): ActionId {
    if (!this.initialized || !this.isLikelyValidAction(inputId)) {
      return inputId;
    }
    const store = this.state.getState();
    if (this.performance.isDegraded && !store.hasFlag(StateFlag.InCombat)) {
      return inputId;
    }
    try {
      return this.resolution.resolve(inputId);
    } catch (error) {
      log.error(`resolve(${inputId}) failed, passing input through: ${describeError(error)}`);
      return inputId;
    }
  }

  suggestAuxiliary(maxCount = this.config.maxSuggestions): readonly ActionId[] {
    if (!this.initialized) {
      return [];
    }
    try {
      // never more than fit before the next primary action
      return this.registry.suggestAuxiliary(this.context, Math.min(maxCount, this.context.weaveSlots()));
    } catch (error) {
      log.error(`auxiliary suggestion failed: ${describeError(error)}`);
      return [];
    }
  }

  /** Recipient for a targeted ability, or `NO_ENTITY` when the ability is not managed. */
  resolveTarget(abilityId: ActionId): EntityId {
    if (!this.initialized) {
      return NO_ENTITY;
    }
    const { snapshot } = this.state.getState();
    try {
      const rule = this.registry.targetingRuleFor(abilityId, snapshot.level);
      if (!rule) {
        return NO_ENTITY;
      }
      return selectRecipient(rule, this.selection, snapshot.targetId, this.selectionOptions());
    } catch (error) {
      log.error(`resolveTarget(${abilityId}) failed: ${describeError(error)}`);
      return NO_ENTITY;
    }
  }

  isStale(thresholdMs = this.config.staleThresholdMs): boolean {
    return this.state.getState().isStale(thresholdMs);
  }

  /**
   * Records which interception path the host is using. The mode is host-side
   * state: the engine only drops cached resolutions when it changes.
   */
  setMode(mode: InterceptionMode): void {
    if (mode === this.mode) {
      return;
    }
    const previous = this.mode;
    this.mode = mode;
    this.resolution.clear();
    log.info(`interception mode ${previous} -> ${mode}`);
  }

  clearCache(): void {
    this.resolution.clear();
  }

  describeActiveJob(): string {
    const provider = this.registry.active;
    if (!provider) {
      return 'No job active';
    }
    return provider.describe?.(this.context) ?? provider.name;
  }

  private selectionOptions(): SelectionOptions {
    const settings = this.jobConfiguration.getState().settingsFor(this.state.getState().snapshot.jobId);
    return {
      hpThreshold: this.config.hpThreshold,
      companionOverride: settings.companionOverrideEnabled,
      companionOverrideDelta: settings.companionOverrideDelta,
    };
  }

  private isLikelyValidAction(inputId: ActionId): boolean {
    return Number.isInteger(inputId) && inputId > 0 && inputId <= this.config.maxActionId;
  }

  private ensureActiveJob(jobId: JobId): JobProvider | null {
    if (this.activeJobId === jobId) {
      return this.registry.active;
    }
    this.activeJobId = jobId;
    const provider = this.registry.activate(jobId);
    this.effects.clear();
    this.effects.seed(provider?.tracking ?? EMPTY_TRACKING);
    this.resolution.clearAll();
    return provider;
  }

  private applyTransition(transition: StateTransition): void {
    switch (transition.kind) {
      case 'jobChanged': {
        const provider = this.ensureActiveJob(transition.next);
        log.info(`job ${transition.previous} -> ${transition.next}`);
        this.events.dispatch(EngineEvent.JobChanged, {
          previous: transition.previous,
          next: transition.next,
          providerName: provider?.name ?? null,
        });
        break;
      }
      case 'levelChanged':
        this.registry.invalidate();
        this.resolution.clearAll();
        this.notifyProvider('level change', (provider) => provider.onLevelChanged?.(transition.next));
        this.events.dispatch(EngineEvent.LevelChanged, { previous: transition.previous, next: transition.next });
        break;
      case 'combatChanged':
        this.notifyProvider('combat change', (provider) => provider.onCombatChanged?.(transition.inCombat));
        this.events.dispatch(EngineEvent.CombatChanged, { inCombat: transition.inCombat });
        break;
      case 'restrictedAreaChanged':
        this.notifyProvider('area change', (provider) =>
          provider.onRestrictedAreaChanged?.(transition.inRestrictedArea),
        );
        this.events.dispatch(EngineEvent.RestrictedAreaChanged, { inRestrictedArea: transition.inRestrictedArea });
        break;
      default: {
        const exhaustive: never = transition;
        throw new Error(`Unhandled state transition: ${String(exhaustive)}`);
      }
    }
  }

  private notifyProvider(what: string, notify: (provider: JobProvider) => void): void {
    const provider = this.registry.active;
    if (!provider) {
      return;
    }
    try {
      notify(provider);
    } catch (error) {
      log.warn(`provider '${provider.name}' failed to handle ${what}: ${describeError(error)}`);
    }
  }

  private onConfigurationChanged(version: number): void {
    this.registry.invalidate();
    this.resolution.clearAll();
    this.events.dispatch(EngineEvent.ConfigurationChanged, { version });
  }

  private clearState(): void {
    this.state.getState().reset();
    this.effects.clear();
    this.selection.reset();
    this.resolution.clearAll();
    this.registry.invalidate();
    this.performance.reset();
  }
}
