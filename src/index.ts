import { createWhiteMageProvider } from './logic/jobs/whiteMage';
import type { JobProvider } from './logic/jobs/JobProvider';
import { ResolutionEngine, type ResolutionEngineOptions } from './logic/ResolutionEngine';

export * from './types';
export { ManualClock, systemClock, type Clock } from './core/clock';
export { ConfigurationError, EngineLifecycleError } from './core/errors';
export { EffectExpiryRegistry, EMPTY_TRACKING, type EffectBatch, type TrackingLists } from './core/EffectExpiryRegistry';
export { createStateStore, EMPTY_SNAPSHOT, type StateStore, type StateStoreApi, type StateTransition } from './core/store';
export {
  defaultEngineConfig,
  loadEngineConfig,
  type EngineConfig,
  type EngineConfigOverrides,
  type PerformanceConfig,
} from './config/engineConfig';
export {
  createJobConfigurationStore,
  type JobConfigurationState,
  type JobConfigurationStoreApi,
  type JobSettings,
  type NamedRuleCatalog,
} from './config/JobConfigurationStore';
export { EventDispatcher } from './logic/events/EventDispatcher';
export { EngineEvent, type EngineEventPayloads } from './logic/events/EngineEvents';
export { catalogOf, type JobProvider } from './logic/jobs/JobProvider';
export { JobProviderRegistry } from './logic/jobs/JobProviderRegistry';
export { createWhiteMageProvider, decodeLilyGauge } from './logic/jobs/whiteMage';
export { PerformanceController, type PerformanceLevel } from './logic/PerformanceController';
export { ActionCache } from './logic/resolution/ActionCache';
export { ActionResolutionCache, type ResolutionSource } from './logic/resolution/ActionResolutionCache';
export { AuxiliarySuggestionEngine, computeWeaveSlots, type AuxiliaryRule } from './logic/rules/AuxiliarySuggestionEngine';
export { buildRuleChain, evaluateChain, RuleChain, type PriorityRule, type RuleChainDefinition } from './logic/rules/RuleChain';
export { StoreRuleContext, type RuleContext } from './logic/rules/RuleContext';
export { EntitySelectionCache, MAX_PARTY_SIZE, type SelectionOptions } from './logic/selection/EntitySelectionCache';
export { selectRecipient, TargetingRuleTable, type TargetingRule } from './logic/selection/TargetingRules';
export { TickDriver, type FrameFeed, type FrameSource, type TickResult } from './logic/simulation/TickDriver';
export { setLogLevel, type LogLevel } from './utils/log';
export { ResolutionEngine, type ResolutionEngineOptions };

export function builtInProviders(): JobProvider[] {
  return [createWhiteMageProvider()];
}

/** Engine with the built-in job providers registered; not yet initialized. */
export function createEngine(options: ResolutionEngineOptions = {}): ResolutionEngine {
  return new ResolutionEngine({ ...options, providers: options.providers ?? builtInProviders() });
}

let sharedEngine: ResolutionEngine | null = null;

/** Process-wide engine, created and initialized on first use. */
export function getEngine(): ResolutionEngine {
  if (!sharedEngine) {
    sharedEngine = createEngine();
    sharedEngine.initialize();
  }
  return sharedEngine;
}

export function disposeEngine(): void {
  sharedEngine?.dispose();
  sharedEngine = null;
}
