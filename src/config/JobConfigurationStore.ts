import { createStore, type StoreApi } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';
import { createLogger } from '@/utils/log';
import type { JobId } from '@/types';

const log = createLogger('config');

const MAX_VERSION = 0xffffffff;

export interface JobSettings {
  auxiliaryEnabled: boolean;
  targetingEnabled: boolean;
  chains: Record<string, boolean>;
  /** Keyed `chain.rule`. */
  chainRules: Record<string, boolean>;
  auxiliaryRules: Record<string, boolean>;
  targetingRules: Record<string, boolean>;
  companionScanEnabled: boolean;
  companionOverrideEnabled: boolean;
  companionOverrideDelta: number;
}

/** Names a provider exposes to configuration. */
export interface NamedRuleCatalog {
  readonly chains: ReadonlyArray<{ readonly name: string; readonly ruleLabels: readonly string[] }>;
  readonly auxiliaryRules: readonly string[];
  readonly targetingRules: readonly string[];
}

export interface JobConfigurationState {
  jobs: Record<JobId, JobSettings>;
  /** Bumped by every change; wraps to 1, so 0 never names a built state. */
  version: number;
  settingsFor: (jobId: JobId) => JobSettings;
  isChainEnabled: (jobId: JobId, chain: string) => boolean;
  isChainRuleEnabled: (jobId: JobId, chain: string, rule: string) => boolean;
  isAuxiliaryRuleEnabled: (jobId: JobId, rule: string) => boolean;
  isTargetingRuleEnabled: (jobId: JobId, rule: string) => boolean;
  setAuxiliaryEnabled: (jobId: JobId, enabled: boolean) => void;
  setTargetingEnabled: (jobId: JobId, enabled: boolean) => void;
  setChainEnabled: (jobId: JobId, chain: string, enabled: boolean) => void;
  setChainRuleEnabled: (jobId: JobId, chain: string, rule: string, enabled: boolean) => void;
  setAuxiliaryRuleEnabled: (jobId: JobId, rule: string, enabled: boolean) => void;
  setTargetingRuleEnabled: (jobId: JobId, rule: string, enabled: boolean) => void;
  setCompanionScanEnabled: (jobId: JobId, enabled: boolean) => void;
  setCompanionOverride: (jobId: JobId, enabled: boolean, delta?: number) => void;
  enableAll: (jobId: JobId, catalog: NamedRuleCatalog) => void;
  resetJob: (jobId: JobId) => void;
  clearAll: () => void;
}

export type JobConfigurationStoreApi = StoreApi<JobConfigurationState>;

export function nextConfigVersion(version: number): number {
  return version >= MAX_VERSION ? 1 : version + 1;
}

export function chainRuleKey(chain: string, rule: string): string {
  return `${chain}.${rule}`;
}

export function createJobConfigurationStore(defaultOverrideDelta = 0.25): JobConfigurationStoreApi {
  const defaults = (): JobSettings => ({
    auxiliaryEnabled: false,
    targetingEnabled: false,
    chains: {},
    chainRules: {},
    auxiliaryRules: {},
    targetingRules: {},
    companionScanEnabled: true,
    companionOverrideEnabled: false,
    companionOverrideDelta: defaultOverrideDelta,
  });

  return createStore<JobConfigurationState>()(
    immer((set, get) => {
      const change = (jobId: JobId, describe: string, apply: (settings: JobSettings) => void) => {
        set((s) => {
          const settings = s.jobs[jobId] ?? defaults();
          apply(settings);
          s.jobs[jobId] = settings;
          s.version = nextConfigVersion(s.version);
        });
        log.info(`job ${jobId}: ${describe} (version ${get().version})`);
      };

      return {
        jobs: {},
        version: 1,

        settingsFor: (jobId) => get().jobs[jobId] ?? defaults(),

        // chains and their rules are opt-in; targeting rules are opt-out
        isChainEnabled: (jobId, chain) => get().settingsFor(jobId).chains[chain] === true,
        isChainRuleEnabled: (jobId, chain, rule) =>
          get().settingsFor(jobId).chainRules[chainRuleKey(chain, rule)] === true,
        isAuxiliaryRuleEnabled: (jobId, rule) => get().settingsFor(jobId).auxiliaryRules[rule] === true,
        isTargetingRuleEnabled: (jobId, rule) => get().settingsFor(jobId).targetingRules[rule] !== false,

        setAuxiliaryEnabled: (jobId, enabled) =>
          change(jobId, `auxiliary suggestions ${enabled ? 'enabled' : 'disabled'}`, (settings) => {
            settings.auxiliaryEnabled = enabled;
          }),
        setTargetingEnabled: (jobId, enabled) =>
          change(jobId, `targeting ${enabled ? 'enabled' : 'disabled'}`, (settings) => {
            settings.targetingEnabled = enabled;
          }),
        setChainEnabled: (jobId, chain, enabled) =>
          change(jobId, `chain '${chain}' ${enabled ? 'enabled' : 'disabled'}`, (settings) => {
            settings.chains[chain] = enabled;
          }),
        setChainRuleEnabled: (jobId, chain, rule, enabled) =>
          change(jobId, `rule '${chainRuleKey(chain, rule)}' ${enabled ? 'enabled' : 'disabled'}`, (settings) => {
            settings.chainRules[chainRuleKey(chain, rule)] = enabled;
          }),
        setAuxiliaryRuleEnabled: (jobId, rule, enabled) =>
          change(jobId, `auxiliary rule '${rule}' ${enabled ? 'enabled' : 'disabled'}`, (settings) => {
            settings.auxiliaryRules[rule] = enabled;
          }),
        setTargetingRuleEnabled: (jobId, rule, enabled) =>
          change(jobId, `targeting rule '${rule}' ${enabled ? 'enabled' : 'disabled'}`, (settings) => {
            settings.targetingRules[rule] = enabled;
          }),
        setCompanionScanEnabled: (jobId, enabled) =>
          change(jobId, `companion scan ${enabled ? 'enabled' : 'disabled'}`, (settings) => {
            settings.companionScanEnabled = enabled;
          }),
        setCompanionOverride: (jobId, enabled, delta) =>
          change(jobId, `companion override ${enabled ? 'enabled' : 'disabled'}`, (settings) => {
            settings.companionOverrideEnabled = enabled;
            if (delta !== undefined) {
              settings.companionOverrideDelta = Math.min(1, Math.max(0, delta));
            }
          }),

        enableAll: (jobId, catalog) =>
          change(jobId, 'all named rules enabled', (settings) => {
            settings.auxiliaryEnabled = true;
            settings.targetingEnabled = true;
            for (const chain of catalog.chains) {
              settings.chains[chain.name] = true;
              for (const label of chain.ruleLabels) {
                settings.chainRules[chainRuleKey(chain.name, label)] = true;
              }
            }
            for (const rule of catalog.auxiliaryRules) {
              settings.auxiliaryRules[rule] = true;
            }
            for (const rule of catalog.targetingRules) {
              settings.targetingRules[rule] = true;
            }
          }),

        resetJob: (jobId) => {
          set((s) => {
            delete s.jobs[jobId];
            s.version = nextConfigVersion(s.version);
          });
          log.info(`job ${jobId}: reset to defaults`);
        },

        clearAll: () => {
          set((s) => {
            s.jobs = {};
            s.version = nextConfigVersion(s.version);
          });
          log.info('cleared all job configurations');
        },
      };
    }),
  );
}
