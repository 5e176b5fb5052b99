import { beforeEach, describe, expect, it, vi } from 'vitest';

import type { EngineConfigOverrides } from '@/config/engineConfig';
import { EngineLifecycleError } from '@/core/errors';
import { EngineEvent } from '@/logic/events/EngineEvents';
import { catalogOf, type JobProvider } from '@/logic/jobs/JobProvider';
import { createWhiteMageProvider } from '@/logic/jobs/whiteMage';
import type { ResolutionEngine } from '@/logic/ResolutionEngine';
import { EntityFlag, NO_ENTITY, SENTINEL, VALID_RECIPIENT } from '@/types';
import { setLogLevel } from '@/utils/log';
import { coreInput, createTestEngine, type TestEngine } from './helpers';

const SELF = VALID_RECIPIENT | EntityFlag.Self;
const ALLY = VALID_RECIPIENT;

interface CountingProvider {
  provider: JobProvider;
  evaluations: () => number;
  onLevelChanged: ReturnType<typeof vi.fn>;
}

/** Job 1: input 10 becomes 11 while the rule is enabled; counts rule evaluations. */
function createCountingProvider(overrides: Partial<JobProvider> = {}): CountingProvider {
  let evaluations = 0;
  const onLevelChanged = vi.fn();
  const provider: JobProvider = {
    jobId: 1,
    name: 'Counter',
    chains: [
      {
        name: 'Main',
        triggers: [10],
        rules: [
          {
            label: 'swap',
            condition: () => {
              evaluations += 1;
              return true;
            },
            resolve: 11,
          },
        ],
      },
    ],
    onLevelChanged,
    ...overrides,
  };
  return { provider, evaluations: () => evaluations, onLevelChanged };
}

function startWith(provider: JobProvider, config: EngineConfigOverrides = {}): TestEngine {
  const setup = createTestEngine([provider], config);
  setup.engine.initialize();
  setup.engine.jobConfiguration.getState().enableAll(provider.jobId, catalogOf(provider));
  return setup;
}

describe('ResolutionEngine', () => {
  beforeEach(() => {
    setLogLevel('silent');
  });

  describe('lifecycle', () => {
    it('passes everything through before initialize', () => {
      const { engine } = createTestEngine([createWhiteMageProvider()]);
      engine.updateCoreState(coreInput({ gaugeWord1: 3 }));

      expect(engine.resolve(25859)).toBe(25859);
      expect(engine.suggestAuxiliary()).toEqual([]);
      expect(engine.resolveTarget(120)).toBe(NO_ENTITY);
    });

    it('refuses a second initialize until disposed', () => {
      const { engine } = createTestEngine([]);
      engine.initialize();

      expect(() => engine.initialize()).toThrow(EngineLifecycleError);

      engine.dispose();
      expect(engine.isInitialized).toBe(false);
      expect(() => engine.initialize()).not.toThrow();
    });

    it('clears every tier and re-seeds tracking on resetForTesting', () => {
      const { engine } = startWith(createWhiteMageProvider());
      engine.updateCoreState(coreInput());
      engine.updateEffects('targetDebuff', [[1871, 10]]);
      engine.setMode('directInput');

      engine.resetForTesting();

      expect(engine.state.getState().initialized).toBe(false);
      expect(engine.effects.remaining('targetDebuff', 1871)).toBe(SENTINEL);
      expect(engine.interceptionMode).toBe('standard');
      expect(engine.isStale()).toBe(true);
    });

    it('re-seeds tracking for the same job after dispose and initialize', () => {
      const { engine } = startWith(createWhiteMageProvider());
      engine.updateCoreState(coreInput());
      engine.updateEffects('targetDebuff', [[1871, 10]]);

      engine.dispose();
      engine.initialize();
      engine.updateCoreState(coreInput());

      expect(engine.effects.isTracked('targetDebuff', 1871)).toBe(true);
      expect(engine.effects.remaining('targetDebuff', 1871)).toBe(SENTINEL);
      expect(engine.describeActiveJob()).toBe('White Mage | lilies 0/3 (0ms) | blood 0/3');
    });

    it('drops listeners on dispose', () => {
      const { engine } = startWith(createWhiteMageProvider());
      engine.events.on(EngineEvent.LevelChanged, vi.fn());

      engine.dispose();

      expect(engine.events.listenerCount(EngineEvent.LevelChanged)).toBe(0);
    });
  });

  describe('resolve', () => {
    it('passes invalid ids through', () => {
      const { engine } = startWith(createWhiteMageProvider());
      engine.updateCoreState(coreInput({ gaugeWord1: 3 }));

      expect(engine.resolve(0)).toBe(0);
      expect(engine.resolve(-1)).toBe(-1);
      expect(engine.resolve(100_001)).toBe(100_001);
      expect(engine.resolve(1.5)).toBe(1.5);
    });

    it('resolves through the active job rules', () => {
      const { engine } = startWith(createWhiteMageProvider());
      engine.updateCoreState(coreInput({ gaugeWord1: 3 }));

      expect(engine.resolve(25859)).toBe(16534);
    });

    it('is deterministic for the same snapshot with the cache cleared', () => {
      const { engine } = startWith(createWhiteMageProvider());
      engine.updateCoreState(coreInput());

      const first = engine.resolve(16533);
      engine.clearCache();
      engine.updateCoreState(coreInput());
      const second = engine.resolve(16533);

      expect(first).toBe(16532);
      expect(second).toBe(first);
    });

    it('serves repeat resolves from the cache until the mode changes', () => {
      const { provider, evaluations } = createCountingProvider();
      const { engine } = startWith(provider);
      engine.updateCoreState(coreInput({ jobId: 1 }));

      expect(engine.resolve(10)).toBe(11);
      expect(engine.resolve(10)).toBe(11);
      expect(evaluations()).toBe(1);

      engine.setMode('directInput');
      expect(engine.interceptionMode).toBe('directInput');
      expect(engine.resolve(10)).toBe(11);
      expect(evaluations()).toBe(2);
    });

    it('expires cached resolutions after the time-to-live', () => {
      const { provider, evaluations } = createCountingProvider();
      const { engine, clock } = startWith(provider);
      engine.updateCoreState(coreInput({ jobId: 1 }));

      engine.resolve(10);
      clock.advance(100);
      engine.resolve(10);

      expect(evaluations()).toBe(2);
    });

    it('applies configuration changes at once and reports them', () => {
      const { provider } = createCountingProvider();
      const { engine } = startWith(provider);
      const listener = vi.fn();
      engine.events.on(EngineEvent.ConfigurationChanged, listener);
      engine.updateCoreState(coreInput({ jobId: 1 }));
      expect(engine.resolve(10)).toBe(11);

      engine.jobConfiguration.getState().setChainRuleEnabled(1, 'Main', 'swap', false);

      expect(listener).toHaveBeenCalledWith({ version: 3 });
      expect(engine.resolve(10)).toBe(10);
    });

    it('passes through while degraded out of combat', () => {
      const { provider, evaluations } = createCountingProvider();
      const { engine, clock } = startWith(provider, { performance: { autoThrottle: true } });
      const degraded = vi.fn();
      engine.events.on(EngineEvent.DegradedChanged, degraded);
      engine.updateCoreState(coreInput({ jobId: 1, inCombat: false }));

      engine.beginFrame();
      clock.advance(16);
      engine.beginFrame();
      engine.endFrame(8);

      expect(degraded).toHaveBeenCalledWith({ level: 2 });
      expect(engine.performance.isDegraded).toBe(true);
      expect(engine.resolve(10)).toBe(10);
      expect(evaluations()).toBe(0);

      engine.updateCoreState(coreInput({ jobId: 1 }));
      expect(engine.resolve(10)).toBe(11);
    });
  });

  describe('state transitions', () => {
    it('seeds tracking for the job and reports job changes', () => {
      const { engine } = startWith(createWhiteMageProvider());
      const listener = vi.fn();
      engine.events.on(EngineEvent.JobChanged, listener);

      expect(engine.updateCoreState(coreInput())).toEqual([]);
      expect(engine.effects.remaining('targetDebuff', 1871)).toBe(SENTINEL);
      expect(listener).not.toHaveBeenCalled();

      engine.updateCoreState(coreInput({ jobId: 19 }));
      expect(listener).toHaveBeenLastCalledWith({ previous: 24, next: 19, providerName: null });
      expect(engine.effects.isTracked('targetDebuff', 1871)).toBe(false);
      expect(engine.describeActiveJob()).toBe('No job active');

      engine.updateCoreState(coreInput());
      expect(listener).toHaveBeenLastCalledWith({ previous: 19, next: 24, providerName: 'White Mage' });
      expect(engine.describeActiveJob()).toBe('White Mage | lilies 0/3 (0ms) | blood 0/3');
    });

    it('notifies the provider and listeners of level changes', () => {
      const { provider, onLevelChanged } = createCountingProvider();
      const { engine } = startWith(provider);
      const listener = vi.fn();
      engine.events.on(EngineEvent.LevelChanged, listener);
      engine.updateCoreState(coreInput({ jobId: 1 }));

      engine.updateCoreState(coreInput({ jobId: 1, level: 91 }));

      expect(onLevelChanged).toHaveBeenCalledWith(91);
      expect(listener).toHaveBeenCalledWith({ previous: 90, next: 91 });
    });

    it('keeps going when a provider hook throws', () => {
      const { provider } = createCountingProvider({
        onCombatChanged: () => {
          throw new Error('hook failed');
        },
      });
      const { engine } = startWith(provider);
      const listener = vi.fn();
      engine.events.on(EngineEvent.CombatChanged, listener);
      engine.updateCoreState(coreInput({ jobId: 1 }));

      expect(() => engine.updateCoreState(coreInput({ jobId: 1, inCombat: false }))).not.toThrow();
      expect(listener).toHaveBeenCalledWith({ inCombat: false });
    });

    it('is stale once updates stop arriving', () => {
      const { engine, clock } = startWith(createWhiteMageProvider());
      expect(engine.isStale()).toBe(true);

      engine.updateCoreState(coreInput());
      expect(engine.isStale()).toBe(false);

      clock.advance(101);
      expect(engine.isStale()).toBe(true);
    });
  });

  describe('auxiliary suggestions', () => {
    it('suggests ready auxiliary actions', () => {
      const { engine } = startWith(createWhiteMageProvider());
      engine.updateCoreState(coreInput());
      engine.updateScalarState(0, 5_000, 10_000);
      engine.recordActionUsed(3571, 0);

      expect(engine.suggestAuxiliary()).toEqual([3571]);
    });
  });

  describe('resolveTarget', () => {
    let engine: ResolutionEngine;

    beforeEach(() => {
      ({ engine } = startWith(createWhiteMageProvider()));
      engine.updateCoreState(coreInput());
      engine.updateEntityCandidates([100, 200], [1, 0.4], [SELF, ALLY], 2);
    });

    it('picks the recipient by the ability targeting mode', () => {
      expect(engine.resolveTarget(120)).toBe(200);
      expect(engine.resolveTarget(3569)).toBe(100);
      expect(engine.resolveTarget(9_999)).toBe(NO_ENTITY);
    });

    it('returns no recipient with targeting disabled for the job', () => {
      engine.jobConfiguration.getState().setTargetingEnabled(24, false);

      expect(engine.resolveTarget(120)).toBe(NO_ENTITY);
    });

    it('applies the job companion override settings', () => {
      engine.jobConfiguration.getState().setCompanionOverride(24, true, 0.25);

      expect(engine.updateCompanion(900, 0.1, true)).toBe(true);
      expect(engine.resolveTarget(120)).toBe(900);
    });

    it('skips companion updates while scanning is disabled for the job', () => {
      engine.jobConfiguration.getState().setCompanionOverride(24, true, 0.25);
      engine.jobConfiguration.getState().setCompanionScanEnabled(24, false);

      expect(engine.updateCompanion(900, 0.1, true)).toBe(false);
      expect(engine.resolveTarget(120)).toBe(200);
    });
  });
});
