import { beforeEach, describe, expect, it, vi } from 'vitest';

import {
  createJobConfigurationStore,
  nextConfigVersion,
  type JobConfigurationStoreApi,
} from '@/config/JobConfigurationStore';
import { catalogOf } from '@/logic/jobs/JobProvider';
import { createWhiteMageProvider } from '@/logic/jobs/whiteMage';
import { setLogLevel } from '@/utils/log';

describe('job configuration store', () => {
  let store: JobConfigurationStoreApi;

  beforeEach(() => {
    setLogLevel('silent');
    store = createJobConfigurationStore(0.25);
  });

  it('starts at version 1 with chains off and targeting rules on', () => {
    const state = store.getState();

    expect(state.version).toBe(1);
    expect(state.isChainEnabled(24, 'Single Target')).toBe(false);
    expect(state.isChainRuleEnabled(24, 'Single Target', 'Glare IV under Sacred Sight')).toBe(false);
    expect(state.isAuxiliaryRuleEnabled(24, 'Assize')).toBe(false);
    expect(state.isTargetingRuleEnabled(24, 'Cure')).toBe(true);
    expect(state.settingsFor(24)).toMatchObject({
      auxiliaryEnabled: false,
      targetingEnabled: false,
      companionScanEnabled: true,
      companionOverrideEnabled: false,
      companionOverrideDelta: 0.25,
    });
  });

  it('bumps the version on every change', () => {
    store.getState().setChainEnabled(24, 'Single Target', true);
    store.getState().setTargetingRuleEnabled(24, 'Cure', false);

    const state = store.getState();
    expect(state.version).toBe(3);
    expect(state.isChainEnabled(24, 'Single Target')).toBe(true);
    expect(state.isTargetingRuleEnabled(24, 'Cure')).toBe(false);
    expect(state.isChainEnabled(19, 'Single Target')).toBe(false);
  });

  it('wraps the version back to 1', () => {
    expect(nextConfigVersion(41)).toBe(42);
    expect(nextConfigVersion(0xffffffff)).toBe(1);
  });

  it('enables every named rule a provider exposes', () => {
    const catalog = catalogOf(createWhiteMageProvider());
    store.getState().enableAll(24, catalog);
    const state = store.getState();

    expect(state.settingsFor(24).auxiliaryEnabled).toBe(true);
    expect(state.settingsFor(24).targetingEnabled).toBe(true);
    expect(state.isChainEnabled(24, 'Area of Effect')).toBe(true);
    expect(state.isChainRuleEnabled(24, 'Single Target', 'Apply or refresh damage over time')).toBe(true);
    expect(state.isChainRuleEnabled(24, 'Single Target', 'Single target filler')).toBe(false);
    expect(state.isAuxiliaryRuleEnabled(24, 'Lucid Dreaming')).toBe(true);
  });

  it('clamps the companion override delta', () => {
    store.getState().setCompanionOverride(24, true, 1.5);

    expect(store.getState().settingsFor(24).companionOverrideEnabled).toBe(true);
    expect(store.getState().settingsFor(24).companionOverrideDelta).toBe(1);
  });

  it('forgets a job on reset and everything on clear', () => {
    store.getState().setAuxiliaryEnabled(24, true);
    store.getState().setAuxiliaryEnabled(19, true);

    store.getState().resetJob(24);
    expect(store.getState().settingsFor(24).auxiliaryEnabled).toBe(false);
    expect(store.getState().settingsFor(19).auxiliaryEnabled).toBe(true);

    store.getState().clearAll();
    expect(store.getState().settingsFor(19).auxiliaryEnabled).toBe(false);
    expect(store.getState().version).toBe(5);
  });

  it('notifies subscribers with the new version', () => {
    const listener = vi.fn();
    store.subscribe((state) => listener(state.version));

    store.getState().setCompanionScanEnabled(24, false);

    expect(listener).toHaveBeenCalledWith(2);
  });
});
