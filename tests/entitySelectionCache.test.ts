import { beforeEach, describe, expect, it } from 'vitest';

import { EntitySelectionCache, type SelectionOptions } from '@/logic/selection/EntitySelectionCache';
import { EntityFlag, NO_ENTITY, VALID_RECIPIENT } from '@/types';

const ALLY = VALID_RECIPIENT;
const SELF = VALID_RECIPIENT | EntityFlag.Self;
const TANK = VALID_RECIPIENT | EntityFlag.Tank;
const OUT_OF_RANGE = VALID_RECIPIENT & ~EntityFlag.InRange;

const SELF_ID = 100;
const COMPANION_ID = 900;

const options: SelectionOptions = { hpThreshold: 0.99, companionOverride: false, companionOverrideDelta: 0.25 };
const withOverride: SelectionOptions = { ...options, companionOverride: true };

describe('EntitySelectionCache', () => {
  let frame: number;
  let cache: EntitySelectionCache;

  const party = (hp: number[], flags: number[]) => {
    const ids = hp.map((_value, index) => SELF_ID + index * 100);
    return cache.updateCandidates(ids, hp, flags, hp.length);
  };

  beforeEach(() => {
    frame = 1;
    cache = new EntitySelectionCache(() => frame, 3);
  });

  it('resolves nothing before any party feed', () => {
    expect(cache.isReady).toBe(false);
    expect(cache.resolveTarget(options)).toBe(NO_ENTITY);
  });

  it('picks the injured ally over self when the hard target is invalid', () => {
    party([1, 0.4], [SELF, ALLY]);
    cache.updateHardTarget(300, false);

    expect(cache.resolveTarget(options)).toBe(200);
  });

  it('lets a much lower companion override the ally only when enabled', () => {
    party([1, 0.5], [SELF, ALLY]);
    cache.updateCompanion(COMPANION_ID, 0.1, true);

    expect(cache.resolveTarget(withOverride)).toBe(COMPANION_ID);
    expect(cache.resolveTarget(options)).toBe(200);
  });

  it('keeps the ally when the companion is not lower by more than the delta', () => {
    party([1, 0.5], [SELF, ALLY]);
    cache.updateCompanion(COMPANION_ID, 0.3, true);

    expect(cache.resolveTarget(withOverride)).toBe(200);
  });

  it('keeps the ally when the companion is lower by exactly the delta', () => {
    party([1, 0.5], [SELF, ALLY]);
    cache.updateCompanion(COMPANION_ID, 0.25, true);

    expect(cache.resolveTarget(withOverride)).toBe(200);
  });

  it('prefers a valid hard target over everything else', () => {
    party([1, 0.2, 0.9], [SELF, ALLY, ALLY]);
    cache.updateHardTarget(300, true);

    expect(cache.resolveTarget(options)).toBe(300);
  });

  it('rejects a hard target that is a party member failing the recipient flags', () => {
    party([1, 0.2, 0.9], [SELF, ALLY, OUT_OF_RANGE]);
    cache.updateHardTarget(300, true);

    expect(cache.resolveTarget(options)).toBe(200);
  });

  it('accepts a hard target outside the party on the feed flag alone', () => {
    party([1, 0.2], [SELF, ALLY]);
    cache.updateHardTarget(4242, true);

    expect(cache.resolveTarget(options)).toBe(4242);
  });

  it('breaks health ties by the earlier slot and skips invalid recipients', () => {
    party([1, 0.1, 0.6, 0.6], [SELF, OUT_OF_RANGE, ALLY, ALLY]);

    expect(cache.resolveTarget(options)).toBe(300);
  });

  it('falls back to self when nobody needs healing', () => {
    party([1, 1, 1], [SELF, ALLY, TANK]);

    expect(cache.resolveTarget(options)).toBe(SELF_ID);
  });

  it('uses the companion when no ally qualifies', () => {
    party([1, 1], [SELF, ALLY]);
    cache.updateCompanion(COMPANION_ID, 0.7, true);

    expect(cache.resolveTarget(options)).toBe(COMPANION_ID);
  });

  it('drops the companion once it has not been seen within the grace window', () => {
    party([1, 1], [SELF, ALLY]);
    cache.updateCompanion(COMPANION_ID, 0.7, true);

    frame = 4;
    expect(cache.companion).toBe(COMPANION_ID);

    frame = 5;
    expect(cache.companion).toBe(NO_ENTITY);
    expect(cache.resolveTarget(options)).toBe(SELF_ID);
  });

  it('keeps the last valid companion through invalid feeds inside the grace window', () => {
    party([1, 1], [SELF, ALLY]);
    cache.updateCompanion(COMPANION_ID, 0.7, true);

    frame = 2;
    cache.updateCompanion(NO_ENTITY, 0, false);
    expect(cache.companion).toBe(COMPANION_ID);
    expect(cache.resolveTarget(options)).toBe(COMPANION_ID);

    frame = 4;
    cache.updateCompanion(COMPANION_ID, 0.7, false);
    expect(cache.hasValidCompanion()).toBe(true);

    frame = 5;
    expect(cache.hasValidCompanion()).toBe(false);
  });

  it('ignores the companion when scanning is disabled or in a restricted area', () => {
    party([1, 1], [SELF, ALLY]);
    cache.updateCompanion(COMPANION_ID, 0.2, true);

    cache.setCompanionScanEnabled(false);
    expect(cache.hasValidCompanion()).toBe(false);

    cache.setCompanionScanEnabled(true);
    cache.setRestrictedArea(true);
    expect(cache.hasValidCompanion()).toBe(false);

    cache.setRestrictedArea(false);
    expect(cache.hasValidCompanion()).toBe(true);
  });

  it('reports whether a party feed changed anything', () => {
    expect(party([1, 0.5], [SELF, ALLY])).toBe(true);
    expect(cache.changedThisFrame).toBe(true);

    frame = 2;
    expect(party([1, 0.50001], [SELF, ALLY])).toBe(false);
    expect(cache.isFresh).toBe(true);
    expect(cache.changedThisFrame).toBe(false);

    expect(party([1, 0.4], [SELF, ALLY])).toBe(true);
    expect(cache.hpOf(200)).toBe(0.4);
  });

  it('resets the party on an empty feed', () => {
    party([1, 0.5], [SELF, ALLY]);

    expect(cache.updateCandidates([], [], [], 0)).toBe(true);
    expect(cache.isReady).toBe(false);
    expect(cache.selfId).toBe(NO_ENTITY);
  });

  it('clamps health into the unit range and caps the party size', () => {
    const ids = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];
    const hp = [1.5, -1, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5];
    const flags = ids.map(() => ALLY);
    cache.updateCandidates(ids, hp, flags, ids.length);

    expect(cache.partyCount).toBe(8);
    expect(cache.hpOf(1)).toBe(1);
    expect(cache.hpOf(2)).toBe(0);
    expect(cache.hpOf(9)).toBe(1);
  });

  it('treats an unreadable health value as full and as a change', () => {
    party([1, 0.5], [SELF, ALLY]);

    expect(party([1, Number.NaN], [SELF, ALLY])).toBe(true);
    expect(cache.hpOf(200)).toBe(1);
    expect(cache.resolveTarget(options)).toBe(SELF_ID);
  });

  describe('party queries', () => {
    beforeEach(() => {
      party([0.9, 0.3, 0.6, 0.1], [SELF, TANK, ALLY, OUT_OF_RANGE]);
    });

    it('reads flags and roles by id', () => {
      expect(cache.flagsOf(200)).toBe(TANK);
      expect(cache.flagsOf(9_999)).toBe(0);
      expect(cache.isTank(200)).toBe(true);
      expect(cache.isTank(300)).toBe(false);
      expect(cache.isValidRecipient(400)).toBe(false);
    });

    it('compares health against a threshold', () => {
      expect(cache.needsHealing(300, 0.7)).toBe(true);
      expect(cache.needsHealing(300, 0.6)).toBe(false);
      expect(cache.needsHealing(9_999, 0.99)).toBe(false);
    });

    it('finds the lowest valid recipient with self included', () => {
      expect(cache.lowestHpCandidate()).toBe(200);

      party([0.2, 0.3], [SELF, ALLY]);
      expect(cache.lowestHpCandidate()).toBe(SELF_ID);

      cache.resetParty();
      expect(cache.lowestHpCandidate()).toBe(NO_ENTITY);
    });
  });

  describe('cleanse targeting', () => {
    it('picks a cleansable ally for the current frame only', () => {
      party([1, 0.9, 0.8], [SELF, ALLY, ALLY]);
      cache.setCleansable([200]);

      expect(cache.resolveCleanseTarget(options)).toBe(200);

      frame = 2;
      expect(cache.resolveCleanseTarget(options)).toBe(NO_ENTITY);
    });

    it('considers self last', () => {
      party([0.5, 0.9], [SELF, ALLY]);
      cache.setCleansable([SELF_ID]);
      expect(cache.resolveCleanseTarget(options)).toBe(SELF_ID);

      cache.setCleansable([SELF_ID, 200]);
      expect(cache.resolveCleanseTarget(options)).toBe(200);
    });

    it('takes a cleansable hard target first', () => {
      party([1, 0.2, 0.9], [SELF, ALLY, ALLY]);
      cache.updateHardTarget(300, true);
      cache.setCleansable([200, 300]);

      expect(cache.resolveCleanseTarget(options)).toBe(300);
    });
  });

  describe('ground targeting', () => {
    it('uses the current target, then the first tank, then self', () => {
      party([1, 1, 1, 1], [SELF, ALLY, TANK, TANK]);

      expect(cache.resolveGroundTarget(555)).toBe(555);
      expect(cache.resolveGroundTarget(NO_ENTITY)).toBe(300);

      party([1, 1], [SELF, ALLY]);
      expect(cache.resolveGroundTarget(NO_ENTITY)).toBe(SELF_ID);
    });
  });
});
