import { createStore, type StoreApi } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';
import type { Clock } from './clock';
import { StateFlag, type CoreStateInput, type JobId, type StateSnapshot } from '@/types';

/** Side effects implied by a core update. The caller applies them. */
export type StateTransition =
  | { kind: 'jobChanged'; previous: JobId; next: JobId }
  | { kind: 'levelChanged'; previous: number; next: number }
  | { kind: 'combatChanged'; inCombat: boolean }
  | { kind: 'restrictedAreaChanged'; inRestrictedArea: boolean };

export interface StateStore {
  snapshot: StateSnapshot;
  /** False until the first core update after creation or reset. */
  initialized: boolean;
  updateCoreState: (input: CoreStateInput) => StateTransition[];
  updateScalarState: (timeToNextAction: number, resourceCurrent: number, resourceMax: number) => void;
  updateJobGauge: (jobId: JobId, word1: number, word2: number) => boolean;
  reset: () => void;
  hasFlag: (flag: number) => boolean;
  canProcess: () => boolean;
  canWeave: (slots: number, budgetSeconds: number) => boolean;
  resourceFraction: () => number;
  isResourceLow: (fraction: number) => boolean;
  hasResourceFor: (cost: number) => boolean;
  isStale: (thresholdMs: number) => boolean;
}

export type StateStoreApi = StoreApi<StateStore>;

export const EMPTY_SNAPSHOT: StateSnapshot = {
  jobId: 0,
  level: 0,
  targetId: 0,
  zoneId: 0,
  flags: 0,
  gaugeWord1: 0,
  gaugeWord2: 0,
  frameStamp: 0,
  timeToNextAction: 0,
  resourceCurrent: 0,
  resourceMax: 0,
  updatedAt: 0,
};

function packFlags(input: CoreStateInput): number {
  let flags = 0;
  if (input.inCombat) flags |= StateFlag.InCombat;
  if (input.hasTarget) flags |= StateFlag.HasTarget;
  if (input.inRestrictedArea) flags |= StateFlag.InRestrictedArea;
  if (input.canAct) flags |= StateFlag.CanAct;
  if (input.isMoving) flags |= StateFlag.IsMoving;
  return flags;
}

function diffTransitions(previous: StateSnapshot, next: StateSnapshot): StateTransition[] {
  const transitions: StateTransition[] = [];
  if (previous.jobId !== next.jobId) {
    transitions.push({ kind: 'jobChanged', previous: previous.jobId, next: next.jobId });
  }
  if (previous.level !== next.level) {
    transitions.push({ kind: 'levelChanged', previous: previous.level, next: next.level });
  }
  const wasInCombat = (previous.flags & StateFlag.InCombat) !== 0;
  const inCombat = (next.flags & StateFlag.InCombat) !== 0;
  if (wasInCombat !== inCombat) {
    transitions.push({ kind: 'combatChanged', inCombat });
  }
  const wasRestricted = (previous.flags & StateFlag.InRestrictedArea) !== 0;
  const inRestrictedArea = (next.flags & StateFlag.InRestrictedArea) !== 0;
  if (wasRestricted !== inRestrictedArea) {
    transitions.push({ kind: 'restrictedAreaChanged', inRestrictedArea });
  }
  return transitions;
}

/**
 * Single-writer snapshot store. Every write replaces `snapshot` wholesale, so a
 * reader holding a snapshot never sees a partial update.
 */
export function createStateStore(clock: Clock): StateStoreApi {
  return createStore<StateStore>()(
    immer((set, get) => ({
      snapshot: EMPTY_SNAPSHOT,
      initialized: false,

      updateCoreState: (input) => {
        const { snapshot: previous, initialized } = get();
        const next: StateSnapshot = {
          ...previous,
          jobId: input.jobId,
          level: input.level,
          targetId: input.targetId,
          zoneId: input.zoneId,
          flags: packFlags(input),
          gaugeWord1: input.gaugeWord1 ?? 0,
          gaugeWord2: input.gaugeWord2 ?? 0,
          frameStamp: (previous.frameStamp + 1) >>> 0,
          updatedAt: clock.now(),
        };
        set((s) => {
          s.snapshot = next;
          s.initialized = true;
        });
        // the first update after creation or reset is the baseline
        return initialized ? diffTransitions(previous, next) : [];
      },

      updateScalarState: (timeToNextAction, resourceCurrent, resourceMax) =>
        set((s) => {
          s.snapshot.timeToNextAction = Math.max(0, timeToNextAction);
          s.snapshot.resourceCurrent = resourceCurrent;
          s.snapshot.resourceMax = resourceMax;
        }),

      updateJobGauge: (jobId, word1, word2) => {
        const current = get().snapshot;
        if (current.jobId !== jobId) {
          return false;
        }
        if (current.gaugeWord1 === word1 && current.gaugeWord2 === word2) {
          return false;
        }
        set((s) => {
          s.snapshot.gaugeWord1 = word1;
          s.snapshot.gaugeWord2 = word2;
        });
        return true;
      },

      reset: () =>
        set((s) => {
          s.snapshot = EMPTY_SNAPSHOT;
          s.initialized = false;
        }),

      hasFlag: (flag) => (get().snapshot.flags & flag) === flag,

      canProcess: () => get().hasFlag(StateFlag.InCombat | StateFlag.CanAct),

      canWeave: (slots, budgetSeconds) => {
        const remaining = get().snapshot.timeToNextAction;
        if (remaining <= 0) {
          return true;
        }
        return remaining >= budgetSeconds * slots;
      },

      resourceFraction: () => {
        const { resourceCurrent, resourceMax } = get().snapshot;
        return resourceMax > 0 ? resourceCurrent / resourceMax : 0;
      },

      isResourceLow: (fraction) => get().resourceFraction() < fraction,

      hasResourceFor: (cost) => get().snapshot.resourceCurrent >= cost,

      isStale: (thresholdMs) => {
        const { updatedAt } = get().snapshot;
        return updatedAt === 0 || clock.now() - updatedAt > thresholdMs;
      },
    })),
  );
}
