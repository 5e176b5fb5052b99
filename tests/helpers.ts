import { ManualClock } from '@/core/clock';
import { EMPTY_SNAPSHOT } from '@/core/store';
import type { EngineConfigOverrides } from '@/config/engineConfig';
import type { JobProvider } from '@/logic/jobs/JobProvider';
import { ResolutionEngine } from '@/logic/ResolutionEngine';
import type { RuleContext } from '@/logic/rules/RuleContext';
import type { CoreStateInput, StateSnapshot } from '@/types';

export function coreInput(overrides: Partial<CoreStateInput> = {}): CoreStateInput {
  return {
    jobId: 24,
    level: 90,
    targetId: 0,
    zoneId: 1,
    inCombat: true,
    hasTarget: false,
    inRestrictedArea: false,
    canAct: true,
    isMoving: false,
    ...overrides,
  };
}

export interface StubContextOptions {
  snapshot?: Partial<StateSnapshot>;
  buffs?: Record<number, number>;
  debuffs?: Record<number, number>;
  readyActions?: readonly number[];
  canProcess?: boolean;
  canWeave?: boolean;
  moving?: boolean;
  weaveSlots?: number;
  resourceLow?: boolean;
}

/** Rule context over fixed values, for exercising rules without the stores. */
export function stubContext(options: StubContextOptions = {}): RuleContext {
  const snapshot: StateSnapshot = { ...EMPTY_SNAPSHOT, frameStamp: 1, ...options.snapshot };
  const buffs = options.buffs ?? {};
  const debuffs = options.debuffs ?? {};
  const ready = new Set(options.readyActions ?? []);
  const canProcess = options.canProcess ?? true;
  return {
    snapshot,
    canProcess: () => canProcess,
    canWeave: () => options.canWeave ?? true,
    weaveSlots: () => options.weaveSlots ?? 2,
    isMoving: () => options.moving ?? false,
    isResourceLow: () => options.resourceLow ?? false,
    hasBuff: (id) => (buffs[id] ?? 0) > 0,
    buffRemaining: (id) => buffs[id] ?? 0,
    debuffRemaining: (id) => debuffs[id] ?? 0,
    isActionReady: (id) => ready.has(id),
    isAuxiliaryReady: (id) => canProcess && ready.has(id),
  };
}

export interface TestEngine {
  engine: ResolutionEngine;
  clock: ManualClock;
}

export function createTestEngine(
  providers: readonly JobProvider[],
  config: EngineConfigOverrides = {},
): TestEngine {
  const clock = new ManualClock();
  const engine = new ResolutionEngine({ clock, providers, config: { logLevel: 'silent', ...config } });
  return { engine, clock };
}
