export type ActionId = number;
export type EffectId = number;
export type EntityId = number;
export type JobId = number;

/** Reserved "tracked but never observed" marker for effect and cooldown timers. */
export const SENTINEL = -999;

/** Entity id meaning "no recipient". */
export const NO_ENTITY: EntityId = 0;

export type EffectKind = 'actorBuff' | 'targetDebuff' | 'actionCooldown';

export const EFFECT_KINDS: readonly EffectKind[] = ['actorBuff', 'targetDebuff', 'actionCooldown'];

export const StateFlag = {
  InCombat: 1 << 0,
  HasTarget: 1 << 1,
  InRestrictedArea: 1 << 2,
  CanAct: 1 << 3,
  IsMoving: 1 << 4,
} as const;

export const EntityFlag = {
  Alive: 1 << 0,
  InRange: 1 << 1,
  InLineOfSight: 1 << 2,
  Targetable: 1 << 3,
  Self: 1 << 4,
  HardTarget: 1 << 5,
  Tank: 1 << 6,
  Healer: 1 << 7,
  Melee: 1 << 8,
  Ranged: 1 << 9,
  Ally: 1 << 10,
} as const;

export const VALID_ABILITY_TARGET =
  EntityFlag.Alive | EntityFlag.InRange | EntityFlag.InLineOfSight | EntityFlag.Targetable;

export const VALID_RECIPIENT = VALID_ABILITY_TARGET | EntityFlag.Ally;

export interface StateSnapshot {
  readonly jobId: JobId;
  readonly level: number;
  readonly targetId: EntityId;
  readonly zoneId: number;
  readonly flags: number;
  readonly gaugeWord1: number;
  readonly gaugeWord2: number;
  readonly frameStamp: number;
  /** Seconds until the next primary action may be used. */
  readonly timeToNextAction: number;
  readonly resourceCurrent: number;
  readonly resourceMax: number;
  /** Clock time of the last core update, 0 before the first one. */
  readonly updatedAt: number;
}

export interface CoreStateInput {
  jobId: JobId;
  level: number;
  targetId: EntityId;
  zoneId: number;
  inCombat: boolean;
  hasTarget: boolean;
  inRestrictedArea: boolean;
  canAct: boolean;
  isMoving: boolean;
  gaugeWord1?: number;
  gaugeWord2?: number;
}

export type TargetingMode = 'smart' | 'ground' | 'groundSpecial' | 'cleanse';

export type InterceptionMode = 'standard' | 'directInput';
