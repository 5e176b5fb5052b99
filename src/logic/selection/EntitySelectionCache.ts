import {
  EntityFlag,
  NO_ENTITY,
  VALID_RECIPIENT,
  type EntityId,
} from '@/types';

export const MAX_PARTY_SIZE = 8;

const HP_EPSILON = 1e-4;

export interface SelectionOptions {
  readonly hpThreshold: number;
  readonly companionOverride: boolean;
  readonly companionOverrideDelta: number;
}

/** Clamps to [0, 1]; an unreadable (NaN) value counts as full health. */
function normalizeHp(hp: number): number {
  if (Number.isNaN(hp)) {
    return 1;
  }
  return Math.min(1, Math.max(0, hp));
}

interface Pick {
  id: EntityId;
  hp: number;
}

/**
 * Fixed-capacity candidate table refreshed once per frame from the party,
 * companion and hard-target feeds. Slots past `count` are never read.
 */
export class EntitySelectionCache {
  private readonly ids = new Float64Array(MAX_PARTY_SIZE);
  private readonly hp = new Float64Array(MAX_PARTY_SIZE);
  private readonly flags = new Uint16Array(MAX_PARTY_SIZE);
  private count = 0;
  private selfIndex = -1;
  private feedFrame = -1;
  private changed = false;

  private hardTargetId: EntityId = NO_ENTITY;
  private hardTargetValid = false;

  private companionId: EntityId = NO_ENTITY;
  private companionHp = 1;
  private companionSeenFrame = -1;
  private companionScanEnabled = true;
  private inRestrictedArea = false;

  private readonly cleansable = new Set<EntityId>();
  private cleansableFrame = -1;

  constructor(
    private readonly currentFrame: () => number,
    private readonly companionGraceFrames = 3,
  ) {}

  get partyCount(): number {
    return this.count;
  }

  get isReady(): boolean {
    return this.count > 0;
  }

  /** True when the last party feed belongs to the current frame. */
  get isFresh(): boolean {
    return this.feedFrame === this.currentFrame();
  }

  get changedThisFrame(): boolean {
    return this.isFresh && this.changed;
  }

  get selfId(): EntityId {
    return this.selfIndex >= 0 ? this.ids[this.selfIndex] : NO_ENTITY;
  }

  /** Copies a party feed into the fixed slots. Returns false when nothing changed. */
  updateCandidates(
    ids: ArrayLike<EntityId>,
    hp: ArrayLike<number>,
    flags: ArrayLike<number>,
    count: number,
  ): boolean {
    const frame = this.currentFrame();
    const n = Math.max(0, Math.min(count, MAX_PARTY_SIZE, ids.length, hp.length, flags.length));

    if (n === 0) {
      const hadParty = this.count > 0;
      this.resetParty();
      this.feedFrame = frame;
      this.changed = hadParty;
      return hadParty;
    }

    if (this.matches(ids, hp, flags, n)) {
      this.feedFrame = frame;
      this.changed = false;
      return false;
    }

    this.selfIndex = -1;
    for (let i = 0; i < n; i += 1) {
      this.ids[i] = ids[i];
      this.hp[i] = normalizeHp(hp[i]);
      this.flags[i] = flags[i];
      if (this.selfIndex < 0 && (flags[i] & EntityFlag.Self) !== 0) {
        this.selfIndex = i;
      }
    }
    this.count = n;
    this.feedFrame = frame;
    this.changed = true;
    return true;
  }

  updateHardTarget(id: EntityId, valid: boolean): void {
    this.hardTargetId = id;
    this.hardTargetValid = valid && id !== NO_ENTITY;
  }

  updateCompanion(id: EntityId, hp: number, valid: boolean): void {
    if (!valid || id === NO_ENTITY) {
      return;
    }
    this.companionId = id;
    this.companionHp = normalizeHp(hp);
    this.companionSeenFrame = this.currentFrame();
  }

  setCompanionScanEnabled(enabled: boolean): void {
    this.companionScanEnabled = enabled;
  }

  setRestrictedArea(inRestrictedArea: boolean): void {
    this.inRestrictedArea = inRestrictedArea;
  }

  setCleansable(ids: Iterable<EntityId>): void {
    this.cleansable.clear();
    for (const id of ids) {
      this.cleansable.add(id);
    }
    this.cleansableFrame = this.currentFrame();
  }

  isCleansable(id: EntityId): boolean {
    return this.cleansableFrame === this.currentFrame() && this.cleansable.has(id);
  }

  hasValidCompanion(): boolean {
    if (!this.companionScanEnabled || this.inRestrictedArea) {
      return false;
    }
    if (this.companionId === NO_ENTITY || this.companionHp <= 0 || this.companionSeenFrame < 0) {
      return false;
    }
    return this.currentFrame() - this.companionSeenFrame <= this.companionGraceFrames;
  }

  get companion(): EntityId {
    return this.hasValidCompanion() ? this.companionId : NO_ENTITY;
  }

  hpOf(id: EntityId): number {
    const index = this.indexOf(id);
    if (index >= 0) {
      return this.hp[index];
    }
    if (id !== NO_ENTITY && id === this.companionId) {
      return this.companionHp;
    }
    return 1;
  }

  flagsOf(id: EntityId): number {
    const index = this.indexOf(id);
    return index >= 0 ? this.flags[index] : 0;
  }

  isValidRecipient(id: EntityId): boolean {
    const index = this.indexOf(id);
    return index >= 0 && (this.flags[index] & VALID_RECIPIENT) === VALID_RECIPIENT;
  }

  isTank(id: EntityId): boolean {
    return (this.flagsOf(id) & EntityFlag.Tank) !== 0;
  }

  needsHealing(id: EntityId, threshold: number): boolean {
    return this.hpOf(id) < threshold;
  }

  /** Lowest health among valid recipients, self included. */
  lowestHpCandidate(): EntityId {
    let best = NO_ENTITY;
    let bestHp = Number.POSITIVE_INFINITY;
    for (let i = 0; i < this.count; i += 1) {
      if ((this.flags[i] & VALID_RECIPIENT) !== VALID_RECIPIENT) continue;
      if (this.hp[i] < bestHp) {
        best = this.ids[i];
        bestHp = this.hp[i];
      }
    }
    return best;
  }

  validHardTarget(): EntityId {
    if (!this.hardTargetValid) {
      return NO_ENTITY;
    }
    // party members must also pass the recipient flags; outsiders rely on the feed's flag
    if (this.indexOf(this.hardTargetId) >= 0 && !this.isValidRecipient(this.hardTargetId)) {
      return NO_ENTITY;
    }
    return this.hardTargetId;
  }

  resolveTarget(options: SelectionOptions): EntityId {
    if (!this.isReady) {
      return NO_ENTITY;
    }

    const hard = this.validHardTarget();
    if (hard !== NO_ENTITY) {
      return hard;
    }

    const ally = this.bestAlly((index) => this.hp[index] < options.hpThreshold);
    const companion = this.bestCompanion((hp) => hp < options.hpThreshold);
    if (ally) {
      if (companion && options.companionOverride && companion.hp + options.companionOverrideDelta < ally.hp) {
        return companion.id;
      }
      return ally.id;
    }
    if (companion) {
      return companion.id;
    }

    // terminal fallback: self regardless of health
    return this.selfId;
  }

  resolveCleanseTarget(options: SelectionOptions): EntityId {
    if (!this.isReady) {
      return NO_ENTITY;
    }

    const hard = this.validHardTarget();
    if (hard !== NO_ENTITY && this.isCleansable(hard)) {
      return hard;
    }

    const ally = this.bestAlly((index) => this.isCleansable(this.ids[index]));
    const companion = this.bestCompanion((_hp, id) => this.isCleansable(id));
    if (ally) {
      if (companion && options.companionOverride && companion.hp + options.companionOverrideDelta < ally.hp) {
        return companion.id;
      }
      return ally.id;
    }
    if (companion) {
      return companion.id;
    }

    const self = this.selfId;
    if (self !== NO_ENTITY && this.isValidRecipient(self) && this.isCleansable(self)) {
      return self;
    }
    return NO_ENTITY;
  }

  /** Whose location a ground-placed effect should use. */
  resolveGroundTarget(currentTargetId: EntityId): EntityId {
    if (currentTargetId !== NO_ENTITY) {
      return currentTargetId;
    }
    for (let i = 0; i < this.count; i += 1) {
      const flags = this.flags[i];
      if ((flags & EntityFlag.Tank) !== 0 && (flags & VALID_RECIPIENT) === VALID_RECIPIENT) {
        return this.ids[i];
      }
    }
    return this.selfId;
  }

  resetParty(): void {
    this.ids.fill(0);
    this.hp.fill(0);
    this.flags.fill(0);
    this.count = 0;
    this.selfIndex = -1;
  }

  reset(): void {
    this.resetParty();
    this.feedFrame = -1;
    this.changed = false;
    this.hardTargetId = NO_ENTITY;
    this.hardTargetValid = false;
    this.companionId = NO_ENTITY;
    this.companionHp = 1;
    this.companionSeenFrame = -1;
    this.companionScanEnabled = true;
    this.inRestrictedArea = false;
    this.cleansable.clear();
    this.cleansableFrame = -1;
  }

  private indexOf(id: EntityId): number {
    if (id === NO_ENTITY) {
      return -1;
    }
    for (let i = 0; i < this.count; i += 1) {
      if (this.ids[i] === id) {
        return i;
      }
    }
    return -1;
  }

  /** Single scan, self excluded; the lowest health wins and ties keep the earlier slot. */
  private bestAlly(accept: (index: number) => boolean): Pick | null {
    let best: Pick | null = null;
    for (let i = 0; i < this.count; i += 1) {
      if (i === this.selfIndex) continue;
      if ((this.flags[i] & VALID_RECIPIENT) !== VALID_RECIPIENT) continue;
      if (!accept(i)) continue;
      if (best === null || this.hp[i] < best.hp) {
        best = { id: this.ids[i], hp: this.hp[i] };
      }
    }
    return best;
  }

  private bestCompanion(accept: (hp: number, id: EntityId) => boolean): Pick | null {
    if (!this.hasValidCompanion()) {
      return null;
    }
    if (!accept(this.companionHp, this.companionId)) {
      return null;
    }
    return { id: this.companionId, hp: this.companionHp };
  }

  private matches(ids: ArrayLike<EntityId>, hp: ArrayLike<number>, flags: ArrayLike<number>, n: number): boolean {
    if (n !== this.count) {
      return false;
    }
    for (let i = 0; i < n; i += 1) {
      if (this.ids[i] !== ids[i] || this.flags[i] !== flags[i]) {
        return false;
      }
      if (Math.abs(this.hp[i] - normalizeHp(hp[i])) > HP_EPSILON) {
        return false;
      }
    }
    return true;
  }
}
