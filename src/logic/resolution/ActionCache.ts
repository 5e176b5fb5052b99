import type { Clock } from '@/core/clock';
import type { ActionId } from '@/types';

const WAYS = 2;

/**
 * 2-way set-associative cache of resolved ids with a time-to-live. Way 0 of a
 * set always holds its most recently used entry. Entries are stamped with the
 * configuration version current at insert; a stale stamp is a miss.
 */
export class ActionCache {
  private readonly keys: Uint32Array;
  private readonly values: Uint32Array;
  private readonly storedAt: Float64Array;
  private readonly versions: Uint32Array;
  private readonly occupied: Uint8Array;
  private readonly mask: number;

  constructor(
    private readonly clock: Clock,
    private readonly ttlMs = 100,
    sets = 32,
    private readonly currentVersion: () => number = () => 0,
  ) {
    if (sets <= 0 || (sets & (sets - 1)) !== 0) {
      throw new RangeError(`ActionCache set count must be a power of two, got ${sets}`);
    }
    const slots = sets * WAYS;
    this.keys = new Uint32Array(slots);
    this.values = new Uint32Array(slots);
    this.storedAt = new Float64Array(slots);
    this.versions = new Uint32Array(slots);
    this.occupied = new Uint8Array(slots);
    this.mask = sets - 1;
  }

  get capacity(): number {
    return this.keys.length;
  }

  get size(): number {
    let n = 0;
    for (let i = 0; i < this.occupied.length; i += 1) {
      n += this.occupied[i];
    }
    return n;
  }

  setIndexOf(key: ActionId): number {
    const h = (key ^ (key >>> 16)) >>> 0;
    return h & this.mask;
  }

  get(key: ActionId): ActionId | undefined {
    const base = this.setIndexOf(key) * WAYS;
    const now = this.clock.now();
    const version = this.currentVersion();

    for (let way = 0; way < WAYS; way += 1) {
      const slot = base + way;
      if (this.occupied[slot] === 0 || this.keys[slot] !== key) {
        continue;
      }
      if (now - this.storedAt[slot] >= this.ttlMs || this.versions[slot] !== version) {
        this.occupied[slot] = 0;
        return undefined;
      }
      const value = this.values[slot];
      if (way !== 0) {
        this.swap(base, base + way);
      }
      return value;
    }
    return undefined;
  }

  set(key: ActionId, value: ActionId): void {
    const base = this.setIndexOf(key) * WAYS;
    const victim = this.pickSlot(base, key);

    this.keys[victim] = key;
    this.values[victim] = value;
    this.storedAt[victim] = this.clock.now();
    this.versions[victim] = this.currentVersion();
    this.occupied[victim] = 1;

    if (victim !== base) {
      this.swap(base, victim);
    }
  }

  clear(): void {
    this.occupied.fill(0);
    this.keys.fill(0);
    this.values.fill(0);
    this.storedAt.fill(0);
    this.versions.fill(0);
  }

  /** Existing entry for the key, else a free way, else the way stored longest ago. */
  private pickSlot(base: number, key: ActionId): number {
    for (let way = 0; way < WAYS; way += 1) {
      const slot = base + way;
      if (this.occupied[slot] === 1 && this.keys[slot] === key) {
        return slot;
      }
    }
    for (let way = 0; way < WAYS; way += 1) {
      if (this.occupied[base + way] === 0) {
        return base + way;
      }
    }
    return this.storedAt[base] <= this.storedAt[base + 1] ? base : base + 1;
  }

  private swap(a: number, b: number): void {
    const key = this.keys[a];
    const value = this.values[a];
    const storedAt = this.storedAt[a];
    const version = this.versions[a];
    const occupied = this.occupied[a];

    this.keys[a] = this.keys[b];
    this.values[a] = this.values[b];
    this.storedAt[a] = this.storedAt[b];
    this.versions[a] = this.versions[b];
    this.occupied[a] = this.occupied[b];

    this.keys[b] = key;
    this.values[b] = value;
    this.storedAt[b] = storedAt;
    this.versions[b] = version;
    this.occupied[b] = occupied;
  }
}
