/** Millisecond time source. Injected everywhere so tests can drive time by hand. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => performance.now(),
};

export class ManualClock implements Clock {
  private current: number;

  constructor(startMs = 1_000) {
    this.current = startMs;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}
