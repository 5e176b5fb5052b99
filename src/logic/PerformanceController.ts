import type { PerformanceConfig } from '@/config/engineConfig';

export type PerformanceLevel = 0 | 1 | 2;

/**
 * Tracks the share of each frame spent in engine work and steps down through
 * throttle levels when it grows too large.
 */
export class PerformanceController {
  private lastFrameAt = 0;
  private emaFrameMs = 0;
  private emaWorkMs = 0;
  private currentLevel: PerformanceLevel = 0;
  private inCombat = false;
  private lastCompanionScanFrame = 0;
  private autoThrottle: boolean;

  constructor(private readonly config: PerformanceConfig) {
    this.autoThrottle = config.autoThrottle;
  }

  get averageFrameMs(): number {
    return this.emaFrameMs;
  }

  get averageWorkMs(): number {
    return this.emaWorkMs;
  }

  get level(): PerformanceLevel {
    return this.autoThrottle ? this.currentLevel : 0;
  }

  get isThrottling(): boolean {
    return this.level >= 1;
  }

  get isDegraded(): boolean {
    return this.level >= 2;
  }

  get autoThrottleEnabled(): boolean {
    return this.autoThrottle;
  }

  setAutoThrottle(enabled: boolean): void {
    this.autoThrottle = enabled;
  }

  /** Marks a frame boundary at `nowMs`; the gap since the previous one feeds the frame average. */
  startFrame(nowMs: number): void {
    if (this.lastFrameAt !== 0) {
      this.emaFrameMs = this.smooth(this.emaFrameMs, nowMs - this.lastFrameAt);
    }
    this.lastFrameAt = nowMs;
  }

  /** Returns true when the effective level changed. */
  endFrame(workMs: number, inCombat: boolean): boolean {
    const before = this.level;
    this.inCombat = inCombat;
    this.emaWorkMs = this.smooth(this.emaWorkMs, workMs);
    this.currentLevel = this.computeLevel();
    return this.level !== before;
  }

  shouldRunCompanionScan(frame: number): boolean {
    const level = this.level;
    if (level === 0) {
      return true;
    }
    if (!this.inCombat) {
      return false;
    }
    if (level === 1) {
      return true;
    }
    if (frame - this.lastCompanionScanFrame >= this.config.companionScanInterval) {
      this.lastCompanionScanFrame = frame;
      return true;
    }
    return false;
  }

  reset(): void {
    this.lastFrameAt = 0;
    this.emaFrameMs = 0;
    this.emaWorkMs = 0;
    this.currentLevel = 0;
    this.inCombat = false;
    this.lastCompanionScanFrame = 0;
    this.autoThrottle = this.config.autoThrottle;
  }

  private smooth(average: number, sample: number): number {
    const { alpha } = this.config;
    return average <= 0 ? sample : (1 - alpha) * average + alpha * sample;
  }

  private computeLevel(): PerformanceLevel {
    if (this.emaFrameMs <= 0) {
      return 0;
    }
    const ratio = this.emaWorkMs / this.emaFrameMs;
    const thresholds = this.inCombat ? this.config.inCombat : this.config.outOfCombat;
    const hitch = this.emaFrameMs > this.config.hitchFrameMs && this.emaWorkMs > this.config.hitchWorkMs;
    if (ratio >= thresholds.severe || (hitch && ratio >= thresholds.moderate)) {
      return 2;
    }
    return ratio >= thresholds.moderate ? 1 : 0;
  }
}
