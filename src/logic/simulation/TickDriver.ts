import type { EffectBatch } from '@/core/EffectExpiryRegistry';
import type { StateTransition } from '@/core/store';
import { createLogger, describeError } from '@/utils/log';
import type { ResolutionEngine } from '../ResolutionEngine';
import { EFFECT_KINDS, type CoreStateInput, type EffectKind, type EntityId } from '@/types';

const log = createLogger('tick');

/** Everything the host observed this frame. Only `core` is required. */
export interface FrameFeed {
  readonly core: CoreStateInput;
  readonly scalar?: {
    readonly timeToNextAction: number;
    readonly resourceCurrent: number;
    readonly resourceMax: number;
  };
  readonly gauge?: { readonly word1: number; readonly word2: number };
  readonly effects?: Partial<Record<EffectKind, EffectBatch>>;
  readonly party?: {
    readonly ids: ArrayLike<EntityId>;
    readonly hp: ArrayLike<number>;
    readonly flags: ArrayLike<number>;
    readonly count: number;
  };
  readonly hardTarget?: { readonly id: EntityId; readonly valid: boolean };
  readonly companion?: { readonly id: EntityId; readonly hp: number; readonly valid: boolean };
  readonly cleansable?: Iterable<EntityId>;
}

/** Returns the frame to apply, or null when the host has nothing this tick. */
export type FrameSource = (tick: number) => FrameFeed | null;

export interface TickResult {
  readonly tick: number;
  readonly applied: boolean;
  readonly transitions: readonly StateTransition[];
  readonly workMs: number;
}

export interface TickDriverConfig {
  readonly source: FrameSource;
  readonly intervalMs?: number;
  readonly onTick?: (result: TickResult) => void;
}

/**
 * Fixed-interval loop that pulls one frame from the host and pushes it through
 * the engine's update boundary, then reports the time spent.
 */
export class TickDriver {
  private timer: ReturnType<typeof setInterval> | null = null;
  private tickCount = 0;
  private readonly intervalMs: number;
  private readonly source: FrameSource;
  private readonly onTick: (result: TickResult) => void;

  constructor(
    private readonly engine: ResolutionEngine,
    config: TickDriverConfig,
  ) {
    this.intervalMs = config.intervalMs ?? 16;
    this.source = config.source;
    this.onTick = config.onTick ?? (() => undefined);
  }

  get ticks(): number {
    return this.tickCount;
  }

  start(): void {
    if (this.timer !== null) {
      return;
    }
    this.timer = setInterval(() => this.tick(), this.intervalMs);
  }

  stop(): void {
    if (this.timer === null) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  manualTick(): TickResult {
    return this.tick();
  }

  private tick(): TickResult {
    const { engine } = this;
    const tick = this.tickCount;
    engine.beginFrame();
    const startedAt = engine.clock.now();

    let transitions: readonly StateTransition[] = [];
    let applied = false;
    try {
      const feed = this.source(tick);
      if (feed) {
        transitions = this.apply(feed);
        applied = true;
      }
    } catch (error) {
      log.error(`frame ${tick} not applied: ${describeError(error)}`);
    }

    const workMs = Math.max(0, engine.clock.now() - startedAt);
    engine.endFrame(workMs);
    this.tickCount += 1;

    const result: TickResult = { tick, applied, transitions, workMs };
    try {
      this.onTick(result);
    } catch (error) {
      log.warn(`tick listener threw: ${describeError(error)}`);
    }
    return result;
  }

  private apply(feed: FrameFeed): StateTransition[] {
    const { engine } = this;
    const transitions = engine.updateCoreState(feed.core);

    if (feed.scalar) {
      engine.updateScalarState(feed.scalar.timeToNextAction, feed.scalar.resourceCurrent, feed.scalar.resourceMax);
    }
    if (feed.gauge) {
      engine.updateJobGauge(feed.core.jobId, feed.gauge.word1, feed.gauge.word2);
    }
    if (feed.effects) {
      for (const kind of EFFECT_KINDS) {
        const batch = feed.effects[kind];
        if (batch) {
          engine.updateEffects(kind, batch);
        }
      }
    }
    if (feed.party) {
      engine.updateEntityCandidates(feed.party.ids, feed.party.hp, feed.party.flags, feed.party.count);
    }
    if (feed.hardTarget) {
      engine.updateHardTarget(feed.hardTarget.id, feed.hardTarget.valid);
    }
    if (feed.companion) {
      engine.updateCompanion(feed.companion.id, feed.companion.hp, feed.companion.valid);
    }
    if (feed.cleansable) {
      engine.setCleansable(feed.cleansable);
    }
    return transitions;
  }
}
