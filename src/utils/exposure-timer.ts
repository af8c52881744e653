import { normalizeUVIndex, timeToBurn } from './burn-time.js';
import { formatDuration } from './time.js';

export type TimerState = 'notStarted' | 'running' | 'paused' | 'sunscreenApplied' | 'exceeded';

export interface SunscreenStatus {
  readonly appliedAt: number;
  readonly reapplyAt: number;
  readonly active: boolean;
}

export type TimerEvent =
  | { type: 'stateChanged'; from: TimerState; to: TimerState }
  | { type: 'uvChanged'; previousUV: number; uvIndex: number; remainingSeconds: number; message: string }
  | { type: 'exceeded'; uvIndex: number; timeToBurnSeconds: number; totalExposureSeconds: number }
  | { type: 'sunscreenExpired'; appliedAt: number; reapplyAt: number };

export interface ExposureTimerOptions {
  clock?: () => number;
  sunscreenReapplyIntervalSeconds?: number;
  tickIntervalMs?: number;
  advisoryDurationMs?: number;
  onEvent?: (event: TimerEvent) => void;
}

export const DEFAULT_SUNSCREEN_REAPPLY_SECONDS = 2 * 60 * 60;
const DEFAULT_TICK_INTERVAL_MS = 1000;
const DEFAULT_ADVISORY_DURATION_MS = 5000;

/**
 * Exposure accounting for one session. All time comes from the injected
 * clock, so a late or skipped tick only delays detection, never the totals.
 *
 * While running, `totalExposureSeconds + elapsedSeconds` only grows; the
 * running segment is flushed into the total whenever the state leaves
 * `running`.
 */
export class ExposureTimer {
  private readonly clock: () => number;
  private readonly reapplyIntervalMs: number;
  private readonly tickIntervalMs: number;
  private readonly advisoryDurationMs: number;
  private readonly onEvent: ((event: TimerEvent) => void) | null;

  private currentState: TimerState = 'notStarted';
  private uvIndex = 0;
  private budgetSeconds = timeToBurn(0);
  private totalSeconds = 0;
  private segmentStartedAt: number | null = null;
  private sunscreen: SunscreenStatus | null = null;
  private advisory: { message: string; expiresAt: number } | null = null;
  private ticker: NodeJS.Timeout | null = null;
  private disposed = false;

  constructor({
    clock = () => Date.now(),
    sunscreenReapplyIntervalSeconds = DEFAULT_SUNSCREEN_REAPPLY_SECONDS,
    tickIntervalMs = DEFAULT_TICK_INTERVAL_MS,
    advisoryDurationMs = DEFAULT_ADVISORY_DURATION_MS,
    onEvent,
  }: ExposureTimerOptions = {}) {
    this.clock = clock;
    this.reapplyIntervalMs = Math.max(1, sunscreenReapplyIntervalSeconds) * 1000;
    this.tickIntervalMs = tickIntervalMs;
    this.advisoryDurationMs = advisoryDurationMs;
    this.onEvent = onEvent ?? null;
  }

  get state(): TimerState {
    return this.currentState;
  }

  get currentUVIndex(): number {
    return this.uvIndex;
  }

  get timeToBurnSeconds(): number {
    return this.budgetSeconds;
  }

  get elapsedSeconds(): number {
    if (this.segmentStartedAt === null) return 0;
    return Math.max(0, (this.clock() - this.segmentStartedAt) / 1000);
  }

  get totalExposureSeconds(): number {
    return this.totalSeconds;
  }

  get consumedSeconds(): number {
    return this.totalSeconds + this.elapsedSeconds;
  }

  get remainingSeconds(): number {
    return Math.max(0, this.budgetSeconds - this.consumedSeconds);
  }

  get exposureProgress(): number {
    if (!Number.isFinite(this.budgetSeconds) || this.budgetSeconds <= 0) return 0;
    return Math.min(1, this.consumedSeconds / this.budgetSeconds);
  }

  get sunscreenStatus(): SunscreenStatus | null {
    return this.sunscreen;
  }

  get sunscreenRemainingSeconds(): number {
    if (!this.sunscreen) return 0;
    return Math.max(0, (this.sunscreen.reapplyAt - this.clock()) / 1000);
  }

  get advisoryMessage(): string | null {
    if (!this.advisory || this.clock() >= this.advisory.expiresAt) return null;
    return this.advisory.message;
  }

  get isTicking(): boolean {
    return this.ticker !== null;
  }

  start(): void {
    if (this.disposed || this.currentState !== 'notStarted' || this.uvIndex <= 0) return;
    this.segmentStartedAt = this.clock();
    this.setState('running');
    this.syncTicker();
  }

  pause(): void {
    if (this.currentState !== 'running') return;
    const now = this.clock();
    this.flushSegment(now);
    this.setState('paused');
    this.checkExceeded(now);
    this.syncTicker();
  }

  resume(): void {
    if (this.disposed || this.currentState !== 'paused' || this.uvIndex <= 0) return;
    this.segmentStartedAt = this.clock();
    this.setState('running');
    this.syncTicker();
  }

  reset(): void {
    this.totalSeconds = 0;
    this.segmentStartedAt = null;
    this.sunscreen = null;
    this.advisory = null;
    this.setState('notStarted');
    this.syncTicker();
  }

  applySunscreen(): void {
    if (this.disposed) return;
    const now = this.clock();
    this.sunscreen = { appliedAt: now, reapplyAt: now + this.reapplyIntervalMs, active: true };
    if (this.currentState === 'running') {
      this.flushSegment(now);
      this.setState('sunscreenApplied');
      this.checkExceeded(now);
    }
    this.syncTicker();
  }

  cancelSunscreenTimer(): void {
    this.sunscreen = null;
    if (this.currentState === 'sunscreenApplied') {
      this.setState('paused');
    }
    this.syncTicker();
  }

  updateUVIndex(value: number): void {
    const now = this.clock();
    const previousUV = this.uvIndex;
    const nextUV = normalizeUVIndex(value);

    if (nextUV === 0) {
      if (this.currentState === 'running') {
        this.flushSegment(now);
        this.setState('paused');
      }
      this.uvIndex = 0;
      this.budgetSeconds = timeToBurn(0);
      this.setState('notStarted');
      this.syncTicker();
      return;
    }

    if (this.currentState === 'running' && this.segmentStartedAt !== null && previousUV > 0 && previousUV !== nextUV) {
      const previousBudget = timeToBurn(previousUV);
      const nextBudget = timeToBurn(nextUV);
      const elapsedAtPreviousUV = Math.max(0, (now - this.segmentStartedAt) / 1000);
      // Carry the fraction of budget consumed, not raw seconds.
      this.totalSeconds += (elapsedAtPreviousUV / previousBudget) * nextBudget;
      this.segmentStartedAt = now;
      this.uvIndex = nextUV;
      this.budgetSeconds = nextBudget;

      const remainingSeconds = Math.max(0, nextBudget - this.totalSeconds);
      const direction = nextUV > previousUV ? 'increased' : 'decreased';
      const message = `UV ${direction} to ${nextUV} - Time remaining: ${formatDuration(remainingSeconds)}`;
      this.advisory = { message, expiresAt: now + this.advisoryDurationMs };
      this.emit({ type: 'uvChanged', previousUV, uvIndex: nextUV, remainingSeconds, message });
    } else {
      this.uvIndex = nextUV;
      this.budgetSeconds = timeToBurn(nextUV);
    }

    this.checkExceeded(now);
    this.syncTicker();
  }

  tick(): void {
    const now = this.clock();
    if (this.advisory && now >= this.advisory.expiresAt) {
      this.advisory = null;
    }
    this.checkSunscreen(now);
    this.checkExceeded(now);
    this.syncTicker();
  }

  // Flushes the running segment and drops any sunscreen countdown before the tick stops.
  dispose(): void {
    if (this.currentState === 'running') {
      this.flushSegment(this.clock());
      this.setState('paused');
    }
    this.sunscreen = null;
    if (this.currentState === 'sunscreenApplied') {
      this.setState('paused');
    }
    this.disposed = true;
    this.syncTicker();
  }

  private flushSegment(now: number): void {
    if (this.segmentStartedAt === null) return;
    this.totalSeconds += Math.max(0, (now - this.segmentStartedAt) / 1000);
    this.segmentStartedAt = null;
  }

  private checkSunscreen(now: number): void {
    if (!this.sunscreen || now < this.sunscreen.reapplyAt) return;
    const { appliedAt, reapplyAt } = this.sunscreen;
    this.sunscreen = null;
    if (this.currentState === 'sunscreenApplied') {
      this.setState('paused');
    }
    this.emit({ type: 'sunscreenExpired', appliedAt, reapplyAt });
  }

  private checkExceeded(now: number): void {
    if (this.currentState === 'exceeded' || this.uvIndex <= 0) return;
    const liveSeconds = this.segmentStartedAt === null ? 0 : Math.max(0, (now - this.segmentStartedAt) / 1000);
    if (this.totalSeconds + liveSeconds < this.budgetSeconds) return;
    this.flushSegment(now);
    this.setState('exceeded');
    this.emit({
      type: 'exceeded',
      uvIndex: this.uvIndex,
      timeToBurnSeconds: this.budgetSeconds,
      totalExposureSeconds: this.totalSeconds,
    });
  }

  private setState(next: TimerState): void {
    const previous = this.currentState;
    if (previous === next) return;
    this.currentState = next;
    this.emit({ type: 'stateChanged', from: previous, to: next });
  }

  private syncTicker(): void {
    const needsTick = !this.disposed && (this.currentState === 'running' || this.sunscreen !== null);
    if (needsTick && !this.ticker) {
      this.ticker = setInterval(() => this.tick(), this.tickIntervalMs);
      this.ticker.unref();
    } else if (!needsTick && this.ticker) {
      clearInterval(this.ticker);
      this.ticker = null;
    }
  }

  private emit(event: TimerEvent): void {
    if (!this.onEvent) return;
    try {
      this.onEvent(event);
    } catch (error) {
      console.error('[exposure-timer] event listener failed:', error);
    }
  }
}
