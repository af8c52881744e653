import crypto from 'node:crypto';
import { normalizeEnvironment, type EnvironmentalModel } from './environment.js';
import { ExposureTimer, type TimerEvent } from './exposure-timer.js';
import { NotificationPolicy, type SessionSummary, type SmartNotification } from './notification-policy.js';
import {
  NotificationHistory,
  toDispatchRequest,
  type DispatchRequest,
  type NotificationDispatcher,
} from './notification-dispatch.js';
import { assessRisk, type RiskAssessment } from './risk.js';
import type { EngineSettings } from './settings.js';
import { buildSnapshot, type ExposureSnapshot, type SnapshotStore } from './snapshot.js';
import { parseIsoTimeToMs } from './time.js';

/** Serialises async work: each task starts after the previous one settles. */
export class SessionQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // The caller sees the failure through `result`; the chain itself keeps going.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}

export interface UVReading {
  uvIndex: number;
  environment?: unknown;
}

export type ReevaluationProvider = () => UVReading | null | Promise<UVReading | null>;

export interface ObservationResult {
  accepted: boolean;
  snapshot: ExposureSnapshot;
  assessment: RiskAssessment | null;
  notifications: SmartNotification[];
}

export interface StopResult {
  summary: SessionSummary;
  snapshot: ExposureSnapshot;
  notification: SmartNotification | null;
}

export interface ExposureSessionOptions {
  id?: string;
  settings: EngineSettings;
  dispatcher: NotificationDispatcher;
  history?: NotificationHistory;
  snapshotStore?: SnapshotStore | null;
  environment?: unknown;
  reevaluationProvider?: ReevaluationProvider;
  clock?: () => number;
  random?: () => number;
  createId?: () => string;
  tickIntervalMs?: number;
  debug?: boolean;
}

export type ObservationTime = Date | number | string | null | undefined;

/**
 * One user's exposure tracking: a timer, a notification policy and the last
 * known conditions. Every mutation runs through the session queue; the timer
 * tick runs on the event loop between them.
 */
export class ExposureSession {
  readonly id: string;
  private readonly timer: ExposureTimer;
  private readonly policy: NotificationPolicy;
  private readonly dispatcher: NotificationDispatcher;
  private readonly history: NotificationHistory;
  private readonly snapshotStore: SnapshotStore | null;
  private readonly reevaluationProvider: ReevaluationProvider;
  private readonly clock: () => number;
  private readonly debug: boolean;
  private readonly queue = new SessionQueue();
  private readonly pendingDeliveries = new Set<Promise<void>>();

  private environment: EnvironmentalModel;
  private latestAssessment: RiskAssessment | null = null;
  private lastObservationAt: number | null = null;
  private peakUVIndex = 0;
  private stopped = false;
  private reevaluationTimer: NodeJS.Timeout | null = null;
  private inFlightReevaluation: Promise<ObservationResult | null> | null = null;

  constructor({
    id,
    settings,
    dispatcher,
    history = new NotificationHistory(),
    snapshotStore = null,
    environment,
    reevaluationProvider,
    clock = () => Date.now(),
    random,
    createId = () => crypto.randomUUID(),
    tickIntervalMs,
    debug = false,
  }: ExposureSessionOptions) {
    this.id = id ?? createId();
    this.clock = clock;
    this.dispatcher = dispatcher;
    this.history = history;
    this.snapshotStore = snapshotStore;
    this.debug = debug;
    this.environment = normalizeEnvironment(environment, new Date(clock()));
    this.reevaluationProvider = reevaluationProvider ?? (() => this.lastKnownReading());
    this.policy = new NotificationPolicy({ settings, random, clock, createId });
    this.timer = new ExposureTimer({
      clock,
      tickIntervalMs,
      sunscreenReapplyIntervalSeconds: settings.sunscreenReapplyIntervalSeconds,
      onEvent: (event) => this.handleTimerEvent(event),
    });

    if (settings.reevaluationIntervalMs > 0) {
      this.reevaluationTimer = setInterval(() => {
        this.reevaluate().catch((error: unknown) => {
          console.error(`[session] ${this.id} re-evaluation failed:`, error);
        });
      }, settings.reevaluationIntervalMs);
      this.reevaluationTimer.unref();
    }
  }

  get assessment(): RiskAssessment | null {
    return this.latestAssessment;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  get maxUVIndex(): number {
    return this.peakUVIndex;
  }

  get isReevaluating(): boolean {
    return this.reevaluationTimer !== null;
  }

  snapshot(): ExposureSnapshot {
    if (!this.stopped) this.timer.tick();
    return buildSnapshot(this.timer, this.latestAssessment?.riskLevel ?? null, this.clock());
  }

  observeUV(uvIndex: number, at?: ObservationTime, environment?: unknown): Promise<ObservationResult> {
    return this.queue.run(() => this.applyObservation(uvIndex, at, environment));
  }

  start(): Promise<ExposureSnapshot> {
    return this.mutate(() => this.timer.start());
  }

  pause(): Promise<ExposureSnapshot> {
    return this.mutate(() => this.timer.pause());
  }

  resume(): Promise<ExposureSnapshot> {
    return this.mutate(() => this.timer.resume());
  }

  reset(): Promise<ExposureSnapshot> {
    return this.mutate(() => this.timer.reset());
  }

  applySunscreen(): Promise<ExposureSnapshot> {
    return this.mutate(() => this.timer.applySunscreen());
  }

  cancelSunscreenTimer(): Promise<ExposureSnapshot> {
    return this.mutate(() => this.timer.cancelSunscreenTimer());
  }

  /** Runs one background re-evaluation; concurrent callers share the run in flight. */
  reevaluate(): Promise<ObservationResult | null> {
    if (this.inFlightReevaluation) return this.inFlightReevaluation;
    const run = this.queue
      .run(async () => {
        if (this.stopped) return null;
        const reading = await this.reevaluationProvider();
        if (!reading || this.stopped) return null;
        return this.applyObservation(reading.uvIndex, this.clock(), reading.environment);
      })
      .finally(() => {
        this.inFlightReevaluation = null;
      });
    this.inFlightReevaluation = run;
    return run;
  }

  stop(): Promise<StopResult> {
    return this.queue.run(() => {
      const wasStopped = this.stopped;
      this.stopped = true;
      this.stopReevaluation();
      this.timer.dispose();

      const summary: SessionSummary = {
        totalExposureSeconds: this.timer.totalExposureSeconds,
        maxUVIndex: this.peakUVIndex,
      };
      const notification = wasStopped ? null : this.policy.summarizeSession(summary, this.latestAssessment);
      if (notification) this.deliver(notification);
      const snapshot = this.persist();
      console.log(`[session] ${this.id} stopped after ${Math.round(summary.totalExposureSeconds)}s of exposure`);
      return { summary, snapshot, notification };
    });
  }

  /** Resolves once every dispatch started so far has settled. */
  async whenIdle(): Promise<void> {
    while (this.pendingDeliveries.size > 0) {
      await Promise.all([...this.pendingDeliveries]);
    }
  }

  private mutate(action: () => void): Promise<ExposureSnapshot> {
    return this.queue.run(() => {
      if (!this.stopped) action();
      return this.persist();
    });
  }

  private applyObservation(rawUVIndex: number, at: ObservationTime, environmentInput: unknown): ObservationResult {
    const observedAt = this.resolveObservationTime(at);
    if (this.stopped || (this.lastObservationAt !== null && observedAt < this.lastObservationAt)) {
      console.warn(`[session] ${this.id} ignoring UV reading from ${new Date(observedAt).toISOString()}`);
      return { accepted: false, snapshot: this.snapshot(), assessment: this.latestAssessment, notifications: [] };
    }

    this.lastObservationAt = observedAt;
    if (environmentInput !== undefined && environmentInput !== null) {
      this.environment = normalizeEnvironment(environmentInput, new Date(observedAt));
    }

    const assessment = assessRisk(rawUVIndex, this.environment, new Date(observedAt));
    this.latestAssessment = assessment;
    this.peakUVIndex = Math.max(this.peakUVIndex, assessment.adjustedUVIndex);
    this.timer.updateUVIndex(assessment.adjustedUVIndex);

    const notifications = this.policy.evaluate(assessment);
    notifications.forEach((notification) => this.deliver(notification));

    if (this.debug) {
      console.log(
        `[session] ${this.id} uv=${assessment.baseUVIndex} adjusted=${assessment.adjustedUVIndex} level=${assessment.riskLevel} notifications=${notifications.length}`,
      );
    }

    return { accepted: true, snapshot: this.persist(), assessment, notifications };
  }

  private resolveObservationTime(at: ObservationTime): number {
    if (at instanceof Date && Number.isFinite(at.getTime())) return at.getTime();
    if (typeof at === 'number' && Number.isFinite(at)) return at;
    if (typeof at === 'string') return parseIsoTimeToMs(at) ?? this.clock();
    return this.clock();
  }

  private lastKnownReading(): UVReading | null {
    if (!this.latestAssessment) return null;
    return { uvIndex: this.latestAssessment.baseUVIndex };
  }

  private handleTimerEvent(event: TimerEvent): void {
    if (event.type === 'uvChanged' && this.debug) {
      console.log(`[session] ${this.id} ${event.message}`);
    }
    if (event.type === 'exceeded' || event.type === 'sunscreenExpired') {
      const notification = this.policy.notifyTimerEvent(event, this.latestAssessment);
      if (notification) this.deliver(notification);
    }
  }

  private deliver(notification: SmartNotification): void {
    const request = toDispatchRequest(notification);
    const delivery: Promise<void> = Promise.resolve()
      .then(() => this.dispatcher.dispatch(request))
      .then(
        () => this.recordDelivery(request, null),
        (error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          console.error(`[notifications] ${this.id} dispatch of ${request.identifier} failed: ${message}`);
          this.recordDelivery(request, message);
        },
      )
      .then(() => {
        this.pendingDeliveries.delete(delivery);
      });
    this.pendingDeliveries.add(delivery);
  }

  private recordDelivery(request: DispatchRequest, error: string | null): void {
    this.history.record({ sessionId: this.id, delivered: error === null, error, request }, this.clock());
  }

  private persist(): ExposureSnapshot {
    const snapshot = this.snapshot();
    this.snapshotStore?.write(this.id, snapshot);
    return snapshot;
  }

  private stopReevaluation(): void {
    if (this.reevaluationTimer) {
      clearInterval(this.reevaluationTimer);
      this.reevaluationTimer = null;
    }
  }
}
