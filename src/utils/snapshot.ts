import fs from 'node:fs';
import path from 'node:path';
import type { ExposureTimer, TimerState } from './exposure-timer.js';
import { isRecord } from './environment.js';
import { isRiskLevel, type RiskLevel } from './risk.js';

export type ExposureStatus = 'safe' | 'warning' | 'exceeded' | 'noUV';

export interface ExposureSnapshot {
  uvIndex: number;
  elapsedSeconds: number;
  totalExposureSeconds: number;
  timeToBurnSeconds: number | null;
  state: TimerState;
  sunscreenRemainingSeconds: number;
  riskLevel: RiskLevel | null;
  exposureProgress: number;
  exposureStatus: ExposureStatus;
  updatedAt: string;
}

const TIMER_STATES: readonly TimerState[] = ['notStarted', 'running', 'paused', 'sunscreenApplied', 'exceeded'];
const EXPOSURE_STATUSES: readonly ExposureStatus[] = ['safe', 'warning', 'exceeded', 'noUV'];
export const EXPOSURE_WARNING_PROGRESS = 0.8;

const roundTenth = (value: number): number => Math.round(value * 10) / 10;

export const resolveExposureStatus = (uvIndex: number, state: TimerState, progress: number): ExposureStatus => {
  if (uvIndex <= 0) return 'noUV';
  if (state === 'exceeded' || progress >= 1) return 'exceeded';
  if (progress >= EXPOSURE_WARNING_PROGRESS) return 'warning';
  return 'safe';
};

export const buildSnapshot = (timer: ExposureTimer, riskLevel: RiskLevel | null, now: number = Date.now()): ExposureSnapshot => {
  const budget = timer.timeToBurnSeconds;
  const progress = timer.exposureProgress;
  return {
    uvIndex: timer.currentUVIndex,
    elapsedSeconds: roundTenth(timer.elapsedSeconds),
    totalExposureSeconds: roundTenth(timer.totalExposureSeconds),
    timeToBurnSeconds: Number.isFinite(budget) ? budget : null,
    state: timer.state,
    sunscreenRemainingSeconds: roundTenth(timer.sunscreenRemainingSeconds),
    riskLevel,
    exposureProgress: Number(progress.toFixed(3)),
    exposureStatus: resolveExposureStatus(timer.currentUVIndex, timer.state, progress),
    updatedAt: new Date(now).toISOString(),
  };
};

export const createPlaceholderSnapshot = (now: number = Date.now()): ExposureSnapshot => ({
  uvIndex: 0,
  elapsedSeconds: 0,
  totalExposureSeconds: 0,
  timeToBurnSeconds: null,
  state: 'notStarted',
  sunscreenRemainingSeconds: 0,
  riskLevel: null,
  exposureProgress: 0,
  exposureStatus: 'safe',
  updatedAt: new Date(now).toISOString(),
});

export const serializeSnapshot = (snapshot: ExposureSnapshot): string => JSON.stringify(snapshot);

const finiteNonNegative = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : null;

export const parseSnapshot = (raw: string | null | undefined): ExposureSnapshot | null => {
  if (typeof raw !== 'string' || !raw.trim()) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;
  const value = parsed;

  const uvIndex = finiteNonNegative(value.uvIndex);
  const elapsedSeconds = finiteNonNegative(value.elapsedSeconds);
  const totalExposureSeconds = finiteNonNegative(value.totalExposureSeconds);
  const sunscreenRemainingSeconds = finiteNonNegative(value.sunscreenRemainingSeconds);
  const exposureProgress = finiteNonNegative(value.exposureProgress);
  const timeToBurnSeconds = value.timeToBurnSeconds === null ? null : finiteNonNegative(value.timeToBurnSeconds);
  const state = TIMER_STATES.find((candidate) => candidate === value.state);
  const exposureStatus = EXPOSURE_STATUSES.find((candidate) => candidate === value.exposureStatus);
  const riskLevel = value.riskLevel === null ? null : isRiskLevel(value.riskLevel) ? value.riskLevel : undefined;
  const updatedAt = typeof value.updatedAt === 'string' && Number.isFinite(Date.parse(value.updatedAt)) ? value.updatedAt : null;

  if (
    uvIndex === null
    || elapsedSeconds === null
    || totalExposureSeconds === null
    || sunscreenRemainingSeconds === null
    || exposureProgress === null
    || (timeToBurnSeconds === null && value.timeToBurnSeconds !== null)
    || state === undefined
    || exposureStatus === undefined
    || riskLevel === undefined
    || updatedAt === null
  ) {
    return null;
  }

  return {
    uvIndex,
    elapsedSeconds,
    totalExposureSeconds,
    timeToBurnSeconds,
    state,
    sunscreenRemainingSeconds,
    riskLevel,
    exposureProgress: Math.min(1, exposureProgress),
    exposureStatus,
    updatedAt,
  };
};

export interface SnapshotStore {
  write(sessionId: string, snapshot: ExposureSnapshot): void;
  read(sessionId: string): ExposureSnapshot;
}

const SAFE_ID = /^[A-Za-z0-9_-]+$/;

export const createMemorySnapshotStore = (): SnapshotStore => {
  const snapshots = new Map<string, string>();
  return {
    write(sessionId, snapshot) {
      snapshots.set(sessionId, serializeSnapshot(snapshot));
    },
    read(sessionId) {
      return parseSnapshot(snapshots.get(sessionId)) ?? createPlaceholderSnapshot();
    },
  };
};

/**
 * One JSON file per session under `directory`. Reads never throw: a missing
 * or corrupt file yields the placeholder snapshot.
 */
export const createFileSnapshotStore = (directory: string): SnapshotStore => {
  const root = path.resolve(directory);
  try {
    fs.mkdirSync(root, { recursive: true });
  } catch (error) {
    console.error('[snapshot] mkdir failed:', error instanceof Error ? error.message : error);
  }

  const fileFor = (sessionId: string): string | null => (SAFE_ID.test(sessionId) ? path.join(root, `${sessionId}.json`) : null);

  return {
    write(sessionId, snapshot) {
      const file = fileFor(sessionId);
      if (!file) return;
      try {
        fs.writeFileSync(file, serializeSnapshot(snapshot), 'utf8');
      } catch (error) {
        console.error('[snapshot] write failed:', error instanceof Error ? error.message : error);
      }
    },
    read(sessionId) {
      const file = fileFor(sessionId);
      if (!file || !fs.existsSync(file)) return createPlaceholderSnapshot();
      try {
        return parseSnapshot(fs.readFileSync(file, 'utf8')) ?? createPlaceholderSnapshot();
      } catch (error) {
        console.error('[snapshot] read failed:', error instanceof Error ? error.message : error);
        return createPlaceholderSnapshot();
      }
    },
  };
};
