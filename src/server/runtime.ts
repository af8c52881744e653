import dotenv from 'dotenv';
import { getDefaultEngineSettings, normalizeEngineSettings, type EngineSettings } from '../utils/settings.js';

dotenv.config();

const parsePositiveInt = (rawValue: string | undefined, fallback: number): number => {
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
};

const optionalString = (rawValue: string | undefined): string | null => {
  const trimmed = (rawValue || '').trim();
  return trimmed || null;
};

export const PORT = parsePositiveInt(process.env.PORT, 3001);
export const IS_PRODUCTION = process.env.NODE_ENV === 'production';
export const DEBUG_ENGINE = process.env.DEBUG_ENGINE === 'true';

export const REQUEST_TIMEOUT_MS = parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 9000);
export const RATE_LIMIT_WINDOW_MS = parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000);
export const RATE_LIMIT_MAX_REQUESTS = parsePositiveInt(process.env.RATE_LIMIT_MAX_REQUESTS, 300);
export const MAX_SESSIONS = parsePositiveInt(process.env.MAX_SESSIONS, 1000);

export const CORS_ALLOWLIST = (process.env.CORS_ORIGIN || '')
  .split(',')
  .map((origin) => origin.trim())
  .filter(Boolean);

export const NOTIFICATION_WEBHOOK_URL = optionalString(process.env.NOTIFICATION_WEBHOOK_URL);
export const NOTIFICATION_HISTORY_FILE = optionalString(process.env.NOTIFICATION_HISTORY_FILE);
export const SNAPSHOT_DIR = optionalString(process.env.SNAPSHOT_DIR);

// Engine defaults; per-session overrides pass through the same normaliser.
export const ENGINE_DEFAULTS: EngineSettings = normalizeEngineSettings(
  {
    uvChangeThreshold: process.env.UV_CHANGE_THRESHOLD,
    minimumRiskLevel: process.env.MINIMUM_RISK_LEVEL,
    educationalFrequency: process.env.EDUCATIONAL_FREQUENCY,
    sunscreenReapplyIntervalSeconds: process.env.SUNSCREEN_REAPPLY_INTERVAL_SECONDS,
    quietHoursEnabled: process.env.QUIET_HOURS_ENABLED,
    quietHoursStart: process.env.QUIET_HOURS_START,
    quietHoursEnd: process.env.QUIET_HOURS_END,
    quietHoursTimeZone: process.env.QUIET_HOURS_TIMEZONE,
    reevaluationIntervalMs: process.env.REEVALUATION_INTERVAL_MS,
  },
  getDefaultEngineSettings(),
);
