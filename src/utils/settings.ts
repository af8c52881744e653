import { isRecord } from './environment.js';
import { isRiskLevel, type RiskLevel } from './risk.js';
import { parseClock } from './time.js';

export interface EngineSettings {
  notificationsEnabled: boolean;
  uvChangeThreshold: number;
  minimumRiskLevel: RiskLevel;
  educationalFrequency: number;
  sunscreenReapplyIntervalSeconds: number;
  quietHoursEnabled: boolean;
  quietHoursStart: string;
  quietHoursEnd: string;
  quietHoursTimeZone: string;
  reevaluationIntervalMs: number;
}

export const getDefaultEngineSettings = (): EngineSettings => ({
  notificationsEnabled: true,
  uvChangeThreshold: 2,
  minimumRiskLevel: 'moderate',
  educationalFrequency: 0.2,
  sunscreenReapplyIntervalSeconds: 2 * 60 * 60,
  quietHoursEnabled: false,
  quietHoursStart: '22:00',
  quietHoursEnd: '07:00',
  quietHoursTimeZone: 'UTC',
  reevaluationIntervalMs: 30 * 60 * 1000,
});

function normalizeNumberSetting(rawValue: unknown, fallback: number, min: number, max: number): number {
  if (rawValue === null || rawValue === undefined || rawValue === '') {
    return fallback;
  }
  const numericValue = Number(rawValue);
  if (!Number.isFinite(numericValue)) {
    return fallback;
  }
  return Math.max(min, Math.min(max, Math.round(numericValue)));
}

function normalizeDecimalSetting(rawValue: unknown, fallback: number, min: number, max: number, precision = 2): number {
  if (rawValue === null || rawValue === undefined || rawValue === '') {
    return fallback;
  }
  const numericValue = Number(rawValue);
  if (!Number.isFinite(numericValue)) {
    return fallback;
  }
  const clamped = Math.max(min, Math.min(max, numericValue));
  return Number(clamped.toFixed(precision));
}

function normalizeBooleanSetting(rawValue: unknown, fallback: boolean): boolean {
  if (typeof rawValue === 'boolean') return rawValue;
  if (rawValue === 'true') return true;
  if (rawValue === 'false') return false;
  return fallback;
}

function isValidTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

export function normalizeEngineSettings(rawValue: unknown, defaults: EngineSettings = getDefaultEngineSettings()): EngineSettings {
  const raw: Record<string, unknown> = isRecord(rawValue) ? rawValue : {};
  const timeZone = typeof raw.quietHoursTimeZone === 'string' ? raw.quietHoursTimeZone.trim() : '';

  return {
    notificationsEnabled: normalizeBooleanSetting(raw.notificationsEnabled, defaults.notificationsEnabled),
    uvChangeThreshold: normalizeNumberSetting(raw.uvChangeThreshold, defaults.uvChangeThreshold, 0, 20),
    minimumRiskLevel: isRiskLevel(raw.minimumRiskLevel) ? raw.minimumRiskLevel : defaults.minimumRiskLevel,
    educationalFrequency: normalizeDecimalSetting(raw.educationalFrequency, defaults.educationalFrequency, 0, 1),
    sunscreenReapplyIntervalSeconds: normalizeNumberSetting(
      raw.sunscreenReapplyIntervalSeconds,
      defaults.sunscreenReapplyIntervalSeconds,
      60,
      24 * 60 * 60,
    ),
    quietHoursEnabled: normalizeBooleanSetting(raw.quietHoursEnabled, defaults.quietHoursEnabled),
    quietHoursStart: parseClock(typeof raw.quietHoursStart === 'string' ? raw.quietHoursStart : null) || defaults.quietHoursStart,
    quietHoursEnd: parseClock(typeof raw.quietHoursEnd === 'string' ? raw.quietHoursEnd : null) || defaults.quietHoursEnd,
    quietHoursTimeZone: timeZone && isValidTimeZone(timeZone) ? timeZone : defaults.quietHoursTimeZone,
    reevaluationIntervalMs: normalizeNumberSetting(raw.reevaluationIntervalMs, defaults.reevaluationIntervalMs, 60 * 1000, 24 * 60 * 60 * 1000),
  };
}
