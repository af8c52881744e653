import { dayOfYearUtc } from './time.js';

export type SnowType = 'none' | 'fresh' | 'packed' | 'melting' | 'icy';
export type WaterBodyType = 'none' | 'ocean' | 'sea' | 'lake' | 'river' | 'stream' | 'pond' | 'pool';
export type WaterBodySize = 'small' | 'medium' | 'large' | 'massive';
export type TerrainType = 'unknown' | 'coastal' | 'mountainous' | 'urban' | 'rural' | 'desert' | 'forest' | 'grassland' | 'arctic';
export type SeasonName = 'spring' | 'summer' | 'autumn' | 'winter' | 'unknown';

export interface SnowConditions {
  readonly hasRecentFall: boolean;
  readonly depthCm: number;
  readonly coveragePct: number;
  readonly ageDays: number;
  readonly type: SnowType;
}

export interface WaterProximity {
  readonly distanceMeters: number;
  readonly bodyType: WaterBodyType;
  readonly size: WaterBodySize;
}

export interface SeasonalContext {
  readonly name: SeasonName;
  readonly dayOfYear: number;
}

export interface EnvironmentalModel {
  readonly altitudeMeters: number;
  readonly cloudCoverPct: number;
  readonly snow: SnowConditions;
  readonly water: WaterProximity;
  readonly terrain: TerrainType;
  readonly season: SeasonalContext;
}

export const SNOW_REFLECTION: Readonly<Record<SnowType, number>> = {
  none: 0,
  fresh: 0.8,
  packed: 0.6,
  melting: 0.4,
  icy: 0.7,
};

export const WATER_REFLECTION: Readonly<Record<WaterBodyType, number>> = {
  none: 0,
  ocean: 0.25,
  sea: 0.25,
  lake: 0.2,
  river: 0.15,
  stream: 0.1,
  pond: 0.18,
  pool: 0.12,
};

export const WATER_SIZE_MULTIPLIER: Readonly<Record<WaterBodySize, number>> = {
  small: 0.5,
  medium: 0.75,
  large: 1.0,
  massive: 1.25,
};

export const TERRAIN_MULTIPLIER: Readonly<Record<TerrainType, number>> = {
  unknown: 1.0,
  coastal: 1.05,
  mountainous: 1.15,
  urban: 1.0,
  rural: 1.02,
  desert: 1.1,
  forest: 0.95,
  grassland: 1.03,
  arctic: 1.2,
};

export const SEASON_MULTIPLIER: Readonly<Record<SeasonName, number>> = {
  spring: 0.8,
  summer: 1.0,
  autumn: 0.7,
  winter: 0.5,
  unknown: 1.0,
};

export const SNOW_LABELS: Readonly<Record<SnowType, string>> = {
  none: 'No',
  fresh: 'Fresh',
  packed: 'Packed',
  melting: 'Melting',
  icy: 'Icy',
};

const SNOW_TYPES: readonly SnowType[] = ['none', 'fresh', 'packed', 'melting', 'icy'];
const WATER_BODY_TYPES: readonly WaterBodyType[] = ['none', 'ocean', 'sea', 'lake', 'river', 'stream', 'pond', 'pool'];
const WATER_SIZES: readonly WaterBodySize[] = ['small', 'medium', 'large', 'massive'];
const TERRAIN_TYPES: readonly TerrainType[] = ['unknown', 'coastal', 'mountainous', 'urban', 'rural', 'desert', 'forest', 'grassland', 'arctic'];
const SEASON_NAMES: readonly SeasonName[] = ['spring', 'summer', 'autumn', 'winter', 'unknown'];

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const pickEnum = <T extends string>(value: unknown, allowed: readonly T[], fallback: T): T => {
  if (typeof value !== 'string') return fallback;
  const normalized = value.trim().toLowerCase();
  return allowed.find((candidate) => candidate.toLowerCase() === normalized) ?? fallback;
};

const nonNegative = (value: unknown, fallback: number): number => {
  if (value === null || value === undefined || value === '') return fallback;
  const numeric = Number(value);
  if (Number.isNaN(numeric)) return fallback;
  return Math.max(0, numeric);
};

const finiteNonNegative = (value: unknown): number => {
  const numeric = nonNegative(value, 0);
  return Number.isFinite(numeric) ? numeric : 0;
};

export const clampPercent = (value: unknown): number => {
  const numeric = Number(value);
  if (!Number.isFinite(numeric)) return 0;
  return Math.min(100, Math.max(0, numeric));
};

const clampInteger = (value: unknown, fallback: number, min: number, max: number): number => {
  const numeric = Number(value);
  if (!Number.isFinite(numeric)) return fallback;
  return Math.min(max, Math.max(min, Math.round(numeric)));
};

export const seasonForDate = (date: Date = new Date()): SeasonalContext => {
  const month = date.getUTCMonth();
  let name: SeasonName = 'unknown';
  if (month === 11 || month <= 1) name = 'winter';
  else if (month <= 4) name = 'spring';
  else if (month <= 7) name = 'summer';
  else if (month <= 10) name = 'autumn';
  return { name, dayOfYear: dayOfYearUtc(date) };
};

export const createDefaultEnvironment = (): EnvironmentalModel =>
  normalizeEnvironment({ season: { name: 'unknown', dayOfYear: 1 } });

// An omitted season stays `unknown` so the same inputs always give the same
// adjusted UV. Callers opt into the calendar season with `season: 'auto'`.
const resolveSeason = (input: unknown, referenceDate: Date): SeasonalContext => {
  if (input === 'auto') return seasonForDate(referenceDate);
  const dayOfYear = dayOfYearUtc(referenceDate);
  if (!isRecord(input)) return { name: 'unknown', dayOfYear };
  return {
    name: pickEnum(input.name, SEASON_NAMES, 'unknown'),
    dayOfYear: clampInteger(input.dayOfYear, dayOfYear, 1, 366),
  };
};

export const normalizeEnvironment = (input: unknown, referenceDate: Date = new Date()): EnvironmentalModel => {
  const raw: Record<string, unknown> = isRecord(input) ? input : {};
  const snow: Record<string, unknown> = isRecord(raw.snow) ? raw.snow : {};
  const water: Record<string, unknown> = isRecord(raw.water) ? raw.water : {};

  const bodyType = pickEnum(water.bodyType, WATER_BODY_TYPES, 'none');
  const distanceMeters = bodyType === 'none' ? Number.POSITIVE_INFINITY : nonNegative(water.distanceMeters, Number.POSITIVE_INFINITY);

  return Object.freeze({
    altitudeMeters: finiteNonNegative(raw.altitudeMeters),
    cloudCoverPct: clampPercent(raw.cloudCoverPct),
    snow: Object.freeze({
      hasRecentFall: snow.hasRecentFall === true,
      depthCm: finiteNonNegative(snow.depthCm),
      coveragePct: clampPercent(snow.coveragePct),
      ageDays: clampInteger(snow.ageDays, 0, 0, Number.MAX_SAFE_INTEGER),
      type: pickEnum(snow.type, SNOW_TYPES, 'none'),
    }),
    water: Object.freeze({
      distanceMeters,
      bodyType,
      size: pickEnum(water.size, WATER_SIZES, 'large'),
    }),
    terrain: pickEnum(raw.terrain, TERRAIN_TYPES, 'unknown'),
    season: Object.freeze(resolveSeason(raw.season, referenceDate)),
  });
};
