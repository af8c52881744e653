export const UNLIMITED_BURN_TIME = Number.POSITIVE_INFINITY;
export const EXTREME_UV_FLOOR = 12;
export const EXTREME_BURN_SECONDS = 5;
export const LOW_UV_BURN_SECONDS = 60;

export const normalizeUVIndex = (value: unknown): number => {
  const numeric = Number(value);
  if (!Number.isFinite(numeric) || numeric <= 0) {
    return 0;
  }
  return Math.round(numeric);
};

/**
 * Burn budget in seconds for a UV index. Every consumer (timer, legend,
 * snapshots) reads this function so displayed and enforced limits agree.
 */
export const timeToBurn = (uvIndex: number): number => {
  const uv = normalizeUVIndex(uvIndex);
  if (uv === 0) return UNLIMITED_BURN_TIME;
  if (uv >= EXTREME_UV_FLOOR) return EXTREME_BURN_SECONDS;
  return LOW_UV_BURN_SECONDS - Math.round(((uv - 1) * 55) / 11);
};

export interface UVLegendEntry {
  uvIndex: number;
  category: string;
  color: string;
  advice: string;
  timeToBurnSeconds: number | null;
}

const UV_ADVICE = {
  none: 'No chance of sunburn at this level.',
  low: 'Low risk of harm from unprotected sun exposure. No protection required.',
  moderate: 'Moderate risk of harm. Wear sunscreen, protective clothing, and seek shade during midday hours.',
  high: 'High risk of harm. Reduce time in the sun between 10 a.m. and 4 p.m. Wear protective clothing and sunscreen.',
  veryHigh: 'Very high risk of harm. Minimize sun exposure during midday hours. Protection against sun damage is essential.',
  extreme: 'Extreme risk of harm. Take all precautions. Avoid sun exposure during midday hours.',
};

export const describeUVIndex = (value: number): UVLegendEntry => {
  const uvIndex = normalizeUVIndex(value);
  const budget = timeToBurn(uvIndex);
  const timeToBurnSeconds = Number.isFinite(budget) ? budget : null;

  if (uvIndex === 0) return { uvIndex, category: 'None', color: '#0033B3', advice: UV_ADVICE.none, timeToBurnSeconds };
  if (uvIndex <= 2) return { uvIndex, category: 'Low', color: '#4CAF50', advice: UV_ADVICE.low, timeToBurnSeconds };
  if (uvIndex <= 5) return { uvIndex, category: 'Moderate', color: '#FFD700', advice: UV_ADVICE.moderate, timeToBurnSeconds };
  if (uvIndex <= 7) return { uvIndex, category: 'High', color: '#FF8C00', advice: UV_ADVICE.high, timeToBurnSeconds };
  if (uvIndex <= 10) return { uvIndex, category: 'Very High', color: '#E60000', advice: UV_ADVICE.veryHigh, timeToBurnSeconds };
  return { uvIndex, category: 'Extreme', color: '#B500A1', advice: UV_ADVICE.extreme, timeToBurnSeconds };
};

export const buildUVLegend = (maxIndex: number = EXTREME_UV_FLOOR): UVLegendEntry[] =>
  Array.from({ length: Math.max(0, Math.round(maxIndex)) + 1 }, (_, index) => describeUVIndex(index));
