import {
  type EnvironmentalModel,
  SEASON_MULTIPLIER,
  SNOW_LABELS,
  SNOW_REFLECTION,
  TERRAIN_MULTIPLIER,
  WATER_REFLECTION,
  WATER_SIZE_MULTIPLIER,
} from './environment.js';
import { normalizeUVIndex } from './burn-time.js';

export type RiskLevel = 'veryLow' | 'low' | 'moderate' | 'high' | 'veryHigh' | 'extreme';
export type RiskFactorType = 'altitude' | 'snowReflection' | 'waterReflection' | 'cloudCover' | 'terrain' | 'season';
export type RiskSeverity = 'none' | 'low' | 'moderate' | 'high' | 'extreme';
export type RecommendationType = 'sunscreen' | 'clothing' | 'timing' | 'shade' | 'hydration' | 'monitoring' | 'avoidance' | 'education';
export type Priority = 'low' | 'medium' | 'high' | 'critical';

export interface RiskFactor {
  readonly type: RiskFactorType;
  readonly severity: RiskSeverity;
  readonly description: string;
  readonly impact: number;
  readonly mitigation: string;
}

export interface Recommendation {
  readonly type: RecommendationType;
  readonly priority: Priority;
  readonly title: string;
  readonly description: string;
  readonly actionItems: readonly string[];
}

export interface RiskAssessment {
  readonly assessedAt: string;
  readonly baseUVIndex: number;
  readonly adjustedUVIndex: number;
  readonly riskScore: number;
  readonly riskLevel: RiskLevel;
  readonly riskFactors: readonly RiskFactor[];
  readonly recommendations: readonly Recommendation[];
  readonly environment: EnvironmentalModel;
}

export const RISK_LEVELS: readonly RiskLevel[] = ['veryLow', 'low', 'moderate', 'high', 'veryHigh', 'extreme'];

export const RISK_LEVEL_LABELS: Readonly<Record<RiskLevel, string>> = {
  veryLow: 'Very Low',
  low: 'Low',
  moderate: 'Moderate',
  high: 'High',
  veryHigh: 'Very High',
  extreme: 'Extreme',
};

export const RISK_LEVEL_GUIDANCE: Readonly<Record<RiskLevel, string>> = {
  veryLow: 'Minimal UV risk - normal outdoor activities safe',
  low: 'Low UV risk - take basic precautions',
  moderate: 'Moderate UV risk - seek shade during peak hours',
  high: 'High UV risk - minimize sun exposure, use protection',
  veryHigh: 'Very high UV risk - avoid sun exposure',
  extreme: 'Extreme UV risk - stay indoors during peak hours',
};

export const riskLevelRank = (level: RiskLevel): number => RISK_LEVELS.indexOf(level);

export const isRiskLevel = (value: unknown): value is RiskLevel =>
  typeof value === 'string' && RISK_LEVELS.some((level) => level === value);

export const riskLevelFromScore = (score: number): RiskLevel => {
  if (!Number.isFinite(score) || score < 0.2) return 'veryLow';
  if (score < 0.4) return 'low';
  if (score < 0.6) return 'moderate';
  if (score < 0.8) return 'high';
  if (score < 0.9) return 'veryHigh';
  return 'extreme';
};

const WATER_REFLECTION_RANGE_M = 1000;
const WATER_RECOMMENDATION_RANGE_M = 500;

export const altitudeMultiplier = (altitudeMeters: number): number => 1 + (altitudeMeters / 1000) * 0.1;

// Clouds attenuate but never remove UV.
export const cloudCoverMultiplier = (cloudCoverPct: number): number => {
  if (cloudCoverPct < 10) return 1.0;
  if (cloudCoverPct < 25) return 0.95;
  if (cloudCoverPct < 50) return 0.85;
  if (cloudCoverPct < 75) return 0.7;
  if (cloudCoverPct < 90) return 0.5;
  return 0.3;
};

export const snowReflectionMultiplier = (env: EnvironmentalModel): number => {
  if (env.snow.coveragePct <= 0) return 1.0;
  return 1 + SNOW_REFLECTION[env.snow.type] * (env.snow.coveragePct / 100) * 0.8;
};

export const waterReflectionMultiplier = (env: EnvironmentalModel): number => {
  const { distanceMeters, bodyType, size } = env.water;
  if (!(distanceMeters < WATER_REFLECTION_RANGE_M)) return 1.0;
  const distanceFactor = Math.max(0.1, 1 - distanceMeters / WATER_REFLECTION_RANGE_M);
  return 1 + WATER_REFLECTION[bodyType] * WATER_SIZE_MULTIPLIER[size] * distanceFactor * 0.25;
};

export const adjustedUVIndex = (baseUV: number, env: EnvironmentalModel): number => {
  let adjusted = normalizeUVIndex(baseUV);
  adjusted *= altitudeMultiplier(env.altitudeMeters);
  adjusted *= cloudCoverMultiplier(env.cloudCoverPct);
  adjusted *= snowReflectionMultiplier(env);
  adjusted *= waterReflectionMultiplier(env);
  adjusted *= TERRAIN_MULTIPLIER[env.terrain];
  adjusted *= SEASON_MULTIPLIER[env.season.name];
  return Number.isFinite(adjusted) ? Math.max(0, Math.round(adjusted)) : 0;
};

export const environmentalRiskScore = (env: EnvironmentalModel): number => {
  let score = Math.min(env.altitudeMeters / 5000, 0.1);
  if (env.snow.coveragePct > 0) {
    score += (env.snow.coveragePct / 100) * 0.15;
  }
  if (env.water.distanceMeters < WATER_REFLECTION_RANGE_M) {
    score += Math.max(0, (WATER_REFLECTION_RANGE_M - env.water.distanceMeters) / WATER_REFLECTION_RANGE_M) * 0.1;
  }
  score += Math.max(0, (TERRAIN_MULTIPLIER[env.terrain] - 1) * 0.25);
  return Math.min(score, 0.4);
};

export const riskScore = (adjustedUV: number, env: EnvironmentalModel): number => {
  const uvComponent = Math.min(0.6, normalizeUVIndex(adjustedUV) / 11);
  return Math.min(1, uvComponent + environmentalRiskScore(env));
};

export const generateRiskFactors = (env: EnvironmentalModel): RiskFactor[] => {
  const factors: RiskFactor[] = [];

  if (env.altitudeMeters > 1000) {
    factors.push({
      type: 'altitude',
      severity: env.altitudeMeters > 3000 ? 'high' : 'moderate',
      description: `Elevation of ${Math.round(env.altitudeMeters)}m increases UV exposure`,
      impact: Math.min(env.altitudeMeters / 5000, 1),
      mitigation: 'Take extra precautions at high altitudes',
    });
  }

  if (env.snow.coveragePct > 0) {
    factors.push({
      type: 'snowReflection',
      severity: env.snow.type === 'fresh' ? 'high' : 'moderate',
      description: `${SNOW_LABELS[env.snow.type]} snow reflects up to ${Math.round(SNOW_REFLECTION[env.snow.type] * 100)}% of UV`,
      impact: env.snow.coveragePct / 100,
      mitigation: 'Wear UV-protective eyewear and apply sunscreen to exposed areas',
    });
  }

  if (env.water.distanceMeters < WATER_REFLECTION_RANGE_M) {
    factors.push({
      type: 'waterReflection',
      severity: 'moderate',
      description: `Nearby ${env.water.bodyType} reflects UV`,
      impact: 0.3,
      mitigation: 'Apply sunscreen more frequently when near water',
    });
  }

  if (env.cloudCoverPct > 50) {
    factors.push({
      type: 'cloudCover',
      severity: 'low',
      description: "Clouds don't block all UV rays - protection still needed",
      impact: 0.1,
      mitigation: "Don't rely on clouds for UV protection",
    });
  }

  return factors;
};

const LEVEL_RECOMMENDATIONS: Readonly<Record<RiskLevel, Recommendation>> = (() => {
  const basic: Recommendation = {
    type: 'sunscreen',
    priority: 'low',
    title: 'Basic Sun Protection',
    description: 'Apply SPF 30+ sunscreen for extended outdoor activities',
    actionItems: ['Apply sunscreen 15 minutes before going outside', 'Reapply every 2 hours', 'Use water-resistant formula if swimming'],
  };
  const extreme: Recommendation = {
    type: 'avoidance',
    priority: 'critical',
    title: 'Extreme UV Risk',
    description: 'Avoid outdoor activities during peak hours',
    actionItems: ['Stay indoors during peak hours', 'If outside, seek shade constantly', 'Wear maximum protection', 'Monitor for sunburn symptoms'],
  };
  return {
    veryLow: basic,
    low: basic,
    moderate: {
      type: 'timing',
      priority: 'medium',
      title: 'Avoid Peak Hours',
      description: 'Limit outdoor activities during peak UV hours (10 AM - 4 PM)',
      actionItems: ['Seek shade during peak hours', 'Wear protective clothing', 'Apply SPF 50+ sunscreen'],
    },
    high: {
      type: 'avoidance',
      priority: 'high',
      title: 'Minimize Sun Exposure',
      description: 'High UV risk - take extra precautions',
      actionItems: ['Stay in shade when possible', 'Wear wide-brimmed hat', 'Use SPF 50+ sunscreen', 'Wear UV-protective clothing'],
    },
    veryHigh: extreme,
    extreme,
  };
})();

export const generateRecommendations = (env: EnvironmentalModel, level: RiskLevel): Recommendation[] => {
  const recommendations: Recommendation[] = [LEVEL_RECOMMENDATIONS[level]];

  if (env.altitudeMeters > 2000) {
    recommendations.push({
      type: 'education',
      priority: 'high',
      title: 'High Altitude Warning',
      description: 'UV intensity increases significantly at high altitudes',
      actionItems: ['Use higher SPF sunscreen', 'Apply more frequently', 'Wear UV-protective eyewear', 'Stay hydrated'],
    });
  }

  if (env.snow.coveragePct > 0) {
    recommendations.push({
      type: 'clothing',
      priority: 'high',
      title: 'Snow Reflection Protection',
      description: 'Snow reflects UV rays, increasing exposure',
      actionItems: ['Wear UV-protective sunglasses', 'Apply sunscreen to face and neck', 'Cover exposed skin', 'Use lip balm with SPF'],
    });
  }

  if (env.water.distanceMeters < WATER_RECOMMENDATION_RANGE_M) {
    recommendations.push({
      type: 'sunscreen',
      priority: 'medium',
      title: 'Water Reflection Protection',
      description: 'Water reflects UV rays, requiring extra protection',
      actionItems: ['Use water-resistant sunscreen', 'Reapply after swimming', 'Wear protective clothing', 'Seek shade when possible'],
    });
  }

  return recommendations;
};

export const assessRisk = (baseUV: number, env: EnvironmentalModel, at: Date = new Date()): RiskAssessment => {
  const baseUVIndex = normalizeUVIndex(baseUV);
  const adjusted = adjustedUVIndex(baseUVIndex, env);
  const score = riskScore(adjusted, env);
  const level = riskLevelFromScore(score);

  return Object.freeze({
    assessedAt: at.toISOString(),
    baseUVIndex,
    adjustedUVIndex: adjusted,
    riskScore: score,
    riskLevel: level,
    riskFactors: Object.freeze(generateRiskFactors(env)),
    recommendations: Object.freeze(generateRecommendations(env, level)),
    environment: env,
  });
};
