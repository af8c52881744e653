import crypto from 'node:crypto';
import {
  RISK_LEVEL_GUIDANCE,
  RISK_LEVEL_LABELS,
  riskLevelRank,
  type Priority,
  type RiskAssessment,
  type RiskLevel,
} from './risk.js';
import type { TimerEvent } from './exposure-timer.js';
import type { EngineSettings } from './settings.js';
import { formatDuration, isWithinClockWindow } from './time.js';

export type NotificationType =
  | 'riskLevelChange'
  | 'environmentalFactor'
  | 'recommendation'
  | 'educational'
  | 'warning'
  | 'alert'
  | 'summary';

export interface SmartNotification {
  readonly id: string;
  readonly type: NotificationType;
  readonly title: string;
  readonly body: string;
  readonly priority: Priority;
  readonly sourceAssessment: RiskAssessment | null;
  readonly scheduledAt: string;
}

export type NotificationPolicySettings = Pick<
  EngineSettings,
  | 'notificationsEnabled'
  | 'uvChangeThreshold'
  | 'minimumRiskLevel'
  | 'educationalFrequency'
  | 'quietHoursEnabled'
  | 'quietHoursStart'
  | 'quietHoursEnd'
  | 'quietHoursTimeZone'
>;

export interface SessionSummary {
  totalExposureSeconds: number;
  maxUVIndex: number;
}

interface NotificationPolicyOptions {
  settings: NotificationPolicySettings;
  random?: () => number;
  clock?: () => number;
  createId?: () => string;
}

const EDUCATIONAL_TIPS: Readonly<Record<RiskLevel, string>> = {
  veryLow: 'Did you know? Even on cloudy days, up to 80% of UV rays can penetrate clouds. Always protect your skin!',
  low: 'Did you know? Even on cloudy days, up to 80% of UV rays can penetrate clouds. Always protect your skin!',
  moderate: 'UV rays are strongest between 10 AM and 4 PM. Seek shade during these hours for better protection.',
  high: 'High UV conditions require extra protection. Remember: sunscreen, protective clothing, and shade are your best friends!',
  veryHigh: "Extreme UV conditions! The sun's rays are at their most intense. Consider postponing outdoor activities if possible.",
  extreme: "Extreme UV conditions! The sun's rays are at their most intense. Consider postponing outdoor activities if possible.",
};

const MAX_RECOMMENDATION_ALERTS = 2;

/**
 * Decides which notifications a risk assessment or timer transition deserves.
 * Comparison state (`lastRiskLevel`, `lastAdjustedUV`) tracks the most recent
 * observation, not the most recent alert.
 */
export class NotificationPolicy {
  private readonly settings: NotificationPolicySettings;
  private readonly random: () => number;
  private readonly clock: () => number;
  private readonly createId: () => string;
  private previousRiskLevel: RiskLevel | null = null;
  private previousAdjustedUV = 0;

  constructor({ settings, random = Math.random, clock = () => Date.now(), createId = () => crypto.randomUUID() }: NotificationPolicyOptions) {
    this.settings = { ...settings };
    this.random = random;
    this.clock = clock;
    this.createId = createId;
  }

  get lastRiskLevel(): RiskLevel | null {
    return this.previousRiskLevel;
  }

  get lastAdjustedUV(): number {
    return this.previousAdjustedUV;
  }

  isSuppressed(at: number = this.clock()): boolean {
    if (!this.settings.notificationsEnabled) return true;
    if (!this.settings.quietHoursEnabled) return false;
    return isWithinClockWindow({
      at,
      start: this.settings.quietHoursStart,
      end: this.settings.quietHoursEnd,
      timeZone: this.settings.quietHoursTimeZone,
    });
  }

  evaluate(assessment: RiskAssessment): SmartNotification[] {
    const now = this.clock();
    const notifications: SmartNotification[] = [];
    const isFirstObservation = this.previousRiskLevel === null;
    const levelChanged = assessment.riskLevel !== this.previousRiskLevel;
    const uvDelta = Math.abs(assessment.adjustedUVIndex - this.previousAdjustedUV);
    const uvMoved = uvDelta >= this.settings.uvChangeThreshold;
    const materialChange = isFirstObservation || levelChanged || uvMoved;

    if (!this.isSuppressed(now)) {
      const meetsFloor = riskLevelRank(assessment.riskLevel) >= riskLevelRank(this.settings.minimumRiskLevel);
      if (levelChanged && meetsFloor && uvMoved) {
        notifications.push(this.build(now, assessment, {
          type: 'riskLevelChange',
          title: 'UV Risk Level Changed',
          body: `Current UV risk is ${RISK_LEVEL_LABELS[assessment.riskLevel]}. ${RISK_LEVEL_GUIDANCE[assessment.riskLevel]}`,
          priority: assessment.riskLevel === 'extreme' ? 'critical' : 'high',
        }));
      }

      if (materialChange) {
        assessment.riskFactors
          .filter((factor) => factor.severity === 'high' || factor.severity === 'extreme')
          .forEach((factor) => {
            notifications.push(this.build(now, assessment, {
              type: 'environmentalFactor',
              title: 'Environmental UV Risk',
              body: `${factor.description}. ${factor.mitigation}`,
              priority: factor.severity === 'extreme' ? 'critical' : 'high',
            }));
          });

        assessment.recommendations
          .filter((recommendation) => recommendation.priority === 'high' || recommendation.priority === 'critical')
          .slice(0, MAX_RECOMMENDATION_ALERTS)
          .forEach((recommendation) => {
            notifications.push(this.build(now, assessment, {
              type: 'recommendation',
              title: recommendation.title,
              body: recommendation.description,
              priority: recommendation.priority,
            }));
          });
      }

      if (notifications.length === 0 && this.random() < this.settings.educationalFrequency) {
        notifications.push(this.build(now, assessment, {
          type: 'educational',
          title: 'UV Safety Tip',
          body: EDUCATIONAL_TIPS[assessment.riskLevel],
          priority: 'medium',
        }));
      }
    }

    this.previousRiskLevel = assessment.riskLevel;
    this.previousAdjustedUV = assessment.adjustedUVIndex;
    return notifications;
  }

  notifyTimerEvent(event: TimerEvent, assessment: RiskAssessment | null = null): SmartNotification | null {
    const now = this.clock();
    if (this.isSuppressed(now)) return null;

    if (event.type === 'exceeded') {
      return this.build(now, assessment, {
        type: 'alert',
        title: 'Exposure Limit Reached',
        body: `UV ${event.uvIndex}: you have used your ${formatDuration(event.timeToBurnSeconds)} exposure budget. Seek shade now.`,
        priority: 'critical',
      });
    }

    if (event.type === 'sunscreenExpired') {
      return this.build(now, assessment, {
        type: 'warning',
        title: 'Time to Reapply Sunscreen',
        body: 'Your sunscreen protection window has ended. Reapply now to stay protected.',
        priority: 'high',
      });
    }

    return null;
  }

  summarizeSession(summary: SessionSummary, assessment: RiskAssessment | null = null): SmartNotification | null {
    const now = this.clock();
    if (summary.totalExposureSeconds <= 0 || this.isSuppressed(now)) return null;
    return this.build(now, assessment, {
      type: 'summary',
      title: 'Sun Exposure Summary',
      body: `You spent ${formatDuration(summary.totalExposureSeconds)} in the sun with UV index up to ${summary.maxUVIndex}.`,
      priority: 'low',
    });
  }

  private build(
    now: number,
    assessment: RiskAssessment | null,
    content: Pick<SmartNotification, 'type' | 'title' | 'body' | 'priority'>,
  ): SmartNotification {
    return Object.freeze({
      id: this.createId(),
      ...content,
      sourceAssessment: assessment,
      scheduledAt: new Date(now).toISOString(),
    });
  }
}
