import { createDefaultEnvironment, normalizeEnvironment } from '../src/utils/environment.js';
import { NotificationPolicy, type NotificationPolicySettings } from '../src/utils/notification-policy.js';
import { assessRisk } from '../src/utils/risk.js';
import { getDefaultEngineSettings } from '../src/utils/settings.js';

const NOON_UTC = Date.parse('2024-06-01T12:00:00Z');
const neutral = createDefaultEnvironment();
const assessUV = (uv: number) => assessRisk(uv, neutral, new Date(NOON_UTC));

const createPolicy = (overrides: Partial<NotificationPolicySettings> = {}, random: () => number = () => 0.99) => {
  let now = NOON_UTC;
  let counter = 0;
  const policy = new NotificationPolicy({
    settings: { ...getDefaultEngineSettings(), ...overrides },
    random,
    clock: () => now,
    createId: () => `n${++counter}`,
  });
  return {
    policy,
    setNow: (value: number) => {
      now = value;
    },
  };
};

describe('NotificationPolicy.evaluate', () => {
  test('first high reading announces the level and the high-priority recommendation', () => {
    const { policy } = createPolicy();
    const assessment = assessUV(8);
    const notifications = policy.evaluate(assessment);

    expect(notifications.map((notification) => notification.type)).toEqual(['riskLevelChange', 'recommendation']);
    expect(notifications[0]).toEqual({
      id: 'n1',
      type: 'riskLevelChange',
      title: 'UV Risk Level Changed',
      body: 'Current UV risk is High. High UV risk - minimize sun exposure, use protection',
      priority: 'high',
      sourceAssessment: assessment,
      scheduledAt: '2024-06-01T12:00:00.000Z',
    });
    expect(notifications[1].title).toBe('Minimize Sun Exposure');
    expect(policy.lastRiskLevel).toBe('high');
    expect(policy.lastAdjustedUV).toBe(8);
  });

  test('repeating an identical reading stays quiet', () => {
    const { policy } = createPolicy();
    policy.evaluate(assessUV(8));
    expect(policy.evaluate(assessUV(8))).toEqual([]);
  });

  test('an educational tip fills the gap when nothing else fired', () => {
    const { policy } = createPolicy({}, () => 0);
    policy.evaluate(assessUV(8));
    const notifications = policy.evaluate(assessUV(8));

    expect(notifications).toHaveLength(1);
    expect(notifications[0].type).toBe('educational');
    expect(notifications[0].title).toBe('UV Safety Tip');
    expect(notifications[0].priority).toBe('medium');
    expect(notifications[0].body).toBe(
      'High UV conditions require extra protection. Remember: sunscreen, protective clothing, and shade are your best friends!',
    );
  });

  test('the minimum risk level gates only the level-change alert', () => {
    const { policy } = createPolicy({ minimumRiskLevel: 'veryHigh' });
    const notifications = policy.evaluate(assessUV(8));
    expect(notifications.map((notification) => notification.type)).toEqual(['recommendation']);
  });

  test('a level change below the UV threshold is not announced', () => {
    const { policy } = createPolicy();
    expect(policy.evaluate(assessUV(3))).toEqual([]);
    expect(policy.evaluate(assessUV(4))).toEqual([]);

    // low -> moderate with a delta of 1
    expect(policy.evaluate(assessUV(5))).toEqual([]);
    expect(policy.lastRiskLevel).toBe('moderate');

    // moderate -> high with a delta of 3
    const notifications = policy.evaluate(assessUV(8));
    expect(notifications.map((notification) => notification.type)).toEqual(['riskLevelChange', 'recommendation']);
  });

  test('quiet hours suppress output but still record the observation', () => {
    const { policy, setNow } = createPolicy({ quietHoursEnabled: true, quietHoursStart: '22:00', quietHoursEnd: '07:00' });
    setNow(Date.parse('2024-06-01T23:00:00Z'));
    expect(policy.isSuppressed()).toBe(true);
    expect(policy.evaluate(assessUV(8))).toEqual([]);
    expect(policy.lastRiskLevel).toBe('high');

    setNow(Date.parse('2024-06-02T12:00:00Z'));
    expect(policy.isSuppressed()).toBe(false);
    expect(policy.evaluate(assessUV(8))).toEqual([]);
  });

  test('disabled notifications never fire', () => {
    const { policy } = createPolicy({ notificationsEnabled: false }, () => 0);
    expect(policy.evaluate(assessUV(11))).toEqual([]);
  });

  test('environmental alerts and at most two recommendations on a material change', () => {
    const { policy } = createPolicy();
    const assessment = assessRisk(
      8,
      normalizeEnvironment({
        altitudeMeters: 3000,
        snow: { coveragePct: 80, type: 'fresh' },
        terrain: 'arctic',
        season: { name: 'winter', dayOfYear: 15 },
      }),
      new Date(NOON_UTC),
    );
    const notifications = policy.evaluate(assessment);

    expect(notifications.map((notification) => notification.type)).toEqual([
      'riskLevelChange',
      'environmentalFactor',
      'recommendation',
      'recommendation',
    ]);
    expect(notifications[0].body).toBe('Current UV risk is Very High. Very high UV risk - avoid sun exposure');
    expect(notifications[1].body).toBe('Fresh snow reflects up to 80% of UV. Wear UV-protective eyewear and apply sunscreen to exposed areas');
    expect(notifications.slice(2).map((notification) => [notification.title, notification.priority])).toEqual([
      ['Extreme UV Risk', 'critical'],
      ['High Altitude Warning', 'high'],
    ]);
  });
});

describe('timer and session notifications', () => {
  test('exceeded becomes a critical alert', () => {
    const { policy } = createPolicy();
    const notification = policy.notifyTimerEvent({ type: 'exceeded', uvIndex: 7, timeToBurnSeconds: 30, totalExposureSeconds: 30 });

    expect(notification).toMatchObject({
      type: 'alert',
      title: 'Exposure Limit Reached',
      body: 'UV 7: you have used your 30s exposure budget. Seek shade now.',
      priority: 'critical',
      sourceAssessment: null,
    });
  });

  test('sunscreen expiry becomes a reapply warning', () => {
    const { policy } = createPolicy();
    const notification = policy.notifyTimerEvent({ type: 'sunscreenExpired', appliedAt: 0, reapplyAt: 7_200_000 });
    expect(notification?.type).toBe('warning');
    expect(notification?.title).toBe('Time to Reapply Sunscreen');
  });

  test('state changes produce nothing', () => {
    const { policy } = createPolicy();
    expect(policy.notifyTimerEvent({ type: 'stateChanged', from: 'notStarted', to: 'running' })).toBeNull();
  });

  test('session summary needs some exposure', () => {
    const { policy } = createPolicy();
    expect(policy.summarizeSession({ totalExposureSeconds: 0, maxUVIndex: 9 })).toBeNull();
    expect(policy.summarizeSession({ totalExposureSeconds: 600, maxUVIndex: 9 })?.body).toBe(
      'You spent 10m in the sun with UV index up to 9.',
    );
  });
});
