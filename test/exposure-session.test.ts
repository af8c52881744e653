import { ExposureSession, SessionQueue, type UVReading } from '../src/utils/exposure-session.js';
import { NotificationHistory, type NotificationDispatcher } from '../src/utils/notification-dispatch.js';
import { getDefaultEngineSettings } from '../src/utils/settings.js';
import { createMemorySnapshotStore } from '../src/utils/snapshot.js';

const NOON_UTC = Date.parse('2024-06-01T12:00:00Z');

let now = NOON_UTC;
const sessions: ExposureSession[] = [];

const createSession = (options: { dispatcher?: NotificationDispatcher; environment?: unknown; reevaluationProvider?: () => Promise<UVReading | null> } = {}) => {
  const history = new NotificationHistory();
  const snapshotStore = createMemorySnapshotStore();
  const session = new ExposureSession({
    settings: getDefaultEngineSettings(),
    dispatcher: options.dispatcher ?? { dispatch: async () => undefined },
    history,
    snapshotStore,
    environment: options.environment,
    reevaluationProvider: options.reevaluationProvider,
    clock: () => now,
    random: () => 0.99,
    tickIntervalMs: 60 * 60 * 1000,
  });
  sessions.push(session);
  return { session, history, snapshotStore };
};

beforeEach(() => {
  now = NOON_UTC;
});

afterEach(async () => {
  await Promise.all(sessions.splice(0).map((session) => session.stop()));
});

test('dispatch failures are logged and recorded, never retried', async () => {
  const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  const dispatch = vi.fn(async () => {
    throw new Error('push service down');
  });
  const { session, history } = createSession({ dispatcher: { dispatch } });

  const result = await session.observeUV(8);
  expect(result.notifications.map((notification) => notification.type)).toEqual(['riskLevelChange', 'recommendation']);

  await session.whenIdle();
  expect(dispatch).toHaveBeenCalledTimes(2);
  expect(errorSpy).toHaveBeenCalledTimes(2);
  const entries = history.list(session.id);
  expect(entries.map((entry) => [entry.delivered, entry.error])).toEqual([
    [false, 'push service down'],
    [false, 'push service down'],
  ]);
});

test('out-of-order readings are ignored', async () => {
  const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  const { session } = createSession();

  const first = await session.observeUV(5, '2024-06-01T12:00:00Z');
  expect(first.accepted).toBe(true);

  const late = await session.observeUV(9, '2024-06-01T11:00:00Z');
  expect(late.accepted).toBe(false);
  expect(late.notifications).toEqual([]);
  expect(late.snapshot.uvIndex).toBe(5);
  expect(session.assessment?.baseUVIndex).toBe(5);
  expect(warnSpy).toHaveBeenCalledTimes(1);
});

test('environment adjusts the UV the timer runs on and snapshots are stored', async () => {
  const { session, snapshotStore } = createSession({
    environment: {
      altitudeMeters: 3000,
      snow: { coveragePct: 80, type: 'fresh' },
      terrain: 'arctic',
      season: { name: 'winter', dayOfYear: 15 },
    },
  });

  const { snapshot } = await session.observeUV(8);
  expect(snapshot.uvIndex).toBe(9);
  expect(snapshot.timeToBurnSeconds).toBe(20);
  expect(snapshot.riskLevel).toBe('veryHigh');
  expect(snapshotStore.read(session.id)).toEqual(snapshot);
});

test('stop flushes exposure, ends re-evaluation and emits one summary', async () => {
  const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  const { session } = createSession();
  await session.observeUV(5);
  expect((await session.start()).state).toBe('running');
  expect(session.isReevaluating).toBe(true);

  now += 10_000;
  const result = await session.stop();

  expect(result.summary).toEqual({ totalExposureSeconds: 10, maxUVIndex: 5 });
  expect(session.maxUVIndex).toBe(5);
  expect(result.notification?.type).toBe('summary');
  expect(result.notification?.body).toBe('You spent 10s in the sun with UV index up to 5.');
  expect(result.snapshot.state).toBe('paused');
  expect(session.isReevaluating).toBe(false);
  expect(session.isStopped).toBe(true);
  expect((await session.stop()).notification).toBeNull();
  expect(logSpy).toHaveBeenCalledWith(`[session] ${session.id} stopped after 10s of exposure`);
});

test('an exceeded budget raises an alert through the dispatcher', async () => {
  const { session, history } = createSession();
  await session.observeUV(12);
  await session.start();
  await session.whenIdle();

  now += 5_000;
  const snapshot = session.snapshot();
  expect(snapshot.state).toBe('exceeded');
  expect(snapshot.exposureStatus).toBe('exceeded');

  await session.whenIdle();
  const [latest] = history.list(session.id);
  expect(latest.request.title).toBe('Exposure Limit Reached');
  expect(latest.request.userInfo.notificationType).toBe('alert');
  expect(latest.delivered).toBe(true);
  expect(latest.timestamp).toBe('2024-06-01T12:00:05.000Z');
});

describe('re-evaluation', () => {
  test('concurrent callers share the run in flight', async () => {
    const provider = vi.fn(async (): Promise<UVReading | null> => ({ uvIndex: 6 }));
    const { session } = createSession({ reevaluationProvider: provider });

    const first = session.reevaluate();
    const second = session.reevaluate();
    expect(second).toBe(first);

    const result = await first;
    expect(result?.accepted).toBe(true);
    expect(result?.snapshot.uvIndex).toBe(6);
    expect(provider).toHaveBeenCalledTimes(1);

    await session.reevaluate();
    expect(provider).toHaveBeenCalledTimes(2);
  });

  test('defaults to the last known reading', async () => {
    const { session } = createSession();
    expect(await session.reevaluate()).toBeNull();

    await session.observeUV(7);
    now += 60_000;
    const result = await session.reevaluate();
    expect(result?.assessment?.baseUVIndex).toBe(7);
    expect(result?.notifications).toEqual([]);
  });
});

test('SessionQueue runs tasks in order and survives failures', async () => {
  const queue = new SessionQueue();
  const order: string[] = [];
  const failing = queue.run(async () => {
    await new Promise((resolve) => setTimeout(resolve, 10));
    order.push('first');
    throw new Error('first failed');
  });
  const following = queue.run(() => {
    order.push('second');
    return 'second';
  });

  await expect(failing).rejects.toThrow('first failed');
  await expect(following).resolves.toBe('second');
  expect(order).toEqual(['first', 'second']);
});
