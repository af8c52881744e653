import { ExposureTimer, type TimerEvent } from '../src/utils/exposure-timer.js';

const createHarness = (options: { sunscreenReapplyIntervalSeconds?: number; onEvent?: (event: TimerEvent) => void } = {}) => {
  let now = 0;
  const events: TimerEvent[] = [];
  const timer = new ExposureTimer({
    clock: () => now,
    tickIntervalMs: 60 * 60 * 1000,
    sunscreenReapplyIntervalSeconds: options.sunscreenReapplyIntervalSeconds,
    onEvent: options.onEvent ?? ((event) => events.push(event)),
  });
  return {
    timer,
    events,
    advance: (ms: number) => {
      now += ms;
    },
  };
};

const harnesses: ExposureTimer[] = [];
const setup = (options?: Parameters<typeof createHarness>[0]) => {
  const harness = createHarness(options);
  harnesses.push(harness.timer);
  return harness;
};

afterEach(() => {
  harnesses.splice(0).forEach((timer) => timer.dispose());
});

test('start is a silent no-op without UV', () => {
  const { timer, events } = setup();
  timer.start();
  expect(timer.state).toBe('notStarted');
  expect(timer.timeToBurnSeconds).toBe(Number.POSITIVE_INFINITY);
  expect(events).toEqual([]);
});

test('a UV change while running carries over the consumed fraction of the budget', () => {
  const { timer, events, advance } = setup();
  timer.updateUVIndex(3);
  timer.start();
  advance(20_000);
  timer.updateUVIndex(9);

  expect(timer.totalExposureSeconds).toBeCloseTo(8, 10);
  expect(timer.elapsedSeconds).toBe(0);
  expect(timer.timeToBurnSeconds).toBe(20);
  expect(timer.remainingSeconds).toBeCloseTo(12, 10);
  expect(timer.advisoryMessage).toBe('UV increased to 9 - Time remaining: 12s');
  expect(events.filter((event) => event.type === 'uvChanged')).toEqual([
    { type: 'uvChanged', previousUV: 3, uvIndex: 9, remainingSeconds: 12, message: 'UV increased to 9 - Time remaining: 12s' },
  ]);

  advance(5_000);
  expect(timer.advisoryMessage).toBeNull();
});

test('running past the budget enters exceeded exactly once', () => {
  const { timer, events, advance } = setup();
  timer.updateUVIndex(7);
  timer.start();

  advance(29_000);
  timer.tick();
  expect(timer.state).toBe('running');

  advance(1_000);
  timer.tick();
  timer.tick();
  expect(timer.state).toBe('exceeded');
  expect(timer.totalExposureSeconds).toBe(30);
  expect(timer.exposureProgress).toBe(1);
  expect(events.filter((event) => event.type === 'exceeded')).toEqual([
    { type: 'exceeded', uvIndex: 7, timeToBurnSeconds: 30, totalExposureSeconds: 30 },
  ]);
});

test('exceeded holds through UV drops and user actions until reset', () => {
  const { timer, advance } = setup();
  timer.updateUVIndex(7);
  timer.start();
  advance(30_000);
  timer.tick();
  expect(timer.state).toBe('exceeded');

  timer.updateUVIndex(2);
  expect(timer.state).toBe('exceeded');
  expect(timer.timeToBurnSeconds).toBe(55);

  advance(10_000);
  timer.tick();
  timer.pause();
  timer.resume();
  timer.applySunscreen();
  expect(timer.state).toBe('exceeded');
  expect(timer.totalExposureSeconds).toBe(30);

  timer.reset();
  expect(timer.state).toBe('notStarted');
  expect(timer.totalExposureSeconds).toBe(0);
});

test('exposure never decreases across a sequence of UV changes', () => {
  const { timer, advance } = setup();
  timer.updateUVIndex(3);
  timer.start();

  const totals: number[] = [timer.totalExposureSeconds];
  for (const uv of [9, 5, 9]) {
    advance(4_000);
    timer.updateUVIndex(uv);
    totals.push(timer.totalExposureSeconds);
  }

  expect(timer.state).toBe('running');
  totals.slice(1).forEach((total, index) => {
    expect(total).toBeGreaterThanOrEqual(totals[index]);
  });
  expect(totals[1]).toBeCloseTo(1.6, 10);
  expect(totals[2]).toBeCloseTo(9.6, 10);
  expect(totals[3]).toBeCloseTo(11.6, 10);
});

test('pause freezes the total until resume', () => {
  const { timer, advance } = setup();
  timer.updateUVIndex(5);
  timer.start();
  advance(10_000);
  timer.pause();

  expect(timer.state).toBe('paused');
  expect(timer.totalExposureSeconds).toBe(10);
  advance(10_000);
  expect(timer.consumedSeconds).toBe(10);

  timer.resume();
  advance(5_000);
  expect(timer.consumedSeconds).toBe(15);
  expect(timer.remainingSeconds).toBe(25);
});

test('UV dropping to zero flushes the segment and returns to notStarted', () => {
  const { timer, events, advance } = setup();
  timer.updateUVIndex(5);
  timer.start();
  advance(10_000);
  timer.updateUVIndex(0);

  expect(timer.state).toBe('notStarted');
  expect(timer.totalExposureSeconds).toBe(10);
  expect(timer.timeToBurnSeconds).toBe(Number.POSITIVE_INFINITY);
  expect(events.filter((event) => event.type === 'stateChanged')).toEqual([
    { type: 'stateChanged', from: 'notStarted', to: 'running' },
    { type: 'stateChanged', from: 'running', to: 'paused' },
    { type: 'stateChanged', from: 'paused', to: 'notStarted' },
  ]);

  timer.start();
  expect(timer.state).toBe('notStarted');
});

test('sunscreen expiry pauses the timer without resuming it', () => {
  const { timer, events, advance } = setup({ sunscreenReapplyIntervalSeconds: 60 });
  timer.updateUVIndex(5);
  timer.start();
  advance(5_000);
  timer.applySunscreen();

  expect(timer.state).toBe('sunscreenApplied');
  expect(timer.totalExposureSeconds).toBe(5);
  expect(timer.sunscreenRemainingSeconds).toBe(60);

  advance(60_000);
  timer.tick();
  expect(timer.state).toBe('paused');
  expect(timer.sunscreenStatus).toBeNull();
  expect(timer.totalExposureSeconds).toBe(5);
  expect(events.filter((event) => event.type === 'sunscreenExpired')).toEqual([
    { type: 'sunscreenExpired', appliedAt: 5_000, reapplyAt: 65_000 },
  ]);
});

test('cancelling the sunscreen timer pauses', () => {
  const { timer } = setup();
  timer.updateUVIndex(5);
  timer.start();
  timer.applySunscreen();
  timer.cancelSunscreenTimer();

  expect(timer.state).toBe('paused');
  expect(timer.sunscreenStatus).toBeNull();
});

test('reset clears exposure but keeps the current UV', () => {
  const { timer, advance } = setup();
  timer.updateUVIndex(5);
  timer.start();
  advance(12_000);
  timer.reset();

  expect(timer.state).toBe('notStarted');
  expect(timer.totalExposureSeconds).toBe(0);
  expect(timer.currentUVIndex).toBe(5);
  expect(timer.isTicking).toBe(false);
});

test('dispose flushes the running segment and cancels the tick', () => {
  const { timer, advance } = setup();
  timer.updateUVIndex(5);
  timer.start();
  expect(timer.isTicking).toBe(true);

  advance(7_000);
  timer.dispose();
  expect(timer.isTicking).toBe(false);
  expect(timer.state).toBe('paused');
  expect(timer.totalExposureSeconds).toBe(7);

  timer.resume();
  expect(timer.state).toBe('paused');
});

test('dispose drops a pending sunscreen countdown', () => {
  const { timer, events, advance } = setup({ sunscreenReapplyIntervalSeconds: 60 });
  timer.updateUVIndex(5);
  timer.start();
  timer.applySunscreen();
  timer.dispose();

  expect(timer.state).toBe('paused');
  expect(timer.sunscreenStatus).toBeNull();
  advance(30_000);
  expect(timer.sunscreenRemainingSeconds).toBe(0);
  advance(60_000);
  timer.tick();
  expect(events.filter((event) => event.type === 'sunscreenExpired')).toEqual([]);
});

test('a throwing listener is logged and does not break the timer', () => {
  const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  const { timer } = setup({
    onEvent: () => {
      throw new Error('listener failed');
    },
  });
  timer.updateUVIndex(5);
  timer.start();

  expect(timer.state).toBe('running');
  expect(errorSpy).toHaveBeenCalledWith('[exposure-timer] event listener failed:', expect.any(Error));
});
