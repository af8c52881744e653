import { ExposureSession, type StopResult } from './exposure-session.js';
import type { NotificationDispatcher, NotificationHistory } from './notification-dispatch.js';
import { normalizeEngineSettings, type EngineSettings } from './settings.js';
import type { SnapshotStore } from './snapshot.js';

interface SessionRegistryOptions {
  defaults: EngineSettings;
  dispatcher: NotificationDispatcher;
  history: NotificationHistory;
  snapshotStore?: SnapshotStore | null;
  maxSessions?: number;
  clock?: () => number;
  random?: () => number;
  debug?: boolean;
}

export interface CreateSessionInput {
  settings?: unknown;
  environment?: unknown;
}

export class SessionLimitError extends Error {
  constructor(limit: number) {
    super(`Session limit of ${limit} reached`);
    this.name = 'SessionLimitError';
  }
}

const DEFAULT_MAX_SESSIONS = 1000;

export class SessionRegistry {
  private readonly sessions = new Map<string, ExposureSession>();
  private readonly options: SessionRegistryOptions;
  private readonly maxSessions: number;

  constructor(options: SessionRegistryOptions) {
    this.options = options;
    this.maxSessions = options.maxSessions ?? DEFAULT_MAX_SESSIONS;
  }

  get size(): number {
    return this.sessions.size;
  }

  get history(): NotificationHistory {
    return this.options.history;
  }

  create({ settings, environment }: CreateSessionInput = {}): ExposureSession {
    if (this.sessions.size >= this.maxSessions) {
      throw new SessionLimitError(this.maxSessions);
    }
    const session = new ExposureSession({
      settings: normalizeEngineSettings(settings, this.options.defaults),
      environment,
      dispatcher: this.options.dispatcher,
      history: this.options.history,
      snapshotStore: this.options.snapshotStore ?? null,
      clock: this.options.clock,
      random: this.options.random,
      debug: this.options.debug,
    });
    this.sessions.set(session.id, session);
    return session;
  }

  get(id: string): ExposureSession | null {
    return this.sessions.get(id) ?? null;
  }

  async remove(id: string): Promise<StopResult | null> {
    const session = this.sessions.get(id);
    if (!session) return null;
    this.sessions.delete(id);
    return session.stop();
  }

  async stopAll(): Promise<void> {
    const ids = [...this.sessions.keys()];
    await Promise.all(ids.map((id) => this.remove(id)));
  }
}
