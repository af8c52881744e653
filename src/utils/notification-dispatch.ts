import fs from 'node:fs';
import path from 'node:path';
import type { RiskLevel } from './risk.js';
import type { NotificationType, SmartNotification } from './notification-policy.js';
import { DEFAULT_FETCH_HEADERS, type FetchWithTimeout } from './http-client.js';
import { parseIsoTimeToMs } from './time.js';

export interface DispatchRequest {
  identifier: string;
  title: string;
  body: string;
  userInfo: {
    notificationType: NotificationType;
    riskLevel: RiskLevel | null;
    adjustedUV: number;
  };
}

export interface NotificationDispatcher {
  dispatch(request: DispatchRequest): Promise<void>;
}

export const toDispatchRequest = (notification: SmartNotification): DispatchRequest => {
  const scheduledMs = parseIsoTimeToMs(notification.scheduledAt) ?? Date.now();
  return {
    identifier: `smart_notification_${scheduledMs}_${notification.id}`,
    title: notification.title,
    body: notification.body,
    userInfo: {
      notificationType: notification.type,
      riskLevel: notification.sourceAssessment?.riskLevel ?? null,
      adjustedUV: notification.sourceAssessment?.adjustedUVIndex ?? 0,
    },
  };
};

export const createLogDispatcher = (): NotificationDispatcher => ({
  async dispatch(request) {
    console.log(`[notifications] ${request.identifier} ${request.title}: ${request.body}`);
  },
});

interface WebhookDispatcherOptions {
  url: string;
  fetchWithTimeout: FetchWithTimeout;
}

export const createWebhookDispatcher = ({ url, fetchWithTimeout }: WebhookDispatcherOptions): NotificationDispatcher => ({
  async dispatch(request) {
    const response = await fetchWithTimeout(url, {
      method: 'POST',
      headers: { ...DEFAULT_FETCH_HEADERS, 'Content-Type': 'application/json' },
      body: JSON.stringify(request),
    });
    if (!response.ok) {
      throw new Error(`Webhook responded ${response.status} ${response.statusText}`.trim());
    }
  },
});

export interface NotificationHistoryEntry {
  timestamp: string;
  sessionId: string;
  delivered: boolean;
  error: string | null;
  request: DispatchRequest;
}

interface NotificationHistoryOptions {
  maxEntries?: number;
  filePath?: string | null;
}

const DEFAULT_MAX_HISTORY_ENTRIES = 500;

const isHistoryEntry = (value: unknown): value is NotificationHistoryEntry => {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'timestamp' in value && typeof value.timestamp === 'string'
    && 'sessionId' in value && typeof value.sessionId === 'string'
    && 'delivered' in value && typeof value.delivered === 'boolean'
    && 'request' in value && typeof value.request === 'object' && value.request !== null
  );
};

/**
 * Bounded record of dispatched notifications, optionally mirrored to an
 * ndjson file that is reloaded on startup and rewritten whenever an entry
 * is evicted, so it never holds more than `maxEntries` lines.
 */
export class NotificationHistory {
  private readonly entries: NotificationHistoryEntry[] = [];
  private readonly maxEntries: number;
  private readonly filePath: string | null;

  constructor({ maxEntries = DEFAULT_MAX_HISTORY_ENTRIES, filePath = null }: NotificationHistoryOptions = {}) {
    this.maxEntries = Math.max(1, maxEntries);
    this.filePath = filePath ? path.resolve(filePath) : null;
    this.load();
  }

  record(entry: Omit<NotificationHistoryEntry, 'timestamp'>, at: number = Date.now()): NotificationHistoryEntry {
    const record: NotificationHistoryEntry = { ...entry, timestamp: new Date(at).toISOString() };
    const evicted = this.entries.length >= this.maxEntries;
    if (evicted) this.entries.shift();
    this.entries.push(record);
    if (!this.filePath) return record;
    if (evicted) {
      this.rewriteFile();
      return record;
    }
    try {
      fs.appendFileSync(this.filePath, JSON.stringify(record) + '\n', 'utf8');
    } catch (error) {
      console.error('[notifications] history append failed:', error instanceof Error ? error.message : error);
    }
    return record;
  }

  list(sessionId?: string): NotificationHistoryEntry[] {
    const matching = sessionId ? this.entries.filter((entry) => entry.sessionId === sessionId) : this.entries;
    return [...matching].reverse();
  }

  get size(): number {
    return this.entries.length;
  }

  // The file mirrors `entries` exactly after every eviction.
  private rewriteFile(): void {
    if (!this.filePath) return;
    try {
      const content = this.entries.length ? this.entries.map((entry) => JSON.stringify(entry)).join('\n') + '\n' : '';
      fs.writeFileSync(this.filePath, content, 'utf8');
    } catch (error) {
      console.error('[notifications] history rewrite failed:', error instanceof Error ? error.message : error);
    }
  }

  private load(): void {
    if (!this.filePath) return;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      if (!fs.existsSync(this.filePath)) return;
      const lines = fs.readFileSync(this.filePath, 'utf8').split('\n').filter(Boolean);
      const parsed = lines.flatMap((line): NotificationHistoryEntry[] => {
        try {
          const value: unknown = JSON.parse(line);
          return isHistoryEntry(value) ? [value] : [];
        } catch {
          return [];
        }
      });
      this.entries.push(...parsed.slice(-this.maxEntries));
      if (this.entries.length !== lines.length) this.rewriteFile();
    } catch (error) {
      console.error('[notifications] history load failed:', error instanceof Error ? error.message : error);
    }
  }
}
