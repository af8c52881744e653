export const parseIsoTimeToMs = (value: string | null | undefined): number | null => {
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }

  const trimmed = value.trim();
  const withTimezone = /([zZ]|[+\-]\d{2}:\d{2})$/.test(trimmed);
  const parsed = Date.parse(withTimezone ? trimmed : `${trimmed}Z`);
  return Number.isFinite(parsed) ? parsed : null;
};

export const parseClock = (value: string | null | undefined): string | null => {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  const match = trimmed.match(/^([01]\d|2[0-3]):([0-5]\d)$/);
  if (!match) return null;
  return `${match[1]}:${match[2]}`;
};

export const parseClockToMinutes = (value: string | null | undefined): number | null => {
  const clock = parseClock(value);
  if (!clock) return null;
  const [hours, minutes] = clock.split(':').map((part) => parseInt(part, 10));
  return hours * 60 + minutes;
};

export const minutesOfDayInTimeZone = (value: Date | number, timeZone: string | null = null): number | null => {
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    return null;
  }
  try {
    const formatter = new Intl.DateTimeFormat('en-US', {
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
      ...(timeZone ? { timeZone } : {}),
    });
    const parts = formatter.formatToParts(date);
    const hour = Number(parts.find((part) => part.type === 'hour')?.value);
    const minute = Number(parts.find((part) => part.type === 'minute')?.value);
    return Number.isFinite(hour) && Number.isFinite(minute) ? hour * 60 + minute : null;
  } catch {
    return date.getUTCHours() * 60 + date.getUTCMinutes();
  }
};

interface ClockWindowOptions {
  at: Date | number;
  start: string;
  end: string;
  timeZone?: string | null;
}

// Windows may wrap past midnight (22:00 -> 07:00). Start is inclusive, end exclusive.
export const isWithinClockWindow = ({ at, start, end, timeZone = null }: ClockWindowOptions): boolean => {
  const startMinutes = parseClockToMinutes(start);
  const endMinutes = parseClockToMinutes(end);
  const current = minutesOfDayInTimeZone(at, timeZone);
  if (startMinutes === null || endMinutes === null || current === null || startMinutes === endMinutes) {
    return false;
  }
  if (startMinutes < endMinutes) {
    return current >= startMinutes && current < endMinutes;
  }
  return current >= startMinutes || current < endMinutes;
};

export const dayOfYearUtc = (value: Date | number): number => {
  const date = value instanceof Date ? value : new Date(value);
  const startOfYear = Date.UTC(date.getUTCFullYear(), 0, 1);
  const startOfDay = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
  return Math.floor((startOfDay - startOfYear) / (24 * 60 * 60 * 1000)) + 1;
};

export const formatDuration = (totalSeconds: number): string => {
  if (!Number.isFinite(totalSeconds)) {
    return 'unlimited';
  }
  const seconds = Math.max(0, Math.round(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const remainder = seconds % 60;
  if (hours > 0) {
    return `${hours}h ${minutes}m`;
  }
  if (minutes > 0) {
    return remainder > 0 ? `${minutes}m ${remainder}s` : `${minutes}m`;
  }
  return `${remainder}s`;
};
