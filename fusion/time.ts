/**
 * Time utilities for local wall-clock keys without timezone offsets.
 */

export type DateParts = {
  year: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
};

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
// Accept "YYYY-MM-DDTHH:mm", the space-separated provider form, and ISO UTC ("...:ss(.sss)Z").
const DATETIME_RE = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d{1,3})?(?:Z)?$/;

function buildDateParts(
  year: number,
  month: number,
  day: number,
  hour?: number,
  minute?: number
): DateParts | null {
  if (!Number.isFinite(year) || !Number.isFinite(month) || !Number.isFinite(day)) return null;
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  if (hour !== undefined && (hour < 0 || hour > 23)) return null;
  if (minute !== undefined && (minute < 0 || minute > 59)) return null;

  return {
    year,
    month,
    day,
    hour,
    minute
  };
}

export function parseDateKey(value: string): DateParts | null {
  const match = DATE_RE.exec(value);
  if (!match) return null;
  const [year, month, day] = match.slice(1).map(Number);
  return buildDateParts(year, month, day);
}

export function parseDateTimeKey(value: string): Required<DateParts> | null {
  const match = DATETIME_RE.exec(value);
  if (!match) return null;
  const [year, month, day, hour, minute] = match.slice(1, 6).map(Number);
  const parts = buildDateParts(year, month, day, hour, minute);
  return parts ? { year, month, day, hour, minute } : null;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

function getZonedParts(date: Date, timeZone: string): Required<DateParts> | null {
  try {
    const formatter = new Intl.DateTimeFormat('en-CA', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23'
    });
    const parts = formatter.formatToParts(date);
    const values: Record<string, number> = {};
    parts.forEach((part) => {
      if (part.type !== 'literal') {
        values[part.type] = Number(part.value);
      }
    });

    if (
      !Number.isFinite(values.year) ||
      !Number.isFinite(values.month) ||
      !Number.isFinite(values.day) ||
      !Number.isFinite(values.hour) ||
      !Number.isFinite(values.minute)
    ) {
      return null;
    }

    return {
      year: values.year,
      month: values.month,
      day: values.day,
      hour: values.hour,
      minute: values.minute
    };
  } catch {
    // Unknown zone.
    return null;
  }
}

export function isValidTimeZone(timeZone: string): boolean {
  return getZonedParts(new Date(0), timeZone) !== null;
}

export function isSameDate(a: DateParts, b: DateParts): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}

export function addDays(date: DateParts, days: number): DateParts {
  const base = new Date(Date.UTC(date.year, date.month - 1, date.day));
  const next = new Date(base.getTime() + days * 24 * 60 * 60 * 1000);
  return {
    year: next.getUTCFullYear(),
    month: next.getUTCMonth() + 1,
    day: next.getUTCDate()
  };
}

export function formatDateKey(parts: DateParts): string {
  return `${parts.year}-${pad2(parts.month)}-${pad2(parts.day)}`;
}

export function formatDateTimeKey(parts: Required<DateParts>): string {
  return `${formatDateKey(parts)}T${pad2(parts.hour)}:${pad2(parts.minute)}`;
}

export function minutesOfDay(parts: Required<DateParts>): number {
  return parts.hour * 60 + parts.minute;
}

/**
 * Local date of "tomorrow" in the given zone.
 */
export function tomorrowIn(timeZone: string, now: Date = new Date()): string {
  const today = getZonedParts(now, timeZone);
  if (!today) {
    throw new Error(`Unknown time zone: ${timeZone}`);
  }
  return formatDateKey(addDays(today, 1));
}

/**
 * Convert epoch seconds into a local key for the zone.
 */
export function epochToLocalKey(epochSeconds: number, timeZone: string): string | null {
  if (!Number.isFinite(epochSeconds)) return null;
  const parts = getZonedParts(new Date(epochSeconds * 1000), timeZone);
  return parts ? formatDateTimeKey(parts) : null;
}

/**
 * Grid of local keys from startHour to endHour (inclusive) every stepHours.
 */
export function buildHourGrid(
  date: string,
  startHour: number,
  endHour: number,
  stepHours: number
): string[] {
  const day = parseDateKey(date);
  if (!day) {
    throw new Error(`Invalid date key: ${date}`);
  }
  if (!(stepHours > 0)) {
    throw new Error(`Invalid grid step: ${stepHours}`);
  }
  const grid: string[] = [];
  for (let hour = startHour; hour <= endHour; hour += stepHours) {
    grid.push(formatDateTimeKey({ year: day.year, month: day.month, day: day.day, hour, minute: 0 }));
  }
  return grid;
}
