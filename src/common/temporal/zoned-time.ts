/**
 * Calendar helpers bound to an explicit IANA time zone.
 *
 * Every calendar question (weekday, hour, month) is answered through
 * `Intl.DateTimeFormat` for one zone passed in by the caller, so the
 * process time zone never leaks into bucketing.
 */

/**
 * Checks that a time zone name is known to the runtime's ICU data.
 */
export const isValidTimeZone = (timeZone: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
};

/**
 * Weekday index used across the dashboard: 0 = Monday ... 6 = Sunday.
 */
export type WeekdayIndex = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export const WEEKDAY_LABELS = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
] as const;

const SHORT_WEEKDAY_INDEX: Record<string, WeekdayIndex> = {
  Mon: 0,
  Tue: 1,
  Wed: 2,
  Thu: 3,
  Fri: 4,
  Sat: 5,
  Sun: 6,
};

/**
 * Wall-clock fields of an instant as seen in a time zone.
 */
export interface ZonedParts {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
  /** 0-23 */
  hour: number;
  minute: number;
  second: number;
  weekday: WeekdayIndex;
}

/**
 * Wall-clock input for {@link wallClockToInstant}.
 */
export interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

const getFormatter = (timeZone: string): Intl.DateTimeFormat => {
  let formatter = formatters.get(timeZone);
  if (formatter === undefined) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      weekday: 'short',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
};

/**
 * Splits an instant into wall-clock fields for the given zone.
 * Throws a RangeError for an invalid Date or an unknown zone.
 */
export const getZonedParts = (instant: Date, timeZone: string): ZonedParts => {
  const fields: Record<string, string> = {};
  for (const part of getFormatter(timeZone).formatToParts(instant)) {
    fields[part.type] = part.value;
  }

  const weekday = SHORT_WEEKDAY_INDEX[fields['weekday'] ?? ''];
  if (weekday === undefined) {
    throw new RangeError(`Unrecognized weekday '${fields['weekday'] ?? ''}' for ${timeZone}`);
  }

  return {
    year: Number(fields['year']),
    month: Number(fields['month']),
    day: Number(fields['day']),
    hour: Number(fields['hour']),
    minute: Number(fields['minute']),
    second: Number(fields['second']),
    weekday,
  };
};

/**
 * Offset of the zone from UTC at the given instant, in milliseconds.
 */
export const getZoneOffsetMs = (instant: Date, timeZone: string): number => {
  const p = getZonedParts(instant, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return asUtc - (instant.getTime() - instant.getUTCMilliseconds());
};

/**
 * Resolves a wall-clock time in a zone to an instant. Wall-clock times
 * that fall in a DST gap or overlap map to a neighbouring valid instant.
 */
export const wallClockToInstant = (clock: WallClock, timeZone: string): Date => {
  const guess = Date.UTC(
    clock.year,
    clock.month - 1,
    clock.day,
    clock.hour,
    clock.minute,
    clock.second,
    clock.millisecond
  );

  const firstOffset = getZoneOffsetMs(new Date(guess), timeZone);
  let instant = guess - firstOffset;

  const secondOffset = getZoneOffsetMs(new Date(instant), timeZone);
  if (secondOffset !== firstOffset) {
    instant = guess - secondOffset;
  }

  return new Date(instant);
};

// ─────────────────────────────────────────────────────────────────────────────
// Calendar dates (YYYY-MM-DD)
// ─────────────────────────────────────────────────────────────────────────────

const CALENDAR_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export const toCalendarDate = (parts: Pick<ZonedParts, 'year' | 'month' | 'day'>): string =>
  [
    String(parts.year).padStart(4, '0'),
    String(parts.month).padStart(2, '0'),
    String(parts.day).padStart(2, '0'),
  ].join('-');

export const isCalendarDate = (value: string): boolean => {
  const match = CALENDAR_DATE_RE.exec(value);
  if (match === null) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1000 || month < 1 || month > 12 || day < 1) return false;

  return day <= new Date(Date.UTC(year, month, 0)).getUTCDate();
};

/**
 * Moves a calendar date by whole days. Throws a RangeError for a value
 * that is not YYYY-MM-DD.
 */
export const shiftCalendarDate = (date: string, days: number): string => {
  const match = CALENDAR_DATE_RE.exec(date);
  if (match === null) {
    throw new RangeError(`Invalid calendar date '${date}'`);
  }

  const shifted = new Date(
    Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]) + days)
  );
  return toCalendarDate({
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  });
};
