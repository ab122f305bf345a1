import { Decimal } from 'decimal.js';

import { wallClockToInstant, type WallClock } from '../../../common/temporal/zoned-time.js';

export type DecimalCell =
  | { kind: 'value'; value: Decimal }
  | { kind: 'invalid' }
  | { kind: 'negative' };

const NUMERIC_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parses an RVU/points cell. Blank cells count as zero; thousands
 * separators are tolerated.
 */
export const parseDecimalCell = (raw: string | undefined): DecimalCell => {
  const text = (raw ?? '').trim().replace(/,/g, '');
  if (text === '') {
    return { kind: 'value', value: new Decimal(0) };
  }

  if (!NUMERIC_RE.test(text)) {
    return { kind: 'invalid' };
  }

  const value = new Decimal(text);
  // values a double cannot hold would surface as Infinity in the totals
  if (!value.isFinite() || !Number.isFinite(value.toNumber())) {
    return { kind: 'invalid' };
  }
  if (value.isNegative() && !value.isZero()) {
    return { kind: 'negative' };
  }

  // -0 is stored as 0
  return { kind: 'value', value: value.abs() };
};

// YYYY-MM-DD[(T| )HH:mm[:ss[.fff]]][Z|±HH[:]mm]
const ISO_RE =
  /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

// M/D/YYYY[ H:mm[:ss]][ AM|PM]
const US_RE =
  /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s*([AP]M))?)?$/i;

// Date.UTC maps years 0-99 onto 1900-1999
const MIN_YEAR = 1000;

const isValidClock = (c: WallClock): boolean => {
  if (c.year < MIN_YEAR) return false;
  if (c.month < 1 || c.month > 12 || c.day < 1) return false;
  const daysInMonth = new Date(Date.UTC(c.year, c.month, 0)).getUTCDate();
  return (
    c.day <= daysInMonth &&
    c.hour >= 0 &&
    c.hour <= 23 &&
    c.minute >= 0 &&
    c.minute <= 59 &&
    c.second >= 0 &&
    c.second <= 59
  );
};

const parseOffsetMs = (offset: string): number => {
  if (offset.toUpperCase() === 'Z') return 0;
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes) * 60_000;
};

const toMillis = (fraction: string | undefined): number =>
  fraction === undefined ? 0 : Number(fraction.slice(0, 3).padEnd(3, '0'));

const to24Hour = (hour: number, meridiem: string | undefined): number => {
  if (meridiem === undefined) return hour;
  if (hour < 1 || hour > 12) return -1;
  const pm = meridiem.toUpperCase() === 'PM';
  return (hour % 12) + (pm ? 12 : 0);
};

/**
 * Parses an exam timestamp cell into an instant.
 *
 * Timestamps with `Z` or a numeric offset are absolute. Timestamps without
 * one are wall-clock times in `timeZone`. Date-only values mean midnight.
 * Returns null when the cell is not a recognized date/time.
 */
export const parseTimestampCell = (raw: string, timeZone: string): Date | null => {
  const text = raw.trim();
  let clock: WallClock;
  let offset: string | undefined;

  const iso = ISO_RE.exec(text);
  const us = iso === null ? US_RE.exec(text) : null;

  if (iso !== null) {
    clock = {
      year: Number(iso[1]),
      month: Number(iso[2]),
      day: Number(iso[3]),
      hour: Number(iso[4] ?? 0),
      minute: Number(iso[5] ?? 0),
      second: Number(iso[6] ?? 0),
      millisecond: toMillis(iso[7]),
    };
    offset = iso[8];
  } else if (us !== null) {
    clock = {
      year: Number(us[3]),
      month: Number(us[1]),
      day: Number(us[2]),
      hour: to24Hour(Number(us[4] ?? 0), us[4] === undefined ? undefined : us[7]),
      minute: Number(us[5] ?? 0),
      second: Number(us[6] ?? 0),
      millisecond: 0,
    };
  } else {
    return null;
  }

  if (!isValidClock(clock)) {
    return null;
  }

  if (offset !== undefined) {
    const asUtc = Date.UTC(
      clock.year,
      clock.month - 1,
      clock.day,
      clock.hour,
      clock.minute,
      clock.second,
      clock.millisecond
    );
    return new Date(asUtc - parseOffsetMs(offset));
  }

  return wallClockToInstant(clock, timeZone);
};

/**
 * Trims and title-cases a physician name ("  dr. jane DOE " → "Dr. Jane Doe").
 */
export const normalizePhysicianName = (raw: string): string =>
  raw
    .trim()
    .replace(/\s+/g, ' ')
    .toLowerCase()
    .replace(/(^|[\s\-'.(])(\p{L})/gu, (_match, lead: string, letter: string) => lead + letter.toUpperCase());

export const normalizeModality = (raw: string): string => raw.trim().toUpperCase();
