import type { WeekdayIndex } from '../../../common/temporal/zoned-time.js';

/**
 * Per-physician productivity summary.
 */
export interface PhysicianKPI {
  physicianId: string;
  totalRvu: number;
  totalPoints: number;
  examCount: number;
  avgRvuPerExam: number;
}

/**
 * Mapping physician id → KPI. Carries no ordering.
 */
export type PhysicianKPITable = Record<string, PhysicianKPI>;

/**
 * Practice-wide headline figures.
 */
export interface OverviewTotals {
  totalExams: number;
  totalRvu: number;
  totalPoints: number;
  physicianCount: number;
  /** ISO instant of the earliest exam, null for an empty dataset */
  firstExamAt: string | null;
  /** ISO instant of the latest exam, null for an empty dataset */
  lastExamAt: string | null;
}

export type ModalityScope = { kind: 'global' } | { kind: 'physician'; physicianId: string };

export const GLOBAL_SCOPE: ModalityScope = { kind: 'global' };

export interface ModalityDistribution {
  modality: string;
  examCount: number;
  /** Fraction of the scope's exams, in [0, 1] */
  share: number;
}

/**
 * Mapping modality code → distribution entry within one scope.
 */
export type ModalityDistributionTable = Record<string, ModalityDistribution>;

/**
 * Physician id → that physician's modality distribution.
 */
export type PhysicianModalityTable = Record<string, ModalityDistributionTable>;

/**
 * One day-of-week or hour-of-day bucket.
 */
export interface TemporalBucket {
  index: number;
  label: string;
  examCount: number;
  totalRvu: number;
}

export interface DayOfWeekBucket extends TemporalBucket {
  index: WeekdayIndex;
}

/**
 * One physician's totals for one calendar month.
 */
export interface PhysicianTimeSeriesPoint {
  physicianId: string;
  /** YYYY-MM in the practice time zone */
  month: string;
  totalRvu: number;
  totalPoints: number;
  examCount: number;
}

/**
 * Inclusive range of calendar dates, both YYYY-MM-DD.
 */
export interface CalendarDateRange {
  start: string;
  end: string;
}

/**
 * One physician's totals on a single calendar date.
 */
export interface PhysicianDayProductivity {
  physicianId: string;
  examCount: number;
  totalRvu: number;
  totalPoints: number;
}

/**
 * Productivity on the most recent date present in the data.
 */
export interface LatestDayProductivity {
  /** YYYY-MM-DD in the practice time zone, null for an empty dataset */
  date: string | null;
  /** Highest points first */
  physicians: PhysicianDayProductivity[];
}

export interface PhysicianDailyAverage {
  physicianId: string;
  /** Dates in range with at least one exam by this physician */
  activeDays: number;
  examCount: number;
  totalRvu: number;
  totalPoints: number;
  avgExamsPerDay: number;
  avgRvuPerDay: number;
  avgPointsPerDay: number;
}

export interface PhysicianDailyAverages {
  /** Range requested, or the span of the data when none was; null when empty */
  range: CalendarDateRange | null;
  /** Highest average points first */
  physicians: PhysicianDailyAverage[];
}
