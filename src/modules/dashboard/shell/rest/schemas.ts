/**
 * Dashboard REST API - TypeBox Schemas
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';

const Nullable = <T extends TSchema>(schema: T) =>
  Type.Union([schema, Type.Null()]);

// ─────────────────────────────────────────────────────────────────────────────
// Snapshot Schemas
// ─────────────────────────────────────────────────────────────────────────────

const PhysicianKpiSchema = Type.Object({
  physicianId: Type.String(),
  totalRvu: Type.Number(),
  totalPoints: Type.Number(),
  examCount: Type.Integer(),
  avgRvuPerExam: Type.Number(),
});

const ModalityDistributionSchema = Type.Object({
  modality: Type.String(),
  examCount: Type.Integer(),
  share: Type.Number({ minimum: 0, maximum: 1 }),
});

const ModalityTableSchema = Type.Record(Type.String(), ModalityDistributionSchema);

const TemporalBucketSchema = Type.Object({
  index: Type.Integer(),
  label: Type.String(),
  examCount: Type.Integer(),
  totalRvu: Type.Number(),
});

const TimeSeriesPointSchema = Type.Object({
  physicianId: Type.String(),
  month: Type.String({ description: 'YYYY-MM in the practice time zone' }),
  totalRvu: Type.Number(),
  totalPoints: Type.Number(),
  examCount: Type.Integer(),
});

const SourceSummarySchema = Type.Object({
  source: Type.String(),
  totalRows: Type.Integer(),
  loadedRows: Type.Integer(),
  excludedRows: Type.Integer(),
});

const ExclusionSchema = Type.Object({
  source: Type.String(),
  rowNumber: Type.Integer(),
  field: Type.String(),
  reason: Type.String(),
  message: Type.String(),
  value: Type.Optional(Type.String()),
});

const OverviewSchema = Type.Object({
  totalExams: Type.Integer(),
  totalRvu: Type.Number(),
  totalPoints: Type.Number(),
  physicianCount: Type.Integer(),
  firstExamAt: Nullable(Type.String({ format: 'date-time' })),
  lastExamAt: Nullable(Type.String({ format: 'date-time' })),
});

const DayProductivitySchema = Type.Object({
  physicianId: Type.String(),
  examCount: Type.Integer(),
  totalRvu: Type.Number(),
  totalPoints: Type.Number(),
});

const DailyAverageSchema = Type.Object({
  physicianId: Type.String(),
  activeDays: Type.Integer(),
  examCount: Type.Integer(),
  totalRvu: Type.Number(),
  totalPoints: Type.Number(),
  avgExamsPerDay: Type.Number(),
  avgRvuPerDay: Type.Number(),
  avgPointsPerDay: Type.Number(),
});

const DateRangeSchema = Type.Object({
  start: Type.String({ format: 'date' }),
  end: Type.String({ format: 'date' }),
});

export const DashboardSnapshotSchema = Type.Object({
  generatedAt: Type.String({ format: 'date-time' }),
  timeZone: Type.String(),
  recordCount: Type.Integer(),
  excludedCount: Type.Integer(),
  sources: Type.Array(SourceSummarySchema),
  exclusions: Type.Array(ExclusionSchema),
  overview: OverviewSchema,
  physicianKpis: Type.Record(Type.String(), PhysicianKpiSchema),
  topPhysicians: Type.Array(PhysicianKpiSchema),
  modalityDistribution: ModalityTableSchema,
  physicianModality: Type.Record(Type.String(), ModalityTableSchema),
  dayOfWeekWorkload: Type.Array(TemporalBucketSchema, { minItems: 7, maxItems: 7 }),
  hourlyWorkload: Type.Array(TemporalBucketSchema, { minItems: 24, maxItems: 24 }),
  physicianTimeSeries: Type.Array(TimeSeriesPointSchema),
  latestDay: Type.Object({
    date: Nullable(Type.String({ format: 'date' })),
    physicians: Type.Array(DayProductivitySchema),
  }),
  dailyAverages: Type.Object({
    range: Nullable(DateRangeSchema),
    physicians: Type.Array(DailyAverageSchema),
  }),
});

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const RefreshFailureSchema = Type.Object({
  type: Type.String(),
  message: Type.String(),
  failedAt: Type.String({ format: 'date-time' }),
});

export type RefreshFailureBody = Static<typeof RefreshFailureSchema>;

export const GetDashboardResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: DashboardSnapshotSchema,
  /** Set when the latest refresh failed and this snapshot is older */
  lastError: Nullable(RefreshFailureSchema),
});

export const SnapshotUnavailableResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.Literal('SnapshotUnavailable'),
  message: Type.String(),
  lastError: Nullable(RefreshFailureSchema),
});

export const DashboardStatusResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    status: Type.Union([Type.Literal('empty'), Type.Literal('ready')]),
    generatedAt: Nullable(Type.String({ format: 'date-time' })),
    recordCount: Nullable(Type.Integer()),
    lastError: Nullable(RefreshFailureSchema),
  }),
});

export const RefreshResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    generatedAt: Type.String({ format: 'date-time' }),
    recordCount: Type.Integer(),
    excludedCount: Type.Integer(),
  }),
});

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
});
