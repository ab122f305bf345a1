// Service
export { DashboardFacade, type DashboardFacadeOptions } from './shell/service/dashboard-facade.js';
export { makeSnapshotHealthChecker } from './shell/health.js';

// Use cases
export { buildSnapshot, type BuildSnapshotInput } from './core/usecases/build-snapshot.js';
export { loadSources } from './core/usecases/load-sources.js';

// REST
export { makeDashboardRoutes, type MakeDashboardRoutesDeps } from './shell/rest/routes.js';

// Types
export {
  DEFAULT_TOP_PHYSICIAN_LIMIT,
  DEFAULT_TREND_WINDOW_DAYS,
  type DashboardSnapshot,
  type FacadeState,
  type RefreshFailure,
  type SnapshotSettings,
} from './core/types.js';

// Errors
export {
  createAggregationError,
  createUnexpectedRefreshError,
  getHttpStatusForError,
  DASHBOARD_ERROR_HTTP_STATUS,
  type AggregationError,
  type DashboardError,
  type UnexpectedRefreshError,
} from './core/errors.js';
