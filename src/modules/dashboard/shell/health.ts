import type { DashboardFacade } from './service/dashboard-facade.js';
import type { HealthChecker } from '../../health/index.js';

/**
 * Readiness check: healthy once a snapshot has been published. A failed
 * refresh on top of a good snapshot is reported but does not fail readiness.
 */
export const makeSnapshotHealthChecker =
  (facade: DashboardFacade): HealthChecker =>
  async () => {
    const snapshot = facade.getSnapshot();
    const lastError = facade.getLastError();

    if (snapshot === null) {
      return {
        name: 'dashboard-snapshot',
        status: 'unhealthy',
        message:
          lastError === null
            ? 'No snapshot loaded yet'
            : `No snapshot loaded: ${lastError.error.message}`,
      };
    }

    return {
      name: 'dashboard-snapshot',
      status: 'healthy',
      message:
        lastError === null
          ? `Snapshot from ${snapshot.generatedAt}`
          : `Serving snapshot from ${snapshot.generatedAt}; last refresh failed: ${lastError.error.type}`,
    };
  };
