import type { HealthChecker } from '../ports.js';
import type { HealthCheckResult, ReadinessResponse } from '../types.js';

export interface GetReadinessDeps {
  checkers: HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

type ReadinessStatus = ReadinessResponse['status'];

/**
 * Runs one checker and stamps its latency when the checker did not.
 * A thrown error becomes a critical unhealthy result named after its position.
 */
const runChecker = async (checker: HealthChecker, index: number): Promise<HealthCheckResult> => {
  const startedAt = Date.now();
  try {
    const result = await checker();
    return result.latencyMs !== undefined
      ? result
      : { ...result, latencyMs: Date.now() - startedAt };
  } catch (error) {
    return {
      name: `check-${String(index)}`,
      status: 'unhealthy',
      message: error instanceof Error ? error.message : 'Check failed',
      latencyMs: Date.now() - startedAt,
      critical: true,
    };
  }
};

/**
 * - Any critical unhealthy → "unhealthy" (503)
 * - Any non-critical unhealthy → "degraded" (200)
 * - All healthy → "ok" (200)
 */
const determineOverallStatus = (checks: HealthCheckResult[]): ReadinessStatus => {
  const unhealthy = checks.filter((c) => c.status === 'unhealthy');
  if (unhealthy.length === 0) {
    return 'ok';
  }
  return unhealthy.some((c) => c.critical !== false) ? 'unhealthy' : 'degraded';
};

/**
 * Use case to determine service readiness.
 * Executes all health checkers in parallel and aggregates the results.
 */
export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const { checkers, version } = deps;
  const { uptime, timestamp } = input;

  const checks = await Promise.all(checkers.map((checker, index) => runChecker(checker, index)));

  return {
    status: determineOverallStatus(checks),
    timestamp,
    uptime,
    checks,
    ...(version !== undefined && { version }),
  };
}
