/**
 * =============================================================================
 * HEALTH CHECK ROUTES - Production Monitoring Endpoints
 * =============================================================================
 *
 * Served on a small HTTP side-car next to the gRPC listener, for load
 * balancers and orchestrators that probe over HTTP.
 *
 * ENDPOINTS:
 * - GET /health          - Quick health check
 * - GET /health/live     - Liveness probe (is the process running?)
 * - GET /health/ready    - Readiness probe (features loaded + gRPC bound?)
 * - GET /metrics         - Prometheus metrics
 *
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { metricsHandler } from '../monitoring/metrics.service';

/**
 * Named readiness checks; every one must pass for the service to be ready
 */
export type ReadinessChecks = Record<string, () => boolean>;

export interface ReadinessReport {
  ready: boolean;
  checks: Record<string, boolean>;
}

/**
 * Evaluate readiness checks. A check that throws counts as failed.
 */
export function evaluateReadiness(checks: ReadinessChecks): ReadinessReport {
  const results: Record<string, boolean> = {};

  for (const [name, check] of Object.entries(checks)) {
    try {
      results[name] = check();
    } catch {
      results[name] = false;
    }
  }

  return {
    ready: Object.values(results).every(Boolean),
    checks: results,
  };
}

export function createHealthRoutes(checks: ReadinessChecks): Router {
  const router = Router();

  // Track server start time
  const startTime = Date.now();

  /**
   * Basic health check
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString()
    });
  });

  /**
   * Liveness probe - is the process alive?
   */
  router.get('/health/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      pid: process.pid,
      uptime: Math.floor((Date.now() - startTime) / 1000)
    });
  });

  /**
   * Readiness probe - can the service accept calls?
   */
  router.get('/health/ready', (_req: Request, res: Response) => {
    const report = evaluateReadiness(checks);

    res.status(report.ready ? 200 : 503).json({
      status: report.ready ? 'ready' : 'not_ready',
      checks: report.checks,
      timestamp: new Date().toISOString()
    });
  });

  /**
   * Prometheus metrics
   */
  router.get('/metrics', metricsHandler);

  return router;
}
