/**
 * Health Check Module
 * Provides health check endpoints for monitoring and deployment verification
 */

import { Request, Response, Router } from 'express';
import os from 'os';
import type { RelayHub } from './relay/relayHub';

type CheckResult = { status: 'pass' | 'fail'; message?: string };

interface HealthCheck {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  version: string;
  environment: string;
  system: {
    platform: string;
    nodeVersion: string;
    memory: {
      total: number;
      free: number;
      used: number;
      usagePercent: number;
    };
  };
  relay: {
    agents: number;
    heldMessages: number;
  };
  checks: {
    [key: string]: CheckResult;
  };
}

/**
 * Perform health checks that need nothing outside the process
 */
function performHealthChecks(hub: RelayHub): HealthCheck['checks'] {
  const checks: HealthCheck['checks'] = {};

  const totalMem = os.totalmem();
  const usedMem = totalMem - os.freemem();
  const memUsagePercent = (usedMem / totalMem) * 100;

  checks.memory = {
    status: memUsagePercent < 90 ? 'pass' : 'fail',
    message:
      memUsagePercent < 90
        ? 'Memory usage within acceptable range'
        : 'Memory usage critical',
  };

  const uptime = process.uptime();
  checks.uptime = {
    status: uptime > 0 ? 'pass' : 'fail',
    message: `Process has been running for ${Math.floor(uptime)} seconds`,
  };

  const { heldMessages } = hub.stats();
  checks.messageStore = {
    status: 'pass',
    message: `${heldMessages} messages awaiting acknowledgment`,
  };

  return checks;
}

/**
 * Create health check router
 */
export function createHealthRouter(hub: RelayHub): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    const totalMem = os.totalmem();
    const freeMem = os.freemem();
    const usedMem = totalMem - freeMem;

    const checks = performHealthChecks(hub);
    const allChecksPassed = Object.values(checks).every(
      (check) => check.status === 'pass',
    );

    const healthData: HealthCheck = {
      status: allChecksPassed ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: process.env.npm_package_version || '0.1.0',
      environment: process.env.NODE_ENV || 'development',
      system: {
        platform: os.platform(),
        nodeVersion: process.version,
        memory: {
          total: totalMem,
          free: freeMem,
          used: usedMem,
          usagePercent: (usedMem / totalMem) * 100,
        },
      },
      relay: hub.stats(),
      checks,
    };

    res.status(allChecksPassed ? 200 : 503).json(healthData);
  });

  /**
   * Liveness probe - minimal check to verify process is running
   */
  router.get('/health/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * Readiness probe - the relay is ready once the process is up and not
   * starved of memory
   */
  router.get('/health/ready', (_req: Request, res: Response) => {
    const checks = performHealthChecks(hub);
    const ready = ['memory', 'uptime'].every(
      (key) => checks[key]?.status === 'pass',
    );
    res.status(ready ? 200 : 503).json({
      status: ready ? 'ready' : 'not_ready',
      timestamp: new Date().toISOString(),
      checks,
    });
  });

  return router;
}
