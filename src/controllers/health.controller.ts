/**
 * Health endpoints:
 * - GET /api/v1/health - database reachability and broadcast hub stats
 * - GET /api/v1/ready - liveness, no dependencies touched
 */

import type { Request, Response } from 'express';
import { getCompositionRoot } from '../app/composition-root';
import type { BroadcastHubStats } from '../services/session-broadcast-hub.service';
import { logger } from '../utils/logger';

interface ServiceHealth {
  status: 'healthy' | 'unhealthy';
  responseTime: number;
  lastCheck: string;
  error?: string;
}

export interface SystemHealth {
  overall: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  version: string;
  environment: string;
  services: {
    database: ServiceHealth;
  };
  broadcast: BroadcastHubStats;
}

const NO_STORE = 'no-store, no-cache, must-revalidate, proxy-revalidate';

class HealthController {
  private async checkDatabaseHealth(): Promise<ServiceHealth> {
    const startTime = Date.now();
    try {
      await getCompositionRoot().getDbPort().queryOne('SELECT 1 AS ok', [], { operation: 'health_check' });
      return { status: 'healthy', responseTime: Date.now() - startTime, lastCheck: new Date().toISOString() };
    } catch (error) {
      logger.warn('health:database_unreachable', { error: error instanceof Error ? error.message : String(error) });
      return {
        status: 'unhealthy',
        responseTime: Date.now() - startTime,
        lastCheck: new Date().toISOString(),
        error: 'Database unreachable',
      };
    }
  }

  async getSystemHealth(): Promise<SystemHealth> {
    const root = getCompositionRoot();
    const database = await this.checkDatabaseHealth();
    return {
      overall: database.status,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: process.env.npm_package_version ?? '1.0.0',
      environment: root.getConfig().env,
      services: { database },
      broadcast: root.getBroadcastHub().getStats(),
    };
  }

  async getHealthCheck(_req: Request, res: Response): Promise<void> {
    const health = await this.getSystemHealth();
    res.setHeader('Cache-Control', NO_STORE);
    res.status(health.overall === 'healthy' ? 200 : 503).json({
      success: health.overall === 'healthy',
      data: health,
      timestamp: health.timestamp,
    });
  }

  getReady(_req: Request, res: Response): void {
    res.setHeader('Cache-Control', NO_STORE);
    res.json({
      status: 'ready',
      timestamp: new Date().toISOString(),
      environment: getCompositionRoot().getConfig().env,
    });
  }
}

export const healthController = new HealthController();
