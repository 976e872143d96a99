/**
 * 健康检查路由
 *
 * 提供 Kubernetes 风格的健康检查端点:
 * - /health       汇总状态（含上游计数）
 * - /health/live  存活检查 (Liveness Probe)
 * - /health/ready 就绪检查 (Readiness Probe)，首次刷新完成前返回 503
 */

import { Router, Request, Response } from 'express';
import type { AlertmanagerAPICounters } from '@alertdeck/shared';
import type { UpstreamSource } from '../app';
import { aggregateUpstreams } from '../core/upstream-aggregator';
import { APP_VERSION } from '../services/alerts-view.service';

// ============================================
// 类型定义
// ============================================

interface HealthStatus {
  status: 'healthy' | 'unhealthy' | 'degraded';
  timestamp: string;
  uptime: number;
  version: string;
}

interface HealthResponse extends HealthStatus {
  upstreams: AlertmanagerAPICounters;
  lastRefresh: string | null;
}

interface LivenessResponse extends HealthStatus {
  checks: {
    process: boolean;
    memory: boolean;
  };
}

// ============================================
// 辅助函数
// ============================================

const processStartTime = Date.now();

function uptimeSeconds(): number {
  return Math.floor((Date.now() - processStartTime) / 1000);
}

/**
 * 检查内存使用是否在安全范围内
 * 默认阈值: 堆内存使用不超过 90%
 */
function checkMemoryHealth(threshold = 0.9): boolean {
  const { heapUsed, heapTotal } = process.memoryUsage();
  return heapTotal === 0 || heapUsed / heapTotal < threshold;
}

function baseStatus(status: HealthStatus['status']): HealthStatus {
  return {
    status,
    timestamp: new Date().toISOString(),
    uptime: uptimeSeconds(),
    version: APP_VERSION,
  };
}

// ============================================
// 路由处理
// ============================================

export function createHealthRouter(registry: UpstreamSource): Router {
  const router = Router();

  /**
   * GET /health
   *
   * 全部上游失败时返回 503，部分失败返回 degraded
   */
  router.get('/', (_req: Request, res: Response) => {
    const { counters } = aggregateUpstreams(registry.list());
    let status: HealthStatus['status'] = 'healthy';
    if (counters.total > 0 && counters.failed === counters.total) {
      status = 'unhealthy';
    } else if (counters.failed > 0) {
      status = 'degraded';
    }

    const body: HealthResponse = {
      ...baseStatus(status),
      upstreams: counters,
      lastRefresh: registry.lastRefresh,
    };
    res.status(status === 'unhealthy' ? 503 : 200).json(body);
  });

  /**
   * GET /health/live
   */
  router.get('/live', (_req: Request, res: Response) => {
    const memoryHealthy = checkMemoryHealth();
    const body: LivenessResponse = {
      ...baseStatus(memoryHealthy ? 'healthy' : 'degraded'),
      checks: {
        process: process.pid > 0,
        memory: memoryHealthy,
      },
    };
    res.status(200).json(body);
  });

  /**
   * GET /health/ready
   */
  router.get('/ready', (_req: Request, res: Response) => {
    const ready = registry.lastRefresh !== null;
    res.status(ready ? 200 : 503).json({
      ...baseStatus(ready ? 'healthy' : 'unhealthy'),
      lastRefresh: registry.lastRefresh,
    });
  });

  return router;
}
