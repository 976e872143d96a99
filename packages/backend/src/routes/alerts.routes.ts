/**
 * Alerts API Routes
 *
 * - GET /alerts.json     合并后的告警分组、标签统计与上游汇总
 * - GET /upstreams.json  上游汇总
 *
 * 每个请求开始时读取一次配置快照，整个请求使用同一快照
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { AlertmanagerAPISummary, AlertsResponse, ApiResponse } from '@alertdeck/shared';
import type { AppDependencies } from '../app';
import { buildAlertsView } from '../services/alerts-view.service';
import { aggregateUpstreams } from '../core/upstream-aggregator';
import { getRequestLogger } from '../logger/http';

/**
 * q 可重复出现：?q=severity=critical&q=team=ops
 */
const alertsQuerySchema = z
  .object({
    q: z
      .union([z.string(), z.array(z.string())])
      .optional()
      .transform((val) => (val === undefined ? [] : Array.isArray(val) ? val : [val])),
  })
  .passthrough();

export function createAlertsRouter({ registry, configStore }: AppDependencies): Router {
  const router = Router();

  /**
   * GET /alerts.json?q=...&sortOrder=label&sortReverse=0&sortLabel=severity
   */
  router.get('/alerts.json', (req: Request, res: Response) => {
    const { q, sortOrder, sortReverse, sortLabel } = alertsQuerySchema.parse(req.query);
    const view = buildAlertsView({
      upstreams: registry.list(),
      config: configStore.current(),
      query: { q, sortOrder, sortReverse, sortLabel },
      log: getRequestLogger(req),
    });

    const body: ApiResponse<AlertsResponse> = { success: true, data: view };
    res.json(body);
  });

  /**
   * GET /upstreams.json
   */
  router.get('/upstreams.json', (req: Request, res: Response) => {
    const body: ApiResponse<AlertmanagerAPISummary> = {
      success: true,
      data: aggregateUpstreams(registry.list(), getRequestLogger(req)),
    };
    res.json(body);
  });

  return router;
}
