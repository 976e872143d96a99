/**
 * Alertmanager 代理路由
 *
 * GET /proxy/alertmanager/:name/api/v2/...
 *
 * 仅对配置了 proxy 的上游开放，请求以服务端保存的凭据转发，
 * 浏览器拿不到上游地址中的用户名密码
 */

import { Router, Request, Response, NextFunction } from 'express';
import type { UpstreamSource } from '../app';
import { AppError } from '../middleware/error.middleware';
import { getRequestLogger } from '../logger/http';

/** 只允许 API v2 下的普通路径段，不接受 . 和 % 以免跳出该前缀 */
const PROXIED_PATH = /^api\/v2(\/[A-Za-z0-9_-]+)+$/;

function queryString(req: Request): string {
  const index = req.originalUrl.indexOf('?');
  return index === -1 ? '' : req.originalUrl.slice(index);
}

export function createProxyRouter(registry: UpstreamSource): Router {
  const router = Router();

  router.get('/:name/*', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { name } = req.params;
      const upstream = registry.find(name);
      if (!upstream || !upstream.proxyRequests) {
        throw AppError.notFound(`No proxied upstream named "${name}"`);
      }

      // req.path 形如 /<name>/api/v2/...
      const path = req.path.split('/').slice(2).join('/');
      if (!PROXIED_PATH.test(path)) {
        throw AppError.badRequest('Only Alertmanager API v2 paths can be proxied');
      }

      const proxied = await upstream.proxyGet(`${path}${queryString(req)}`).catch((error: unknown) => {
        getRequestLogger(req).warn({ err: error, upstream: name }, 'Proxy request failed');
        throw AppError.serviceUnavailable(`Upstream "${name}" is unreachable`);
      });

      res.status(proxied.status).type(proxied.contentType).send(proxied.body);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
