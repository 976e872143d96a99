import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { ConfigStore } from './config/app-config';
import type { UpstreamHandle, UpstreamProxy } from './upstream/types';
import { httpLoggerMiddleware } from './logger/http';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { createAlertsRouter } from './routes/alerts.routes';
import { createHealthRouter } from './routes/health.routes';
import { createProxyRouter } from './routes/proxy.routes';
import { PROXY_PREFIX } from './utils/uri';

/**
 * 路由读取上游状态所需的最小接口
 */
export interface UpstreamSource {
  list(): readonly UpstreamHandle[];
  find(name: string): UpstreamProxy | undefined;
  readonly lastRefresh: string | null;
}

export interface AppDependencies {
  registry: UpstreamSource;
  configStore: ConfigStore;
}

export interface AppOptions {
  corsOrigin?: string;
}

export function createApp(deps: AppDependencies, options: AppOptions = {}): Express {
  const app = express();

  app.disable('x-powered-by');

  // 请求日志 - 前置以捕获所有请求
  app.use(httpLoggerMiddleware);

  // 纯 JSON 接口，不需要 CSP
  app.use(
    helmet({
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
      referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
    }),
  );

  app.use(
    cors({
      origin: options.corsOrigin ?? '*',
      methods: ['GET', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Request-ID'],
      exposedHeaders: ['X-Request-ID'],
      maxAge: 86400,
    }),
  );

  app.use('/health', createHealthRouter(deps.registry));
  app.use(PROXY_PREFIX, createProxyRouter(deps.registry));
  app.use('/', createAlertsRouter(deps));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
