import http from 'http';
import { env } from './config/env';
import { ConfigStore, loadConfig } from './config/app-config';
import { createApp } from './app';
import { UpstreamRegistry } from './upstream/upstream-registry';
import { runPollCycle, startUpstreamPollWorker, stopUpstreamPollWorker } from './workers/upstream-poll.worker';
import { startupLogger } from './logger';

// 保存HTTP服务器实例，用于优雅关闭
let httpServer: http.Server | null = null;

// 关闭超时时间（毫秒）
const SHUTDOWN_TIMEOUT = 10000;

async function startServer() {
  try {
    const configStore = new ConfigStore(loadConfig(env));
    const config = configStore.current();

    if (config.alertmanager.servers.length === 0) {
      startupLogger.warn('No upstream configured, set CONFIG_FILE or ALERTMANAGER_URI');
    }

    // 上游列表在启动时确定，配置热加载只替换排序与过滤等读取型设置
    const registry = UpstreamRegistry.fromConfig(config);

    // 首次刷新完成后再开始接受请求
    await runPollCycle(registry);
    startUpstreamPollWorker(registry, config.alertmanager.interval);

    const app = createApp({ registry, configStore }, { corsOrigin: env.CORS_ORIGIN });

    httpServer = app.listen(env.PORT, env.HOST, () => {
      startupLogger.info(
        { host: env.HOST, port: env.PORT, env: env.NODE_ENV, upstreams: registry.size },
        'Server running',
      );
    });

    // SIGHUP 重新加载配置
    process.on('SIGHUP', () => {
      try {
        configStore.reload(() => loadConfig(env));
        startupLogger.info('Configuration reloaded');
      } catch (error) {
        startupLogger.error({ err: error }, 'Configuration reload failed, keeping previous config');
      }
    });
  } catch (error) {
    startupLogger.error({ err: error }, 'Server startup failed');
    process.exit(1);
  }
}

// 优雅关闭处理函数
async function gracefulShutdown(signal: string, exitCode: number = 0) {
  startupLogger.info({ signal, exitCode }, 'Received signal, shutting down gracefully');

  const shutdownTimeout = setTimeout(() => {
    startupLogger.error({ timeout: SHUTDOWN_TIMEOUT }, 'Graceful shutdown timed out, forcing exit');
    process.exit(exitCode || 1);
  }, SHUTDOWN_TIMEOUT);
  // 确保超时计时器不阻止进程退出
  shutdownTimeout.unref();

  stopUpstreamPollWorker();

  const server = httpServer;
  if (server) {
    try {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeIdleConnections();
      });
      startupLogger.info('HTTP server closed successfully');
    } catch (error) {
      startupLogger.error({ err: error }, 'Error closing HTTP server');
      exitCode = exitCode || 1;
    }
  }

  process.exit(exitCode);
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  startupLogger.error({ err: reason }, 'Unhandled promise rejection');
});

void startServer();
