/**
 * 统一日志系统 - 基线配置
 *
 * 功能:
 * - 结构化 JSON 日志输出（生产环境）
 * - 美化控制台输出（开发环境）
 * - 敏感信息自动脱敏（上游凭据、认证头）
 * - 支持子日志器创建
 */

import pino, { Logger, LoggerOptions, DestinationStream } from 'pino';

// ==================== 配置常量 ====================

/** 默认日志级别 */
const DEFAULT_LOG_LEVEL = 'info';

/** 应用名称 */
const APP_NAME = 'alertdeck';

/** 需要脱敏的字段路径 */
const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  '*.password',
  '*.token',
  '*.headers.Authorization',
  '*.headers.authorization',
  'headers.Authorization',
  'headers.authorization',
];

// ==================== 环境检测 ====================

const LOG_LEVEL = process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL;
const NODE_ENV = process.env.NODE_ENV || 'development';
const IS_PRODUCTION = NODE_ENV === 'production';
const IS_TEST = NODE_ENV === 'test';

// ==================== 序列化器 ====================

/**
 * 请求序列化器 - 脱敏敏感信息
 *
 * 注意：必须创建 headers 的浅拷贝后再修改，否则会污染原始请求对象
 */
function reqSerializer(req: pino.SerializedRequest): pino.SerializedRequest {
  if (req?.headers) {
    const headers: Record<string, string> = { ...req.headers };
    if (headers.authorization) {
      headers.authorization = '[REDACTED]';
    }
    if (headers.cookie) {
      headers.cookie = '[REDACTED]';
    }
    return { ...req, headers };
  }
  return req;
}

/**
 * 错误序列化器 - 保留完整堆栈和错误代码
 */
function errSerializer(err: Error): pino.SerializedError {
  const serialized = pino.stdSerializers.err(err);
  if ('code' in err && typeof err.code === 'string') {
    serialized.code = err.code;
  }
  return serialized;
}

/** 序列化器集合 */
export const serializers = {
  req: reqSerializer,
  err: errSerializer,
};

// ==================== 日志器配置 ====================

function buildLoggerOptions(): LoggerOptions {
  return {
    level: LOG_LEVEL,

    base: {
      app: APP_NAME,
      env: NODE_ENV,
    },

    serializers,

    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },

    formatters: {
      level(label: string) {
        return { level: label };
      },
      bindings(bindings) {
        // 生产环境保留 pid/hostname 用于多实例定位
        if (IS_PRODUCTION) {
          return bindings;
        }
        return {
          ...bindings,
          pid: undefined,
          hostname: undefined,
        };
      },
    },

    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

/**
 * 构建日志传输
 */
function buildTransport(): DestinationStream | undefined {
  // 测试环境不使用特殊传输
  if (IS_TEST) {
    return undefined;
  }

  const target: pino.TransportTargetOptions = IS_PRODUCTION
    ? { target: 'pino/file', options: { destination: 1 } }
    : {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          messageFormat: '{msg}',
        },
      };

  try {
    return pino.transport({ targets: [target] });
  } catch (err) {
    console.warn('[Logger] Failed to create transport, falling back to JSON output:', err);
    return undefined;
  }
}

// ==================== 创建日志器实例 ====================

export const logger: Logger = pino(buildLoggerOptions(), buildTransport());

// ==================== 子日志器工厂 ====================

/**
 * 子日志器绑定字段类型
 */
export interface LoggerBindings {
  /** 模块名称 */
  module?: string;
  /** 上游名称 */
  upstream?: string;
  /** 请求ID */
  requestId?: string;
  [key: string]: unknown;
}

/**
 * 创建子日志器
 *
 * @example
 * ```typescript
 * const log = createChildLogger({ module: 'upstream', upstream: 'am1' });
 * log.info({ durationMs: 12 }, 'Upstream refreshed');
 * ```
 */
export function createChildLogger(bindings: LoggerBindings = {}): Logger {
  return logger.child(bindings);
}

// ==================== 预置模块日志器 ====================

/** 启动流程日志器 */
export const startupLogger = createChildLogger({ module: 'startup' });

/** 上游客户端日志器 */
export const upstreamLogger = createChildLogger({ module: 'upstream' });

/** 服务层日志器 */
export const serviceLogger = createChildLogger({ module: 'service' });

/** Worker 日志器 */
export const workerLogger = createChildLogger({ module: 'worker' });

export type { Logger } from 'pino';
