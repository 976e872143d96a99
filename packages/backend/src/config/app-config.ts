/**
 * 应用配置
 *
 * 配置来源：
 * 1. CONFIG_FILE 指向的 JSON 文件（优先）
 * 2. 未找到文件时由 ALERTMANAGER_URI 等环境变量合成单上游配置
 *
 * 配置对象在加载后深度冻结，请求期间只读。
 * 重新加载时整体替换快照，而不是原地修改字段。
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Env } from './env';
import { startupLogger } from '../logger';
import { intervalToCron, INTERVAL_HINT } from '../utils/schedule';

// ==================== Schema 定义 ====================

const headersSchema = z.record(z.string(), z.string()).default({});

export const upstreamServerSchema = z.object({
  name: z.string().min(1, 'server name is required'),
  uri: z.string().url('server uri must be a valid URL'),
  externalUri: z.string().url('externalUri must be a valid URL').optional(),
  timeoutMs: z.number().int().positive().optional(),
  proxy: z.boolean().default(false),
  headers: headersSchema,
});

export const sortingSchema = z
  .object({
    order: z.enum(['default', 'startsAt', 'label']).default('startsAt'),
    reverse: z.boolean().default(true),
    label: z.string().default('alertname'),
    customValues: z
      .object({
        labels: z.record(z.string(), z.record(z.string(), z.string())).default({}),
      })
      .default({}),
  })
  .default({});

export const appConfigSchema = z.object({
  alertmanager: z
    .object({
      /** 轮询间隔（秒） */
      interval: z
        .number()
        .int()
        .positive()
        .refine((seconds) => intervalToCron(seconds) !== null, INTERVAL_HINT)
        .default(60),
      timeoutMs: z.number().int().positive().default(10000),
      servers: z
        .array(upstreamServerSchema)
        .default([])
        .superRefine((servers, ctx) => {
          const seen = new Set<string>();
          servers.forEach((server, index) => {
            if (seen.has(server.name)) {
              ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `duplicated server name "${server.name}"`,
                path: [index, 'name'],
              });
            }
            seen.add(server.name);
          });
        }),
    })
    .default({}),
  grid: z
    .object({
      sorting: sortingSchema,
    })
    .default({}),
  filters: z
    .object({
      default: z.array(z.string()).default([]),
    })
    .default({}),
});

export type AppConfigInput = z.input<typeof appConfigSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;
export type UpstreamServerConfig = z.infer<typeof upstreamServerSchema>;

// ==================== 只读快照 ====================

export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type ConfigSnapshot = DeepReadonly<AppConfig>;
export type SortingConfig = ConfigSnapshot['grid']['sorting'];

/** label 名 -> (原值 -> 替换值) */
export type LabelValueOverrides = SortingConfig['customValues']['labels'];

function deepFreeze<T>(value: T): DeepReadonly<T>;
function deepFreeze(value: unknown): unknown {
  if (value !== null && typeof value === 'object') {
    Object.values(value).forEach((child) => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
}

/**
 * 校验并冻结配置
 */
export function buildConfig(input: unknown): ConfigSnapshot {
  return deepFreeze(appConfigSchema.parse(input));
}

// ==================== 加载 ====================

/**
 * 由环境变量合成单上游配置
 */
function configFromEnv(env: Env): AppConfigInput {
  return {
    alertmanager: {
      interval: env.ALERTMANAGER_INTERVAL,
      timeoutMs: env.ALERTMANAGER_TIMEOUT_MS,
      servers: env.ALERTMANAGER_URI
        ? [
            {
              name: env.ALERTMANAGER_NAME,
              uri: env.ALERTMANAGER_URI,
              proxy: env.ALERTMANAGER_PROXY,
            },
          ]
        : [],
    },
  };
}

/**
 * 加载配置文件，文件不存在时回退到环境变量
 */
export function loadConfig(env: Env): ConfigSnapshot {
  const filePath = path.resolve(env.CONFIG_FILE);

  if (!fs.existsSync(filePath)) {
    startupLogger.info({ filePath }, 'Config file not found, using environment variables');
    return buildConfig(configFromEnv(env));
  }

  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  const snapshot = buildConfig(raw);
  startupLogger.info(
    { filePath, servers: snapshot.alertmanager.servers.map((s) => s.name) },
    'Config file loaded',
  );
  return snapshot;
}

// ==================== 配置存储 ====================

/**
 * 持有当前配置快照
 *
 * 调用方在请求开始时读取一次 current()，并在整个请求中使用同一快照
 */
export class ConfigStore {
  private snapshot: ConfigSnapshot;

  constructor(initial: ConfigSnapshot) {
    this.snapshot = initial;
  }

  current(): ConfigSnapshot {
    return this.snapshot;
  }

  /**
   * 原子替换为新快照
   */
  install(next: ConfigSnapshot): void {
    this.snapshot = next;
  }

  /**
   * 重新读取并安装配置，校验失败时保留旧快照并抛出错误
   */
  reload(loader: () => ConfigSnapshot): ConfigSnapshot {
    const next = loader();
    this.install(next);
    return next;
  }
}
