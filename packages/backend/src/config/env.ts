/**
 * 后端环境变量配置
 *
 * 使用 Zod 进行运行时验证，确保环境变量的类型安全和完整性
 * 所有环境变量都通过此文件统一访问，避免直接使用 process.env
 */

import { config } from 'dotenv';
import { z } from 'zod';
import { startupLogger } from '../logger';

// 加载 .env 文件
config();

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((val) => val === 'true' || val === '1');

/**
 * 环境变量 Schema 定义
 */
export const envSchema = z.object({
  // ============================================
  // 服务器配置
  // ============================================
  PORT: z
    .string()
    .default('8080')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive().max(65535, 'PORT must be within 1-65535')),

  HOST: z.string().default('0.0.0.0'),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  CORS_ORIGIN: z.string().default('*'),

  // ============================================
  // 日志配置
  // ============================================
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // ============================================
  // 应用配置文件
  // ============================================
  CONFIG_FILE: z.string().default('alertdeck.json'),

  // ============================================
  // 单上游快速配置（无配置文件时使用）
  // ============================================
  ALERTMANAGER_URI: z.string().url('ALERTMANAGER_URI must be a valid URL').optional(),
  ALERTMANAGER_NAME: z.string().min(1).default('default'),
  ALERTMANAGER_PROXY: booleanFlag('false'),
  ALERTMANAGER_INTERVAL: z
    .string()
    .default('60')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive()),
  ALERTMANAGER_TIMEOUT_MS: z
    .string()
    .default('10000')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive()),
});

/**
 * 环境变量类型
 */
export type Env = z.infer<typeof envSchema>;

/**
 * 验证并解析环境变量
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  try {
    return envSchema.parse({
      PORT: source.PORT,
      HOST: source.HOST,
      NODE_ENV: source.NODE_ENV,
      CORS_ORIGIN: source.CORS_ORIGIN,
      LOG_LEVEL: source.LOG_LEVEL,
      CONFIG_FILE: source.CONFIG_FILE,
      ALERTMANAGER_URI: source.ALERTMANAGER_URI || undefined,
      ALERTMANAGER_NAME: source.ALERTMANAGER_NAME,
      ALERTMANAGER_PROXY: source.ALERTMANAGER_PROXY,
      ALERTMANAGER_INTERVAL: source.ALERTMANAGER_INTERVAL,
      ALERTMANAGER_TIMEOUT_MS: source.ALERTMANAGER_TIMEOUT_MS,
    });
  } catch (error) {
    if (error instanceof z.ZodError) {
      startupLogger.error('Environment validation failed:');
      error.errors.forEach((err) => {
        startupLogger.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      throw new Error('Invalid environment configuration, check your .env file');
    }
    throw error;
  }
}

/**
 * 导出验证后的环境变量
 *
 * @example
 * ```ts
 * import { env } from './config/env';
 *
 * startupLogger.info(`Listening on ${env.HOST}:${env.PORT}`);
 * ```
 */
export const env = parseEnv(process.env);
