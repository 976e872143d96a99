/**
 * Alertmanager v2 API 客户端
 *
 * - GET /api/v2/status        版本与集群信息
 * - GET /api/v2/alerts/groups 告警分组
 *
 * 响应使用 Zod 校验，地址中的凭据转换为 basic auth 请求头
 */

import axios from 'axios';
import { z } from 'zod';
import type { UpstreamAlertGroup, UpstreamProxyResponse } from './types';
import { headersForBasicAuth, joinUri, sanitizeUri } from '../utils/uri';

// ==================== 响应 Schema ====================

const labelSetSchema = z.record(z.string(), z.string()).default({});

export const statusResponseSchema = z.object({
  cluster: z
    .object({
      name: z.string().default(''),
      status: z.string().default(''),
      peers: z
        .array(z.object({ name: z.string(), address: z.string().default('') }))
        .nullish()
        .transform((peers) => peers ?? []),
    })
    .default({}),
  versionInfo: z
    .object({
      version: z.string().default(''),
    })
    .default({}),
});

const alertSchema = z.object({
  fingerprint: z.string().default(''),
  labels: labelSetSchema,
  annotations: labelSetSchema,
  startsAt: z.string().datetime({ offset: true }),
  generatorURL: z.string().default(''),
  status: z
    .object({
      state: z.enum(['active', 'suppressed', 'unprocessed']).default('unprocessed'),
      silencedBy: z.array(z.string()).nullish().transform((v) => v ?? []),
      inhibitedBy: z.array(z.string()).nullish().transform((v) => v ?? []),
    })
    .default({}),
});

export const alertGroupsResponseSchema = z.array(
  z.object({
    labels: labelSetSchema,
    receiver: z.object({ name: z.string() }),
    alerts: z.array(alertSchema).nullish().transform((v) => v ?? []),
  }),
);

// ==================== 类型 ====================

export interface UpstreamStatus {
  version: string;
  /** 本节点在集群中的名称 */
  peerName: string;
  /** 集群内所有节点名称 */
  peers: string[];
}

export interface AlertmanagerApi {
  fetchStatus(): Promise<UpstreamStatus>;
  fetchAlertGroups(): Promise<UpstreamAlertGroup[]>;
  proxyGet(path: string): Promise<UpstreamProxyResponse>;
}

export interface AlertmanagerClientOptions {
  uri: string;
  timeoutMs: number;
  headers: Readonly<Record<string, string>>;
}

/**
 * 上游请求失败
 */
export class UpstreamFetchError extends Error {
  readonly code = 'UPSTREAM_FETCH_FAILED';

  constructor(
    readonly url: string,
    message: string,
  ) {
    super(message);
    this.name = 'UpstreamFetchError';
    Object.setPrototypeOf(this, UpstreamFetchError.prototype);
  }
}

// ==================== 客户端实现 ====================

export class AlertmanagerClient implements AlertmanagerApi {
  private readonly baseUri: string;
  private readonly headers: Record<string, string>;

  constructor(private readonly options: AlertmanagerClientOptions) {
    this.baseUri = sanitizeUri(options.uri);
    this.headers = {
      ...headersForBasicAuth(options.uri),
      ...options.headers,
    };
  }

  private async get<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const url = joinUri(this.baseUri, path);
    let data: unknown;
    try {
      const response = await axios.get<unknown>(url, {
        timeout: this.options.timeoutMs,
        headers: this.headers,
      });
      data = response.data;
    } catch (error) {
      throw new UpstreamFetchError(url, error instanceof Error ? error.message : String(error));
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      const detail = !issue
        ? 'unknown error'
        : issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message;
      throw new UpstreamFetchError(url, `invalid response: ${detail}`);
    }
    return parsed.data;
  }

  async fetchStatus(): Promise<UpstreamStatus> {
    const status = await this.get('api/v2/status', statusResponseSchema);
    return {
      version: status.versionInfo.version,
      peerName: status.cluster.name,
      peers: status.cluster.peers.map((peer) => peer.name),
    };
  }

  async fetchAlertGroups(): Promise<UpstreamAlertGroup[]> {
    const groups = await this.get('api/v2/alerts/groups', alertGroupsResponseSchema);
    return groups.map((group) => ({
      receiver: group.receiver.name,
      labels: group.labels,
      alerts: group.alerts.map((alert) => ({
        fingerprint: alert.fingerprint,
        labels: alert.labels,
        annotations: alert.annotations,
        startsAt: alert.startsAt,
        state: alert.status.state,
        silencedBy: alert.status.silencedBy,
        inhibitedBy: alert.status.inhibitedBy,
        generatorURL: alert.generatorURL,
      })),
    }));
  }

  /**
   * 以服务端凭据转发 GET 请求，上游的错误状态码原样返回
   *
   * @param path 相对于上游根地址的路径，可带查询串
   */
  async proxyGet(path: string): Promise<UpstreamProxyResponse> {
    const url = joinUri(this.baseUri, path);
    try {
      const response = await axios.get<string>(url, {
        timeout: this.options.timeoutMs,
        headers: this.headers,
        responseType: 'text',
        validateStatus: () => true,
      });
      const contentType = response.headers['content-type'];
      return {
        status: response.status,
        contentType: typeof contentType === 'string' ? contentType : 'application/json',
        body: response.data,
      };
    } catch (error) {
      throw new UpstreamFetchError(url, error instanceof Error ? error.message : String(error));
    }
  }
}

export function createAlertmanagerClient(options: AlertmanagerClientOptions): AlertmanagerApi {
  return new AlertmanagerClient(options);
}
