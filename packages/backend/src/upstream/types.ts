/**
 * 上游数据模型
 *
 * UpstreamHandle 是聚合引擎读取单个上游状态的只读视图，
 * 在一次聚合调用期间其快照保持不变。
 */

import type { AlertState, LabelSet } from '@alertdeck/shared';

export interface UpstreamAlert {
  fingerprint: string;
  labels: LabelSet;
  annotations: LabelSet;
  startsAt: string;
  state: AlertState;
  silencedBy: string[];
  inhibitedBy: string[];
  generatorURL: string;
}

export interface UpstreamAlertGroup {
  receiver: string;
  labels: LabelSet;
  alerts: UpstreamAlert[];
}

/**
 * 代理转发的上游响应，状态码与正文原样返回给浏览器
 */
export interface UpstreamProxyResponse {
  status: number;
  contentType: string;
  body: string;
}

/**
 * 代理路由使用的上游视图，凭据只保存在服务端
 */
export interface UpstreamProxy {
  readonly name: string;
  readonly proxyRequests: boolean;
  proxyGet(path: string): Promise<UpstreamProxyResponse>;
}

export interface UpstreamHandle {
  readonly name: string;
  /** 去除凭据后的地址 */
  readonly sanitizedUri: string;
  /** 浏览器使用的地址，代理模式下为本服务的代理路径，否则可能含凭据 */
  readonly publicUri: string;
  /** 最近一次刷新的错误，空字符串表示健康 */
  readonly error: string;
  readonly version: string;
  /** 预先计算的集群标识，未知时为空字符串 */
  readonly clusterId: string;
  readonly httpHeaders: Readonly<Record<string, string>>;
  /** 浏览器请求是否经由本服务代理 */
  readonly proxyRequests: boolean;
  clusterMemberNames(): readonly string[];
  alertGroups(): readonly UpstreamAlertGroup[];
}
