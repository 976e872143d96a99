/**
 * 上游 Alertmanager 相关类型
 */

/**
 * 单个上游实例的状态记录
 * 每次聚合时根据上游实时状态重新生成，不持久化
 */
export interface AlertmanagerAPIStatus {
  name: string;
  /** 去除凭据后的地址 */
  uri: string;
  /** 浏览器直连使用的地址 */
  publicURI: string;
  headers: Record<string, string>;
  /** 空字符串表示健康 */
  error: string;
  version: string;
  cluster: string;
  clusterMembers: string[];
}

export interface AlertmanagerAPICounters {
  total: number;
  healthy: number;
  failed: number;
}

/**
 * 上游汇总
 *
 * 不变式: total = healthy + failed
 */
export interface AlertmanagerAPISummary {
  counters: AlertmanagerAPICounters;
  instances: AlertmanagerAPIStatus[];
  /** 集群指纹 -> 成员名列表 */
  clusters: Record<string, string[]>;
}
