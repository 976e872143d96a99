/**
 * 上游聚合
 *
 * 对已经拉取完成的上游状态做一次单线程汇总：
 * - 实例列表保持输入顺序
 * - 集群按成员指纹去重，先到先得
 * - 统计总数、健康数、失败数
 *
 * 单个上游的指纹计算失败只记录日志，不影响其余上游，
 * 该实例仍出现在实例列表中，只是不登记集群。
 */

import type { AlertmanagerAPIStatus, AlertmanagerAPISummary } from '@alertdeck/shared';
import type { UpstreamHandle } from '../upstream/types';
import { clusterFingerprint } from './cluster-fingerprint';
import { headersForBasicAuth } from '../utils/uri';
import { serviceLogger, Logger } from '../logger';

/**
 * 生成下发给浏览器的请求头
 *
 * 经由本服务代理时不下发任何认证信息；
 * 否则先放入地址中的 basic auth，再由上游自定义请求头覆盖同名键
 */
export function upstreamHeaders(upstream: UpstreamHandle): Record<string, string> {
  if (upstream.proxyRequests) {
    return {};
  }
  return {
    ...headersForBasicAuth(upstream.publicUri),
    ...upstream.httpHeaders,
  };
}

export function aggregateUpstreams(
  upstreams: readonly UpstreamHandle[],
  log: Logger = serviceLogger,
): AlertmanagerAPISummary {
  const summary: AlertmanagerAPISummary = {
    counters: { total: 0, healthy: 0, failed: 0 },
    instances: [],
    clusters: {},
  };

  for (const upstream of upstreams) {
    const members = [...upstream.clusterMemberNames()];

    let fingerprint = '';
    try {
      fingerprint = clusterFingerprint(members);
    } catch (err) {
      log.error({ err, upstream: upstream.name }, 'Failed to compute cluster fingerprint');
    }

    if (fingerprint && !(fingerprint in summary.clusters)) {
      summary.clusters[fingerprint] = members;
    }

    const instance: AlertmanagerAPIStatus = {
      name: upstream.name,
      uri: upstream.sanitizedUri,
      publicURI: upstream.publicUri,
      headers: upstreamHeaders(upstream),
      error: upstream.error,
      version: upstream.version,
      cluster: upstream.clusterId || fingerprint,
      clusterMembers: members,
    };
    summary.instances.push(instance);

    summary.counters.total++;
    if (instance.error === '') {
      summary.counters.healthy++;
    } else {
      summary.counters.failed++;
    }
  }

  return summary;
}
