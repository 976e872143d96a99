/**
 * 单个上游 Alertmanager
 *
 * 每次刷新生成一个新的冻结状态快照并整体替换，
 * 读取方在一次聚合内看到的状态始终一致。
 */

import type { UpstreamServerConfig, DeepReadonly } from '../config/app-config';
import type { UpstreamAlertGroup, UpstreamHandle, UpstreamProxy, UpstreamProxyResponse } from './types';
import type { AlertmanagerApi } from './alertmanager-client';
import { clusterFingerprint } from '../core/cluster-fingerprint';
import { proxyPath, sanitizeUri } from '../utils/uri';
import { createChildLogger, Logger } from '../logger';

export interface UpstreamState {
  error: string;
  version: string;
  peerName: string;
  peers: readonly string[];
  groups: readonly UpstreamAlertGroup[];
  clusterMembers: readonly string[];
  clusterId: string;
  fetchedAt: string;
}

export class Alertmanager implements UpstreamHandle, UpstreamProxy {
  readonly name: string;
  readonly sanitizedUri: string;
  readonly publicUri: string;
  readonly httpHeaders: Readonly<Record<string, string>>;
  readonly proxyRequests: boolean;

  private state: UpstreamState;
  private readonly log: Logger;

  constructor(
    config: DeepReadonly<UpstreamServerConfig>,
    private readonly client: AlertmanagerApi,
  ) {
    this.name = config.name;
    this.sanitizedUri = sanitizeUri(config.uri);
    // 代理模式下浏览器只拿到本服务的代理路径，凭据不出服务端
    this.publicUri = config.proxy ? proxyPath(config.name) : (config.externalUri ?? config.uri);
    this.httpHeaders = { ...config.headers };
    this.proxyRequests = config.proxy;
    this.log = createChildLogger({ module: 'upstream', upstream: config.name });
    this.state = Object.freeze({
      error: '',
      version: '',
      peerName: '',
      peers: [],
      groups: [],
      clusterMembers: [config.name],
      clusterId: '',
      fetchedAt: '',
    });
  }

  get error(): string {
    return this.state.error;
  }

  get version(): string {
    return this.state.version;
  }

  get clusterId(): string {
    return this.state.clusterId;
  }

  /** 最近一次刷新完成的时间，尚未刷新时为空字符串 */
  get fetchedAt(): string {
    return this.state.fetchedAt;
  }

  clusterMemberNames(): readonly string[] {
    return this.state.clusterMembers;
  }

  alertGroups(): readonly UpstreamAlertGroup[] {
    return this.state.groups;
  }

  proxyGet(path: string): Promise<UpstreamProxyResponse> {
    return this.client.proxyGet(path);
  }

  /**
   * 拉取最新状态但不安装，失败时返回带错误信息的状态
   */
  async fetch(): Promise<UpstreamState> {
    const start = Date.now();
    try {
      const [status, groups] = await Promise.all([
        this.client.fetchStatus(),
        this.client.fetchAlertGroups(),
      ]);
      const alerts = groups.reduce((sum, g) => sum + g.alerts.length, 0);
      this.log.debug(
        { durationMs: Date.now() - start, groups: groups.length, alerts },
        'Upstream fetched',
      );
      return {
        error: '',
        version: status.version,
        peerName: status.peerName,
        peers: status.peers,
        groups,
        clusterMembers: [this.name],
        clusterId: '',
        fetchedAt: new Date().toISOString(),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.warn({ err: error, durationMs: Date.now() - start }, 'Upstream fetch failed');
      return {
        error: message,
        version: '',
        peerName: '',
        peers: [],
        groups: [],
        clusterMembers: [this.name],
        clusterId: '',
        fetchedAt: new Date().toISOString(),
      };
    }
  }

  /**
   * 安装新状态，并根据集群成员重新计算集群标识
   */
  install(state: UpstreamState, clusterMembers: readonly string[]): void {
    let clusterId = '';
    try {
      clusterId = clusterFingerprint(clusterMembers);
    } catch (err) {
      this.log.error({ err }, 'Failed to compute cluster id');
    }
    this.state = Object.freeze({
      ...state,
      clusterMembers: Object.freeze([...clusterMembers]),
      clusterId,
    });
  }
}
