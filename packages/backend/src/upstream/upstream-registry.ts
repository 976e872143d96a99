/**
 * 上游注册表
 *
 * 持有所有配置的上游，并发刷新后统一安装新状态：
 * 1. 并发拉取每个上游（单个失败不影响其他上游）
 * 2. 全部完成后根据集群节点名解析集群成员
 * 3. 一次性安装所有上游的新状态
 */

import type { ConfigSnapshot } from '../config/app-config';
import type { UpstreamHandle, UpstreamProxy } from './types';
import { Alertmanager, UpstreamState } from './alertmanager';
import { AlertmanagerApi, AlertmanagerClientOptions, createAlertmanagerClient } from './alertmanager-client';
import { upstreamLogger } from '../logger';

export type ClientFactory = (options: AlertmanagerClientOptions) => AlertmanagerApi;

function peerSet(state: UpstreamState): Set<string> {
  const peers = new Set(state.peers);
  if (state.peerName) {
    peers.add(state.peerName);
  }
  return peers;
}

/**
 * 解析集群成员
 *
 * 与当前上游共享任一集群节点名的上游视为同一集群，
 * 成员名按字典序排序，保证同一集群的所有上游得到相同的成员列表
 */
export function resolveClusterMembers(
  fetched: ReadonlyArray<{ name: string; state: UpstreamState }>,
): Map<string, string[]> {
  const peerSets = fetched.map(({ name, state }) => ({ name, peers: peerSet(state) }));
  const members = new Map<string, string[]>();

  for (const current of peerSets) {
    if (current.peers.size === 0) {
      members.set(current.name, [current.name]);
      continue;
    }
    const names = peerSets
      .filter(
        (other) =>
          other.name === current.name || [...other.peers].some((peer) => current.peers.has(peer)),
      )
      .map((other) => other.name)
      .sort();
    members.set(current.name, names);
  }

  return members;
}

export class UpstreamRegistry {
  private readonly upstreams: readonly Alertmanager[];
  private refreshing: Promise<void> | null = null;
  private lastRefreshAt: string | null = null;

  constructor(upstreams: readonly Alertmanager[]) {
    this.upstreams = upstreams;
  }

  static fromConfig(
    config: ConfigSnapshot,
    clientFactory: ClientFactory = createAlertmanagerClient,
  ): UpstreamRegistry {
    const upstreams = config.alertmanager.servers.map(
      (server) =>
        new Alertmanager(
          server,
          clientFactory({
            uri: server.uri,
            timeoutMs: server.timeoutMs ?? config.alertmanager.timeoutMs,
            headers: server.headers,
          }),
        ),
    );
    return new UpstreamRegistry(upstreams);
  }

  list(): readonly UpstreamHandle[] {
    return this.upstreams;
  }

  find(name: string): UpstreamProxy | undefined {
    return this.upstreams.find((upstream) => upstream.name === name);
  }

  get size(): number {
    return this.upstreams.length;
  }

  get lastRefresh(): string | null {
    return this.lastRefreshAt;
  }

  /**
   * 刷新所有上游，已有刷新进行中时复用同一个 Promise
   */
  refresh(): Promise<void> {
    if (!this.refreshing) {
      this.refreshing = this.doRefresh().finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  private async doRefresh(): Promise<void> {
    const start = Date.now();
    const fetched = await Promise.all(
      this.upstreams.map(async (upstream) => ({ upstream, name: upstream.name, state: await upstream.fetch() })),
    );

    const members = resolveClusterMembers(fetched);
    for (const { upstream, name, state } of fetched) {
      upstream.install(state, members.get(name) ?? [name]);
    }

    this.lastRefreshAt = new Date().toISOString();
    const failed = fetched.filter(({ state }) => state.error !== '').length;
    upstreamLogger.info(
      { durationMs: Date.now() - start, total: fetched.length, failed },
      'Upstreams refreshed',
    );
  }
}
