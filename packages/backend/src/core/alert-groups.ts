/**
 * 告警分组合并
 *
 * 同一集群的多个上游会上报相同的告警，这里把所有上游的分组合并为统一视图：
 * - 分组 ID = SHA-1(receiver + 排序后的分组 label)，跨上游一致
 * - 告警按指纹去重，记录上报它的每个上游实例
 * - 状态取优先级最高者：active > suppressed > unprocessed
 * - 多告警分组中取值完全相同的 label/annotation 提升为共享字段
 */

import crypto from 'crypto';
import type {
  AlertState,
  APIAlert,
  APIAlertGroup,
  AlertmanagerInstanceRef,
  LabelSet,
} from '@alertdeck/shared';
import type { UpstreamHandle } from '../upstream/types';
import { naturalCompare } from './natural-order';

const STATE_PRIORITY: Record<AlertState, number> = {
  active: 2,
  suppressed: 1,
  unprocessed: 0,
};

function sortedPairs(labels: LabelSet): Array<[string, string]> {
  return Object.entries(labels).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * 计算分组 ID
 */
export function alertGroupId(receiver: string, labels: LabelSet): string {
  return crypto
    .createHash('sha1')
    .update(receiver)
    .update(JSON.stringify(sortedPairs(labels)))
    .digest('hex');
}

/**
 * 告警 label 指纹，上游未提供指纹时使用
 */
export function labelsFingerprint(labels: LabelSet): string {
  return crypto.createHash('sha1').update(JSON.stringify(sortedPairs(labels))).digest('hex');
}

function emptyStateCount(): Record<AlertState, number> {
  return { active: 0, suppressed: 0, unprocessed: 0 };
}

function latestOf(dates: readonly string[]): string {
  return dates.reduce((latest, current) => (Date.parse(current) > Date.parse(latest) ? current : latest));
}

function earliestOf(dates: readonly string[]): string {
  return dates.reduce((earliest, current) =>
    Date.parse(current) < Date.parse(earliest) ? current : earliest,
  );
}

function compareAlerts(a: APIAlert, b: APIAlert): number {
  const diff = Date.parse(b.startsAt) - Date.parse(a.startsAt);
  if (diff !== 0) {
    return diff;
  }
  return naturalCompare(a.fingerprint, b.fingerprint);
}

/**
 * 找出所有告警中取值完全相同的键
 */
function commonEntries(sets: readonly LabelSet[]): LabelSet {
  if (sets.length < 2) {
    return {};
  }
  const [first, ...rest] = sets;
  const common: LabelSet = {};
  for (const [key, value] of Object.entries(first)) {
    if (rest.every((set) => Object.prototype.hasOwnProperty.call(set, key) && set[key] === value)) {
      common[key] = value;
    }
  }
  return common;
}

function omitKeys(source: LabelSet, ...exclude: LabelSet[]): LabelSet {
  const result: LabelSet = {};
  for (const [key, value] of Object.entries(source)) {
    if (!exclude.some((set) => Object.prototype.hasOwnProperty.call(set, key))) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * 用给定告警列表重建分组的派生字段（最新开始时间、状态计数）
 * 共享字段保持不变，告警列表为空时返回 null
 */
export function withAlerts(group: APIAlertGroup, alerts: APIAlert[]): APIAlertGroup | null {
  if (alerts.length === 0) {
    return null;
  }
  const stateCount = emptyStateCount();
  for (const alert of alerts) {
    stateCount[alert.state]++;
  }
  return {
    ...group,
    alerts,
    latestStartsAt: latestOf(alerts.map((a) => a.startsAt)),
    stateCount,
  };
}

interface GroupBuilder {
  id: string;
  receiver: string;
  labels: LabelSet;
  alerts: Map<string, APIAlert>;
}

/**
 * 合并所有上游的告警分组
 *
 * @returns 分组 ID -> 分组
 */
export function mergeAlertGroups(upstreams: readonly UpstreamHandle[]): Record<string, APIAlertGroup> {
  const builders = new Map<string, GroupBuilder>();

  for (const upstream of upstreams) {
    for (const upstreamGroup of upstream.alertGroups()) {
      const id = alertGroupId(upstreamGroup.receiver, upstreamGroup.labels);
      let builder = builders.get(id);
      if (!builder) {
        builder = {
          id,
          receiver: upstreamGroup.receiver,
          labels: { ...upstreamGroup.labels },
          alerts: new Map(),
        };
        builders.set(id, builder);
      }

      for (const upstreamAlert of upstreamGroup.alerts) {
        const fingerprint = upstreamAlert.fingerprint || labelsFingerprint(upstreamAlert.labels);
        const ref: AlertmanagerInstanceRef = {
          name: upstream.name,
          cluster: upstream.clusterId,
          state: upstreamAlert.state,
          startsAt: upstreamAlert.startsAt,
          source: upstreamAlert.generatorURL,
          silencedBy: [...upstreamAlert.silencedBy],
          inhibitedBy: [...upstreamAlert.inhibitedBy],
        };

        const existing = builder.alerts.get(fingerprint);
        if (!existing) {
          builder.alerts.set(fingerprint, {
            fingerprint,
            labels: { ...upstreamAlert.labels },
            annotations: { ...upstreamAlert.annotations },
            state: upstreamAlert.state,
            startsAt: upstreamAlert.startsAt,
            receiver: upstreamGroup.receiver,
            alertmanager: [ref],
          });
          continue;
        }

        // 同一上游不重复记录
        if (existing.alertmanager.some((am) => am.name === ref.name)) {
          continue;
        }
        existing.alertmanager.push(ref);
        if (STATE_PRIORITY[ref.state] > STATE_PRIORITY[existing.state]) {
          existing.state = ref.state;
        }
        existing.startsAt = earliestOf([existing.startsAt, ref.startsAt]);
      }
    }
  }

  const groups: Record<string, APIAlertGroup> = {};
  for (const builder of builders.values()) {
    const alerts = [...builder.alerts.values()];
    if (alerts.length === 0) {
      continue;
    }

    const sharedLabels = omitKeys(commonEntries(alerts.map((a) => a.labels)), builder.labels);
    const sharedAnnotations = commonEntries(alerts.map((a) => a.annotations));
    const clusters = new Set<string>();

    const finalAlerts = alerts
      .map((alert) => {
        alert.alertmanager.forEach((am) => {
          if (am.cluster) clusters.add(am.cluster);
        });
        alert.alertmanager.sort((a, b) => naturalCompare(a.name, b.name));
        return {
          ...alert,
          labels: omitKeys(alert.labels, builder.labels, sharedLabels),
          annotations: omitKeys(alert.annotations, sharedAnnotations),
        };
      })
      .sort(compareAlerts);

    const group = withAlerts(
      {
        id: builder.id,
        receiver: builder.receiver,
        labels: builder.labels,
        shared: {
          labels: sharedLabels,
          annotations: sharedAnnotations,
          clusters: [...clusters].sort(),
        },
        alerts: [],
        latestStartsAt: '',
        stateCount: emptyStateCount(),
      },
      finalAlerts,
    );
    if (group) {
      groups[group.id] = group;
    }
  }

  return groups;
}
