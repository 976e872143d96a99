/**
 * 告警视图服务
 *
 * 组装 /alerts.json 的响应：
 * 过滤 -> 标签计数 -> 上游汇总 -> 排序
 *
 * 配置快照由调用方传入，本服务不读取任何全局配置
 */

import type { AlertsResponse, APIAlertGroup } from '@alertdeck/shared';
import type { ConfigSnapshot } from '../config/app-config';
import type { UpstreamHandle } from '../upstream/types';
import { alertMatches, effectiveLabels, parseFilters } from '../core/filters';
import { countLabel, LabelCounts, summarizeLabelCounts } from '../core/label-stats';
import { aggregateUpstreams } from '../core/upstream-aggregator';
import { resolveSortSettings, sortAlertGroups } from '../core/alert-group-sorter';
import { mergeAlertGroups, withAlerts } from '../core/alert-groups';
import { serviceLogger, Logger } from '../logger';

export const APP_VERSION = process.env.npm_package_version ?? 'dev';

export interface AlertsViewQuery {
  /** 过滤表达式，缺省时使用配置中的默认过滤条件 */
  q?: string[];
  sortOrder?: unknown;
  sortReverse?: unknown;
  sortLabel?: unknown;
}

export interface AlertsViewInput {
  upstreams: readonly UpstreamHandle[];
  config: ConfigSnapshot;
  query: AlertsViewQuery;
  log?: Logger;
  now?: Date;
}

/**
 * 统计分组内每条告警的 label 以及内置字段
 */
export function countGroupLabels(store: LabelCounts, group: APIAlertGroup): void {
  for (const alert of group.alerts) {
    for (const [name, value] of Object.entries(effectiveLabels(alert, group))) {
      countLabel(store, name, value);
    }
    countLabel(store, '@state', alert.state);
    countLabel(store, '@receiver', alert.receiver);
    for (const am of alert.alertmanager) {
      countLabel(store, '@alertmanager', am.name);
      if (am.cluster) {
        countLabel(store, '@cluster', am.cluster);
      }
    }
  }
}

export function buildAlertsView(input: AlertsViewInput): AlertsResponse {
  const { upstreams, config, query } = input;
  const log = input.log ?? serviceLogger;

  const expressions = query.q && query.q.length > 0 ? query.q : config.filters.default;
  const { filters, hasValid } = parseFilters(expressions);

  const merged = mergeAlertGroups(upstreams);
  const filtered: Record<string, APIAlertGroup> = {};
  const counts: LabelCounts = new Map();
  let totalAlerts = 0;

  for (const group of Object.values(merged)) {
    const kept = hasValid
      ? withAlerts(
          group,
          group.alerts.filter((alert) => alertMatches(alert, group, filters)),
        )
      : group;
    if (!kept) {
      continue;
    }
    filtered[kept.id] = kept;
    totalAlerts += kept.alerts.length;
    countGroupLabels(counts, kept);
  }

  const sorting = resolveSortSettings(query, config.grid.sorting);
  const groups = sortAlertGroups(filtered, sorting, config.grid.sorting.customValues.labels);
  const summary = aggregateUpstreams(upstreams, log);

  log.debug(
    {
      filters: expressions.length,
      groups: groups.length,
      totalAlerts,
      sorting,
    },
    'Alerts view built',
  );

  return {
    version: APP_VERSION,
    timestamp: (input.now ?? new Date()).toISOString(),
    upstreams: summary,
    filters: filters.map((f) => f.toResult()),
    totalAlerts,
    groups,
    counters: summarizeLabelCounts(counts),
    settings: { sorting },
  };
}
