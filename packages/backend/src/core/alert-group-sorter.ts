/**
 * 告警分组排序
 *
 * 三种排序方式：
 * - default: 按分组 ID 字符串比较，仅用于保证刷新之间顺序稳定
 * - startsAt: 按分组内最新告警开始时间
 * - label: 按指定 label 的值（经过值替换表）自然排序
 *
 * 排序参数优先取请求参数，缺失或非法时回退到配置默认值。
 * 所有比较器都是纯函数，不读取任何全局状态。
 */

import { z } from 'zod';
import type { APIAlertGroup, SortOrder, SortSettings } from '@alertdeck/shared';
import type { LabelValueOverrides, SortingConfig } from '../config/app-config';
import { naturalCompare } from './natural-order';

// ==================== 参数解析 ====================

const queryValue = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((val) => (Array.isArray(val) ? val[0] : val))
  .catch(undefined);

export const sortQuerySchema = z.object({
  sortOrder: queryValue,
  sortReverse: queryValue,
  sortLabel: queryValue,
});

function toSortOrder(value: string): SortOrder {
  return value === 'startsAt' || value === 'label' ? value : 'default';
}

/**
 * 合并请求参数与配置默认值
 *
 * - sortOrder: 未设置或为空时使用配置；"startsAt"/"label" 原样保留，其余值视为 default
 * - sortReverse: 仅接受 "0"/"1"
 * - sortLabel: 未设置或为空时使用配置
 */
export function resolveSortSettings(query: unknown, defaults: SortingConfig): SortSettings {
  const parsed = sortQuerySchema.safeParse(query);
  const data: z.infer<typeof sortQuerySchema> = parsed.success ? parsed.data : {};
  const { sortOrder, sortReverse, sortLabel } = data;

  return {
    sortOrder: toSortOrder(sortOrder ? sortOrder : defaults.order),
    sortReverse: sortReverse === '0' || sortReverse === '1' ? sortReverse === '1' : defaults.reverse,
    sortLabel: sortLabel ? sortLabel : defaults.label,
  };
}

// ==================== label 取值 ====================

/**
 * 应用 label 值替换表
 */
export function resolveLabelValue(
  overrides: LabelValueOverrides,
  name: string,
  value: string,
): string {
  const replacements = Object.prototype.hasOwnProperty.call(overrides, name)
    ? overrides[name]
    : undefined;
  if (replacements && Object.prototype.hasOwnProperty.call(replacements, value)) {
    return replacements[value];
  }
  return value;
}

function lookup(labels: Readonly<Record<string, string>> | undefined, name: string): string | undefined {
  if (labels && Object.prototype.hasOwnProperty.call(labels, name)) {
    return labels[name];
  }
  return undefined;
}

/**
 * 取分组的代表性 label 值
 * 依次查找分组 label、共享 label、第一条告警的 label，均缺失时返回空字符串
 */
export function groupLabelValue(
  group: APIAlertGroup,
  name: string,
  overrides: LabelValueOverrides,
): string {
  const value =
    lookup(group.labels, name) ??
    lookup(group.shared.labels, name) ??
    lookup(group.alerts[0]?.labels, name);
  return value === undefined ? '' : resolveLabelValue(overrides, name, value);
}

// ==================== 比较器 ====================

/**
 * 按最新开始时间比较，reverse=false 为由旧到新，reverse=true 为由新到旧
 */
export function compareByStartsAt(a: APIAlertGroup, b: APIAlertGroup, reverse: boolean): number {
  const diff = Date.parse(a.latestStartsAt) - Date.parse(b.latestStartsAt);
  return reverse ? -diff : diff;
}

/**
 * 按分组 ID 比较，reverse=false 为降序，reverse=true 为升序
 */
export function compareById(a: APIAlertGroup, b: APIAlertGroup, reverse: boolean): number {
  if (a.id === b.id) {
    return 0;
  }
  const ascending = a.id < b.id ? -1 : 1;
  return reverse ? ascending : -ascending;
}

/**
 * 按 label 值比较
 *
 * - 两者都缺失该 label：按开始时间由新到旧
 * - 仅一方缺失：正序时缺失者在后，倒序时缺失者在前
 * - 值相同：按开始时间由新到旧
 * - 值不同：自然排序，reverse 翻转
 */
export function compareByLabelValues(
  a: APIAlertGroup,
  valueA: string,
  b: APIAlertGroup,
  valueB: string,
  reverse: boolean,
): number {
  if (valueA === '' && valueB === '') {
    return compareByStartsAt(a, b, true);
  }
  if (valueA === '') {
    return reverse ? -1 : 1;
  }
  if (valueB === '') {
    return reverse ? 1 : -1;
  }
  if (valueA === valueB) {
    return compareByStartsAt(a, b, true);
  }
  const order = naturalCompare(valueA, valueB);
  return reverse ? -order : order;
}

export function compareByLabel(
  a: APIAlertGroup,
  b: APIAlertGroup,
  label: string,
  reverse: boolean,
  overrides: LabelValueOverrides,
): number {
  return compareByLabelValues(
    a,
    groupLabelValue(a, label, overrides),
    b,
    groupLabelValue(b, label, overrides),
    reverse,
  );
}

// ==================== 排序 ====================

export function sortAlertGroups(
  groups: Readonly<Record<string, APIAlertGroup>>,
  settings: SortSettings,
  overrides: LabelValueOverrides,
): APIAlertGroup[] {
  const list = Object.values(groups);

  switch (settings.sortOrder) {
    case 'startsAt':
      return list.sort((a, b) => compareByStartsAt(a, b, settings.sortReverse));
    case 'label': {
      // 预先取值，避免比较时重复查找
      const values = new Map(list.map((g) => [g.id, groupLabelValue(g, settings.sortLabel, overrides)]));
      return list.sort((a, b) =>
        compareByLabelValues(
          a,
          values.get(a.id) ?? '',
          b,
          values.get(b.id) ?? '',
          settings.sortReverse,
        ),
      );
    }
    default:
      return list.sort((a, b) => compareById(a, b, settings.sortReverse));
  }
}
