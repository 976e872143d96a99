/**
 * 标签统计
 *
 * 将原始计数（label 名 -> label 值 -> 命中次数）转换为
 * 可直接渲染的百分比分布：
 * 1. 计算每个 label 名的总命中数
 * 2. 每个值的百分比向下取整
 * 3. 值按自然顺序升序排列
 * 4. 从排序后的第一个值开始逐个 +1，补齐到 100
 * 5. 按排序顺序计算偏移量（前面所有值百分比之和）
 * 6. label 名按命中数降序、名称自然升序排列
 */

import type { LabelNameStats, LabelValueStats } from '@alertdeck/shared';
import { naturalCompare } from './natural-order';

/** label 名 -> (label 值 -> 命中次数) */
export type LabelCounts = Map<string, Map<string, number>>;

/**
 * 计数 +1
 */
export function countLabel(store: LabelCounts, name: string, value: string): void {
  let values = store.get(name);
  if (!values) {
    values = new Map();
    store.set(name, values);
  }
  values.set(value, (values.get(value) ?? 0) + 1);
}

function compareLabelNameStats(a: LabelNameStats, b: LabelNameStats): number {
  if (a.hits !== b.hits) {
    return b.hits - a.hits;
  }
  return naturalCompare(a.name, b.name);
}

function summarizeLabel(name: string, valueMap: ReadonlyMap<string, number>): LabelNameStats | null {
  let hits = 0;
  for (const count of valueMap.values()) {
    hits += count;
  }
  // 总命中为 0 的 label 不参与百分比计算
  if (hits <= 0) {
    return null;
  }

  const values: LabelValueStats[] = [];
  let totalPercent = 0;
  for (const [value, count] of valueMap) {
    const percent = Math.floor((count / hits) * 100);
    totalPercent += percent;
    values.push({ value, raw: `${name}=${value}`, hits: count, percent, offset: 0 });
  }

  values.sort((a, b) => naturalCompare(a.value, b.value));

  while (totalPercent < 100) {
    for (const value of values) {
      value.percent++;
      totalPercent++;
      if (totalPercent >= 100) {
        break;
      }
    }
  }

  let offset = 0;
  for (const value of values) {
    value.offset = offset;
    offset += value.percent;
  }

  return { name, hits, values };
}

export function summarizeLabelCounts(counts: LabelCounts): LabelNameStats[] {
  const stats: LabelNameStats[] = [];
  for (const [name, valueMap] of counts) {
    const nameStats = summarizeLabel(name, valueMap);
    if (nameStats) {
      stats.push(nameStats);
    }
  }
  return stats.sort(compareLabelNameStats);
}
