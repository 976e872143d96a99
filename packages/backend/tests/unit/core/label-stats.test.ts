/**
 * Label Statistics Tests
 */

import { describe, it, expect } from 'vitest';
import { countLabel, LabelCounts, summarizeLabelCounts } from '../../../src/core/label-stats';

function counts(entries: Record<string, Record<string, number>>): LabelCounts {
  return new Map(
    Object.entries(entries).map(([name, values]) => [name, new Map(Object.entries(values))]),
  );
}

describe('countLabel', () => {
  it('should increment per name and value', () => {
    const store: LabelCounts = new Map();
    countLabel(store, 'severity', 'critical');
    countLabel(store, 'severity', 'critical');
    countLabel(store, 'severity', 'warning');
    countLabel(store, 'job', 'node');

    expect(store.get('severity')?.get('critical')).toBe(2);
    expect(store.get('severity')?.get('warning')).toBe(1);
    expect(store.get('job')?.get('node')).toBe(1);
  });
});

describe('summarizeLabelCounts', () => {
  it('should round percentages up from the first sorted value', () => {
    const [severity] = summarizeLabelCounts(counts({ severity: { warning: 1, critical: 2 } }));

    expect(severity).toEqual({
      name: 'severity',
      hits: 3,
      values: [
        { value: 'critical', raw: 'severity=critical', hits: 2, percent: 67, offset: 0 },
        { value: 'warning', raw: 'severity=warning', hits: 1, percent: 33, offset: 67 },
      ],
    });
  });

  it('should spread the shortfall over several values', () => {
    const [job] = summarizeLabelCounts(counts({ job: { c: 1, a: 1, b: 1 } }));

    expect(job.values.map((v) => [v.value, v.percent, v.offset])).toEqual([
      ['a', 34, 0],
      ['b', 33, 34],
      ['c', 33, 67],
    ]);
  });

  it('should make percentages sum to 100', () => {
    const stats = summarizeLabelCounts(
      counts({ instance: { host1: 3, host2: 3, host3: 1, host10: 5, host20: 1, host7: 2 } }),
    );

    const total = stats[0].values.reduce((sum, v) => sum + v.percent, 0);
    expect(total).toBe(100);
  });

  it('should order values naturally', () => {
    const [instance] = summarizeLabelCounts(counts({ instance: { host10: 1, host2: 1, host1: 2 } }));

    expect(instance.values.map((v) => v.value)).toEqual(['host1', 'host2', 'host10']);
  });

  it('should compute offsets as the sum of preceding percentages', () => {
    const [instance] = summarizeLabelCounts(counts({ instance: { a: 1, b: 1, c: 2 } }));

    expect(instance.values.map((v) => [v.percent, v.offset])).toEqual([
      [25, 0],
      [25, 25],
      [50, 50],
    ]);
  });

  it('should give a single value 100 percent', () => {
    const [alertname] = summarizeLabelCounts(counts({ alertname: { DiskFull: 4 } }));

    expect(alertname.values).toEqual([
      { value: 'DiskFull', raw: 'alertname=DiskFull', hits: 4, percent: 100, offset: 0 },
    ]);
  });

  it('should order names by hits descending, then name', () => {
    const stats = summarizeLabelCounts(
      counts({
        job: { node: 1 },
        severity: { critical: 2, warning: 1 },
        alertname: { DiskFull: 3 },
      }),
    );

    expect(stats.map((s) => [s.name, s.hits])).toEqual([
      ['alertname', 3],
      ['severity', 3],
      ['job', 1],
    ]);
  });

  it('should skip labels with no hits', () => {
    const stats = summarizeLabelCounts(counts({ empty: { x: 0 }, job: { node: 1 } }));

    expect(stats.map((s) => s.name)).toEqual(['job']);
  });

  it('should return an empty list for empty counts', () => {
    expect(summarizeLabelCounts(new Map())).toEqual([]);
  });
});
