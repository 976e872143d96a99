/**
 * Alert Group Merge Tests
 */

import { describe, it, expect } from 'vitest';
import {
  alertGroupId,
  labelsFingerprint,
  mergeAlertGroups,
  withAlerts,
} from '../../../src/core/alert-groups';
import { AlertGroupFactory, UpstreamAlertFactory, UpstreamFactory } from '../../helpers/factories';

const T9 = '2024-05-01T09:00:00.000Z';
const T10 = '2024-05-01T10:00:00.000Z';
const T11 = '2024-05-01T11:00:00.000Z';

describe('alertGroupId', () => {
  it('should not depend on label key order', () => {
    expect(alertGroupId('default', { a: '1', b: '2' })).toBe(alertGroupId('default', { b: '2', a: '1' }));
  });

  it('should depend on the receiver', () => {
    expect(alertGroupId('default', { a: '1' })).not.toBe(alertGroupId('pager', { a: '1' }));
  });
});

describe('labelsFingerprint', () => {
  it('should not depend on label key order', () => {
    expect(labelsFingerprint({ a: '1', b: '2' })).toBe(labelsFingerprint({ b: '2', a: '1' }));
    expect(labelsFingerprint({ a: '1' })).not.toBe(labelsFingerprint({ a: '2' }));
  });
});

describe('mergeAlertGroups', () => {
  const groupLabels = { alertname: 'DiskFull' };
  const host1 = { alertname: 'DiskFull', instance: 'host1', job: 'node' };
  const host2 = { alertname: 'DiskFull', instance: 'host2', job: 'node' };
  const annotations = { summary: 'disk full' };

  function clusterUpstreams() {
    const am1 = UpstreamFactory.build({
      name: 'am1',
      clusterId: 'cluster-x',
      groups: [
        UpstreamAlertFactory.group('default', groupLabels, [
          UpstreamAlertFactory.build(host1, { fingerprint: 'fp1', startsAt: T10, state: 'suppressed', annotations }),
          UpstreamAlertFactory.build(host2, { fingerprint: 'fp2', startsAt: T11, annotations }),
        ]),
      ],
    });
    const am2 = UpstreamFactory.build({
      name: 'am2',
      clusterId: 'cluster-x',
      groups: [
        UpstreamAlertFactory.group('default', groupLabels, [
          UpstreamAlertFactory.build(host1, { fingerprint: 'fp1', startsAt: T9, annotations }),
        ]),
      ],
    });
    return [am2, am1];
  }

  it('should merge the same group from several upstreams', () => {
    const groups = mergeAlertGroups(clusterUpstreams());
    const id = alertGroupId('default', groupLabels);

    expect(Object.keys(groups)).toEqual([id]);
    expect(groups[id].receiver).toBe('default');
    expect(groups[id].labels).toEqual(groupLabels);
  });

  it('should deduplicate alerts by fingerprint', () => {
    const group = Object.values(mergeAlertGroups(clusterUpstreams()))[0];

    expect(group.alerts.map((a) => a.fingerprint)).toEqual(['fp2', 'fp1']);
    const fp1 = group.alerts[1];
    expect(fp1.alertmanager.map((am) => am.name)).toEqual(['am1', 'am2']);
  });

  it('should take the highest priority state and earliest start', () => {
    const group = Object.values(mergeAlertGroups(clusterUpstreams()))[0];
    const fp1 = group.alerts[1];

    expect(fp1.state).toBe('active');
    expect(fp1.startsAt).toBe(T9);
    expect(fp1.alertmanager.map((am) => am.state)).toEqual(['suppressed', 'active']);
  });

  it('should move common labels and annotations into the shared section', () => {
    const group = Object.values(mergeAlertGroups(clusterUpstreams()))[0];

    expect(group.shared).toEqual({
      labels: { job: 'node' },
      annotations: { summary: 'disk full' },
      clusters: ['cluster-x'],
    });
    expect(group.alerts.map((a) => a.labels)).toEqual([{ instance: 'host2' }, { instance: 'host1' }]);
    expect(group.alerts.map((a) => a.annotations)).toEqual([{}, {}]);
  });

  it('should compute the latest start and state counts', () => {
    const group = Object.values(mergeAlertGroups(clusterUpstreams()))[0];

    expect(group.latestStartsAt).toBe(T11);
    expect(group.stateCount).toEqual({ active: 2, suppressed: 0, unprocessed: 0 });
  });

  it('should keep labels on single alert groups', () => {
    const upstream = UpstreamFactory.build({
      name: 'am1',
      groups: [
        UpstreamAlertFactory.group('default', groupLabels, [
          UpstreamAlertFactory.build(host1, { fingerprint: 'fp1', annotations }),
        ]),
      ],
    });

    const group = Object.values(mergeAlertGroups([upstream]))[0];
    expect(group.shared.labels).toEqual({});
    expect(group.shared.annotations).toEqual({});
    expect(group.alerts[0].labels).toEqual({ instance: 'host1', job: 'node' });
    expect(group.alerts[0].annotations).toEqual(annotations);
  });

  it('should not record the same upstream twice for one alert', () => {
    const upstream = UpstreamFactory.build({
      name: 'am1',
      groups: [
        UpstreamAlertFactory.group('default', groupLabels, [
          UpstreamAlertFactory.build(host1, { fingerprint: 'fp1' }),
          UpstreamAlertFactory.build(host1, { fingerprint: 'fp1', state: 'suppressed' }),
        ]),
      ],
    });

    const group = Object.values(mergeAlertGroups([upstream]))[0];
    expect(group.alerts).toHaveLength(1);
    expect(group.alerts[0].alertmanager).toHaveLength(1);
    expect(group.alerts[0].state).toBe('active');
  });

  it('should fingerprint alerts by labels when the upstream sends none', () => {
    const upstream = UpstreamFactory.build({
      name: 'am1',
      groups: [
        UpstreamAlertFactory.group('default', groupLabels, [
          UpstreamAlertFactory.build(host1, { fingerprint: '' }),
        ]),
      ],
    });

    const group = Object.values(mergeAlertGroups([upstream]))[0];
    expect(group.alerts[0].fingerprint).toBe(labelsFingerprint(host1));
  });

  it('should skip groups without alerts and clusters without ids', () => {
    const upstream = UpstreamFactory.build({
      name: 'am1',
      groups: [
        UpstreamAlertFactory.group('default', { alertname: 'Empty' }, []),
        UpstreamAlertFactory.group('default', groupLabels, [UpstreamAlertFactory.build(host1)]),
      ],
    });

    const groups = Object.values(mergeAlertGroups([upstream]));
    expect(groups).toHaveLength(1);
    expect(groups[0].shared.clusters).toEqual([]);
  });

  it('should keep different receivers apart', () => {
    const upstream = UpstreamFactory.build({
      name: 'am1',
      groups: [
        UpstreamAlertFactory.group('default', groupLabels, [UpstreamAlertFactory.build(host1)]),
        UpstreamAlertFactory.group('pager', groupLabels, [UpstreamAlertFactory.build(host1)]),
      ],
    });

    expect(Object.keys(mergeAlertGroups([upstream]))).toHaveLength(2);
  });
});

describe('withAlerts', () => {
  it('should return null for an empty alert list', () => {
    expect(withAlerts(AlertGroupFactory.build({ id: 'g' }), [])).toBeNull();
  });

  it('should recompute derived fields from the given alerts', () => {
    const source = AlertGroupFactory.build({ id: 'g', latestStartsAt: T11 });
    const older = AlertGroupFactory.build({ id: 'o', latestStartsAt: T9, state: 'suppressed' }).alerts[0];

    const group = withAlerts(source, [older]);
    expect(group?.id).toBe('g');
    expect(group?.latestStartsAt).toBe(T9);
    expect(group?.stateCount).toEqual({ active: 0, suppressed: 1, unprocessed: 0 });
    expect(source.latestStartsAt).toBe(T11);
  });
});
