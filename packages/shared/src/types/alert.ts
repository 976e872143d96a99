/**
 * 告警与告警分组类型
 */

import type { ISODateString, LabelSet } from './common';

export type AlertState = 'active' | 'suppressed' | 'unprocessed';

/**
 * 某个上游实例上报的告警副本
 */
export interface AlertmanagerInstanceRef {
  name: string;
  cluster: string;
  state: AlertState;
  startsAt: ISODateString;
  source: string;
  silencedBy: string[];
  inhibitedBy: string[];
}

export interface APIAlert {
  fingerprint: string;
  labels: LabelSet;
  annotations: LabelSet;
  state: AlertState;
  startsAt: ISODateString;
  receiver: string;
  alertmanager: AlertmanagerInstanceRef[];
}

export interface APIAlertGroupShared {
  labels: LabelSet;
  annotations: LabelSet;
  clusters: string[];
}

export interface APIAlertGroup {
  /** 分组标识，在一次聚合内唯一且不变 */
  id: string;
  receiver: string;
  labels: LabelSet;
  shared: APIAlertGroupShared;
  alerts: APIAlert[];
  latestStartsAt: ISODateString;
  stateCount: Record<AlertState, number>;
}
