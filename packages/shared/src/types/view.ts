/**
 * /alerts.json 响应结构
 */

import type { APIAlertGroup } from './alert';
import type { ISODateString } from './common';
import type { LabelNameStats } from './stats';
import type { AlertmanagerAPISummary } from './upstream';

export type SortOrder = 'default' | 'startsAt' | 'label';

export interface SortSettings {
  sortOrder: SortOrder;
  sortReverse: boolean;
  sortLabel: string;
}

export type FilterMatcher = '=' | '!=' | '=~' | '!~' | '>' | '<';

export interface FilterResult {
  text: string;
  name: string;
  matcher: FilterMatcher | '';
  value: string;
  isValid: boolean;
}

export interface AlertsResponse {
  version: string;
  timestamp: ISODateString;
  upstreams: AlertmanagerAPISummary;
  filters: FilterResult[];
  totalAlerts: number;
  groups: APIAlertGroup[];
  counters: LabelNameStats[];
  settings: {
    sorting: SortSettings;
  };
}
