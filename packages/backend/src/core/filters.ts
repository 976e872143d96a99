/**
 * 过滤表达式解析与匹配
 *
 * 支持的表达式：
 * - name=value / name!=value   精确匹配
 * - name=~regex / name!~regex  正则匹配（不区分大小写，不锚定）
 * - name>number / name<number  数值比较
 * - 纯文本                     匹配任意 label 值
 *
 * name 可以是普通 label，也可以是内置字段：
 * @state、@receiver、@alertmanager、@cluster
 *
 * 非法表达式不会抛出错误，只标记 isValid=false 并在匹配时被忽略
 */

import type { APIAlert, APIAlertGroup, FilterMatcher, FilterResult } from '@alertdeck/shared';

const EXPRESSION_PATTERN = /^(@?[a-zA-Z_][a-zA-Z0-9_]*)(=~|!~|!=|>|<|=)(.+)$/;

type ValueMatcher = (value: string) => boolean;

export class AlertFilter {
  private constructor(
    readonly text: string,
    readonly name: string,
    readonly matcher: FilterMatcher | '',
    readonly value: string,
    private readonly test: ValueMatcher | null,
  ) {}

  get isValid(): boolean {
    return this.test !== null;
  }

  static parse(expression: string): AlertFilter {
    const text = expression.trim();
    const match = EXPRESSION_PATTERN.exec(text);

    if (!match) {
      if (text === '') {
        return new AlertFilter(text, '', '', '', null);
      }
      const needle = text.toLowerCase();
      return new AlertFilter(text, '', '', text, (v) => v.toLowerCase().includes(needle));
    }

    const [, name, operator, value] = match;
    const matcher = toMatcher(operator);
    return new AlertFilter(text, name, matcher, value, buildValueMatcher(matcher, value));
  }

  /**
   * 告警是否满足该过滤条件，非法过滤条件总是返回 true
   */
  matches(alert: APIAlert, group: APIAlertGroup): boolean {
    if (this.test === null) {
      return true;
    }
    if (this.name === '') {
      return alertValues(alert, group).some(this.test);
    }

    const values = fieldValues(this.name, alert, group);
    // 否定匹配要求所有值都满足，label 缺失时视为满足
    if (this.matcher === '!=' || this.matcher === '!~') {
      return values.every(this.test);
    }
    return values.some(this.test);
  }

  toResult(): FilterResult {
    return {
      text: this.text,
      name: this.name,
      matcher: this.matcher,
      value: this.value,
      isValid: this.isValid,
    };
  }
}

function toMatcher(operator: string): FilterMatcher {
  switch (operator) {
    case '!=':
    case '=~':
    case '!~':
    case '>':
    case '<':
      return operator;
    default:
      return '=';
  }
}

function buildValueMatcher(matcher: FilterMatcher, value: string): ValueMatcher | null {
  switch (matcher) {
    case '=':
      return (v) => v === value;
    case '!=':
      return (v) => v !== value;
    case '=~':
    case '!~': {
      let regex: RegExp;
      try {
        regex = new RegExp(value, 'i');
      } catch {
        return null;
      }
      return matcher === '=~' ? (v) => regex.test(v) : (v) => !regex.test(v);
    }
    case '>':
    case '<': {
      const threshold = Number(value);
      if (!Number.isFinite(threshold)) {
        return null;
      }
      return (v) => {
        const n = Number(v);
        if (v.trim() === '' || !Number.isFinite(n)) {
          return false;
        }
        return matcher === '>' ? n > threshold : n < threshold;
      };
    }
  }
}

/**
 * 告警的完整 label（分组 label + 共享 label + 告警自身 label）
 */
export function effectiveLabels(alert: APIAlert, group: APIAlertGroup): Record<string, string> {
  return { ...group.labels, ...group.shared.labels, ...alert.labels };
}

function fieldValues(name: string, alert: APIAlert, group: APIAlertGroup): string[] {
  switch (name) {
    case '@state':
      return [alert.state];
    case '@receiver':
      return [alert.receiver];
    case '@alertmanager':
      return alert.alertmanager.map((am) => am.name);
    case '@cluster':
      return alert.alertmanager.map((am) => am.cluster);
    default: {
      const labels = effectiveLabels(alert, group);
      return Object.prototype.hasOwnProperty.call(labels, name) ? [labels[name]] : [];
    }
  }
}

function alertValues(alert: APIAlert, group: APIAlertGroup): string[] {
  return Object.values(effectiveLabels(alert, group));
}

export interface ParsedFilters {
  filters: AlertFilter[];
  /** 至少有一个合法过滤条件 */
  hasValid: boolean;
}

export function parseFilters(expressions: readonly string[]): ParsedFilters {
  const filters = expressions.map((expression) => AlertFilter.parse(expression));
  return { filters, hasValid: filters.some((f) => f.isValid) };
}

/**
 * 告警是否满足全部过滤条件
 */
export function alertMatches(
  alert: APIAlert,
  group: APIAlertGroup,
  filters: readonly AlertFilter[],
): boolean {
  return filters.every((filter) => filter.matches(alert, group));
}
