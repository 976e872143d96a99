/**
 * 通用类型定义
 * 包含整个应用通用的基础类型
 */

/**
 * API响应包装类型
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
}

/**
 * 时间戳类型 - ISO 8601 字符串
 */
export type ISODateString = string;

/**
 * 标签集合
 */
export type LabelSet = Record<string, string>;
