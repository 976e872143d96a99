/**
 * Shared Types - 类型定义导出
 *
 * 后端与前端消费方共享的类型定义
 */

export * from './common';
export * from './upstream';
export * from './alert';
export * from './stats';
export * from './view';
