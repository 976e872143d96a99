/**
 * 上游轮询 Worker
 *
 * 按配置的间隔刷新所有上游；上一轮尚未完成时跳过本次执行
 */

import cron, { ScheduledTask } from 'node-cron';
import { workerLogger } from '../logger';
import { intervalToCron, INTERVAL_HINT } from '../utils/schedule';

export interface Refreshable {
  refresh(): Promise<void>;
}

/** Worker 运行状态 */
let isRunning = false;

/** 定时任务实例 */
let scheduledTask: ScheduledTask | null = null;

/**
 * 执行一轮刷新
 */
export async function runPollCycle(registry: Refreshable): Promise<boolean> {
  if (isRunning) {
    workerLogger.info('上游刷新正在运行中，跳过本次执行');
    return false;
  }

  isRunning = true;
  const startTime = Date.now();
  try {
    await registry.refresh();
    workerLogger.debug({ durationMs: Date.now() - startTime }, '上游刷新完成');
    return true;
  } catch (error) {
    workerLogger.error({ err: error, durationMs: Date.now() - startTime }, '上游刷新失败');
    return false;
  } finally {
    isRunning = false;
  }
}

// ==================== Worker 控制 ====================

/**
 * 启动上游轮询 Worker
 *
 * @param intervalSeconds 轮询间隔（秒）
 */
export function startUpstreamPollWorker(registry: Refreshable, intervalSeconds: number): ScheduledTask {
  const schedule = intervalToCron(intervalSeconds);
  if (schedule === null) {
    throw new Error(`Invalid poll interval ${intervalSeconds}s: ${INTERVAL_HINT}`);
  }
  workerLogger.info({ schedule, intervalSeconds }, '启动上游轮询 Worker');

  scheduledTask = cron.schedule(schedule, () => {
    runPollCycle(registry).catch((err) => {
      workerLogger.error({ err }, '未捕获的错误');
    });
  });

  return scheduledTask;
}

/**
 * 停止上游轮询 Worker
 */
export function stopUpstreamPollWorker(): void {
  if (scheduledTask) {
    scheduledTask.stop();
    scheduledTask = null;
    workerLogger.info('上游轮询 Worker 已停止');
  }
  isRunning = false;
}
