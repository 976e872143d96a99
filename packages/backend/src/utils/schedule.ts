/**
 * 轮询间隔与 cron 表达式（含秒字段）的转换
 *
 * cron 步长只在所属字段内循环，例如 45 秒步长会在每分钟的第 0 秒和第 45 秒触发。
 * 只有整除一分钟、一小时或一天的间隔才能等距调度
 */

const MINUTE = 60;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

/**
 * @returns 实际周期等于 seconds 的 cron 表达式，无法精确表达时返回 null
 */
export function intervalToCron(seconds: number): string | null {
  if (!Number.isInteger(seconds) || seconds <= 0) {
    return null;
  }
  if (seconds < MINUTE) {
    return MINUTE % seconds === 0 ? `*/${seconds} * * * * *` : null;
  }
  if (seconds < HOUR) {
    const minutes = seconds / MINUTE;
    if (!Number.isInteger(minutes) || HOUR % seconds !== 0) {
      return null;
    }
    return minutes === 1 ? '0 * * * * *' : `0 */${minutes} * * * *`;
  }
  if (seconds < DAY) {
    const hours = seconds / HOUR;
    if (!Number.isInteger(hours) || DAY % seconds !== 0) {
      return null;
    }
    return hours === 1 ? '0 0 * * * *' : `0 0 */${hours} * * *`;
  }
  return seconds === DAY ? '0 0 0 * * *' : null;
}

export const INTERVAL_HINT =
  'interval must evenly divide a minute, an hour or a day (e.g. 15, 30, 60, 300, 3600)';
