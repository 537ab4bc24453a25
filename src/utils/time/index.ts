/**
 * 将时间转换为 UTC 日志格式字符串。
 * 默认行为：date 为 null 时使用当前时间。
 *
 * @param date 时间对象，默认 null（当前时间）
 * @returns UTC 时间字符串 YYYY-MM-DD HH:mm:ss.sss
 */
export function toUtcTimeLog(date: Date | null = null): string {
  const targetDate = date ?? new Date();

  const year = targetDate.getUTCFullYear();
  const month = String(targetDate.getUTCMonth() + 1).padStart(2, '0');
  const day = String(targetDate.getUTCDate()).padStart(2, '0');
  const hours = String(targetDate.getUTCHours()).padStart(2, '0');
  const minutes = String(targetDate.getUTCMinutes()).padStart(2, '0');
  const seconds = String(targetDate.getUTCSeconds()).padStart(2, '0');
  const milliseconds = String(targetDate.getUTCMilliseconds()).padStart(3, '0');

  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}.${milliseconds}`;
}
