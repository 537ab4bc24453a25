/**
 * 全局常量模块
 *
 * 统一管理项目中使用的常量，包括：
 * - 时间相关：毫秒换算
 * - 卖出相关：趋势读数过期阈值、百分比基数
 * - 日志相关：日志级别、流超时配置
 */

/** 时间相关常量 */
export const TIME = {
  /** 每秒的毫秒数 */
  MILLISECONDS_PER_SECOND: 1000,
  /** 每分钟的毫秒数 */
  MILLISECONDS_PER_MINUTE: 60 * 1000,
} as const;

/** 卖出相关常量 */
export const SELLER = {
  /** 趋势读数过期阈值（毫秒），观测时间早于此阈值的读数直接丢弃 */
  STALE_READING_THRESHOLD_MS: 5 * TIME.MILLISECONDS_PER_MINUTE,
  /** 百分比基数，百分点换算为比例时的除数 */
  PERCENT_BASE: '100',
  /** 默认卖出手续费（百分点） */
  DEFAULT_FEE_PERCENT: '0.25',
  /** 默认最低利润率（百分点） */
  DEFAULT_MIN_MARGIN_PERCENT: '5',
} as const;

/** 日志级别常量（与 pino 自定义级别一致） */
export const LOG_LEVELS = {
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
} as const;

/** 日志相关常量，用于 pino 日志系统 */
export const LOGGING = {
  /** 文件流 drain 超时时间（毫秒） */
  DRAIN_TIMEOUT_MS: 5000,
  /** 控制台流 drain 超时时间（毫秒） */
  CONSOLE_DRAIN_TIMEOUT_MS: 3000,
} as const;
