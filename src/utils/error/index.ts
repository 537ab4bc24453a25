import { inspect } from 'node:util';
import { isRecord } from '../primitives/index.js';
import type {
  ChannelClosedError,
  ChannelSide,
  ConfigValidationError,
  StaleReadingError,
} from './types.js';

/**
 * 类型保护：检查是否为类似错误的对象（内部使用）。
 *
 * @param value 待检查值
 * @returns 如果对象包含常见错误字段返回 true
 */
function isErrorLike(value: unknown): value is Record<string, unknown> {
  if (!isRecord(value)) {
    return false;
  }
  return (
    typeof value['message'] === 'string' ||
    typeof value['error'] === 'string' ||
    typeof value['msg'] === 'string' ||
    typeof value['code'] === 'string'
  );
}

/**
 * 将错误对象格式化为可读字符串。
 * 默认行为：null/undefined 返回「未知错误」；Error 取 message；类错误对象取 message/error/msg/code；否则 JSON 或 inspect。
 *
 * @param err 任意错误或未知值
 * @returns 可读错误消息字符串
 */
export function formatError(err: unknown): string {
  if (err === null || err === undefined) {
    return '未知错误';
  }
  if (typeof err === 'string') {
    return err;
  }
  if (err instanceof Error) {
    return err.message || err.name || 'Error';
  }
  if (typeof err !== 'object') {
    return inspect(err, { depth: 5, maxArrayLength: 100 });
  }
  if (isErrorLike(err)) {
    const errorKeys = ['message', 'error', 'msg', 'code'] as const;
    for (const key of errorKeys) {
      const value = err[key];
      if (typeof value === 'string' && value.length > 0) {
        return value;
      }
    }
  }
  try {
    return JSON.stringify(err);
  } catch {
    return inspect(err, { depth: 5, maxArrayLength: 100 });
  }
}

/**
 * 创建通道关闭错误
 * @param side 已关闭的一端
 */
export function createChannelClosedError(side: ChannelSide): ChannelClosedError {
  const message = side === 'sender' ? '通道发送端已关闭' : '通道接收端已关闭';
  return Object.assign(new Error(message), {
    name: 'ChannelClosedError' as const,
    side,
  });
}

/**
 * 创建趋势读数过期错误
 * @param ageMs 读数年龄（毫秒）
 * @param thresholdMs 过期阈值（毫秒）
 */
export function createStaleReadingError(ageMs: number, thresholdMs: number): StaleReadingError {
  return Object.assign(
    new Error(`趋势读数已过期：观测于 ${ageMs}ms 前，阈值 ${thresholdMs}ms`),
    {
      name: 'StaleReadingError' as const,
      ageMs,
    },
  );
}

/**
 * 创建配置验证错误
 * @param message 错误消息
 * @param invalidFields 非法的配置键
 */
export function createConfigValidationError(
  message: string,
  invalidFields: ReadonlyArray<string> = [],
): ConfigValidationError {
  return Object.assign(new Error(message), {
    name: 'ConfigValidationError' as const,
    invalidFields,
  });
}

/** 类型保护：是否为 ChannelClosedError */
export function isChannelClosedError(value: unknown): value is ChannelClosedError {
  return value instanceof Error && value.name === 'ChannelClosedError';
}

/** 类型保护：是否为 StaleReadingError */
export function isStaleReadingError(value: unknown): value is StaleReadingError {
  return value instanceof Error && value.name === 'StaleReadingError';
}

/** 类型保护：是否为 ConfigValidationError */
export function isConfigValidationError(value: unknown): value is ConfigValidationError {
  return value instanceof Error && value.name === 'ConfigValidationError';
}
