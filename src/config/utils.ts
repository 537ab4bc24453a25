import type { Decimal } from 'longport';
import { decimalLt, toDecimalStrict } from '../utils/numeric/index.js';
import type { ConfigParseResult } from './types.js';

/**
 * 读取字符串配置，未设置、空串或占位符（形如 your_xxx_here）时返回 null。
 * @param env - 进程环境变量对象
 * @param envKey - 环境变量键名
 * @returns 去除首尾空白后的字符串，或 null
 */
export function getStringConfig(env: NodeJS.ProcessEnv, envKey: string): string | null {
  const value = env[envKey];
  if (!value || value.trim() === '' || value === `your_${envKey.toLowerCase()}_here`) {
    return null;
  }
  return value.trim();
}

/**
 * 读取非负 Decimal 配置（百分点等），未设置时使用默认值。
 * @param env - 进程环境变量对象
 * @param envKey - 环境变量键名
 * @param defaultValue - 未设置时的默认值
 * @returns 解析结果；无法解析或为负数时 ok 为 false
 */
export function getDecimalConfig(
  env: NodeJS.ProcessEnv,
  envKey: string,
  defaultValue: string,
): ConfigParseResult<Decimal> {
  const value = toDecimalStrict(getStringConfig(env, envKey) ?? defaultValue);
  if (!value || decimalLt(value, 0)) {
    return { ok: false };
  }
  return { ok: true, value };
}

/**
 * 读取通道容量配置：未设置为无界（null），否则须为非负整数。
 * @param env - 进程环境变量对象
 * @param envKey - 环境变量键名
 * @returns 解析结果；非整数或负数时 ok 为 false
 */
export function getCapacityConfig(
  env: NodeJS.ProcessEnv,
  envKey: string,
): ConfigParseResult<number | null> {
  const value = getStringConfig(env, envKey);
  if (value === null) {
    return { ok: true, value: null };
  }
  const num = Number(value);
  if (!Number.isInteger(num) || num < 0) {
    return { ok: false };
  }
  return { ok: true, value: num };
}
