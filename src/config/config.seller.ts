/**
 * 卖出程序配置模块
 *
 * 环境变量：
 * - SELLER_FEE_PERCENT：卖出手续费百分点（默认 0.25；none 或 0 表示不收取）
 * - SELLER_MIN_MARGIN_PERCENT：最低利润率百分点（默认 5）
 * - SELLER_INPUT_CAPACITY / SELLER_OUTPUT_CAPACITY：通道容量（非负整数，未设置为无界）
 */
import { SELLER } from '../constants/index.js';
import { createPercentageFee, NO_FEE } from '../core/feeModel/index.js';
import { createConfigValidationError } from '../utils/error/index.js';
import { decimalEq } from '../utils/numeric/index.js';
import type { Fee } from '../types/trading.js';
import type { ConfigParseResult, SellerConfig } from './types.js';
import { getCapacityConfig, getDecimalConfig, getStringConfig } from './utils.js';

/**
 * 解析卖出手续费配置
 */
function parseFeeConfig(env: NodeJS.ProcessEnv): ConfigParseResult<Fee> {
  if (getStringConfig(env, 'SELLER_FEE_PERCENT')?.toLowerCase() === 'none') {
    return { ok: true, value: NO_FEE };
  }
  const percent = getDecimalConfig(env, 'SELLER_FEE_PERCENT', SELLER.DEFAULT_FEE_PERCENT);
  if (!percent.ok) {
    return percent;
  }
  return { ok: true, value: decimalEq(percent.value, 0) ? NO_FEE : createPercentageFee(percent.value) };
}

/**
 * 从环境变量创建卖出程序配置
 * @throws {ConfigValidationError} 存在非法配置值时抛出，invalidFields 列出全部非法键
 */
export function createSellerConfig({ env }: { env: NodeJS.ProcessEnv }): SellerConfig {
  const fee = parseFeeConfig(env);
  const minMargin = getDecimalConfig(env, 'SELLER_MIN_MARGIN_PERCENT', SELLER.DEFAULT_MIN_MARGIN_PERCENT);
  const inputCapacity = getCapacityConfig(env, 'SELLER_INPUT_CAPACITY');
  const outputCapacity = getCapacityConfig(env, 'SELLER_OUTPUT_CAPACITY');

  if (fee.ok && minMargin.ok && inputCapacity.ok && outputCapacity.ok) {
    return {
      fee: fee.value,
      minMargin: minMargin.value,
      inputCapacity: inputCapacity.value,
      outputCapacity: outputCapacity.value,
    };
  }

  const invalidFields: string[] = [];
  if (!fee.ok) invalidFields.push('SELLER_FEE_PERCENT');
  if (!minMargin.ok) invalidFields.push('SELLER_MIN_MARGIN_PERCENT');
  if (!inputCapacity.ok) invalidFields.push('SELLER_INPUT_CAPACITY');
  if (!outputCapacity.ok) invalidFields.push('SELLER_OUTPUT_CAPACITY');

  throw createConfigValidationError(`配置验证失败：${invalidFields.join(', ')} 取值非法`, invalidFields);
}
