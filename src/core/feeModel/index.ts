/**
 * 手续费模型
 *
 * 将毛利按卖出手续费策略换算为净利：
 * - PERCENTAGE(p)：net = gross - gross / 100 * p（p 为百分点，10 表示 10%）
 * - NONE：net = gross
 */
import type { Decimal } from 'longport';
import { SELLER } from '../../constants/index.js';
import { decimalDiv, decimalMul, decimalSub, toDecimalValue } from '../../utils/numeric/index.js';
import type { DecimalInput } from '../../utils/numeric/types.js';
import type { Fee } from '../../types/trading.js';

/** 不收取卖出手续费 */
export const NO_FEE: Fee = { type: 'NONE' };

/**
 * 创建按百分点收取的手续费策略
 * @param percent 百分点（如 0.25 表示 0.25%）
 */
export function createPercentageFee(percent: DecimalInput): Fee {
  return { type: 'PERCENTAGE', percent: toDecimalValue(percent) };
}

/**
 * 计算扣除卖出手续费后的净利
 * @param grossMargin 毛利（可为负）
 * @param fee 手续费策略
 * @returns 净利
 */
export function computeNetMargin(grossMargin: Decimal, fee: Fee): Decimal {
  switch (fee.type) {
    case 'PERCENTAGE': {
      const flatFee = decimalMul(decimalDiv(grossMargin, SELLER.PERCENT_BASE), fee.percent);
      return decimalSub(grossMargin, flatFee);
    }
    case 'NONE':
      return grossMargin;
  }
}

/**
 * 手续费策略的日志展示文本
 */
export function describeFee(fee: Fee): string {
  return fee.type === 'PERCENTAGE' ? `${fee.percent.toString()}%` : '无';
}
