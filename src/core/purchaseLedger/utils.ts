import { randomUUID } from 'node:crypto';
import type { Decimal } from 'longport';
import { computeNetMargin } from '../feeModel/index.js';
import { decimalCompare, decimalMul, decimalSub, toDecimalValue } from '../../utils/numeric/index.js';
import type { DecimalInput } from '../../utils/numeric/types.js';
import type { Fee, Purchase } from '../../types/trading.js';
import type { LedgerEntry } from './types.js';

/**
 * 创建买入记录（生成新的 UUID）
 * @param btc 买入的比特币数量
 * @param rate 含买入手续费的成交汇率
 */
export function createPurchase(btc: DecimalInput, rate: DecimalInput): Purchase {
  return {
    id: randomUUID(),
    btc: toDecimalValue(btc),
    rate: toDecimalValue(rate),
  };
}

/**
 * 买入总成本（含买入手续费）：btc * rate
 */
export function getBuyingPrice(purchase: Purchase): Decimal {
  return decimalMul(purchase.btc, purchase.rate);
}

/**
 * 按当前趋势汇率卖出、不计卖出手续费时的毛利：btc * currentTrend - buyingPrice
 */
export function getMargin(purchase: Purchase, currentTrend: Decimal): Decimal {
  return decimalSub(decimalMul(purchase.btc, currentTrend), getBuyingPrice(purchase));
}

/**
 * 按当前趋势汇率卖出并扣除卖出手续费后的净利
 */
export function getMarginAfterFee(purchase: Purchase, currentTrend: Decimal, fee: Fee): Decimal {
  return computeNetMargin(getMargin(purchase, currentTrend), fee);
}

/**
 * 堆节点排序：汇率低者优先；汇率相同按插入序号，先入先出。
 * @returns 负数表示 left 应先出堆
 */
export function compareLedgerEntries(left: LedgerEntry, right: LedgerEntry): number {
  const byRate = decimalCompare(left.purchase.rate, right.purchase.rate);
  if (byRate !== 0) {
    return byRate;
  }
  return left.seq - right.seq;
}
