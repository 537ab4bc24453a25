import { createPurchase } from '../../../core/purchaseLedger/utils.js';
import { toDecimalStrict } from '../../../utils/numeric/index.js';
import { isRecord } from '../../../utils/primitives/index.js';
import type { SellerMessage } from './types.js';

/**
 * 解析观测时间：接受毫秒时间戳或可被 Date.parse 识别的字符串。
 */
function parseObservedAt(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

/**
 * 将入站线格式解析为卖出 Actor 消息。
 * 默认行为：
 * - { type: 'TREND_READING', currentTrend, observedAt } → TREND_READING
 * - { type: 'NEW_PURCHASE', quantity, rate } → NEW_PURCHASE（生成新的买入 id）
 * - 数值可为字符串或有限 number；其他输入返回 null
 *
 * @param raw 未知输入
 * @returns 解析后的消息，或 null
 */
export function parseSellerMessage(raw: unknown): SellerMessage | null {
  if (!isRecord(raw)) {
    return null;
  }

  if (raw['type'] === 'TREND_READING') {
    const currentTrend = toDecimalStrict(raw['currentTrend']);
    const observedAt = parseObservedAt(raw['observedAt']);
    if (!currentTrend || observedAt === null) {
      return null;
    }
    return { type: 'TREND_READING', currentTrend, observedAt };
  }

  if (raw['type'] === 'NEW_PURCHASE') {
    const quantity = toDecimalStrict(raw['quantity']);
    const rate = toDecimalStrict(raw['rate']);
    if (!quantity || !rate) {
      return null;
    }
    return { type: 'NEW_PURCHASE', purchase: createPurchase(quantity, rate) };
  }

  return null;
}

/**
 * 判断趋势读数是否过期：当前时间与观测时间之差严格大于阈值。
 */
export function isReadingStale(observedAt: number, now: number, thresholdMs: number): boolean {
  return now - observedAt > thresholdMs;
}
