import { randomUUID } from 'node:crypto';
import type { Decimal } from 'longport';
import type { Offer, Purchase } from '../../types/trading.js';
import type { OfferPayload } from './types.js';

/**
 * 创建卖出报价（生成新的 UUID）
 * @param rate 预期成交汇率
 * @param purchases 按出堆顺序排列的买入记录
 */
export function createOffer(rate: Decimal, purchases: ReadonlyArray<Purchase>): Offer {
  return {
    id: randomUUID(),
    rate,
    purchases,
  };
}

/**
 * 将 Offer 转为出站线格式
 */
export function toOfferPayload(offer: Offer): OfferPayload {
  return {
    id: offer.id,
    rate: offer.rate.toString(),
    purchases: offer.purchases.map((purchase) => ({
      id: purchase.id,
      quantity: purchase.btc.toString(),
      rate: purchase.rate.toString(),
    })),
  };
}
