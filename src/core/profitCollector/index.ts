/**
 * 利润收集模块
 *
 * 按买入汇率从低到高依次评估账本中的买入记录：
 * 1. 查看当前最优（汇率最低）的买入记录，账本为空则结束
 * 2. 计算按当前汇率卖出并扣除手续费后的净利
 * 3. 计算该笔要求的最低利润：买入成本 / 100 * 最低利润率
 * 4. 净利严格大于最低利润时移出账本并加入本轮批次，继续评估下一笔
 * 5. 否则立即结束：不会越过当前最优记录去评估更贵的记录
 *
 * 本模块无状态，只通过传入的账本读写。
 */
import { SELLER } from '../../constants/index.js';
import { decimalDiv, decimalGt, decimalMul } from '../../utils/numeric/index.js';
import type { Offer, Purchase } from '../../types/trading.js';
import { getBuyingPrice, getMarginAfterFee } from '../purchaseLedger/utils.js';
import type { CollectProfitParams } from './types.js';
import { createOffer } from './utils.js';

/**
 * 从账本中收集可盈利卖出的买入记录
 * @returns 有记录入选时返回 Offer（rate 为当前汇率），否则返回 null
 */
export function collectProfit({ ledger, rate, fee, minMargin }: CollectProfitParams): Offer | null {
  const purchasesToSell: Purchase[] = [];

  for (let top = ledger.peekBest(); top !== null; top = ledger.peekBest()) {
    const margin = getMarginAfterFee(top, rate, fee);
    const flatMinimumMargin = decimalMul(decimalDiv(getBuyingPrice(top), SELLER.PERCENT_BASE), minMargin);

    if (!decimalGt(margin, flatMinimumMargin)) {
      break;
    }

    const popped = ledger.popBest();
    if (!popped) {
      break;
    }
    purchasesToSell.push(popped);
  }

  return purchasesToSell.length > 0 ? createOffer(rate, purchasesToSell) : null;
}
