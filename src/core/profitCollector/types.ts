import type { Decimal } from 'longport';
import type { PurchaseLedger } from '../purchaseLedger/types.js';
import type { Fee } from '../../types/trading.js';

/**
 * 利润收集参数。
 * 类型用途：一轮利润收集的输入，账本由调用方（卖出 Actor）独占持有。
 * 数据来源：sellerActor 在收到未过期的趋势读数时组装。
 * 使用范围：profitCollector。
 */
export type CollectProfitParams = {
  /** 待评估的买入账本（选中的记录会被移除） */
  readonly ledger: PurchaseLedger;
  /** 当前趋势汇率 */
  readonly rate: Decimal;
  /** 卖出手续费策略 */
  readonly fee: Fee;
  /** 最低利润率（百分点，相对于单笔买入成本） */
  readonly minMargin: Decimal;
};

/**
 * 出站报价载荷（线格式）。
 * 类型用途：Offer 序列化后交给下游交易执行组件，数值以十进制字符串表示避免精度损失。
 * 数据来源：由 toOfferPayload 生成。
 * 使用范围：下游消费者、测试。
 */
export type OfferPayload = {
  readonly id: string;
  readonly rate: string;
  readonly purchases: ReadonlyArray<{
    readonly id: string;
    readonly quantity: string;
    readonly rate: string;
  }>;
};
