import type { Decimal } from 'longport';

/**
 * 买入记录。
 * 类型用途：一次已完成的比特币买入，创建后数量与汇率不再变化，只有是否在账本中会变化（在 = 未卖出）。
 * 数据来源：买入方执行买入后通过 NEW_PURCHASE 消息送入卖出 Actor；下游未成交时重新注入。
 * 使用范围：purchaseLedger、profitCollector、sellerActor、出站 Offer；全项目可引用。
 */
export type Purchase = {
  /** 买入时生成的唯一标识（UUID） */
  readonly id: string;
  /** 本次买入的比特币数量 */
  readonly btc: Decimal;
  /**
   * 成交汇率（每个比特币支付的法币）。
   * 已包含买入手续费，因此 btc * rate 即为本次买入的实际成本。
   */
  readonly rate: Decimal;
};

/**
 * 卖出手续费策略。
 * 类型用途：交易所从卖出成交中抽取的费用；PERCENTAGE 按毛利百分点扣除，NONE 不扣除。
 * 数据来源：配置解析（SELLER_FEE_PERCENT）。
 * 使用范围：feeModel、profitCollector、sellerActor、config。
 *
 * 注意：这里只应是卖出手续费，买入手续费已计入 Purchase.rate。
 */
export type Fee =
  | { readonly type: 'PERCENTAGE'; readonly percent: Decimal }
  | { readonly type: 'NONE' };

/**
 * 卖出报价。
 * 类型用途：一轮利润收集选出的待卖出买入记录集合；多笔买入可合并到同一报价中。
 * 数据来源：profitCollector 在趋势读数满足利润要求时生成。
 * 使用范围：sellerActor 出站通道及下游交易执行组件；核心内不存储。
 */
export type Offer = {
  readonly id: string;
  /** 预期成交汇率（即评估时的趋势汇率） */
  readonly rate: Decimal;
  /** 纳入报价的买入记录，按原买入汇率升序（最便宜在前） */
  readonly purchases: ReadonlyArray<Purchase>;
};
