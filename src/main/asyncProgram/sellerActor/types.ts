import type { Decimal } from 'longport';
import type { PurchaseLedger } from '../../../core/purchaseLedger/types.js';
import type { Fee, Offer, Purchase } from '../../../types/trading.js';
import type { Logger } from '../../../utils/logger/types.js';
import type { ChannelReceiver, ChannelSender } from '../messageChannel/types.js';

/**
 * 卖出 Actor 入站消息（封闭的标签联合）。
 * 类型用途：TREND_READING 为最新汇率观测，NEW_PURCHASE 为买入方新完成的买入。
 * 数据来源：趋势发布组件、买入组件，以及下游未成交时重新注入的买入记录；可经 parseSellerMessage 从线格式解析。
 * 使用范围：sellerActor 及上游生产者。
 */
export type SellerMessage =
  | {
      readonly type: 'TREND_READING';
      /** 当前汇率趋势 */
      readonly currentTrend: Decimal;
      /** 观测时间戳（毫秒）；超过过期阈值的读数会被丢弃 */
      readonly observedAt: number;
    }
  | {
      readonly type: 'NEW_PURCHASE';
      readonly purchase: Purchase;
    };

/**
 * 卖出 Actor 依赖类型（spawnSeller 的参数）。
 * 类型用途：入站/出站通道与手续费、最低利润率配置；手续费与最低利润率在 Actor 生命周期内固定。
 * 数据来源：启动入口按配置组装；测试中直接构造。
 * 使用范围：仅 sellerActor 及启动流程使用。
 */
export type SellerActorDeps = {
  /** 入站消息通道接收端（Actor 为唯一消费者） */
  readonly input: ChannelReceiver<SellerMessage>;
  /** 出站报价通道发送端 */
  readonly output: ChannelSender<Offer>;
  /** 卖出手续费策略（不含买入手续费，买入手续费已计入买入汇率） */
  readonly fee: Fee;
  /** 每笔买入期望的最低利润率（百分点） */
  readonly minMargin: Decimal;
  /** 当前时间（毫秒），默认 Date.now */
  readonly now?: () => number;
  /** 日志记录器，默认全局 logger */
  readonly logger?: Logger;
};

/**
 * 卖出 Actor 内部状态。
 * 类型用途：账本由 Actor 独占，不会离开其处理循环。
 * 数据来源：spawnSeller 创建。
 * 使用范围：仅 sellerActor 内部及 routeSellerMessage。
 */
export type SellerState = {
  readonly ledger: PurchaseLedger;
  readonly fee: Fee;
  readonly minMargin: Decimal;
};
