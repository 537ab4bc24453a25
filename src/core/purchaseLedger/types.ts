import type { Purchase } from '../../types/trading.js';

/**
 * 买入账本接口（行为契约）。
 * 类型用途：按买入汇率升序排列的优先队列，始终能以常数时间取到最便宜（最优）的买入记录。
 * 数据来源：由 sellerActor 在启动时创建（createPurchaseLedger），仅该 Actor 独占读写。
 * 使用范围：sellerActor、profitCollector 及测试。
 */
export interface PurchaseLedger {
  /** 加入买入记录（不做唯一性检查，id 由调用方保证唯一） */
  insert(purchase: Purchase): void;
  /** 查看汇率最低的买入记录，不移除；账本为空时返回 null */
  peekBest(): Purchase | null;
  /** 移除并返回 peekBest 会返回的记录；账本为空时返回 null */
  popBest(): Purchase | null;
  /** 账本中的记录数 */
  size(): number;
  /** 账本是否为空 */
  isEmpty(): boolean;
}

/**
 * 堆内节点（内部使用）。
 * seq 为插入序号，用于汇率相同时按插入顺序出堆。
 */
export type LedgerEntry = {
  readonly purchase: Purchase;
  readonly seq: number;
};
