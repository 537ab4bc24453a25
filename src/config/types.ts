import type { Decimal } from 'longport';
import type { Fee } from '../types/trading.js';

/**
 * 卖出程序配置。
 * 类型用途：启动卖出 Actor 所需的全部配置，解析自环境变量。
 * 数据来源：createSellerConfig 读取 SELLER_* 环境变量。
 * 使用范围：启动入口。
 */
export type SellerConfig = {
  /** 卖出手续费策略 */
  readonly fee: Fee;
  /** 最低利润率（百分点） */
  readonly minMargin: Decimal;
  /** 入站通道容量；null 为无界 */
  readonly inputCapacity: number | null;
  /** 出站通道容量；null 为无界 */
  readonly outputCapacity: number | null;
};

/**
 * 单项配置的解析结果（内部使用）。
 * ok 为 false 时表示该键的值非法，由 createSellerConfig 汇总报错。
 */
export type ConfigParseResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false };
