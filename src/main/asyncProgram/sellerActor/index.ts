/**
 * 卖出 Actor 模块
 *
 * 功能：
 * - 独占一个买入账本，按到达顺序逐条消费入站消息
 * - NEW_PURCHASE：加入账本，不产生出站消息
 * - TREND_READING：过期读数记录警告后丢弃；否则执行利润收集，有报价时发往出站通道
 *
 * 终止条件（终止后不会重启）：
 * - 入站通道关闭（不会再有消息）
 * - 出站报价发送失败（下游消费者已离开）
 * 终止时关闭出站发送端与入站接收端，协作者据此感知 Actor 已停止。
 * 过期读数只是可恢复错误，不会停止 Actor。
 */
import { SELLER } from '../../../constants/index.js';
import { describeFee } from '../../../core/feeModel/index.js';
import { collectProfit } from '../../../core/profitCollector/index.js';
import { createPurchaseLedger } from '../../../core/purchaseLedger/index.js';
import type { Offer } from '../../../types/trading.js';
import {
  createStaleReadingError,
  formatError,
  isStaleReadingError,
} from '../../../utils/error/index.js';
import { logger as defaultLogger } from '../../../utils/logger/index.js';
import type { SellerActorDeps, SellerMessage, SellerState } from './types.js';
import { isReadingStale } from './utils.js';

/**
 * 处理单条入站消息，必要时生成卖出报价
 * @param message 入站消息
 * @param state Actor 状态（账本会被修改）
 * @param now 当前时间（毫秒）
 * @returns 有可卖出的买入记录时返回 Offer，否则返回 null
 * @throws {StaleReadingError} 趋势读数已过期
 */
export function routeSellerMessage(message: SellerMessage, state: SellerState, now: number): Offer | null {
  switch (message.type) {
    case 'TREND_READING': {
      if (isReadingStale(message.observedAt, now, SELLER.STALE_READING_THRESHOLD_MS)) {
        throw createStaleReadingError(now - message.observedAt, SELLER.STALE_READING_THRESHOLD_MS);
      }
      return collectProfit({
        ledger: state.ledger,
        rate: message.currentTrend,
        fee: state.fee,
        minMargin: state.minMargin,
      });
    }
    case 'NEW_PURCHASE':
      state.ledger.insert(message.purchase);
      return null;
  }
}

/**
 * 启动卖出 Actor（以空账本开始），不返回句柄，运行到任一终止条件出现为止
 * @param deps 依赖注入
 */
export function spawnSeller(deps: SellerActorDeps): void {
  const { input, output, fee, minMargin } = deps;
  const now = deps.now ?? Date.now;
  const log = deps.logger ?? defaultLogger;

  const state: SellerState = {
    ledger: createPurchaseLedger(),
    fee,
    minMargin,
  };

  /**
   * 处理单条消息；只有出站发送失败时返回 false
   */
  async function handleMessage(message: SellerMessage): Promise<boolean> {
    let offer: Offer | null;
    try {
      offer = routeSellerMessage(message, state, now());
    } catch (err) {
      if (isStaleReadingError(err)) {
        log.warn(`[SellerActor] 丢弃过期的趋势读数: ${err.message}`);
      } else {
        log.warn('[SellerActor] 消息处理失败', formatError(err));
      }
      return true;
    }

    if (message.type === 'NEW_PURCHASE') {
      log.debug(
        `[SellerActor] 新增买入 ${message.purchase.id}: ${message.purchase.btc.toString()} BTC @ ${message.purchase.rate.toString()}`,
      );
    }
    if (!offer) {
      return true;
    }

    try {
      await output.send(offer);
    } catch (err) {
      log.error('[SellerActor] 输出通道已关闭，停止运行', formatError(err));
      return false;
    }
    log.info(
      `[SellerActor] 发出卖出报价 ${offer.id}: 汇率 ${offer.rate.toString()}，共 ${offer.purchases.length} 笔买入，账本剩余 ${state.ledger.size()} 笔`,
    );
    return true;
  }

  async function runLoop(): Promise<void> {
    for (;;) {
      let message: SellerMessage;
      try {
        message = await input.recv();
      } catch (err) {
        log.error('[SellerActor] 输入通道已关闭，停止运行', formatError(err));
        break;
      }

      const canContinue = await handleMessage(message);
      if (!canContinue) {
        break;
      }
    }

    input.close();
    output.close();
  }

  log.info(`[SellerActor] 启动：卖出手续费 ${describeFee(fee)}，最低利润率 ${minMargin.toString()}%`);

  setImmediate(() => {
    runLoop().catch((err: unknown) => {
      log.error('[SellerActor] 处理循环异常退出', formatError(err));
    });
  });
}
