import assert from 'node:assert/strict';
import { createPurchase } from '../src/core/purchaseLedger/utils.js';
import { createPurchaseLedger } from '../src/core/purchaseLedger/index.js';
import type { PurchaseLedger } from '../src/core/purchaseLedger/types.js';
import type { Purchase } from '../src/types/trading.js';
import { decimalEq } from '../src/utils/numeric/index.js';
import type { DecimalInput } from '../src/utils/numeric/types.js';

/**
 * 按数量与汇率创建买入记录
 */
export function makePurchase(btc: DecimalInput, rate: DecimalInput): Purchase {
  return createPurchase(btc, rate);
}

/**
 * 创建包含给定买入记录的账本
 */
export function makeLedger(purchases: ReadonlyArray<Purchase>): PurchaseLedger {
  const ledger = createPurchaseLedger();
  for (const purchase of purchases) {
    ledger.insert(purchase);
  }
  return ledger;
}

/**
 * 按数值比较 Decimal（不区分精度位数）
 */
export function assertDecimalEquals(actual: DecimalInput, expected: DecimalInput): void {
  assert.ok(decimalEq(actual, expected), `expected ${String(expected)}, got ${actual.toString()}`);
}

/**
 * 提取买入记录 id，便于按顺序断言
 */
export function idsOf(purchases: ReadonlyArray<Purchase>): string[] {
  return purchases.map((purchase) => purchase.id);
}

/**
 * 等待一轮事件循环（setImmediate 调度的任务得以执行）
 */
export function nextTick(): Promise<void> {
  return new Promise((resolve) => {
    setImmediate(resolve);
  });
}
