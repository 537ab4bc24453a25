/**
 * purchaseLedger 单元测试
 *
 * - 出堆顺序按买入汇率非递减
 * - 汇率相同时按插入顺序出堆
 * - 买入成本与（扣费前后）利润计算
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createPurchaseLedger } from '../../../src/core/purchaseLedger/index.js';
import { getBuyingPrice, getMargin, getMarginAfterFee } from '../../../src/core/purchaseLedger/utils.js';
import { createPercentageFee } from '../../../src/core/feeModel/index.js';
import { decimalGte, toDecimalValue } from '../../../src/utils/numeric/index.js';
import type { Purchase } from '../../../src/types/trading.js';
import { assertDecimalEquals, idsOf, makeLedger, makePurchase } from '../../utils.js';

describe('purchase ledger', () => {
  it('returns null from peek and pop when empty', () => {
    const ledger = createPurchaseLedger();
    assert.equal(ledger.peekBest(), null);
    assert.equal(ledger.popBest(), null);
    assert.equal(ledger.isEmpty(), true);
    assert.equal(ledger.size(), 0);
  });

  it('exposes the lowest-rate purchase without removing it', () => {
    const lower = makePurchase(2, 100);
    const higher = makePurchase(1, 200);
    const ledger = makeLedger([higher, lower]);

    assert.equal(ledger.peekBest()?.id, lower.id);
    assert.equal(ledger.size(), 2);
    assert.equal(ledger.popBest()?.id, lower.id);
    assert.equal(ledger.peekBest()?.id, higher.id);
    assert.equal(ledger.size(), 1);
  });

  it('pops purchases in non-decreasing rate order', () => {
    const rates = ['950.5', '120', '3000', '120.01', '7', '640', '640', '15000', '0.5', '2200', '88', '450'];
    const ledger = makeLedger(rates.map((rate) => makePurchase(1, rate)));

    const popped: Purchase[] = [];
    for (let next = ledger.popBest(); next !== null; next = ledger.popBest()) {
      popped.push(next);
    }

    assert.equal(popped.length, rates.length);
    for (let i = 1; i < popped.length; i += 1) {
      const previous = popped[i - 1];
      const current = popped[i];
      assert.ok(previous && current && decimalGte(current.rate, previous.rate));
    }
    assert.equal(ledger.isEmpty(), true);
  });

  it('keeps sorting correctly when inserts and pops interleave', () => {
    const ledger = makeLedger([makePurchase(1, 500), makePurchase(1, 300)]);
    assertDecimalEquals(ledger.popBest()?.rate ?? 'NaN', 300);
    ledger.insert(makePurchase(1, 100));
    ledger.insert(makePurchase(1, 400));
    assertDecimalEquals(ledger.popBest()?.rate ?? 'NaN', 100);
    assertDecimalEquals(ledger.popBest()?.rate ?? 'NaN', 400);
    assertDecimalEquals(ledger.popBest()?.rate ?? 'NaN', 500);
    assert.equal(ledger.popBest(), null);
  });

  // 汇率相同的买入按插入顺序出堆，结果确定
  it('breaks rate ties by insertion order', () => {
    const first = makePurchase(1, 100);
    const second = makePurchase(2, 100);
    const cheapest = makePurchase(3, 50);
    const third = makePurchase(4, 100);
    const ledger = makeLedger([first, second, cheapest, third]);

    const popped = [ledger.popBest(), ledger.popBest(), ledger.popBest(), ledger.popBest()];
    assert.deepEqual(
      popped.map((purchase) => purchase?.id),
      idsOf([cheapest, first, second, third]),
    );
  });

  it('does not deduplicate purchases by id', () => {
    const purchase = makePurchase(1, 100);
    const ledger = makeLedger([purchase, purchase]);
    assert.equal(ledger.size(), 2);
  });
});

describe('purchase arithmetic', () => {
  it('computes the buying price from quantity and rate', () => {
    assertDecimalEquals(getBuyingPrice(makePurchase('1.75', 8000)), 14000);
  });

  it('returns the margin against the current trend', () => {
    assertDecimalEquals(getMargin(makePurchase('1.75', 8000), toDecimalValue(10000)), 3500);
    assertDecimalEquals(getMargin(makePurchase(5, 100), toDecimalValue(50)), -250);
  });

  it('returns the margin minus the selling fee', () => {
    const purchase = makePurchase(2, 100);
    assertDecimalEquals(getMarginAfterFee(purchase, toDecimalValue(1000), createPercentageFee(10)), 1620);
  });

  it('assigns a unique id to each purchase', () => {
    const a = makePurchase(1, 100);
    const b = makePurchase(1, 100);
    assert.notEqual(a.id, b.id);
    assert.match(a.id, /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});
