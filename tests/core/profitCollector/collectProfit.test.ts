/**
 * collectProfit 单元测试
 *
 * 账本：5 BTC @450、1 BTC @900、5 BTC @1000；卖出手续费 1%
 * - 趋势 1000、最低利润率 20%：仅 @450 入选（@900 净利 99 < 要求 180，循环停止）
 * - 趋势 1000、最低利润率 5%：@450、@900 依次入选（@1000 毛利为 0）
 * - 趋势 400：最优买入已亏损，无报价
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { collectProfit } from '../../../src/core/profitCollector/index.js';
import { toOfferPayload } from '../../../src/core/profitCollector/utils.js';
import { createPercentageFee, NO_FEE } from '../../../src/core/feeModel/index.js';
import type { PurchaseLedger } from '../../../src/core/purchaseLedger/types.js';
import type { Purchase } from '../../../src/types/trading.js';
import { toDecimalValue } from '../../../src/utils/numeric/index.js';
import { assertDecimalEquals, idsOf, makeLedger, makePurchase } from '../../utils.js';

const fee = createPercentageFee(1);

function createScenario(): {
  ledger: PurchaseLedger;
  purchaseFor450: Purchase;
  purchaseFor900: Purchase;
  purchaseFor1000: Purchase;
} {
  const purchaseFor1000 = makePurchase(5, 1000);
  const purchaseFor900 = makePurchase(1, 900);
  const purchaseFor450 = makePurchase(5, 450);
  return {
    ledger: makeLedger([purchaseFor1000, purchaseFor450, purchaseFor900]),
    purchaseFor450,
    purchaseFor900,
    purchaseFor1000,
  };
}

describe('collectProfit', () => {
  it('sells only the cheapest purchase when the next one misses a 20% margin', () => {
    const { ledger, purchaseFor450 } = createScenario();

    const offer = collectProfit({
      ledger,
      rate: toDecimalValue(1000),
      fee,
      minMargin: toDecimalValue(20),
    });

    assert.ok(offer);
    assert.deepEqual(idsOf(offer.purchases), idsOf([purchaseFor450]));
    assertDecimalEquals(offer.rate, 1000);
    assert.equal(ledger.size(), 2);
  });

  it('sells purchases cheapest first while each clears a 5% margin', () => {
    const { ledger, purchaseFor450, purchaseFor900, purchaseFor1000 } = createScenario();

    const offer = collectProfit({
      ledger,
      rate: toDecimalValue(1000),
      fee,
      minMargin: toDecimalValue(5),
    });

    assert.ok(offer);
    assert.deepEqual(idsOf(offer.purchases), idsOf([purchaseFor450, purchaseFor900]));
    assert.equal(ledger.peekBest()?.id, purchaseFor1000.id);
  });

  it('returns null when the best purchase is already at a loss', () => {
    const { ledger } = createScenario();

    for (const minMargin of [5, 20, 50]) {
      const offer = collectProfit({
        ledger,
        rate: toDecimalValue(400),
        fee,
        minMargin: toDecimalValue(minMargin),
      });
      assert.equal(offer, null);
    }
    assert.equal(ledger.size(), 3);
  });

  it('yields nothing on an immediate second collection at the same rate', () => {
    const { ledger } = createScenario();
    const params = { ledger, rate: toDecimalValue(1000), fee, minMargin: toDecimalValue(20) };

    assert.notEqual(collectProfit(params), null);
    assert.equal(collectProfit(params), null);
    assert.equal(ledger.size(), 2);
  });

  it('requires the net margin to strictly exceed the minimum', () => {
    // 毛利 100，要求 1000 / 100 * 10 = 100，相等不卖出
    const ledger = makeLedger([makePurchase(1, 1000)]);
    const offer = collectProfit({ ledger, rate: toDecimalValue(1100), fee: NO_FEE, minMargin: toDecimalValue(10) });
    assert.equal(offer, null);
    assert.equal(ledger.size(), 1);
  });

  it('returns null for an empty ledger', () => {
    const offer = collectProfit({
      ledger: makeLedger([]),
      rate: toDecimalValue(1000),
      fee,
      minMargin: toDecimalValue(5),
    });
    assert.equal(offer, null);
  });

  it('gives every offer a fresh id', () => {
    const first = collectProfit({
      ledger: makeLedger([makePurchase(1, 100)]),
      rate: toDecimalValue(1000),
      fee: NO_FEE,
      minMargin: toDecimalValue(5),
    });
    const second = collectProfit({
      ledger: makeLedger([makePurchase(1, 100)]),
      rate: toDecimalValue(1000),
      fee: NO_FEE,
      minMargin: toDecimalValue(5),
    });
    assert.ok(first && second);
    assert.notEqual(first.id, second.id);
  });
});

describe('toOfferPayload', () => {
  it('serializes decimals as strings in purchase order', () => {
    const { ledger, purchaseFor450, purchaseFor900 } = createScenario();
    const offer = collectProfit({ ledger, rate: toDecimalValue(1000), fee, minMargin: toDecimalValue(5) });
    assert.ok(offer);

    assert.deepEqual(toOfferPayload(offer), {
      id: offer.id,
      rate: '1000',
      purchases: [
        { id: purchaseFor450.id, quantity: '5', rate: '450' },
        { id: purchaseFor900.id, quantity: '1', rate: '900' },
      ],
    });
  });
});
