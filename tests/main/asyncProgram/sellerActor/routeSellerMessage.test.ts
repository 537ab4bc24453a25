/**
 * routeSellerMessage 单元测试
 *
 * - 读数年龄严格大于 5 分钟才视为过期
 * - 过期读数无论是否有利可图都不会产生报价，账本保持不变
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { NO_FEE } from '../../../../src/core/feeModel/index.js';
import { createPurchaseLedger } from '../../../../src/core/purchaseLedger/index.js';
import { routeSellerMessage } from '../../../../src/main/asyncProgram/sellerActor/index.js';
import type { SellerState } from '../../../../src/main/asyncProgram/sellerActor/types.js';
import { isStaleReadingError } from '../../../../src/utils/error/index.js';
import { toDecimalValue } from '../../../../src/utils/numeric/index.js';
import { createManualClock } from '../../../helpers/testDoubles.js';
import { idsOf, makePurchase } from '../../../utils.js';

const FIVE_MINUTES_MS = 5 * 60 * 1000;
const OBSERVED_AT = 1_700_000_000_000;

function createState(): SellerState {
  return { ledger: createPurchaseLedger(), fee: NO_FEE, minMargin: toDecimalValue(5) };
}

describe('routeSellerMessage', () => {
  it('inserts a new purchase without producing an offer', () => {
    const state = createState();
    const purchase = makePurchase(1, 100);

    assert.equal(routeSellerMessage({ type: 'NEW_PURCHASE', purchase }, state, OBSERVED_AT), null);
    assert.equal(state.ledger.peekBest()?.id, purchase.id);
  });

  it('evaluates a reading exactly at the staleness threshold', () => {
    const state = createState();
    const purchase = makePurchase(1, 100);
    state.ledger.insert(purchase);
    const clock = createManualClock(OBSERVED_AT);
    clock.advance(FIVE_MINUTES_MS);

    const offer = routeSellerMessage(
      { type: 'TREND_READING', currentTrend: toDecimalValue(1000), observedAt: OBSERVED_AT },
      state,
      clock.now(),
    );

    assert.ok(offer);
    assert.deepEqual(idsOf(offer.purchases), idsOf([purchase]));
  });

  it('rejects a reading older than the staleness threshold', () => {
    const state = createState();
    state.ledger.insert(makePurchase(1, 100));
    const clock = createManualClock(OBSERVED_AT);
    clock.advance(FIVE_MINUTES_MS + 1);

    assert.throws(
      () =>
        routeSellerMessage(
          { type: 'TREND_READING', currentTrend: toDecimalValue(1_000_000), observedAt: OBSERVED_AT },
          state,
          clock.now(),
        ),
      (err: unknown) => isStaleReadingError(err) && err.ageMs === FIVE_MINUTES_MS + 1,
    );
    assert.equal(state.ledger.size(), 1);
  });
});
