/**
 * error 工具模块测试
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  createChannelClosedError,
  createStaleReadingError,
  formatError,
  isChannelClosedError,
  isStaleReadingError,
} from '../../src/utils/error/index.js';

describe('formatError', () => {
  it('renders common thrown values', () => {
    assert.equal(formatError(null), '未知错误');
    assert.equal(formatError('boom'), 'boom');
    assert.equal(formatError(new Error('broken pipe')), 'broken pipe');
    assert.equal(formatError({ code: 'ECONNRESET' }), 'ECONNRESET');
    assert.equal(formatError({ foo: 1 }), '{"foo":1}');
  });
});

describe('typed errors', () => {
  it('tags channel closed errors with the closed side', () => {
    const err = createChannelClosedError('receiver');
    assert.equal(isChannelClosedError(err), true);
    assert.equal(isStaleReadingError(err), false);
    assert.equal(err.side, 'receiver');
    assert.equal(err.message, '通道接收端已关闭');
  });

  it('records the reading age on stale reading errors', () => {
    const err = createStaleReadingError(600_000, 300_000);
    assert.equal(isStaleReadingError(err), true);
    assert.equal(err.ageMs, 600_000);
    assert.equal(err.message, '趋势读数已过期：观测于 600000ms 前，阈值 300000ms');
  });
});
