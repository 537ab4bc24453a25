/**
 * 买入账本模块
 *
 * 功能：
 * - 以二叉最小堆保存买入记录，键为买入汇率（汇率越低越优）
 * - peekBest O(1)，insert / popBest O(log n)
 * - 汇率相同的记录按插入顺序出堆，保证结果确定
 *
 * 账本只由所属的卖出 Actor 访问，内部不加锁。
 */
import type { Purchase } from '../../types/trading.js';
import type { LedgerEntry, PurchaseLedger } from './types.js';
import { compareLedgerEntries } from './utils.js';

/**
 * 创建空的买入账本
 * @returns PurchaseLedger 接口实例
 */
export function createPurchaseLedger(): PurchaseLedger {
  const heap: LedgerEntry[] = [];
  let nextSeq = 0;

  // 调用方保证下标在 [0, heap.length) 内
  function swap(i: number, j: number): void {
    const a = heap[i];
    heap[i] = heap[j];
    heap[j] = a;
  }

  function isBefore(i: number, j: number): boolean {
    return compareLedgerEntries(heap[i], heap[j]) < 0;
  }

  function siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!isBefore(child, parent)) {
        break;
      }
      swap(child, parent);
      child = parent;
    }
  }

  function siftDown(index: number): void {
    let parent = index;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let best = parent;
      if (left < heap.length && isBefore(left, best)) {
        best = left;
      }
      if (right < heap.length && isBefore(right, best)) {
        best = right;
      }
      if (best === parent) {
        return;
      }
      swap(parent, best);
      parent = best;
    }
  }

  return {
    insert(purchase: Purchase): void {
      heap.push({ purchase, seq: nextSeq });
      nextSeq += 1;
      siftUp(heap.length - 1);
    },

    peekBest(): Purchase | null {
      return heap[0]?.purchase ?? null;
    },

    popBest(): Purchase | null {
      const top = heap[0];
      const last = heap.pop();
      if (!top || !last) {
        return null;
      }
      if (heap.length > 0) {
        heap[0] = last;
        siftDown(0);
      }
      return top.purchase;
    },

    size(): number {
      return heap.length;
    },

    isEmpty(): boolean {
      return heap.length === 0;
    },
  };
}
