/**
 * 消息通道模块
 *
 * 多生产者、单消费者的有序通道，是卖出 Actor 与外部协作者之间唯一的同步手段：
 * - 所有生产者共享一个 FIFO，消息按到达顺序交付（不是按生产者分别排序）
 * - 有界通道满时 send 挂起，容量为 0 时 send 等到接收方取走才完成
 * - 任一端都可关闭：发送端关闭后 recv 在消息耗尽时失败；接收端关闭后 send 立即失败
 * - recv / send 均无超时
 */
import { createChannelClosedError } from '../../../utils/error/index.js';
import type { Channel, ChannelOptions, PendingRecv, PendingSend } from './types.js';

/**
 * 创建消息通道
 * @param options 容量配置，默认无界
 * @returns 发送端与接收端
 */
export function createChannel<T>(options: ChannelOptions = { capacity: null }): Channel<T> {
  const { capacity } = options;
  if (capacity !== null && (!Number.isInteger(capacity) || capacity < 0)) {
    throw new RangeError(`通道容量必须为非负整数: ${capacity}`);
  }

  // 装箱保存，允许 T 本身包含 undefined
  const buffer: Array<{ readonly value: T }> = [];
  const pendingSends: Array<PendingSend<T>> = [];
  const pendingRecvs: Array<PendingRecv<T>> = [];
  let senderClosed = false;
  let receiverClosed = false;

  function hasCapacity(): boolean {
    return capacity === null || buffer.length < capacity;
  }

  /**
   * 缓冲区腾出空间后，把挂起的发送依次转入缓冲区
   */
  function admitPendingSends(): void {
    while (pendingSends.length > 0 && hasCapacity()) {
      const pending = pendingSends.shift();
      if (!pending) {
        return;
      }
      buffer.push({ value: pending.value });
      pending.resolve();
    }
  }

  /**
   * 取出下一条消息：先取缓冲区，再取同步交接中挂起的发送
   */
  function takeNext(): { readonly value: T } | null {
    const buffered = buffer.shift();
    if (buffered) {
      admitPendingSends();
      return buffered;
    }
    const pending = pendingSends.shift();
    if (pending) {
      pending.resolve();
      return { value: pending.value };
    }
    return null;
  }

  function isEmpty(): boolean {
    return buffer.length === 0 && pendingSends.length === 0;
  }

  return {
    sender: {
      send(value: T): Promise<void> {
        if (receiverClosed) {
          return Promise.reject(createChannelClosedError('receiver'));
        }
        if (senderClosed) {
          return Promise.reject(createChannelClosedError('sender'));
        }

        const waiting = pendingRecvs.shift();
        if (waiting) {
          waiting.resolve(value);
          return Promise.resolve();
        }

        if (pendingSends.length === 0 && hasCapacity()) {
          buffer.push({ value });
          return Promise.resolve();
        }

        return new Promise<void>((resolve, reject) => {
          pendingSends.push({ value, resolve, reject });
        });
      },

      close(): void {
        if (senderClosed) {
          return;
        }
        senderClosed = true;
        // 有接收方在等待说明已无剩余消息
        const waiting = pendingRecvs.splice(0, pendingRecvs.length);
        for (const recv of waiting) {
          recv.reject(createChannelClosedError('sender'));
        }
      },

      isClosed(): boolean {
        return senderClosed || receiverClosed;
      },

      isEmpty,
    },

    receiver: {
      recv(): Promise<T> {
        if (receiverClosed) {
          return Promise.reject(createChannelClosedError('receiver'));
        }
        const next = takeNext();
        if (next) {
          return Promise.resolve(next.value);
        }
        if (senderClosed) {
          return Promise.reject(createChannelClosedError('sender'));
        }
        return new Promise<T>((resolve, reject) => {
          pendingRecvs.push({ resolve, reject });
        });
      },

      tryRecv(): T | null {
        if (receiverClosed) {
          return null;
        }
        const next = takeNext();
        return next ? next.value : null;
      },

      close(): void {
        if (receiverClosed) {
          return;
        }
        receiverClosed = true;
        buffer.length = 0;
        const rejected = pendingSends.splice(0, pendingSends.length);
        for (const pending of rejected) {
          pending.reject(createChannelClosedError('receiver'));
        }
      },

      isClosed(): boolean {
        return receiverClosed || (senderClosed && isEmpty());
      },

      isEmpty,
    },
  };
}
