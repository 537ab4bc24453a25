/**
 * 比特币卖出决策程序 - 主入口模块
 *
 * 系统概述：
 * - 卖出 Actor 持有买入账本，接收汇率趋势读数与新买入，决定哪些买入可以盈利卖出
 * - 本程序只产生卖出报价，不直接下单；报价交给下游交易执行组件
 *
 * 入口流程：
 * 1. 加载 .env.local 并解析 SELLER_* 配置
 * 2. 创建入站/出站消息通道，启动卖出 Actor
 * 3. 从标准输入逐行读取 JSON 消息（TREND_READING / NEW_PURCHASE）送入入站通道
 * 4. 消费出站报价并记录日志；标准输入结束时关闭入站通道，Actor 随之停止
 */

import './config/loadEnv.js';
import readline from 'node:readline';
import { createSellerConfig } from './config/config.seller.js';
import { toOfferPayload } from './core/profitCollector/utils.js';
import { createChannel } from './main/asyncProgram/messageChannel/index.js';
import type { ChannelReceiver, ChannelSender } from './main/asyncProgram/messageChannel/types.js';
import { spawnSeller } from './main/asyncProgram/sellerActor/index.js';
import type { SellerMessage } from './main/asyncProgram/sellerActor/types.js';
import { parseSellerMessage } from './main/asyncProgram/sellerActor/utils.js';
import type { Offer } from './types/trading.js';
import { formatError, isChannelClosedError, isConfigValidationError } from './utils/error/index.js';
import { logger } from './utils/logger/index.js';

/**
 * 将标准输入的每一行解析为消息并送入入站通道；输入结束后关闭发送端
 */
async function pumpStdin(sender: ChannelSender<SellerMessage>): Promise<void> {
  const lines = readline.createInterface({ input: process.stdin, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      if (line.trim() === '') {
        continue;
      }
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (err) {
        logger.warn('[Main] 输入行不是合法 JSON，已忽略', formatError(err));
        continue;
      }
      const message = parseSellerMessage(raw);
      if (!message) {
        logger.warn('[Main] 无法识别的输入消息，已忽略', line);
        continue;
      }
      try {
        await sender.send(message);
      } catch (err) {
        if (!isChannelClosedError(err)) {
          throw err;
        }
        logger.warn('[Main] 卖出 Actor 已停止，不再读取输入');
        return;
      }
    }
  } finally {
    lines.close();
    sender.close();
  }
}

/**
 * 消费出站报价直到 Actor 关闭出站通道
 */
async function drainOffers(receiver: ChannelReceiver<Offer>): Promise<void> {
  while (!receiver.isClosed()) {
    let offer: Offer;
    try {
      offer = await receiver.recv();
    } catch (err) {
      if (isChannelClosedError(err)) {
        return;
      }
      throw err;
    }
    logger.info(`[Main] 收到卖出报价 ${offer.id}`, toOfferPayload(offer));
  }
}

async function main(): Promise<void> {
  const config = createSellerConfig({ env: process.env });

  const inbound = createChannel<SellerMessage>({ capacity: config.inputCapacity });
  const outbound = createChannel<Offer>({ capacity: config.outputCapacity });

  spawnSeller({
    input: inbound.receiver,
    output: outbound.sender,
    fee: config.fee,
    minMargin: config.minMargin,
  });

  await Promise.all([pumpStdin(inbound.sender), drainOffers(outbound.receiver)]);
  logger.info('[Main] 卖出 Actor 已停止，程序退出');
}

try {
  await main();
} catch (err) {
  if (isConfigValidationError(err)) {
    logger.error('程序启动失败：配置验证未通过', err.invalidFields);
  } else {
    logger.error('程序异常退出', formatError(err));
  }
  process.exit(1);
}
