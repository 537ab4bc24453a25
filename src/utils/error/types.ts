/**
 * 通道关闭的一端。
 * 类型用途：区分发送端关闭（入站消息已耗尽）与接收端关闭（下游消费者已离开）。
 * 数据来源：由 messageChannel 在 recv/send 失败时写入 ChannelClosedError。
 * 使用范围：messageChannel、sellerActor 及测试。
 */
export type ChannelSide = 'sender' | 'receiver';

/**
 * 通道关闭错误。
 * 类型用途：通道任一端关闭后，recv/send 以此错误拒绝。
 * 数据来源：由 createChannelClosedError 创建。
 * 使用范围：messageChannel、sellerActor。
 */
export type ChannelClosedError = Error & {
  readonly name: 'ChannelClosedError';
  /** 已关闭的一端 */
  readonly side: ChannelSide;
};

/**
 * 趋势读数过期错误。
 * 类型用途：趋势读数的观测时间超过过期阈值时由路由函数返回，属于可恢复错误。
 * 数据来源：由 createStaleReadingError 创建。
 * 使用范围：sellerActor。
 */
export type StaleReadingError = Error & {
  readonly name: 'StaleReadingError';
  /** 读数年龄（毫秒） */
  readonly ageMs: number;
};

/**
 * 配置验证错误。
 * 类型用途：环境变量配置非法时抛出，启动流程据此退出。
 * 数据来源：由 createConfigValidationError 创建。
 * 使用范围：config 模块与启动入口。
 */
export type ConfigValidationError = Error & {
  readonly name: 'ConfigValidationError';
  /** 非法的配置键 */
  readonly invalidFields: ReadonlyArray<string>;
};
