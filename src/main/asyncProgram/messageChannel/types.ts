/**
 * 通道创建选项。
 * 类型用途：控制通道缓冲容量；null 为无界，0 为同步交接（发送方等待接收方取走），n > 0 为最多缓冲 n 条。
 * 数据来源：启动入口按配置（SELLER_INPUT_CAPACITY / SELLER_OUTPUT_CAPACITY）传入，测试中直接指定。
 * 使用范围：messageChannel。
 */
export type ChannelOptions = {
  readonly capacity: number | null;
};

/**
 * 通道发送端（可被多个生产者共享）。
 * 类型用途：按到达顺序把消息送入通道；有界通道满时 send 挂起，形成背压。
 * 数据来源：由 createChannel 创建。
 * 使用范围：上游生产者、sellerActor 出站。
 */
export interface ChannelSender<T> {
  /** 发送消息；接收端已关闭或发送端已关闭时以 ChannelClosedError 拒绝 */
  send(value: T): Promise<void>;
  /** 关闭发送端；已接受的消息仍可被接收 */
  close(): void;
  /** 发送端或接收端是否已关闭 */
  isClosed(): boolean;
  /** 通道中是否没有待接收的消息 */
  isEmpty(): boolean;
}

/**
 * 通道接收端（单一消费者）。
 * 类型用途：按到达顺序取出消息；发送端关闭且消息耗尽后 recv 以 ChannelClosedError 拒绝。
 * 数据来源：由 createChannel 创建。
 * 使用范围：sellerActor 入站、下游消费者。
 */
export interface ChannelReceiver<T> {
  /** 等待并取出下一条消息 */
  recv(): Promise<T>;
  /** 非阻塞取出下一条消息；没有消息时返回 null */
  tryRecv(): T | null;
  /** 关闭接收端；丢弃缓冲消息并拒绝挂起的发送 */
  close(): void;
  /** 接收端是否已关闭，或发送端已关闭且消息已耗尽 */
  isClosed(): boolean;
  /** 通道中是否没有待接收的消息 */
  isEmpty(): boolean;
}

/**
 * 通道（发送端 + 接收端）。
 */
export type Channel<T> = {
  readonly sender: ChannelSender<T>;
  readonly receiver: ChannelReceiver<T>;
};

/**
 * 挂起的发送（内部使用）：有界通道已满或同步交接时等待接收方。
 */
export type PendingSend<T> = {
  readonly value: T;
  readonly resolve: () => void;
  readonly reject: (err: Error) => void;
};

/**
 * 挂起的接收（内部使用）：通道为空时等待发送方。
 */
export type PendingRecv<T> = {
  readonly resolve: (value: T) => void;
  readonly reject: (err: Error) => void;
};
