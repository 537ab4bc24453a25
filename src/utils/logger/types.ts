import type { LOG_LEVELS } from '../../constants/index.js';

/**
 * 日志对象接口
 * 用途：描述单条结构化日志记录的数据结构，供日志格式化器序列化输出
 * 数据来源：由 pino 序列化后经自定义流解析得到
 * 使用范围：仅 logger 模块内部使用
 */
export type LogObject = {
  readonly level: (typeof LOG_LEVELS)[keyof typeof LOG_LEVELS];
  readonly time: number;
  readonly msg: string;
  readonly extra?: unknown;
};

/**
 * Logger 接口定义
 * 用途：定义日志记录器的公开方法契约，供业务模块注入和调用
 * 数据来源：由 logger 模块实现并导出；测试中由记录型替身实现
 * 使用范围：全局使用，业务模块通过依赖注入获取实例
 */
export interface Logger {
  debug(msg: string, extra?: unknown): void;
  info(msg: string, extra?: unknown): void;
  warn(msg: string, extra?: unknown): void;
  error(msg: string, extra?: unknown): void;
}

/**
 * logger 启动参数，由环境变量一次性解析
 */
export type LoggerOptions = {
  /** DEBUG=true 时输出调试日志并写入 debug 目录 */
  readonly debug: boolean;
  /** 日志根目录绝对路径 */
  readonly rootDir: string;
  /** 是否注册进程退出/信号/未捕获异常钩子 */
  readonly processHooks: boolean;
};
