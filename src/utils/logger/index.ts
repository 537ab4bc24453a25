/**
 * 日志系统模块
 *
 * 功能：
 * - 基于 pino 的日志系统
 * - 双流输出：同时输出到控制台和文件
 * - 按日期自动分割日志文件
 * - 支持 DEBUG/INFO/WARN/ERROR 级别
 *
 * 日志目录（根目录由 resolveLoggerOptions 解析）：
 * - <root>/system/：系统日志（所有级别）
 * - <root>/debug/：调试日志（仅 DEBUG 级别，需设置 DEBUG=true）
 */

import pino from 'pino';
import fs from 'node:fs';
import path from 'node:path';
import { Writable } from 'node:stream';
import { inspect } from 'node:util';
import { LOG_LEVELS, LOGGING } from '../../constants/index.js';
import { formatError } from '../error/index.js';
import { isRecord } from '../primitives/index.js';
import { toUtcTimeLog } from '../time/index.js';
import type { LogObject, Logger } from './types.js';
import { resolveLoggerOptions } from './utils.js';

const LOGGER_OPTIONS = resolveLoggerOptions(process.env);
const IS_DEBUG = LOGGER_OPTIONS.debug;
const LOG_ROOT_DIR = LOGGER_OPTIONS.rootDir;

// ANSI 颜色代码
const colors = {
  reset: '\x1b[0m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  gray: '\x1b[90m',
} as const;

const LEVEL_NAMES: Record<number, string> = {
  [LOG_LEVELS.DEBUG]: 'DEBUG',
  [LOG_LEVELS.INFO]: 'INFO',
  [LOG_LEVELS.WARN]: 'WARN',
  [LOG_LEVELS.ERROR]: 'ERROR',
};

const LEVEL_COLORS: Record<number, string> = {
  [LOG_LEVELS.DEBUG]: colors.gray,
  [LOG_LEVELS.WARN]: colors.yellow,
  [LOG_LEVELS.ERROR]: colors.red,
};

const formatExtra = (extra: unknown): string => {
  return inspect(extra, { depth: 5, maxArrayLength: 100 });
};

/**
 * 按日期分割的文件流（用于 pino 传输）
 */
class DateRotatingStream extends Writable {
  private readonly _logDir: string;
  private _currentDate: string | null = null;
  private _fileStream: fs.WriteStream | null = null;

  constructor(logSubDir: string) {
    super();
    this._logDir = path.join(LOG_ROOT_DIR, logSubDir);
  }

  /**
   * 日期变化时切换到新文件；目录延迟到首次写入时创建
   */
  private _checkRotate(): fs.WriteStream {
    const today = toUtcTimeLog(new Date()).slice(0, 10);
    if (this._fileStream && this._currentDate === today) {
      return this._fileStream;
    }

    this._fileStream?.end();
    if (!fs.existsSync(this._logDir)) {
      fs.mkdirSync(this._logDir, { recursive: true });
    }

    this._currentDate = today;
    const stream = fs.createWriteStream(path.join(this._logDir, `${today}.log`), {
      flags: 'a',
      encoding: 'utf8',
    });
    stream.on('error', (err) => {
      console.error(`[DateRotatingStream] 文件流错误 (${this._logDir}):`, formatError(err));
    });
    this._fileStream = stream;
    return stream;
  }

  override _write(chunk: Buffer, encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    try {
      const stream = this._checkRotate();
      if (stream.write(chunk, encoding)) {
        callback();
        return;
      }
      waitForDrain(stream, LOGGING.DRAIN_TIMEOUT_MS, callback);
    } catch (err) {
      console.error(`[DateRotatingStream] 写入失败 (${this._logDir}):`, formatError(err));
      callback();
    }
  }

  closeSync(): void {
    this._fileStream?.end();
    this._fileStream = null;
  }
}

/**
 * 等待 drain 事件，超时后仍调用 callback 避免阻塞日志系统
 */
function waitForDrain(
  stream: NodeJS.WritableStream,
  timeout: number,
  callback: () => void,
): void {
  let resolved = false;

  const onDrain = (): void => {
    if (resolved) return;
    resolved = true;
    clearTimeout(timeoutId);
    callback();
  };

  const timeoutId = setTimeout(() => {
    if (resolved) return;
    resolved = true;
    stream.removeListener('drain', onDrain);
    callback();
  }, timeout);

  stream.once('drain', onDrain);
}

function isLogLevel(value: unknown): value is LogObject['level'] {
  return (
    value === LOG_LEVELS.DEBUG ||
    value === LOG_LEVELS.INFO ||
    value === LOG_LEVELS.WARN ||
    value === LOG_LEVELS.ERROR
  );
}

/**
 * 解析 pino 输出的一行 JSON；格式不符时返回 null
 */
function parseLogObject(chunk: Buffer): LogObject | null {
  const parsed: unknown = JSON.parse(chunk.toString());
  if (!isRecord(parsed)) {
    return null;
  }
  const { level, time, msg, extra } = parsed;
  if (!isLogLevel(level) || typeof time !== 'number') {
    return null;
  }
  return { level, time, msg: String(msg), extra };
}

function formatExtraSuffix(extra: unknown): string {
  if (extra === undefined || extra === null) {
    return '';
  }
  if (typeof extra === 'object') {
    try {
      return ` ${JSON.stringify(extra)}`;
    } catch {
      return ` ${formatExtra(extra)}`;
    }
  }
  return ` ${formatExtra(extra)}`;
}

/**
 * 格式化日志行；withColor 为 true 时按级别着色（控制台输出）
 */
function formatLine(obj: LogObject, withColor: boolean): string {
  const levelStr = `[${LEVEL_NAMES[obj.level] ?? 'INFO'}]`;
  const timestamp = toUtcTimeLog(new Date(obj.time));
  const color = withColor ? (LEVEL_COLORS[obj.level] ?? '') : '';
  const reset = color ? colors.reset : '';
  return `${color}${levelStr} ${timestamp} ${obj.msg}${reset}${formatExtraSuffix(obj.extra)}\n`;
}

const systemFileStream = new DateRotatingStream('system');
const debugFileStream = IS_DEBUG ? new DateRotatingStream('debug') : null;

// ERROR/WARN 输出到 stderr，其他输出到 stdout
const consoleStream = new Writable({
  write(chunk: Buffer, _encoding: BufferEncoding, callback: () => void): void {
    try {
      const obj = parseLogObject(chunk);
      if (!obj) {
        callback();
        return;
      }
      const target = obj.level >= LOG_LEVELS.WARN ? process.stderr : process.stdout;
      if (target.write(formatLine(obj, true))) {
        callback();
      } else {
        waitForDrain(target, LOGGING.CONSOLE_DRAIN_TIMEOUT_MS, callback);
      }
    } catch (err) {
      process.stderr.write(`[Logger Error] ${formatError(err)}\n`);
      callback();
    }
  },
});

const fileStream = new Writable({
  write(chunk: Buffer, _encoding: BufferEncoding, callback: () => void): void {
    try {
      const obj = parseLogObject(chunk);
      if (!obj) {
        callback();
        return;
      }
      const formatted = formatLine(obj, false);
      systemFileStream.write(formatted);
      if (obj.level === LOG_LEVELS.DEBUG && debugFileStream) {
        debugFileStream.write(formatted);
      }
      callback();
    } catch (err) {
      console.error('[FileStream] 处理日志失败:', formatError(err));
      callback();
    }
  },
});

const pinoLogger = pino(
  {
    level: IS_DEBUG ? 'debug' : 'info',
    customLevels: {
      debug: LOG_LEVELS.DEBUG,
      info: LOG_LEVELS.INFO,
      warn: LOG_LEVELS.WARN,
      error: LOG_LEVELS.ERROR,
    },
    useOnlyCustomLevels: true,
  },
  pino.multistream([
    { level: IS_DEBUG ? 'debug' : 'info', stream: consoleStream },
    { level: IS_DEBUG ? 'debug' : 'info', stream: fileStream },
  ]),
);

/**
 * 导出的 logger 对象
 */
export const logger: Logger = {
  debug(msg: string, extra?: unknown): void {
    if (!IS_DEBUG) {
      return;
    }
    if (extra == null) {
      pinoLogger.debug(msg);
    } else {
      pinoLogger.debug({ extra }, msg);
    }
  },

  info(msg: string, extra?: unknown): void {
    if (extra == null) {
      pinoLogger.info(msg);
    } else {
      pinoLogger.info({ extra }, msg);
    }
  },

  warn(msg: string, extra?: unknown): void {
    if (extra == null) {
      pinoLogger.warn(msg);
    } else {
      pinoLogger.warn({ extra }, msg);
    }
  },

  error(msg: string, extra?: unknown): void {
    if (extra == null) {
      pinoLogger.error(msg);
    } else {
      pinoLogger.error({ extra }, msg);
    }
  },
};

let isSyncCleaningUp = false;

/**
 * 同步清理函数（用于进程退出）
 */
function cleanupSync(): void {
  if (isSyncCleaningUp) {
    return;
  }
  isSyncCleaningUp = true;

  try {
    pinoLogger.flush();
    systemFileStream.closeSync();
    debugFileStream?.closeSync();
  } catch (err) {
    console.error('[Logger] 同步清理过程出错:', formatError(err));
  }
}

// 测试档位不注册进程级钩子
if (LOGGER_OPTIONS.processHooks) {
  process.on('beforeExit', () => {
    cleanupSync();
  });

  process.on('SIGINT', () => {
    cleanupSync();
    process.exit(0);
  });

  process.on('SIGTERM', () => {
    cleanupSync();
    process.exit(0);
  });

  process.on('uncaughtException', (err: Error) => {
    logger.error('未捕获的异常', formatError(err));
    cleanupSync();
    process.exit(1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('未处理的 Promise 拒绝', formatError(reason));
  });
}
