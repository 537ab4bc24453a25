import path from 'node:path';
import type { LoggerOptions } from './types.js';

/**
 * 解析开关型环境变量；未设置或无法识别时返回 null
 */
function parseSwitch(value: string | undefined): boolean | null {
  switch (value?.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      return null;
  }
}

/**
 * 解析 logger 启动参数
 *
 * - APP_RUNTIME_PROFILE 显式指定档位（app/test），未指定时按 NODE_ENV=test 判断
 * - 测试档位日志写入 `<cwd>/tests/logs` 且不注册进程钩子，正式档位写入 `<cwd>/logs`
 * - APP_LOG_ROOT_DIR（相对 cwd）与 APP_ENABLE_PROCESS_HOOKS 可分别覆盖以上默认值
 */
export function resolveLoggerOptions(env: NodeJS.ProcessEnv, cwd: string = process.cwd()): LoggerOptions {
  const profile = env['APP_RUNTIME_PROFILE']?.trim().toLowerCase() || env['NODE_ENV'];
  const isTest = profile === 'test';
  const configuredRoot = env['APP_LOG_ROOT_DIR']?.trim();

  return {
    debug: env['DEBUG'] === 'true',
    rootDir: configuredRoot
      ? path.resolve(cwd, configuredRoot)
      : path.join(cwd, ...(isTest ? ['tests', 'logs'] : ['logs'])),
    processHooks: parseSwitch(env['APP_ENABLE_PROCESS_HOOKS']) ?? !isTest,
  };
}
