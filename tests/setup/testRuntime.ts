/**
 * 测试进程预加载（--import），先于任何被测模块求值
 *
 * 切换到测试档位：logger 写入 tests/logs，且不注册进程级钩子
 */
import fs from 'node:fs';
import path from 'node:path';

process.env['APP_RUNTIME_PROFILE'] = 'test';

fs.mkdirSync(path.join(process.cwd(), 'tests', 'logs'), { recursive: true });
