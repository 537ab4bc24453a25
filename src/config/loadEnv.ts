/**
 * 加载 .env.local
 *
 * 必须是入口的第一个 import：logger 在模块求值时读取 DEBUG / APP_* 变量，
 * 之后再加载的值不会生效。已存在的进程环境变量不会被覆盖。
 */
import dotenv from 'dotenv';

dotenv.config({ path: '.env.local' });
