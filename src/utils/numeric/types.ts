import type { Decimal } from 'longport';

/**
 * Decimal 输入类型。
 * 类型用途：统一描述数值工具函数可接受的输入。
 * 数据来源：内部计算值、环境变量配置、SDK Decimal 或入站消息中的字符串数字。
 * 使用范围：numeric 工具函数入参。
 */
export type DecimalInput = Decimal | number | string;
