import { Decimal } from 'longport';
import type { DecimalInput } from './types.js';

/**
 * 将 DecimalInput 转换为 Decimal。
 * 默认行为：Decimal 原样返回；number 校验有限性后转；string 直接 new Decimal；非法 number 抛 TypeError。
 *
 * @param value 输入值（Decimal、number、string）
 * @returns Decimal 实例
 */
export function toDecimalValue(value: DecimalInput): Decimal {
  if (value instanceof Decimal) {
    return value;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new TypeError(`Invalid number for Decimal conversion: ${value}`);
    }
    return new Decimal(value.toString());
  }
  return new Decimal(value);
}

/**
 * 严格将 unknown 转换为 Decimal；不合法输入返回 null。
 * 默认行为：仅接受 Decimal、有限 number、非空可解析 string，其余（含空串、非有限数）返回 null。
 *
 * @param value 未知输入
 * @returns 合法时返回 Decimal，否则返回 null
 */
export function toDecimalStrict(value: unknown): Decimal | null {
  if (value instanceof Decimal) {
    return value;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return null;
    }
    return new Decimal(value.toString());
  }

  if (typeof value === 'string') {
    const text = value.trim();
    if (text.length === 0) {
      return null;
    }

    try {
      return new Decimal(text);
    } catch {
      return null;
    }
  }

  return null;
}

/**
 * Decimal 减法。
 *
 * @param left 左操作数
 * @param right 右操作数
 * @returns 相减结果
 */
export function decimalSub(left: DecimalInput, right: DecimalInput): Decimal {
  return toDecimalValue(left).sub(toDecimalValue(right));
}

/**
 * Decimal 乘法。
 *
 * @param left 左操作数
 * @param right 右操作数
 * @returns 相乘结果
 */
export function decimalMul(left: DecimalInput, right: DecimalInput): Decimal {
  return toDecimalValue(left).mul(toDecimalValue(right));
}

/**
 * Decimal 除法。
 * 默认行为：按 Decimal 运算规则计算，调用方保证除数非零。
 *
 * @param left 左操作数
 * @param right 右操作数
 * @returns 相除结果
 */
export function decimalDiv(left: DecimalInput, right: DecimalInput): Decimal {
  return toDecimalValue(left).div(toDecimalValue(right));
}

/**
 * Decimal 三路比较。
 * 默认行为：left < right 返回负数，相等返回 0，left > right 返回正数。
 *
 * @param left 左值
 * @param right 右值
 * @returns 比较结果
 */
export function decimalCompare(left: DecimalInput, right: DecimalInput): number {
  return toDecimalValue(left).comparedTo(toDecimalValue(right));
}

/**
 * Decimal 比较：小于。
 *
 * @param left 左值
 * @param right 右值
 * @returns left < right
 */
export function decimalLt(left: DecimalInput, right: DecimalInput): boolean {
  return decimalCompare(left, right) < 0;
}

/**
 * Decimal 比较：大于。
 *
 * @param left 左值
 * @param right 右值
 * @returns left > right
 */
export function decimalGt(left: DecimalInput, right: DecimalInput): boolean {
  return decimalCompare(left, right) > 0;
}

/**
 * Decimal 比较：大于等于。
 *
 * @param left 左值
 * @param right 右值
 * @returns left >= right
 */
export function decimalGte(left: DecimalInput, right: DecimalInput): boolean {
  return decimalCompare(left, right) >= 0;
}

/**
 * Decimal 比较：相等（按数值，不区分精度位数）。
 *
 * @param left 左值
 * @param right 右值
 * @returns left == right
 */
export function decimalEq(left: DecimalInput, right: DecimalInput): boolean {
  return decimalCompare(left, right) === 0;
}
