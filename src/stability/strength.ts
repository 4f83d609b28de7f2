import { ValidationError } from './errors.js'

export function validateStrength(strength: number): void {
  if (Number.isNaN(strength) || strength < 0 || strength > 1) {
    throw new ValidationError(
      'strength_out_of_range',
      'strength',
      strength,
      `strength ${strength} is invalid: strength must be between 0.0 and 1.0`,
    )
  }
}

/**
 * 是否写入表单
 *
 * 0 与未设置等价，都不发送 strength 字段
 */
export function shouldSendStrength(strength: number | undefined): strength is number {
  return strength !== undefined && strength !== 0
}

/**
 * 按单精度浮点值保留两位小数，恰好一半时取偶数 (0.125 → "0.12")
 */
export function formatStrength(strength: number): string {
  // 单精度尾数乘以 100 在双精度下是精确的
  const scaled = Math.fround(strength) * 100
  const floor = Math.floor(scaled)
  const fraction = scaled - floor
  let rounded = floor
  if (fraction > 0.5 || (fraction === 0.5 && floor % 2 !== 0))
    rounded = floor + 1
  return (rounded / 100).toFixed(2)
}
