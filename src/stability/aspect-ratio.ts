import { ValidationError } from './errors.js'

/** 宽高比 (e.g. 16:9) */
export interface AspectRatio {
  readonly width: number
  readonly height: number
}

/** Stability API 接受的全部宽高比 */
export const SUPPORTED_ASPECT_RATIOS: readonly AspectRatio[] = [
  { width: 1, height: 1 },
  { width: 16, height: 9 },
  { width: 21, height: 9 },
  { width: 2, height: 3 },
  { width: 3, height: 2 },
  { width: 4, height: 5 },
  { width: 5, height: 4 },
  { width: 9, height: 16 },
  { width: 9, height: 21 },
]

export const DEFAULT_ASPECT_RATIO: AspectRatio = { width: 1, height: 1 }

export function formatAspectRatio(ratio: AspectRatio): string {
  return `${ratio.width}:${ratio.height}`
}

const INTEGER_PATTERN = /^[+-]?\d+$/

/**
 * 解析 "宽:高" 形式的字符串
 *
 * 只检查格式，是否在白名单内由 validateAspectRatio 负责
 */
export function parseAspectRatio(input: string): AspectRatio {
  const parts = input.split(':')
  if (parts.length !== 2) {
    throw new ValidationError(
      'invalid_aspect_ratio',
      'aspect_ratio',
      input,
      `aspect ratio must contain exactly one colon: "${input}"`,
    )
  }

  const [width, height] = parts.map((part, i) => {
    if (!INTEGER_PATTERN.test(part)) {
      throw new ValidationError(
        'invalid_aspect_ratio',
        'aspect_ratio',
        input,
        `${i === 0 ? 'width' : 'height'} ratio is not an integer: "${part}"`,
      )
    }
    return Number.parseInt(part, 10)
  })

  return { width, height }
}

export function isSupportedAspectRatio(ratio: AspectRatio): boolean {
  return SUPPORTED_ASPECT_RATIOS.some(
    r => r.width === ratio.width && r.height === ratio.height,
  )
}

export function validateAspectRatio(ratio: AspectRatio): void {
  const formatted = formatAspectRatio(ratio)

  if (!(ratio.width > 0) || !(ratio.height > 0)) {
    throw new ValidationError(
      'invalid_aspect_ratio',
      'aspect_ratio',
      formatted,
      `aspect ratio components must be positive: "${formatted}"`,
    )
  }

  if (!isSupportedAspectRatio(ratio)) {
    throw new ValidationError(
      'unsupported_aspect_ratio',
      'aspect_ratio',
      formatted,
      `aspect ratio is not supported: ${formatted}`,
    )
  }
}
