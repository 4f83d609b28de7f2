import { Buffer } from 'node:buffer'
import { ValidationError } from './errors.js'

/** 单个 prompt 的最大长度 (按 UTF-8 字节数计算) */
export const MAX_PROMPT_LENGTH = 10_000

export function promptLength(prompt: string): number {
  return Buffer.byteLength(prompt, 'utf8')
}

/**
 * 检查 prompt 长度，field 用于区分正向 / 负向 prompt
 */
export function validatePromptLength(prompt: string, field: 'prompt' | 'negative_prompt'): void {
  const length = promptLength(prompt)
  if (length > MAX_PROMPT_LENGTH) {
    throw new ValidationError(
      'prompt_too_long',
      field,
      prompt,
      `${field === 'prompt' ? 'prompt' : 'negative prompt'} of length ${length} is invalid: maximum length is 10,000 characters`,
    )
  }
}

export function validatePrompt(prompt: string): void {
  if (prompt === '') {
    throw new ValidationError('empty_prompt', 'prompt', prompt, 'prompt cannot be empty')
  }
  validatePromptLength(prompt, 'prompt')
}
