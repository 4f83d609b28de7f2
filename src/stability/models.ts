import { ValidationError } from './errors.js'

/** Stable Diffusion 3 的可用模型 */
export const SD3_MODELS = ['sd3-medium', 'sd3-large', 'sd3-large-turbo'] as const

export type Sd3Model = (typeof SD3_MODELS)[number]

export const DEFAULT_SD3_MODEL: Sd3Model = 'sd3-large'

export const OUTPUT_FORMATS = ['png', 'jpeg'] as const

export type OutputFormat = (typeof OUTPUT_FORMATS)[number]

export const DEFAULT_OUTPUT_FORMAT: OutputFormat = 'png'

export function isSd3Model(value: string): value is Sd3Model {
  return SD3_MODELS.some(m => m === value)
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(f => f === value)
}

export function validateModel(model: string): void {
  if (!isSd3Model(model)) {
    throw new ValidationError(
      'unknown_model',
      'model',
      model,
      `unrecognized model name: ${model}`,
    )
  }
}

export function validateOutputFormat(format: string): void {
  if (!isOutputFormat(format)) {
    throw new ValidationError(
      'invalid_output_format',
      'output_format',
      format,
      `output format must be png or jpeg: ${format}`,
    )
  }
}
