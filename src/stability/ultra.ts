import type { AspectRatio } from './aspect-ratio.js'
import type { FormField, SerializedForm, SerializeOptions } from './form.js'
import { DEFAULT_ASPECT_RATIO, formatAspectRatio, validateAspectRatio } from './aspect-ratio.js'
import { buildForm } from './form.js'
import { DEFAULT_OUTPUT_FORMAT, validateOutputFormat } from './models.js'
import { validatePrompt, validatePromptLength } from './prompt.js'

/** Stable Image Ultra 生成请求 */
export interface UltraRequest {
  readonly prompt: string
  readonly negativePrompt?: string
  readonly aspectRatio: AspectRatio
  readonly outputFormat: string
}

export const ULTRA_PATH = '/v2beta/stable-image/generate/ultra'

export function createUltraRequest(
  params: Pick<UltraRequest, 'prompt'> & Partial<Omit<UltraRequest, 'prompt'>>,
): UltraRequest {
  return {
    prompt: params.prompt,
    negativePrompt: params.negativePrompt,
    aspectRatio: params.aspectRatio ?? DEFAULT_ASPECT_RATIO,
    outputFormat: params.outputFormat ?? DEFAULT_OUTPUT_FORMAT,
  }
}

export function validateUltraRequest(request: UltraRequest): void {
  validatePrompt(request.prompt)
  validatePromptLength(request.negativePrompt ?? '', 'negative_prompt')
  validateAspectRatio(request.aspectRatio)
  validateOutputFormat(request.outputFormat)
}

export async function serializeUltraRequest(
  request: UltraRequest,
  options?: SerializeOptions,
): Promise<SerializedForm> {
  const fields: FormField[] = [{ name: 'prompt', value: request.prompt }]

  if (request.negativePrompt)
    fields.push({ name: 'negative_prompt', value: request.negativePrompt })

  fields.push(
    { name: 'aspect_ratio', value: formatAspectRatio(request.aspectRatio) },
    { name: 'output_format', value: request.outputFormat },
  )

  return buildForm(fields, options)
}
