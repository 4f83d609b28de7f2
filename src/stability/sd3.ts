import type { Readable } from 'node:stream'
import type { AspectRatio } from './aspect-ratio.js'
import type { FormField, SerializedForm, SerializeOptions } from './form.js'
import { DEFAULT_ASPECT_RATIO, formatAspectRatio, validateAspectRatio } from './aspect-ratio.js'
import { buildForm, readImage } from './form.js'
import {
  DEFAULT_OUTPUT_FORMAT,
  DEFAULT_SD3_MODEL,
  validateModel,
  validateOutputFormat,
} from './models.js'
import { validatePrompt, validatePromptLength } from './prompt.js'
import { formatStrength, shouldSendStrength, validateStrength } from './strength.js'

/**
 * Stable Diffusion 3 生成请求
 * @see https://platform.stability.ai/docs/api-reference#tag/Generate/paths/~1v2beta~1stable-image~1generate~1sd3/post
 */
export interface Sd3Request {
  /** 必填，不能为空 */
  readonly prompt: string
  /** 必须是 SD3_MODELS 之一 */
  readonly model: string
  /** png 或 jpeg */
  readonly outputFormat: string
  /** 只能取 SUPPORTED_ASPECT_RATIOS 中的值 */
  readonly aspectRatio: AspectRatio
  readonly negativePrompt?: string
  /** 图生图强度，0.0 ~ 1.0 */
  readonly strength?: number
  /** 图生图的参考图片，请求不负责关闭 */
  readonly image?: Readable
}

export const SD3_PATH = '/v2beta/stable-image/generate/sd3'

/** 以默认值补全请求 */
export function createSd3Request(
  params: Pick<Sd3Request, 'prompt'> & Partial<Omit<Sd3Request, 'prompt'>>,
): Sd3Request {
  return {
    prompt: params.prompt,
    model: params.model ?? DEFAULT_SD3_MODEL,
    outputFormat: params.outputFormat ?? DEFAULT_OUTPUT_FORMAT,
    aspectRatio: params.aspectRatio ?? DEFAULT_ASPECT_RATIO,
    negativePrompt: params.negativePrompt,
    strength: params.strength,
    image: params.image,
  }
}

/** 按顺序校验，遇到第一个错误即抛出 ValidationError */
export function validateSd3Request(request: Sd3Request): void {
  validatePrompt(request.prompt)
  validatePromptLength(request.negativePrompt ?? '', 'negative_prompt')
  validateModel(request.model)
  validateAspectRatio(request.aspectRatio)
  if (request.strength !== undefined)
    validateStrength(request.strength)
  validateOutputFormat(request.outputFormat)
}

export async function serializeSd3Request(
  request: Sd3Request,
  options?: SerializeOptions,
): Promise<SerializedForm> {
  const fields: FormField[] = [
    { name: 'aspect_ratio', value: formatAspectRatio(request.aspectRatio) },
    { name: 'prompt', value: request.prompt },
  ]

  if (request.model)
    fields.push({ name: 'model', value: request.model })
  if (request.outputFormat)
    fields.push({ name: 'output_format', value: request.outputFormat })
  if (request.negativePrompt)
    fields.push({ name: 'negative_prompt', value: request.negativePrompt })
  if (shouldSendStrength(request.strength))
    fields.push({ name: 'strength', value: formatStrength(request.strength) })

  // 未提供参考图片时不发送 image 字段
  if (request.image)
    fields.push({ name: 'image', value: await readImage(request.image) })

  return buildForm(fields, options)
}
