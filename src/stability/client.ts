import type { AxiosInstance } from 'axios'
import type { SerializedForm } from './form.js'
import type { Sd3Request } from './sd3.js'
import type { UltraRequest } from './ultra.js'
import { Buffer } from 'node:buffer'
import axios from 'axios'
import { logger } from '../utils/logger.js'
import {
  ConfigurationError,
  describeCause,
  RemoteError,
  TransportError,
} from './errors.js'
import { SD3_PATH, serializeSd3Request, validateSd3Request } from './sd3.js'
import { serializeUltraRequest, ULTRA_PATH, validateUltraRequest } from './ultra.js'

export const DEFAULT_BASE_URL = 'https://api.stability.ai'
export const DEFAULT_TIMEOUT_MS = 120_000

export interface StabilityClientOptions {
  apiKey: string
  /** 默认 https://api.stability.ai */
  baseUrl?: string
  timeoutMs?: number
}

export interface GenerateOptions {
  /** 中止正在进行的请求 */
  signal?: AbortSignal
}

/** 可被 invoke 发送的请求：先校验，再序列化 */
export interface InvokableRequest {
  validate: () => void
  serialize: () => Promise<SerializedForm>
}

/**
 * Stability 图片生成 API 客户端
 *
 * 每个实例持有自己的 API Key、baseUrl 和 axios 实例，可在多次调用间共享
 */
export class StabilityClient {
  private readonly apiKey: string
  readonly baseUrl: string
  private readonly http: AxiosInstance

  constructor(options: StabilityClientOptions) {
    if (!options.apiKey)
      throw new ConfigurationError('Stability API key is required')

    this.apiKey = options.apiKey
    this.baseUrl = (options.baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, '')
    this.http = axios.create({
      baseURL: this.baseUrl,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      responseType: 'arraybuffer',
      // 状态码由 invoke 自行处理
      validateStatus: () => true,
    })
  }

  /** Stable Diffusion 3 生成 */
  generateSd3(request: Sd3Request, options?: GenerateOptions): Promise<Buffer> {
    return this.invoke(SD3_PATH, {
      validate: () => validateSd3Request(request),
      serialize: () => serializeSd3Request(request),
    }, options)
  }

  /** Stable Image Ultra 生成 */
  generateUltra(request: UltraRequest, options?: GenerateOptions): Promise<Buffer> {
    return this.invoke(ULTRA_PATH, {
      validate: () => validateUltraRequest(request),
      serialize: () => serializeUltraRequest(request),
    }, options)
  }

  /**
   * 校验 → 序列化 → POST，成功时返回图片字节
   *
   * 不做重试，每次调用最多发出一个 HTTP 请求
   */
  async invoke(
    path: string,
    request: InvokableRequest,
    options: GenerateOptions = {},
  ): Promise<Buffer> {
    request.validate()
    const form = await request.serialize()

    logger.info(`Calling Stability API at ${this.baseUrl}${path}`)
    logger.debug(`Request body: ${form.body.length} bytes, ${form.contentType}`)

    let status: number
    let data: Buffer
    try {
      const resp = await this.http.post<ArrayBuffer>(path, form.body, {
        headers: {
          'Content-Type': form.contentType,
          'Authorization': `Bearer ${this.apiKey}`,
          'Accept': 'image/*',
        },
        signal: options.signal,
      })
      status = resp.status
      data = Buffer.from(resp.data)
    }
    catch (err: unknown) {
      throw toTransportError(err)
    }

    if (status !== 200) {
      throw new RemoteError(status, data.toString('utf8'))
    }

    logger.info(`Received image: ${data.length} bytes`)
    return data
  }
}

function toTransportError(err: unknown): TransportError {
  if (axios.isCancel(err))
    return new TransportError('cancelled', 'request was cancelled', err)

  if (axios.isAxiosError(err)) {
    if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT')
      return new TransportError('timeout', `request timed out: ${err.message}`, err)
    return new TransportError('network', `failed to send request: ${err.message}`, err)
  }

  return new TransportError('network', `failed to send request: ${describeCause(err)}`, err)
}
