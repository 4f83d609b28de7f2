/**
 * Stability 客户端的错误类型
 *
 * - ValidationError: 请求参数不合法，发生在任何网络调用之前
 * - SerializationError: 构建 multipart 请求体失败
 * - TransportError: 网络请求未完成 (取消 / 超时 / 连接失败)
 * - RemoteError: 服务端返回非 200 状态码
 */

export type StabilityErrorCode
  = | 'validation_error'
    | 'serialization_error'
    | 'transport_error'
    | 'remote_error'
    | 'configuration_error'

export class StabilityError extends Error {
  readonly code: StabilityErrorCode

  constructor(code: StabilityErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StabilityError'
    this.code = code
  }
}

export type ValidationErrorKind
  = | 'empty_prompt'
    | 'prompt_too_long'
    | 'unknown_model'
    | 'invalid_aspect_ratio'
    | 'unsupported_aspect_ratio'
    | 'strength_out_of_range'
    | 'invalid_output_format'

export class ValidationError extends StabilityError {
  readonly kind: ValidationErrorKind
  /** 出错的表单字段名 (e.g. "negative_prompt") */
  readonly field: string
  readonly value: unknown

  constructor(kind: ValidationErrorKind, field: string, value: unknown, message: string) {
    super('validation_error', message)
    this.name = 'ValidationError'
    this.kind = kind
    this.field = field
    this.value = value
  }
}

export class SerializationError extends StabilityError {
  constructor(message: string, cause: unknown) {
    super('serialization_error', `${message}: ${describeCause(cause)}`, { cause })
    this.name = 'SerializationError'
  }
}

export type TransportFailureReason = 'cancelled' | 'timeout' | 'network'

export class TransportError extends StabilityError {
  readonly reason: TransportFailureReason

  constructor(reason: TransportFailureReason, message: string, cause?: unknown) {
    super('transport_error', message, { cause })
    this.name = 'TransportError'
    this.reason = reason
  }

  /** 用户主动中止 (而不是网络故障) */
  get cancelled(): boolean {
    return this.reason === 'cancelled'
  }
}

export class RemoteError extends StabilityError {
  readonly status: number
  /** 响应正文，仅用于诊断 */
  readonly body: string

  constructor(status: number, body: string) {
    super(
      'remote_error',
      `got unexpected status code ${status} while generating image. Response: ${body}`,
    )
    this.name = 'RemoteError'
    this.status = status
    this.body = body
  }
}

export class ConfigurationError extends StabilityError {
  constructor(message: string) {
    super('configuration_error', message)
    this.name = 'ConfigurationError'
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}
