import type { Readable } from 'node:stream'
import { Buffer } from 'node:buffer'
import FormData from 'form-data'
import { SerializationError } from './errors.js'

/** 序列化后的 multipart 请求体 */
export interface SerializedForm {
  body: Buffer
  /** 需随请求体一起发送的 Content-Type (含 boundary) */
  contentType: string
}

export interface SerializeOptions {
  /** 固定 boundary，测试中用于得到逐字节一致的请求体 */
  boundary?: string
}

export interface FormField {
  name: string
  value: string | Buffer
}

/** 按给定顺序写入字段并生成请求体 */
export function buildForm(fields: FormField[], options: SerializeOptions = {}): SerializedForm {
  try {
    const form = new FormData()
    if (options.boundary)
      form.setBoundary(options.boundary)

    for (const field of fields) {
      form.append(field.name, field.value)
    }

    return {
      body: form.getBuffer(),
      contentType: `multipart/form-data; boundary=${form.getBoundary()}`,
    }
  }
  catch (err) {
    throw new SerializationError('failed to build multipart form data', err)
  }
}

/** 将参考图片读到结束，流由调用方负责关闭 */
export async function readImage(image: Readable): Promise<Buffer> {
  try {
    const chunks: Buffer[] = []
    for await (const chunk of image) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk))
    }
    return Buffer.concat(chunks)
  }
  catch (err) {
    throw new SerializationError('failed to copy image to form fields for request', err)
  }
}
