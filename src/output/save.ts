import type { Buffer } from 'node:buffer'
import { writeFile } from 'node:fs/promises'
import path from 'node:path'
import { logger } from '../utils/logger.js'

/** <目录>/<Unix 秒>.<格式> */
export function outputPathFor(directory: string, format: string, now = new Date()): string {
  const seconds = Math.floor(now.getTime() / 1000)
  return path.join(directory, `${seconds}.${format}`)
}

/**
 * 写入图片文件，文件已存在时报错而不覆盖
 */
export async function saveImage(filePath: string, image: Buffer): Promise<void> {
  try {
    await writeFile(filePath, image, { flag: 'wx', mode: 0o644 })
  }
  catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'EEXIST')
      throw new Error(`output file already exists: ${filePath}`, { cause: err })
    throw new Error(`failed while writing to output file ${filePath}: ${String(err)}`, { cause: err })
  }
  logger.info(`Image saved: ${filePath}`)
}
