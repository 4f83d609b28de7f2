import { execFile } from 'node:child_process'
import { promisify } from 'node:util'
import { logger } from '../utils/logger.js'

const execFileAsync = promisify(execFile)

/**
 * 执行生成后命令 (e.g. "firefox /path/to/image")
 *
 * 失败只记录日志，已写入的图片保留
 * @returns 命令是否成功
 */
export async function runPostGenerationCommand(command: string, filePath: string): Promise<boolean> {
  if (!command)
    return true

  try {
    await execFileAsync(command, [filePath])
    logger.info(`Post-generation command finished: ${command} "${filePath}"`)
    return true
  }
  catch (err) {
    const msg = err instanceof Error ? err.message : String(err)
    logger.error(`post-generation command failed: ${command} "${filePath}": ${msg}`)
    return false
  }
}
