import type { Buffer } from 'node:buffer'
import type { Config } from '../config.js'
import type { GenerateOptions, StabilityClient } from '../stability/client.js'
import { addPromptMetadata } from '../metadata/exif.js'
import { runPostGenerationCommand } from '../output/post-command.js'
import { outputPathFor, saveImage } from '../output/save.js'
import { logger } from '../utils/logger.js'

/** 命令需要的客户端能力，测试中可替换 */
export type ImageGenerator = Pick<StabilityClient, 'generateSd3' | 'generateUltra'>

export interface CommandContext {
  config: Config
  client: ImageGenerator
  signal?: AbortSignal
}

export interface GenerationJob {
  /** 写入 EXIF 的完整 prompt */
  prompt: string
  outputFormat: string
  generate: (client: ImageGenerator, options: GenerateOptions) => Promise<Buffer>
}

/**
 * 执行一次生成的完整流程:
 * 1. 调用 Stability API
 * 2. 写入 prompt 元数据
 * 3. 保存为 <输出目录>/<时间戳>.<格式>
 * 4. 执行生成后命令 (如已配置)
 *
 * @returns 保存的文件路径
 */
export async function runGeneration(ctx: CommandContext, job: GenerationJob): Promise<string> {
  const image = await job.generate(ctx.client, { signal: ctx.signal })
  const tagged = await addPromptMetadata(image, job.prompt)

  const filePath = outputPathFor(ctx.config.outputDirectory, job.outputFormat)
  await saveImage(filePath, tagged)

  const ok = await runPostGenerationCommand(ctx.config.postGenerationCommand, filePath)
  if (!ok)
    logger.warn(`Image kept at ${filePath} despite post-generation failure`)

  return filePath
}
