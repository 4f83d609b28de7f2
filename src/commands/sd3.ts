import type { Command } from 'commander'
import type { CommandContext } from './context.js'
import type { ReadStream } from 'node:fs'
import { open } from 'node:fs/promises'
import { InvalidArgumentError, Option } from 'commander'
import { parseAspectRatio } from '../stability/aspect-ratio.js'
import { DEFAULT_OUTPUT_FORMAT, DEFAULT_SD3_MODEL, OUTPUT_FORMATS, SD3_MODELS } from '../stability/models.js'
import { createSd3Request } from '../stability/sd3.js'
import { logger } from '../utils/logger.js'
import { runGeneration } from './context.js'

export interface Sd3CommandOptions {
  model: string
  ratio: string
  format: string
  negative?: string
  strength?: number
  image?: string
}

export function parseStrengthArgument(value: string): number {
  const strength = Number(value)
  if (value.trim() === '' || Number.isNaN(strength))
    throw new InvalidArgumentError('Not a number.')
  return strength
}

/** 先打开参考图片，文件不存在时直接报错 */
async function openImage(filePath: string): Promise<ReadStream> {
  try {
    const handle = await open(filePath, 'r')
    return handle.createReadStream()
  }
  catch (err) {
    throw new Error(`failed to open image ${filePath}: ${err instanceof Error ? err.message : String(err)}`, { cause: err })
  }
}

/** 由命令行参数执行 SD3 生成，返回保存的文件路径 */
export async function runSd3(
  ctx: CommandContext,
  promptParts: string[],
  opts: Sd3CommandOptions,
): Promise<string> {
  const prompt = promptParts.join(' ')

  // 参考图片流由这里打开和关闭
  const image = opts.image ? await openImage(opts.image) : undefined
  try {
    const request = createSd3Request({
      prompt,
      model: opts.model,
      outputFormat: opts.format,
      aspectRatio: parseAspectRatio(opts.ratio),
      negativePrompt: opts.negative,
      strength: opts.strength,
      image,
    })

    logger.debug(`SD3 request: model=${request.model}, ratio=${opts.ratio}, format=${request.outputFormat}`)

    return await runGeneration(ctx, {
      prompt,
      outputFormat: request.outputFormat,
      generate: (client, options) => client.generateSd3(request, options),
    })
  }
  finally {
    image?.destroy()
  }
}

export function registerSd3Command(
  program: Command,
  action: (run: (ctx: CommandContext) => Promise<string>) => Promise<void>,
): void {
  program
    .command('sd3')
    .description('Generate an image with Stable Diffusion 3')
    .argument('<prompt...>', 'The prompt to use for generation.')
    .addOption(new Option('-m, --model <model>', 'The model to use.').choices(SD3_MODELS).default(DEFAULT_SD3_MODEL))
    .option('-r, --ratio <ratio>', 'The aspect ratio to use when generating.', '1:1')
    .addOption(new Option('-f, --format <format>', 'The format of the returned image.').choices(OUTPUT_FORMATS).default(DEFAULT_OUTPUT_FORMAT))
    .option('-n, --negative <text>', 'The negative prompt to use during generation.')
    .option('-s, --strength <strength>', 'The strength to use when doing image-to-image generation.', parseStrengthArgument)
    .option('-i, --image <path>', 'The image to use for image-to-image generation.')
    .action((promptParts: string[], opts: Sd3CommandOptions) =>
      action(ctx => runSd3(ctx, promptParts, opts)),
    )
}
