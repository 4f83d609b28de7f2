import type { Command } from 'commander'
import type { CommandContext } from './context.js'
import { Option } from 'commander'
import { parseAspectRatio } from '../stability/aspect-ratio.js'
import { DEFAULT_OUTPUT_FORMAT, OUTPUT_FORMATS } from '../stability/models.js'
import { createUltraRequest } from '../stability/ultra.js'
import { runGeneration } from './context.js'

export interface UltraCommandOptions {
  ratio: string
  format: string
  negative?: string
}

export async function runUltra(
  ctx: CommandContext,
  promptParts: string[],
  opts: UltraCommandOptions,
): Promise<string> {
  const prompt = promptParts.join(' ')
  const request = createUltraRequest({
    prompt,
    negativePrompt: opts.negative,
    aspectRatio: parseAspectRatio(opts.ratio),
    outputFormat: opts.format,
  })

  return runGeneration(ctx, {
    prompt,
    outputFormat: request.outputFormat,
    generate: (client, options) => client.generateUltra(request, options),
  })
}

export function registerUltraCommand(
  program: Command,
  action: (run: (ctx: CommandContext) => Promise<string>) => Promise<void>,
): void {
  program
    .command('ultra')
    .description('Generate an image with Stable Image Ultra')
    .argument('<prompt...>', 'The prompt to use for generation.')
    .option('-r, --ratio <ratio>', 'The aspect ratio to use when generating.', '1:1')
    .addOption(new Option('-f, --format <format>', 'The format of the returned image.').choices(OUTPUT_FORMATS).default(DEFAULT_OUTPUT_FORMAT))
    .option('-n, --negative <text>', 'The negative prompt to use during generation.')
    .action((promptParts: string[], opts: UltraCommandOptions) =>
      action(ctx => runUltra(ctx, promptParts, opts)),
    )
}
