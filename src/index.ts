#!/usr/bin/env node
import type { CommandContext } from './commands/context.js'
import process from 'node:process'
import { Command } from 'commander'
import { registerSd3Command } from './commands/sd3.js'
import { registerUltraCommand } from './commands/ultra.js'
import { defaultConfigPath, loadConfig } from './config.js'
import { StabilityClient } from './stability/client.js'
import { logger, setVerbose } from './utils/logger.js'

interface GlobalOptions {
  config: string
  verbose?: boolean
}

const program = new Command()

program
  .name('stable-image')
  .description('Generate images with the Stability API')
  .version('0.1.0')
  .option('-c, --config <path>', 'Path to the configuration file.', defaultConfigPath())
  .option('-v, --verbose', 'Print debug logs.')

/**
 * 所有子命令共用的执行入口: 加载配置、创建客户端、处理 Ctrl+C 与错误
 */
async function execute(run: (ctx: CommandContext) => Promise<string>): Promise<void> {
  const opts = program.opts<GlobalOptions>()
  setVerbose(opts.verbose === true)

  const controller = new AbortController()
  const onInterrupt = () => {
    logger.warn('Interrupted, cancelling request...')
    controller.abort()
  }
  process.once('SIGINT', onInterrupt)

  try {
    const config = await loadConfig(opts.config)
    logger.debug(`Loaded configuration from ${opts.config}`)

    const client = new StabilityClient({
      apiKey: config.apiKey,
      baseUrl: config.baseUrl,
    })

    const filePath = await run({ config, client, signal: controller.signal })
    console.log(filePath)
  }
  catch (err) {
    const msg = err instanceof Error ? err.message : String(err)
    logger.error(`failed to execute command: ${msg}`)
    process.exitCode = 1
  }
  finally {
    process.off('SIGINT', onInterrupt)
  }
}

registerSd3Command(program, execute)
registerUltraCommand(program, execute)

program.parseAsync(process.argv).catch((err) => {
  logger.error('Unexpected error:', err)
  process.exitCode = 1
})
