import { readFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import process from 'node:process'
import * as z from 'zod'
import { ConfigurationError } from './stability/errors.js'
import 'dotenv/config'

// ────────────────────────────────────────────────────────
// 配置文件 Schema (~/.config/stable-image-cli/config.json)
// ────────────────────────────────────────────────────────

const fileSchema = z.object({
  // Stability API Key
  api_key: z.string().default(''),

  // 图片输出目录，不展开 ~ 和环境变量
  output_directory: z.string().default('.'),

  // 生成后执行的命令，以图片路径作为唯一参数 (e.g. "firefox")
  post_generation_command: z.string().default(''),

  // API 地址 (可选)
  base_url: z.url().optional(),
})

// ────────────────────────────────────────────────────────
// 环境变量 Schema (优先级高于配置文件)
// ────────────────────────────────────────────────────────

const envSchema = z.object({
  STABILITY_API_KEY: z.string().optional(),
  STABILITY_BASE_URL: z.url().optional().or(z.literal('')),
  STABLE_IMAGE_OUTPUT_DIR: z.string().optional(),
})

export interface Config {
  apiKey: string
  /** 图片以 Unix 时间戳命名保存在此目录 */
  outputDirectory: string
  /** 为空表示不执行 */
  postGenerationCommand: string
  /** 未设置时使用客户端默认地址 */
  baseUrl?: string
}

export function defaultConfigPath(): string {
  return path.join(os.homedir(), '.config', 'stable-image-cli', 'config.json')
}

function formatIssues(issues: z.ZodError['issues']): string {
  return issues
    .map(issue => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n')
}

async function readConfigFile(configPath: string): Promise<unknown> {
  let raw: string
  try {
    raw = await readFile(configPath, 'utf8')
  }
  catch (err) {
    // 配置文件可选，全部由环境变量提供也可以
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT')
      return {}
    throw new ConfigurationError(`failed to open configuration file "${configPath}": ${String(err)}`)
  }

  try {
    return JSON.parse(raw)
  }
  catch (err) {
    throw new ConfigurationError(`failed to parse JSON in configuration file "${configPath}": ${String(err)}`)
  }
}

/**
 * 加载配置: 配置文件 < 环境变量
 */
export async function loadConfig(
  configPath = defaultConfigPath(),
  env: NodeJS.ProcessEnv = process.env,
): Promise<Config> {
  const file = fileSchema.safeParse(await readConfigFile(configPath))
  if (!file.success) {
    throw new ConfigurationError(
      `invalid configuration file "${configPath}":\n${formatIssues(file.error.issues)}`,
    )
  }

  const vars = envSchema.safeParse(env)
  if (!vars.success) {
    throw new ConfigurationError(
      `invalid environment variables:\n${formatIssues(vars.error.issues)}`,
    )
  }

  const config: Config = {
    apiKey: vars.data.STABILITY_API_KEY || file.data.api_key,
    outputDirectory: vars.data.STABLE_IMAGE_OUTPUT_DIR || file.data.output_directory,
    postGenerationCommand: file.data.post_generation_command,
    baseUrl: vars.data.STABILITY_BASE_URL || file.data.base_url,
  }

  if (!config.apiKey) {
    throw new ConfigurationError(
      `no API key configured: set api_key in ${configPath} or STABILITY_API_KEY`,
    )
  }

  return config
}
