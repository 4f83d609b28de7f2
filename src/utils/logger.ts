import process from 'node:process'

const timestamp = () => new Date().toISOString()

// stdout 只输出生成的文件路径，日志统一写到 stderr
let debugEnabled = process.env.LOG_LEVEL === 'debug'

export function setVerbose(verbose: boolean): void {
  debugEnabled = verbose || process.env.LOG_LEVEL === 'debug'
}

export const logger = {
  info: (msg: string, ...args: unknown[]) =>
    console.error(`[${timestamp()}] INFO  ${msg}`, ...args),
  warn: (msg: string, ...args: unknown[]) =>
    console.error(`[${timestamp()}] WARN  ${msg}`, ...args),
  error: (msg: string, ...args: unknown[]) =>
    console.error(`[${timestamp()}] ERROR ${msg}`, ...args),
  debug: (msg: string, ...args: unknown[]) => {
    if (debugEnabled)
      console.error(`[${timestamp()}] DEBUG ${msg}`, ...args)
  },
}
