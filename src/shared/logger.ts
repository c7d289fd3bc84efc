/**
 * 统一日志系统
 *
 * 功能：
 * - 分级日志（debug/info/warn/error）
 * - 前台/后台格式（按 TTY 自动选择）
 * - 结构化上下文信息
 *
 * 使用：
 * - createLogger('scope').debug/info/warn/error
 * - setLogLevel('debug'|'info'|'warn'|'error'|'silent')
 */

import chalk from 'chalk'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'
export type LogMode = 'foreground' | 'background'

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

const LEVEL_COLORS: Record<Exclude<LogLevel, 'silent'>, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
}

const LEVEL_LABELS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: 'DBG',
  info: 'INF',
  warn: 'WRN',
  error: 'ERR',
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY
}

// ============ 全局状态 ============

// 从环境变量初始化日志级别
function initLogLevel(): LogLevel {
  if (process.env.NODE_ENV === 'test') return 'silent'
  if (process.env.SILENT === '1') return 'silent'
  if (process.env.DEBUG === '1') return 'debug'
  const level = process.env.LOG_LEVEL
  if (level && isLogLevel(level)) return level
  return 'info'
}

// TTY 为前台模式，管道/重定向为后台模式
function initLogMode(): LogMode {
  return process.stdout.isTTY ? 'foreground' : 'background'
}

let currentLevel: LogLevel = initLogLevel()
const currentMode: LogMode = initLogMode()

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel]
}

function formatTime(): string {
  const now = new Date()
  return chalk.dim(
    `${now.getHours().toString().padStart(2, '0')}:${now.getMinutes().toString().padStart(2, '0')}:${now.getSeconds().toString().padStart(2, '0')}`
  )
}

/**
 * 格式化消息
 * - 前台模式：简洁输出，仅时间+级别+消息
 * - 后台模式：完整结构化输出，包含 scope
 */
export function formatMessage(
  level: Exclude<LogLevel, 'silent'>,
  scope: string,
  message: string,
  mode: LogMode = currentMode
): string {
  const color = LEVEL_COLORS[level]
  const label = LEVEL_LABELS[level]

  if (mode === 'foreground') {
    return `${formatTime()} ${color(label)} ${message}`
  }

  const scopeStr = scope ? chalk.cyan(`[${scope}]`) : ''
  return `${formatTime()} ${color(label)} ${scopeStr} ${message}`
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export function createLogger(scope: string = ''): Logger {
  function logWithLevel(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
    if (!shouldLog(level)) return

    const output = formatMessage(level, scope, message)
    // 诊断日志统一走 stderr，stdout 留给结果输出
    const logFn = level === 'warn' ? console.warn : console.error
    logFn(output, ...args)
  }

  return {
    debug(message: string, ...args: unknown[]) {
      logWithLevel('debug', message, args)
    },
    info(message: string, ...args: unknown[]) {
      logWithLevel('info', message, args)
    },
    warn(message: string, ...args: unknown[]) {
      logWithLevel('warn', message, args)
    },
    error(message: string, ...args: unknown[]) {
      logWithLevel('error', message, args)
    },
  }
}

// ============ 错误日志增强 ============

/** 错误上下文信息，用于增强错误诊断 */
export interface ErrorContext {
  /** 相关文件路径 */
  path?: string
  /** 错误码 */
  code?: string
  /** 额外数据 */
  [key: string]: unknown
}

/**
 * 记录带上下文的错误日志
 * 自动提取错误信息和堆栈，并附加上下文信息
 *
 * @example
 * logError(logger, 'Failed to write output', err, { path: 'out/ans.txt' })
 */
export function logError(
  loggerInstance: Logger,
  message: string,
  error: Error | string,
  context?: ErrorContext
): void {
  const errorMessage = error instanceof Error ? error.message : error
  const errorStack = error instanceof Error ? error.stack : undefined

  const fullMessage = `${message}: ${errorMessage}`

  // 过滤 undefined 值
  const data: Record<string, unknown> = {}

  if (context) {
    for (const [key, value] of Object.entries(context)) {
      if (value !== undefined) {
        data[key] = value
      }
    }
  }

  // 堆栈只保留前 5 帧
  if (errorStack) {
    const stackLines = errorStack.split('\n').slice(0, 6)
    data.stack = stackLines.join('\n')
  }

  if (Object.keys(data).length > 0) {
    loggerInstance.error(fullMessage, data)
  } else {
    loggerInstance.error(fullMessage)
  }
}
