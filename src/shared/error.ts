/**
 * 统一错误处理系统
 * 支持错误分类、上下文信息和修复建议
 */

import chalk from 'chalk'
import { getErrorMessage } from './assertError.js'

// ============ 错误分类定义 ============

export type ErrorCategory =
  | 'CONFIG' // 配置错误
  | 'RESOURCE' // 资源错误（文件不存在等）
  | 'ENCODING' // 编码错误
  | 'PERMISSION' // 权限错误
  | 'RUNTIME' // 运行时错误
  | 'UNKNOWN' // 未知错误

export type ErrorCode =
  // 配置
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID'
  // 输入文档
  | 'DOC_NOT_FOUND'
  | 'DOC_UNREADABLE'
  | 'DOC_DECODE_FAILED'
  | 'DOC_EMPTY'
  // 结果输出
  | 'OUTPUT_WRITE_FAILED'
  // 相似度计算
  | 'COMPUTATION_FAILED'
  // 按消息匹配得到的错误码
  | 'ERR_FILE_NOT_FOUND'
  | 'ERR_PERMISSION'
  | 'ERR_MEMORY'
  | 'UNKNOWN'

// ============ 统一错误类 ============

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly category: ErrorCategory = 'UNKNOWN',
    public override readonly cause?: unknown,
    public readonly suggestion?: string
  ) {
    super(message)
    this.name = 'AppError'
  }

  /** 是否为输入/输出文件相关错误（CLI 单独提示） */
  get isFileError(): boolean {
    return this.category === 'RESOURCE' || this.category === 'ENCODING' || this.category === 'PERMISSION'
  }

  /**
   * 格式化错误输出到终端
   */
  format(): string {
    const lines: string[] = []
    const colorFn = categoryColors[this.category]

    lines.push('')
    lines.push(
      chalk.red('✗') + ' ' + chalk.bold('错误') + ` [${colorFn(categoryLabels[this.category])}]`
    )
    lines.push('')
    lines.push(chalk.dim(`  代码: ${this.code}`))
    lines.push(`  ${this.message}`)

    if (this.suggestion) {
      lines.push('')
      lines.push(chalk.cyan('  建议修复:'))
      lines.push(chalk.dim('    →') + ` ${this.suggestion}`)
    }

    lines.push('')
    return lines.join('\n')
  }

  // ============ 工厂方法 ============

  static configNotFound(path: string): AppError {
    return new AppError(
      'CONFIG_NOT_FOUND',
      `配置文件不存在: ${path}`,
      'CONFIG',
      undefined,
      '检查 --config 指定的路径是否正确'
    )
  }

  static configInvalid(reason: string): AppError {
    return new AppError(
      'CONFIG_INVALID',
      `配置无效: ${reason}`,
      'CONFIG',
      undefined,
      '参考 .paper-check.yaml 示例确认配置格式'
    )
  }

  static documentNotFound(path: string): AppError {
    return new AppError(
      'DOC_NOT_FOUND',
      `文件不存在: ${path}`,
      'RESOURCE',
      undefined,
      `确认文件存在: ls -la ${path}`
    )
  }

  static documentUnreadable(path: string, cause: unknown): AppError {
    return new AppError(
      'DOC_UNREADABLE',
      `无法读取文件: ${path} (${getErrorMessage(cause)})`,
      'PERMISSION',
      cause,
      `检查文件权限: ls -la ${path}`
    )
  }

  static decodeFailed(path: string, encodings: readonly string[]): AppError {
    return new AppError(
      'DOC_DECODE_FAILED',
      `无法解码文件: ${path}（已尝试 ${encodings.join(', ')}）`,
      'ENCODING',
      undefined,
      '将文件另存为 UTF-8 编码后重试'
    )
  }

  static emptyContent(path: string): AppError {
    return new AppError(
      'DOC_EMPTY',
      `文件内容为空: ${path}`,
      'RESOURCE',
      undefined,
      '确认文件包含可比较的文本'
    )
  }

  static outputWriteFailed(path: string, cause: unknown): AppError {
    return new AppError(
      'OUTPUT_WRITE_FAILED',
      `写入输出文件失败: ${path} (${getErrorMessage(cause)})`,
      'PERMISSION',
      cause,
      '检查输出目录是否可写'
    )
  }

  static computation(cause: unknown): AppError {
    return new AppError(
      'COMPUTATION_FAILED',
      `相似度计算错误: ${getErrorMessage(cause)}`,
      'RUNTIME',
      cause
    )
  }

  static unknown(cause: unknown): AppError {
    return new AppError('UNKNOWN', getErrorMessage(cause), 'UNKNOWN', cause)
  }

  /**
   * 从普通 Error 或字符串创建 AppError（使用错误模式匹配）
   */
  static fromError(error: Error | string): AppError {
    const errorMessage = typeof error === 'string' ? error : error.message
    const cause = typeof error === 'string' ? undefined : error

    for (const pattern of errorPatterns) {
      const match = errorMessage.match(pattern.pattern)
      if (match) {
        return new AppError(
          pattern.code,
          errorMessage,
          pattern.category,
          cause,
          pattern.getSuggestion(match)
        )
      }
    }

    return new AppError('UNKNOWN', errorMessage, 'UNKNOWN', cause)
  }
}

// ============ 错误模式匹配 ============

interface ErrorPattern {
  pattern: RegExp
  category: ErrorCategory
  code: ErrorCode
  getSuggestion: (match: RegExpMatchArray) => string
}

function quotedPath(match: RegExpMatchArray, fallback: string): string {
  const pathMatch = match.input?.match(/['"]([^'"]+)['"]/)
  return pathMatch?.[1] ?? fallback
}

const errorPatterns: ErrorPattern[] = [
  {
    pattern: /ENOENT|no such file|file not found/i,
    category: 'RESOURCE',
    code: 'ERR_FILE_NOT_FOUND',
    getSuggestion: match => `确认文件存在: ls -la ${quotedPath(match, '文件路径')}`,
  },
  {
    pattern: /EACCES|EPERM|EISDIR|permission denied/i,
    category: 'PERMISSION',
    code: 'ERR_PERMISSION',
    getSuggestion: match => `检查文件权限: ls -la ${quotedPath(match, '路径')}`,
  },
  {
    pattern: /out of memory|heap|ENOMEM/i,
    category: 'RUNTIME',
    code: 'ERR_MEMORY',
    getSuggestion: () => '输入文件过大，可调低 vectorizer.maxFeatures 或拆分文件',
  },
]

// ============ 格式化输出 ============

const categoryLabels: Record<ErrorCategory, string> = {
  CONFIG: '配置',
  RESOURCE: '资源',
  ENCODING: '编码',
  PERMISSION: '权限',
  RUNTIME: '运行时',
  UNKNOWN: '未知',
}

const categoryColors: Record<ErrorCategory, (text: string) => string> = {
  CONFIG: chalk.yellow,
  RESOURCE: chalk.yellow,
  ENCODING: chalk.magenta,
  PERMISSION: chalk.red,
  RUNTIME: chalk.red,
  UNKNOWN: chalk.gray,
}

/** 统一转为 AppError */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error
  if (error instanceof Error || typeof error === 'string') return AppError.fromError(error)
  return AppError.unknown(error)
}

/**
 * 打印错误到终端
 */
export function printError(error: unknown): void {
  console.error(toAppError(error).format())
}

// ============ 错误断言 ============

export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`)
}
