/**
 * 结果输出：固定小数位的纯文本，无换行
 */

import { mkdirSync, writeFileSync } from 'fs'
import { dirname } from 'path'
import { createLogger, logError } from '../shared/logger.js'
import { AppError, toAppError } from '../shared/error.js'
import { fromThrowable, mapErr, type Result } from '../shared/result.js'

const logger = createLogger('output')

export const DEFAULT_DECIMALS = 2

export function formatScore(value: number, decimals: number = DEFAULT_DECIMALS): string {
  return value.toFixed(decimals)
}

/**
 * 写入结果，必要时创建父目录；已存在的文件被覆盖
 */
export function writeResult(path: string, value: number, decimals: number = DEFAULT_DECIMALS): void {
  try {
    mkdirSync(dirname(path), { recursive: true })
    writeFileSync(path, formatScore(value, decimals), 'utf-8')
  } catch (error) {
    throw AppError.outputWriteFailed(path, error)
  }
}

/**
 * 出错时写入默认值 0.00
 *
 * 不抛异常：调用方随后要抛出原始错误，这里失败只记录日志
 */
export function writeFallback(path: string, decimals: number = DEFAULT_DECIMALS): Result<void, AppError> {
  const result = mapErr(
    fromThrowable(() => writeResult(path, 0, decimals)),
    toAppError
  )
  if (!result.ok) {
    logError(logger, '写入输出文件错误', result.error, { path, code: result.error.code })
  }
  return result
}
