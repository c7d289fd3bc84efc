/**
 * 论文查重主流程
 *
 * 读取原文和抄袭版 → 计算相似度 → 写入答案文件。
 * 任何失败都先写入 0.00，再把原始错误抛给调用方，保证答案文件总是存在。
 */

import { createLogger } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import type { Result } from '../shared/result.js'
import type { SimilarityEngine } from '../similarity/SimilarityEngine.js'
import { loadDocument, toDocumentError } from '../document/loadDocument.js'
import { writeResult, writeFallback, DEFAULT_DECIMALS } from '../document/writeResult.js'
import {
  SUPPORTED_ENCODINGS,
  type CheckPaths,
  type DocumentLoadError,
  type LoadedDocument,
  type SupportedEncoding,
} from '../types/document.js'

const logger = createLogger('check')

export interface CheckOptions {
  /** 候选编码，默认 utf-8 → gbk → gb2312 → utf-16 */
  encodings?: readonly SupportedEncoding[]
  /** 答案文件小数位数，默认 2 */
  decimals?: number
}

/**
 * 空文件与读取错误一样视为"没有可比较内容"
 */
function requireContent(result: Result<LoadedDocument, DocumentLoadError>): LoadedDocument {
  if (!result.ok) throw toDocumentError(result.error)
  if (result.value.text.length === 0) throw AppError.emptyContent(result.value.path)
  return result.value
}

function charLength(text: string): number {
  return Array.from(text).length
}

/**
 * 执行查重，返回相似度（保留 4 位小数）
 *
 * @throws AppError 文件不存在、无法解码、内容为空或答案文件写入失败
 */
export function checkPlagiarism(
  paths: CheckPaths,
  engine: SimilarityEngine,
  options: CheckOptions = {}
): number {
  const { encodings = SUPPORTED_ENCODINGS, decimals = DEFAULT_DECIMALS } = options

  try {
    logger.info('正在读取文件...')
    const original = requireContent(loadDocument(paths.originalPath, encodings))
    const candidate = requireContent(loadDocument(paths.candidatePath, encodings))

    logger.info(`原文长度: ${charLength(original.text)} 字符 (${original.encoding})`)
    logger.info(`抄袭版长度: ${charLength(candidate.text)} 字符 (${candidate.encoding})`)

    logger.info('正在计算相似度...')
    const similarity = engine.compare(original.text, candidate.text)

    writeResult(paths.outputPath, similarity, decimals)
    return similarity
  } catch (error) {
    writeFallback(paths.outputPath, decimals)
    throw error
  }
}
