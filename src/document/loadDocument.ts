/**
 * 读取输入文档
 *
 * 不抛异常，以 Result 返回错误种类，由调用方决定如何处理。
 */

import { readFileSync, statSync } from 'fs'
import { ok, err, fromThrowable, type Result } from '../shared/result.js'
import { AppError, assertNever } from '../shared/error.js'
import { getSystemErrorCode } from '../shared/assertError.js'
import {
  SUPPORTED_ENCODINGS,
  type DocumentLoadError,
  type LoadedDocument,
  type SupportedEncoding,
} from '../types/document.js'
import { decodeStrict } from './decodeText.js'

const MISSING_PATH_CODES = new Set(['ENOENT', 'ENOTDIR'])

/**
 * 读取并解码文件
 *
 * - 路径不存在或不是普通文件：NotFound
 * - 零字节文件：成功，text 为 ''，encoding 为 null
 * - 依次尝试候选编码，取第一个无损解码的结果并去除首尾空白
 * - 该结果全是空白：EmptyContent
 * - 所有编码均失败：DecodeError
 */
export function loadDocument(
  path: string,
  encodings: readonly SupportedEncoding[] = SUPPORTED_ENCODINGS
): Result<LoadedDocument, DocumentLoadError> {
  const stats = fromThrowable(() => statSync(path, { throwIfNoEntry: false }))
  if (!stats.ok) {
    return MISSING_PATH_CODES.has(getSystemErrorCode(stats.error) ?? '')
      ? err({ kind: 'NotFound', path })
      : err({ kind: 'Unreadable', path, cause: stats.error })
  }
  if (!stats.value || !stats.value.isFile()) {
    return err({ kind: 'NotFound', path })
  }

  const read = fromThrowable(() => readFileSync(path))
  if (!read.ok) {
    return err({ kind: 'Unreadable', path, cause: read.error })
  }

  const bytes = read.value
  if (bytes.length === 0) {
    return ok({ path, bytes, text: '', encoding: null })
  }

  for (const encoding of encodings) {
    const decoded = decodeStrict(bytes, encoding)
    if (decoded === null) continue

    // 第一个成功的解码即为结果，空白内容不再尝试后续编码
    const text = decoded.trim()
    return text.length > 0
      ? ok({ path, bytes, text, encoding })
      : err({ kind: 'EmptyContent', path, encoding })
  }

  return err({ kind: 'DecodeError', path, tried: [...encodings] })
}

/**
 * 读取错误 → AppError，供需要抛出的调用方使用
 */
export function toDocumentError(error: DocumentLoadError): AppError {
  switch (error.kind) {
    case 'NotFound':
      return AppError.documentNotFound(error.path)
    case 'Unreadable':
      return AppError.documentUnreadable(error.path, error.cause)
    case 'DecodeError':
      return AppError.decodeFailed(error.path, error.tried)
    case 'EmptyContent':
      return AppError.emptyContent(error.path)
    default:
      return assertNever(error)
  }
}
