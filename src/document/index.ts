/**
 * @entry Document 文档读写模块
 *
 * - loadDocument: 多编码读取，Result 返回错误种类
 * - writeResult / writeFallback: 结果文件输出
 */

export { loadDocument, toDocumentError } from './loadDocument.js'
export { decodeStrict } from './decodeText.js'
export { writeResult, writeFallback, formatScore, DEFAULT_DECIMALS } from './writeResult.js'
