/**
 * 严格解码
 *
 * iconv-lite 遇到非法字节会替换成 U+FFFD 而不是报错，
 * 这里以"解码后再编码能还原原始字节"作为解码成功的判据。
 */

import iconv from 'iconv-lite'
import type { SupportedEncoding } from '../types/document.js'

const BOM = '\uFEFF'

/** utf-16 按 BOM 判断字节序，无 BOM 时按小端处理 */
function resolveCodec(bytes: Buffer, encoding: SupportedEncoding): string {
  if (encoding !== 'utf-16') return encoding
  return bytes[0] === 0xfe && bytes[1] === 0xff ? 'utf-16be' : 'utf-16le'
}

/**
 * 用指定编码解码，失败返回 null；成功时去掉开头的 BOM
 */
export function decodeStrict(bytes: Buffer, encoding: SupportedEncoding): string | null {
  const codec = resolveCodec(bytes, encoding)
  const text = iconv.decode(bytes, codec, { stripBOM: false })
  const roundTrip = iconv.encode(text, codec, { addBOM: false })
  if (!roundTrip.equals(bytes)) return null
  return text.startsWith(BOM) ? text.slice(BOM.length) : text
}

