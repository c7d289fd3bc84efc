/**
 * 文档读取与结果输出类型
 */

/** 按尝试顺序排列的候选编码 */
export const SUPPORTED_ENCODINGS = ['utf-8', 'gbk', 'gb2312', 'utf-16'] as const

export type SupportedEncoding = (typeof SUPPORTED_ENCODINGS)[number]

export function isSupportedEncoding(value: string): value is SupportedEncoding {
  return (SUPPORTED_ENCODINGS as readonly string[]).includes(value)
}

export interface LoadedDocument {
  readonly path: string
  readonly bytes: Buffer
  /** 解码并去除首尾空白后的文本；空文件为 '' */
  readonly text: string
  /** 解码成功的编码；空文件为 null */
  readonly encoding: SupportedEncoding | null
}

export type DocumentLoadError =
  | { readonly kind: 'NotFound'; readonly path: string }
  | { readonly kind: 'Unreadable'; readonly path: string; readonly cause: unknown }
  | { readonly kind: 'DecodeError'; readonly path: string; readonly tried: readonly SupportedEncoding[] }
  | { readonly kind: 'EmptyContent'; readonly path: string; readonly encoding: SupportedEncoding }

export type DocumentLoadErrorKind = DocumentLoadError['kind']

/** 一次查重的三个路径 */
export interface CheckPaths {
  readonly originalPath: string
  readonly candidatePath: string
  readonly outputPath: string
}
