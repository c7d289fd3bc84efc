import { z } from 'zod'
import { SUPPORTED_ENCODINGS } from '../types/document.js'

export const segmenterConfigSchema = z.object({
  /** 追加到内置学术词表之后的整体保留词 */
  extraLexicon: z.array(z.string().min(1)).default([]),
  /** 追加到通用词典的词 */
  extraDictionary: z.array(z.string().min(1)).default([]),
})

export const normalizerConfigSchema = z.object({
  /** 保留词的最小长度（按字符计），默认丢弃单字词 */
  minTokenLength: z.number().int().min(1).default(2),
  extraStopWords: z.array(z.string().min(1)).default([]),
})

export const vectorizerConfigSchema = z.object({
  /** 词表上限，限制特征数量提高性能 */
  maxFeatures: z.number().int().positive().default(5000),
})

export const scoringConfigSchema = z.object({
  /** 相似度内部保留的小数位数 */
  precision: z.number().int().min(0).max(10).default(4),
})

export const loaderConfigSchema = z.object({
  /** 按顺序尝试的编码 */
  encodings: z.array(z.enum(SUPPORTED_ENCODINGS)).min(1).default([...SUPPORTED_ENCODINGS]),
})

export const outputConfigSchema = z.object({
  /** 答案文件中的小数位数 */
  decimals: z.number().int().min(0).max(6).default(2),
})

export const configSchema = z.object({
  segmenter: segmenterConfigSchema.default({}),
  normalizer: normalizerConfigSchema.default({}),
  vectorizer: vectorizerConfigSchema.default({}),
  scoring: scoringConfigSchema.default({}),
  loader: loaderConfigSchema.default({}),
  output: outputConfigSchema.default({}),
})

export type SegmenterConfig = z.infer<typeof segmenterConfigSchema>
export type NormalizerConfig = z.infer<typeof normalizerConfigSchema>
export type VectorizerConfig = z.infer<typeof vectorizerConfigSchema>
export type ScoringConfig = z.infer<typeof scoringConfigSchema>
export type LoaderConfig = z.infer<typeof loaderConfigSchema>
export type OutputConfig = z.infer<typeof outputConfigSchema>
export type Config = z.infer<typeof configSchema>
