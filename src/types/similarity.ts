/**
 * 相似度引擎类型
 */

/** 规范化后的词序列，保持原文顺序 */
export type TokenSequence = readonly string[]

/** 一次比较使用的词表（向量空间的坐标轴） */
export interface Vocabulary {
  /** 按向量下标排列的词 */
  readonly terms: readonly string[]
  /** 词 → 向量下标 */
  readonly index: ReadonlyMap<string, number>
}

/** 以词表下标索引的 TF-IDF 稠密向量 */
export type FeatureVector = readonly number[]

/** 同一词表上构建的一对向量 */
export interface VectorPair {
  readonly vocabulary: Vocabulary
  readonly vectors: readonly [FeatureVector, FeatureVector]
}

/** 引擎构造时注入的只读资源 */
export interface EngineResources {
  /** 停用词 */
  readonly stopWords: ReadonlySet<string>
  /** 学术词表，按给定顺序整体保留 */
  readonly lexicon: readonly string[]
  /** 通用分词词典 */
  readonly dictionary: readonly string[]
}

export interface EngineOptions extends EngineResources {
  /** 保留词的最小长度（按字符计） */
  readonly minTokenLength: number
  /** 词表上限 */
  readonly maxFeatures: number
  /** 相似度保留的小数位数 */
  readonly precision: number
}
