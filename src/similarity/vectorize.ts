/**
 * TF-IDF 向量化
 *
 * 词表只由参与比较的两篇文档构成，不依赖外部语料。
 * idf(t) = ln((1 + n) / (1 + df(t))) + 1，n = 2：
 * 两篇都出现的词权重为 1，只在一篇中出现的词权重为 ln(1.5) + 1。
 */

import type { TokenSequence, Vocabulary, VectorPair, FeatureVector } from '../types/similarity.js'

const DOCUMENT_COUNT = 2

export interface VectorizeOptions {
  /** 词表上限，超出时按两篇文档中的总词频保留高频词 */
  maxFeatures: number
}

export function countTerms(tokens: TokenSequence): Map<string, number> {
  const counts = new Map<string, number>()
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1)
  }
  return counts
}

export function inverseDocumentFrequency(documentFrequency: number): number {
  return Math.log((1 + DOCUMENT_COUNT) / (1 + documentFrequency)) + 1
}

/**
 * 构建词表：总词频降序，同频按字符串顺序，截取前 maxFeatures 个
 */
export function buildVocabulary(
  countsA: ReadonlyMap<string, number>,
  countsB: ReadonlyMap<string, number>,
  maxFeatures: number
): Vocabulary {
  const totals = new Map<string, number>(countsA)
  for (const [term, count] of countsB) {
    totals.set(term, (totals.get(term) ?? 0) + count)
  }

  const terms = [...totals.entries()]
    .sort(([termA, countA], [termB, countB]) => {
      if (countA !== countB) return countB - countA
      return termA < termB ? -1 : termA > termB ? 1 : 0
    })
    .slice(0, maxFeatures)
    .map(([term]) => term)

  return {
    terms,
    index: new Map(terms.map((term, i) => [term, i])),
  }
}

function weigh(
  vocabulary: Vocabulary,
  counts: ReadonlyMap<string, number>,
  other: ReadonlyMap<string, number>
): FeatureVector {
  return vocabulary.terms.map(term => {
    const tf = counts.get(term) ?? 0
    if (tf === 0) return 0
    const df = other.has(term) ? 2 : 1
    return tf * inverseDocumentFrequency(df)
  })
}

/**
 * 将两篇文档的词序列转换为同一词表上的 TF-IDF 向量
 *
 * 空序列由调用方提前处理（直接得 0 分），这里视为调用错误。
 */
export function vectorize(
  tokensA: TokenSequence,
  tokensB: TokenSequence,
  { maxFeatures }: VectorizeOptions
): VectorPair {
  if (tokensA.length === 0 || tokensB.length === 0) {
    throw new Error('vectorize() requires two non-empty token sequences')
  }
  if (!Number.isInteger(maxFeatures) || maxFeatures < 1) {
    throw new Error(`maxFeatures must be a positive integer, got ${maxFeatures}`)
  }

  const countsA = countTerms(tokensA)
  const countsB = countTerms(tokensB)
  const vocabulary = buildVocabulary(countsA, countsB, maxFeatures)

  return {
    vocabulary,
    vectors: [weigh(vocabulary, countsA, countsB), weigh(vocabulary, countsB, countsA)],
  }
}
