/**
 * 相似度引擎
 *
 * 清洗 → 分词 → 过滤 → TF-IDF 向量化 → 余弦相似度。
 * 停用词、词表、词典都在构造时注入，引擎本身无共享可变状态。
 */

import { createLogger } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import type { EngineOptions, TokenSequence } from '../types/similarity.js'
import { Segmenter } from './Segmenter.js'
import { Normalizer } from './Normalizer.js'
import { vectorize } from './vectorize.js'
import { scoreSimilarity } from './scoreSimilarity.js'

const logger = createLogger('similarity')

export class SimilarityEngine {
  readonly segmenter: Segmenter
  readonly normalizer: Normalizer
  private readonly maxFeatures: number
  private readonly precision: number

  constructor(options: EngineOptions) {
    this.segmenter = new Segmenter({ dictionary: options.dictionary, lexicon: options.lexicon })
    this.normalizer = new Normalizer({
      stopWords: options.stopWords,
      minTokenLength: options.minTokenLength,
    })
    this.maxFeatures = options.maxFeatures
    this.precision = options.precision
  }

  /**
   * 文本预处理：清洗、分词、去停用词和单字词
   */
  tokenize(text: string): TokenSequence {
    if (text.trim().length === 0) return []
    const cleaned = this.normalizer.clean(text)
    return this.normalizer.filter(this.segmenter.segment(cleaned))
  }

  /**
   * 计算两段文本的相似度，结果在 [0, 1]
   *
   * 任一文本预处理后为空时直接返回 0。
   * 向量化或计算过程中的异常同样返回 0（记录 COMPUTATION_FAILED 警告），
   * 与"确实不相似"无法区分，见 DESIGN.md。
   */
  compare(text1: string, text2: string): number {
    const startedAt = performance.now()

    const tokens1 = this.tokenize(text1)
    const tokens2 = this.tokenize(text2)
    if (tokens1.length === 0 || tokens2.length === 0) {
      logger.debug('No comparable tokens, similarity is 0')
      return 0
    }

    try {
      const { vocabulary, vectors } = vectorize(tokens1, tokens2, { maxFeatures: this.maxFeatures })
      const similarity = scoreSimilarity(vectors[0], vectors[1], this.precision)

      const elapsed = (performance.now() - startedAt) / 1000
      logger.debug(
        `相似度计算完成，耗时: ${elapsed.toFixed(3)}秒 (词表 ${vocabulary.terms.length} 个词)`
      )
      return similarity
    } catch (error) {
      const appError = AppError.computation(error)
      logger.warn(`${appError.message} [${appError.code}]`)
      return 0
    }
  }
}
