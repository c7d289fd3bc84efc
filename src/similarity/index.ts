/**
 * @entry Similarity 相似度引擎模块
 *
 * - Segmenter: 学术词表优先 + 双向最大匹配分词
 * - Normalizer: 清洗文本、过滤停用词和短词
 * - vectorize: 两篇文档的 TF-IDF 向量
 * - scoreSimilarity: 余弦相似度（截断、四舍五入）
 * - SimilarityEngine / createEngine: 组装以上步骤
 */

export { Segmenter, type SegmenterOptions } from './Segmenter.js'
export { Normalizer, type NormalizerOptions } from './Normalizer.js'
export {
  vectorize,
  buildVocabulary,
  countTerms,
  inverseDocumentFrequency,
  type VectorizeOptions,
} from './vectorize.js'
export {
  scoreSimilarity,
  cosineSimilarity,
  clamp,
  roundTo,
  DEFAULT_PRECISION,
} from './scoreSimilarity.js'
export { SimilarityEngine } from './SimilarityEngine.js'
export { createEngine } from './createEngine.js'
export {
  loadBundledResources,
  readWordList,
  parseWordList,
  DATA_DIR,
} from './loadResources.js'
