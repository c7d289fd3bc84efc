import type { Config } from '../config/schema.js'
import type { EngineResources } from '../types/index.js'
import { SimilarityEngine } from './SimilarityEngine.js'
import { loadBundledResources } from './loadResources.js'

/**
 * 按配置创建引擎：内置词表 + 配置中追加的词
 */
export function createEngine(
  config: Config,
  resources: EngineResources = loadBundledResources()
): SimilarityEngine {
  const { segmenter, normalizer, vectorizer, scoring } = config

  return new SimilarityEngine({
    stopWords: new Set([...resources.stopWords, ...normalizer.extraStopWords]),
    lexicon: [...resources.lexicon, ...segmenter.extraLexicon],
    dictionary: [...resources.dictionary, ...segmenter.extraDictionary],
    minTokenLength: normalizer.minTokenLength,
    maxFeatures: vectorizer.maxFeatures,
    precision: scoring.precision,
  })
}
