/**
 * @entry Types 类型定义模块
 *
 * 按领域分组：
 * - similarity: TokenSequence/Vocabulary/FeatureVector/VectorPair/EngineOptions
 * - document: LoadedDocument/DocumentLoadError/SupportedEncoding/CheckPaths
 */

export type {
  TokenSequence,
  Vocabulary,
  FeatureVector,
  VectorPair,
  EngineResources,
  EngineOptions,
} from './similarity.js'

export {
  SUPPORTED_ENCODINGS,
  isSupportedEncoding,
  type SupportedEncoding,
  type LoadedDocument,
  type DocumentLoadError,
  type DocumentLoadErrorKind,
  type CheckPaths,
} from './document.js'
