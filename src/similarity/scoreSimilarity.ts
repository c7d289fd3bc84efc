/**
 * 余弦相似度
 */

import type { FeatureVector } from '../types/similarity.js'

export const DEFAULT_PRECISION = 4

export function cosineSimilarity(a: FeatureVector, b: FeatureVector): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`)
  }

  let dot = 0
  let normA = 0
  let normB = 0
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0
    const y = b[i] ?? 0
    dot += x * y
    normA += x * x
    normB += y * y
  }

  // 零向量没有方向，定义为 0
  if (normA === 0 || normB === 0) return 0

  const similarity = dot / (Math.sqrt(normA) * Math.sqrt(normB))
  if (!Number.isFinite(similarity)) {
    throw new Error(`Non-finite similarity: ${similarity}`)
  }
  return similarity
}

export function clamp(value: number, min = 0, max = 1): number {
  return Math.min(max, Math.max(min, value))
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits
  return Math.round(value * factor) / factor
}

/**
 * 计算相似度：余弦值截断到 [0, 1] 并按精度四舍五入
 */
export function scoreSimilarity(
  a: FeatureVector,
  b: FeatureVector,
  precision: number = DEFAULT_PRECISION
): number {
  return roundTo(clamp(cosineSimilarity(a, b)), precision)
}
