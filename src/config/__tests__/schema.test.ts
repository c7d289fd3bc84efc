/**
 * Config schema validation tests
 * Tests zod schemas for valid/invalid configuration
 */

import { describe, it, expect } from 'vitest'
import { configSchema, loaderConfigSchema, normalizerConfigSchema } from '../schema.js'

describe('configSchema', () => {
  it('should parse empty object with defaults', () => {
    const result = configSchema.parse({})
    expect(result.segmenter).toEqual({ extraLexicon: [], extraDictionary: [] })
    expect(result.normalizer).toEqual({ minTokenLength: 2, extraStopWords: [] })
    expect(result.vectorizer.maxFeatures).toBe(5000)
    expect(result.scoring.precision).toBe(4)
    expect(result.loader.encodings).toEqual(['utf-8', 'gbk', 'gb2312', 'utf-16'])
    expect(result.output.decimals).toBe(2)
  })

  it('should fill defaults inside partially given sections', () => {
    const result = configSchema.parse({ normalizer: { extraStopWords: ['例如'] } })
    expect(result.normalizer).toEqual({ minTokenLength: 2, extraStopWords: ['例如'] })
  })

  it('should reject a non-positive maxFeatures', () => {
    expect(configSchema.safeParse({ vectorizer: { maxFeatures: 0 } }).success).toBe(false)
    expect(configSchema.safeParse({ vectorizer: { maxFeatures: 1.5 } }).success).toBe(false)
  })

  it('should reject an out-of-range precision', () => {
    expect(configSchema.safeParse({ scoring: { precision: 11 } }).success).toBe(false)
    expect(configSchema.safeParse({ scoring: { precision: -1 } }).success).toBe(false)
  })
})

describe('normalizerConfigSchema', () => {
  it('should reject empty stop words', () => {
    expect(normalizerConfigSchema.safeParse({ extraStopWords: [''] }).success).toBe(false)
  })

  it('should accept single-character tokens when minTokenLength is 1', () => {
    expect(normalizerConfigSchema.parse({ minTokenLength: 1 }).minTokenLength).toBe(1)
  })
})

describe('loaderConfigSchema', () => {
  it('should keep the configured encoding order', () => {
    expect(loaderConfigSchema.parse({ encodings: ['gbk', 'utf-8'] }).encodings).toEqual(['gbk', 'utf-8'])
  })

  it('should reject unsupported encodings', () => {
    expect(loaderConfigSchema.safeParse({ encodings: ['latin1'] }).success).toBe(false)
  })

  it('should reject an empty encoding list', () => {
    expect(loaderConfigSchema.safeParse({ encodings: [] }).success).toBe(false)
  })
})
