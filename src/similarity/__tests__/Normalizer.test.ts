import { describe, it, expect } from 'vitest'
import { Normalizer } from '../Normalizer.js'
import { loadBundledResources } from '../loadResources.js'

const { stopWords } = loadBundledResources()
const normalizer = new Normalizer({ stopWords })

describe('Normalizer.clean', () => {
  it('should strip punctuation and symbols', () => {
    expect(normalizer.clean('Hello! 你好！@#$%^&*()')).toBe('Hello 你好')
  })

  it('should strip digit runs and collapse whitespace', () => {
    expect(normalizer.clean('第3章 共12节，  总计\n\t2024年')).toBe('第章 共节 总计 年')
  })

  it('should keep letters, underscores and accented characters', () => {
    expect(normalizer.clean('snake_case café')).toBe('snake_case café')
  })

  it('should strip digits inside mixed terms', () => {
    expect(normalizer.clean('F1分数')).toBe('F分数')
  })

  it('should return empty string for blank or symbol-only input', () => {
    expect(normalizer.clean('')).toBe('')
    expect(normalizer.clean('  \n\t ')).toBe('')
    expect(normalizer.clean('。，！？…—')).toBe('')
  })
})

describe('Normalizer.filter', () => {
  it('should drop whitespace, single characters and stop words in order', () => {
    const tokens = ['机器学习', ' ', '的', 'a', '我们', 'ab', '  ', '测试']
    expect(normalizer.filter(tokens)).toEqual(['机器学习', 'ab', '测试'])
  })

  it('should count characters rather than UTF-16 units', () => {
    // 𠀀 是扩展区汉字，占两个 UTF-16 单元
    expect(normalizer.filter(['𠀀', '𠀀𠀁'])).toEqual(['𠀀𠀁'])
  })

  it('should honor a custom minimum token length', () => {
    const strict = new Normalizer({ stopWords: new Set(), minTokenLength: 3 })
    expect(strict.filter(['机器学习', '算法', 'abc'])).toEqual(['机器学习', 'abc'])
  })

  it('should accept any iterable', () => {
    function* tokens(): Generator<string> {
      yield '天气'
      yield '是'
      yield '晴朗'
    }
    expect(normalizer.filter(tokens())).toEqual(['天气', '晴朗'])
  })

  it('should return empty array for empty input', () => {
    expect(normalizer.filter([])).toEqual([])
  })
})
