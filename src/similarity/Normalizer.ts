/**
 * 文本清洗与词过滤
 */

// 非空白、非字母数字、非汉字的字符（标点、符号、表情等）
const NON_TEXT_CHARS = /[^\p{L}\p{N}_\s\u4e00-\u9fff]/gu
const DIGIT_RUNS = /\p{Nd}+/gu
const WHITESPACE_RUNS = /\s+/g

export interface NormalizerOptions {
  stopWords: ReadonlySet<string>
  /** 短于该长度（按字符计）的词被丢弃，默认 2 */
  minTokenLength?: number
}

export class Normalizer {
  private readonly stopWords: ReadonlySet<string>
  private readonly minTokenLength: number

  constructor({ stopWords, minTokenLength = 2 }: NormalizerOptions) {
    this.stopWords = stopWords
    this.minTokenLength = minTokenLength
  }

  /**
   * 去除标点、符号和数字，合并空白并去掉首尾空白
   */
  clean(text: string): string {
    return text
      .replace(NON_TEXT_CHARS, '')
      .replace(DIGIT_RUNS, '')
      .replace(WHITESPACE_RUNS, ' ')
      .trim()
  }

  /**
   * 过滤空白词、过短的词和停用词，保持原有顺序
   */
  filter(tokens: Iterable<string>): string[] {
    const kept: string[] = []
    for (const token of tokens) {
      if (token.trim().length === 0) continue
      if (Array.from(token).length < this.minTokenLength) continue
      if (this.stopWords.has(token)) continue
      kept.push(token)
    }
    return kept
  }
}
