/**
 * 词典分词器
 *
 * 学术词表优先：原文中逐字出现的词表项整体输出，不参与通用切分；
 * 其余片段按字符类别拆分，汉字串用双向最大匹配切分。
 */

const IDEOGRAPH_START = /^[\u4e00-\u9fff]/

// 汉字串 | 空白 | 非汉字的字母数字串 | 其他单个字符
const RUN_PATTERN = /[\u4e00-\u9fff]+|\s+|(?:(?![\u4e00-\u9fff])[\p{L}\p{N}_])+|[^]/gu

export interface SegmenterOptions {
  /** 通用词典 */
  dictionary: readonly string[]
  /** 学术词表，整体保留；等长时靠前者优先 */
  lexicon?: readonly string[]
}

export class Segmenter {
  private readonly words: ReadonlySet<string>
  private readonly maxWordLength: number
  private readonly lexicon: readonly string[]

  constructor({ dictionary, lexicon = [] }: SegmenterOptions) {
    const entries = [...dictionary, ...lexicon].filter(word => word.length > 0)
    this.words = new Set(entries)
    this.maxWordLength = entries.reduce((max, word) => Math.max(max, word.length), 1)
    // sort 是稳定的，等长词保持传入顺序
    this.lexicon = lexicon.filter(term => term.length > 0).sort((a, b) => b.length - a.length)
  }

  /**
   * 切分文本，返回可重复遍历的惰性序列
   */
  segment(text: string): Iterable<string> {
    return {
      [Symbol.iterator]: () => this.tokens(text),
    }
  }

  private *tokens(text: string): Generator<string> {
    let gapStart = 0
    let i = 0
    while (i < text.length) {
      const term = this.matchLexicon(text, i)
      if (term === undefined) {
        i++
        continue
      }
      yield* this.segmentGap(text.slice(gapStart, i))
      yield term
      i += term.length
      gapStart = i
    }
    yield* this.segmentGap(text.slice(gapStart))
  }

  private matchLexicon(text: string, position: number): string | undefined {
    return this.lexicon.find(term => text.startsWith(term, position))
  }

  private *segmentGap(gap: string): Generator<string> {
    for (const [run] of gap.matchAll(RUN_PATTERN)) {
      if (IDEOGRAPH_START.test(run)) {
        yield* this.breakIdeographs(run)
      } else {
        yield run
      }
    }
  }

  /**
   * 双向最大匹配：词数少者优先，其次单字少者，仍相同取逆向结果
   */
  private breakIdeographs(run: string): string[] {
    const forward = this.forwardMaxMatch(run)
    const backward = this.backwardMaxMatch(run)

    if (forward.length !== backward.length) {
      return forward.length < backward.length ? forward : backward
    }
    if (forward.every((word, i) => word === backward[i])) return forward

    return countSingles(forward) < countSingles(backward) ? forward : backward
  }

  private forwardMaxMatch(run: string): string[] {
    const result: string[] = []
    let start = 0
    while (start < run.length) {
      let length = Math.min(this.maxWordLength, run.length - start)
      while (length > 1 && !this.words.has(run.slice(start, start + length))) length--
      result.push(run.slice(start, start + length))
      start += length
    }
    return result
  }

  private backwardMaxMatch(run: string): string[] {
    const result: string[] = []
    let end = run.length
    while (end > 0) {
      let length = Math.min(this.maxWordLength, end)
      while (length > 1 && !this.words.has(run.slice(end - length, end))) length--
      result.push(run.slice(end - length, end))
      end -= length
    }
    return result.reverse()
  }
}

function countSingles(words: readonly string[]): number {
  return words.filter(word => word.length === 1).length
}
