/**
 * checkPlagiarism tests
 * 文件读写、编码无关性与失败时的 0.00 兜底
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdirSync, readFileSync, writeFileSync, rmSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import iconv from 'iconv-lite'
import { AppError } from '../../shared/error.js'
import { getDefaultConfig } from '../../config/index.js'
import { createEngine } from '../../similarity/index.js'
import { checkPlagiarism } from '../checkPlagiarism.js'

const TEST_DIR = join(tmpdir(), `paper-check-check-${Date.now()}`)
const engine = createEngine(getDefaultConfig())

function paths(original: string, candidate: string, output = 'ans.txt') {
  return {
    originalPath: join(TEST_DIR, original),
    candidatePath: join(TEST_DIR, candidate),
    outputPath: join(TEST_DIR, output),
  }
}

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn()
  } catch (error) {
    return error instanceof AppError ? error.code : 'NOT_APP_ERROR'
  }
  return undefined
}

beforeEach(() => {
  mkdirSync(TEST_DIR, { recursive: true })
})

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true })
})

describe('checkPlagiarism', () => {
  it('should compute and write the similarity', () => {
    writeFileSync(join(TEST_DIR, 'orig.txt'), '原始论文内容。')
    writeFileSync(join(TEST_DIR, 'copy.txt'), '抄袭版论文内容。')
    const target = paths('orig.txt', 'copy.txt', 'result/ans.txt')

    expect(checkPlagiarism(target, engine)).toBe(0.7093)
    expect(readFileSync(target.outputPath, 'utf-8')).toBe('0.71')
  })

  it('should score the same content in different encodings as 1', () => {
    writeFileSync(join(TEST_DIR, 'utf8.txt'), '中文内容测试')
    writeFileSync(join(TEST_DIR, 'gbk.txt'), iconv.encode('中文内容测试', 'gbk'))
    const target = paths('utf8.txt', 'gbk.txt')

    expect(checkPlagiarism(target, engine)).toBe(1)
    expect(readFileSync(target.outputPath, 'utf-8')).toBe('1.00')
  })

  it('should score utf-8 against utf-16 with a BOM as 1', () => {
    writeFileSync(join(TEST_DIR, 'utf8.txt'), '中文内容测试')
    writeFileSync(join(TEST_DIR, 'utf16.txt'), iconv.encode('中文内容测试', 'utf-16le', { addBOM: true }))
    const target = paths('utf8.txt', 'utf16.txt')

    expect(checkPlagiarism(target, engine)).toBe(1)
    expect(readFileSync(target.outputPath, 'utf-8')).toBe('1.00')
  })

  it('should write 0.00 and throw when an input is missing', () => {
    writeFileSync(join(TEST_DIR, 'orig.txt'), '原始论文内容。')
    const target = paths('orig.txt', 'missing.txt')

    expect(errorCode(() => checkPlagiarism(target, engine))).toBe('DOC_NOT_FOUND')
    expect(readFileSync(target.outputPath, 'utf-8')).toBe('0.00')
  })

  it('should replace a stale result with 0.00 on failure', () => {
    const target = paths('missing.txt', 'also-missing.txt')
    writeFileSync(target.outputPath, '0.99')

    expect(errorCode(() => checkPlagiarism(target, engine))).toBe('DOC_NOT_FOUND')
    expect(readFileSync(target.outputPath, 'utf-8')).toBe('0.00')
  })

  it('should treat a zero-length file as empty content', () => {
    writeFileSync(join(TEST_DIR, 'orig.txt'), '原始论文内容。')
    writeFileSync(join(TEST_DIR, 'empty.txt'), '')
    const target = paths('orig.txt', 'empty.txt')

    expect(errorCode(() => checkPlagiarism(target, engine))).toBe('DOC_EMPTY')
    expect(readFileSync(target.outputPath, 'utf-8')).toBe('0.00')
  })

  it('should treat a line-break-only file as empty content', () => {
    writeFileSync(join(TEST_DIR, 'orig.txt'), '原始论文内容。')
    writeFileSync(join(TEST_DIR, 'blank.txt'), '\r\n')
    const target = paths('orig.txt', 'blank.txt')

    expect(errorCode(() => checkPlagiarism(target, engine))).toBe('DOC_EMPTY')
    expect(readFileSync(target.outputPath, 'utf-8')).toBe('0.00')
  })

  it('should report undecodable input', () => {
    writeFileSync(join(TEST_DIR, 'orig.txt'), Buffer.from([0xff]))
    writeFileSync(join(TEST_DIR, 'copy.txt'), '抄袭版论文内容。')
    const target = paths('orig.txt', 'copy.txt')

    expect(errorCode(() => checkPlagiarism(target, engine))).toBe('DOC_DECODE_FAILED')
    expect(readFileSync(target.outputPath, 'utf-8')).toBe('0.00')
  })

  it('should write 0 when the texts share no tokens', () => {
    writeFileSync(join(TEST_DIR, 'orig.txt'), '原始论文内容。')
    writeFileSync(join(TEST_DIR, 'copy.txt'), '！！！')
    const target = paths('orig.txt', 'copy.txt')

    expect(checkPlagiarism(target, engine)).toBe(0)
    expect(readFileSync(target.outputPath, 'utf-8')).toBe('0.00')
  })

  it('should honor custom decimals', () => {
    writeFileSync(join(TEST_DIR, 'orig.txt'), '原始论文内容。')
    writeFileSync(join(TEST_DIR, 'copy.txt'), '抄袭版论文内容。')
    const target = paths('orig.txt', 'copy.txt')

    checkPlagiarism(target, engine, { decimals: 4 })
    expect(readFileSync(target.outputPath, 'utf-8')).toBe('0.7093')
  })

  it('should create the fallback output in a missing directory', () => {
    const target = paths('orig.txt', 'copy.txt', 'nested/ans.txt')
    expect(errorCode(() => checkPlagiarism(target, engine))).toBe('DOC_NOT_FOUND')
    expect(existsSync(target.outputPath)).toBe(true)
  })
})
