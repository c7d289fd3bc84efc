/**
 * 内置词表加载
 *
 * data/ 下的文本文件：每行一个词，# 开头为注释，空行忽略。
 */

import { readFileSync } from 'fs'
import { join } from 'path'
import { fileURLToPath } from 'url'
import type { EngineResources } from '../types/similarity.js'

/** 与 src/、dist/ 同级的 data 目录 */
export const DATA_DIR = fileURLToPath(new URL('../../data/', import.meta.url))

export const STOP_WORDS_FILE = 'stopwords.txt'
export const LEXICON_FILE = 'academic-lexicon.txt'
export const DICTIONARY_FILE = 'dictionary.txt'

export function parseWordList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'))
}

export function readWordList(filePath: string): string[] {
  return parseWordList(readFileSync(filePath, 'utf-8'))
}

export function loadBundledResources(dataDir: string = DATA_DIR): EngineResources {
  return {
    stopWords: new Set(readWordList(join(dataDir, STOP_WORDS_FILE))),
    lexicon: readWordList(join(dataDir, LEXICON_FILE)),
    dictionary: readWordList(join(dataDir, DICTIONARY_FILE)),
  }
}
