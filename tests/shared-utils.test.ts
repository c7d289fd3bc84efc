/**
 * Shared 工具函数测试
 *
 * 覆盖:
 * - assertError: getErrorMessage, ensureError, getSystemErrorCode
 * - logger: 级别过滤、输出通道、logError 上下文
 */

import { describe, it, expect, afterEach, vi } from 'vitest'

// ============ assertError ============

import { getErrorMessage, ensureError, getSystemErrorCode } from '../src/shared/index.js'

describe('assertError utilities', () => {
  describe('getErrorMessage()', () => {
    it('should read message from Error', () => {
      expect(getErrorMessage(new Error('boom'))).toBe('boom')
    })

    it('should pass strings through', () => {
      expect(getErrorMessage('boom')).toBe('boom')
    })

    it('should stringify other values', () => {
      expect(getErrorMessage(404)).toBe('404')
      expect(getErrorMessage(null)).toBe('null')
    })
  })

  describe('ensureError()', () => {
    it('should keep Error instances', () => {
      const error = new TypeError('bad')
      expect(ensureError(error)).toBe(error)
    })

    it('should wrap other values', () => {
      expect(ensureError('bad').message).toBe('bad')
    })
  })

  describe('getSystemErrorCode()', () => {
    it('should read string codes', () => {
      expect(getSystemErrorCode(Object.assign(new Error('x'), { code: 'ENOENT' }))).toBe('ENOENT')
    })

    it('should ignore non-string codes and non-errors', () => {
      expect(getSystemErrorCode(Object.assign(new Error('x'), { code: 1 }))).toBeUndefined()
      expect(getSystemErrorCode(new Error('x'))).toBeUndefined()
      expect(getSystemErrorCode({ code: 'ENOENT' })).toBeUndefined()
    })
  })
})

// ============ logger ============

import { createLogger, formatMessage, getLogLevel, logError, setLogLevel } from '../src/shared/index.js'

describe('logger', () => {
  const initialLevel = getLogLevel()

  afterEach(() => {
    setLogLevel(initialLevel)
    vi.restoreAllMocks()
  })

  it('should drop messages below the current level', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    setLogLevel('warn')

    const logger = createLogger('test')
    logger.debug('debug message')
    logger.info('info message')
    logger.warn('warn message')

    expect(error).not.toHaveBeenCalled()
    expect(warn).toHaveBeenCalledTimes(1)
  })

  it('should never write to stdout', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    setLogLevel('debug')

    const logger = createLogger('test')
    logger.debug('a')
    logger.info('b')
    logger.error('c')

    expect(log).not.toHaveBeenCalled()
  })

  it('should expose only the level methods', () => {
    expect(Object.keys(createLogger('test')).sort()).toEqual(['debug', 'error', 'info', 'warn'])
  })

  it('should include the scope in background mode only', () => {
    expect(formatMessage('info', 'similarity', 'hello', 'background')).toContain('[similarity]')
    expect(formatMessage('info', 'similarity', 'hello', 'foreground')).not.toContain('[similarity]')
    expect(formatMessage('warn', 'similarity', 'hello', 'foreground')).toContain('WRN')
  })

  it('should attach context to error logs', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    setLogLevel('error')

    logError(createLogger('output'), '写入输出文件错误', new Error('EACCES'), {
      path: 'out/ans.txt',
      code: undefined,
    })

    expect(error).toHaveBeenCalledTimes(1)
    expect(error.mock.calls[0]?.[0]).toContain('写入输出文件错误: EACCES')
    const data = error.mock.calls[0]?.[1]
    expect(data).toEqual(expect.objectContaining({ path: 'out/ans.txt' }))
    expect(data).not.toHaveProperty('code')
  })
})
