/**
 * @entry Shared 公共基础设施模块
 *
 * 底层工具函数，无业务逻辑依赖
 *
 * 能力分组：
 * - Result<T,E>: 可预期失败的显式返回（ok/err/unwrap/mapErr/fromThrowable）
 * - AppError: 统一错误类型（toAppError/printError/assertNever）
 * - Logger: 日志系统（createLogger/setLogLevel/formatMessage/logError）
 * - 错误守卫: getErrorMessage/ensureError/getSystemErrorCode
 */

// Result 类型
export { type Result, type Ok, type Err, ok, err, unwrap, mapErr, fromThrowable } from './result.js'

// 错误类型
export {
  type ErrorCode,
  type ErrorCategory,
  AppError,
  toAppError,
  assertNever,
  printError,
} from './error.js'

// 日志
export {
  type LogLevel,
  type LogMode,
  type Logger,
  type ErrorContext,
  setLogLevel,
  getLogLevel,
  createLogger,
  formatMessage,
  logError,
} from './logger.js'

// 错误类型守卫与消息提取
export { getErrorMessage, ensureError, getSystemErrorCode } from './assertError.js'
