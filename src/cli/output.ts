/**
 * CLI 用户输出工具
 * 用于面向用户的终端输出，简洁友好，无时间戳
 *
 * 注意：这些函数仅用于终端用户交互，不用于诊断日志
 * 诊断日志请使用 shared/logger.ts
 */

import chalk from 'chalk'

/** 成功消息 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message)
}

/** 错误消息 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message)
}

/** 信息消息 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message)
}

/** 提示行（暗色、缩进） */
export function hint(message: string): void {
  console.error(chalk.gray(`  ${message}`))
}

export interface ListItem {
  label: string
  value: string | number | undefined
}

/** 输出键值对列表 */
export function list(items: ListItem[], indent = 2): void {
  const prefix = ' '.repeat(indent)
  const maxLabelLen = Math.max(...items.map(i => i.label.length))

  for (const item of items) {
    const label = chalk.gray(item.label.padEnd(maxLabelLen) + ':')
    console.log(`${prefix}${label} ${item.value ?? '-'}`)
  }
}

/** 相似度百分比，保留两位小数 */
export function formatPercent(similarity: number): string {
  return `${(similarity * 100).toFixed(2)}%`
}
