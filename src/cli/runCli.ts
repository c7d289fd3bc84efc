/**
 * 命令行主流程
 *
 *   pcheck <原文文件> <抄袭版论文文件> <答案文件>
 *
 * 返回退出码而不直接退出进程：0 成功，1 参数错误/文件错误/其他异常
 */

import { Command, CommanderError } from 'commander'
import { setLogLevel, createLogger } from '../shared/logger.js'
import { toAppError, type AppError } from '../shared/error.js'
import { loadConfig, type Config } from '../config/index.js'
import { createEngine, type SimilarityEngine } from '../similarity/index.js'
import { writeFallback } from '../document/index.js'
import { checkPlagiarism } from '../check/index.js'
import { success, error, info, hint, list, formatPercent } from './output.js'

const logger = createLogger('cli')

export const VERSION = '0.1.0'

const USAGE = 'pcheck <原文文件> <抄袭版论文文件> <答案文件>'
const EXAMPLE = 'pcheck orig.txt orig_add.txt ans.txt'

export interface CliOptions {
  verbose?: boolean
  config?: string
  json?: boolean
}

function reportFailure(appError: AppError): number {
  error(appError.isFileError ? `文件错误: ${appError.message}` : `发生错误: ${appError.message}`)
  if (appError.suggestion) hint(appError.suggestion)
  return 1
}

interface Prepared {
  config: Config
  engine: SimilarityEngine
}

async function prepare(options: CliOptions): Promise<Prepared> {
  const config = await loadConfig({ configPath: options.config })
  return { config, engine: createEngine(config) }
}

async function runCheck(paths: string[], options: CliOptions): Promise<number> {
  if (options.verbose) setLogLevel('debug')

  if (paths.length !== 3) {
    error('参数数量不正确')
    hint(`用法: ${USAGE}`)
    hint(`示例: ${EXAMPLE}`)
    return 1
  }

  const [originalPath, candidatePath, outputPath] = paths
  if (!originalPath || !candidatePath || !outputPath) {
    error('文件路径参数不能为空')
    return 1
  }

  let prepared: Prepared
  try {
    prepared = await prepare(options)
  } catch (err) {
    // 配置或词表加载失败时同样保证答案文件存在
    writeFallback(outputPath)
    return reportFailure(toAppError(err))
  }
  const { config, engine } = prepared

  if (!options.json) {
    info('开始论文查重...')
    list([
      { label: '原文文件', value: originalPath },
      { label: '抄袭版文件', value: candidatePath },
      { label: '输出文件', value: outputPath },
    ])
  }

  try {
    const similarity = checkPlagiarism(
      { originalPath, candidatePath, outputPath },
      engine,
      { encodings: config.loader.encodings, decimals: config.output.decimals }
    )

    if (options.json) {
      console.log(JSON.stringify({ similarity, output: outputPath }))
    } else {
      success(`查重完成！相似度: ${formatPercent(similarity)}`)
      info(`结果已保存到: ${outputPath}`)
    }
    return 0
  } catch (err) {
    logger.debug('Check failed', err)
    return reportFailure(toAppError(err))
  }
}

export function createProgram(onResult: (exitCode: number) => void): Command {
  return new Command()
    .name('pcheck')
    .description('论文查重 - 基于 TF-IDF 与余弦相似度')
    .version(VERSION)
    .argument('[paths...]', '原文文件、抄袭版论文文件、答案文件')
    .option('-c, --config <path>', '配置文件（默认: ./.paper-check.yaml）')
    .option('--json', '以 JSON 输出结果')
    .option('-v, --verbose', '显示详细日志 (debug 级别)')
    .action(async (paths: string[], options: CliOptions) => {
      onResult(await runCheck(paths, options))
    })
}

/**
 * 解析参数并执行，返回退出码
 */
export async function runCli(argv: string[] = process.argv): Promise<number> {
  let exitCode = 0
  const program = createProgram(code => {
    exitCode = code
  }).exitOverride()

  try {
    await program.parseAsync(argv)
  } catch (err) {
    // --help / --version / 未知选项
    if (err instanceof CommanderError) return err.exitCode
    throw err
  }
  return exitCode
}
