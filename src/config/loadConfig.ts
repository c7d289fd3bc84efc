import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'
import YAML from 'yaml'
import type { ZodError } from 'zod'
import { createLogger } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import { fromThrowable } from '../shared/result.js'
import { isSupportedEncoding } from '../types/document.js'
import { configSchema, type Config } from './schema.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = '.paper-check.yaml'

export interface LoadConfigOptions {
  /** 项目目录，默认 process.cwd() */
  cwd?: string
  /** 显式指定的配置文件，必须存在且合法 */
  configPath?: string
}

/**
 * 查找配置文件路径（全局 + 项目）
 * 全局配置为基底，项目配置覆盖其上
 */
function findConfigPaths(cwd?: string): { globalPath: string | null; projectPath: string | null } {
  const homePath = join(homedir(), CONFIG_FILENAME)
  const projectDir = cwd || process.cwd()
  const projectPath = join(projectDir, CONFIG_FILENAME)

  // 项目目录与 home 目录相同时，不重复加载
  const isHomeCwd = projectDir === homedir()

  return {
    globalPath: existsSync(homePath) ? homePath : null,
    projectPath: !isHomeCwd && existsSync(projectPath) ? projectPath : null,
  }
}

/**
 * 加载配置
 * 查找顺序：--config 指定文件 → ~/.paper-check.yaml + ./.paper-check.yaml → 默认配置
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const { cwd, configPath } = options

  if (configPath) {
    if (!existsSync(configPath)) throw AppError.configNotFound(configPath)
    const raw = await parseYamlFile(configPath)
    const result = configSchema.safeParse(raw)
    if (!result.success) {
      throw AppError.configInvalid(`${configPath}: ${formatIssues(result.error)}`)
    }
    return applyEnvOverrides(result.data)
  }

  const { globalPath, projectPath } = findConfigPaths(cwd)
  if (!globalPath && !projectPath) {
    return applyEnvOverrides(getDefaultConfig())
  }

  try {
    const globalRaw = globalPath ? await parseYamlFile(globalPath) : {}
    const projectRaw = projectPath ? await parseYamlFile(projectPath) : {}
    const merged = deepMergeConfig(globalRaw, projectRaw)

    const result = configSchema.safeParse(merged)
    if (!result.success) {
      logger.warn(`Config file format error, using defaults: ${formatIssues(result.error)}`)
      return applyEnvOverrides(getDefaultConfig())
    }
    return applyEnvOverrides(result.data)
  } catch (error) {
    if (!(error instanceof AppError) || error.code !== 'CONFIG_INVALID') throw error
    logger.warn(`${error.message}, using defaults`)
    return applyEnvOverrides(getDefaultConfig())
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * 解析 YAML 文件，空文件/纯注释文件返回空对象
 */
async function parseYamlFile(filePath: string): Promise<Record<string, unknown>> {
  const content = await readFile(filePath, 'utf-8')
  const parsed = fromThrowable((): unknown => YAML.parse(content))
  if (!parsed.ok) {
    throw AppError.configInvalid(`${filePath}: ${parsed.error.message}`)
  }
  if (parsed.value === null || parsed.value === undefined) return {}
  if (!isPlainObject(parsed.value)) {
    throw AppError.configInvalid(`${filePath}: 顶层必须是键值映射`)
  }
  return parsed.value
}

function formatIssues(error: ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

/**
 * 合并配置：项目字段覆盖全局字段，嵌套对象递归合并，数组整体替换
 */
function deepMergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...base }
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined || val === null) continue
    const current = result[key]
    result[key] = isPlainObject(val) && isPlainObject(current) ? deepMergeConfig(current, val) : val
  }
  return result
}

/**
 * 环境变量覆盖，在 schema 校验之后执行；非法值忽略并告警
 */
export function applyEnvOverrides(config: Config): Config {
  const env = process.env

  if (env.PCHECK_MAX_FEATURES) {
    const maxFeatures = Number(env.PCHECK_MAX_FEATURES)
    if (Number.isInteger(maxFeatures) && maxFeatures > 0) {
      config = { ...config, vectorizer: { ...config.vectorizer, maxFeatures } }
    } else {
      logger.warn(`Ignoring invalid PCHECK_MAX_FEATURES: ${env.PCHECK_MAX_FEATURES}`)
    }
  }

  if (env.PCHECK_ENCODINGS) {
    const names = env.PCHECK_ENCODINGS.split(',').map(name => name.trim().toLowerCase())
    const encodings = names.filter(isSupportedEncoding)
    if (encodings.length > 0 && encodings.length === names.length) {
      config = { ...config, loader: { ...config.loader, encodings } }
    } else {
      logger.warn(`Ignoring invalid PCHECK_ENCODINGS: ${env.PCHECK_ENCODINGS}`)
    }
  }

  return config
}

/**
 * 获取默认配置
 */
export function getDefaultConfig(): Config {
  return configSchema.parse({})
}
