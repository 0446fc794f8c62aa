import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { z } from 'zod'
import type { Result } from '../result.js'
import { ok, err, mapResult } from '../result.js'
import { routingForPlatform } from '../client/routing.js'
import type { RiotConfig, RiotConfigOverrides, LoaderError } from './types.js'

const CONFIG_FILE = 'config.json'
const DEFAULT_REGION = 'euw1'
const DEFAULT_TIMEOUT_MS = 10_000
const API_KEY_ENV = 'RIOT_API_KEY'

/** fs の reject 理由（code 付き） */
function isNodeError(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** マージ・環境変数置換後の設定の形 */
const ConfigFileSchema = z.object({
  apiKey: z.string().optional(),
  region: z.string().min(1).default(DEFAULT_REGION),
  routing: z.enum(['americas', 'europe', 'asia', 'sea']).optional(),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  debug: z.boolean().default(false),
})

type ConfigFile = z.infer<typeof ConfigFileSchema>

/**
 * config.json を 1 つ読む。ファイルがなければ {}。
 * JSON として壊れている、またはオブジェクトでなければ PARSE_ERROR。
 */
async function readJsonFile(
  filePath: string,
): Promise<Result<Record<string, unknown>, LoaderError>> {
  try {
    const content = await fs.readFile(filePath, 'utf-8')
    const parsed: unknown = JSON.parse(content)
    if (!isPlainObject(parsed)) {
      return err({
        code: 'PARSE_ERROR',
        message: `${CONFIG_FILE} must be a JSON object: ${filePath}`,
        path: filePath,
      })
    }
    return ok(parsed)
  } catch (e: unknown) {
    if (isNodeError(e) && e.code === 'ENOENT') {
      return ok({})
    }
    if (e instanceof SyntaxError) {
      return err({
        code: 'PARSE_ERROR',
        message: `Invalid JSON in ${filePath}: ${e.message}`,
        path: filePath,
      })
    }
    return err({
      code: 'IO_ERROR',
      message: `Failed to read ${filePath}: ${e instanceof Error ? e.message : 'unknown error'}`,
      path: filePath,
    })
  }
}

/** ローカルをグローバルに重ねる。ネストしたオブジェクトは再帰、配列と値は置き換え */
function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base }
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key]
    merged[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value
  }
  return merged
}

/** 文字列中の ${NAME} を環境変数で埋める。未設定の NAME はそのまま */
function substituteEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (match, name: string) => process.env[name] ?? match)
  }
  if (Array.isArray(value)) {
    return value.map(substituteEnvVars)
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, v]) => [key, substituteEnvVars(v)]))
  }
  return value
}

/** undefined の値を持つキーを取り除く */
function definedEntries(overrides: RiotConfigOverrides): Record<string, unknown> {
  return Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined))
}

/**
 * マージ済みの設定を検証する。apiKey がなければ環境変数 RIOT_API_KEY を使う。
 */
function validateConfig(value: unknown): Result<ConfigFile & { readonly apiKey: string }, LoaderError> {
  const parsed = ConfigFileSchema.safeParse(value)
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    return err({ code: 'VALIDATION_ERROR', message: `Invalid config: ${detail}` })
  }

  const config = parsed.data
  if (config.routing === undefined && routingForPlatform(config.region) === undefined) {
    return err({ code: 'VALIDATION_ERROR', message: `Unknown platform: ${config.region}` })
  }

  const apiKey = config.apiKey || process.env[API_KEY_ENV]
  if (!apiKey) {
    return err({
      code: 'VALIDATION_ERROR',
      message: `apiKey is required (set it in ${CONFIG_FILE} or ${API_KEY_ENV})`,
    })
  }
  return ok({ ...config, apiKey })
}

function toRiotConfig(config: ConfigFile & { readonly apiKey: string }): RiotConfig {
  return {
    apiKey: config.apiKey,
    region: config.region.toLowerCase(),
    ...(config.routing !== undefined ? { routing: config.routing } : {}),
    timeoutMs: config.timeoutMs,
    debug: config.debug,
  }
}

/**
 * 設定ファイルを読み込み、マージし、環境変数を置換して RiotConfig を返す。
 *
 * 優先順位: オーバーライド > ローカル config.json > グローバル config.json > デフォルト値
 */
export async function loadConfig(
  globalDir: string,
  localDir: string,
  overrides?: RiotConfigOverrides,
): Promise<Result<RiotConfig, LoaderError>> {
  const globalResult = await readJsonFile(path.join(globalDir, CONFIG_FILE))
  if (!globalResult.ok) {
    return globalResult
  }

  const localResult = await readJsonFile(path.join(localDir, CONFIG_FILE))
  if (!localResult.ok) {
    return localResult
  }

  let merged = deepMerge(globalResult.data, localResult.data)
  if (overrides) {
    merged = { ...merged, ...definedEntries(overrides) }
  }

  return mapResult(validateConfig(substituteEnvVars(merged)), toRiotConfig)
}
