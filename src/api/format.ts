import type { ApiResult } from './types.js'

/** formatResult のオプション */
export interface FormatOptions {
  /** インデント 1 段分の文字列。デフォルトは半角スペース 4 つ */
  readonly sep?: string
  /** 開始時のインデント段数 */
  readonly level?: number
}

const DEFAULT_SEP = '    '

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function block(open: string, lines: readonly string[], close: string, level: number, sep: string): string {
  if (lines.length === 0) return `${open}${close}`
  const inner = sep.repeat(level + 1)
  return `${open}\n${inner}${lines.join(`,\n${inner}`)}\n${sep.repeat(level)}${close}`
}

function fieldLines(obj: Record<string, unknown>, level: number, sep: string): string[] {
  return Object.entries(obj)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key} = ${formatValue(value, level + 1, sep)}`)
}

function formatValue(value: unknown, level: number, sep: string): string {
  if (Array.isArray(value)) {
    return block('[', value.map((item: unknown) => formatValue(item, level + 1, sep)), ']', level, sep)
  }
  if (isPlainObject(value)) {
    return block('{', fieldLines(value, level, sep), '}', level, sep)
  }
  if (value === null) return 'null'
  return String(value)
}

/**
 * ApiResult を人が読める文字列にする
 *
 * 成功時は `<type>(` に続けて各フィールドを `key = value` で 1 行ずつ、スキーマ順に並べる。
 * 失敗時は `RiotApiError(` に kind / statusCode / message を並べる。
 */
export function formatResult<T>(result: ApiResult<T>, options?: FormatOptions): string {
  const sep = options?.sep ?? DEFAULT_SEP
  const level = options?.level ?? 0

  if (!result.ok) {
    return block('RiotApiError(', fieldLines({ ...result.error }, level, sep), ')', level, sep)
  }

  const { data, type } = result
  if (isPlainObject(data)) {
    return block(`${type}(`, fieldLines(data, level, sep), ')', level, sep)
  }
  return `${type}(${formatValue(data, level, sep)})`
}
