/**
 * レスポンス正規化
 *
 * トランスポートの結果（ステータス・ボディ・ヘッダー）を必ず 1 つの ApiResult に変換する。
 * ここから例外が漏れることはない。ログ出力・リトライ・共有状態の更新も行わない。
 */
import type { ZodError } from 'zod'
import type { TransportResponse } from '../transport/types.js'
import { RiotErrorBodySchema } from '../schemas/error.js'
import {
  DECODE_FAILURE_STATUS,
  TRANSPORT_FAILURE_STATUS,
  failure,
  success,
} from './types.js'
import type { ApiFailure, ApiResult, PayloadSpec, RiotApiError } from './types.js'

// ─── ステータス別のデフォルトメッセージ ─────────────────

const STATUS_MESSAGES: Readonly<Record<number, string>> = {
  400: 'Bad request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not found',
  405: 'Method not allowed',
  415: 'Unsupported media type',
  429: 'Rate limit exceeded',
  500: 'Internal server error',
  502: 'Bad gateway',
  503: 'Service unavailable',
  504: 'Gateway timeout',
}

/**
 * ボディにメッセージがないときに使う説明文を返す
 */
export function defaultStatusMessage(status: number): string {
  const known = STATUS_MESSAGES[status]
  if (known !== undefined) return known
  if (status >= 400 && status < 500) return 'Client error'
  if (status >= 500 && status < 600) return 'Server error'
  return `Unexpected status ${String(status)}`
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300
}

// ─── エラー生成 ─────────────────────────────────────────

export function decodeFailure(message: string): ApiFailure {
  return failure({ kind: 'decode', statusCode: DECODE_FAILURE_STATUS, message })
}

function errorName(cause: unknown): string | undefined {
  if (typeof cause === 'object' && cause !== null && 'name' in cause && typeof cause.name === 'string') {
    return cause.name
  }
  return undefined
}

/**
 * トランスポート層の reject 理由を ApiFailure に変換する
 *
 * fetch の中断は AbortError、AbortSignal.timeout による中断は TimeoutError になる。
 */
export function transportFailure(cause: unknown): ApiFailure {
  let detail: string
  const name = errorName(cause)
  if (name === 'TimeoutError') {
    detail = 'request timed out'
  } else if (name === 'AbortError') {
    detail = 'request aborted'
  } else if (cause instanceof Error) {
    detail = cause.message
  } else {
    detail = String(cause)
  }
  return failure({
    kind: 'transport',
    statusCode: TRANSPORT_FAILURE_STATUS,
    message: `Transport failure: ${detail}`,
  })
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
      return `${path}: ${issue.message}`
    })
    .join('; ')
}

// ─── ボディ解析 ─────────────────────────────────────────

type JsonParse = { readonly ok: true; readonly value: unknown } | { readonly ok: false; readonly reason: string }

function parseJson(body: string): JsonParse {
  try {
    const value: unknown = JSON.parse(body)
    return { ok: true, value }
  } catch (e: unknown) {
    return { ok: false, reason: e instanceof Error ? e.message : String(e) }
  }
}

/**
 * エラーボディから API のメッセージを取り出す。
 * {"status":{"message":...}} を優先し、次にトップレベルの message を見る。
 */
function extractErrorMessage(body: string): string | undefined {
  if (body.trim() === '') return undefined
  const parsed = parseJson(body)
  if (!parsed.ok) return undefined

  const envelope = RiotErrorBodySchema.safeParse(parsed.value)
  if (!envelope.success) return undefined

  const candidates = [envelope.data.status?.message, envelope.data.message]
  return candidates.find((m): m is string => m !== undefined && m.trim() !== '')
}

/**
 * Retry-After ヘッダー（秒）を読む。名前は大文字小文字を区別しない。
 * HTTP-date 形式など数値でない値は無視する。
 */
function readRetryAfter(headers: Readonly<Record<string, string>>): number | undefined {
  const entry = Object.entries(headers).find(([name]) => name.toLowerCase() === 'retry-after')
  if (entry === undefined) return undefined
  const raw = entry[1].trim()
  if (!/^\d+$/.test(raw)) return undefined
  return Number(raw)
}

function remoteFailure(response: TransportResponse): ApiFailure {
  const message = extractErrorMessage(response.body) ?? defaultStatusMessage(response.status)
  const retryAfter = response.status === 429 ? readRetryAfter(response.headers) : undefined
  const error: RiotApiError = {
    kind: 'remote',
    statusCode: response.status,
    message,
    ...(retryAfter !== undefined ? { retryAfter } : {}),
  }
  return failure(error)
}

function decodeBody<T>(body: string, payload: PayloadSpec<T>): ApiResult<T> {
  const parsed = parseJson(body)
  if (!parsed.ok) {
    return decodeFailure(`Malformed JSON response: ${parsed.reason}`)
  }

  const validated = payload.schema.safeParse(parsed.value)
  if (!validated.success) {
    return decodeFailure(`Unexpected ${payload.type} payload: ${describeIssues(validated.error)}`)
  }

  return success(payload.type, validated.data)
}

// ─── 公開 API ───────────────────────────────────────────

/**
 * トランスポートのレスポンスを ApiResult に正規化する
 *
 * - 2xx: JSON をパースしてスキーマで検証する。失敗は decode エラー（statusCode 0）
 * - それ以外: remote エラー。statusCode は HTTP ステータス
 *
 * 結果の構築中に起きた予期しない例外も decode エラーに変換する。
 */
export function normalizeResponse<T>(response: TransportResponse, payload: PayloadSpec<T>): ApiResult<T> {
  try {
    if (!isSuccessStatus(response.status)) {
      return remoteFailure(response)
    }
    return decodeBody(response.body, payload)
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e)
    return decodeFailure(`Failed to build ${payload.type} result: ${message}`)
  }
}
