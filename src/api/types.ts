import type { z } from 'zod'

/**
 * 失敗の分類
 *
 * - remote: API が 2xx 以外のステータスを返した
 * - decode: 2xx だがボディを期待する形にデコードできなかった
 * - transport: HTTP リクエスト自体が完了しなかった（接続失敗、タイムアウト、中断）
 */
export type RiotApiErrorKind = 'remote' | 'decode' | 'transport'

/** デコード失敗を表すステータスコード（実在の HTTP ステータスと重ならない） */
export const DECODE_FAILURE_STATUS = 0

/** トランスポート失敗を表すステータスコード */
export const TRANSPORT_FAILURE_STATUS = -1

/** API 呼び出しの失敗 */
export interface RiotApiError {
  readonly kind: RiotApiErrorKind
  readonly statusCode: number
  readonly message: string
  /** 429 の Retry-After ヘッダー（秒） */
  readonly retryAfter?: number
}

/** API 呼び出しの成功 */
export interface ApiSuccess<T> {
  readonly ok: true
  readonly data: T
  /** ペイロードの型名。formatResult の見出しに使う */
  readonly type: string
}

/** API 呼び出しの失敗 */
export interface ApiFailure {
  readonly ok: false
  readonly error: RiotApiError
}

/**
 * すべてのエンドポイントが返す結果型
 *
 * ok が true なら data、false なら error を持つ。
 * 呼び出し側は例外を catch する必要がない。
 */
export type ApiResult<T> = ApiSuccess<T> | ApiFailure

/**
 * デコード対象のペイロード定義
 *
 * type は表示用の型名、schema はレスポンスボディの検証・変換に使う。
 */
export interface PayloadSpec<T> {
  readonly type: string
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
}

export function isSuccess<T>(result: ApiResult<T>): result is ApiSuccess<T> {
  return result.ok
}

export function isFailure<T>(result: ApiResult<T>): result is ApiFailure {
  return !result.ok
}

/** ApiSuccess を生成する */
export function success<T>(type: string, data: T): ApiSuccess<T> {
  return { ok: true, data, type }
}

/** ApiFailure を生成する */
export function failure(error: RiotApiError): ApiFailure {
  return { ok: false, error }
}
