import type { RoutingValue } from '../client/routing.js'

/**
 * Riot クライアント設定
 *
 * region はプラットフォーム値（euw1, na1, kr ...）。
 * routing を省略するとプラットフォームから導出する。
 */
export interface RiotConfig {
  readonly apiKey: string
  readonly region: string
  readonly routing?: RoutingValue
  /** リクエストごとのタイムアウト（ミリ秒） */
  readonly timeoutMs?: number
  /** true なら各レスポンスの `<status> <url>` を stderr に出す */
  readonly debug?: boolean
}

/** loadConfig に渡す上書き値（CLI 引数やテストから） */
export type RiotConfigOverrides = Partial<RiotConfig>

/** Loader エラーコード */
export type LoaderErrorCode = 'PARSE_ERROR' | 'VALIDATION_ERROR' | 'IO_ERROR'

/** Loader エラー */
export interface LoaderError {
  readonly code: LoaderErrorCode
  readonly message: string
  readonly path?: string
}
