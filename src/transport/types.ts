/** HTTP メソッド（Riot API の参照系で使うもののみ） */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE'

/** トランスポートに渡すリクエスト記述 */
export interface TransportRequest {
  readonly method: HttpMethod
  readonly url: string
  readonly headers: Readonly<Record<string, string>>
  readonly signal?: AbortSignal
}

/**
 * トランスポートが返すレスポンス
 *
 * body は未パースの文字列。ヘッダー名は小文字に揃える。
 */
export interface TransportResponse {
  readonly status: number
  readonly body: string
  readonly headers: Readonly<Record<string, string>>
}

/**
 * HTTP トランスポートインターフェース
 *
 * 接続失敗・タイムアウト・中断時は reject する。
 * 2xx 以外のステータスは reject せずにそのまま返す。
 */
export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>
}

/** createFetchTransport のオプション */
export interface FetchTransportOptions {
  /** リクエストごとのタイムアウト（ミリ秒） */
  readonly timeoutMs?: number
}
