/**
 * native fetch によるトランスポート
 *
 * SDK 不使用。Node.js 20 の fetch / AbortSignal のみで通信する。
 */
import type { FetchTransportOptions, Transport, TransportRequest, TransportResponse } from './types.js'

const DEFAULT_TIMEOUT_MS = 10_000

interface CombinedSignal {
  readonly signal: AbortSignal
  /** 呼び出し側のシグナルに付けたリスナーを外す */
  readonly dispose: () => void
}

const noop = (): void => {}

/**
 * タイムアウト用シグナルと呼び出し側のシグナルを 1 つにまとめる。
 * どちらかが中断されたら、その reason で中断する。
 * 呼び出し側のシグナルは複数のリクエストで共有されうる。リクエストが終わったら dispose する。
 */
function combineSignals(timeoutMs: number, external?: AbortSignal): CombinedSignal {
  const timeout = AbortSignal.timeout(timeoutMs)
  if (!external) return { signal: timeout, dispose: noop }

  const controller = new AbortController()
  if (external.aborted) {
    controller.abort(external.reason)
    return { signal: controller.signal, dispose: noop }
  }

  const onExternalAbort = (): void => controller.abort(external.reason)
  const onTimeout = (): void => controller.abort(timeout.reason)
  external.addEventListener('abort', onExternalAbort, { once: true })
  timeout.addEventListener('abort', onTimeout, { once: true })

  return {
    signal: controller.signal,
    dispose: () => {
      external.removeEventListener('abort', onExternalAbort)
      timeout.removeEventListener('abort', onTimeout)
    },
  }
}

function collectHeaders(headers: Headers): Record<string, string> {
  const result: Record<string, string> = {}
  headers.forEach((value, key) => {
    result[key.toLowerCase()] = value
  })
  return result
}

/**
 * fetch ベースの Transport を生成する
 *
 * 2xx 以外でも reject せず、ステータスとボディをそのまま返す。
 * ネットワークエラー・タイムアウト・中断は fetch の reject をそのまま伝播する。
 */
export function createFetchTransport(options?: FetchTransportOptions): Transport {
  const timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS

  return {
    async send(request: TransportRequest): Promise<TransportResponse> {
      const { signal, dispose } = combineSignals(timeoutMs, request.signal)
      try {
        const response = await fetch(request.url, {
          method: request.method,
          headers: request.headers,
          signal,
        })

        return {
          status: response.status,
          body: await response.text(),
          headers: collectHeaders(response.headers),
        }
      } finally {
        dispose()
      }
    },
  }
}
