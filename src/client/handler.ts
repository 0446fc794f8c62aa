import type { RiotClientHandler, RiotRequestEvent, RiotResponseEvent } from './types.js'

/** 何もしないハンドラ */
export function createNoopHandler(): RiotClientHandler {
  const noop = (): void => {}
  return {
    onRequest: noop,
    onResponse: noop,
  }
}

/**
 * レスポンスごとに `<status> <url>` を stderr に書くハンドラ
 *
 * write を差し替えると出力先を変えられる（テスト用）。
 */
export function createConsoleHandler(
  write: (line: string) => void = (line) => console.error(line),
): RiotClientHandler {
  return {
    onRequest: (): void => {},
    onResponse: (event: RiotResponseEvent): void => {
      write(`${String(event.status)} ${event.url}`)
    },
  }
}

/**
 * ハンドラを呼び出す。ハンドラが投げた例外はクライアントの外に出さず stderr に書く。
 */
export function notifyRequest(handler: RiotClientHandler, event: RiotRequestEvent): void {
  try {
    handler.onRequest(event)
  } catch (e: unknown) {
    console.error(`RiotClientHandler.onRequest failed: ${e instanceof Error ? e.message : String(e)}`)
  }
}

export function notifyResponse(handler: RiotClientHandler, event: RiotResponseEvent): void {
  try {
    handler.onResponse(event)
  } catch (e: unknown) {
    console.error(`RiotClientHandler.onResponse failed: ${e instanceof Error ? e.message : String(e)}`)
  }
}
