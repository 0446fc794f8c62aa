/**
 * 共通 Result 型
 *
 * ライブラリ内で失敗しうる処理はすべてこの型で成功/失敗を返す。
 * 呼び出し側に例外を投げない。
 */
export type Result<T, E = string> =
  | { readonly ok: true; readonly data: T }
  | { readonly ok: false; readonly error: E }

/** 成功 Result を生成する */
export function ok<T>(data: T): Result<T, never> {
  return { ok: true, data }
}

/** 失敗 Result を生成する */
export function err<E = string>(error: E): Result<never, E> {
  return { ok: false, error }
}

/**
 * 成功時の値だけを変換する。失敗はそのまま素通しする。
 */
export function mapResult<T, U, E>(result: Result<T, E>, fn: (data: T) => U): Result<U, E> {
  return result.ok ? ok(fn(result.data)) : result
}
