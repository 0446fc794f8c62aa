import type { Transport, TransportRequest, TransportResponse } from '../transport/types.js'
import { TRANSPORT_FAILURE_STATUS } from './types.js'
import type { ApiResult, PayloadSpec } from './types.js'
import { normalizeResponse, transportFailure } from './normalizer.js'

/** execute の戻り値。status は HTTP ステータス、届かなかった場合は TRANSPORT_FAILURE_STATUS */
export interface Execution<T> {
  readonly result: ApiResult<T>
  readonly status: number
}

/**
 * リクエストを送り、結果を ApiResult に変換する
 *
 * トランスポートの reject はここで transport エラーに変換する。
 */
export async function execute<T>(
  transport: Transport,
  request: TransportRequest,
  payload: PayloadSpec<T>,
): Promise<Execution<T>> {
  let response: TransportResponse
  try {
    response = await transport.send(request)
  } catch (e: unknown) {
    return { result: transportFailure(e), status: TRANSPORT_FAILURE_STATUS }
  }
  return { result: normalizeResponse(response, payload), status: response.status }
}
