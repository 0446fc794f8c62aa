export const VERSION = '0.1.0' as const

// Result
export type { Result } from './result.js'
export { ok, err, mapResult } from './result.js'

// ApiResult
export type {
  ApiResult,
  ApiSuccess,
  ApiFailure,
  RiotApiError,
  RiotApiErrorKind,
  PayloadSpec,
} from './api/types.js'
export {
  DECODE_FAILURE_STATUS,
  TRANSPORT_FAILURE_STATUS,
  isSuccess,
  isFailure,
  success,
  failure,
} from './api/types.js'

// Normalizer
export {
  normalizeResponse,
  transportFailure,
  decodeFailure,
  defaultStatusMessage,
  isSuccessStatus,
} from './api/normalizer.js'
export type { Execution } from './api/execute.js'
export { execute } from './api/execute.js'

// Formatting
export type { FormatOptions } from './api/format.js'
export { formatResult } from './api/format.js'

// Transport
export type {
  HttpMethod,
  Transport,
  TransportRequest,
  TransportResponse,
  FetchTransportOptions,
} from './transport/types.js'
export { createFetchTransport } from './transport/fetch-transport.js'

// Client
export type {
  RiotClient,
  RiotClientOptions,
  RiotClientHandler,
  RiotRequestEvent,
  RiotResponseEvent,
  MatchIdsQuery,
  RankedQueue,
} from './client/types.js'
export { createRiotClient } from './client/riot-client.js'
export { createNoopHandler, createConsoleHandler } from './client/handler.js'
export type { RoutingValue } from './client/routing.js'
export { PLATFORM_ROUTING, ROUTING_VALUES, routingForPlatform, isRoutingValue } from './client/routing.js'

// Static data
export type { DataDragon, DataDragonOptions, ChampionImageType } from './static/data-dragon.js'
export { createDataDragon, DDRAGON_BASE_URL, QUEUES_URL, DEFAULT_LANGUAGE } from './static/data-dragon.js'
export { ChampionIndex, normalizeChampionName } from './static/champion-index.js'
export { QueueCatalog, shortQueueDescription } from './static/queue-catalog.js'

// Payload schemas and types
export * from './schemas/index.js'

// Config
export type { RiotConfig, RiotConfigOverrides, LoaderError, LoaderErrorCode } from './loader/types.js'
export { loadConfig } from './loader/config-loader.js'
