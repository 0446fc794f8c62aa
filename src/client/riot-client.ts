/**
 * Riot API クライアント
 *
 * エンドポイントごとにリクエストを組み立て、トランスポートに渡し、
 * 結果を ApiResult に変換して返す。
 */
import { ok, err } from '../result.js'
import type { Result } from '../result.js'
import { failure, success } from '../api/types.js'
import type { ApiResult, PayloadSpec } from '../api/types.js'
import { execute } from '../api/execute.js'
import { createFetchTransport } from '../transport/fetch-transport.js'
import type { TransportRequest } from '../transport/types.js'
import { PAYLOADS } from '../schemas/index.js'
import type { LeagueEntryDto } from '../schemas/league.js'
import type { MatchDto } from '../schemas/match.js'
import type { RiotConfig } from '../loader/types.js'
import { apiHost, buildUrl, routingForPlatform } from './routing.js'
import { createConsoleHandler, createNoopHandler, notifyRequest, notifyResponse } from './handler.js'
import type { MatchIdsQuery, RankedQueue, RiotClient, RiotClientOptions } from './types.js'

const DEFAULT_MATCH_COUNT = 20
const DEFAULT_RANKED_QUEUE: RankedQueue = 'RANKED_SOLO_5x5'
const LEAGUE_ENTRY_TYPE = 'LeagueEntryDto'

/** リクエスト先ホストの種類 */
type HostKind = 'platform' | 'regional'

type Query = Readonly<Record<string, string | number | undefined>>

const enc = encodeURIComponent

/**
 * queueType に keyword を含む最初のエントリを探す（大文字小文字は区別しない）
 */
function findLeague(entries: readonly LeagueEntryDto[], keyword: string): LeagueEntryDto | null {
  const needle = keyword.toLowerCase()
  return entries.find((entry) => entry.queueType.toLowerCase().includes(needle)) ?? null
}

/**
 * RiotClient を生成する
 *
 * apiKey が空、または region が未知のプラットフォームで routing も指定されていなければ err。
 */
export function createRiotClient(config: RiotConfig, options?: RiotClientOptions): Result<RiotClient> {
  if (!config.apiKey) {
    return err('Riot client requires an API key')
  }

  const routing = config.routing ?? routingForPlatform(config.region)
  if (routing === undefined) {
    return err(`Unknown platform: ${config.region}`)
  }

  const transport =
    options?.transport ??
    createFetchTransport(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : undefined)
  const handler = options?.handler ?? (config.debug ? createConsoleHandler() : createNoopHandler())
  const signal = options?.signal

  const hosts: Readonly<Record<HostKind, string>> = {
    platform: apiHost(config.region),
    regional: apiHost(routing),
  }

  const headers: Readonly<Record<string, string>> = {
    'X-Riot-Token': config.apiKey,
    Accept: 'application/json',
  }

  async function get<T>(
    payload: PayloadSpec<T>,
    host: HostKind,
    path: string,
    query?: Query,
  ): Promise<ApiResult<T>> {
    const url = buildUrl(hosts[host], path, query)
    const request: TransportRequest = {
      method: 'GET',
      url,
      headers,
      ...(signal ? { signal } : {}),
    }

    notifyRequest(handler, { method: request.method, url })
    const startedAt = Date.now()
    const { result, status } = await execute(transport, request, payload)
    notifyResponse(handler, {
      method: request.method,
      url,
      status,
      ok: result.ok,
      durationMs: Date.now() - startedAt,
    })
    return result
  }

  const client: RiotClient = {
    // ─── ACCOUNT-V1 ───

    getAccountByRiotId(gameName, tagLine) {
      return get(
        PAYLOADS.account,
        'regional',
        `/riot/account/v1/accounts/by-riot-id/${enc(gameName)}/${enc(tagLine)}`,
      )
    },

    getAccountByPuuid(puuid) {
      return get(PAYLOADS.account, 'regional', `/riot/account/v1/accounts/by-puuid/${enc(puuid)}`)
    },

    getActiveShard(game, puuid) {
      return get(
        PAYLOADS.activeShard,
        'regional',
        `/riot/account/v1/active-shards/by-game/${enc(game)}/by-puuid/${enc(puuid)}`,
      )
    },

    // ─── CHAMPION-MASTERY-V4 ───

    getChampionMasteries(summonerId) {
      return get(
        PAYLOADS.championMasteries,
        'platform',
        `/lol/champion-mastery/v4/champion-masteries/by-summoner/${enc(summonerId)}`,
      )
    },

    getChampionMastery(summonerId, championId) {
      return get(
        PAYLOADS.championMastery,
        'platform',
        `/lol/champion-mastery/v4/champion-masteries/by-summoner/${enc(summonerId)}/by-champion/${String(championId)}`,
      )
    },

    getMasteryScore(summonerId) {
      return get(
        PAYLOADS.masteryScore,
        'platform',
        `/lol/champion-mastery/v4/scores/by-summoner/${enc(summonerId)}`,
      )
    },

    // ─── CHAMPION-V3 ───

    getChampionRotation() {
      return get(PAYLOADS.championRotation, 'platform', '/lol/platform/v3/champion-rotations')
    },

    // ─── LEAGUE-V4 ───

    getLeagueEntries(summonerId) {
      return get(
        PAYLOADS.leagueEntries,
        'platform',
        `/lol/league/v4/entries/by-summoner/${enc(summonerId)}`,
      )
    },

    async getSoloLeague(summonerId) {
      const entries = await client.getLeagueEntries(summonerId)
      if (!entries.ok) return entries
      return success(LEAGUE_ENTRY_TYPE, findLeague(entries.data, 'SOLO'))
    },

    async getFlexLeague(summonerId) {
      const entries = await client.getLeagueEntries(summonerId)
      if (!entries.ok) return entries
      return success(LEAGUE_ENTRY_TYPE, findLeague(entries.data, 'FLEX'))
    },

    getChallengerLeague(queue = DEFAULT_RANKED_QUEUE) {
      return get(PAYLOADS.leagueList, 'platform', `/lol/league/v4/challengerleagues/by-queue/${enc(queue)}`)
    },

    getGrandmasterLeague(queue = DEFAULT_RANKED_QUEUE) {
      return get(
        PAYLOADS.leagueList,
        'platform',
        `/lol/league/v4/grandmasterleagues/by-queue/${enc(queue)}`,
      )
    },

    getMasterLeague(queue = DEFAULT_RANKED_QUEUE) {
      return get(PAYLOADS.leagueList, 'platform', `/lol/league/v4/masterleagues/by-queue/${enc(queue)}`)
    },

    // ─── LOL-STATUS ───

    getShardStatus() {
      return get(PAYLOADS.shardStatus, 'platform', '/lol/status/v3/shard-data')
    },

    getPlatformData() {
      return get(PAYLOADS.platformData, 'platform', '/lol/status/v4/platform-data')
    },

    // ─── MATCH-V5 ───

    getMatchIds(puuid, query?: MatchIdsQuery) {
      return get(PAYLOADS.matchIds, 'regional', `/lol/match/v5/matches/by-puuid/${enc(puuid)}/ids`, {
        start: query?.start ?? 0,
        count: query?.count ?? DEFAULT_MATCH_COUNT,
        queue: query?.queue,
        type: query?.type,
        startTime: query?.startTime,
        endTime: query?.endTime,
      })
    },

    getMatch(matchId) {
      return get(PAYLOADS.match, 'regional', `/lol/match/v5/matches/${enc(matchId)}`)
    },

    getMatchTimeline(matchId) {
      return get(PAYLOADS.matchTimeline, 'regional', `/lol/match/v5/matches/${enc(matchId)}/timeline`)
    },

    async getNthMatch(puuid, n = 0): Promise<ApiResult<MatchDto>> {
      const ids = await client.getMatchIds(puuid, { start: n, count: 1 })
      if (!ids.ok) return ids
      const [matchId] = ids.data
      if (matchId === undefined) {
        return failure({ kind: 'remote', statusCode: 404, message: `No match at index ${String(n)}` })
      }
      return client.getMatch(matchId)
    },

    getLastMatch(puuid) {
      return client.getNthMatch(puuid, 0)
    },

    // ─── SPECTATOR-V4 ───

    getActiveGame(summonerId) {
      return get(
        PAYLOADS.currentGame,
        'platform',
        `/lol/spectator/v4/active-games/by-summoner/${enc(summonerId)}`,
      )
    },

    getFeaturedGames() {
      return get(PAYLOADS.featuredGames, 'platform', '/lol/spectator/v4/featured-games')
    },

    // ─── SUMMONER-V4 ───

    getSummonerByAccountId(accountId) {
      return get(PAYLOADS.summoner, 'platform', `/lol/summoner/v4/summoners/by-account/${enc(accountId)}`)
    },

    getSummonerByName(summonerName) {
      return get(PAYLOADS.summoner, 'platform', `/lol/summoner/v4/summoners/by-name/${enc(summonerName)}`)
    },

    getSummonerByPuuid(puuid) {
      return get(PAYLOADS.summoner, 'platform', `/lol/summoner/v4/summoners/by-puuid/${enc(puuid)}`)
    },

    getSummonerById(summonerId) {
      return get(PAYLOADS.summoner, 'platform', `/lol/summoner/v4/summoners/${enc(summonerId)}`)
    },
  }

  return ok(client)
}
