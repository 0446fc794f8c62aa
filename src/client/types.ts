import type { ApiResult } from '../api/types.js'
import type { Transport } from '../transport/types.js'
import type { AccountDto, ActiveShardDto } from '../schemas/account.js'
import type { ChampionInfo } from '../schemas/champion.js'
import type { ChampionMasteryDto } from '../schemas/mastery.js'
import type { LeagueEntryDto, LeagueListDto } from '../schemas/league.js'
import type { MatchDto } from '../schemas/match.js'
import type { MatchTimelineDto } from '../schemas/timeline.js'
import type { CurrentGameInfo, FeaturedGames } from '../schemas/spectator.js'
import type { PlatformDataDto, ShardStatus } from '../schemas/status.js'
import type { SummonerDto } from '../schemas/summoner.js'

// ─── イベントハンドラ ───

/** リクエスト送信前のイベント */
export interface RiotRequestEvent {
  readonly method: string
  readonly url: string
}

/**
 * レスポンス受信後のイベント
 *
 * status は HTTP ステータス。接続できなかった場合は TRANSPORT_FAILURE_STATUS。
 */
export interface RiotResponseEvent extends RiotRequestEvent {
  readonly status: number
  readonly ok: boolean
  readonly durationMs: number
}

/** RiotClient イベントハンドラ */
export interface RiotClientHandler {
  readonly onRequest: (event: RiotRequestEvent) => void
  readonly onResponse: (event: RiotResponseEvent) => void
}

/** createRiotClient のオプション */
export interface RiotClientOptions {
  /** 省略時は fetch ベースのトランスポート */
  readonly transport?: Transport
  /** 省略時は config.debug に応じてコンソール出力か何もしないハンドラ */
  readonly handler?: RiotClientHandler
  /** すべてのリクエストに渡す中断シグナル */
  readonly signal?: AbortSignal
}

/** getMatchIds のクエリ */
export interface MatchIdsQuery {
  readonly start?: number
  readonly count?: number
  readonly queue?: number
  readonly type?: 'ranked' | 'normal' | 'tourney' | 'tutorial'
  /** エポック秒 */
  readonly startTime?: number
  /** エポック秒 */
  readonly endTime?: number
}

/** ランク順位表のキュー */
export type RankedQueue = 'RANKED_SOLO_5x5' | 'RANKED_FLEX_SR'

/**
 * Riot API クライアント
 *
 * すべてのメソッドは ApiResult を返し、例外を投げない。
 * 並列実行は呼び出し側の Promise.all に任せる（キューイングやスロットリングはしない）。
 */
export interface RiotClient {
  // ACCOUNT-V1
  getAccountByRiotId(gameName: string, tagLine: string): Promise<ApiResult<AccountDto>>
  getAccountByPuuid(puuid: string): Promise<ApiResult<AccountDto>>
  getActiveShard(game: string, puuid: string): Promise<ApiResult<ActiveShardDto>>

  // CHAMPION-MASTERY-V4
  getChampionMasteries(summonerId: string): Promise<ApiResult<readonly ChampionMasteryDto[]>>
  getChampionMastery(summonerId: string, championId: number): Promise<ApiResult<ChampionMasteryDto>>
  getMasteryScore(summonerId: string): Promise<ApiResult<number>>

  // CHAMPION-V3
  getChampionRotation(): Promise<ApiResult<ChampionInfo>>

  // LEAGUE-V4
  getLeagueEntries(summonerId: string): Promise<ApiResult<readonly LeagueEntryDto[]>>
  /** queueType に SOLO を含む最初のエントリ。なければ null */
  getSoloLeague(summonerId: string): Promise<ApiResult<LeagueEntryDto | null>>
  /** queueType に FLEX を含む最初のエントリ。なければ null */
  getFlexLeague(summonerId: string): Promise<ApiResult<LeagueEntryDto | null>>
  getChallengerLeague(queue?: RankedQueue): Promise<ApiResult<LeagueListDto>>
  getGrandmasterLeague(queue?: RankedQueue): Promise<ApiResult<LeagueListDto>>
  getMasterLeague(queue?: RankedQueue): Promise<ApiResult<LeagueListDto>>

  // LOL-STATUS
  getShardStatus(): Promise<ApiResult<ShardStatus>>
  getPlatformData(): Promise<ApiResult<PlatformDataDto>>

  // MATCH-V5
  getMatchIds(puuid: string, query?: MatchIdsQuery): Promise<ApiResult<readonly string[]>>
  getMatch(matchId: string): Promise<ApiResult<MatchDto>>
  getMatchTimeline(matchId: string): Promise<ApiResult<MatchTimelineDto>>
  /** 新しい順で n 番目（0 始まり）の試合 */
  getNthMatch(puuid: string, n?: number): Promise<ApiResult<MatchDto>>
  getLastMatch(puuid: string): Promise<ApiResult<MatchDto>>

  // SPECTATOR-V4
  getActiveGame(summonerId: string): Promise<ApiResult<CurrentGameInfo>>
  getFeaturedGames(): Promise<ApiResult<FeaturedGames>>

  // SUMMONER-V4
  getSummonerByAccountId(accountId: string): Promise<ApiResult<SummonerDto>>
  getSummonerByName(summonerName: string): Promise<ApiResult<SummonerDto>>
  getSummonerByPuuid(puuid: string): Promise<ApiResult<SummonerDto>>
  getSummonerById(summonerId: string): Promise<ApiResult<SummonerDto>>
}
