/**
 * Data Dragon（静的データ CDN）
 *
 * バージョン一覧・言語一覧・チャンピオン一覧・キュー定義を取得する。
 * API キーは不要。結果はキャッシュしない。
 */
import { failure, success } from '../api/types.js'
import type { ApiResult, PayloadSpec } from '../api/types.js'
import { decodeFailure } from '../api/normalizer.js'
import { execute } from '../api/execute.js'
import { createFetchTransport } from '../transport/fetch-transport.js'
import type { Transport } from '../transport/types.js'
import { PAYLOADS } from '../schemas/index.js'
import type { ChampionDetail } from '../schemas/ddragon.js'
import { ChampionIndex } from './champion-index.js'
import { closestMatch } from './fuzzy.js'
import { QueueCatalog } from './queue-catalog.js'

export const DDRAGON_BASE_URL = 'https://ddragon.leagueoflegends.com'
export const QUEUES_URL = 'https://static.developer.riotgames.com/docs/lol/queues.json'
export const DEFAULT_LANGUAGE = 'en_US'

/** チャンピオン画像の種類 */
export type ChampionImageType = 'splash' | 'loading' | 'centered'

export interface DataDragonOptions {
  readonly transport?: Transport
  readonly signal?: AbortSignal
  /** CDN のベース URL（ミラーを使う場合） */
  readonly baseUrl?: string
  readonly queuesUrl?: string
}

export interface DataDragon {
  /** 新しい順のバージョン一覧 */
  getVersions(): Promise<ApiResult<readonly string[]>>
  getLatestVersion(): Promise<ApiResult<string>>
  getLanguages(): Promise<ApiResult<readonly string[]>>
  /**
   * languages.json から言語コードを選ぶ。大文字小文字を無視した一致がなければ、もっとも近いもの
   * （"ja-jp" → "ja_JP"）
   */
  resolveLanguage(query: string): Promise<ApiResult<string>>
  getChampions(version: string, language?: string): Promise<ApiResult<ChampionIndex>>
  /**
   * スキン・スキル・パッシブを含む 1 体分の詳細。id は Data Dragon の ID（"MonkeyKing"）。
   * language を渡すと resolveLanguage で解決してから取得する。
   */
  getChampion(version: string, id: string, language?: string): Promise<ApiResult<ChampionDetail>>
  getQueues(): Promise<ApiResult<QueueCatalog>>
  profileIconUrl(version: string, iconId: number): string
  championImageUrl(championId: string, options?: { skin?: number; type?: ChampionImageType }): string
}

/** Data Dragon クライアントを生成する */
export function createDataDragon(options?: DataDragonOptions): DataDragon {
  const transport = options?.transport ?? createFetchTransport()
  const baseUrl = options?.baseUrl ?? DDRAGON_BASE_URL
  const queuesUrl = options?.queuesUrl ?? QUEUES_URL
  const signal = options?.signal

  async function get<T>(payload: PayloadSpec<T>, url: string): Promise<ApiResult<T>> {
    const { result } = await execute(
      transport,
      { method: 'GET', url, headers: { Accept: 'application/json' }, ...(signal ? { signal } : {}) },
      payload,
    )
    return result
  }

  const dragon: DataDragon = {
    getVersions() {
      return get(PAYLOADS.versions, `${baseUrl}/api/versions.json`)
    },

    async getLatestVersion() {
      const versions = await dragon.getVersions()
      if (!versions.ok) return versions
      const [latest] = versions.data
      if (latest === undefined) return decodeFailure('Version list is empty')
      return success('Version', latest)
    },

    getLanguages() {
      return get(PAYLOADS.languages, `${baseUrl}/cdn/languages.json`)
    },

    async resolveLanguage(query) {
      const languages = await dragon.getLanguages()
      if (!languages.ok) return languages

      const wanted = query.toLowerCase()
      const resolved =
        languages.data.find((language) => language.toLowerCase() === wanted) ??
        closestMatch(query, languages.data, (language) => [language])
      if (resolved === undefined) return decodeFailure(`No language matches ${query}`)
      return success('Language', resolved)
    },

    async getChampions(version, language = DEFAULT_LANGUAGE) {
      const list = await get(
        PAYLOADS.championList,
        `${baseUrl}/cdn/${encodeURIComponent(version)}/data/${encodeURIComponent(language)}/champion.json`,
      )
      if (!list.ok) return failure(list.error)
      return success('ChampionIndex', new ChampionIndex(list.data))
    },

    async getChampion(version, id, language) {
      let lang = DEFAULT_LANGUAGE
      if (language !== undefined) {
        const resolved = await dragon.resolveLanguage(language)
        if (!resolved.ok) return resolved
        lang = resolved.data
      }

      const detail = await get(
        PAYLOADS.championDetail,
        `${baseUrl}/cdn/${encodeURIComponent(version)}/data/${encodeURIComponent(lang)}/champion/${encodeURIComponent(id)}.json`,
      )
      if (!detail.ok) return detail
      const champion = Object.hasOwn(detail.data.data, id) ? detail.data.data[id] : undefined
      if (champion === undefined) return decodeFailure(`Champion ${id} is missing from the response`)
      return success('ChampionDetail', champion)
    },

    async getQueues() {
      const queues = await get(PAYLOADS.queues, queuesUrl)
      if (!queues.ok) return failure(queues.error)
      return success('QueueCatalog', new QueueCatalog(queues.data))
    },

    profileIconUrl(version, iconId) {
      return `${baseUrl}/cdn/${version}/img/profileicon/${String(iconId)}.png`
    },

    championImageUrl(championId, imageOptions) {
      const type = imageOptions?.type ?? 'splash'
      const skin = imageOptions?.skin ?? 0
      return `${baseUrl}/cdn/img/champion/${type}/${championId}_${String(skin)}.jpg`
    },
  }

  return dragon
}
