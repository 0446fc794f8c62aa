import type { ChampionList, ShortChampion } from '../schemas/ddragon.js'
import { closestMatch } from './fuzzy.js'

/**
 * 名前比較用の正規化。大文字小文字・空白・記号を無視する（"Kai'Sa" → "kaisa"）
 */
export function normalizeChampionName(name: string): string {
  return name.toLowerCase().replace(/[^\p{L}\p{N}]/gu, '')
}

/**
 * champion.json から作るチャンピオン索引
 *
 * - byKey: 数値 ID（match や mastery の championId）
 * - byId: Data Dragon の ID（"MonkeyKing" など、画像パスに使う名前）
 * - search: 表示名か ID のゆるい一致。完全一致 → 一意に決まる前方一致 → もっとも近い名前の順に探す。
 *   前方一致が複数あるときは決めずに undefined
 */
export class ChampionIndex {
  private readonly champions: readonly ShortChampion[]
  private readonly byNumericKey: ReadonlyMap<number, ShortChampion>
  private readonly byDataId: ReadonlyMap<string, ShortChampion>
  private readonly byNormalizedName: ReadonlyMap<string, ShortChampion>

  constructor(list: ChampionList) {
    this.champions = Object.values(list.data).sort((a, b) => a.name.localeCompare(b.name))

    const numeric = new Map<number, ShortChampion>()
    const dataId = new Map<string, ShortChampion>()
    const normalized = new Map<string, ShortChampion>()
    for (const champion of this.champions) {
      numeric.set(Number(champion.key), champion)
      dataId.set(champion.id, champion)
      normalized.set(normalizeChampionName(champion.name), champion)
      if (!normalized.has(normalizeChampionName(champion.id))) {
        normalized.set(normalizeChampionName(champion.id), champion)
      }
    }
    this.byNumericKey = numeric
    this.byDataId = dataId
    this.byNormalizedName = normalized
  }

  get size(): number {
    return this.champions.length
  }

  /** 表示名順の全チャンピオン */
  all(): readonly ShortChampion[] {
    return this.champions
  }

  byKey(key: number): ShortChampion | undefined {
    return this.byNumericKey.get(key)
  }

  byId(id: string): ShortChampion | undefined {
    return this.byDataId.get(id)
  }

  search(name: string): ShortChampion | undefined {
    const needle = normalizeChampionName(name)
    if (needle === '') return undefined

    const exact = this.byNormalizedName.get(needle)
    if (exact) return exact

    const prefixed = new Set<ShortChampion>()
    for (const [normalized, champion] of this.byNormalizedName) {
      if (normalized.startsWith(needle)) prefixed.add(champion)
    }
    if (prefixed.size > 1) return undefined
    const [only] = prefixed
    if (only) return only

    // 打ち間違い（"Aatroxx" など）
    return closestMatch(name, this.champions, (champion) => [champion.name, champion.id])
  }
}
