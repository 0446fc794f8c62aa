import { z } from 'zod'

export const MiniSeriesDtoSchema = z.object({
  losses: z.number(),
  progress: z.string(),
  target: z.number(),
  wins: z.number(),
})

export type MiniSeriesDto = z.infer<typeof MiniSeriesDtoSchema>

/**
 * ティアとランクを短縮表記にする（DIAMOND + IV → D4、GRANDMASTER + I → GM1）。
 * どちらかが欠けていれば '??'。
 */
export function toShortRank(tier: string | undefined, rank: string | undefined): string {
  if (!tier || !rank) return '??'
  const head = tier.toUpperCase().startsWith('GR') ? 'GM' : tier.charAt(0).toUpperCase()
  const division = rank.toLowerCase() === 'iv' ? '4' : String(rank.length)
  return `${head}${division}`
}

/**
 * GET /lol/league/v4/entries/by-summoner/{encryptedSummonerId}
 * 未ランクのキューでは tier / rank / leagueId が返らない
 */
export const LeagueEntryDtoSchema = z
  .object({
    leagueId: z.string().optional(),
    summonerId: z.string().optional(),
    summonerName: z.string().optional(),
    puuid: z.string().optional(),
    queueType: z.string(),
    tier: z.string().optional(),
    rank: z.string().optional(),
    leaguePoints: z.number(),
    wins: z.number(),
    losses: z.number(),
    hotStreak: z.boolean(),
    veteran: z.boolean(),
    freshBlood: z.boolean(),
    inactive: z.boolean(),
    miniSeries: MiniSeriesDtoSchema.optional(),
  })
  .transform((entry) => ({ ...entry, short: toShortRank(entry.tier, entry.rank) }))

export type LeagueEntryDto = z.infer<typeof LeagueEntryDtoSchema>

export const LeagueEntryListSchema = z.array(LeagueEntryDtoSchema)

export const LeagueItemDtoSchema = z.object({
  summonerId: z.string().optional(),
  summonerName: z.string().optional(),
  puuid: z.string().optional(),
  leaguePoints: z.number(),
  rank: z.string(),
  wins: z.number(),
  losses: z.number(),
  veteran: z.boolean(),
  inactive: z.boolean(),
  freshBlood: z.boolean(),
  hotStreak: z.boolean(),
  miniSeries: MiniSeriesDtoSchema.optional(),
})

export type LeagueItemDto = z.infer<typeof LeagueItemDtoSchema>

/** GET /lol/league/v4/{challenger|grandmaster|master}leagues/by-queue/{queue} */
export const LeagueListDtoSchema = z.object({
  leagueId: z.string().optional(),
  tier: z.string(),
  queue: z.string(),
  name: z.string().optional(),
  entries: z.array(LeagueItemDtoSchema),
})

export type LeagueListDto = z.infer<typeof LeagueListDtoSchema>
