import { z } from 'zod'

export const BannedChampionSchema = z.object({
  championId: z.number(),
  teamId: z.number(),
  pickTurn: z.number(),
})

export const ObserverSchema = z.object({
  encryptionKey: z.string(),
})

export const PerksSchema = z.object({
  perkIds: z.array(z.number()),
  perkStyle: z.number(),
  perkSubStyle: z.number(),
})

export const GameCustomizationObjectSchema = z.object({
  category: z.string(),
  content: z.string(),
})

export const CurrentGameParticipantSchema = z.object({
  championId: z.number(),
  teamId: z.number(),
  profileIconId: z.number(),
  bot: z.boolean().default(false),
  puuid: z.string().nullish(),
  riotId: z.string().optional(),
  summonerId: z.string().optional(),
  summonerName: z.string().optional(),
  spell1Id: z.number(),
  spell2Id: z.number(),
  perks: PerksSchema.optional(),
  gameCustomizationObjects: z.array(GameCustomizationObjectSchema).default([]),
})

/** GET /lol/spectator/v4/active-games/by-summoner/{encryptedSummonerId} */
export const CurrentGameInfoSchema = z.object({
  gameId: z.number(),
  gameType: z.string(),
  gameMode: z.string(),
  gameStartTime: z.number(),
  gameLength: z.number(),
  mapId: z.number(),
  platformId: z.string(),
  gameQueueConfigId: z.number().optional(),
  bannedChampions: z.array(BannedChampionSchema).default([]),
  observers: ObserverSchema,
  participants: z.array(CurrentGameParticipantSchema),
})

export type CurrentGameInfo = z.infer<typeof CurrentGameInfoSchema>

export const FeaturedGameParticipantSchema = z.object({
  teamId: z.number(),
  championId: z.number(),
  profileIconId: z.number(),
  spell1Id: z.number(),
  spell2Id: z.number(),
  bot: z.boolean().default(false),
  puuid: z.string().nullish(),
  riotId: z.string().optional(),
  summonerName: z.string().optional(),
})

export const FeaturedGameInfoSchema = z.object({
  gameId: z.number(),
  gameMode: z.string(),
  gameType: z.string(),
  gameLength: z.number(),
  mapId: z.number(),
  platformId: z.string(),
  gameQueueConfigId: z.number().optional(),
  bannedChampions: z.array(BannedChampionSchema).default([]),
  observers: ObserverSchema,
  participants: z.array(FeaturedGameParticipantSchema),
})

/** GET /lol/spectator/v4/featured-games */
export const FeaturedGamesSchema = z.object({
  gameList: z.array(FeaturedGameInfoSchema),
  clientRefreshInterval: z.number(),
})

export type FeaturedGames = z.infer<typeof FeaturedGamesSchema>
