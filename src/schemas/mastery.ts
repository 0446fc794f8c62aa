import { z } from 'zod'

export const ChampionMasteryDtoSchema = z.object({
  championId: z.number(),
  championLevel: z.number(),
  championPoints: z.number(),
  lastPlayTime: z.number(),
  championPointsSinceLastLevel: z.number(),
  championPointsUntilNextLevel: z.number(),
  chestGranted: z.boolean().default(false),
  tokensEarned: z.number().default(0),
  summonerId: z.string().optional(),
  puuid: z.string().optional(),
})

export type ChampionMasteryDto = z.infer<typeof ChampionMasteryDtoSchema>

export const ChampionMasteryListSchema = z.array(ChampionMasteryDtoSchema)

/** GET /lol/champion-mastery/v4/scores/by-summoner/{id} は数値をそのまま返す */
export const MasteryScoreSchema = z.number().int()
