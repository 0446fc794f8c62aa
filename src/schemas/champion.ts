import { z } from 'zod'

/** GET /lol/platform/v3/champion-rotations */
export const ChampionInfoSchema = z.object({
  maxNewPlayerLevel: z.number(),
  freeChampionIdsForNewPlayers: z.array(z.number()),
  freeChampionIds: z.array(z.number()),
})

export type ChampionInfo = z.infer<typeof ChampionInfoSchema>
