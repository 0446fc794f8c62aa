import { z } from 'zod'

/**
 * Summoner V4
 * id / accountId / name は Riot ID 移行後のレスポンスでは省略されることがある
 */
export const SummonerDtoSchema = z.object({
  id: z.string().optional(),
  accountId: z.string().optional(),
  puuid: z.string(),
  name: z.string().optional(),
  profileIconId: z.number(),
  revisionDate: z.number(),
  summonerLevel: z.number(),
})

export type SummonerDto = z.infer<typeof SummonerDtoSchema>
