import { z } from 'zod'

/**
 * GET /riot/account/v1/accounts/by-riot-id/{gameName}/{tagLine}
 * GET /riot/account/v1/accounts/by-puuid/{puuid}
 */
export const AccountDtoSchema = z.object({
  puuid: z.string(),
  gameName: z.string().optional(),
  tagLine: z.string().optional(),
})

export type AccountDto = z.infer<typeof AccountDtoSchema>

/**
 * GET /riot/account/v1/active-shards/by-game/{game}/by-puuid/{puuid}
 */
export const ActiveShardDtoSchema = z.object({
  puuid: z.string(),
  game: z.string(),
  activeShard: z.string(),
})

export type ActiveShardDto = z.infer<typeof ActiveShardDtoSchema>
