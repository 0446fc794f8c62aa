import { z } from 'zod'

export const MetadataDtoSchema = z.object({
  dataVersion: z.string(),
  matchId: z.string(),
  participants: z.array(z.string()),
})

export type MetadataDto = z.infer<typeof MetadataDtoSchema>

// ─── Perks ──────────────────────────────────────────────

export const PerkStatsDtoSchema = z.object({
  defense: z.number(),
  flex: z.number(),
  offense: z.number(),
})

export const PerkStyleSelectionDtoSchema = z.object({
  perk: z.number(),
  var1: z.number(),
  var2: z.number(),
  var3: z.number(),
})

export const PerkStyleDtoSchema = z.object({
  description: z.string(),
  selections: z.array(PerkStyleSelectionDtoSchema),
  style: z.number(),
})

export const PerksDtoSchema = z.object({
  statPerks: PerkStatsDtoSchema,
  styles: z.array(PerkStyleDtoSchema),
})

// ─── Participant ────────────────────────────────────────

/**
 * 参加者の戦績
 *
 * 識別子と KDA・勝敗のみ必須。集計値は欠けていれば 0、文字列は ''。
 */
export const ParticipantDtoSchema = z.object({
  participantId: z.number(),
  puuid: z.string(),
  riotIdGameName: z.string().optional(),
  riotIdTagline: z.string().optional(),
  summonerId: z.string().optional(),
  summonerName: z.string().optional(),
  summonerLevel: z.number().default(0),
  profileIcon: z.number().default(0),
  teamId: z.number(),
  championId: z.number(),
  championName: z.string(),
  champLevel: z.number().default(0),
  champExperience: z.number().default(0),
  individualPosition: z.string().default(''),
  teamPosition: z.string().default(''),
  lane: z.string().default(''),
  role: z.string().default(''),
  kills: z.number(),
  deaths: z.number(),
  assists: z.number(),
  doubleKills: z.number().default(0),
  tripleKills: z.number().default(0),
  quadraKills: z.number().default(0),
  pentaKills: z.number().default(0),
  firstBloodKill: z.boolean().default(false),
  firstTowerKill: z.boolean().default(false),
  goldEarned: z.number().default(0),
  goldSpent: z.number().default(0),
  totalMinionsKilled: z.number().default(0),
  neutralMinionsKilled: z.number().default(0),
  totalDamageDealt: z.number().default(0),
  totalDamageDealtToChampions: z.number().default(0),
  totalDamageTaken: z.number().default(0),
  damageDealtToObjectives: z.number().default(0),
  visionScore: z.number().default(0),
  wardsPlaced: z.number().default(0),
  wardsKilled: z.number().default(0),
  item0: z.number().default(0),
  item1: z.number().default(0),
  item2: z.number().default(0),
  item3: z.number().default(0),
  item4: z.number().default(0),
  item5: z.number().default(0),
  item6: z.number().default(0),
  summoner1Id: z.number().default(0),
  summoner2Id: z.number().default(0),
  timePlayed: z.number().default(0),
  gameEndedInSurrender: z.boolean().default(false),
  gameEndedInEarlySurrender: z.boolean().default(false),
  perks: PerksDtoSchema.optional(),
  win: z.boolean(),
})

export type ParticipantDto = z.infer<typeof ParticipantDtoSchema>

// ─── Team ───────────────────────────────────────────────

export const BanDtoSchema = z.object({
  championId: z.number(),
  pickTurn: z.number(),
})

export const ObjectiveDtoSchema = z.object({
  first: z.boolean(),
  kills: z.number(),
})

export const ObjectivesDtoSchema = z.object({
  baron: ObjectiveDtoSchema,
  champion: ObjectiveDtoSchema,
  dragon: ObjectiveDtoSchema,
  inhibitor: ObjectiveDtoSchema,
  riftHerald: ObjectiveDtoSchema,
  tower: ObjectiveDtoSchema,
})

export const TeamDtoSchema = z.object({
  teamId: z.number(),
  win: z.boolean(),
  bans: z.array(BanDtoSchema).default([]),
  objectives: ObjectivesDtoSchema.optional(),
})

export type TeamDto = z.infer<typeof TeamDtoSchema>

// ─── Match ──────────────────────────────────────────────

/**
 * 試合情報
 *
 * 古い試合は gameEndTimestamp を持たない（または 0）ので gameStartTimestamp + gameDuration で補う。
 */
export const InfoDtoSchema = z
  .object({
    gameId: z.number(),
    gameCreation: z.number(),
    gameDuration: z.number(),
    gameStartTimestamp: z.number(),
    gameEndTimestamp: z.number().optional(),
    gameMode: z.string(),
    gameName: z.string().default(''),
    gameType: z.string(),
    gameVersion: z.string(),
    mapId: z.number(),
    platformId: z.string(),
    queueId: z.number(),
    tournamentCode: z.string().default(''),
    participants: z.array(ParticipantDtoSchema),
    teams: z.array(TeamDtoSchema),
  })
  .transform((info) => ({
    ...info,
    gameEndTimestamp: info.gameEndTimestamp || info.gameStartTimestamp + info.gameDuration,
  }))

export type InfoDto = z.infer<typeof InfoDtoSchema>

/** GET /lol/match/v5/matches/{matchId} */
export const MatchDtoSchema = z.object({
  metadata: MetadataDtoSchema,
  info: InfoDtoSchema,
})

export type MatchDto = z.infer<typeof MatchDtoSchema>

/** GET /lol/match/v5/matches/by-puuid/{puuid}/ids */
export const MatchIdsSchema = z.array(z.string())
