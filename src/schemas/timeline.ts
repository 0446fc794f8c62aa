import { z } from 'zod'
import { MetadataDtoSchema } from './match.js'

export const PositionDtoSchema = z.object({
  x: z.number(),
  y: z.number(),
})

/**
 * タイムラインのイベント
 *
 * type ごとに付随するフィールドが異なるため、timestamp と type 以外は任意。
 */
export const EventDtoSchema = z.object({
  timestamp: z.number(),
  type: z.string(),
  participantId: z.number().optional(),
  killerId: z.number().optional(),
  victimId: z.number().optional(),
  assistingParticipantIds: z.array(z.number()).optional(),
  creatorId: z.number().optional(),
  itemId: z.number().optional(),
  skillSlot: z.number().optional(),
  levelUpType: z.string().optional(),
  wardType: z.string().optional(),
  teamId: z.number().optional(),
  buildingType: z.string().optional(),
  laneType: z.string().optional(),
  towerType: z.string().optional(),
  monsterType: z.string().optional(),
  monsterSubType: z.string().optional(),
  position: PositionDtoSchema.optional(),
})

export const ParticipantFrameDtoSchema = z.object({
  participantId: z.number(),
  currentGold: z.number(),
  totalGold: z.number(),
  goldPerSecond: z.number().default(0),
  level: z.number(),
  xp: z.number(),
  minionsKilled: z.number(),
  jungleMinionsKilled: z.number(),
  timeEnemySpentControlled: z.number().default(0),
  position: PositionDtoSchema.optional(),
  championStats: z.record(z.number()).optional(),
  damageStats: z.record(z.number()).optional(),
})

export const FrameDtoSchema = z.object({
  timestamp: z.number(),
  events: z.array(EventDtoSchema),
  participantFrames: z.record(ParticipantFrameDtoSchema),
})

export const TimelineParticipantDtoSchema = z.object({
  participantId: z.number(),
  puuid: z.string(),
})

export const TimelineInfoDtoSchema = z.object({
  frameInterval: z.number(),
  frames: z.array(FrameDtoSchema),
  gameId: z.number().optional(),
  participants: z.array(TimelineParticipantDtoSchema).default([]),
})

/** GET /lol/match/v5/matches/{matchId}/timeline */
export const MatchTimelineDtoSchema = z.object({
  metadata: MetadataDtoSchema,
  info: TimelineInfoDtoSchema,
})

export type MatchTimelineDto = z.infer<typeof MatchTimelineDtoSchema>
