import { z } from 'zod'

/** https://ddragon.leagueoflegends.com/api/versions.json */
export const VersionListSchema = z.array(z.string())

/** https://ddragon.leagueoflegends.com/cdn/languages.json */
export const LanguageListSchema = z.array(z.string())

export const ChampionImageSchema = z.object({
  full: z.string(),
  sprite: z.string(),
  group: z.string(),
  x: z.number(),
  y: z.number(),
  w: z.number(),
  h: z.number(),
})

export const ChampionRatingsSchema = z.object({
  attack: z.number(),
  defense: z.number(),
  magic: z.number(),
  difficulty: z.number(),
})

/**
 * champion.json の data 配下の 1 体分
 * key は数値 ID の文字列表記（"266"）、id は画像パスに使う名前（"Aatrox"）
 */
export const ShortChampionSchema = z.object({
  version: z.string(),
  id: z.string(),
  key: z.string(),
  name: z.string(),
  title: z.string(),
  blurb: z.string().default(''),
  info: ChampionRatingsSchema.optional(),
  image: ChampionImageSchema.optional(),
  tags: z.array(z.string()).default([]),
  partype: z.string().default(''),
  stats: z.record(z.number()).default({}),
})

export type ShortChampion = z.infer<typeof ShortChampionSchema>

/** https://ddragon.leagueoflegends.com/cdn/{version}/data/{language}/champion.json */
export const ChampionListSchema = z.object({
  type: z.string().optional(),
  format: z.string().optional(),
  version: z.string(),
  data: z.record(ShortChampionSchema),
})

export type ChampionList = z.infer<typeof ChampionListSchema>

export const QueueSchema = z.object({
  queueId: z.number(),
  map: z.string(),
  description: z.string().nullable(),
  notes: z.string().nullable().optional(),
})

export type Queue = z.infer<typeof QueueSchema>

/** https://static.developer.riotgames.com/docs/lol/queues.json */
export const QueueListSchema = z.array(QueueSchema)

// ─── 個別チャンピオン ───────────────────────────────────

export const ChampionSkinSchema = z.object({
  id: z.string(),
  num: z.number(),
  name: z.string(),
  chromas: z.boolean().default(false),
})

export const ChampionSpellSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  tooltip: z.string().default(''),
  leveltip: z
    .object({
      label: z.array(z.string()),
      effect: z.array(z.string()),
    })
    .optional(),
  maxrank: z.number(),
  cooldown: z.array(z.number()),
  cooldownBurn: z.string().default(''),
  cost: z.array(z.number()),
  costBurn: z.string().default(''),
  costType: z.string().default(''),
  maxammo: z.string().default(''),
  range: z.array(z.number()),
  rangeBurn: z.string().default(''),
  image: ChampionImageSchema,
  resource: z.string().optional(),
})

export type ChampionSpell = z.infer<typeof ChampionSpellSchema>

export const ChampionPassiveSchema = z.object({
  name: z.string(),
  description: z.string(),
  image: ChampionImageSchema,
})

/** champion/{id}.json の 1 体分。champion.json の項目にスキン・スキル・パッシブなどが加わる */
export const ChampionDetailSchema = ShortChampionSchema.extend({
  lore: z.string().default(''),
  allytips: z.array(z.string()).default([]),
  enemytips: z.array(z.string()).default([]),
  skins: z.array(ChampionSkinSchema),
  spells: z.array(ChampionSpellSchema),
  passive: ChampionPassiveSchema,
})

export type ChampionDetail = z.infer<typeof ChampionDetailSchema>

/** https://ddragon.leagueoflegends.com/cdn/{version}/data/{language}/champion/{id}.json */
export const ChampionDetailListSchema = z.object({
  type: z.string().optional(),
  format: z.string().optional(),
  version: z.string(),
  data: z.record(ChampionDetailSchema),
})
