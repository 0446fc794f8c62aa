import { z } from 'zod'

// ─── LOL-STATUS-V3 ──────────────────────────────────────

export const TranslationSchema = z.object({
  locale: z.string(),
  heading: z.string(),
  content: z.string(),
})

export const StatusMessageSchema = z.object({
  id: z.string(),
  author: z.string(),
  heading: z.string(),
  content: z.string(),
  severity: z.string(),
  created_at: z.string(),
  updated_at: z.string().optional(),
  translations: z.array(TranslationSchema).default([]),
})

export const IncidentSchema = z.object({
  id: z.number(),
  active: z.boolean(),
  created_at: z.string(),
  updates: z.array(StatusMessageSchema).default([]),
})

export const ServiceSchema = z.object({
  name: z.string(),
  slug: z.string(),
  status: z.string(),
  incidents: z.array(IncidentSchema).default([]),
})

/** GET /lol/status/v3/shard-data */
export const ShardStatusSchema = z.object({
  name: z.string(),
  slug: z.string(),
  locales: z.array(z.string()),
  hostname: z.string(),
  region_tag: z.string(),
  services: z.array(ServiceSchema),
})

export type ShardStatus = z.infer<typeof ShardStatusSchema>

// ─── LOL-STATUS-V4 ──────────────────────────────────────

export const ContentDtoSchema = z.object({
  locale: z.string(),
  content: z.string(),
})

export const UpdateDtoSchema = z.object({
  id: z.number(),
  author: z.string(),
  publish: z.boolean(),
  publish_locations: z.array(z.string()),
  translations: z.array(ContentDtoSchema),
  created_at: z.string(),
  updated_at: z.string().nullish(),
})

export const StatusDtoSchema = z.object({
  id: z.number(),
  maintenance_status: z.string().nullish(),
  incident_severity: z.string().nullish(),
  titles: z.array(ContentDtoSchema),
  updates: z.array(UpdateDtoSchema),
  created_at: z.string(),
  archive_at: z.string().nullish(),
  updated_at: z.string().nullish(),
  platforms: z.array(z.string()),
})

export type StatusDto = z.infer<typeof StatusDtoSchema>

/** GET /lol/status/v4/platform-data */
export const PlatformDataDtoSchema = z.object({
  id: z.string(),
  name: z.string(),
  locales: z.array(z.string()),
  maintenances: z.array(StatusDtoSchema),
  incidents: z.array(StatusDtoSchema),
})

export type PlatformDataDto = z.infer<typeof PlatformDataDtoSchema>
