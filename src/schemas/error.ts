import { z } from 'zod'

/**
 * Riot API のエラーボディ
 * {"status":{"message":"Data not found","status_code":404}}
 *
 * 一部のゲートウェイはトップレベルに message だけを返すため、両方を許容する。
 */
export const RiotErrorBodySchema = z.object({
  status: z
    .object({
      message: z.string().optional(),
      status_code: z.number().optional(),
    })
    .optional(),
  message: z.string().optional(),
})

export type RiotErrorBody = z.infer<typeof RiotErrorBodySchema>
