import type { Queue } from '../schemas/ddragon.js'

const CUSTOM_DESCRIPTION = 'Custom'

/**
 * queues.json の説明文を試合一覧などで使う短い表記にする。
 * "5v5 Ranked Solo games" → "5v5 Ranked Solo"、null → "Custom"
 */
export function shortQueueDescription(description: string | null): string {
  if (!description) return CUSTOM_DESCRIPTION
  return description.replace('games', '').trim()
}

/** queueId → 説明文 */
export class QueueCatalog {
  private readonly descriptions: ReadonlyMap<number, string>

  constructor(queues: readonly Queue[]) {
    this.descriptions = new Map(queues.map((q) => [q.queueId, shortQueueDescription(q.description)]))
  }

  has(queueId: number): boolean {
    return this.descriptions.has(queueId)
  }

  /** 未知の queueId には queue 0（カスタム）の説明を返す */
  describe(queueId: number): string {
    return this.descriptions.get(queueId) ?? this.descriptions.get(0) ?? CUSTOM_DESCRIPTION
  }
}
