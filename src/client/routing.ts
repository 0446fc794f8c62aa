/**
 * プラットフォーム（euw1 など）とリージョナルルーティング値（europe など）の対応
 *
 * summoner / league / mastery / spectator / status はプラットフォームのホスト、
 * account-v1 と match-v5 はリージョナルのホストに送る。
 */
export type RoutingValue = 'americas' | 'europe' | 'asia' | 'sea'

export const PLATFORM_ROUTING: Readonly<Record<string, RoutingValue>> = {
  na1: 'americas',
  br1: 'americas',
  la1: 'americas',
  la2: 'americas',
  euw1: 'europe',
  eun1: 'europe',
  tr1: 'europe',
  ru: 'europe',
  me1: 'europe',
  kr: 'asia',
  jp1: 'asia',
  oc1: 'sea',
  ph2: 'sea',
  sg2: 'sea',
  th2: 'sea',
  tw2: 'sea',
  vn2: 'sea',
}

export const ROUTING_VALUES: readonly RoutingValue[] = ['americas', 'europe', 'asia', 'sea']

export function isRoutingValue(value: string): value is RoutingValue {
  return ROUTING_VALUES.some((r) => r === value)
}

/** プラットフォームに対応するルーティング値。未知のプラットフォームは undefined */
export function routingForPlatform(platform: string): RoutingValue | undefined {
  const key = platform.toLowerCase()
  return Object.hasOwn(PLATFORM_ROUTING, key) ? PLATFORM_ROUTING[key] : undefined
}

/** https://{host}.api.riotgames.com */
export function apiHost(host: string): string {
  return `https://${host.toLowerCase()}.api.riotgames.com`
}

/**
 * パスとクエリから URL を組み立てる。undefined のクエリ値は省く。
 */
export function buildUrl(
  base: string,
  path: string,
  query?: Readonly<Record<string, string | number | undefined>>,
): string {
  if (!query) return `${base}${path}`
  const params = new URLSearchParams()
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) params.append(key, String(value))
  }
  const qs = params.toString()
  return qs === '' ? `${base}${path}` : `${base}${path}?${qs}`
}
