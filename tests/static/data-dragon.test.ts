import { describe, it, expect, vi } from 'vitest'
import * as fs from 'node:fs'
import { createDataDragon } from '../../src/static/data-dragon.js'
import type { Transport, TransportRequest, TransportResponse } from '../../src/transport/types.js'

// ─── helpers ──────────────────────────────────────────────

const BASE = 'https://ddragon.leagueoflegends.com'

function text(status: number, body: string): TransportResponse {
  return { status, body, headers: {} }
}

function makeFakeTransport(routes: Record<string, TransportResponse>): {
  transport: Transport
  requests: TransportRequest[]
} {
  const requests: TransportRequest[] = []
  const transport: Transport = {
    send: vi.fn((request: TransportRequest) => {
      requests.push(request)
      return Promise.resolve(routes[request.url] ?? text(404, ''))
    }),
  }
  return { transport, requests }
}

function readFixture(name: string): string {
  return fs.readFileSync(new URL(`../fixtures/${name}`, import.meta.url), 'utf-8')
}

// ─── tests ────────────────────────────────────────────────

describe('createDataDragon', () => {
  describe('バージョン', () => {
    it('getVersions は versions.json をそのまま返す', async () => {
      const { transport, requests } = makeFakeTransport({
        [`${BASE}/api/versions.json`]: text(200, '["14.20.1","14.19.1"]'),
      })

      const result = await createDataDragon({ transport }).getVersions()

      expect(result).toStrictEqual({ ok: true, data: ['14.20.1', '14.19.1'], type: 'Versions' })
      expect(requests[0]?.headers).toStrictEqual({ Accept: 'application/json' })
    })

    it('getLatestVersion は先頭のバージョン', async () => {
      const { transport } = makeFakeTransport({
        [`${BASE}/api/versions.json`]: text(200, '["14.20.1","14.19.1"]'),
      })

      const result = await createDataDragon({ transport }).getLatestVersion()

      expect(result).toStrictEqual({ ok: true, data: '14.20.1', type: 'Version' })
    })

    it('空のバージョン一覧 → decode エラー', async () => {
      const { transport } = makeFakeTransport({ [`${BASE}/api/versions.json`]: text(200, '[]') })

      const result = await createDataDragon({ transport }).getLatestVersion()

      expect(result).toStrictEqual({
        ok: false,
        error: { kind: 'decode', statusCode: 0, message: 'Version list is empty' },
      })
    })

    it('取得失敗はそのまま返す', async () => {
      const { transport } = makeFakeTransport({})

      const result = await createDataDragon({ transport }).getLatestVersion()

      expect(result).toStrictEqual({
        ok: false,
        error: { kind: 'remote', statusCode: 404, message: 'Not found' },
      })
    })
  })

  it('getLanguages', async () => {
    const { transport } = makeFakeTransport({
      [`${BASE}/cdn/languages.json`]: text(200, '["en_US","ja_JP"]'),
    })

    const result = await createDataDragon({ transport }).getLanguages()

    expect(result).toStrictEqual({ ok: true, data: ['en_US', 'ja_JP'], type: 'Languages' })
  })

  describe('getChampions', () => {
    it('champion.json から ChampionIndex を作る（デフォルト言語は en_US）', async () => {
      const { transport } = makeFakeTransport({
        [`${BASE}/cdn/14.20.1/data/en_US/champion.json`]: text(200, readFixture('champions.json')),
      })

      const result = await createDataDragon({ transport }).getChampions('14.20.1')

      expect(result.ok).toBe(true)
      if (!result.ok) return
      expect(result.type).toBe('ChampionIndex')
      expect(result.data.size).toBe(5)
      expect(result.data.byKey(266)?.name).toBe('Aatrox')
    })

    it('言語を指定できる', async () => {
      const { transport, requests } = makeFakeTransport({})

      await createDataDragon({ transport }).getChampions('14.20.1', 'ja_JP')

      expect(requests[0]?.url).toBe(`${BASE}/cdn/14.20.1/data/ja_JP/champion.json`)
    })

    it('形の違う JSON → decode エラー', async () => {
      const { transport } = makeFakeTransport({
        [`${BASE}/cdn/14.20.1/data/en_US/champion.json`]: text(200, '{"version":"14.20.1"}'),
      })

      const result = await createDataDragon({ transport }).getChampions('14.20.1')

      expect(result).toStrictEqual({
        ok: false,
        error: { kind: 'decode', statusCode: 0, message: 'Unexpected ChampionList payload: data: Required' },
      })
    })
  })

  describe('resolveLanguage', () => {
    const languages = { [`${BASE}/cdn/languages.json`]: text(200, '["en_US","ja_JP","ko_KR"]') }

    it('大文字小文字を無視して一致する言語コード', async () => {
      const { transport } = makeFakeTransport(languages)

      const result = await createDataDragon({ transport }).resolveLanguage('JA_jp')

      expect(result).toStrictEqual({ ok: true, data: 'ja_JP', type: 'Language' })
    })

    it('一致しなければもっとも近い言語コード', async () => {
      const { transport } = makeFakeTransport(languages)

      const result = await createDataDragon({ transport }).resolveLanguage('ja-jp')

      expect(result.ok && result.data).toBe('ja_JP')
    })

    it('言語一覧が空 → decode エラー', async () => {
      const { transport } = makeFakeTransport({ [`${BASE}/cdn/languages.json`]: text(200, '[]') })

      const result = await createDataDragon({ transport }).resolveLanguage('ja_JP')

      expect(result).toStrictEqual({
        ok: false,
        error: { kind: 'decode', statusCode: 0, message: 'No language matches ja_JP' },
      })
    })
  })

  describe('getChampion', () => {
    const detailUrl = (language: string): string =>
      `${BASE}/cdn/14.20.1/data/${language}/champion/MonkeyKing.json`

    it('スキン・スキル・パッシブを含む詳細を返す（言語を省略すると en_US、言語一覧は取得しない）', async () => {
      const { transport, requests } = makeFakeTransport({
        [detailUrl('en_US')]: text(200, readFixture('champion-monkeyking.json')),
      })

      const result = await createDataDragon({ transport }).getChampion('14.20.1', 'MonkeyKing')

      expect(requests.map((r) => r.url)).toStrictEqual([detailUrl('en_US')])
      expect(result.ok).toBe(true)
      if (!result.ok) return
      expect(result.type).toBe('ChampionDetail')
      expect(result.data.name).toBe('Wukong')
      expect(result.data.skins.map((skin) => skin.chromas)).toStrictEqual([false, true])
      expect(result.data.spells[0]?.cooldown).toStrictEqual([9, 8.5, 8, 7.5, 7])
      expect(result.data.passive.name).toBe('Stone Skin')
      expect(result.data.enemytips).toStrictEqual([])
    })

    it('言語を渡すと解決してから取得する', async () => {
      const { transport, requests } = makeFakeTransport({
        [`${BASE}/cdn/languages.json`]: text(200, '["en_US","ja_JP"]'),
        [detailUrl('ja_JP')]: text(200, readFixture('champion-monkeyking.json')),
      })

      const result = await createDataDragon({ transport }).getChampion('14.20.1', 'MonkeyKing', 'ja-jp')

      expect(requests.map((r) => r.url)).toStrictEqual([`${BASE}/cdn/languages.json`, detailUrl('ja_JP')])
      expect(result.ok).toBe(true)
    })

    it('言語一覧の取得失敗はそのまま返す', async () => {
      const { transport, requests } = makeFakeTransport({})

      const result = await createDataDragon({ transport }).getChampion('14.20.1', 'MonkeyKing', 'ja_JP')

      expect(requests).toHaveLength(1)
      expect(result).toStrictEqual({
        ok: false,
        error: { kind: 'remote', statusCode: 404, message: 'Not found' },
      })
    })

    it('レスポンスに要求した ID がなければ decode エラー', async () => {
      const { transport } = makeFakeTransport({
        [detailUrl('en_US')]: text(200, '{"version":"14.20.1","data":{}}'),
      })

      const result = await createDataDragon({ transport }).getChampion('14.20.1', 'MonkeyKing')

      expect(result).toStrictEqual({
        ok: false,
        error: { kind: 'decode', statusCode: 0, message: 'Champion MonkeyKing is missing from the response' },
      })
    })
  })

  it('getQueues は queuesUrl から QueueCatalog を作る', async () => {
    const queuesUrl = 'https://static.example.test/queues.json'
    const { transport } = makeFakeTransport({
      [queuesUrl]: text(
        200,
        JSON.stringify([
          { queueId: 0, map: 'Custom games', description: null, notes: null },
          { queueId: 440, map: "Summoner's Rift", description: '5v5 Ranked Flex games', notes: null },
        ]),
      ),
    })

    const result = await createDataDragon({ transport, queuesUrl }).getQueues()

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.type).toBe('QueueCatalog')
    expect(result.data.describe(440)).toBe('5v5 Ranked Flex')
  })

  it('トランスポートの reject は transport エラー', async () => {
    const transport: Transport = { send: vi.fn().mockRejectedValue(new Error('ECONNRESET')) }

    const result = await createDataDragon({ transport }).getVersions()

    expect(result).toStrictEqual({
      ok: false,
      error: { kind: 'transport', statusCode: -1, message: 'Transport failure: ECONNRESET' },
    })
  })

  describe('画像 URL', () => {
    const dragon = createDataDragon({ transport: makeFakeTransport({}).transport })

    it('profileIconUrl', () => {
      expect(dragon.profileIconUrl('14.20.1', 4568)).toBe(`${BASE}/cdn/14.20.1/img/profileicon/4568.png`)
    })

    it('championImageUrl はデフォルトで splash のスキン 0', () => {
      expect(dragon.championImageUrl('MonkeyKing')).toBe(`${BASE}/cdn/img/champion/splash/MonkeyKing_0.jpg`)
      expect(dragon.championImageUrl('Aatrox', { skin: 7, type: 'loading' })).toBe(
        `${BASE}/cdn/img/champion/loading/Aatrox_7.jpg`,
      )
    })

    it('baseUrl を差し替えられる', () => {
      const mirror = createDataDragon({ baseUrl: 'https://cdn.example.test' })
      expect(mirror.profileIconUrl('14.20.1', 1)).toBe('https://cdn.example.test/cdn/14.20.1/img/profileicon/1.png')
    })
  })
})
