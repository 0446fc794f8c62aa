import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'node:fs'
import * as path from 'node:path'
import * as os from 'node:os'
import { loadConfig } from '../../src/loader/config-loader.js'

function makeTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'riot-config-test-'))
}

function writeConfig(dir: string, data: unknown): void {
  fs.mkdirSync(dir, { recursive: true })
  fs.writeFileSync(path.join(dir, 'config.json'), JSON.stringify(data), 'utf-8')
}

describe('loadConfig', () => {
  let globalDir: string
  let localDir: string
  let savedApiKey: string | undefined

  beforeEach(() => {
    globalDir = makeTmpDir()
    localDir = makeTmpDir()
    savedApiKey = process.env['RIOT_API_KEY']
    delete process.env['RIOT_API_KEY']
  })

  afterEach(() => {
    fs.rmSync(globalDir, { recursive: true, force: true })
    fs.rmSync(localDir, { recursive: true, force: true })
    if (savedApiKey === undefined) {
      delete process.env['RIOT_API_KEY']
    } else {
      process.env['RIOT_API_KEY'] = savedApiKey
    }
  })

  // ── JSON 読み込み ──────────────────────────────────────────

  describe('JSON 読み込み', () => {
    it('グローバルの config.json を読み込み、デフォルト値で補う', async () => {
      writeConfig(globalDir, { apiKey: 'test-key' })

      const result = await loadConfig(globalDir, localDir)
      expect(result).toStrictEqual({
        ok: true,
        data: { apiKey: 'test-key', region: 'euw1', timeoutMs: 10000, debug: false },
      })
    })

    it('ローカルの config.json がグローバルを上書きする', async () => {
      writeConfig(globalDir, { apiKey: 'test-key', region: 'euw1', timeoutMs: 5000 })
      writeConfig(localDir, { region: 'KR' })

      const result = await loadConfig(globalDir, localDir)
      expect(result.ok).toBe(true)
      if (result.ok) {
        // region は小文字にそろえる
        expect(result.data.region).toBe('kr')
        // グローバルの timeoutMs は残る
        expect(result.data.timeoutMs).toBe(5000)
      }
    })

    it('ディレクトリが存在しなくても環境変数の API キーで読み込める', async () => {
      process.env['RIOT_API_KEY'] = 'test-env-key'

      const result = await loadConfig(path.join(globalDir, 'missing'), path.join(localDir, 'missing'))
      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(result.data.apiKey).toBe('test-env-key')
        expect(result.data.region).toBe('euw1')
      }
    })

    it('config.json の apiKey は環境変数より優先する', async () => {
      process.env['RIOT_API_KEY'] = 'test-env-key'
      writeConfig(globalDir, { apiKey: 'test-file-key' })

      const result = await loadConfig(globalDir, localDir)
      expect(result.ok && result.data.apiKey).toBe('test-file-key')
    })

    it('不正な JSON に対して PARSE_ERROR を返す', async () => {
      fs.writeFileSync(path.join(globalDir, 'config.json'), '{invalid json}', 'utf-8')

      const result = await loadConfig(globalDir, localDir)
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.code).toBe('PARSE_ERROR')
        expect(result.error.path).toBe(path.join(globalDir, 'config.json'))
      }
    })

    it('オブジェクトでない JSON に対して PARSE_ERROR を返す', async () => {
      writeConfig(localDir, ['not', 'an', 'object'])

      const result = await loadConfig(globalDir, localDir)
      const configPath = path.join(localDir, 'config.json')
      expect(result).toStrictEqual({
        ok: false,
        error: {
          code: 'PARSE_ERROR',
          message: `config.json must be a JSON object: ${configPath}`,
          path: configPath,
        },
      })
    })

    it('読み込めないファイルに対して IO_ERROR を返す', async () => {
      // config.json という名前のディレクトリを置く
      fs.mkdirSync(path.join(globalDir, 'config.json'))

      const result = await loadConfig(globalDir, localDir)
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.code).toBe('IO_ERROR')
      }
    })
  })

  // ── オーバーライド ────────────────────────────────────────

  describe('オーバーライド', () => {
    it('region と timeoutMs を上書きできる', async () => {
      writeConfig(globalDir, { apiKey: 'test-key', region: 'euw1' })

      const result = await loadConfig(globalDir, localDir, { region: 'na1', timeoutMs: 2500 })
      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(result.data.region).toBe('na1')
        expect(result.data.timeoutMs).toBe(2500)
      }
    })

    it('undefined のオーバーライドは何もしない', async () => {
      writeConfig(globalDir, { apiKey: 'test-key', region: 'kr' })

      const result = await loadConfig(globalDir, localDir, { region: undefined, apiKey: undefined })
      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(result.data.region).toBe('kr')
        expect(result.data.apiKey).toBe('test-key')
      }
    })
  })

  // ── 環境変数置換 ──────────────────────────────────────────

  describe('環境変数置換', () => {
    beforeEach(() => {
      process.env['RIOT_TEST_KEY'] = 'test-substituted-key'
    })

    afterEach(() => {
      delete process.env['RIOT_TEST_KEY']
    })

    it('${VAR_NAME} を process.env の値に置換する', async () => {
      writeConfig(globalDir, { apiKey: '${RIOT_TEST_KEY}' })

      const result = await loadConfig(globalDir, localDir)
      expect(result.ok && result.data.apiKey).toBe('test-substituted-key')
    })

    it('未定義の環境変数は元の文字列のまま残す', async () => {
      writeConfig(globalDir, { apiKey: '${RIOT_TEST_UNDEFINED_VAR}' })

      const result = await loadConfig(globalDir, localDir)
      expect(result.ok && result.data.apiKey).toBe('${RIOT_TEST_UNDEFINED_VAR}')
    })
  })

  // ── 検証 ──────────────────────────────────────────────────

  describe('検証', () => {
    it('API キーがどこにもなければ VALIDATION_ERROR', async () => {
      const result = await loadConfig(globalDir, localDir)
      expect(result).toStrictEqual({
        ok: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'apiKey is required (set it in config.json or RIOT_API_KEY)',
        },
      })
    })

    it('未知のプラットフォームで routing もなければ VALIDATION_ERROR', async () => {
      writeConfig(globalDir, { apiKey: 'test-key', region: 'xx9' })

      const result = await loadConfig(globalDir, localDir)
      expect(result).toStrictEqual({
        ok: false,
        error: { code: 'VALIDATION_ERROR', message: 'Unknown platform: xx9' },
      })
    })

    it('region が constructor でも未知のプラットフォームとして VALIDATION_ERROR', async () => {
      writeConfig(globalDir, { apiKey: 'test-key', region: 'constructor' })

      const result = await loadConfig(globalDir, localDir)
      expect(result).toStrictEqual({
        ok: false,
        error: { code: 'VALIDATION_ERROR', message: 'Unknown platform: constructor' },
      })
    })

    it('routing を指定すれば未知のプラットフォームも受け付ける', async () => {
      writeConfig(globalDir, { apiKey: 'test-key', region: 'pbe1', routing: 'americas' })

      const result = await loadConfig(globalDir, localDir)
      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(result.data.routing).toBe('americas')
      }
    })

    it('不正な routing は VALIDATION_ERROR', async () => {
      writeConfig(globalDir, { apiKey: 'test-key', routing: 'mars' })

      const result = await loadConfig(globalDir, localDir)
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.code).toBe('VALIDATION_ERROR')
        expect(result.error.message.startsWith('Invalid config: routing: ')).toBe(true)
      }
    })

    it('timeoutMs が正の整数でなければ VALIDATION_ERROR', async () => {
      writeConfig(globalDir, { apiKey: 'test-key', timeoutMs: -5 })

      const result = await loadConfig(globalDir, localDir)
      expect(result).toStrictEqual({
        ok: false,
        error: { code: 'VALIDATION_ERROR', message: 'Invalid config: timeoutMs: Number must be greater than 0' },
      })
    })
  })
})
