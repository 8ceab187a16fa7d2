import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdirSync, mkdtempSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { DEFAULT_PORT, configFromEnv, createConfig, ensureDirectories, findDataDir } from '../src/config.ts'

describe('createConfig', () => {
  it('lays out every directory under the data directory', () => {
    const config = createConfig('/srv/formdesk')
    expect(config).toMatchObject({
      dataDir: '/srv/formdesk',
      catalogFile: join('/srv/formdesk', 'catalog', 'forms_catalog.csv'),
      downloadsDir: join('/srv/formdesk', 'downloads'),
      templatesDir: join('/srv/formdesk', 'templates'),
      outputsDir: join('/srv/formdesk', 'outputs'),
      casesDir: join('/srv/formdesk', 'cases'),
      tempDir: join('/srv/formdesk', 'temp'),
      eventBufferSize: 100,
      logLevel: 'info',
      port: DEFAULT_PORT,
    })
    expect(config.corsOrigin).toBeUndefined()
  })

  it('applies overrides', () => {
    expect(createConfig('/d', { port: 9000 }).port).toBe(9000)
  })
})

describe('findDataDir / configFromEnv', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'formdesk-config-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('uses FORMDESK_DATA_DIR, resolved against cwd', () => {
    expect(findDataDir({ FORMDESK_DATA_DIR: 'store' }, dir)).toBe(join(dir, 'store'))
    expect(findDataDir({ FORMDESK_DATA_DIR: '/abs/store' }, dir)).toBe('/abs/store')
  })

  it('finds a .data directory in a parent', () => {
    mkdirSync(join(dir, '.data'))
    mkdirSync(join(dir, 'a', 'b'), { recursive: true })
    expect(findDataDir({}, join(dir, 'a', 'b'))).toBe(join(dir, '.data'))
  })

  it('falls back to .data in cwd', () => {
    const cwd = join(dir, 'x', 'y', 'z', 'w', 'v')
    mkdirSync(cwd, { recursive: true })
    expect(findDataDir({}, cwd)).toBe(join(cwd, '.data'))
  })

  it('reads every variable', () => {
    const config = configFromEnv(
      {
        FORMDESK_DATA_DIR: dir,
        FORMDESK_CATALOG: 'cat.csv',
        FORMDESK_PORT: '8080',
        FORMDESK_EVENT_BUFFER: '16',
        FORMDESK_CORS_ORIGIN: 'http://localhost:5173',
        LOG_LEVEL: 'WARN',
      },
      '/work',
    )
    expect(config).toMatchObject({
      dataDir: dir,
      catalogFile: join('/work', 'cat.csv'),
      port: 8080,
      eventBufferSize: 16,
      corsOrigin: 'http://localhost:5173',
      logLevel: 'warn',
    })
  })

  it('treats empty variables as unset', () => {
    const config = configFromEnv({ FORMDESK_DATA_DIR: dir, FORMDESK_PORT: ' ', LOG_LEVEL: '' }, '/work')
    expect([config.port, config.logLevel]).toEqual([DEFAULT_PORT, 'info'])
  })

  it('rejects bad values', () => {
    expect(() => configFromEnv({ FORMDESK_DATA_DIR: dir, FORMDESK_PORT: 'abc' }, '/work')).toThrow(
      /^invalid environment: FORMDESK_PORT: /,
    )
    expect(() => configFromEnv({ FORMDESK_DATA_DIR: dir, LOG_LEVEL: 'loud' }, '/work')).toThrow(/LOG_LEVEL/)
    expect(() => configFromEnv({ FORMDESK_DATA_DIR: dir, FORMDESK_EVENT_BUFFER: '0' }, '/work')).toThrow(
      /FORMDESK_EVENT_BUFFER/,
    )
  })

  it('creates every directory', async () => {
    const config = createConfig(join(dir, 'data'))
    await ensureDirectories(config)
    await ensureDirectories(config)
    expect(
      [join(config.dataDir, 'catalog'), config.downloadsDir, config.templatesDir, config.outputsDir, config.casesDir, config.tempDir].every(
        (d) => existsSync(d),
      ),
    ).toBe(true)
  })
})
