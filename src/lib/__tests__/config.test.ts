import { describe, it, expect, afterEach, vi } from 'vitest'
import { ConfigError, loadConfig } from '../config'
import { createLogger } from '../logger'

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({ logLevel: 'info', typesDbPath: null })
  })

  it('reads the environment', () => {
    expect(loadConfig({ COLLECTD_LOG_LEVEL: 'debug', COLLECTD_TYPES_DB: '/etc/collectd/types.db' }))
      .toEqual({ logLevel: 'debug', typesDbPath: '/etc/collectd/types.db' })
  })

  it('rejects unknown log levels', () => {
    expect(() => loadConfig({ COLLECTD_LOG_LEVEL: 'verbose' })).toThrow(ConfigError)
  })

  it('rejects an empty types.db path', () => {
    try {
      loadConfig({ COLLECTD_TYPES_DB: '' })
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError)
      if (err instanceof ConfigError) {
        expect(err.issues[0].path).toEqual(['COLLECTD_TYPES_DB'])
      }
    }
  })
})

describe('createLogger', () => {
  it('writes JSON lines at the configured level', () => {
    const lines: string[] = []
    const log = createLogger({ logLevel: 'warn' }, { write: (msg: string) => { lines.push(msg) } })

    log.info('hidden')
    log.warn({ path: '/tmp/types.db' }, 'shown')

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0])).toMatchObject({ level: 40, name: 'collectd-wire', path: '/tmp/types.db', msg: 'shown' })
  })
})

describe('getLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
    vi.resetModules()
  })

  it('takes its level from the environment', async () => {
    vi.stubEnv('COLLECTD_LOG_LEVEL', 'debug')
    vi.resetModules()
    const { getLogger } = await import('../logger')

    expect(getLogger().level).toBe('debug')
    expect(getLogger()).toBe(getLogger())
  })

  it('falls back to info on an invalid level', async () => {
    vi.stubEnv('COLLECTD_LOG_LEVEL', 'verbose')
    vi.resetModules()
    const { getLogger } = await import('../logger')

    expect(getLogger().level).toBe('info')
  })
})
