import { describe, it, expect } from 'vitest'
import { loadSettings, readSettings } from '../../src/config/settings.js'

describe('loadSettings', () => {
  it('returns defaults for an empty environment', () => {
    expect(loadSettings({})).toEqual({ logLevel: 'warn', fetchTimeout: 10000 })
  })

  it('reads STRATA_* variables', () => {
    expect(
      loadSettings({ STRATA_LOG_LEVEL: 'debug', STRATA_FETCH_TIMEOUT: '2500' })
    ).toEqual({ logLevel: 'debug', fetchTimeout: 2500 })
  })

  it('ignores empty variables', () => {
    expect(loadSettings({ STRATA_LOG_LEVEL: '' }).logLevel).toBe('warn')
  })

  it('keeps the default for an unknown log level', () => {
    expect(loadSettings({ STRATA_LOG_LEVEL: 'trace' }).logLevel).toBe('warn')
  })

  it('keeps the default for a non-positive timeout', () => {
    expect(loadSettings({ STRATA_FETCH_TIMEOUT: '0' }).fetchTimeout).toBe(10000)
  })
})

describe('readSettings', () => {
  it('lists the variables it ignored', () => {
    const { settings, ignored } = readSettings({
      STRATA_LOG_LEVEL: 'trace',
      STRATA_FETCH_TIMEOUT: 'soon',
    })

    expect(settings).toEqual({ logLevel: 'warn', fetchTimeout: 10000 })
    expect(ignored.map(({ variable, value }) => ({ variable, value }))).toEqual([
      { variable: 'STRATA_LOG_LEVEL', value: 'trace' },
      { variable: 'STRATA_FETCH_TIMEOUT', value: 'soon' },
    ])
    expect(ignored[1].message).toBe('Expected number, received string')
  })

  it('keeps valid settings next to invalid ones', () => {
    const { settings, ignored } = readSettings({
      STRATA_LOG_LEVEL: 'info',
      STRATA_FETCH_TIMEOUT: '-5',
    })

    expect(settings).toEqual({ logLevel: 'info', fetchTimeout: 10000 })
    expect(ignored).toHaveLength(1)
    expect(ignored[0].variable).toBe('STRATA_FETCH_TIMEOUT')
  })
})
