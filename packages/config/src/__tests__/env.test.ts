import { describe, it, expect } from 'vitest'
import { loadConfig, DEFAULT_CONFIG } from '../index.js'

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({ radius: 50, maxSize: 2000, logLevel: 'info' })
  })

  it('treats empty strings as unset', () => {
    expect(loadConfig({ PANO2POINTS_RADIUS: '' }).radius).toBe(DEFAULT_CONFIG.radius)
  })

  it('reads overrides', () => {
    const config = loadConfig({
      PANO2POINTS_RADIUS: '75.5',
      PANO2POINTS_MAX_SIZE: '1024',
      LOG_LEVEL: 'DEBUG',
    })
    expect(config).toEqual({ radius: 75.5, maxSize: 1024, logLevel: 'debug' })
  })

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true)
  })

  it('names the offending variable', () => {
    expect(() => loadConfig({ PANO2POINTS_RADIUS: 'big' })).toThrow(
      /^Invalid environment variable PANO2POINTS_RADIUS="big"/,
    )
    expect(() => loadConfig({ PANO2POINTS_MAX_SIZE: '12.5' })).toThrow(/PANO2POINTS_MAX_SIZE/)
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL="loud"/)
  })
})
