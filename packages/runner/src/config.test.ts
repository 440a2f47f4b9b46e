import { describe, it, expect } from 'vitest'
import { loadRunnerConfig } from './config.js'

describe('loadRunnerConfig', () => {
  it('should fall back to defaults when variables are absent', () => {
    expect(loadRunnerConfig({})).toEqual({
      tickFps: 60,
      sheetPath: null,
      missRate: 0,
      hitLine: 300,
      maxTicks: 3600,
    })
  })

  it('should treat empty values as absent', () => {
    expect(loadRunnerConfig({ TICK_FPS: '', SHEET_PATH: '' })).toMatchObject({
      tickFps: 60,
      sheetPath: null,
    })
  })

  it('should read every variable', () => {
    const config = loadRunnerConfig({
      TICK_FPS: '30',
      SHEET_PATH: 'sheets/tune.txt',
      AUTOPLAY_MISS_RATE: '0.25',
      AUTOPLAY_HIT_LINE: '200',
      MAX_TICKS: '90',
    })

    expect(config).toEqual({
      tickFps: 30,
      sheetPath: 'sheets/tune.txt',
      missRate: 0.25,
      hitLine: 200,
      maxTicks: 90,
    })
  })

  it('should reject values it cannot use', () => {
    expect(() => loadRunnerConfig({ TICK_FPS: '0' })).toThrow(
      'Invalid TICK_FPS: expected a positive integer (got "0")'
    )
    expect(() => loadRunnerConfig({ MAX_TICKS: 'lots' })).toThrow('Invalid MAX_TICKS')
    expect(() => loadRunnerConfig({ AUTOPLAY_MISS_RATE: '1.5' })).toThrow('Invalid AUTOPLAY_MISS_RATE')
    expect(() => loadRunnerConfig({ AUTOPLAY_HIT_LINE: 'low' })).toThrow('Invalid AUTOPLAY_HIT_LINE')
  })
})
