import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'

import { DEFAULT_WAVE_CONFIG } from '../../lib/config/defaults.js'
import { ConfigurationError } from '../../lib/pendulum/errors.js'
import {
  CONFIG_PATH_ENV,
  extractOverrides,
  loadWaveConfig,
  mergeWaveConfig,
  resolveConfigPath,
} from '../lib/config-file.js'

let dir: string

function writeConfig(contents: string): string {
  const file = path.join(dir, 'config.json')
  fs.writeFileSync(file, contents)
  return file
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pendulum-wave-'))
  vi.spyOn(console, 'debug').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
  fs.rmSync(dir, { recursive: true, force: true })
})

describe('resolveConfigPath', () => {
  it('should prefer the environment variable', () => {
    expect(resolveConfigPath({ [CONFIG_PATH_ENV]: '/tmp/wave.json' })).toBe('/tmp/wave.json')
  })

  it('should fall back to the home directory', () => {
    expect(resolveConfigPath({ [CONFIG_PATH_ENV]: '  ' })).toBe(
      path.join(os.homedir(), '.pendulum-wave', 'config.json'),
    )
  })
})

describe('loadWaveConfig', () => {
  it('should use defaults when the file is missing', () => {
    const config = loadWaveConfig(path.join(dir, 'missing.json'))
    expect(config).toEqual(DEFAULT_WAVE_CONFIG)
    expect(console.debug).toHaveBeenCalledTimes(1)
  })

  it('should use defaults and warn on malformed JSON', () => {
    const config = loadWaveConfig(writeConfig('{ not json'))
    expect(config).toEqual(DEFAULT_WAVE_CONFIG)
    expect(console.warn).toHaveBeenCalledTimes(1)
  })

  it('should use defaults when the file is not an object', () => {
    const file = writeConfig('[1, 2, 3]')
    expect(loadWaveConfig(file)).toEqual(DEFAULT_WAVE_CONFIG)
    expect(console.warn).toHaveBeenCalledWith(
      `[config] Expected a JSON object in ${file}, using defaults`,
    )
  })

  it('should merge recognised keys over the defaults', () => {
    const config = loadWaveConfig(
      writeConfig(JSON.stringify({ oscillatorCount: 12, colors: { pivot: '#ffffff' } })),
    )
    expect(config.oscillatorCount).toBe(12)
    expect(config.totalPeriodS).toBe(60)
    expect(config.colors).toEqual({ ...DEFAULT_WAVE_CONFIG.colors, pivot: '#ffffff' })
  })

  it('should fail on values of the right type that are out of range', () => {
    const file = writeConfig(JSON.stringify({ maxAmplitudeDeg: 95 }))
    expect(() => loadWaveConfig(file)).toThrow(ConfigurationError)
  })
})

describe('extractOverrides', () => {
  it('should ignore wrong-typed fields with a warning', () => {
    const overrides = extractOverrides({ gravity: '9.8', frameRate: 24 })
    expect(overrides).toEqual({ frameRate: 24 })
    expect(console.warn).toHaveBeenCalledWith('[config] Ignoring "gravity": expected a number')
  })

  it('should ignore unknown keys silently', () => {
    expect(extractOverrides({ title: 'wave' })).toEqual({})
    expect(console.warn).not.toHaveBeenCalled()
  })

  it('should reject a non-object colors field', () => {
    expect(extractOverrides({ colors: '#ffffff' })).toEqual({})
    expect(console.warn).toHaveBeenCalledWith('[config] Ignoring "colors": expected an object')
  })

  it('should keep the valid colors only', () => {
    expect(extractOverrides({ colors: { string: '#101010', pivot: 3 } })).toEqual({
      colors: { string: '#101010' },
    })
    expect(console.warn).toHaveBeenCalledWith('[config] Ignoring "colors.pivot": expected a string')
  })
})

describe('mergeWaveConfig', () => {
  it('should not mutate the base config', () => {
    const merged = mergeWaveConfig(DEFAULT_WAVE_CONFIG, { colors: { background: '#000000' } })
    expect(merged.colors.background).toBe('#000000')
    expect(DEFAULT_WAVE_CONFIG.colors.background).toBe('#0f0f1e')
  })
})
