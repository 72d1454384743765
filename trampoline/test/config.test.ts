/**
 * Unit tests for readTrampolineConfig().
 *
 * Goal: Verify DESKTOP_PORT validation and the debug switch.
 */
import { describe, expect, it } from 'vitest'
import { readTrampolineConfig } from '../src/config.js'
import { DESKTOP_ENV_ALLOW_LIST } from '../src/env-filter.js'
import { ConfigurationError } from '../src/errors.js'

describe('readTrampolineConfig()', () => {
  it('parses a valid port', () => {
    expect(readTrampolineConfig({ DESKTOP_PORT: '5775' })).toEqual({
      port: 5775,
      debug: false,
      allowList: DESKTOP_ENV_ALLOW_LIST
    })
  })

  it('accepts surrounding whitespace', () => {
    expect(readTrampolineConfig({ DESKTOP_PORT: ' 5775\n' }).port).toBe(5775)
  })

  it('accepts the port range bounds', () => {
    expect(readTrampolineConfig({ DESKTOP_PORT: '1' }).port).toBe(1)
    expect(readTrampolineConfig({ DESKTOP_PORT: '65535' }).port).toBe(65535)
  })

  it('enables debug only for DESKTOP_TRAMPOLINE_DEBUG=1', () => {
    expect(readTrampolineConfig({ DESKTOP_PORT: '5775', DESKTOP_TRAMPOLINE_DEBUG: '1' }).debug).toBe(
      true
    )
    expect(
      readTrampolineConfig({ DESKTOP_PORT: '5775', DESKTOP_TRAMPOLINE_DEBUG: 'true' }).debug
    ).toBe(false)
  })

  it('throws ConfigurationError when DESKTOP_PORT is missing', () => {
    expect(() => readTrampolineConfig({})).toThrow(ConfigurationError)
    expect(() => readTrampolineConfig({})).toThrow('Missing DESKTOP_PORT environment variable')
  })

  it('reports the config step', () => {
    try {
      readTrampolineConfig({})
      expect.fail('Expected ConfigurationError')
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError)
      expect((err as ConfigurationError).step).toBe('config')
    }
  })

  it.each(['', 'abc', '0', '65536', '-1', '12.5', '0x10'])('rejects DESKTOP_PORT=%j', (value) => {
    expect(() => readTrampolineConfig({ DESKTOP_PORT: value })).toThrow(ConfigurationError)
    expect(() => readTrampolineConfig({ DESKTOP_PORT: value })).toThrow(
      `Invalid DESKTOP_PORT environment variable ${JSON.stringify(value)}: expected an integer between 1 and 65535`
    )
  })
})
