/**
 * Load Configuration Tests
 */

import { describe, it, expect } from 'vitest'
import { ZodError } from 'zod'
import { DEFAULT_LOAD_CONFIG, loadConfigFromEnv, resolveConfig } from '../integrity/config'
import { Decimal } from '../integrity/decimal'

describe('Load Configuration', () => {
  describe('loadConfigFromEnv', () => {
    it('should fall back to defaults for an empty environment', () => {
      expect(loadConfigFromEnv({})).toEqual(DEFAULT_LOAD_CONFIG)
    })

    it('should keep strict rules off by default', () => {
      expect(loadConfigFromEnv({}).strict).toEqual({ shipDateOrder: false, totalPrice: false })
    })

    it('should read every supported variable', () => {
      const config = loadConfigFromEnv({
        TPCH_CHUNK_SIZE: '500',
        TPCH_MAX_VIOLATIONS: '10',
        TPCH_STRICT_DATES: 'true',
        TPCH_STRICT_TOTALPRICE: '1',
        TPCH_TOTALPRICE_TOLERANCE: '0.05',
        TPCH_SCALE_FACTOR: '0.1',
        TPCH_VERBOSE: 'yes',
        TPCH_PGLITE_DIR: './pgdata',
      })

      expect(config.chunkSize).toBe(500)
      expect(config.maxViolations).toBe(10)
      expect(config.strict).toEqual({ shipDateOrder: true, totalPrice: true })
      expect(config.totalPriceTolerance.toString()).toBe('0.05')
      expect(config.scaleFactor).toBe(0.1)
      expect(config.verbose).toBe(true)
      expect(config.pgliteDataDir).toBe('./pgdata')
    })

    it('should read false flags', () => {
      expect(loadConfigFromEnv({ TPCH_STRICT_DATES: 'no', TPCH_VERBOSE: '0' }).strict.shipDateOrder).toBe(false)
    })

    it('should ignore unrelated variables', () => {
      expect(loadConfigFromEnv({ HOME: '/root', PATH: '/usr/bin' })).toEqual(DEFAULT_LOAD_CONFIG)
    })

    it('should reject malformed values', () => {
      expect(() => loadConfigFromEnv({ TPCH_CHUNK_SIZE: '0' })).toThrow(ZodError)
      expect(() => loadConfigFromEnv({ TPCH_CHUNK_SIZE: 'many' })).toThrow(ZodError)
      expect(() => loadConfigFromEnv({ TPCH_STRICT_DATES: 'maybe' })).toThrow(ZodError)
      expect(() => loadConfigFromEnv({ TPCH_TOTALPRICE_TOLERANCE: '0.001' })).toThrow(ZodError)
    })
  })

  describe('resolveConfig', () => {
    it('should merge strict rules one at a time', () => {
      const config = resolveConfig({ strict: { shipDateOrder: true, totalPrice: false }, chunkSize: 3 })
      expect(config.chunkSize).toBe(3)
      expect(config.strict.shipDateOrder).toBe(true)
      expect(config.maxViolations).toBe(DEFAULT_LOAD_CONFIG.maxViolations)
    })

    it('should reject overrides outside the environment bounds', () => {
      expect(() => resolveConfig({ chunkSize: 0 })).toThrow(ZodError)
      expect(() => resolveConfig({ chunkSize: Number.NaN })).toThrow(ZodError)
      expect(() => resolveConfig({ maxViolations: -1 })).toThrow(ZodError)
      expect(() => resolveConfig({ totalPriceTolerance: Decimal.parse('-0.01') })).toThrow(RangeError)
    })

    it('should not modify the defaults', () => {
      resolveConfig({ strict: { shipDateOrder: true, totalPrice: true } })
      expect(DEFAULT_LOAD_CONFIG.strict.shipDateOrder).toBe(false)
    })
  })
})
