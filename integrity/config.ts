/**
 * Load Configuration
 *
 * Defaults for the integrity pipeline, overridable from the environment.
 * The strict business rules are off unless switched on: the DDL does not
 * encode them, so a conforming dataset is not required to satisfy them.
 */

import { z } from 'zod'
import { Decimal } from './decimal'

export interface StrictRules {
  // l_shipdate <= l_commitdate <= l_receiptdate
  shipDateOrder: boolean
  // o_totalprice matches its line items within totalPriceTolerance
  totalPrice: boolean
}

export interface LoadConfig {
  // Rows validated per task within one entity's load
  chunkSize: number
  // Violations collected by report-mode validation before stopping
  maxViolations: number
  strict: StrictRules
  totalPriceTolerance: Decimal
  scaleFactor: number
  verbose: boolean
  // PGlite data directory; in-memory when absent
  pgliteDataDir?: string
}

export const DEFAULT_LOAD_CONFIG: LoadConfig = {
  chunkSize: 10_000,
  maxViolations: 100,
  strict: {
    shipDateOrder: false,
    totalPrice: false,
  },
  totalPriceTolerance: Decimal.parse('1.00'),
  scaleFactor: 0.01,
  verbose: false,
}

const flag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no'])
  .transform(value => value === '1' || value === 'true' || value === 'yes')

const EnvSchema = z.object({
  TPCH_CHUNK_SIZE: z.coerce.number().int().positive().optional(),
  TPCH_MAX_VIOLATIONS: z.coerce.number().int().positive().optional(),
  TPCH_STRICT_DATES: flag.optional(),
  TPCH_STRICT_TOTALPRICE: flag.optional(),
  TPCH_TOTALPRICE_TOLERANCE: z
    .string()
    .regex(/^\d+(\.\d{1,2})?$/, 'expected a non-negative amount with at most two decimals')
    .optional(),
  TPCH_SCALE_FACTOR: z.coerce.number().positive().optional(),
  TPCH_VERBOSE: flag.optional(),
  TPCH_PGLITE_DIR: z.string().min(1).optional(),
})

/**
 * Build a configuration from environment variables, falling back to
 * DEFAULT_LOAD_CONFIG. Invalid values throw a ZodError naming the variable.
 */
export function loadConfigFromEnv(env: Record<string, string | undefined> = process.env): LoadConfig {
  const parsed = EnvSchema.parse(env)

  return {
    chunkSize: parsed.TPCH_CHUNK_SIZE ?? DEFAULT_LOAD_CONFIG.chunkSize,
    maxViolations: parsed.TPCH_MAX_VIOLATIONS ?? DEFAULT_LOAD_CONFIG.maxViolations,
    strict: {
      shipDateOrder: parsed.TPCH_STRICT_DATES ?? DEFAULT_LOAD_CONFIG.strict.shipDateOrder,
      totalPrice: parsed.TPCH_STRICT_TOTALPRICE ?? DEFAULT_LOAD_CONFIG.strict.totalPrice,
    },
    totalPriceTolerance:
      parsed.TPCH_TOTALPRICE_TOLERANCE !== undefined
        ? Decimal.parse(parsed.TPCH_TOTALPRICE_TOLERANCE)
        : DEFAULT_LOAD_CONFIG.totalPriceTolerance,
    scaleFactor: parsed.TPCH_SCALE_FACTOR ?? DEFAULT_LOAD_CONFIG.scaleFactor,
    verbose: parsed.TPCH_VERBOSE ?? DEFAULT_LOAD_CONFIG.verbose,
    pgliteDataDir: parsed.TPCH_PGLITE_DIR ?? DEFAULT_LOAD_CONFIG.pgliteDataDir,
  }
}

export const ChunkSizeSchema = z.number().int().positive()

const OverrideSchema = z.object({
  chunkSize: ChunkSizeSchema.optional(),
  maxViolations: z.number().int().positive().optional(),
  scaleFactor: z.number().positive().optional(),
})

/**
 * Merge partial overrides over a base configuration. Numeric overrides are
 * held to the same bounds as their environment variables.
 */
export function resolveConfig(overrides: Partial<LoadConfig> = {}, base: LoadConfig = DEFAULT_LOAD_CONFIG): LoadConfig {
  OverrideSchema.parse({
    chunkSize: overrides.chunkSize,
    maxViolations: overrides.maxViolations,
    scaleFactor: overrides.scaleFactor,
  })
  if (overrides.totalPriceTolerance?.isNegative()) {
    throw new RangeError('totalPriceTolerance must not be negative')
  }

  return {
    ...base,
    ...overrides,
    strict: { ...base.strict, ...overrides.strict },
  }
}
