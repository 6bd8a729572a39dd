/**
 * Exact fixed-point decimal with two fractional digits.
 *
 * Values are held as a bigint count of hundredths, so sums over millions of
 * line items stay exact. This is the JS representation of `DECIMAL(15, 2)`.
 */

export const DECIMAL_SCALE = 2
export const DECIMAL_PRECISION = 15

const FACTOR = 100n
const MAX_UNITS = 10n ** BigInt(DECIMAL_PRECISION)
const DECIMAL_PATTERN = /^([+-])?(\d+)(?:\.(\d+))?$/

export type DecimalParseFailure = 'format' | 'scale' | 'precision'

export class DecimalParseError extends Error {
  constructor(
    readonly input: string,
    readonly reason: DecimalParseFailure
  ) {
    super(`Invalid decimal "${input}": ${reason}`)
    this.name = 'DecimalParseError'
  }
}

export class Decimal {
  static readonly ZERO = new Decimal(0n)

  private constructor(readonly units: bigint) {}

  /**
   * Build from a count of hundredths. `fromUnits(123456n)` is 1234.56.
   */
  static fromUnits(units: bigint): Decimal {
    if (units >= MAX_UNITS || units <= -MAX_UNITS) {
      throw new DecimalParseError(units.toString(), 'precision')
    }
    return new Decimal(units)
  }

  /**
   * Parse decimal text. Fractional digits past the scale are accepted only
   * when they are zeros; anything else would need rounding.
   */
  static parse(text: string): Decimal {
    const match = DECIMAL_PATTERN.exec(text.trim())
    if (!match) throw new DecimalParseError(text, 'format')

    const [, sign, whole, fraction = ''] = match
    const significant = fraction.slice(0, DECIMAL_SCALE)
    if (/[^0]/.test(fraction.slice(DECIMAL_SCALE))) {
      throw new DecimalParseError(text, 'scale')
    }

    const magnitude = BigInt(whole) * FACTOR + BigInt(significant.padEnd(DECIMAL_SCALE, '0'))
    if (magnitude >= MAX_UNITS) throw new DecimalParseError(text, 'precision')

    return new Decimal(sign === '-' ? -magnitude : magnitude)
  }

  /**
   * Convert any accepted representation. Numbers go through their shortest
   * round-trip text, so 0.1 + 0.2 fails on scale instead of being rounded.
   */
  static from(value: Decimal | string | number | bigint): Decimal {
    if (value instanceof Decimal) return value
    if (typeof value === 'bigint') return Decimal.fromUnits(value * FACTOR)
    if (typeof value === 'number' && !Number.isFinite(value)) {
      throw new DecimalParseError(String(value), 'format')
    }
    return Decimal.parse(String(value))
  }

  isNegative(): boolean {
    return this.units < 0n
  }

  add(other: Decimal): Decimal {
    return Decimal.fromUnits(this.units + other.units)
  }

  subtract(other: Decimal): Decimal {
    return Decimal.fromUnits(this.units - other.units)
  }

  compare(other: Decimal): -1 | 0 | 1 {
    if (this.units < other.units) return -1
    if (this.units > other.units) return 1
    return 0
  }

  equals(other: Decimal): boolean {
    return this.units === other.units
  }

  /**
   * Text of a count of hundredths. Unlike fromUnits, any magnitude is
   * accepted, so sums past DECIMAL(15, 2) can still be printed.
   */
  static formatUnits(units: bigint): string {
    const negative = units < 0n
    const magnitude = negative ? -units : units
    const whole = magnitude / FACTOR
    const fraction = (magnitude % FACTOR).toString().padStart(DECIMAL_SCALE, '0')
    return `${negative ? '-' : ''}${whole}.${fraction}`
  }

  toString(): string {
    return Decimal.formatUnits(this.units)
  }

  toJSON(): string {
    return this.toString()
  }
}
