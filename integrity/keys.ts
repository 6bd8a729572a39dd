/**
 * Key tuples and their set encoding.
 *
 * A key is always a tuple, even for single-column keys, so single and
 * composite keys share one lookup path: encode the whole tuple, probe once.
 */

export type KeyValue = number | bigint | string

export type KeyTuple = readonly KeyValue[]

// Unit separator: never produced by an integer or an ISO date
const SEPARATOR = '\u001f'

export function encodeKey(tuple: KeyTuple): string {
  return tuple.map(value => String(value)).join(SEPARATOR)
}

/**
 * Human-readable form used in error messages: `99999` or `(10, 20)`.
 */
export function formatKey(tuple: KeyTuple): string {
  const parts = tuple.map(value => String(value))
  return parts.length === 1 ? parts[0] : `(${parts.join(', ')})`
}

export function formatColumns(columns: readonly string[]): string {
  return columns.length === 1 ? columns[0] : `(${columns.join(', ')})`
}
