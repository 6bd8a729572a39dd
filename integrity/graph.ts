/**
 * Referential Graph
 *
 * Holds the foreign-key edges between TPC-H entities and the primary-key set of
 * every loaded entity. An entity is accepted only after all entities it
 * references are loaded, and then only as a whole: one violating row rejects
 * the batch and nothing of it is kept.
 *
 * Loading is split in two so row checks can run concurrently:
 * - checkChunk() validates rows against the published key sets (read only)
 * - commit() checks uniqueness and strict rules, then publishes the entity
 * registerEntity() does both in one call.
 */

import {
  tpchDataset,
  ENTITY_NAMES,
  isEntityName,
  primaryKeys,
  type EntityName,
  type Orders,
  type RelationshipConfig,
  type TpchRecords,
} from '../datasets'
import { rulesFor, type Indexed, type RuleCheck, type RuleContext, type RuleSet } from './business-rules'
import { describeCandidateKey, keyTuple, tableFor, validate, type Candidate } from './catalog'
import { resolveConfig, type LoadConfig } from './config'
import {
  DanglingReference,
  DuplicateLoad,
  OutOfOrderLoad,
  UniquenessViolation,
  type RowViolation,
} from './errors'
import { encodeKey, formatColumns, formatKey, type KeyTuple } from './keys'
import { silentLogger, type LoadLogger } from './logger'

// ============================================================================
// Types
// ============================================================================

export interface ForeignKeyEdge {
  name: string
  from: EntityName
  to: EntityName
  // Paired by position; two columns for a composite reference
  columns: readonly string[]
  targetColumns: readonly string[]
}

export interface ChunkResult<E extends EntityName> {
  entity: E
  offset: number
  accepted: Indexed<TpchRecords[E]>[]
  violations: RowViolation[]
}

export interface RegisteredEntity {
  entity: EntityName
  rowCount: number
}

export interface ReferentialGraphOptions {
  config?: Partial<LoadConfig>
  logger?: LoadLogger
}

type EntityRows = { [E in EntityName]: readonly TpchRecords[E][] }

function emptyRows(): EntityRows {
  return {
    region: [],
    nation: [],
    part: [],
    supplier: [],
    partsupp: [],
    customer: [],
    orders: [],
    lineitem: [],
  }
}

// ============================================================================
// Edges
// ============================================================================

function toEdge(rel: RelationshipConfig): ForeignKeyEdge {
  const { from, to } = rel
  if (!isEntityName(from.table) || !isEntityName(to.table)) {
    throw new Error(`Relationship ${rel.name} refers to an unknown entity`)
  }
  if (from.columns.length !== to.columns.length || from.columns.length === 0) {
    throw new Error(`Relationship ${rel.name} pairs ${from.columns.length} columns with ${to.columns.length}`)
  }
  const targetPk = tableFor(to.table).primaryKey
  if (targetPk.join() !== to.columns.join()) {
    throw new Error(`Relationship ${rel.name} must reference the full primary key of ${to.table}`)
  }
  return {
    name: rel.name,
    from: from.table,
    to: to.table,
    columns: from.columns,
    targetColumns: to.columns,
  }
}

export const FOREIGN_KEY_EDGES: readonly ForeignKeyEdge[] = tpchDataset.relationships.map(toEdge)

/**
 * Entities referenced by `entity`, in declaration order.
 */
export function dependenciesOf(entity: EntityName): EntityName[] {
  const deps: EntityName[] = []
  for (const edge of FOREIGN_KEY_EDGES) {
    if (edge.from === entity && edge.to !== entity && !deps.includes(edge.to)) {
      deps.push(edge.to)
    }
  }
  return deps
}

/**
 * Topological order of the graph, leaves first. Ties go to the canonical
 * entity order, which yields region, nation, part, supplier, partsupp,
 * customer, orders, lineitem.
 */
export function loadOrder(): EntityName[] {
  const remaining = new Map(ENTITY_NAMES.map((entity): [EntityName, number] => [entity, dependenciesOf(entity).length]))
  const order: EntityName[] = []

  while (remaining.size > 0) {
    const next = ENTITY_NAMES.find(entity => remaining.get(entity) === 0)
    if (next === undefined) {
      throw new Error(`Foreign-key cycle among: ${Array.from(remaining.keys()).join(', ')}`)
    }
    remaining.delete(next)
    order.push(next)
    for (const [entity, count] of remaining) {
      if (dependenciesOf(entity).includes(next)) remaining.set(entity, count - 1)
    }
  }

  return order
}

// ============================================================================
// Graph
// ============================================================================

export class ReferentialGraph {
  readonly config: LoadConfig
  private readonly logger: LoadLogger
  private readonly rules: RuleSet
  private rows: EntityRows = emptyRows()
  private readonly keySets = new Map<EntityName, ReadonlySet<string>>()

  constructor(options: ReferentialGraphOptions = {}) {
    this.config = resolveConfig(options.config)
    this.logger = options.logger ?? silentLogger
    this.rules = rulesFor(this.config)
  }

  dependenciesOf(entity: EntityName): EntityName[] {
    return dependenciesOf(entity)
  }

  loadOrder(): EntityName[] {
    return loadOrder()
  }

  isRegistered(entity: EntityName): boolean {
    return this.keySets.has(entity)
  }

  registeredEntities(): EntityName[] {
    return ENTITY_NAMES.filter(entity => this.keySets.has(entity))
  }

  rowsOf<E extends EntityName>(entity: E): readonly TpchRecords[E][] {
    return this.rows[entity]
  }

  keysOf(entity: EntityName): ReadonlySet<string> | undefined {
    return this.keySets.get(entity)
  }

  /**
   * Full drop: forget every loaded entity so a new load can start.
   */
  reset(): void {
    this.rows = emptyRows()
    this.keySets.clear()
  }

  /**
   * Throws unless `entity` may be loaded now: not loaded yet, and every
   * entity it references already published.
   */
  assertLoadable(entity: EntityName): void {
    if (this.keySets.has(entity)) throw new DuplicateLoad(entity)
    for (const dep of dependenciesOf(entity)) {
      if (!this.keySets.has(dep)) throw new OutOfOrderLoad(entity, dep)
    }
  }

  /**
   * Check each foreign key of `row` (single or composite) with one lookup
   * against the target's published key set.
   */
  validateReferences(entity: EntityName, row: Candidate): void {
    for (const edge of FOREIGN_KEY_EDGES) {
      if (edge.from !== entity) continue

      const targetKeys = this.keySets.get(edge.to)
      if (!targetKeys) throw new OutOfOrderLoad(entity, edge.to)

      const tuple = keyTuple(row, edge.columns)
      if (!targetKeys.has(encodeKey(tuple))) {
        throw new DanglingReference(entity, formatKey(tuple), edge.to, formatColumns(edge.targetColumns), edge.columns)
      }
    }
  }

  /**
   * Validate attributes and references of a slice of a batch. Reads only
   * published key sets, so slices of one batch can be checked concurrently.
   * Stops after `limit` violations.
   */
  checkChunk<E extends EntityName>(
    entity: E,
    rows: readonly Candidate[],
    offset = 0,
    limit = 1
  ): ChunkResult<E> {
    const keyOf: (row: TpchRecords[E]) => KeyTuple = primaryKeys[entity]
    const accepted: Indexed<TpchRecords[E]>[] = []
    const violations: RowViolation[] = []

    for (let i = 0; i < rows.length && violations.length < limit; i++) {
      const index = offset + i
      const candidate = rows[i]
      const result = validate(entity, candidate)

      if (!result.ok) {
        violations.push(result.violation.at({ rowIndex: index, rowKey: describeCandidateKey(entity, candidate) }))
        continue
      }

      try {
        this.validateReferences(entity, result.record)
      } catch (error) {
        if (!(error instanceof DanglingReference)) throw error
        violations.push(error.at({ rowIndex: index, rowKey: formatKey(keyOf(result.record)) }))
        continue
      }

      accepted.push({ index, record: result.record })
    }

    return { entity, offset, accepted, violations }
  }

  /**
   * Merge checked chunks, enforce key uniqueness and strict rules, and publish.
   * Throws the violation with the lowest row index; on throw nothing changes.
   */
  commit<E extends EntityName>(entity: E, chunks: readonly ChunkResult<E>[]): RegisteredEntity {
    this.assertLoadable(entity)

    const ordered = [...chunks].sort((a, b) => a.offset - b.offset)
    const accepted = ordered.flatMap(chunk => chunk.accepted)
    const violations = ordered.flatMap(chunk => chunk.violations)

    const { keys, duplicates } = this.collectKeys(entity, accepted)
    violations.push(...duplicates)

    if (violations.length === 0) {
      violations.push(...this.runRules(entity, accepted))
    }

    if (violations.length > 0) {
      const first = firstByRow(violations)
      this.logger.debug(`${entity}: batch rejected, ${violations.length} violation(s)`)
      throw first
    }

    const records = accepted.map(entry => entry.record)
    this.publish(entity, records, keys)
    this.logger.debug(`${entity}: ${records.length} rows registered`)

    return { entity, rowCount: records.length }
  }

  /**
   * Ingest a complete batch for one entity.
   */
  registerEntity<E extends EntityName>(entity: E, rows: readonly Candidate[]): RegisteredEntity {
    this.assertLoadable(entity)
    return this.commit(entity, [this.checkChunk(entity, rows, 0, 1)])
  }

  /**
   * Report mode: every violation of a batch (up to maxViolations), without
   * registering anything. Dependencies must already be loaded.
   */
  validateBatch<E extends EntityName>(entity: E, rows: readonly Candidate[]): RowViolation[] {
    for (const dep of dependenciesOf(entity)) {
      if (!this.keySets.has(dep)) throw new OutOfOrderLoad(entity, dep)
    }

    const limit = this.config.maxViolations
    const chunk = this.checkChunk(entity, rows, 0, limit)
    const { duplicates } = this.collectKeys(entity, chunk.accepted)

    // Orders with a rejected or unchecked line cannot be totalled
    const acceptedRows = new Set(chunk.accepted.map(entry => entry.index))
    const incompleteOrders = new Set<string>()
    rows.forEach((candidate, index) => {
      if (acceptedRows.has(index)) return
      const orderKey = rawOrderKey(candidate)
      if (orderKey !== undefined) incompleteOrders.add(orderKey)
    })

    const violations = [...chunk.violations, ...duplicates, ...this.runRules(entity, chunk.accepted, incompleteOrders)]

    return violations.sort((a, b) => rowIndexOf(a) - rowIndexOf(b)).slice(0, limit)
  }

  private collectKeys<E extends EntityName>(
    entity: E,
    accepted: readonly Indexed<TpchRecords[E]>[]
  ): { keys: Set<string>; duplicates: UniquenessViolation[] } {
    const columns = tableFor(entity).primaryKey
    const keyOf: (row: TpchRecords[E]) => KeyTuple = primaryKeys[entity]
    const firstSeen = new Map<string, number>()
    const duplicates: UniquenessViolation[] = []

    for (const { index, record } of accepted) {
      const tuple = keyOf(record)
      const encoded = encodeKey(tuple)
      const first = firstSeen.get(encoded)
      if (first !== undefined) {
        duplicates.push(new UniquenessViolation(entity, formatKey(tuple), columns, index, first))
      } else {
        firstSeen.set(encoded, index)
      }
    }

    return { keys: new Set(firstSeen.keys()), duplicates }
  }

  private runRules<E extends EntityName>(
    entity: E,
    accepted: readonly Indexed<TpchRecords[E]>[],
    incompleteOrders: ReadonlySet<string> = new Set()
  ): RowViolation[] {
    const check: RuleCheck<E> = this.rules[entity]
    const context: RuleContext = {
      config: this.config,
      ordersRows: (): readonly Orders[] => this.rowsOf('orders'),
      incompleteOrders,
    }
    return check(accepted, context)
  }

  private publish<E extends EntityName>(entity: E, records: readonly TpchRecords[E][], keys: Set<string>): void {
    // Published rows back the key sets and indexes, so they stay as loaded
    for (const record of records) Object.freeze(record)
    Object.freeze(records)

    const rows: EntityRows = { ...this.rows }
    const slots: { [K in E]: readonly TpchRecords[K][] } = rows
    slots[entity] = records
    this.rows = rows
    this.keySets.set(entity, keys)
  }
}

// Encoded o_orderkey a raw line item refers to, when it reads as an integer
function rawOrderKey(candidate: Candidate): string | undefined {
  const value = candidate.l_orderkey
  if (typeof value === 'bigint') return encodeKey([value])
  if (typeof value === 'number' && Number.isSafeInteger(value)) return encodeKey([BigInt(value)])
  if (typeof value === 'string' && /^[+-]?\d+$/.test(value.trim())) return encodeKey([BigInt(value.trim())])
  return undefined
}

function rowIndexOf(violation: RowViolation): number {
  if (violation instanceof UniquenessViolation) return violation.rowIndex
  return violation.location.rowIndex ?? Number.MAX_SAFE_INTEGER
}

function firstByRow(violations: readonly RowViolation[]): RowViolation {
  let first = violations[0]
  for (const violation of violations) {
    if (rowIndexOf(violation) < rowIndexOf(first)) first = violation
  }
  return first
}
