/**
 * Access Structures
 *
 * Secondary indexes declared by the TPC-H tables, and in-memory projections
 * of them over a loaded graph. An index owns no data: it maps key values to
 * row positions of the entity it governs and can be rebuilt at any time.
 * Lookups return exactly the rows a full scan with the same filter returns.
 */

import { ENTITY_NAMES, type EntityName, type TpchRecords } from '../datasets'
import { keyTuple, tableFor } from './catalog'
import { IndexBuildError } from './errors'
import type { ReferentialGraph } from './graph'
import { encodeKey, type KeyValue } from './keys'

export interface IndexDefinition {
  name: string
  entity: EntityName
  columns: readonly string[]
  unique: boolean
}

/**
 * Index definitions of one entity, in declaration order.
 */
export function indexSpec(entity: EntityName): IndexDefinition[] {
  const table = tableFor(entity)
  return (table.indexes ?? []).map(idx => ({
    name: idx.name,
    entity,
    columns: idx.columns,
    unique: idx.unique ?? false,
  }))
}

/**
 * Every index definition, entities in load order.
 */
export function allIndexSpecs(): IndexDefinition[] {
  return ENTITY_NAMES.flatMap(entity => indexSpec(entity))
}

export class SecondaryIndex<E extends EntityName = EntityName> {
  private readonly buckets = new Map<string, number[]>()

  constructor(
    readonly entity: E,
    readonly definition: IndexDefinition,
    private readonly rows: readonly TpchRecords[E][]
  ) {
    rows.forEach((row, position) => {
      const key = encodeKey(keyTuple(row, definition.columns))
      const bucket = this.buckets.get(key)
      if (bucket) {
        bucket.push(position)
      } else {
        this.buckets.set(key, [position])
      }
    })
  }

  get name(): string {
    return this.definition.name
  }

  // Number of distinct key values
  get cardinality(): number {
    return this.buckets.size
  }

  positions(...values: KeyValue[]): readonly number[] {
    if (values.length !== this.definition.columns.length) {
      throw new Error(`${this.name} takes ${this.definition.columns.length} key value(s), got ${values.length}`)
    }
    return this.buckets.get(encodeKey(values)) ?? []
  }

  lookup(...values: KeyValue[]): TpchRecords[E][] {
    return this.positions(...values).map(position => this.rows[position])
  }
}

/**
 * Build one declared index over a loaded entity.
 */
export function buildIndex<E extends EntityName>(graph: ReferentialGraph, entity: E, name: string): SecondaryIndex<E> {
  const definition = indexSpec(entity).find(idx => idx.name === name)
  if (!definition) {
    throw new IndexBuildError(entity, name, 'no such index on this entity')
  }
  if (!graph.isRegistered(entity)) {
    throw new IndexBuildError(entity, name, 'entity is not loaded')
  }
  return new SecondaryIndex(entity, definition, graph.rowsOf(entity))
}

/**
 * Rebuild every declared index. Called once a load completes, since loaded
 * data is immutable.
 */
export function buildIndexes(graph: ReferentialGraph): Map<string, SecondaryIndex> {
  const indexes = new Map<string, SecondaryIndex>()
  for (const definition of allIndexSpecs()) {
    indexes.set(definition.name, buildIndex(graph, definition.entity, definition.name))
  }
  return indexes
}
