/**
 * Load Pipeline
 *
 * Runs one stage per entity. A stage waits on the completion signal of every
 * entity it references before validating anything, so a dependency's key set
 * is complete and read-only by the time dependents probe it. Independent
 * entities (part and region, say) load concurrently, and the rows of one
 * batch are checked in chunks that run as separate tasks.
 *
 * A stage that fails signals failure to its dependents, which then fail with
 * OutOfOrderLoad instead of validating against a missing target.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises'
import type { EntityName } from '../datasets'
import type { Candidate } from './catalog'
import { ChunkSizeSchema } from './config'
import { OutOfOrderLoad } from './errors'
import type { ChunkResult, ReferentialGraph } from './graph'
import { silentLogger, type LoadLogger } from './logger'

// ============================================================================
// Types
// ============================================================================

/**
 * Supplies the complete batch for one entity.
 */
export type BatchProducer = (entity: EntityName) => Promise<readonly Candidate[]>

export type StageStatus = 'loaded' | 'rejected'

export interface StageReport {
  entity: EntityName
  status: StageStatus
  rowCount: number
  durationMs: number
  error?: Error
}

export interface LoadResult {
  ok: boolean
  // In load order
  stages: StageReport[]
  durationMs: number
  // First failure in load order
  error?: Error
}

export interface LoadOptions {
  logger?: LoadLogger
  // Defaults to the graph's configured chunk size
  chunkSize?: number
}

type StageOutcome = { ok: true } | { ok: false; error: Error }

/**
 * One-shot completion signal. Settles once and never rejects, so waiting on a
 * failed stage cannot produce an unhandled rejection.
 */
class CompletionSignal {
  readonly done: Promise<StageOutcome>
  private settle: (outcome: StageOutcome) => void = () => {}

  constructor() {
    this.done = new Promise(resolve => {
      this.settle = resolve
    })
  }

  complete(): void {
    this.settle({ ok: true })
  }

  fail(error: Error): void {
    this.settle({ ok: false, error })
  }
}

// ============================================================================
// Pipeline
// ============================================================================

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

type Fetched = { ok: true; rows: readonly Candidate[] } | { ok: false; error: Error }

// Starts the producer right away and keeps its failure as a value until the
// stage is ready to look at it
function fetchBatch(producer: BatchProducer, entity: EntityName): Promise<Fetched> {
  return Promise.resolve()
    .then(() => producer(entity))
    .then(
      (rows): Fetched => ({ ok: true, rows }),
      (error: unknown): Fetched => ({ ok: false, error: toError(error) })
    )
}

/**
 * Validate one entity's batch in concurrent chunks and commit it.
 */
export async function loadEntity<E extends EntityName>(
  graph: ReferentialGraph,
  entity: E,
  rows: readonly Candidate[],
  chunkSize: number = graph.config.chunkSize
): Promise<number> {
  graph.assertLoadable(entity)
  ChunkSizeSchema.parse(chunkSize)

  const pending: Promise<ChunkResult<E>>[] = []
  for (let offset = 0; offset < rows.length; offset += chunkSize) {
    const chunk = rows.slice(offset, offset + chunkSize)
    pending.push(
      yieldToEventLoop().then(() => graph.checkChunk(entity, chunk, offset, 1))
    )
  }

  const results = await Promise.all(pending)
  return graph.commit(entity, results).rowCount
}

/**
 * Load every entity the producer supplies, honouring the dependency barrier.
 */
export async function loadDataset(
  graph: ReferentialGraph,
  producer: BatchProducer,
  options: LoadOptions = {}
): Promise<LoadResult> {
  const logger = options.logger ?? silentLogger
  const chunkSize = options.chunkSize ?? graph.config.chunkSize
  const order = graph.loadOrder()
  const signals = new Map(order.map((entity): [EntityName, CompletionSignal] => [entity, new CompletionSignal()]))
  const started = Date.now()

  const signalOf = (entity: EntityName): CompletionSignal => {
    const signal = signals.get(entity)
    if (!signal) throw new Error(`No stage for ${entity}`)
    return signal
  }

  const runStage = async (entity: EntityName): Promise<StageReport> => {
    const signal = signalOf(entity)
    const stageStart = Date.now()
    const fetched = fetchBatch(producer, entity)

    try {
      for (const dep of graph.dependenciesOf(entity)) {
        const outcome = await signalOf(dep).done
        if (!outcome.ok) throw new OutOfOrderLoad(entity, dep)
      }

      const batch = await fetched
      if (!batch.ok) throw batch.error
      const rows = batch.rows
      logger.debug(`${entity}: validating ${rows.length} rows`)
      const rowCount = await loadEntity(graph, entity, rows, chunkSize)
      signal.complete()

      const durationMs = Date.now() - stageStart
      logger.info(`${entity}: ${rowCount.toLocaleString()} rows (${durationMs}ms)`)
      return { entity, status: 'loaded', rowCount, durationMs }
    } catch (caught) {
      const error = toError(caught)
      signal.fail(error)
      logger.error(`${entity}: ${error.message}`, error)
      return { entity, status: 'rejected', rowCount: 0, durationMs: Date.now() - stageStart, error }
    }
  }

  const stages = await Promise.all(order.map(runStage))
  const failed = stages.find(stage => stage.status === 'rejected')

  return {
    ok: failed === undefined,
    stages,
    durationMs: Date.now() - started,
    error: failed?.error,
  }
}
