/**
 * Integrity Error Taxonomy
 *
 * Every violation the catalog or the referential graph detects is one of these
 * classes. All of them are deterministic data-quality failures: none is
 * retryable, and each carries enough context (entity, row, rule) to find the
 * offending input.
 *
 * Error Hierarchy:
 * - IntegrityError (base class)
 *   - AttributeViolation (type, width, precision, enumeration, sign)
 *   - UniquenessViolation (duplicate primary or composite key)
 *   - DanglingReference (foreign key with no matching target row)
 *   - OutOfOrderLoad (entity loaded before one of its dependencies)
 *   - DuplicateLoad (entity loaded twice without a reset)
 *   - BusinessRuleViolation (optional strict rules)
 *   - IndexBuildError (access structure over an unloaded entity)
 */

// =============================================================================
// Error Codes
// =============================================================================

export enum IntegrityErrorCode {
  ATTRIBUTE_VIOLATION = 'ATTRIBUTE_VIOLATION',
  UNIQUENESS_VIOLATION = 'UNIQUENESS_VIOLATION',
  DANGLING_REFERENCE = 'DANGLING_REFERENCE',
  OUT_OF_ORDER_LOAD = 'OUT_OF_ORDER_LOAD',
  DUPLICATE_LOAD = 'DUPLICATE_LOAD',
  BUSINESS_RULE_VIOLATION = 'BUSINESS_RULE_VIOLATION',
  INDEX_BUILD_ERROR = 'INDEX_BUILD_ERROR',
}

/**
 * Where a violation was found inside a batch.
 */
export interface RowLocation {
  // Position in the submitted batch
  rowIndex?: number
  // Primary key of the row, when it could be decoded
  rowKey?: string
}

export interface SerializedIntegrityError {
  name: string
  code: IntegrityErrorCode
  message: string
  entity: string
  context: Record<string, unknown>
}

// =============================================================================
// Base Error Class
// =============================================================================

export abstract class IntegrityError extends Error {
  abstract readonly code: IntegrityErrorCode

  constructor(
    message: string,
    readonly entity: string
  ) {
    super(message)
    this.name = new.target.name
  }

  protected abstract details(): Record<string, unknown>

  toJSON(): SerializedIntegrityError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      entity: this.entity,
      context: this.details(),
    }
  }
}

function describeRow(location: RowLocation): string {
  if (location.rowKey !== undefined) return ` (row ${location.rowKey})`
  if (location.rowIndex !== undefined) return ` (row #${location.rowIndex})`
  return ''
}

// =============================================================================
// Entity Catalog
// =============================================================================

export type AttributeRule =
  | 'required'
  | 'type'
  | 'width'
  | 'precision'
  | 'enum'
  | 'non-negative'
  | 'date'
  | 'unknown-attribute'

export class AttributeViolation extends IntegrityError {
  readonly code = IntegrityErrorCode.ATTRIBUTE_VIOLATION

  constructor(
    entity: string,
    readonly attribute: string,
    readonly rule: AttributeRule,
    readonly value: unknown,
    readonly detail: string,
    readonly location: RowLocation = {}
  ) {
    super(`${entity}.${attribute}${describeRow(location)}: ${detail}`, entity)
  }

  /**
   * Same violation, pinned to a row of a batch.
   */
  at(location: RowLocation): AttributeViolation {
    return new AttributeViolation(this.entity, this.attribute, this.rule, this.value, this.detail, {
      ...this.location,
      ...location,
    })
  }

  protected details(): Record<string, unknown> {
    return {
      attribute: this.attribute,
      rule: this.rule,
      value: typeof this.value === 'bigint' ? this.value.toString() : this.value,
      ...this.location,
    }
  }
}

// =============================================================================
// Referential Graph
// =============================================================================

export class UniquenessViolation extends IntegrityError {
  readonly code = IntegrityErrorCode.UNIQUENESS_VIOLATION

  constructor(
    entity: string,
    readonly key: string,
    readonly columns: readonly string[],
    readonly rowIndex: number,
    readonly firstRowIndex: number
  ) {
    super(
      `${entity}: duplicate key ${key} on (${columns.join(', ')}) at row #${rowIndex}, first seen at row #${firstRowIndex}`,
      entity
    )
  }

  protected details(): Record<string, unknown> {
    return {
      key: this.key,
      columns: this.columns,
      rowIndex: this.rowIndex,
      firstRowIndex: this.firstRowIndex,
    }
  }
}

export class DanglingReference extends IntegrityError {
  readonly code = IntegrityErrorCode.DANGLING_REFERENCE

  constructor(
    entity: string,
    // Foreign-key value (or tuple) with no target
    readonly key: string,
    readonly targetEntity: string,
    // Referenced key columns of the target entity
    readonly targetKey: string,
    readonly columns: readonly string[],
    readonly location: RowLocation = {}
  ) {
    super(
      `${entity}${describeRow(location)}: ${columns.join(', ')} = ${key} has no matching ${targetEntity}.${targetKey}`,
      entity
    )
  }

  at(location: RowLocation): DanglingReference {
    return new DanglingReference(this.entity, this.key, this.targetEntity, this.targetKey, this.columns, {
      ...this.location,
      ...location,
    })
  }

  protected details(): Record<string, unknown> {
    return {
      key: this.key,
      targetEntity: this.targetEntity,
      targetKey: this.targetKey,
      columns: this.columns,
      ...this.location,
    }
  }
}

export class OutOfOrderLoad extends IntegrityError {
  readonly code = IntegrityErrorCode.OUT_OF_ORDER_LOAD

  constructor(
    entity: string,
    readonly missingDependency: string
  ) {
    super(`${entity} cannot be loaded before ${missingDependency}`, entity)
  }

  protected details(): Record<string, unknown> {
    return { missingDependency: this.missingDependency }
  }
}

export class DuplicateLoad extends IntegrityError {
  readonly code = IntegrityErrorCode.DUPLICATE_LOAD

  constructor(entity: string) {
    super(`${entity} is already loaded; reset the graph to reload it`, entity)
  }

  protected details(): Record<string, unknown> {
    return {}
  }
}

export type BusinessRule = 'ship-date-order' | 'total-price'

export class BusinessRuleViolation extends IntegrityError {
  readonly code = IntegrityErrorCode.BUSINESS_RULE_VIOLATION

  constructor(
    entity: string,
    readonly rule: BusinessRule,
    readonly detail: string,
    readonly location: RowLocation = {}
  ) {
    super(`${entity}${describeRow(location)}: ${rule}: ${detail}`, entity)
  }

  protected details(): Record<string, unknown> {
    return { rule: this.rule, detail: this.detail, ...this.location }
  }
}

// =============================================================================
// Access Structures
// =============================================================================

export class IndexBuildError extends IntegrityError {
  readonly code = IntegrityErrorCode.INDEX_BUILD_ERROR

  constructor(
    entity: string,
    readonly index: string,
    reason: string
  ) {
    super(`Cannot build ${index} on ${entity}: ${reason}`, entity)
  }

  protected details(): Record<string, unknown> {
    return { index: this.index }
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isIntegrityError(error: unknown): error is IntegrityError {
  return error instanceof IntegrityError
}

/**
 * Violations that reject a row batch (as opposed to load-sequencing errors).
 */
export type RowViolation =
  | AttributeViolation
  | UniquenessViolation
  | DanglingReference
  | BusinessRuleViolation

export function isRowViolation(error: unknown): error is RowViolation {
  return (
    error instanceof AttributeViolation ||
    error instanceof UniquenessViolation ||
    error instanceof DanglingReference ||
    error instanceof BusinessRuleViolation
  )
}
