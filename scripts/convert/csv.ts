/**
 * Read TPC-H tables from CSV
 *
 * Parses the files a `COPY (SELECT * FROM <table>) TO '<table>.csv'
 * (FORMAT CSV, HEADER TRUE)` export writes, one per entity, and feeds them to
 * the load pipeline as candidate batches.
 *
 * Values stay text; the entity catalog does the typing. The one distinction
 * made here is NULL versus empty: an unquoted empty field is NULL, a quoted
 * empty field ("") is the empty string.
 *
 * Files are streamed: the tokenizer takes text in chunks and carries quote
 * and line-break state across chunk boundaries, so no export has to fit in
 * one string.
 *
 * @module scripts/convert/csv
 */

import { createReadStream } from 'node:fs'
import { join } from 'node:path'
import type { EntityName } from '../../datasets'
import type { Candidate } from '../../integrity/catalog'
import type { BatchProducer } from '../../integrity/pipeline'

export type CsvValue = string | null

export interface CsvTable {
  header: string[]
  rows: Record<string, CsvValue>[]
}

export interface CsvOptions {
  delimiter?: string
}

export class CsvFormatError extends Error {
  constructor(
    message: string,
    readonly line: number,
    readonly source?: string
  ) {
    super(source ? `${source}:${line}: ${message}` : `line ${line}: ${message}`)
    this.name = 'CsvFormatError'
  }
}

// ============================================================================
// Parsing
// ============================================================================

interface Field {
  text: string
  quoted: boolean
}

interface CsvRecord {
  line: number
  fields: Field[]
}

/**
 * Splits CSV text into records of raw fields. Quoted fields may hold the
 * delimiter, line breaks and doubled quotes. Text may arrive in any number of
 * chunks; records are returned as soon as they are complete.
 */
class CsvTokenizer {
  private fields: Field[] = []
  private current = ''
  private quoted = false
  private inQuotes = false
  // A quote inside quotes: escaped or closing, decided by the next character
  private quotePending = false
  // A record ended on \r; a following \n belongs to the same break
  private crPending = false
  private line = 1
  private recordLine = 1

  constructor(
    private readonly delimiter: string,
    private readonly source?: string
  ) {}

  push(text: string): CsvRecord[] {
    const records: CsvRecord[] = []
    for (const char of text) {
      this.consume(char, records)
    }
    return records
  }

  end(): CsvRecord[] {
    const records: CsvRecord[] = []
    if (this.quotePending) {
      this.quotePending = false
      this.inQuotes = false
    }
    if (this.inQuotes) {
      throw new CsvFormatError('unterminated quoted field', this.recordLine, this.source)
    }
    if (this.current !== '' || this.quoted || this.fields.length > 0) {
      this.endRecord(records)
    }
    return records
  }

  private consume(char: string, records: CsvRecord[]): void {
    if (this.crPending) {
      this.crPending = false
      if (char === '\n') return
    }

    if (this.quotePending) {
      this.quotePending = false
      if (char === '"') {
        this.current += '"'
        return
      }
      this.inQuotes = false
    } else if (this.inQuotes) {
      if (char === '"') {
        this.quotePending = true
      } else {
        if (char === '\n') this.line++
        this.current += char
      }
      return
    }

    if (char === '"') {
      if (this.current !== '' || this.quoted) {
        throw new CsvFormatError('unexpected quote inside a field', this.line, this.source)
      }
      this.inQuotes = true
      this.quoted = true
    } else if (char === this.delimiter) {
      this.endField()
    } else if (char === '\n' || char === '\r') {
      this.endRecord(records)
      this.crPending = char === '\r'
      this.line++
      this.recordLine = this.line
    } else {
      if (this.quoted) {
        throw new CsvFormatError('text after closing quote', this.line, this.source)
      }
      this.current += char
    }
  }

  private endField(): void {
    this.fields.push({ text: this.current, quoted: this.quoted })
    this.current = ''
    this.quoted = false
  }

  private endRecord(records: CsvRecord[]): void {
    this.endField()
    const fields = this.fields
    this.fields = []
    // A bare line break (blank line) carries no record
    if (fields.length === 1 && fields[0].text === '' && !fields[0].quoted) return
    records.push({ line: this.recordLine, fields })
  }
}

/**
 * Incremental CSV reader: the first record is the header, every later record
 * becomes a row keyed by column name.
 */
export class CsvParser {
  private readonly tokenizer: CsvTokenizer
  private header: string[] | undefined
  private started = false

  constructor(
    options: CsvOptions = {},
    private readonly source?: string
  ) {
    this.tokenizer = new CsvTokenizer(options.delimiter ?? ',', source)
  }

  get columns(): string[] {
    return this.header ?? []
  }

  push(text: string): Record<string, CsvValue>[] {
    let chunk = text
    if (!this.started && chunk.length > 0) {
      this.started = true
      // Strip a UTF-8 byte order mark
      if (chunk.charCodeAt(0) === 0xfeff) chunk = chunk.slice(1)
    }
    return this.toRows(this.tokenizer.push(chunk))
  }

  end(): Record<string, CsvValue>[] {
    const rows = this.toRows(this.tokenizer.end())
    if (!this.header) {
      throw new CsvFormatError('missing header row', 1, this.source)
    }
    return rows
  }

  private toRows(records: readonly CsvRecord[]): Record<string, CsvValue>[] {
    const rows: Record<string, CsvValue>[] = []

    for (const { line, fields } of records) {
      const header = this.header
      if (!header) {
        this.header = this.readHeader(line, fields)
        continue
      }

      if (fields.length !== header.length) {
        throw new CsvFormatError(`expected ${header.length} fields, found ${fields.length}`, line, this.source)
      }
      const row: Record<string, CsvValue> = {}
      header.forEach((name, i) => {
        const field = fields[i]
        row[name] = field.text === '' && !field.quoted ? null : field.text
      })
      rows.push(row)
    }

    return rows
  }

  private readHeader(line: number, fields: readonly Field[]): string[] {
    const header = fields.map(field => field.text)
    const seen = new Set<string>()
    for (const name of header) {
      if (name === '' || seen.has(name)) {
        throw new CsvFormatError(`invalid header column '${name}'`, line, this.source)
      }
      seen.add(name)
    }
    return header
  }
}

/**
 * Parse CSV text with a header row into records keyed by column name.
 *
 * @example
 * ```ts
 * parseCsv('r_regionkey,r_name,r_comment\n0,AFRICA,\n1,AMERICA,""\n')
 * // rows: [{ r_regionkey: '0', r_name: 'AFRICA', r_comment: null },
 * //        { r_regionkey: '1', r_name: 'AMERICA', r_comment: '' }]
 * ```
 */
export function parseCsv(text: string, options: CsvOptions = {}, source?: string): CsvTable {
  const parser = new CsvParser(options, source)
  const rows = parser.push(text)
  rows.push(...parser.end())
  return { header: parser.columns, rows }
}

// ============================================================================
// Files
// ============================================================================

/**
 * Read one table export, streaming it from disk.
 */
export async function readTableCsv(path: string, options: CsvOptions = {}): Promise<Candidate[]> {
  const parser = new CsvParser(options, path)
  const rows: Candidate[] = []

  for await (const chunk of createReadStream(path, { encoding: 'utf8' })) {
    for (const row of parser.push(String(chunk))) rows.push(row)
  }
  for (const row of parser.end()) rows.push(row)

  return rows
}

/**
 * Batch producer over a directory holding `<entity>.csv` for each entity.
 */
export function csvProducer(dir: string, options: CsvOptions = {}): BatchProducer {
  return (entity: EntityName) => readTableCsv(join(dir, `${entity}.csv`), options)
}
