import Papa from 'papaparse'
import { ParseError } from './errors'
import type { Cell, ColumnKind, Table, TableColumn } from './types'

// ========== 값 정규화 ==========

const MISSING_TOKENS = new Set([
  '',
  'NA',
  'N/A',
  'n/a',
  'NaN',
  'nan',
  '-NaN',
  '-nan',
  'NULL',
  'null',
  'None',
  '#N/A',
  '#N/A N/A',
  '#NA',
  '<NA>',
  '1.#IND',
  '-1.#IND',
  '1.#QNAN',
  '-1.#QNAN',
])

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/
const INFINITY_PATTERN = /^[+-]?(inf|infinity)$/i

/** Trim a raw field and map NA tokens to null */
export function normalizeCell(raw: string): Cell {
  const trimmed = raw.trim()
  return MISSING_TOKENS.has(trimmed) ? null : trimmed
}

/** Decimal, scientific or infinity literal. Thousands separators and currency symbols do not count. */
export function isNumericLiteral(value: string): boolean {
  return DECIMAL_PATTERN.test(value) || INFINITY_PATTERN.test(value)
}

/** Parse a value that passed isNumericLiteral. Infinity literals and overflowing exponents give ±Infinity. */
export function parseNumber(value: string): number {
  if (INFINITY_PATTERN.test(value)) {
    return value.startsWith('-') ? -Infinity : Infinity
  }
  return Number(value)
}

export function inferKind(values: Cell[]): ColumnKind {
  let seen = 0
  for (const v of values) {
    if (v === null) continue
    if (!isNumericLiteral(v)) return 'categorical'
    seen++
  }
  return seen > 0 ? 'numeric' : 'categorical'
}

// ========== Table 구성 ==========

function uniqueHeaders(raw: string[]): string[] {
  const trimmed = raw.map(h => h.trim())
  // Every spelled-out header keeps its own name, so generated names must avoid all of them
  const reserved = new Set(trimmed.filter(Boolean))
  const taken = new Set<string>()
  return trimmed.map((h, i) => {
    if (h && !taken.has(h)) {
      taken.add(h)
      return h
    }
    const base = h || `Column_${i + 1}`
    let candidate = base
    for (let k = 2; reserved.has(candidate) || taken.has(candidate); k++) {
      candidate = `${base}_${k}`
    }
    taken.add(candidate)
    return candidate
  })
}

export function buildTable(headers: string[], rows: Cell[][]): Table {
  const columns: TableColumn[] = headers.map((name, i) => {
    const values = rows.map(row => row[i] ?? null)
    return { name, kind: inferKind(values), values }
  })
  return { columns, rowCount: rows.length }
}

/**
 * Build a table straight from column arrays. Numbers are stored as their decimal text,
 * so a column given as numbers loads the same way it would from a file.
 */
export function tableFromColumns(data: Record<string, Array<string | number | null>>): Table {
  const entries = Object.entries(data)
  const rowCount = entries.length > 0 ? entries[0][1].length : 0

  const columns: TableColumn[] = entries.map(([name, raw]) => {
    if (raw.length !== rowCount) {
      throw new ParseError(`Column "${name}" has ${raw.length} values, expected ${rowCount}`)
    }
    const values = raw.map(v => (v === null ? null : normalizeCell(String(v))))
    return { name, kind: inferKind(values), values }
  })

  return { columns, rowCount }
}

// ========== CSV 디코딩 ==========

function decode(content: string | Uint8Array): string {
  if (typeof content === 'string') {
    return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content
  }
  try {
    // fatal: invalid UTF-8 throws instead of producing U+FFFD. The BOM is dropped by default.
    return new TextDecoder('utf-8', { fatal: true }).decode(content)
  } catch {
    throw new ParseError('File is not valid UTF-8 text')
  }
}

/**
 * Decode comma-separated text with a required header row into a Table.
 * Throws ParseError on undecodable bytes, broken quoting or rows wider than the header.
 */
export function loadTable(content: string | Uint8Array): Table {
  const text = decode(content)

  const parsed = Papa.parse<string[]>(text, {
    delimiter: ',',
    quoteChar: '"',
    skipEmptyLines: true,
  })

  const quoteError = parsed.errors.find(e => e.type === 'Quotes')
  if (quoteError) {
    throw new ParseError(`Malformed quoting near row ${quoteError.row ?? 0}: ${quoteError.message}`)
  }

  if (parsed.data.length === 0) {
    return { columns: [], rowCount: 0 }
  }

  const [headerRow, ...records] = parsed.data
  const headers = uniqueHeaders(headerRow)

  const rows = records.map((record, i) => {
    if (record.length > headers.length) {
      throw new ParseError(
        `Expected ${headers.length} fields in row ${i + 1}, saw ${record.length}`
      )
    }
    return headers.map((_, col) => (col < record.length ? normalizeCell(record[col]) : null))
  })

  return buildTable(headers, rows)
}
