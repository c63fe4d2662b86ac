import { loadTable, parseNumber } from './csv'
import { EmptyTableError, ParseError, type AnalysisError } from './errors'
import type {
  AnalysisResult,
  CategoricalColumnSummary,
  Cell,
  ColumnSummary,
  CorrelationPair,
  CorrelationSummary,
  NumericColumnSummary,
  OutlierSummary,
  Table,
  TableColumn,
  TopValue,
  TypeCoercionWarning,
} from './types'

export const TOP_VALUES_LIMIT = 10
export const TOP_CORRELATIONS_LIMIT = 5
export const SAMPLE_ROWS = 5
export const IQR_MULTIPLIER = 1.5

export interface AnalyzeOptions {
  filename?: string
  topValues?: number
  topCorrelations?: number
  sampleRows?: number
}

export type AnalysisOutcome =
  | { ok: true; result: AnalysisResult }
  | { ok: false; error: AnalysisError }

// ========== 기초 통계 ==========

/** Linear interpolation between order statistics (R-7). `sorted` must be ascending and non-empty. */
export function quantile(sorted: number[], q: number): number {
  const pos = (sorted.length - 1) * q
  const lo = Math.floor(pos)
  const hi = Math.ceil(pos)
  return sorted[lo] + (pos - lo) * (sorted[hi] - sorted[lo])
}

export function mean(nums: number[]): number {
  return nums.reduce((a, b) => a + b, 0) / nums.length
}

/** Sample standard deviation (n - 1). null below two values. */
export function sampleStd(nums: number[]): number | null {
  if (nums.length < 2) return null
  const m = mean(nums)
  const ss = nums.reduce((acc, n) => acc + (n - m) ** 2, 0)
  return Math.sqrt(ss / (nums.length - 1))
}

/** Pearson coefficient over paired values. null below two pairs or when either side is constant. */
export function pearson(xs: number[], ys: number[]): number | null {
  const n = xs.length
  if (n < 2) return null
  const mx = mean(xs)
  const my = mean(ys)
  let sxy = 0
  let sxx = 0
  let syy = 0
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - mx
    const dy = ys[i] - my
    sxy += dx * dy
    sxx += dx * dx
    syy += dy * dy
  }
  if (sxx === 0 || syy === 0) return null
  const r = sxy / Math.sqrt(sxx * syy)
  return Math.max(-1, Math.min(1, r))
}

// ========== 수치형 컬럼 ==========

/**
 * Row-aligned numeric values of a numeric column. Missing cells are null, and so are
 * numeric-shaped values that are not finite; those also produce a warning.
 */
export function numericValues(column: TableColumn, warnings?: TypeCoercionWarning[]): Array<number | null> {
  return column.values.map((cell, row) => {
    if (cell === null) return null
    const n = parseNumber(cell)
    if (!Number.isFinite(n)) {
      warnings?.push({ column: column.name, row, value: cell })
      return null
    }
    return n
  })
}

function detectOutliers(nums: number[], q1: number, q3: number, totalRows: number): OutlierSummary {
  const iqr = q3 - q1
  const lowerBound = q1 - IQR_MULTIPLIER * iqr
  const upperBound = q3 + IQR_MULTIPLIER * iqr
  const totalOutliers = nums.filter(n => n < lowerBound || n > upperBound).length
  return {
    totalOutliers,
    percentageOutliers: (totalOutliers / totalRows) * 100,
    lowerBound,
    upperBound,
  }
}

export function summarizeNumeric(values: Array<number | null>, totalRows: number): NumericColumnSummary {
  const nums = values.filter((v): v is number => v !== null)
  const missing = totalRows - nums.length
  const missingPercentage = (missing / totalRows) * 100

  if (nums.length === 0) {
    return {
      kind: 'numeric',
      count: 0,
      mean: null,
      median: null,
      std: null,
      min: null,
      max: null,
      q1: null,
      q3: null,
      missing,
      missingPercentage,
    }
  }

  const sorted = [...nums].sort((a, b) => a - b)
  const q1 = quantile(sorted, 0.25)
  const q3 = quantile(sorted, 0.75)

  return {
    kind: 'numeric',
    count: nums.length,
    mean: mean(nums),
    median: quantile(sorted, 0.5),
    std: sampleStd(nums),
    min: sorted[0],
    max: sorted[sorted.length - 1],
    q1,
    q3,
    missing,
    missingPercentage,
    outliers: detectOutliers(nums, q1, q3, totalRows),
  }
}

// ========== 범주형 컬럼 ==========

export function summarizeCategorical(
  values: Cell[],
  totalRows: number,
  limit = TOP_VALUES_LIMIT
): CategoricalColumnSummary {
  const freq = new Map<string, number>()
  let missing = 0
  for (const v of values) {
    if (v === null) {
      missing++
      continue
    }
    freq.set(v, (freq.get(v) ?? 0) + 1)
  }

  // Map keeps first-seen order and sort is stable, so ties stay in first-seen order
  const topValues: TopValue[] = [...freq.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([value, count]) => ({ value, count }))

  return {
    kind: 'categorical',
    uniqueValues: freq.size,
    topValues,
    missing,
    missingPercentage: (missing / totalRows) * 100,
  }
}

// ========== 상관관계 ==========

export function analyzeCorrelations(
  numeric: Array<{ name: string; values: Array<number | null> }>,
  limit = TOP_CORRELATIONS_LIMIT
): CorrelationSummary | undefined {
  if (numeric.length < 2) return undefined

  const names = numeric.map(c => c.name)
  const grid: Array<Array<number | null>> = names.map(() => names.map(() => null))
  const pairs: CorrelationPair[] = []

  for (let i = 0; i < numeric.length; i++) {
    const own = numeric[i].values.filter((v): v is number => v !== null)
    grid[i][i] = pearson(own, own) === null ? null : 1

    for (let j = i + 1; j < numeric.length; j++) {
      const xs: number[] = []
      const ys: number[] = []
      const a = numeric[i].values
      const b = numeric[j].values
      for (let row = 0; row < a.length; row++) {
        const x = a[row]
        const y = b[row]
        if (x === null || y === null) continue
        xs.push(x)
        ys.push(y)
      }
      const r = pearson(xs, ys)
      grid[i][j] = r
      grid[j][i] = r
      if (r !== null) {
        pairs.push({ column1: names[i], column2: names[j], correlation: r })
      }
    }
  }

  const matrix = Object.fromEntries(
    names.map((name, i) => [name, Object.fromEntries(names.map((other, j) => [other, grid[i][j]]))])
  )

  const topCorrelations = pairs
    .sort((p, q) => Math.abs(q.correlation) - Math.abs(p.correlation))
    .slice(0, limit)

  return { columns: names, matrix, topCorrelations }
}

// ========== 분석 진입점 ==========

/**
 * Summarize every column of a table and correlate its numeric columns.
 * Pure: the result depends only on `table` and `options`.
 */
export function analyze(table: Table, options: AnalyzeOptions = {}): AnalysisOutcome {
  if (table.columns.length === 0) {
    return { ok: false, error: new EmptyTableError('No columns to parse from file') }
  }
  if (table.rowCount === 0) {
    return { ok: false, error: new EmptyTableError('File contains a header but no data rows') }
  }

  const totalRows = table.rowCount
  const warnings: TypeCoercionWarning[] = []
  const summaries: Array<[string, ColumnSummary]> = []
  const numeric: Array<{ name: string; values: Array<number | null> }> = []

  for (const column of table.columns) {
    if (column.kind === 'numeric') {
      const values = numericValues(column, warnings)
      numeric.push({ name: column.name, values })
      summaries.push([column.name, summarizeNumeric(values, totalRows)])
    } else {
      summaries.push([column.name, summarizeCategorical(column.values, totalRows, options.topValues)])
    }
  }

  const sampleRows = Math.min(options.sampleRows ?? SAMPLE_ROWS, totalRows)
  const sample = Array.from({ length: sampleRows }, (_, row) =>
    Object.fromEntries(table.columns.map(c => [c.name, c.values[row]]))
  )

  const result: AnalysisResult = {
    filename: options.filename ?? '',
    totalRows,
    totalColumns: table.columns.length,
    columnNames: table.columns.map(c => c.name),
    numericColumns: table.columns.filter(c => c.kind === 'numeric').map(c => c.name),
    categoricalColumns: table.columns.filter(c => c.kind === 'categorical').map(c => c.name),
    columns: Object.fromEntries(summaries),
    sample,
    warnings,
  }

  const correlations = analyzeCorrelations(numeric, options.topCorrelations)
  if (correlations) result.correlations = correlations

  return { ok: true, result }
}

/** Decode CSV content and analyze it, folding a ParseError into the outcome */
export function analyzeCsv(content: string | Uint8Array, options: AnalyzeOptions = {}): AnalysisOutcome {
  let table: Table
  try {
    table = loadTable(content)
  } catch (err) {
    if (err instanceof ParseError) return { ok: false, error: err }
    throw err
  }
  return analyze(table, options)
}
