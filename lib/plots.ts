import { numericValues } from './analyzer'
import type { AnalysisResult, HistogramBin, PlotPayload, PlotType, Table } from './types'

export const MAX_HISTOGRAM_BINS = 10
export const MAX_SCATTER_POINTS = 500

export interface PlotRequest {
  type: PlotType
  columns: string[]
}

// Checked in order; the first match wins
const PLOT_KEYWORDS: Array<[PlotType, RegExp]> = [
  ['heatmap', /\bheat[- ]?maps?\b|\bcorrelation matri(x|ces)\b/i],
  ['scatter', /\bscatter/i],
  ['box', /\bbox[- ]?(plots?|and[- ]whiskers?)\b|\bboxplots?\b/i],
  ['histogram', /\bhistograms?\b|\bdistributions?\b/i],
  ['bar', /\bbar[- ]?(charts?|graphs?|plots?)\b|\bfrequenc(y|ies)\b/i],
]

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/** Column names that appear in the question, in the order they appear */
export function mentionedColumns(question: string, columns: string[]): string[] {
  const hits: Array<{ name: string; index: number }> = []
  for (const name of columns) {
    const pattern = new RegExp(`(^|[^\\p{L}\\p{N}_])${escapeRegExp(name)}(?=$|[^\\p{L}\\p{N}_])`, 'iu')
    const match = pattern.exec(question)
    if (match) hits.push({ name, index: match.index + match[1].length })
  }
  return hits.sort((a, b) => a.index - b.index).map(h => h.name)
}

function pick(mentioned: string[], pool: string[], count: number): string[] {
  const chosen = mentioned.filter(c => pool.includes(c))
  for (const c of pool) {
    if (chosen.length >= count) break
    if (!chosen.includes(c)) chosen.push(c)
  }
  return chosen.slice(0, count)
}

/**
 * Decide whether a chat question asks for a plot and which columns it is about.
 * Columns the question names are preferred; otherwise the first suitable columns are used.
 */
export function detectPlotRequest(question: string, analysis: AnalysisResult): PlotRequest | null {
  const match = PLOT_KEYWORDS.find(([, pattern]) => pattern.test(question))
  if (!match) return null
  const type = match[0]

  const mentioned = mentionedColumns(question, analysis.columnNames)
  const numeric = analysis.numericColumns
  const categorical = analysis.categoricalColumns

  switch (type) {
    case 'heatmap':
      return numeric.length >= 2 ? { type, columns: [...numeric] } : null
    case 'scatter': {
      const columns = pick(mentioned, numeric, 2)
      return columns.length === 2 ? { type, columns } : null
    }
    case 'box':
    case 'histogram': {
      const columns = pick(mentioned, numeric, 1)
      return columns.length === 1 ? { type, columns } : null
    }
    case 'bar': {
      const columns = pick(mentioned, categorical, 1)
      return columns.length === 1 ? { type, columns } : null
    }
  }
}

// ========== 빌더 ==========

/** Equal-width bins between min and max. Sturges' rule, capped at `maxBins`. */
export function histogramBins(values: number[], maxBins = MAX_HISTOGRAM_BINS): HistogramBin[] {
  if (values.length === 0) return []
  const bins = Math.max(1, Math.min(maxBins, Math.ceil(Math.log2(values.length)) + 1))
  let min = values[0]
  let max = values[0]
  for (const v of values) {
    if (v < min) min = v
    if (v > max) max = v
  }
  const width = (max - min) || 1
  const edges = Array.from({ length: bins + 1 }, (_, i) => min + (i * width) / bins)
  const counts: number[] = Array(bins).fill(0)
  for (const v of values) {
    const idx = Math.min(bins - 1, Math.max(0, Math.floor(((v - min) / width) * bins)))
    counts[idx]++
  }
  return counts.map((count, i) => ({ start: edges[i], end: edges[i + 1], count }))
}

function columnNumbers(table: Table, name: string): Array<number | null> {
  const column = table.columns.find(c => c.name === name)
  return column && column.kind === 'numeric' ? numericValues(column) : []
}

function present(values: Array<number | null>): number[] {
  return values.filter((v): v is number => v !== null)
}

/** Build the payload for a detected request. null when the data cannot support it. */
export function buildPlot(request: PlotRequest, table: Table, analysis: AnalysisResult): PlotPayload | null {
  switch (request.type) {
    case 'histogram': {
      const [column] = request.columns
      const values = present(columnNumbers(table, column))
      if (values.length === 0) return null
      return { type: 'histogram', title: `Distribution of ${column}`, column, bins: histogramBins(values) }
    }

    case 'box': {
      const [column] = request.columns
      const summary = analysis.columns[column]
      if (!summary || summary.kind !== 'numeric' || !summary.outliers) return null
      const { min, q1, median, q3, max } = summary
      if (min === null || q1 === null || median === null || q3 === null || max === null) return null
      const { lowerBound, upperBound } = summary.outliers
      const outliers = present(columnNumbers(table, column)).filter(v => v < lowerBound || v > upperBound)
      return {
        type: 'box',
        title: `Box plot of ${column}`,
        column,
        stats: { min, q1, median, q3, max, lowerBound, upperBound },
        outliers,
      }
    }

    case 'bar': {
      const [column] = request.columns
      const summary = analysis.columns[column]
      if (!summary || summary.kind !== 'categorical' || summary.topValues.length === 0) return null
      return {
        type: 'bar',
        title: `Top values of ${column}`,
        column,
        data: summary.topValues.map(t => ({ label: t.value, value: t.count })),
      }
    }

    case 'scatter': {
      const [x, y] = request.columns
      const xs = columnNumbers(table, x)
      const ys = columnNumbers(table, y)
      const points: Array<{ x: number; y: number }> = []
      const rows = Math.min(xs.length, ys.length)
      for (let row = 0; row < rows && points.length < MAX_SCATTER_POINTS; row++) {
        const px = xs[row]
        const py = ys[row]
        if (px === null || py === null) continue
        points.push({ x: px, y: py })
      }
      if (points.length === 0) return null
      return { type: 'scatter', title: `${x} vs ${y}`, x, y, points }
    }

    case 'heatmap': {
      const correlations = analysis.correlations
      if (!correlations) return null
      const columns = request.columns.filter(c => correlations.columns.includes(c))
      if (columns.length < 2) return null
      return {
        type: 'heatmap',
        title: 'Correlation heatmap',
        columns,
        matrix: columns.map(a => columns.map(b => correlations.matrix[a]?.[b] ?? null)),
      }
    }
  }
}
