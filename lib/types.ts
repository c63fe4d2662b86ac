// ========== Table ==========

export type ColumnKind = 'numeric' | 'categorical'

/** A cell after loading: trimmed text, or null when missing */
export type Cell = string | null

export interface TableColumn {
  name: string
  kind: ColumnKind
  values: Cell[]
}

export interface Table {
  columns: TableColumn[]
  rowCount: number
}

// ========== Column Summaries ==========

export interface OutlierSummary {
  totalOutliers: number
  percentageOutliers: number
  lowerBound: number
  upperBound: number
}

export interface NumericColumnSummary {
  kind: 'numeric'
  count: number
  mean: number | null
  median: number | null
  std: number | null
  min: number | null
  max: number | null
  q1: number | null
  q3: number | null
  missing: number
  missingPercentage: number
  outliers?: OutlierSummary
}

export interface TopValue {
  value: string
  count: number
}

export interface CategoricalColumnSummary {
  kind: 'categorical'
  uniqueValues: number
  topValues: TopValue[]
  missing: number
  missingPercentage: number
}

export type ColumnSummary = NumericColumnSummary | CategoricalColumnSummary

// ========== Correlation ==========

export interface CorrelationPair {
  column1: string
  column2: string
  correlation: number
}

export interface CorrelationSummary {
  columns: string[]
  matrix: Record<string, Record<string, number | null>>
  topCorrelations: CorrelationPair[]
}

// ========== Analysis ==========

export interface TypeCoercionWarning {
  column: string
  /** 0-based data row index */
  row: number
  value: string
}

export interface AnalysisResult {
  filename: string
  totalRows: number
  totalColumns: number
  columnNames: string[]
  numericColumns: string[]
  categoricalColumns: string[]
  columns: Record<string, ColumnSummary>
  correlations?: CorrelationSummary
  sample: Record<string, Cell>[]
  warnings: TypeCoercionWarning[]
}

// ========== Stored Files ==========

export interface StoredFile {
  id: string
  userId: string
  filename: string
  storageKey: string
  fileType: string
  size: number
  totalRows: number
  totalColumns: number
  numericColumns: string[]
  categoricalColumns: string[]
  uploadedAt: string
  analysis: AnalysisResult | null
}

// ========== Plots ==========

export interface HistogramBin {
  start: number
  end: number
  count: number
}

export type PlotPayload =
  | { type: 'histogram'; title: string; column: string; bins: HistogramBin[] }
  | {
      type: 'box'
      title: string
      column: string
      stats: { min: number; q1: number; median: number; q3: number; max: number; lowerBound: number; upperBound: number }
      outliers: number[]
    }
  | { type: 'bar'; title: string; column: string; data: Array<{ label: string; value: number }> }
  | { type: 'scatter'; title: string; x: string; y: string; points: Array<{ x: number; y: number }> }
  | { type: 'heatmap'; title: string; columns: string[]; matrix: Array<Array<number | null>> }

export type PlotType = PlotPayload['type']

// ========== Chat ==========

export interface ChatMessage {
  role: 'user' | 'assistant'
  content: string
}

export interface ChatResponse {
  reply: string
  plot?: PlotPayload
  suggestedQuestions: string[]
}

// ========== API ==========

export interface ApiResponse<T = unknown> {
  data?: T
  error?: string
}

export interface UploadResult {
  file: StoredFile
  analysis: AnalysisResult
  summary: string
  suggestedQuestions: string[]
}
