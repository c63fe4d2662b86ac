import type { AnalysisResult } from './types'

function fmt(value: number | null): string {
  return value === null ? '—' : value.toFixed(2)
}

function cell(text: string): string {
  return text.replace(/\|/g, '\\|')
}

/** Markdown report of an analysis, shown in the chat right after upload */
export function buildAnalysisMarkdown(result: AnalysisResult): string {
  const lines: string[] = []

  lines.push(`## Analysis of ${result.filename || 'uploaded file'}`)
  lines.push('')
  lines.push('| Metric | Value |')
  lines.push('| --- | --- |')
  lines.push(`| Rows | ${result.totalRows} |`)
  lines.push(`| Columns | ${result.totalColumns} |`)
  lines.push(`| Numeric columns | ${result.numericColumns.length} |`)
  lines.push(`| Categorical columns | ${result.categoricalColumns.length} |`)

  if (result.numericColumns.length > 0) {
    lines.push('')
    lines.push('### Numeric columns')
    lines.push('')
    lines.push('| Column | Mean | Median | Std |')
    lines.push('| --- | --- | --- | --- |')
    for (const name of result.numericColumns) {
      const summary = result.columns[name]
      if (summary?.kind !== 'numeric') continue
      lines.push(`| ${cell(name)} | ${fmt(summary.mean)} | ${fmt(summary.median)} | ${fmt(summary.std)} |`)
    }
  }

  if (result.categoricalColumns.length > 0) {
    lines.push('')
    lines.push('### Categorical columns')
    lines.push('')
    lines.push('| Column | Unique values | Missing % |')
    lines.push('| --- | --- | --- |')
    for (const name of result.categoricalColumns) {
      const summary = result.columns[name]
      if (summary?.kind !== 'categorical') continue
      lines.push(`| ${cell(name)} | ${summary.uniqueValues} | ${summary.missingPercentage.toFixed(1)}% |`)
    }
  }

  if (result.warnings.length > 0) {
    lines.push('')
    lines.push(`_${result.warnings.length} value(s) could not be read as finite numbers and were treated as missing._`)
  }

  return lines.join('\n')
}
