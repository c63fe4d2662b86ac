import { describe, it, expect } from 'vitest'
import { analyze, analyzeCsv } from '@/lib/analyzer'
import { tableFromColumns } from '@/lib/csv'
import { buildAnalysisMarkdown } from '@/lib/report'
import { readFixture } from '../helpers/fixtures'

describe('buildAnalysisMarkdown', () => {
  it('should render overview, numeric and categorical tables', () => {
    const outcome = analyzeCsv(readFixture('sales.csv'), { filename: 'sales.csv' })
    if (!outcome.ok) throw outcome.error

    const lines = buildAnalysisMarkdown(outcome.result).split('\n')
    expect(lines[0]).toBe('## Analysis of sales.csv')
    expect(lines).toContain('| Rows | 5 |')
    expect(lines).toContain('| Columns | 4 |')
    expect(lines).toContain('| Numeric columns | 2 |')
    expect(lines).toContain('| Categorical columns | 2 |')
    expect(lines).toContain('| units | 25.00 | 25.00 | 12.91 |')
    expect(lines).toContain('| price | 4.50 | 4.50 | 1.58 |')
    expect(lines).toContain('| region | 3 | 0.0% |')
    expect(lines).toContain('| product | 3 | 0.0% |')
  })

  it('should show a dash for statistics that do not exist', () => {
    const outcome = analyze(tableFromColumns({ v: [7] }), { filename: 'one.csv' })
    if (!outcome.ok) throw outcome.error

    const markdown = buildAnalysisMarkdown(outcome.result)
    expect(markdown.split('\n')).toContain('| v | 7.00 | 7.00 | — |')
    expect(markdown).not.toContain('### Categorical columns')
  })

  it('should mention values treated as missing', () => {
    const outcome = analyze(tableFromColumns({ v: ['1', 'inf'] }), { filename: 'inf.csv' })
    if (!outcome.ok) throw outcome.error

    const lines = buildAnalysisMarkdown(outcome.result).split('\n')
    expect(lines[lines.length - 1]).toBe('_1 value(s) could not be read as finite numbers and were treated as missing._')
  })

  it('should escape pipes in column names', () => {
    const outcome = analyze(tableFromColumns({ 'a|b': ['x', 'y'] }), { filename: 'pipe.csv' })
    if (!outcome.ok) throw outcome.error

    expect(buildAnalysisMarkdown(outcome.result).split('\n')).toContain('| a\\|b | 2 | 0.0% |')
  })
})
