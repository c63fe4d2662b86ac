import { describe, it, expect } from 'vitest'
import { analyze } from '@/lib/analyzer'
import { tableFromColumns } from '@/lib/csv'
import { generateSuggestedQuestions, MAX_SUGGESTIONS } from '@/lib/suggestions'
import type { AnalysisResult, Table } from '@/lib/types'

function analysisOf(table: Table): AnalysisResult {
  const outcome = analyze(table)
  if (!outcome.ok) throw outcome.error
  return outcome.result
}

describe('generateSuggestedQuestions', () => {
  it('should return nothing without an analysis', () => {
    expect(generateSuggestedQuestions(null)).toEqual([])
  })

  it('should prefer plot questions for mixed data', () => {
    const analysis = analysisOf(tableFromColumns({
      region: ['North', 'South'],
      units: [10, 20],
      price: [2.5, 3.5],
    }))
    expect(generateSuggestedQuestions(analysis)).toEqual([
      'Can you show me a box plot of units?',
      'Can you create a histogram of units?',
      'Can you show a scatter plot of units vs price?',
      'Show me a bar chart of region',
    ])
  })

  it('should fill in general questions for a single numeric column', () => {
    const analysis = analysisOf(tableFromColumns({ x: [1, 2, 3] }))
    expect(generateSuggestedQuestions(analysis)).toEqual([
      'Can you show me a box plot of x?',
      'Can you create a histogram of x?',
      'Can you identify any outliers in the data?',
      'Can you summarize this dataset?',
    ])
  })

  it('should handle categorical-only data', () => {
    const analysis = analysisOf(tableFromColumns({ city: ['NY', 'LA'] }))
    expect(generateSuggestedQuestions(analysis)).toEqual([
      'Show me a bar chart of city',
      'Can you summarize this dataset?',
      'Which columns have missing values?',
    ])
  })

  it('should never return more than the limit', () => {
    const analysis = analysisOf(tableFromColumns({ a: [1, 2], b: [2, 1], c: ['x', 'y'] }))
    expect(generateSuggestedQuestions(analysis).length).toBeLessThanOrEqual(MAX_SUGGESTIONS)
  })
})
