import type { AnalysisResult } from './types'

export const MAX_SUGGESTIONS = 4

/** Follow-up questions built from the file's column names */
export function generateSuggestedQuestions(analysis: AnalysisResult | null): string[] {
  if (!analysis) return []

  const [n0, n1] = analysis.numericColumns
  const [c0] = analysis.categoricalColumns
  const questions: string[] = []

  if (n0) {
    questions.push(`Can you show me a box plot of ${n0}?`)
    questions.push(`Can you create a histogram of ${n0}?`)
  }
  if (n0 && n1) {
    questions.push(`Can you show a scatter plot of ${n0} vs ${n1}?`)
  }
  if (c0) {
    questions.push(`Show me a bar chart of ${c0}`)
  }
  if (n0 && n1) {
    questions.push('What are the correlations between variables?')
  }
  if (n0) {
    questions.push('Can you identify any outliers in the data?')
  }

  questions.push('Can you summarize this dataset?')
  questions.push('Which columns have missing values?')

  return questions.slice(0, MAX_SUGGESTIONS)
}
