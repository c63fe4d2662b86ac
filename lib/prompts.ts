export const FORMATTING_RULES = `IMPORTANT FORMATTING INSTRUCTIONS:
1. Always present data and statistics in well-formatted Markdown tables.
2. Use tables for:
   - Numerical summaries (mean, median, etc.)
   - Categorical data distributions
   - Correlation matrices
   - Comparison of variables
   - Any data with 2+ columns that would be clearer in tabular format
3. Use proper Markdown table syntax with headers and aligned columns.
4. Include column headers that clearly describe the data.
5. For longer tables, group or summarize to show the most relevant information.
6. Format percentages, decimal numbers, and other values consistently.`

export const ANALYSIS_GUIDANCE = `Answer the user's question from this analysis. Format appropriate data in tables even if the user didn't explicitly request tables.
Standard deviations are sample standard deviations. Quartiles use linear interpolation. Outliers fall outside Q1 - 1.5*IQR and Q3 + 1.5*IQR.
If the application attaches a plot to your answer, describe what it shows instead of explaining how to draw it.`

export function buildChatSystem(filename?: string): string {
  const subject = filename ? `the file "${filename}"` : 'data files'
  return `You are a Data Analysis Agent helping analyze ${subject}.\n\n${FORMATTING_RULES}`
}

export function buildAnalysisContext(options: {
  analysisJson?: string
  analysisError?: string
}): string {
  if (options.analysisJson) {
    return `Here is the statistical analysis of the file:\n${options.analysisJson}\n\n${ANALYSIS_GUIDANCE}`
  }
  if (options.analysisError) {
    return `Note: There was an error analyzing the file: ${options.analysisError}\nProceed with the information available, but tell the user about the analysis error.`
  }
  return ''
}
