import { describe, it, expect } from 'vitest'
import { relayCompletion, stripVisualizationMentions } from '@/lib/redact'
import type { PlotPayload } from '@/lib/types'

const plot: PlotPayload = {
  type: 'histogram',
  title: 'Distribution of price',
  column: 'price',
  bins: [{ start: 0, end: 1, count: 3 }],
}

describe('stripVisualizationMentions', () => {
  it('should drop sentences that name plotting tools', () => {
    const text = 'Here is the histogram of price. You can use matplotlib to customize it further. Most values are between 3 and 5.'
    expect(stripVisualizationMentions(text)).toBe('Here is the histogram of price. Most values are between 3 and 5.')
  })

  it('should drop a line left empty by redaction', () => {
    const text = 'Intro.\n\nAs a text-based AI, I cannot create plots.\n\nOutro.'
    expect(stripVisualizationMentions(text)).toBe('Intro.\n\nOutro.')
  })

  it('should drop claims that images cannot be shown', () => {
    expect(stripVisualizationMentions('I cannot display images directly. The median is 4.')).toBe('The median is 4.')
  })

  it('should drop suggestions to chart the data elsewhere', () => {
    expect(stripVisualizationMentions('You could use any spreadsheet to chart this. Sales grew.')).toBe('Sales grew.')
  })

  it('should keep list markers on partly redacted lines', () => {
    const text = '- You could try Tableau for this. The mean is 4.5.\n- Use Excel.\n- Max is 9.'
    expect(stripVisualizationMentions(text)).toBe('- The mean is 4.5.\n- Max is 9.')
  })

  it('should leave table rows and code fences alone', () => {
    const text = [
      '| Tool | Count |',
      '| --- | --- |',
      '| Excel | 3 |',
      '```',
      'import matplotlib.pyplot as plt',
      '```',
    ].join('\n')
    expect(stripVisualizationMentions(text)).toBe(text)
  })

  it('should leave unrelated text unchanged', () => {
    const text = '## Summary\n\nThe average price is 4.50.'
    expect(stripVisualizationMentions(text)).toBe(text)
  })
})

describe('relayCompletion', () => {
  it('should redact only when a plot is attached', () => {
    const text = 'Try seaborn for a nicer chart. Prices are stable.'
    expect(relayCompletion(text)).toBe(text)
    expect(relayCompletion(text, null)).toBe(text)
    expect(relayCompletion(text, plot)).toBe('Prices are stable.')
  })
})
