import type { PlotPayload } from './types'

// Sentences the model writes when it thinks it cannot draw. Pointless once a plot is attached.
export const VISUALIZATION_PATTERNS: RegExp[] = [
  /\b(matplotlib|seaborn|plotly|ggplot2?|tableau|power ?bi|excel)\b/i,
  /\b(cannot|can't|can’t|unable to|not able to)\s+(directly\s+)?(create|generate|draw|display|render|show|produce|make)\b.*\b(plots?|charts?|graphs?|visuali[sz]ations?|images?)\b/i,
  /\btext[- ]based\b/i,
  /\byou (can|could|may|might) (use|try)\b.*\b(plot|chart|graph|visuali[sz]e)/i,
]

const LINE_PREFIX = /^(\s*(?:[-*+]|\d+\.|#{1,6}|>)\s+)/

function isRedacted(sentence: string): boolean {
  return VISUALIZATION_PATTERNS.some(p => p.test(sentence))
}

function redactLine(line: string): string | null {
  const prefix = line.match(LINE_PREFIX)?.[1] ?? ''
  const body = line.slice(prefix.length)
  const sentences = body.split(/(?<=[.!?])\s+/)
  const kept = sentences.filter(s => !isRedacted(s))

  if (kept.length === sentences.length) return line
  const rest = kept.join(' ').trim()
  return rest ? `${prefix}${rest}` : null
}

/**
 * Drop sentences that point at plotting tools or claim plots are impossible.
 * Code fences and markdown table rows pass through untouched.
 */
export function stripVisualizationMentions(text: string): string {
  const out: string[] = []
  let inFence = false

  for (const line of text.split('\n')) {
    if (line.trimStart().startsWith('```')) {
      inFence = !inFence
      out.push(line)
      continue
    }
    if (inFence || line.trimStart().startsWith('|') || line.trim() === '') {
      out.push(line)
      continue
    }
    const redacted = redactLine(line)
    if (redacted !== null) out.push(redacted)
  }

  return out.join('\n').replace(/\n{3,}/g, '\n\n').trim()
}

/** The completion text as the caller sees it: redacted only when a plot travels with it */
export function relayCompletion(text: string, plot?: PlotPayload | null): string {
  return plot ? stripVisualizationMentions(text) : text
}
