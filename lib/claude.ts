import Anthropic from '@anthropic-ai/sdk'
import type { TextBlockParam } from '@anthropic-ai/sdk/resources/messages'
import { getConfig, type AppConfig } from './config'
import { buildAnalysisContext, buildChatSystem } from './prompts'
import type { AnalysisResult, ChatMessage } from './types'

export const FALLBACK_REPLY = 'I apologize, but I was unable to generate a response.'

function withCacheControl(text: string): TextBlockParam {
  return {
    type: 'text',
    text,
    cache_control: { type: 'ephemeral' },
  }
}

interface BuildResult {
  system: string
  systemBlocks: TextBlockParam[]
  messages: ChatMessage[]
}

export interface ChatContext {
  filename?: string
  analysis?: AnalysisResult | null
  analysisError?: string
}

// ========== Claude API 래퍼 ==========

let cached: { apiKey: string | undefined; timeout: number; client: Anthropic } | null = null

// Rebuilt whenever the key or timeout differs from the cached client's
function getClient(config: AppConfig): Anthropic {
  const apiKey = config.anthropicApiKey
  const timeout = config.chatTimeoutMs
  if (!cached || cached.apiKey !== apiKey || cached.timeout !== timeout) {
    cached = { apiKey, timeout, client: new Anthropic({ apiKey, timeout }) }
  }
  return cached.client
}

export async function callClaude(
  options: {
    model: string
    systemBlocks: TextBlockParam[]
    messages: ChatMessage[]
    maxTokens?: number
    temperature?: number
  },
  config: AppConfig = getConfig()
): Promise<string> {
  const anthropic = getClient(config)
  const response = await anthropic.messages.create({
    model: options.model,
    max_tokens: options.maxTokens ?? 4096,
    system: options.systemBlocks,
    messages: options.messages,
    temperature: options.temperature ?? 0,
  })

  for (const block of response.content) {
    if (block.type === 'text') return block.text
  }
  return ''
}

// ========== 분석 컨텍스트 ==========

export function serializeAnalysis(analysis: AnalysisResult): string {
  return JSON.stringify(analysis, null, 2)
}

/**
 * The Messages API wants a conversation that opens with the user and alternates roles.
 * Leading assistant turns (the UI's greeting) are dropped and consecutive same-role turns merged.
 */
export function normalizeHistory(history: ChatMessage[]): ChatMessage[] {
  const result: ChatMessage[] = []
  for (const message of history) {
    const content = message.content.trim()
    if (!content) continue
    if (result.length === 0 && message.role === 'assistant') continue

    const last = result[result.length - 1]
    if (last && last.role === message.role) {
      last.content = `${last.content}\n\n${content}`
    } else {
      result.push({ role: message.role, content })
    }
  }
  return result
}

export function buildChatMessages(history: ChatMessage[], context: ChatContext = {}): BuildResult {
  const filename = context.filename ?? context.analysis?.filename
  const chatSystem = buildChatSystem(filename || undefined)
  const analysisContext = buildAnalysisContext({
    analysisJson: context.analysis ? serializeAnalysis(context.analysis) : undefined,
    analysisError: context.analysisError,
  })

  const systemBlocks = [withCacheControl(chatSystem)]
  if (analysisContext) systemBlocks.push(withCacheControl(analysisContext))

  return {
    system: analysisContext ? `${chatSystem}\n\n${analysisContext}` : chatSystem,
    systemBlocks,
    messages: normalizeHistory(history),
  }
}

export async function generateReply(
  history: ChatMessage[],
  context: ChatContext = {},
  config: AppConfig = getConfig()
): Promise<string> {
  const { systemBlocks, messages } = buildChatMessages(history, context)

  const text = await callClaude(
    {
      model: config.chatModel,
      systemBlocks,
      messages,
      maxTokens: config.chatMaxTokens,
      temperature: config.chatTemperature,
    },
    config
  )

  return text.trim() ? text : FALLBACK_REPLY
}
