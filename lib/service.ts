import { z } from 'zod'
import { analyze, analyzeCsv } from './analyzer'
import { FALLBACK_REPLY, generateReply } from './claude'
import type { RequestContext } from './context'
import { loadTable } from './csv'
import { failure, isAnalysisError, success, type ServiceResult } from './errors'
import { buildPlot, detectPlotRequest } from './plots'
import { relayCompletion } from './redact'
import { buildAnalysisMarkdown } from './report'
import { extensionOf } from './storage'
import { generateSuggestedQuestions } from './suggestions'
import type { AnalysisResult, ChatResponse, PlotPayload, StoredFile, Table, UploadResult } from './types'

export const chatRequestSchema = z.object({
  messages: z
    .array(
      z.object({
        role: z.enum(['user', 'assistant']),
        content: z.string(),
      })
    )
    .min(1, 'At least one message is required'),
  fileId: z.string().min(1).nullish(),
})

export type ChatRequest = z.infer<typeof chatRequestSchema>

export interface FileDetail extends StoredFile {
  downloadUrl: string
}

export interface FileContent {
  filename: string
  content: Buffer
}

// ========== 소유권 ==========

function loadOwnedFile(ctx: RequestContext, id: string): ServiceResult<StoredFile> {
  const file = ctx.store.getFile(id)
  if (!file) return failure(404, 'File not found')
  if (file.userId !== ctx.userId) {
    console.warn(`[FILES] user ${ctx.userId} denied access to ${id}`)
    return failure(403, 'You do not have access to this file')
  }
  return success(file)
}

// ========== 업로드 ==========

export async function uploadFile(
  ctx: RequestContext,
  input: { filename: string; content: Uint8Array }
): Promise<ServiceResult<UploadResult>> {
  const { filename, content } = input

  if (!filename.toLowerCase().endsWith('.csv')) {
    return failure(400, 'Only CSV files are supported')
  }
  if (content.byteLength > ctx.config.maxUploadBytes) {
    return failure(413, `File exceeds the upload limit of ${ctx.config.maxUploadBytes} bytes`)
  }

  const outcome = analyzeCsv(content, { filename })
  if (!outcome.ok) {
    console.warn(`[UPLOAD] ${filename}: ${outcome.error.message}`)
    return failure(400, outcome.error.message)
  }
  const analysis = outcome.result

  const storageKey = await ctx.storage.save(content, filename)
  let file: StoredFile
  try {
    file = ctx.store.saveFile({
      userId: ctx.userId,
      filename,
      storageKey,
      fileType: extensionOf(filename),
      size: content.byteLength,
      totalRows: analysis.totalRows,
      totalColumns: analysis.totalColumns,
      numericColumns: analysis.numericColumns,
      categoricalColumns: analysis.categoricalColumns,
      analysis,
    })
  } catch (err) {
    await ctx.storage.remove(storageKey)
    throw err
  }

  console.log(`[UPLOAD] ${filename} -> ${file.id} (${analysis.totalRows} rows, ${analysis.totalColumns} columns)`)

  return success({
    file,
    analysis,
    summary: buildAnalysisMarkdown(analysis),
    suggestedQuestions: generateSuggestedQuestions(analysis),
  })
}

// ========== 파일 관리 ==========

export function listFiles(ctx: RequestContext): ServiceResult<StoredFile[]> {
  return success(ctx.store.listFiles(ctx.userId))
}

export function getFile(ctx: RequestContext, id: string): ServiceResult<FileDetail> {
  const owned = loadOwnedFile(ctx, id)
  if (!owned.ok) return owned
  return success({ ...owned.data, downloadUrl: `/api/files/${owned.data.id}/download` })
}

export async function readFileContent(ctx: RequestContext, id: string): Promise<ServiceResult<FileContent>> {
  const owned = loadOwnedFile(ctx, id)
  if (!owned.ok) return owned

  const content = await ctx.storage.read(owned.data.storageKey)
  if (!content) {
    console.error(`[FILES] stored content missing for ${id} (${owned.data.storageKey})`)
    return failure(404, 'Stored file content is missing')
  }
  return success({ filename: owned.data.filename, content })
}

export async function deleteFile(ctx: RequestContext, id: string): Promise<ServiceResult<{ id: string }>> {
  const owned = loadOwnedFile(ctx, id)
  if (!owned.ok) return owned

  const removed = await ctx.storage.remove(owned.data.storageKey)
  if (!removed) {
    console.warn(`[FILES] no stored content to remove for ${id}`)
  }
  ctx.store.deleteFile(id)
  console.log(`[FILES] deleted ${id}`)
  return success({ id })
}

// ========== 재분석 ==========

export async function reanalyzeFile(ctx: RequestContext, id: string): Promise<ServiceResult<AnalysisResult>> {
  const content = await readFileContent(ctx, id)
  if (!content.ok) return content

  const outcome = analyzeCsv(content.data.content, { filename: content.data.filename })
  if (!outcome.ok) {
    console.warn(`[ANALYZE] ${id}: ${outcome.error.message}`)
    return failure(400, outcome.error.message)
  }

  ctx.store.updateAnalysis(id, outcome.result)
  console.log(`[ANALYZE] ${id} re-analyzed`)
  return success(outcome.result)
}

// ========== 채팅 ==========

type FileData =
  | { ok: true; table: Table; analysis: AnalysisResult }
  | { ok: false; error: string }

async function loadFileData(ctx: RequestContext, file: StoredFile): Promise<FileData> {
  const content = await ctx.storage.read(file.storageKey)
  if (!content) return { ok: false, error: 'The stored file could not be found' }

  let table: Table
  try {
    table = loadTable(content)
  } catch (err) {
    if (isAnalysisError(err)) return { ok: false, error: err.message }
    throw err
  }

  if (file.analysis) return { ok: true, table, analysis: file.analysis }

  const outcome = analyze(table, { filename: file.filename })
  if (!outcome.ok) return { ok: false, error: outcome.error.message }
  ctx.store.updateAnalysis(file.id, outcome.result)
  return { ok: true, table, analysis: outcome.result }
}

export async function chat(ctx: RequestContext, body: unknown): Promise<ServiceResult<ChatResponse>> {
  const parsed = chatRequestSchema.safeParse(body)
  if (!parsed.success) {
    return failure(400, parsed.error.issues[0].message)
  }

  const { messages, fileId } = parsed.data
  const last = messages[messages.length - 1]
  if (last.role !== 'user' || !last.content.trim()) {
    return failure(400, 'The last message must be a question from the user')
  }

  let filename: string | undefined
  let analysis: AnalysisResult | null = null
  let analysisError: string | undefined
  let plot: PlotPayload | null = null

  if (fileId) {
    const owned = loadOwnedFile(ctx, fileId)
    if (!owned.ok) return owned
    filename = owned.data.filename

    const data = await loadFileData(ctx, owned.data)
    if (data.ok) {
      analysis = data.analysis
      const request = detectPlotRequest(last.content, data.analysis)
      plot = request ? buildPlot(request, data.table, data.analysis) : null
      if (plot) console.log(`[CHAT] ${plot.type} plot for ${fileId}`)
    } else {
      analysisError = data.error
      console.warn(`[CHAT] analysis unavailable for ${fileId}: ${data.error}`)
    }
  }

  const completion = await generateReply(messages, { filename, analysis, analysisError }, ctx.config)
  const reply = relayCompletion(completion, plot)

  const response: ChatResponse = {
    reply: reply.trim() ? reply : FALLBACK_REPLY,
    suggestedQuestions: generateSuggestedQuestions(analysis),
  }
  if (plot) response.plot = plot
  return success(response)
}
