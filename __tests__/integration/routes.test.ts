import { describe, it, expect, vi, beforeAll } from 'vitest'
import { NextRequest } from 'next/server'
import { makeTempDir, readFixture } from '../helpers/fixtures'

const { mockCreate } = vi.hoisted(() => ({ mockCreate: vi.fn() }))

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create: mockCreate }
  },
}))

import { GET as health } from '@/app/api/health/route'
import { POST as upload } from '@/app/api/upload/route'
import { GET as listFiles } from '@/app/api/files/route'
import { GET as getFile, DELETE as deleteFile } from '@/app/api/files/[id]/route'
import { GET as download } from '@/app/api/files/[id]/download/route'
import { GET as reanalyze } from '@/app/api/analyze/[id]/route'
import { POST as chat } from '@/app/api/chat/route'

/**
 * Integration: route handlers over the shared services,
 * configured for an in-memory database and a temporary uploads directory.
 */

beforeAll(() => {
  process.env.DATABASE_PATH = ':memory:'
  process.env.UPLOADS_DIR = makeTempDir()
  process.env.ANTHROPIC_API_KEY = 'test-key'
})

function request(path: string, init: { method?: string; user?: string; body?: BodyInit } = {}) {
  const headers = new Headers()
  if (init.user) headers.set('x-user-id', init.user)
  return new NextRequest(`http://localhost${path}`, { method: init.method ?? 'GET', headers, body: init.body })
}

function params(id: string) {
  return { params: Promise.resolve({ id }) }
}

async function uploadSales(user: string): Promise<string> {
  const form = new FormData()
  form.append('file', new File([readFixture('sales.csv').toString('utf-8')], 'sales.csv', { type: 'text/csv' }))
  const res = await upload(request('/api/upload', { method: 'POST', user, body: form }))
  expect(res.status).toBe(200)
  const json = await res.json()
  return json.data.file.id
}

describe('API routes', () => {
  it('should report health', async () => {
    const res = health()
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ status: 'ok', message: 'CSV analysis API is running' })
  })

  it('should upload and list a file for its owner', async () => {
    const id = await uploadSales('alice')

    const res = await listFiles(request('/api/files', { user: 'alice' }))
    const json = await res.json()
    expect(json.data.map((f: { id: string }) => f.id)).toContain(id)

    const other = await listFiles(request('/api/files', { user: 'bob' }))
    expect((await other.json()).data).toEqual([])
  })

  it('should reject an upload without a file', async () => {
    const res = await upload(request('/api/upload', { method: 'POST', body: new FormData() }))
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: 'No file provided' })
  })

  it('should reject a header-only upload with 400', async () => {
    const form = new FormData()
    form.append('file', new File([readFixture('header-only.csv').toString('utf-8')], 'empty.csv'))
    const res = await upload(request('/api/upload', { method: 'POST', body: form }))
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: 'File contains a header but no data rows' })
  })

  it('should enforce ownership on file routes', async () => {
    const id = await uploadSales('alice')

    const forbidden = await getFile(request(`/api/files/${id}`, { user: 'bob' }), params(id))
    expect(forbidden.status).toBe(403)

    const missing = await getFile(request('/api/files/nope', { user: 'alice' }), params('nope'))
    expect(missing.status).toBe(404)

    const ok = await getFile(request(`/api/files/${id}`, { user: 'alice' }), params(id))
    expect((await ok.json()).data.downloadUrl).toBe(`/api/files/${id}/download`)
  })

  it('should download the original CSV', async () => {
    const id = await uploadSales('alice')
    const res = await download(request(`/api/files/${id}/download`, { user: 'alice' }), params(id))

    expect(res.status).toBe(200)
    expect(res.headers.get('content-type')).toBe('text/csv; charset=utf-8')
    expect(res.headers.get('content-disposition')).toBe('attachment; filename="sales.csv"')
    expect(await res.text()).toBe(readFixture('sales.csv').toString('utf-8'))
  })

  it('should re-analyze and delete a file', async () => {
    const id = await uploadSales('alice')

    const analyzed = await reanalyze(request(`/api/analyze/${id}`, { user: 'alice' }), params(id))
    expect((await analyzed.json()).data.totalRows).toBe(5)

    const deleted = await deleteFile(request(`/api/files/${id}`, { method: 'DELETE', user: 'alice' }), params(id))
    expect(await deleted.json()).toEqual({ data: { id } })

    const gone = await getFile(request(`/api/files/${id}`, { user: 'alice' }), params(id))
    expect(gone.status).toBe(404)
  })

  it('should reject a chat body that is not JSON', async () => {
    const res = await chat(request('/api/chat', { method: 'POST', body: 'not json' }))
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: 'Request body must be JSON' })
  })

  it('should answer a chat message', async () => {
    mockCreate.mockResolvedValue({ content: [{ type: 'text', text: 'Hello there.' }] })
    const body = JSON.stringify({ messages: [{ role: 'user', content: 'hi' }] })
    const res = await chat(request('/api/chat', { method: 'POST', body }))

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ data: { reply: 'Hello there.', suggestedQuestions: [] } })
  })

  it('should hide unexpected chat failures behind a generic message', async () => {
    mockCreate.mockRejectedValue(new Error('upstream exploded'))
    const body = JSON.stringify({ messages: [{ role: 'user', content: 'hi' }] })
    const res = await chat(request('/api/chat', { method: 'POST', body }))

    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({ error: 'Failed to get a response from the assistant' })
  })
})
