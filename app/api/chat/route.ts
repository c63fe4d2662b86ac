import { NextRequest, NextResponse } from 'next/server'
import { createRequestContext } from '@/lib/context'
import { serverError, toResponse } from '@/lib/http'
import { chat } from '@/lib/service'

export async function POST(request: NextRequest) {
  let body: unknown
  try {
    body = await request.json()
  } catch {
    return NextResponse.json({ error: 'Request body must be JSON' }, { status: 400 })
  }

  try {
    const ctx = createRequestContext(request.headers)
    return toResponse(await chat(ctx, body))
  } catch (error) {
    return serverError('CHAT', error, 'Failed to get a response from the assistant')
  }
}
