import { NextRequest } from 'next/server'
import { createRequestContext } from '@/lib/context'
import { serverError, toResponse } from '@/lib/http'
import { listFiles } from '@/lib/service'

export async function GET(request: NextRequest) {
  try {
    const ctx = createRequestContext(request.headers)
    return toResponse(listFiles(ctx))
  } catch (error) {
    return serverError('FILES', error, 'Failed to list files')
  }
}
