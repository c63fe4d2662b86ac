import { NextRequest, NextResponse } from 'next/server'
import { createRequestContext } from '@/lib/context'
import { serverError, toResponse } from '@/lib/http'
import { uploadFile } from '@/lib/service'

export async function POST(request: NextRequest) {
  try {
    const formData = await request.formData()
    const file = formData.get('file')

    if (!(file instanceof File)) {
      return NextResponse.json({ error: 'No file provided' }, { status: 400 })
    }

    const ctx = createRequestContext(request.headers)
    const content = new Uint8Array(await file.arrayBuffer())
    return toResponse(await uploadFile(ctx, { filename: file.name, content }))
  } catch (error) {
    return serverError('UPLOAD', error, 'Failed to upload file')
  }
}
