import { NextResponse } from 'next/server'
import type { ServiceResult } from './errors'
import type { ApiResponse } from './types'

/** `{ data }` on success, `{ error }` with the failure's status otherwise */
export function toResponse<T>(result: ServiceResult<T>): NextResponse<ApiResponse<T>> {
  if (result.ok) {
    return NextResponse.json<ApiResponse<T>>({ data: result.data })
  }
  return NextResponse.json<ApiResponse<T>>({ error: result.error }, { status: result.status })
}

export function serverError(tag: string, error: unknown, message: string): NextResponse<ApiResponse<never>> {
  console.error(`[${tag}]`, error)
  return NextResponse.json<ApiResponse<never>>({ error: message }, { status: 500 })
}
