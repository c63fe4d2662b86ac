export class ParseError extends Error {
  readonly kind = 'parse' as const

  constructor(message: string) {
    super(message)
    this.name = 'ParseError'
  }
}

export class EmptyTableError extends Error {
  readonly kind = 'empty_table' as const

  constructor(message = 'No columns to parse from file') {
    super(message)
    this.name = 'EmptyTableError'
  }
}

export type AnalysisError = ParseError | EmptyTableError

export function isAnalysisError(err: unknown): err is AnalysisError {
  return err instanceof ParseError || err instanceof EmptyTableError
}

// ========== Service 결과 ==========

export type ServiceResult<T> =
  | { ok: true; data: T }
  | { ok: false; status: number; error: string }

export function success<T>(data: T): ServiceResult<T> {
  return { ok: true, data }
}

export function failure<T = never>(status: number, error: string): ServiceResult<T> {
  return { ok: false, status, error }
}
