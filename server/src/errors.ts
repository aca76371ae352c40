export class AppError extends Error {
  readonly status: number
  readonly code: string

  constructor(message: string, status: number, code: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.status = status
    this.code = code
  }
}

export class FormatError extends AppError {
  readonly issues: string[]

  constructor(issues: string[] | string, options?: { cause?: unknown }) {
    const list = Array.isArray(issues) ? issues : [issues]
    super(
      list.length === 1 ? list[0] : `Found ${list.length} problems in the student list.`,
      400,
      'FORMAT_ERROR',
      options,
    )
    this.issues = list
  }
}

export class FetchError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 502, 'FETCH_ERROR', options)
  }
}

export class ParseError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 502, 'PARSE_ERROR', options)
  }
}

export class AuthError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 401, 'AUTH_ERROR', options)
  }
}

export class ServiceError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 502, 'SERVICE_ERROR', options)
  }
}

export class NoResultsError extends AppError {
  constructor(message = 'No result data available. Scrape or import results first.') {
    super(message, 409, 'NO_RESULTS')
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'NOT_FOUND')
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, 'CONFLICT')
  }
}

export const errorMessage = (error: unknown, fallback = 'Unknown error') =>
  error instanceof Error ? error.message : fallback
