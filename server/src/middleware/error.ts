import type { ErrorRequestHandler } from 'express'
import { AppError, FormatError } from '../errors.js'

const clientStatusOf = (error: unknown) => {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return null
  }
  const { status } = error
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null
}

export const errorHandler: ErrorRequestHandler = (error, _req, res, _next) => {
  if (error instanceof FormatError) {
    return res.status(error.status).json({
      error: error.message,
      code: error.code,
      issues: error.issues,
    })
  }

  if (error instanceof AppError) {
    return res.status(error.status).json({ error: error.message, code: error.code })
  }

  // body parser rejections (oversized upload, malformed JSON)
  const status = clientStatusOf(error)
  if (status !== null) {
    return res.status(status).json({
      error: error instanceof Error ? error.message : 'Bad request.',
    })
  }

  console.error(error)
  return res.status(500).json({ error: 'Internal server error.' })
}
