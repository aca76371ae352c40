import express from 'express'
import cors from 'cors'
import { errorHandler } from './middleware/error.js'
import { createRunsRouter } from './routes/runs.js'
import { createStudentsRouter } from './routes/students.js'
import type { AnswerModelFactory } from './services/qaService.js'
import type { RunRegistry } from './services/runService.js'

export type AppOptions = {
  registry: RunRegistry
  corsOrigins: string[]
  uploadLimit: string
  qa: {
    model: string
    sampleRows: number
    defaultApiKey?: string
    createModel?: AnswerModelFactory
  }
}

export const createApp = (options: AppOptions) => {
  const app = express()

  const allowedOrigins = new Set(options.corsOrigins)
  const allowAllOrigins = options.corsOrigins.includes('*')
  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowAllOrigins || allowedOrigins.has(origin)) {
          callback(null, true)
          return
        }
        callback(new Error('Not allowed by CORS'))
      },
      exposedHeaders: ['Content-Disposition'],
    }),
  )
  app.use(express.json({ limit: '2mb' }))

  app.get('/health', (_req, res) => {
    res.json({ ok: true })
  })

  app.use('/api/students', createStudentsRouter({ uploadLimit: options.uploadLimit }))
  app.use(
    '/api/runs',
    createRunsRouter({
      registry: options.registry,
      uploadLimit: options.uploadLimit,
      qa: options.qa,
    }),
  )

  app.use(errorHandler)

  return app
}
