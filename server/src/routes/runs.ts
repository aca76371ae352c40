import { Router } from 'express'
import { ConflictError, FormatError } from '../errors.js'
import {
  EXPORT_FILE_NAME,
  XLSX_MIME,
  readResultWorkbook,
  writeResultWorkbook,
} from '../services/exportService.js'
import { loadStudentQueries, parseManualEntries } from '../services/inputService.js'
import { answerQuestion, type AnswerModelFactory } from '../services/qaService.js'
import { serializeRun, type RunRegistry } from '../services/runService.js'
import { isNonEmptyString, spreadsheetBody, uploadedBuffer } from './uploads.js'

export type RunsRouterOptions = {
  registry: RunRegistry
  uploadLimit: string
  qa: {
    model: string
    sampleRows: number
    defaultApiKey?: string
    createModel?: AnswerModelFactory
  }
}

const queriesFromRequest = (body: unknown) => {
  const buffer = uploadedBuffer(body)
  if (buffer) {
    return loadStudentQueries(buffer)
  }
  const { registerNumbers, datesOfBirth } = (body ?? {}) as {
    registerNumbers?: unknown
    datesOfBirth?: unknown
  }
  if (isNonEmptyString(registerNumbers) && isNonEmptyString(datesOfBirth)) {
    return parseManualEntries(registerNumbers, datesOfBirth)
  }
  throw new FormatError(
    'Upload an .xlsx or .csv file, or send registerNumbers and datesOfBirth as text.',
  )
}

export const createRunsRouter = (options: RunsRouterOptions) => {
  const router = Router()
  const { registry } = options

  router.get('/', (_req, res) => {
    res.json({ runs: registry.list().map(serializeRun) })
  })

  router.post('/', spreadsheetBody(options.uploadLimit), (req, res, next) => {
    try {
      const queries = queriesFromRequest(req.body)
      const run = registry.start(queries)
      return res.status(202).json({ run: serializeRun(run) })
    } catch (error) {
      return next(error)
    }
  })

  router.post('/import', spreadsheetBody(options.uploadLimit), (req, res, next) => {
    try {
      const buffer = uploadedBuffer(req.body)
      if (!buffer) {
        throw new FormatError('Upload a previously exported .xlsx file as the request body.')
      }
      const run = registry.importRows(readResultWorkbook(buffer))
      return res.status(201).json({ run: serializeRun(run) })
    } catch (error) {
      return next(error)
    }
  })

  router.get('/:id', (req, res, next) => {
    try {
      return res.json({ run: serializeRun(registry.get(req.params.id)) })
    } catch (error) {
      return next(error)
    }
  })

  router.get('/:id/rows', (req, res, next) => {
    try {
      const run = registry.get(req.params.id)
      return res.json({ rows: run.table.rows })
    } catch (error) {
      return next(error)
    }
  })

  router.get('/:id/export', (req, res, next) => {
    try {
      const run = registry.get(req.params.id)
      if (run.status === 'RUNNING') {
        throw new ConflictError('Run is still in progress.')
      }
      res.setHeader('Content-Type', XLSX_MIME)
      res.setHeader('Content-Disposition', `attachment; filename="${EXPORT_FILE_NAME}"`)
      return res.send(writeResultWorkbook(run.table.rows, run.failures))
    } catch (error) {
      return next(error)
    }
  })

  router.post('/:id/ask', async (req, res, next) => {
    try {
      const run = registry.get(req.params.id)
      if (run.status === 'RUNNING') {
        throw new ConflictError('Run is still in progress.')
      }
      const { question, apiKey } = (req.body ?? {}) as {
        question?: unknown
        apiKey?: unknown
      }
      if (!isNonEmptyString(question)) {
        return res.status(400).json({ error: 'Ask a question about the result data.' })
      }
      const headerKey = req.get('x-api-key')
      const answer = await answerQuestion({
        rows: run.table.rows,
        question,
        apiKey: isNonEmptyString(apiKey)
          ? apiKey
          : headerKey || options.qa.defaultApiKey || undefined,
        model: options.qa.model,
        sampleRows: options.qa.sampleRows,
        createModel: options.qa.createModel,
      })
      return res.json({
        answer,
        sampleRows: Math.min(run.table.size, Math.max(1, options.qa.sampleRows)),
      })
    } catch (error) {
      return next(error)
    }
  })

  return router
}
