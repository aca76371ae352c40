import { Router } from 'express'
import { FormatError } from '../errors.js'
import {
  buildSampleTemplate,
  loadStudentQueries,
  parseManualEntries,
} from '../services/inputService.js'
import { XLSX_MIME } from '../services/exportService.js'
import { isNonEmptyString, spreadsheetBody, uploadedBuffer } from './uploads.js'

export const createStudentsRouter = (options: { uploadLimit: string }) => {
  const router = Router()

  router.get('/template', (_req, res) => {
    res.setHeader('Content-Type', XLSX_MIME)
    res.setHeader('Content-Disposition', 'attachment; filename="sample_template.xlsx"')
    res.send(buildSampleTemplate())
  })

  router.post('/preview', spreadsheetBody(options.uploadLimit), (req, res, next) => {
    try {
      const buffer = uploadedBuffer(req.body)
      if (!buffer) {
        throw new FormatError('Upload an .xlsx or .csv file as the request body.')
      }
      const students = loadStudentQueries(buffer)
      return res.json({ total: students.length, students })
    } catch (error) {
      return next(error)
    }
  })

  router.post('/manual', (req, res, next) => {
    try {
      const { registerNumbers, datesOfBirth } = (req.body ?? {}) as {
        registerNumbers?: string
        datesOfBirth?: string
      }
      const students = parseManualEntries(
        isNonEmptyString(registerNumbers) ? registerNumbers : '',
        isNonEmptyString(datesOfBirth) ? datesOfBirth : '',
      )
      return res.json({ total: students.length, students })
    } catch (error) {
      return next(error)
    }
  })

  return router
}
