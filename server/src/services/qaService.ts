import { GoogleGenAI } from '@google/genai'
import { AuthError, NoResultsError, ServiceError, errorMessage } from '../errors.js'
import type { ResultRow } from '../scraper/types.js'
import { RESULT_COLUMNS } from './exportService.js'

export interface AnswerModel {
  generate(prompt: string): Promise<string>
}

export type AnswerModelFactory = (apiKey: string, model: string) => AnswerModel

export const isPlausibleApiKey = (value: string | undefined): value is string =>
  typeof value === 'string' && /^[A-Za-z0-9_-]{20,}$/.test(value.trim())

const authRejectionPattern = /api[ _]?key (?:not valid|invalid)|API_KEY_INVALID|PERMISSION_DENIED|unauthenticated/i

const statusOf = (error: unknown) =>
  typeof error === 'object' &&
  error !== null &&
  'status' in error &&
  typeof error.status === 'number'
    ? error.status
    : null

export const toQaError = (error: unknown) => {
  if (error instanceof AuthError || error instanceof ServiceError) {
    return error
  }
  const status = statusOf(error)
  const message = errorMessage(error, 'Language model request failed.')
  if (status === 401 || status === 403 || authRejectionPattern.test(message)) {
    return new AuthError('The language model rejected the API key.', { cause: error })
  }
  return new ServiceError(`Language model request failed: ${message}`, { cause: error })
}

export const createGeminiModel: AnswerModelFactory = (apiKey, model) => {
  const ai = new GoogleGenAI({ apiKey })
  return {
    generate: async (prompt) => {
      let text: string | undefined
      try {
        const response = await ai.models.generateContent({
          model,
          contents: prompt,
          config: { temperature: 0 },
        })
        text = response.text
      } catch (error) {
        throw toQaError(error)
      }
      if (!text) {
        throw new ServiceError('The language model returned an empty answer.')
      }
      return text
    },
  }
}

export const renderRows = (rows: readonly ResultRow[]) => {
  const header = RESULT_COLUMNS.map((column) => column.header)
  const body = rows.map((row) => RESULT_COLUMNS.map((column) => row[column.key]))
  const widths = header.map((title, index) =>
    Math.max(title.length, ...body.map((cells) => cells[index]?.length ?? 0)),
  )
  return [header, ...body]
    .map((cells) => cells.map((cell, index) => cell.padEnd(widths[index] ?? 0)).join('  ').trimEnd())
    .join('\n')
}

export const buildQaPrompt = (rows: readonly ResultRow[], question: string) =>
  [
    'You are an AI assistant helping to analyze student results data.',
    '',
    `Here is a sample of the data (limited to ${rows.length} rows for brevity):`,
    renderRows(rows),
    '',
    `The user asks: ${question}`,
    '',
    'Please provide a detailed and accurate answer based on this data.',
    'If the information is not available in the data, please state that clearly.',
  ].join('\n')

export const answerQuestion = async (payload: {
  rows: readonly ResultRow[]
  question: string
  apiKey: string | undefined
  model: string
  sampleRows: number
  createModel?: AnswerModelFactory
}) => {
  const { apiKey } = payload
  if (!isPlausibleApiKey(apiKey)) {
    throw new AuthError('Provide a valid Gemini API key to use the Q&A functionality.')
  }
  if (payload.rows.length === 0) {
    throw new NoResultsError()
  }

  const sample = payload.rows.slice(0, Math.max(1, payload.sampleRows))
  const createModel = payload.createModel ?? createGeminiModel
  const model = createModel(apiKey.trim(), payload.model)
  try {
    return await model.generate(buildQaPrompt(sample, payload.question.trim()))
  } catch (error) {
    throw toQaError(error)
  }
}
