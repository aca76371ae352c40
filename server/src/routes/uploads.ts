import express from 'express'
import { XLSX_MIME } from '../services/exportService.js'

export const SPREADSHEET_TYPES = [
  XLSX_MIME,
  'application/vnd.ms-excel',
  'application/octet-stream',
  'text/csv',
]

export const spreadsheetBody = (limit: string) =>
  express.raw({ type: SPREADSHEET_TYPES, limit })

export const uploadedBuffer = (body: unknown) =>
  Buffer.isBuffer(body) && body.length > 0 ? body : null

export const isNonEmptyString = (value: unknown): value is string =>
  typeof value === 'string' && value.trim().length > 0
