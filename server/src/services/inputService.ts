import * as XLSX from 'xlsx'
import { FormatError } from '../errors.js'
import type { StudentQuery } from '../scraper/types.js'

export const REGISTER_NUMBER_COLUMN = 'Register Number'
export const DATE_OF_BIRTH_COLUMN = 'Date of Birth'

const normalizeHeader = (value: unknown) =>
  typeof value === 'string' ? value.replace(/\s+/g, ' ').trim().toLowerCase() : ''

const daysInMonth = (year: number, month: number) =>
  new Date(Date.UTC(year, month, 0)).getUTCDate()

const pad = (value: number) => String(value).padStart(2, '0')

export const normalizeDateOfBirth = (value: string) => {
  const match = value.trim().match(/^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/)
  if (!match) {
    return null
  }
  const day = Number(match[1])
  const month = Number(match[2])
  const year = Number(match[3])
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null
  }
  return `${pad(day)}/${pad(month)}/${year}`
}

const cellText = (value: unknown) => {
  if (typeof value === 'string') {
    return value.trim()
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value)
  }
  if (typeof value === 'boolean') {
    return String(value)
  }
  return ''
}

// Excel stores typed dates as serial day numbers.
const serialToDateOfBirth = (serial: number, date1904: boolean) => {
  const parsed = XLSX.SSF.parse_date_code(serial, { date1904 })
  if (!parsed || !parsed.y) {
    return null
  }
  return normalizeDateOfBirth(`${parsed.d}/${parsed.m}/${parsed.y}`)
}

const readRows = (buffer: Buffer): { rows: unknown[][]; date1904: boolean } => {
  if (buffer.length === 0) {
    throw new FormatError('Uploaded file is empty.')
  }
  let workbook: XLSX.WorkBook
  try {
    workbook = XLSX.read(buffer, { type: 'buffer', raw: true })
  } catch (error) {
    throw new FormatError('File could not be read as a spreadsheet.', { cause: error })
  }
  const sheetName = workbook.SheetNames[0]
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined
  if (!sheet) {
    throw new FormatError('Spreadsheet has no sheets.')
  }
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: '',
    raw: true,
    blankrows: false,
  })
  return { rows, date1904: workbook.Workbook?.WBProps?.date1904 === true }
}

export const loadStudentQueries = (buffer: Buffer): StudentQuery[] => {
  const { rows, date1904 } = readRows(buffer)
  const [header = [], ...dataRows] = rows
  const headers = header.map(normalizeHeader)
  const registerIndex = headers.indexOf(normalizeHeader(REGISTER_NUMBER_COLUMN))
  const dobIndex = headers.indexOf(normalizeHeader(DATE_OF_BIRTH_COLUMN))

  const missing = [
    registerIndex === -1 ? REGISTER_NUMBER_COLUMN : null,
    dobIndex === -1 ? DATE_OF_BIRTH_COLUMN : null,
  ].filter((column): column is string => column !== null)
  if (missing.length > 0) {
    throw new FormatError(`Missing required columns: ${missing.join(', ')}`)
  }
  if (dataRows.length === 0) {
    throw new FormatError('No student rows found below the header.')
  }

  const issues: string[] = []
  const queries: StudentQuery[] = []

  dataRows.forEach((row, index) => {
    const rowNumber = index + 1
    const registerNumber = cellText(row[registerIndex])
    const rawDob = row[dobIndex]
    const dobText = cellText(rawDob)

    if (!registerNumber) {
      issues.push(`Row ${rowNumber}: register number is missing`)
    }
    if (!dobText) {
      issues.push(`Row ${rowNumber}: date of birth is missing`)
      return
    }

    const dateOfBirth =
      typeof rawDob === 'number' ? serialToDateOfBirth(rawDob, date1904) : normalizeDateOfBirth(dobText)
    if (!dateOfBirth) {
      issues.push(`Row ${rowNumber}: date of birth '${dobText}' is not in DD/MM/YYYY format`)
      return
    }
    if (registerNumber) {
      queries.push({ registerNumber, dateOfBirth })
    }
  })

  if (issues.length > 0) {
    throw new FormatError(issues)
  }
  return queries
}

const splitLines = (value: string) =>
  value
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)

export const parseManualEntries = (
  registerNumbersText: string,
  datesOfBirthText: string,
): StudentQuery[] => {
  const registerNumbers = splitLines(registerNumbersText)
  const datesOfBirth = splitLines(datesOfBirthText)

  if (registerNumbers.length === 0 || datesOfBirth.length === 0) {
    throw new FormatError('Enter at least one register number and date of birth.')
  }
  if (registerNumbers.length !== datesOfBirth.length) {
    throw new FormatError(
      `The number of Register Numbers (${registerNumbers.length}) and Dates of Birth (${datesOfBirth.length}) must be the same.`,
    )
  }

  const issues: string[] = []
  const queries: StudentQuery[] = []
  registerNumbers.forEach((registerNumber, index) => {
    const dateOfBirth = normalizeDateOfBirth(datesOfBirth[index] ?? '')
    if (!dateOfBirth) {
      issues.push(`Line ${index + 1}: date of birth '${datesOfBirth[index]}' is not in DD/MM/YYYY format`)
      return
    }
    queries.push({ registerNumber, dateOfBirth })
  })

  if (issues.length > 0) {
    throw new FormatError(issues)
  }
  return queries
}

export const buildSampleTemplate = (): Buffer => {
  const sheet = XLSX.utils.aoa_to_sheet([
    [REGISTER_NUMBER_COLUMN, DATE_OF_BIRTH_COLUMN],
    ['123456789', '01/01/2000'],
    ['987654321', '15/06/1999'],
  ])
  const workbook = XLSX.utils.book_new()
  XLSX.utils.book_append_sheet(workbook, sheet, 'Students')
  return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' })
}
