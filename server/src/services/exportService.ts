import * as XLSX from 'xlsx'
import { FormatError } from '../errors.js'
import { deriveStatus } from '../scraper/resultPage.js'
import type { FailedLookup, ResultRow, ResultStatus } from '../scraper/types.js'

export const RESULTS_SHEET = 'Successful Results'
export const SUMMARY_SHEET = 'Student Summary'
export const FAILURES_SHEET = 'Failed Results'
export const EXPORT_FILE_NAME = 'student_results.xlsx'
export const XLSX_MIME =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'

export const RESULT_COLUMNS = [
  { key: 'registerNumber', header: 'Register Number' },
  { key: 'studentName', header: 'Student Name' },
  { key: 'subjectCode', header: 'Subject Code' },
  { key: 'subjectName', header: 'Subject Name' },
  { key: 'marks', header: 'Marks' },
  { key: 'result', header: 'Result' },
  { key: 'status', header: 'Status' },
] as const satisfies ReadonlyArray<{ key: keyof ResultRow; header: string }>

const FAILURE_COLUMNS = [
  { key: 'registerNumber', header: 'Register Number' },
  { key: 'dateOfBirth', header: 'Date of Birth' },
  { key: 'kind', header: 'Failure' },
  { key: 'message', header: 'Error' },
] as const satisfies ReadonlyArray<{ key: keyof FailedLookup; header: string }>

const STATUSES: ReadonlySet<string> = new Set<ResultStatus>([
  'PASS',
  'FAIL',
  'ABSENT',
  'WITHHELD',
  'UNKNOWN',
])

const isResultStatus = (value: string): value is ResultStatus => STATUSES.has(value)

export const pivotByStudent = (rows: readonly ResultRow[]) => {
  const subjectCodes = Array.from(new Set(rows.map((row) => row.subjectCode))).sort()
  const students = new Map<string, { name: string; results: Map<string, string> }>()

  for (const row of rows) {
    let student = students.get(row.registerNumber)
    if (!student) {
      student = { name: row.studentName, results: new Map() }
      students.set(row.registerNumber, student)
    }
    student.results.set(row.subjectCode, row.result || row.marks)
  }

  return {
    header: ['Register Number', 'Student Name', ...subjectCodes],
    rows: Array.from(students.entries()).map(([registerNumber, student]) => [
      registerNumber,
      student.name,
      ...subjectCodes.map((code) => student.results.get(code) ?? ''),
    ]),
  }
}

export const writeResultWorkbook = (
  rows: readonly ResultRow[],
  failures: readonly FailedLookup[] = [],
): Buffer => {
  const workbook = XLSX.utils.book_new()

  const resultSheet = XLSX.utils.aoa_to_sheet([
    RESULT_COLUMNS.map((column) => column.header),
    ...rows.map((row) => RESULT_COLUMNS.map((column) => row[column.key])),
  ])
  XLSX.utils.book_append_sheet(workbook, resultSheet, RESULTS_SHEET)

  if (rows.length > 0) {
    const pivot = pivotByStudent(rows)
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet([pivot.header, ...pivot.rows]),
      SUMMARY_SHEET,
    )
  }

  if (failures.length > 0) {
    const failureSheet = XLSX.utils.aoa_to_sheet([
      FAILURE_COLUMNS.map((column) => column.header),
      ...failures.map((failure) => FAILURE_COLUMNS.map((column) => failure[column.key])),
    ])
    XLSX.utils.book_append_sheet(workbook, failureSheet, FAILURES_SHEET)
  }

  return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx', compression: true })
}

const normalizeHeader = (value: unknown) =>
  typeof value === 'string' ? value.replace(/\s+/g, ' ').trim().toLowerCase() : ''

const cellText = (value: unknown) => {
  if (typeof value === 'string') {
    return value
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }
  return ''
}

export const readResultWorkbook = (buffer: Buffer): ResultRow[] => {
  let workbook: XLSX.WorkBook
  try {
    workbook = XLSX.read(buffer, { type: 'buffer' })
  } catch (error) {
    throw new FormatError('File could not be read as a spreadsheet.', { cause: error })
  }
  const sheetName = workbook.SheetNames.includes(RESULTS_SHEET)
    ? RESULTS_SHEET
    : workbook.SheetNames[0]
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined
  if (!sheet) {
    throw new FormatError('Spreadsheet has no sheets.')
  }

  const [header = [], ...dataRows] = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: '',
    raw: true,
    blankrows: false,
  })
  const headers = header.map(normalizeHeader)
  const indexes = RESULT_COLUMNS.map((column) => ({
    key: column.key,
    header: column.header,
    index: headers.findIndex(
      (value) => value === column.header.toLowerCase() || value === column.key.toLowerCase(),
    ),
  }))

  const missing = indexes
    .filter((column) => column.index === -1 && column.key !== 'status')
    .map((column) => column.header)
  if (missing.length > 0) {
    throw new FormatError(`Missing required columns: ${missing.join(', ')}`)
  }

  const valueAt = (row: unknown[], key: keyof ResultRow) => {
    const column = indexes.find((entry) => entry.key === key)
    return column && column.index !== -1 ? cellText(row[column.index]) : ''
  }

  return dataRows.map((row) => {
    const result = valueAt(row, 'result')
    const status = valueAt(row, 'status')
    return {
      registerNumber: valueAt(row, 'registerNumber'),
      studentName: valueAt(row, 'studentName'),
      subjectCode: valueAt(row, 'subjectCode'),
      subjectName: valueAt(row, 'subjectName'),
      marks: valueAt(row, 'marks'),
      result,
      status: isResultStatus(status) ? status : deriveStatus(result),
    }
  })
}
