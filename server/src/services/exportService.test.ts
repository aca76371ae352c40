import * as XLSX from 'xlsx'
import { describe, expect, it } from 'vitest'
import { FormatError } from '../errors.js'
import type { FailedLookup, ResultRow } from '../scraper/types.js'
import {
  FAILURES_SHEET,
  RESULTS_SHEET,
  SUMMARY_SHEET,
  pivotByStudent,
  readResultWorkbook,
  writeResultWorkbook,
} from './exportService.js'

const rows: ResultRow[] = [
  {
    registerNumber: '1001',
    studentName: 'ANITHA KUMAR',
    subjectCode: 'UEN12',
    subjectName: 'English',
    marks: '10 / 15 / 25',
    result: 'RA',
    status: 'FAIL',
  },
  {
    registerNumber: '1001',
    studentName: 'ANITHA KUMAR',
    subjectCode: 'UEN11',
    subjectName: 'Mathematics',
    marks: '20 / 50 / 70',
    result: 'P',
    status: 'PASS',
  },
  {
    registerNumber: '1002',
    studentName: 'RAVI S',
    subjectCode: 'UEN11',
    subjectName: 'Mathematics',
    marks: '45',
    result: '',
    status: 'UNKNOWN',
  },
]

const failures: FailedLookup[] = [
  {
    registerNumber: '1003',
    dateOfBirth: '20/11/2001',
    kind: 'fetch',
    message: 'Website returned error: Record not found',
  },
]

const sheetRows = (buffer: Buffer, sheetName: string) => {
  const workbook = XLSX.read(buffer, { type: 'buffer' })
  const sheet = workbook.Sheets[sheetName]
  if (!sheet) {
    throw new Error(`Missing sheet ${sheetName}`)
  }
  return XLSX.utils.sheet_to_json<string[]>(sheet, { header: 1, defval: '' })
}

const toXlsx = (data: unknown[][]): Buffer => {
  const workbook = XLSX.utils.book_new()
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(data), 'Sheet1')
  return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' })
}

describe('writeResultWorkbook', () => {
  it('round-trips the result rows field for field', () => {
    const buffer = writeResultWorkbook(rows, failures)

    expect(readResultWorkbook(buffer)).toEqual(rows)
  })

  it('writes one row per result under the field headers', () => {
    const data = sheetRows(writeResultWorkbook(rows), RESULTS_SHEET)

    expect(data[0]).toEqual([
      'Register Number',
      'Student Name',
      'Subject Code',
      'Subject Name',
      'Marks',
      'Result',
      'Status',
    ])
    expect(data).toHaveLength(rows.length + 1)
  })

  it('adds the summary and failure sheets only when they have content', () => {
    const full = XLSX.read(writeResultWorkbook(rows, failures), { type: 'buffer' })
    const empty = XLSX.read(writeResultWorkbook([]), { type: 'buffer' })

    expect(full.SheetNames).toEqual([RESULTS_SHEET, SUMMARY_SHEET, FAILURES_SHEET])
    expect(empty.SheetNames).toEqual([RESULTS_SHEET])
    expect(sheetRows(writeResultWorkbook(rows, failures), FAILURES_SHEET)).toEqual([
      ['Register Number', 'Date of Birth', 'Failure', 'Error'],
      ['1003', '20/11/2001', 'fetch', 'Website returned error: Record not found'],
    ])
  })

  it('writes the same content for the same table', () => {
    const first = readResultWorkbook(writeResultWorkbook(rows, failures))
    const second = readResultWorkbook(writeResultWorkbook(rows, failures))

    expect(second).toEqual(first)
  })
})

describe('pivotByStudent', () => {
  it('lays out one row per student with sorted subject columns', () => {
    expect(pivotByStudent(rows)).toEqual({
      header: ['Register Number', 'Student Name', 'UEN11', 'UEN12'],
      rows: [
        ['1001', 'ANITHA KUMAR', 'P', 'RA'],
        ['1002', 'RAVI S', '45', ''],
      ],
    })
  })
})

describe('readResultWorkbook', () => {
  it('falls back to the first sheet and derives a missing status', () => {
    const buffer = toXlsx([
      ['Register Number', 'Student Name', 'Subject Code', 'Subject Name', 'Marks', 'Result'],
      ['1001', 'ANITHA KUMAR', 'UEN11', 'Mathematics', 70, 'PASS'],
    ])

    expect(readResultWorkbook(buffer)).toEqual([
      {
        registerNumber: '1001',
        studentName: 'ANITHA KUMAR',
        subjectCode: 'UEN11',
        subjectName: 'Mathematics',
        marks: '70',
        result: 'PASS',
        status: 'PASS',
      },
    ])
  })

  it('rejects sheets without the result columns', () => {
    const buffer = toXlsx([
      ['Register Number', 'Student Name'],
      ['1001', 'ANITHA KUMAR'],
    ])

    expect(() => readResultWorkbook(buffer)).toThrow(FormatError)
    expect(() => readResultWorkbook(buffer)).toThrow(
      'Missing required columns: Subject Code, Subject Name, Marks, Result',
    )
  })
})
