import { load } from 'cheerio'
import { FetchError, ParseError } from '../errors.js'
import type { ResultRow, ResultStatus, StudentQuery } from './types.js'

export const LOOKUP_ERROR_MESSAGES = [
  'Invalid Register Number',
  'Invalid Date of Birth',
  'No Results Found',
  'Record not found',
]

export const NAME_FALLBACK = 'Name extraction failed'

const collapseText = (value: string) => value.replace(/\s+/g, ' ').trim()

const isNumericCell = (value: string) => /^\d+(?:\.\d+)?$/.test(value)

const institutionPattern = /university|madras|institution|college/i

const statusByToken: Record<string, ResultStatus> = {
  P: 'PASS',
  PASS: 'PASS',
  PASSED: 'PASS',
  F: 'FAIL',
  FAIL: 'FAIL',
  FAILED: 'FAIL',
  RA: 'FAIL',
  REAPPEAR: 'FAIL',
  AB: 'ABSENT',
  AAA: 'ABSENT',
  ABS: 'ABSENT',
  ABSENT: 'ABSENT',
  WH: 'WITHHELD',
  WITHHELD: 'WITHHELD',
}

export const deriveStatus = (result: string): ResultStatus => {
  const token = result.toUpperCase().replace(/[^A-Z]/g, '')
  return statusByToken[token] ?? 'UNKNOWN'
}

const looksLikeName = (value: string) =>
  value.length > 3 && !institutionPattern.test(value)

export const parseResultPage = (html: string, query: StudentQuery): ResultRow[] => {
  const $ = load(html)
  const bodyText = collapseText($('body').text()).toLowerCase()

  const lookupError = LOOKUP_ERROR_MESSAGES.find((message) =>
    bodyText.includes(message.toLowerCase()),
  )
  if (lookupError) {
    throw new FetchError(`Website returned error: ${lookupError}`)
  }

  let studentName = ''
  const rows: ResultRow[] = []

  $('tr').each((_index, row) => {
    const $row = $(row)
    if ($row.find('table').length > 0) {
      return
    }
    const cells = $row
      .children('td,th')
      .toArray()
      .map((cell) => collapseText($(cell).text()))

    if (!studentName && cells.length >= 2) {
      const label = cells[0] ?? ''
      const value = (cells[1] ?? '').replace(/^[:\s]+/, '')
      if (
        label.length <= 40 &&
        /name|candidate|student/i.test(label) &&
        looksLikeName(value)
      ) {
        studentName = value
        return
      }
    }

    const tdCells = $row
      .children('td')
      .toArray()
      .map((cell) => collapseText($(cell).text()))
    if (tdCells.length < 3) {
      return
    }
    const [subjectCode = '', subjectName = '', ...rest] = tdCells
    if (!subjectCode || subjectCode.length > 15 || !/\d/.test(subjectCode)) {
      return
    }
    const filled = rest.filter(Boolean)
    if (filled.length === 0) {
      return
    }

    const marks = filled.filter(isNumericCell)
    const verdicts = filled.filter((value) => !isNumericCell(value))
    const result = verdicts[verdicts.length - 1] ?? ''

    rows.push({
      registerNumber: query.registerNumber,
      studentName: '',
      subjectCode,
      subjectName,
      marks: marks.join(' / '),
      result,
      status: deriveStatus(result),
    })
  })

  if (rows.length === 0) {
    const stillOnForm =
      $('form input[type="text"], form input:not([type])').length > 0 &&
      /regno|dob/i.test(html)
    throw new ParseError(
      stillOnForm
        ? 'Lookup form is still showing; the submission was not accepted.'
        : 'Could not extract subject data from results page.',
    )
  }

  const name = studentName || NAME_FALLBACK
  return rows.map((row) => ({ ...row, studentName: name }))
}
