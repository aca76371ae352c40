import { describe, expect, it } from 'vitest'
import { FetchError, ParseError } from '../errors.js'
import { NAME_FALLBACK, deriveStatus, parseResultPage } from './resultPage.js'

const query = { registerNumber: '1001', dateOfBirth: '01/01/2000' }

const resultPage = (nameRow: string) => `
<html><body>
<table><tr><td>
  <table>
    <tr><td>University of Madras</td></tr>
    <tr><td>Register Number</td><td>1001</td></tr>
    ${nameRow}
  </table>
  <table>
    <tr><th>Code</th><th>Subject</th><th>Int</th><th>Ext</th><th>Total</th><th>Result</th></tr>
    <tr><td>UEN11</td><td>Mathematics</td><td>20</td><td>50</td><td>70</td><td>P</td></tr>
    <tr><td>UEN12</td><td>English</td><td>10</td><td>15</td><td>25</td><td>RA</td></tr>
    <tr><td>UEN13</td><td>Physics</td><td></td><td></td><td></td><td></td></tr>
    <tr><td>UEN14</td><td>Chemistry</td><td>AAA</td></tr>
  </table>
</td></tr></table>
</body></html>`

describe('parseResultPage', () => {
  it('reads one row per subject with marks and verdict', () => {
    const rows = parseResultPage(resultPage('<tr><td>Name</td><td>ANITHA KUMAR</td></tr>'), query)

    expect(rows).toEqual([
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
        subjectCode: 'UEN14',
        subjectName: 'Chemistry',
        marks: '',
        result: 'AAA',
        status: 'ABSENT',
      },
    ])
  })

  it('falls back when the only name candidate is the institution', () => {
    const rows = parseResultPage(
      resultPage('<tr><td>Name of Institution</td><td>UNIVERSITY OF MADRAS</td></tr>'),
      query,
    )

    expect(rows.map((row) => row.studentName)).toEqual([
      NAME_FALLBACK,
      NAME_FALLBACK,
      NAME_FALLBACK,
    ])
  })

  it('strips a leading colon from the name cell', () => {
    const rows = parseResultPage(
      resultPage('<tr><td>Candidate Name</td><td>: RAVI S</td></tr>'),
      query,
    )

    expect(rows[0]?.studentName).toBe('RAVI S')
  })

  it('turns a site error message into a FetchError', () => {
    const html = '<html><body><p>Invalid Register Number. Try again.</p></body></html>'

    expect(() => parseResultPage(html, query)).toThrow(FetchError)
    expect(() => parseResultPage(html, query)).toThrow(
      'Website returned error: Invalid Register Number',
    )
  })

  it('reports a page that still shows the lookup form', () => {
    const html = `<html><body><form>
      <input type="text" name="regno"><input type="text" name="dob">
      <input type="submit" value="Submit">
    </form></body></html>`

    expect(() => parseResultPage(html, query)).toThrow(
      new ParseError('Lookup form is still showing; the submission was not accepted.'),
    )
  })

  it('reports an unrecognized layout as a ParseError', () => {
    const html = '<html><body><div>Results will be published soon</div></body></html>'

    expect(() => parseResultPage(html, query)).toThrow(ParseError)
    expect(() => parseResultPage(html, query)).toThrow(
      'Could not extract subject data from results page.',
    )
  })
})

describe('deriveStatus', () => {
  it('maps verdict spellings', () => {
    expect(deriveStatus('Pass')).toBe('PASS')
    expect(deriveStatus('Re-Appear')).toBe('FAIL')
    expect(deriveStatus('AB')).toBe('ABSENT')
    expect(deriveStatus('WH')).toBe('WITHHELD')
    expect(deriveStatus('Distinction')).toBe('UNKNOWN')
    expect(deriveStatus('')).toBe('UNKNOWN')
  })
})
