import { FetchError } from '../errors.js'
import { deriveStatus } from './resultPage.js'
import type { ResultFetcher, ResultRow, StudentQuery } from './types.js'

export type StubSubject = Partial<ResultRow> & { subjectName: string }

export type StubResponse = StubSubject[] | Error

export class StubResultFetcher implements ResultFetcher {
  readonly calls: StudentQuery[] = []
  closed = false

  constructor(private readonly responses: Record<string, StubResponse>) {}

  async fetchResults(query: StudentQuery): Promise<ResultRow[]> {
    this.calls.push(query)
    const response = this.responses[query.registerNumber]
    if (!response) {
      throw new FetchError(`No stub response for ${query.registerNumber}.`)
    }
    if (response instanceof Error) {
      throw response
    }
    return response.map((subject, index) => ({
      registerNumber: subject.registerNumber ?? query.registerNumber,
      studentName: subject.studentName ?? 'TEST STUDENT',
      subjectCode: subject.subjectCode ?? `SUB${index + 1}`,
      subjectName: subject.subjectName,
      marks: subject.marks ?? '',
      result: subject.result ?? '',
      status: subject.status ?? deriveStatus(subject.result ?? ''),
    }))
  }

  async close() {
    this.closed = true
  }
}
