export type StudentQuery = {
  readonly registerNumber: string
  readonly dateOfBirth: string
}

export type ResultStatus = 'PASS' | 'FAIL' | 'ABSENT' | 'WITHHELD' | 'UNKNOWN'

export type ResultRow = {
  registerNumber: string
  studentName: string
  subjectCode: string
  subjectName: string
  marks: string
  result: string
  status: ResultStatus
}

export type FailureKind = 'fetch' | 'parse'

export type FailedLookup = {
  registerNumber: string
  dateOfBirth: string
  kind: FailureKind
  message: string
}

export type ScrapeProgress = {
  completed: number
  total: number
  currentRegisterNumber?: string
}

export interface ResultFetcher {
  fetchResults(query: StudentQuery): Promise<ResultRow[]>
  close(): Promise<void>
}
