import type { ResultRow } from '../scraper/types.js'

export class ResultTable {
  private entries: ResultRow[]
  private sealed = false

  constructor(rows: ResultRow[] = []) {
    this.entries = [...rows]
  }

  append(rows: readonly ResultRow[]) {
    if (this.sealed) {
      throw new Error('Result table is sealed; rows can no longer be appended.')
    }
    this.entries.push(...rows)
  }

  seal() {
    this.sealed = true
    return this
  }

  get isSealed() {
    return this.sealed
  }

  get rows(): readonly ResultRow[] {
    return this.entries
  }

  get size() {
    return this.entries.length
  }

  registerNumbers() {
    return Array.from(new Set(this.entries.map((row) => row.registerNumber)))
  }
}
