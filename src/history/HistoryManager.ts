/**
 * Bounded, most-recent-first record log.
 */
export class HistoryManager<T> {
  private static readonly DEFAULT_MAX_RECORDS = 50

  private records: T[] = []

  constructor(
    private maxRecords: number = HistoryManager.DEFAULT_MAX_RECORDS
  ) {}

  addRecord(record: T): void {
    // Add new record and trim to max size
    this.records.unshift(record)
    if (this.records.length > this.maxRecords) {
      this.records = this.records.slice(0, this.maxRecords)
    }
  }

  getRecent(limit?: number): T[] {
    if (limit === undefined) return [...this.records]

    return this.records.slice(0, Math.max(0, limit))
  }

  get size(): number {
    return this.records.length
  }

  clear(): void {
    this.records = []
  }
}
