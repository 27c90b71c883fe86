import type {
  AuditJobData,
  AuditQueue,
  AuditRecord,
  AuditRecordUpdate,
  AuditStore,
} from './types'

/** Store en memoria con la misma semántica que PgAuditStore */
export class MemoryAuditStore implements AuditStore {
  readonly records = new Map<string, AuditRecord>()
  readonly updates: { id: string; update: AuditRecordUpdate }[] = []

  async create(
    record: Pick<AuditRecord, 'id' | 'targetUrl' | 'reportType'>
  ): Promise<AuditRecord> {
    const now = new Date('2024-05-01T10:20:30Z').toISOString()
    const created: AuditRecord = {
      ...record,
      status: 'queued',
      preview: null,
      location: null,
      error: null,
      createdAt: now,
      updatedAt: now,
    }
    this.records.set(record.id, created)
    return created
  }

  async update(id: string, update: AuditRecordUpdate): Promise<void> {
    this.updates.push({ id, update })
    const current = this.records.get(id)
    if (current) this.records.set(id, { ...current, ...update })
  }

  async get(id: string): Promise<AuditRecord | null> {
    return this.records.get(id) ?? null
  }
}

export class MemoryAuditQueue implements AuditQueue {
  readonly jobs: AuditJobData[] = []
  failWith: Error | null = null

  async enqueue(job: AuditJobData): Promise<void> {
    if (this.failWith) throw this.failWith
    this.jobs.push(job)
  }
}
