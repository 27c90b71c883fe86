import type { Pool } from 'pg'
import type { ReportType } from '@site-auditor/shared-types'
import type {
  AuditRecord,
  AuditRecordStatus,
  AuditRecordUpdate,
  AuditStore,
} from './types'

interface AuditRow {
  id: string
  target_url: string
  report_type: ReportType
  status: AuditRecordStatus
  preview: string | null
  location: string | null
  error: string | null
  created_at: Date
  updated_at: Date
}

export const CREATE_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS site_audits (
  id TEXT PRIMARY KEY,
  target_url TEXT NOT NULL,
  report_type TEXT NOT NULL,
  status TEXT NOT NULL,
  preview TEXT,
  location TEXT,
  error TEXT,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
)`

const UPDATABLE_COLUMNS = [
  'status',
  'preview',
  'location',
  'error',
] as const satisfies readonly (keyof AuditRecordUpdate)[]

function toRecord(row: AuditRow): AuditRecord {
  return {
    id: row.id,
    targetUrl: row.target_url,
    reportType: row.report_type,
    status: row.status,
    preview: row.preview,
    location: row.location,
    error: row.error,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  }
}

/** Estado de las auditorías en PostgreSQL */
export class PgAuditStore implements AuditStore {
  constructor(private readonly pool: Pool) {}

  async ensureSchema(): Promise<void> {
    await this.pool.query(CREATE_TABLE_SQL)
  }

  async create(
    record: Pick<AuditRecord, 'id' | 'targetUrl' | 'reportType'>
  ): Promise<AuditRecord> {
    const result = await this.pool.query<AuditRow>(
      `INSERT INTO site_audits(id, target_url, report_type, status)
       VALUES($1, $2, $3, 'queued') RETURNING *`,
      [record.id, record.targetUrl, record.reportType]
    )
    return toRecord(result.rows[0])
  }

  async update(id: string, update: AuditRecordUpdate): Promise<void> {
    const assignments: string[] = []
    const values: unknown[] = [id]
    for (const column of UPDATABLE_COLUMNS) {
      const value = update[column]
      if (value === undefined) continue
      values.push(value)
      assignments.push(`${column} = $${values.length}`)
    }
    if (assignments.length === 0) return
    await this.pool.query(
      `UPDATE site_audits SET ${assignments.join(', ')}, updated_at = now() WHERE id = $1`,
      values
    )
  }

  async get(id: string): Promise<AuditRecord | null> {
    const result = await this.pool.query<AuditRow>(
      'SELECT * FROM site_audits WHERE id = $1',
      [id]
    )
    return result.rows.length > 0 ? toRecord(result.rows[0]) : null
  }
}
