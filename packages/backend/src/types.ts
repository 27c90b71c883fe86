import type { AuditConfig, ReportType } from '@site-auditor/shared-types'

export type AuditRecordStatus =
  | 'queued'
  | 'running'
  | 'complete'
  | 'partial'
  | 'failed'
  | 'cancelled'

/** Fila de `site_audits`. Nunca contiene credenciales. */
export interface AuditRecord {
  id: string
  targetUrl: string
  reportType: ReportType
  status: AuditRecordStatus
  preview: string | null
  location: string | null
  error: string | null
  createdAt: string
  updatedAt: string
}

export type AuditRecordUpdate = Partial<
  Pick<AuditRecord, 'status' | 'preview' | 'location' | 'error'>
>

export interface AuditStore {
  create(record: Pick<AuditRecord, 'id' | 'targetUrl' | 'reportType'>): Promise<AuditRecord>
  update(id: string, update: AuditRecordUpdate): Promise<void>
  get(id: string): Promise<AuditRecord | null>
}

export interface AuditJobData {
  id: string
  config: AuditConfig
}

export interface AuditQueue {
  enqueue(job: AuditJobData): Promise<void>
}
