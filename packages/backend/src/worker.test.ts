import {
  AuditCancelledError,
  ReportIOError,
  resolveAuditConfig,
  silentLogger,
} from '@site-auditor/audit-engine'
import type { AuditOutcome, RunSummary } from '@site-auditor/shared-types'
import { MemoryAuditStore } from './testHelpers'
import { createAuditProcessor } from './worker'

const CONFIG = resolveAuditConfig({ targetUrl: 'https://example.test' }, {})

const SUMMARY: RunSummary = {
  target: 'https://example.test/',
  reportType: 'security',
  status: 'partial',
  pagesScanned: 3,
  checks: ['security-headers'],
  findingsBySeverity: { Critical: 0, High: 1, Medium: 0, Low: 0, Info: 0 },
  startedAt: '2024-05-01T10:20:30.000Z',
  completedAt: '2024-05-01T10:21:00.000Z',
}

const OUTCOME: AuditOutcome = {
  status: 'partial',
  summary: SUMMARY,
  preview: JSON.stringify(SUMMARY, null, 2),
  location: 'reports/20240501_102030',
  run: {
    id: '20240501_102030',
    reportType: 'security',
    target: { url: 'https://example.test/', origin: 'https://example.test' },
    phase: 'persisted',
    status: 'partial',
    startedAt: SUMMARY.startedAt,
    completedAt: SUMMARY.completedAt,
    crawl: null,
    surface: [],
    scans: [],
  },
}

describe('createAuditProcessor', () => {
  let store: MemoryAuditStore

  beforeEach(async () => {
    store = new MemoryAuditStore()
    await store.create({ id: 'audit-1', targetUrl: CONFIG.targetUrl, reportType: 'security' })
  })

  it('stores the outcome of the run', async () => {
    const run = vi.fn(async () => OUTCOME)
    const processAudit = createAuditProcessor({ store, run, logger: silentLogger })
    const controller = new AbortController()

    const status = await processAudit({ id: 'audit-1', config: CONFIG }, controller.signal)

    expect(status).toBe('partial')
    expect(run).toHaveBeenCalledWith(CONFIG, { signal: controller.signal })
    expect(store.updates.map((u) => u.update.status)).toEqual(['running', 'partial'])
    expect(store.records.get('audit-1')).toMatchObject({
      status: 'partial',
      preview: OUTCOME.preview,
      location: 'reports/20240501_102030',
      error: null,
    })
  })

  it('records cancellation without failing the job', async () => {
    const run = vi.fn(async (): Promise<AuditOutcome> => {
      throw new AuditCancelledError('scanning')
    })
    const processAudit = createAuditProcessor({ store, run, logger: silentLogger })

    await expect(processAudit({ id: 'audit-1', config: CONFIG })).resolves.toBe('cancelled')
    expect(store.records.get('audit-1')).toMatchObject({
      status: 'cancelled',
      error: "Auditoría cancelada durante la fase 'scanning'",
    })
  })

  it('records and rethrows persistence failures', async () => {
    const failure = new ReportIOError('No se pudo escribir el reporte en reports/x: EACCES', 'reports/x')
    const run = vi.fn(async (): Promise<AuditOutcome> => {
      throw failure
    })
    const processAudit = createAuditProcessor({ store, run, logger: silentLogger })

    await expect(processAudit({ id: 'audit-1', config: CONFIG })).rejects.toBe(failure)
    expect(store.records.get('audit-1')).toMatchObject({
      status: 'failed',
      error: 'No se pudo escribir el reporte en reports/x: EACCES',
    })
  })
})
