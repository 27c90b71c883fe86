import type {
  AuditRun,
  AuthCheckResult,
  CrawlResult,
  ReportType,
  RunPhase,
  RunStatus,
  ScanResult,
  TargetSummary,
} from '@site-auditor/shared-types'
import { isErrorStatus } from './scanner'

const TRANSITIONS: Record<RunPhase, RunPhase[]> = {
  created: ['crawling', 'failed'],
  crawling: ['scanning', 'failed'],
  scanning: ['auth-checking', 'aggregating', 'failed'],
  'auth-checking': ['aggregating', 'failed'],
  aggregating: ['persisted', 'failed'],
  persisted: [],
  failed: [],
}

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

/** Identificador de la ejecución: `YYYYMMDD_HHMMSS` en UTC, ordenable */
export function formatRunId(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  )
}

/** `partial` si algún escaneo terminó en error; los auth checks no cuentan */
export function aggregateStatus(
  scans: readonly ScanResult[]
): Extract<RunStatus, 'complete' | 'partial'> {
  return scans.some((scan) => isErrorStatus(scan.status)) ? 'partial' : 'complete'
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const nested of Object.values(value)) deepFreeze(nested)
  }
  return value
}

/**
 * Acumulador de la ejecución con un único escritor (el orquestador).
 * El resto de componentes sólo ve `snapshot`; `seal()`/`fail()` congelan el run.
 */
export class RunRecorder {
  private readonly run: AuditRun
  private sealed = false

  constructor(reportType: ReportType, target: TargetSummary, startedAt: Date) {
    this.run = {
      id: formatRunId(startedAt),
      reportType,
      target,
      phase: 'created',
      status: 'running',
      startedAt: startedAt.toISOString(),
      crawl: null,
      surface: [],
      scans: [],
    }
  }

  get snapshot(): Readonly<AuditRun> {
    return this.run
  }

  transition(next: RunPhase): void {
    this.assertOpen()
    if (!TRANSITIONS[this.run.phase].includes(next)) {
      throw new Error(`Transición inválida: ${this.run.phase} -> ${next}`)
    }
    this.run.phase = next
  }

  recordCrawl(crawl: CrawlResult, surface: string[]): void {
    this.assertOpen()
    this.run.crawl = crawl
    this.run.surface = [...surface]
  }

  recordScans(scans: ScanResult[]): void {
    this.assertOpen()
    this.run.scans.push(...scans)
  }

  recordAuthChecks(checks: AuthCheckResult[]): void {
    this.assertOpen()
    this.run.authChecks = [...checks]
  }

  /** Cierra el run con estado agregado y lo congela para el ReportWriter */
  seal(completedAt: Date): AuditRun {
    this.transition('persisted')
    this.run.status = aggregateStatus(this.run.scans)
    this.run.completedAt = completedAt.toISOString()
    this.sealed = true
    return deepFreeze(this.run)
  }

  fail(error: string, completedAt: Date): AuditRun {
    this.transition('failed')
    this.run.status = 'failed'
    this.run.error = error
    this.run.completedAt = completedAt.toISOString()
    this.sealed = true
    return deepFreeze(this.run)
  }

  private assertOpen(): void {
    if (this.sealed) throw new Error(`El run ${this.run.id} ya está cerrado`)
  }
}
