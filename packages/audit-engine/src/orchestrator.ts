import type {
  AuditConfig,
  AuditOutcome,
  AuditTarget,
  AuthCheckResult,
  CrawlResult,
  ScanResult,
  TargetSummary,
} from '@site-auditor/shared-types'
import { AUTH_CHECKS, runAuthChecks } from './authTester'
import { crawl } from './crawler'
import { AuditCancelledError, NetworkError, assertNotAborted } from './errors'
import { createHttpClient } from './http'
import type { HttpClient } from './http'
import { createLogger } from './logger'
import type { AuditLogger } from './logger'
import { createScanners } from './registry'
import { writeReport } from './reportWriter'
import { RunRecorder, aggregateStatus } from './runRecorder'
import type { Scanner } from './scanner'
import { TOOL_NOT_INSTALLED, errorResult, skippedResult } from './scanner'
import { formatPreview, summarizeRun } from './summary'
import type { CommandRunner, ToolLocator } from './toolRunner'
import { getErrorMessage, originOf, runInBatches } from './utils'

export interface RunAuditOptions {
  signal?: AbortSignal
  http?: HttpClient
  /** Sustituye el registro por defecto (tests, integraciones) */
  scanners?: Scanner[]
  locate?: ToolLocator
  run?: CommandRunner
  logger?: AuditLogger
  now?: () => Date
}

interface ScanTask {
  scanner: Scanner
  url: string
  available: boolean
}

function summarizeTarget(target: AuditTarget): TargetSummary {
  if (!target.login) return { url: target.url, origin: target.origin }
  const { loginUrl, usernameField, passwordField, protectedUrl } = target.login
  return {
    url: target.url,
    origin: target.origin,
    login: {
      loginUrl,
      usernameField,
      passwordField,
      ...(protectedUrl ? { protectedUrl } : {}),
    },
  }
}

/** URLs descubiertas más la página protegida, si no se descubrió y queda hueco */
export function buildScanSurface(
  crawlResult: CrawlResult,
  protectedUrl: string | undefined,
  maxPages: number
): string[] {
  const surface = [...crawlResult.urls]
  if (
    protectedUrl &&
    !surface.includes(protectedUrl) &&
    surface.length < maxPages
  ) {
    surface.push(protectedUrl)
  }
  return surface
}

/**
 * Pares (URL, escáner) en orden de descubrimiento y luego de registro.
 * Los escáneres de origin se agrupan con la primera URL.
 */
export function planScans(
  surface: string[],
  origin: string,
  scanners: Scanner[],
  availability: boolean[]
): ScanTask[] {
  const tasks: ScanTask[] = []
  surface.forEach((url, index) => {
    scanners.forEach((scanner, position) => {
      const available = availability[position] ?? false
      if (scanner.granularity === 'origin') {
        if (index === 0) tasks.push({ scanner, url: origin, available })
      } else if (index < (scanner.pageLimit ?? Infinity)) {
        tasks.push({ scanner, url, available })
      }
    })
  })
  return tasks
}

async function executeScans(
  tasks: ScanTask[],
  surface: readonly string[],
  concurrency: number,
  logger: AuditLogger,
  signal?: AbortSignal
): Promise<ScanResult[]> {
  const results: ScanResult[] = []
  await runInBatches(tasks, concurrency, async (task, index) => {
    assertNotAborted(signal, 'scanning')
    if (!task.available) {
      results[index] = skippedResult(task.scanner.id, task.url, TOOL_NOT_INSTALLED)
      return
    }
    const startedAt = Date.now()
    try {
      results[index] = await task.scanner.scan(task.url, { signal, surface })
    } catch (error) {
      if (signal?.aborted) throw new AuditCancelledError('scanning')
      const message = getErrorMessage(error)
      logger.error(`[${task.scanner.id}] Error inesperado en ${task.url}: ${message}`)
      results[index] = errorResult(task.scanner.id, task.url, 'unexpected', startedAt, message)
    }
  })
  assertNotAborted(signal, 'scanning')
  return results
}

async function runAuthPhase(
  target: AuditTarget,
  http: HttpClient,
  logger: AuditLogger,
  options: RunAuditOptions
): Promise<AuthCheckResult[]> {
  if (!target.login) return []
  const { signal } = options
  try {
    return await runAuthChecks(target, target.login, {
      http,
      signal,
      logger: options.logger,
    })
  } catch (error) {
    if (error instanceof AuditCancelledError || signal?.aborted) {
      throw new AuditCancelledError('auth-checking')
    }
    const message = getErrorMessage(error)
    logger.error(`El AuthTester falló: ${message}`)
    return AUTH_CHECKS.map((name) => ({
      name,
      outcome: 'inconclusive' as const,
      evidence: `Error inesperado: ${message}`,
    }))
  }
}

/**
 * Ejecuta una auditoría completa: crawl → escaneos → (auth) → agregación → reporte.
 * Sólo el fallo de la semilla (run `failed`, sin reporte), el fallo de escritura
 * (ReportIOError) y la cancelación (AuditCancelledError) salen de aquí.
 */
export async function runAudit(
  config: AuditConfig,
  options: RunAuditOptions = {}
): Promise<AuditOutcome> {
  const { signal } = options
  const logger = options.logger ?? createLogger('Orchestrator')
  const now = options.now ?? (() => new Date())
  const http = options.http ?? createHttpClient(config.requestTimeoutMs)

  assertNotAborted(signal, 'created')
  const target: AuditTarget = {
    url: config.targetUrl,
    origin: originOf(config.targetUrl) ?? config.targetUrl,
    ...(config.login ? { login: config.login } : {}),
  }
  const recorder = new RunRecorder(config.reportType, summarizeTarget(target), now())
  logger.info(`Iniciando auditoría ${config.reportType} (${recorder.snapshot.id}) de ${target.url}`)

  recorder.transition('crawling')
  let crawlResult: CrawlResult
  try {
    crawlResult = await crawl(target.url, config.maxPages, {
      http,
      signal,
      logger: options.logger,
    })
  } catch (error) {
    if (!(error instanceof NetworkError)) throw error
    logger.error(`Crawl fallido: ${error.message}`)
    const run = recorder.fail(error.message, now())
    return {
      status: 'failed',
      run,
      summary: summarizeRun(run),
      preview: formatPreview(run),
    }
  }

  const surface = buildScanSurface(crawlResult, target.login?.protectedUrl, config.maxPages)
  recorder.recordCrawl(crawlResult, surface)
  logger.info(`${surface.length} URLs en la superficie de escaneo`)

  recorder.transition('scanning')
  const scanners =
    options.scanners ?? createScanners(config, { http, locate: options.locate, run: options.run })
  const availability = await Promise.all(scanners.map((scanner) => scanner.isAvailable()))
  scanners.forEach((scanner, position) => {
    if (!availability[position]) {
      logger.warn(`Escáner ${scanner.id} no disponible: se registrará como omitido`)
    }
  })
  const tasks = planScans(surface, target.origin, scanners, availability)
  recorder.recordScans(await executeScans(tasks, surface, config.concurrency, logger, signal))

  if (config.reportType === 'security' && target.login) {
    recorder.transition('auth-checking')
    recorder.recordAuthChecks(await runAuthPhase(target, http, logger, options))
  }

  recorder.transition('aggregating')
  assertNotAborted(signal, 'aggregating')
  const run = recorder.seal(now())
  const status = aggregateStatus(run.scans)
  const location = await writeReport(run, {
    reportDir: config.reportDir,
    logger: options.logger,
  })

  logger.info(`Auditoría ${run.id} terminada con estado ${status}`)
  return {
    status,
    run,
    summary: summarizeRun(run),
    preview: formatPreview(run),
    location,
  }
}
