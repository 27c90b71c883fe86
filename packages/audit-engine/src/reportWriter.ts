import { mkdir, mkdtemp, rename, rm, stat, writeFile } from 'node:fs/promises'
import path from 'node:path'
import type { AuditRun, ReportType } from '@site-auditor/shared-types'
import { ReportIOError } from './errors'
import { createLogger } from './logger'
import type { AuditLogger } from './logger'
import { renderReportHtml } from './reportHtml'
import { summarizeRun } from './summary'
import { getErrorMessage } from './utils'

export const REPORT_JSON = 'report.json'
export const REPORT_HTML = 'report.html'

export const REPORT_TITLES: Record<ReportType, string> = {
  performance: 'Performance Audit Report',
  security: 'Security Audit Report',
}

export interface ReportWriterOptions {
  reportDir: string
  logger?: AuditLogger
}

function errorCode(error: unknown): unknown {
  return error instanceof Error && 'code' in error ? error.code : undefined
}

async function exists(location: string): Promise<boolean> {
  try {
    await stat(location)
    return true
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return false
    throw error
  }
}

function candidateLocation(reportDir: string, runId: string, suffix: number): string {
  return path.join(reportDir, suffix === 0 ? runId : `${runId}_${suffix}`)
}

/**
 * Renombra el staging al primer directorio libre `<id>`, `<id>_1`, `<id>_2`...
 * Si otro escritor ocupa el candidato entre la comprobación y el rename, se prueba el siguiente.
 */
async function publishStaging(
  staging: string,
  reportDir: string,
  runId: string
): Promise<string> {
  for (let suffix = 0; ; suffix++) {
    const candidate = candidateLocation(reportDir, runId, suffix)
    // rename sobre un directorio vacío lo reemplazaría
    if (await exists(candidate)) continue
    try {
      await rename(staging, candidate)
      return candidate
    } catch (error) {
      const code = errorCode(error)
      if (code !== 'ENOTEMPTY' && code !== 'EEXIST') throw error
    }
  }
}

export function serializeRun(run: Readonly<AuditRun>): string {
  return JSON.stringify({ summary: summarizeRun(run), ...run }, null, 2)
}

/**
 * Escribe report.json y report.html en un directorio temporal hermano y lo
 * renombra al destino final; ante cualquier fallo no queda nada a medias.
 */
export async function writeReport(
  run: Readonly<AuditRun>,
  options: ReportWriterOptions
): Promise<string> {
  const logger = options.logger ?? createLogger('ReportWriter')
  const reportDir = path.resolve(options.reportDir)
  let location = path.join(reportDir, run.id)
  let staging: string | null = null

  try {
    await mkdir(reportDir, { recursive: true })
    staging = await mkdtemp(path.join(reportDir, `.${run.id}-`))

    const summary = summarizeRun(run)
    await writeFile(path.join(staging, REPORT_JSON), serializeRun(run), 'utf8')
    await writeFile(
      path.join(staging, REPORT_HTML),
      renderReportHtml(run, summary, REPORT_TITLES[run.reportType]),
      'utf8'
    )
    location = await publishStaging(staging, reportDir, run.id)
    staging = null
  } catch (error) {
    if (staging) await rm(staging, { recursive: true, force: true })
    throw new ReportIOError(
      `No se pudo escribir el reporte en ${location}: ${getErrorMessage(error)}`,
      location,
      { cause: error }
    )
  }

  logger.info(`Reporte guardado en ${location}`)
  return location
}
