import type { Findings, Severity } from '@site-auditor/shared-types'
import { ExternalToolScanner } from './externalToolScanner'
import type { ExternalToolOptions, ParsedToolOutput } from './externalToolScanner'
import { createLogger } from './logger'
import type { AuditLogger } from './logger'
import type { CommandResult } from './toolRunner'
import { createFinding, isRecord } from './utils'

export const LIGHTHOUSE_CATEGORIES = [
  { id: 'performance', label: 'Performance' },
  { id: 'accessibility', label: 'Accessibility' },
  { id: 'best-practices', label: 'Best Practices' },
  { id: 'seo', label: 'SEO' },
] as const

export const LIGHTHOUSE_METRICS = {
  FCP: 'first-contentful-paint',
  LCP: 'largest-contentful-paint',
  TTI: 'interactive',
  TBT: 'total-blocking-time',
  CLS: 'cumulative-layout-shift',
} as const

function scoreSeverity(score: number): Severity {
  if (score >= 0.9) return 'Info'
  if (score >= 0.5) return 'Medium'
  return 'High'
}

export interface LighthouseScannerOptions extends ExternalToolOptions {
  logger?: AuditLogger
}

/** Puntuaciones de las cuatro categorías (una finding por categoría) y métricas de carga */
export class LighthouseScanner extends ExternalToolScanner {
  readonly id = 'lighthouse' as const
  readonly granularity = 'page' as const
  protected readonly binary = 'lighthouse'
  protected readonly logger: AuditLogger

  constructor(options: LighthouseScannerOptions) {
    super(options)
    this.logger = options.logger ?? createLogger('Lighthouse')
  }

  protected buildArgs(target: string): string[] {
    return [
      target,
      '--quiet',
      '--chrome-flags=--headless=new --no-sandbox',
      '--output=json',
      '--output-path=stdout',
      `--only-categories=${LIGHTHOUSE_CATEGORIES.map((c) => c.id).join(',')}`,
    ]
  }

  protected parseOutput(result: CommandResult): ParsedToolOutput {
    let report: unknown
    try {
      report = JSON.parse(result.stdout)
    } catch {
      throw this.malformed('La salida de Lighthouse no es JSON válido')
    }
    if (!isRecord(report)) throw this.malformed('Reporte de Lighthouse vacío')
    const { categories, audits, runtimeError } = report
    if (isRecord(runtimeError) && typeof runtimeError.code === 'string') {
      throw this.malformed(`Lighthouse reportó un error: ${runtimeError.code}`)
    }
    if (!isRecord(categories) || !isRecord(audits)) {
      throw this.malformed('Faltan "categories" o "audits" en el reporte')
    }

    const findings: Findings = {}
    for (const { id, label } of LIGHTHOUSE_CATEGORIES) {
      const category = categories[id]
      const score = isRecord(category) ? category.score : undefined
      if (typeof score !== 'number') {
        throw this.malformed(`Categoría '${id}' sin puntuación`)
      }
      findings[`category:${id}`] = createFinding(
        scoreSeverity(score),
        `Puntuación de ${label}: ${Math.round(score * 100)}/100`,
        { score }
      )
    }

    const metrics: Record<string, number | null> = {}
    for (const [name, auditId] of Object.entries(LIGHTHOUSE_METRICS)) {
      const audit = audits[auditId]
      const value = isRecord(audit) ? audit.numericValue : undefined
      metrics[name] = typeof value === 'number' ? value : null
    }

    return { findings, metrics }
  }
}
