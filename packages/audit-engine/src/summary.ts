import type { AuditRun, RunSummary, Severity } from '@site-auditor/shared-types'

export const AUTH_FLOW_CHECK = 'auth-flow'

/** De mayor a menor gravedad */
export const SEVERITIES: readonly Severity[] = ['Critical', 'High', 'Medium', 'Low', 'Info']

export function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((severity) => severity === value)
}

/** Resumen corto del run: primera clave de report.json y preview devuelto al llamador */
export function summarizeRun(run: Readonly<AuditRun>): RunSummary {
  const findingsBySeverity: Record<Severity, number> = {
    Critical: 0,
    High: 0,
    Medium: 0,
    Low: 0,
    Info: 0,
  }
  for (const scan of run.scans) {
    for (const finding of Object.values(scan.findings)) {
      findingsBySeverity[finding.severity] += 1
    }
  }

  const checks: string[] = [...new Set(run.scans.map((scan) => scan.scanner))]
  if (run.authChecks) checks.push(AUTH_FLOW_CHECK)

  return {
    target: run.target.url,
    reportType: run.reportType,
    status: run.status,
    pagesScanned: run.surface.length,
    checks,
    findingsBySeverity,
    startedAt: run.startedAt,
    ...(run.completedAt ? { completedAt: run.completedAt } : {}),
  }
}

export function formatPreview(run: Readonly<AuditRun>): string {
  return JSON.stringify(summarizeRun(run), null, 2)
}
