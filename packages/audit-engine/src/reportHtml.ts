import type {
  AuditRun,
  AuthCheckResult,
  RunSummary,
  ScanResult,
} from '@site-auditor/shared-types'

const STYLE = `
body { font-family: system-ui, sans-serif; margin: 2rem; color: #222; }
table { border-collapse: collapse; margin: .5rem 0 1rem; }
th, td { border: 1px solid #ccc; padding: .25rem .5rem; text-align: left; vertical-align: top; }
.status-ok { color: #1b7f3b; } .status-skipped { color: #8a6d00; } .status-error { color: #b3261e; }
.sev-Critical, .sev-High { color: #b3261e; font-weight: bold; } .sev-Medium { color: #b36b00; }
pre { white-space: pre-wrap; background: #f6f6f6; padding: .5rem; }
`

export function escapeHtml(value: unknown): string {
  return String(value)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

function statusClass(status: string): string {
  return `status-${status.split(':')[0]}`
}

function renderSummary(summary: RunSummary): string {
  const severities = Object.entries(summary.findingsBySeverity)
    .map(([severity, count]) => `${escapeHtml(severity)}: ${count}`)
    .join(', ')
  const rows: [string, string][] = [
    ['Target', escapeHtml(summary.target)],
    ['Tipo', escapeHtml(summary.reportType)],
    ['Estado', `<span class="${statusClass(summary.status)}">${escapeHtml(summary.status)}</span>`],
    ['Páginas escaneadas', String(summary.pagesScanned)],
    ['Checks', escapeHtml(summary.checks.join(', '))],
    ['Hallazgos', severities],
    ['Inicio', escapeHtml(summary.startedAt)],
    ['Fin', escapeHtml(summary.completedAt ?? '-')],
  ]
  return `<table id="summary">${rows
    .map(([label, value]) => `<tr><th>${label}</th><td>${value}</td></tr>`)
    .join('')}</table>`
}

function renderCrawl(run: Readonly<AuditRun>): string {
  const surface = run.surface
    .map((url) => `<li>${escapeHtml(url)}</li>`)
    .join('')
  const skipped = (run.crawl?.skipped ?? [])
    .map((skip) => `<li>${escapeHtml(skip.url)}: ${escapeHtml(skip.reason)}</li>`)
    .join('')
  return (
    `<h2>Superficie escaneada</h2><ol id="surface">${surface}</ol>` +
    (skipped ? `<h3>Páginas omitidas</h3><ul id="crawl-skipped">${skipped}</ul>` : '')
  )
}

function renderScan(scan: ScanResult): string {
  const findings = Object.entries(scan.findings)
  const findingRows = findings
    .map(
      ([key, finding]) =>
        `<tr class="finding" data-key="${escapeHtml(key)}"><td>${escapeHtml(key)}</td>` +
        `<td class="sev-${escapeHtml(finding.severity)}">${escapeHtml(finding.severity)}</td>` +
        `<td>${escapeHtml(finding.detail)}</td></tr>`
    )
    .join('')
  const metrics = scan.metrics
    ? `<table class="metrics">${Object.entries(scan.metrics)
        .map(
          ([name, value]) =>
            `<tr><th>${escapeHtml(name)}</th><td>${value === null ? '-' : escapeHtml(value)}</td></tr>`
        )
        .join('')}</table>`
    : ''
  const raw = scan.raw
    ? `<details><summary>Salida</summary><pre>${escapeHtml(scan.raw)}</pre></details>`
    : ''

  return (
    `<article class="scan" data-scanner="${escapeHtml(scan.scanner)}" data-url="${escapeHtml(scan.url)}" data-status="${escapeHtml(scan.status)}">` +
    `<h3>${escapeHtml(scan.scanner)} · ${escapeHtml(scan.url)}</h3>` +
    `<p class="${statusClass(scan.status)}">${escapeHtml(scan.status)} (${scan.durationMs} ms)</p>` +
    (findings.length > 0
      ? `<table><tr><th>Clave</th><th>Severidad</th><th>Detalle</th></tr>${findingRows}</table>`
      : '<p>Sin hallazgos</p>') +
    metrics +
    raw +
    '</article>'
  )
}

function renderAuthChecks(checks: readonly AuthCheckResult[]): string {
  const rows = checks
    .map(
      (check) =>
        `<tr class="auth-check" data-check="${escapeHtml(check.name)}" data-outcome="${escapeHtml(check.outcome)}">` +
        `<td>${escapeHtml(check.name)}</td><td>${escapeHtml(check.outcome)}</td><td>${escapeHtml(check.evidence)}</td></tr>`
    )
    .join('')
  return `<h2>Flujo de autenticación</h2><table id="auth-checks"><tr><th>Check</th><th>Resultado</th><th>Evidencia</th></tr>${rows}</table>`
}

/** Documento HTML autocontenido con todos los ScanResult y AuthCheckResult del run */
export function renderReportHtml(
  run: Readonly<AuditRun>,
  summary: RunSummary,
  title: string
): string {
  return [
    '<!DOCTYPE html>',
    '<html lang="es">',
    `<head><meta charset="utf-8"><title>${escapeHtml(title)} · ${escapeHtml(run.target.url)}</title><style>${STYLE}</style></head>`,
    '<body>',
    `<h1>${escapeHtml(title)}</h1>`,
    `<p>Run ${escapeHtml(run.id)}</p>`,
    renderSummary(summary),
    renderCrawl(run),
    `<h2>Escaneos</h2><section id="scans">${run.scans.map(renderScan).join('')}</section>`,
    run.authChecks ? renderAuthChecks(run.authChecks) : '',
    '</body>',
    '</html>',
  ].join('\n')
}
