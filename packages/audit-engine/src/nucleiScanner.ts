import type { Findings, Severity } from '@site-auditor/shared-types'
import { ExternalToolScanner } from './externalToolScanner'
import type { ExternalToolOptions, ParsedToolOutput } from './externalToolScanner'
import { createLogger } from './logger'
import type { AuditLogger } from './logger'
import type { ScanContext } from './scanner'
import type { CommandResult } from './toolRunner'
import { createFinding, isRecord } from './utils'

const SEVERITY_MAP: Record<string, Severity> = {
  critical: 'Critical',
  high: 'High',
  medium: 'Medium',
  low: 'Low',
  info: 'Info',
}

export interface NucleiMatch {
  templateId: string
  matcherName?: string
  name: string
  severity: Severity
  matchedAt: string
}

function toMatch(line: string): NucleiMatch | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(line)
  } catch {
    return null
  }
  if (!isRecord(parsed)) return null
  const templateId = parsed['template-id']
  const info = parsed.info
  if (typeof templateId !== 'string' || !isRecord(info)) return null

  const matcherName = parsed['matcher-name']
  const matchedAt = parsed['matched-at'] ?? parsed.host
  const rawSeverity = typeof info.severity === 'string' ? info.severity : 'info'
  return {
    templateId,
    ...(typeof matcherName === 'string' ? { matcherName } : {}),
    name: typeof info.name === 'string' ? info.name : templateId,
    severity: SEVERITY_MAP[rawSeverity.toLowerCase()] ?? 'Info',
    matchedAt: typeof matchedAt === 'string' ? matchedAt : '',
  }
}

/**
 * Parsea la salida JSONL de nuclei. Una línea ilegible invalida toda la salida (null).
 * Las claves repetidas reciben sufijo `#2`, `#3`...
 */
export function parseNucleiOutput(output: string): Findings | null {
  const findings: Findings = {}
  for (const line of output.split(/\r?\n/)) {
    if (!line.trim()) continue
    const match = toMatch(line)
    if (!match) return null

    const base = match.matcherName
      ? `${match.templateId}:${match.matcherName}`
      : match.templateId
    let key = base
    for (let n = 2; findings[key]; n++) key = `${base}#${n}`

    findings[key] = createFinding(
      match.severity,
      `${match.name} en ${match.matchedAt}`,
      { templateId: match.templateId, matchedAt: match.matchedAt }
    )
  }
  return findings
}

export interface NucleiScannerOptions extends ExternalToolOptions {
  templates?: string[]
  logger?: AuditLogger
}

/** Plantillas de vulnerabilidades conocidas de nuclei contra las páginas del origin */
export class NucleiScanner extends ExternalToolScanner {
  readonly id = 'nuclei' as const
  readonly granularity = 'origin' as const
  protected readonly binary = 'nuclei'
  protected readonly logger: AuditLogger
  private readonly templates: string[]

  constructor(options: NucleiScannerOptions) {
    super(options)
    this.templates = options.templates ?? []
    this.logger = options.logger ?? createLogger('Nuclei')
  }

  /** Un `-u` por URL de la superficie; sin superficie, sólo el origin */
  protected buildArgs(target: string, context: ScanContext): string[] {
    const urls = context.surface?.length ? context.surface : [target]
    return [
      ...urls.flatMap((url) => ['-u', url]),
      '-jsonl',
      '-silent',
      '-disable-update-check',
      '-no-color',
      ...this.templates.flatMap((template) => ['-t', template]),
    ]
  }

  protected parseOutput(result: CommandResult): ParsedToolOutput {
    const findings = parseNucleiOutput(result.stdout)
    if (!findings) {
      throw this.malformed('La salida de nuclei contiene líneas JSON inválidas')
    }
    const count = Object.keys(findings).length
    if (count > 0) this.logger.info(`nuclei reportó ${count} coincidencias`)
    return { findings }
  }
}
