import { readFileSync } from 'node:fs'
import * as cheerio from 'cheerio'
import type { Findings, ScanResult, Severity } from '@site-auditor/shared-types'
import type { HttpClient, HttpResponse } from './http'
import { readBody } from './http'
import { createLogger } from './logger'
import type { AuditLogger } from './logger'
import type { ScanContext, Scanner } from './scanner'
import { errorResult, okResult } from './scanner'
import { createFinding, getErrorMessage, isRecord } from './utils'

export interface Advisory {
  atOrAbove?: string
  below: string
  severity: Severity
  identifiers: string[]
  summary: string
}

export interface LibraryAdvisories {
  name: string
  aliases: string[]
  advisories: Advisory[]
}

export interface DetectedLibrary {
  name: string
  version: string
  src: string
}

const SEVERITY_RANK: Record<Severity, number> = {
  Critical: 4,
  High: 3,
  Medium: 2,
  Low: 1,
  Info: 0,
}
const SEVERITIES = Object.keys(SEVERITY_RANK)
const VERSION = String.raw`v?(\d+\.\d+(?:\.\d+)?)`
const DEFAULT_TABLE_URL = new URL(
  '../data/vulnerable-libraries.json',
  import.meta.url
)

function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && SEVERITIES.includes(value)
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string')
}

function parseAdvisory(value: unknown): Advisory {
  if (!isRecord(value)) {
    throw new Error(`Entrada de advisory inválida: ${JSON.stringify(value)}`)
  }
  const { atOrAbove, below, severity, identifiers, summary } = value
  if (
    typeof below !== 'string' ||
    !isSeverity(severity) ||
    !isStringArray(identifiers) ||
    typeof summary !== 'string'
  ) {
    throw new Error(`Entrada de advisory inválida: ${JSON.stringify(value)}`)
  }
  const advisory: Advisory = { below, severity, identifiers, summary }
  if (typeof atOrAbove === 'string') advisory.atOrAbove = atOrAbove
  else if (atOrAbove !== undefined) {
    throw new Error(`atOrAbove inválido: ${JSON.stringify(value)}`)
  }
  return advisory
}

/** Valida la tabla de versiones vulnerables leída de JSON */
export function parseAdvisoryTable(raw: unknown): LibraryAdvisories[] {
  if (!isRecord(raw) || !Array.isArray(raw.libraries)) {
    throw new Error('La tabla de librerías vulnerables no tiene "libraries"')
  }
  const libraries: unknown[] = raw.libraries
  return libraries.map((entry) => {
    const record: Record<string, unknown> = isRecord(entry) ? entry : {}
    const { name, aliases, advisories } = record
    if (
      typeof name !== 'string' ||
      !isStringArray(aliases) ||
      !Array.isArray(advisories)
    ) {
      throw new Error(`Entrada de librería inválida: ${JSON.stringify(entry)}`)
    }
    const parsed: unknown[] = advisories
    return { name, aliases, advisories: parsed.map(parseAdvisory) }
  })
}

let bundledTable: LibraryAdvisories[] | null = null

export function loadBundledAdvisories(): LibraryAdvisories[] {
  if (!bundledTable) {
    const raw: unknown = JSON.parse(readFileSync(DEFAULT_TABLE_URL, 'utf8'))
    bundledTable = parseAdvisoryTable(raw)
  }
  return bundledTable
}

/** Compara versiones x.y.z numéricamente; las partes ausentes cuentan como 0 */
export function compareVersions(a: string, b: string): number {
  const left = a.split('.').map((part) => parseInt(part, 10) || 0)
  const right = b.split('.').map((part) => parseInt(part, 10) || 0)
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0)
    if (diff !== 0) return diff < 0 ? -1 : 1
  }
  return 0
}

function inRange(version: string, advisory: Advisory): boolean {
  if (advisory.atOrAbove && compareVersions(version, advisory.atOrAbove) < 0) {
    return false
  }
  return compareVersions(version, advisory.below) < 0
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/** Patrones por convención de nombre: `/jquery-3.4.1.min.js`, `jquery@3.4.1`, `/jquery/3.4.1/`, `jquery.min.js?ver=3.4.1` */
function buildPatterns(alias: string): RegExp[] {
  const name = escapeRegExp(alias)
  return [
    new RegExp(String.raw`(?:^|[/@])${name}[-.@/]${VERSION}`, 'i'),
    new RegExp(
      String.raw`(?:^|/)${name}(?:\.(?:min|slim|bundle))*\.js\?(?:[^#]*&)?(?:ver|v|version)=${VERSION}`,
      'i'
    ),
  ]
}

/** Extrae librería y versión de la URL de un script; null si no se reconoce o no lleva versión */
export function detectLibrary(
  src: string,
  table: LibraryAdvisories[]
): DetectedLibrary | null {
  for (const library of table) {
    for (const alias of library.aliases) {
      for (const pattern of buildPatterns(alias)) {
        const match = pattern.exec(src)
        if (match) return { name: library.name, version: match[1], src }
      }
    }
  }
  return null
}

/** Una finding por librería vulnerable detectada (clave `nombre@versión`) */
export function findVulnerableLibraries(
  html: string,
  table: LibraryAdvisories[]
): Findings {
  const $ = cheerio.load(html)
  const findings: Findings = {}
  for (const element of $('script[src]').toArray()) {
    const src = $(element).attr('src')?.trim()
    if (!src) continue
    const detected = detectLibrary(src, table)
    if (!detected) continue
    const key = `${detected.name}@${detected.version}`
    if (findings[key]) continue

    const library = table.find((entry) => entry.name === detected.name)
    const matches = (library?.advisories ?? []).filter((advisory) =>
      inRange(detected.version, advisory)
    )
    if (matches.length === 0) continue

    const severity = matches.reduce<Severity>(
      (worst, advisory) =>
        SEVERITY_RANK[advisory.severity] > SEVERITY_RANK[worst]
          ? advisory.severity
          : worst,
      'Info'
    )
    const identifiers = [...new Set(matches.flatMap((m) => m.identifiers))]
    findings[key] = createFinding(
      severity,
      `${detected.name} ${detected.version} tiene vulnerabilidades conocidas: ${matches
        .map((m) => m.summary)
        .join('; ')}`,
      { src, identifiers }
    )
  }
  return findings
}

export interface JsVulnerabilityScannerOptions {
  http: HttpClient
  table?: LibraryAdvisories[]
  pageLimit?: number
  logger?: AuditLogger
}

/**
 * Detección heurística por nombre de fichero/URL de los scripts. Puede tener
 * falsos negativos (bundles, scripts sin versión en la URL).
 */
export class JsVulnerabilityScanner implements Scanner {
  readonly id = 'js-vulnerabilities' as const
  readonly granularity = 'page' as const
  readonly pageLimit?: number
  private readonly http: HttpClient
  private readonly table: LibraryAdvisories[]
  private readonly logger: AuditLogger

  constructor(options: JsVulnerabilityScannerOptions) {
    this.http = options.http
    this.table = options.table ?? loadBundledAdvisories()
    this.pageLimit = options.pageLimit
    this.logger = options.logger ?? createLogger('JsVulnerabilities')
  }

  async isAvailable(): Promise<boolean> {
    return true
  }

  async scan(url: string, context: ScanContext = {}): Promise<ScanResult> {
    const startedAt = Date.now()
    let response: HttpResponse
    try {
      response = await this.http.get<unknown>(url, { signal: context.signal })
    } catch (error) {
      const message = getErrorMessage(error)
      this.logger.warn(`No se pudo obtener ${url}: ${message}`)
      return errorResult(this.id, url, 'request-failed', startedAt, message)
    }
    const findings = findVulnerableLibraries(readBody(response), this.table)
    const count = Object.keys(findings).length
    if (count > 0) {
      this.logger.info(`${url}: ${count} librerías vulnerables detectadas`)
    }
    return okResult(this.id, url, findings, startedAt)
  }
}
