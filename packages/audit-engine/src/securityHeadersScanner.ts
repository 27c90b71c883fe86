import type { Findings, ScanResult, Severity } from '@site-auditor/shared-types'
import type { HttpClient, HttpResponse } from './http'
import { getHeader, getSetCookies, parseSetCookie } from './http'
import { createLogger } from './logger'
import type { AuditLogger } from './logger'
import type { ScanContext, Scanner } from './scanner'
import { errorResult, okResult } from './scanner'
import { createFinding, getErrorMessage } from './utils'

const MIN_HSTS_MAX_AGE = 15552000 // 180 días

interface HeaderRule {
  header: string
  severity: Severity
  missing: string
  /** Devuelve el detalle si el valor presente está mal configurado */
  misconfigured?: (value: string) => string | null
}

const HEADER_RULES: HeaderRule[] = [
  {
    header: 'content-security-policy',
    severity: 'Medium',
    missing: 'Falta la cabecera Content-Security-Policy',
    misconfigured: (value) =>
      /'unsafe-inline'|'unsafe-eval'/i.test(value)
        ? "La CSP permite 'unsafe-inline' o 'unsafe-eval'"
        : null,
  },
  {
    header: 'strict-transport-security',
    severity: 'Medium',
    missing: 'Falta HSTS (Strict-Transport-Security)',
    misconfigured: (value) => {
      const match = /max-age\s*=\s*"?(\d+)/i.exec(value)
      if (!match) return 'HSTS sin directiva max-age'
      const maxAge = Number(match[1])
      return maxAge < MIN_HSTS_MAX_AGE
        ? `max-age de HSTS demasiado bajo (${maxAge}s, mínimo recomendado ${MIN_HSTS_MAX_AGE}s)`
        : null
    },
  },
  {
    header: 'x-content-type-options',
    severity: 'Low',
    missing:
      'Falta la protección contra MIME sniffing (X-Content-Type-Options)',
    misconfigured: (value) =>
      value.trim().toLowerCase() === 'nosniff'
        ? null
        : `Valor inesperado '${value}' (se espera 'nosniff')`,
  },
  {
    header: 'x-frame-options',
    severity: 'Medium',
    missing: 'Falta X-Frame-Options (protección contra clickjacking)',
    misconfigured: (value) =>
      ['deny', 'sameorigin'].includes(value.trim().toLowerCase())
        ? null
        : `Valor inesperado '${value}' (se espera DENY o SAMEORIGIN)`,
  },
  {
    header: 'x-xss-protection',
    severity: 'Info',
    missing: 'Falta la cabecera X-XSS-Protection',
  },
]

/** Analiza cabeceras y cookies de una respuesta. Determinista para la misma respuesta. */
export function analyzeSecurityHeaders(
  headers: HttpResponse['headers']
): Findings {
  const findings: Findings = {}
  const csp = getHeader(headers, 'content-security-policy')

  for (const rule of HEADER_RULES) {
    const value = getHeader(headers, rule.header)
    if (value === undefined) {
      // frame-ancestors en la CSP sustituye a X-Frame-Options
      if (rule.header === 'x-frame-options' && csp?.includes('frame-ancestors')) {
        continue
      }
      findings[rule.header] = createFinding(rule.severity, rule.missing)
      continue
    }
    const problem = rule.misconfigured?.(value)
    if (problem) {
      findings[rule.header] = createFinding(rule.severity, problem, { value })
    }
  }

  const server = getHeader(headers, 'server')
  if (server && /\d/.test(server)) {
    findings.server = createFinding(
      'Info',
      `La cabecera Server revela la versión del software (${server})`
    )
  }
  const poweredBy = getHeader(headers, 'x-powered-by')
  if (poweredBy) {
    findings['x-powered-by'] = createFinding(
      'Info',
      `La cabecera X-Powered-By revela la tecnología del servidor (${poweredBy})`
    )
  }

  for (const header of getSetCookies(headers)) {
    const cookie = parseSetCookie(header)
    if (!cookie) continue
    if (!cookie.secure) {
      findings[`cookie:${cookie.name}:secure`] = createFinding(
        'Medium',
        `La cookie '${cookie.name}' no tiene el atributo Secure`
      )
    }
    if (!cookie.httpOnly) {
      findings[`cookie:${cookie.name}:httponly`] = createFinding(
        'Low',
        `La cookie '${cookie.name}' no tiene el atributo HttpOnly`
      )
    }
    if (!cookie.sameSite) {
      findings[`cookie:${cookie.name}:samesite`] = createFinding(
        'Low',
        `La cookie '${cookie.name}' no define SameSite`
      )
    } else if (cookie.sameSite.toLowerCase() === 'none' && !cookie.secure) {
      findings[`cookie:${cookie.name}:samesite`] = createFinding(
        'Medium',
        `La cookie '${cookie.name}' usa SameSite=None sin Secure`
      )
    }
  }

  return findings
}

export interface SecurityHeadersScannerOptions {
  http: HttpClient
  logger?: AuditLogger
}

/** Siempre disponible: sólo HTTP. "Sin hallazgos" es un resultado válido. */
export class SecurityHeadersScanner implements Scanner {
  readonly id = 'security-headers' as const
  readonly granularity = 'page' as const
  private readonly http: HttpClient
  private readonly logger: AuditLogger

  constructor(options: SecurityHeadersScannerOptions) {
    this.http = options.http
    this.logger = options.logger ?? createLogger('SecurityHeaders')
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
    const findings = analyzeSecurityHeaders(response.headers)
    this.logger.info(
      `${url}: ${Object.keys(findings).length} hallazgos de cabeceras`
    )
    return okResult(this.id, url, findings, startedAt)
  }
}
