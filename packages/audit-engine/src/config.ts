import type {
  AuditConfig,
  LoginConfig,
  ReportType,
  ScannerToggles,
} from '@site-auditor/shared-types'
import { ConfigError } from './errors'
import { isRecord, isSameOrigin, normalizeUrl, originOf, toSafeInt } from './utils'

/** Entrada parcial (fichero JSON, flags de CLI o body de la API) antes de resolver defaults */
export interface AuditConfigInput {
  targetUrl?: string
  reportType?: string
  scanners?: Partial<ScannerToggles>
  login?: Partial<LoginConfig>
  maxPages?: number | string
  concurrency?: number | string
  requestTimeoutMs?: number | string
  toolTimeoutMs?: number | string
  lighthousePages?: number | string
  jsPages?: number | string
  nucleiTemplates?: string[]
  reportDir?: string
}

export const DEFAULT_SCANNERS: Record<ReportType, ScannerToggles> = {
  performance: {
    securityHeaders: true,
    jsVulnerabilities: true,
    lighthouse: true,
    ssl: false,
    nuclei: false,
  },
  security: {
    securityHeaders: true,
    jsVulnerabilities: true,
    lighthouse: false,
    ssl: false,
    nuclei: false,
  },
}

/** Defaults leídos del entorno (AUDIT_*) */
export function auditEnv(env: NodeJS.ProcessEnv = process.env) {
  return {
    reportDir: env.AUDIT_REPORT_DIR || 'reports',
    maxPages: toSafeInt(env.AUDIT_MAX_PAGES, 50, 1, 1000),
    concurrency: toSafeInt(env.AUDIT_CONCURRENCY, 4, 1, 32),
    requestTimeoutMs: toSafeInt(env.AUDIT_REQUEST_TIMEOUT_MS, 15000, 1000, 120000),
    toolTimeoutMs: toSafeInt(env.AUDIT_TOOL_TIMEOUT_MS, 180000, 1000, 1800000),
  }
}

function resolveScanners(
  reportType: ReportType,
  overrides: Partial<ScannerToggles> = {}
): ScannerToggles {
  const defaults = DEFAULT_SCANNERS[reportType]
  return {
    securityHeaders: overrides.securityHeaders ?? defaults.securityHeaders,
    jsVulnerabilities: overrides.jsVulnerabilities ?? defaults.jsVulnerabilities,
    lighthouse: overrides.lighthouse ?? defaults.lighthouse,
    ssl: overrides.ssl ?? defaults.ssl,
    nuclei: overrides.nuclei ?? defaults.nuclei,
  }
}

function isReportType(value: string): value is ReportType {
  return value === 'performance' || value === 'security'
}

function positiveInt(
  value: number | string | undefined,
  fallback: number,
  max: number,
  field: string
): number {
  if (value === undefined || value === '') return fallback
  const parsed = typeof value === 'string' ? Number(value) : value
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new ConfigError(`'${field}' debe ser un entero positivo`, field)
  }
  return toSafeInt(parsed, fallback, 1, max)
}

function sameOriginUrl(raw: string, origin: string, field: string): string {
  const url = normalizeUrl(raw, origin)
  if (!url || !isSameOrigin(url, origin)) {
    throw new ConfigError(`'${field}' debe pertenecer al origin ${origin}`, field)
  }
  return url
}

function resolveLogin(
  login: Partial<LoginConfig>,
  origin: string
): LoginConfig {
  const { loginUrl, usernameField, passwordField, username, password } = login
  if (!loginUrl || !usernameField || !passwordField || !username || !password) {
    throw new ConfigError(
      'El login requiere loginUrl, usernameField, passwordField, username y password',
      'login'
    )
  }
  return {
    loginUrl: sameOriginUrl(loginUrl, origin, 'login.loginUrl'),
    usernameField,
    passwordField,
    username,
    password,
    ...(login.protectedUrl
      ? { protectedUrl: sameOriginUrl(login.protectedUrl, origin, 'login.protectedUrl') }
      : {}),
    ...(login.successIndicator ? { successIndicator: login.successIndicator } : {}),
  }
}

/** Valida la entrada y completa los valores ausentes con los del entorno */
export function resolveAuditConfig(
  input: AuditConfigInput,
  env: NodeJS.ProcessEnv = process.env
): AuditConfig {
  const defaults = auditEnv(env)
  const targetUrl = input.targetUrl ? normalizeUrl(input.targetUrl.trim()) : null
  const origin = targetUrl ? originOf(targetUrl) : null
  if (!targetUrl || !origin) {
    throw new ConfigError('La URL objetivo debe ser http(s) y válida', 'targetUrl')
  }

  const reportType = input.reportType ?? 'security'
  if (!isReportType(reportType)) {
    throw new ConfigError(
      `Tipo de reporte desconocido: '${reportType}' (performance | security)`,
      'reportType'
    )
  }

  const hasLogin =
    input.login !== undefined &&
    Object.values(input.login).some((value) => value !== undefined && value !== '')

  return {
    targetUrl,
    reportType,
    scanners: resolveScanners(reportType, input.scanners),
    ...(hasLogin && input.login ? { login: resolveLogin(input.login, origin) } : {}),
    maxPages: positiveInt(input.maxPages, defaults.maxPages, 1000, 'maxPages'),
    concurrency: positiveInt(input.concurrency, defaults.concurrency, 32, 'concurrency'),
    requestTimeoutMs: positiveInt(
      input.requestTimeoutMs,
      defaults.requestTimeoutMs,
      120000,
      'requestTimeoutMs'
    ),
    toolTimeoutMs: positiveInt(
      input.toolTimeoutMs,
      defaults.toolTimeoutMs,
      1800000,
      'toolTimeoutMs'
    ),
    lighthousePages: positiveInt(input.lighthousePages, 1, 1000, 'lighthousePages'),
    jsPages: positiveInt(input.jsPages, 30, 1000, 'jsPages'),
    nucleiTemplates: input.nucleiTemplates ?? [],
    reportDir: input.reportDir || defaults.reportDir,
  }
}

const TOGGLE_KEYS = [
  'securityHeaders',
  'jsVulnerabilities',
  'lighthouse',
  'ssl',
  'nuclei',
] as const satisfies readonly (keyof ScannerToggles)[]

const LOGIN_KEYS = [
  'loginUrl',
  'usernameField',
  'passwordField',
  'username',
  'password',
  'protectedUrl',
  'successIndicator',
] as const satisfies readonly (keyof LoginConfig)[]

const NUMERIC_KEYS = [
  'maxPages',
  'concurrency',
  'requestTimeoutMs',
  'toolTimeoutMs',
  'lighthousePages',
  'jsPages',
] as const satisfies readonly (keyof AuditConfigInput)[]

function readString(
  source: Record<string, unknown>,
  key: string,
  field: string
): string | undefined {
  const value = source[key]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'string') {
    throw new ConfigError(`'${field}' debe ser un texto`, field)
  }
  return value
}

function readNumeric(
  source: Record<string, unknown>,
  key: string
): number | string | undefined {
  const value = source[key]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'number' && typeof value !== 'string') {
    throw new ConfigError(`'${key}' debe ser un entero positivo`, key)
  }
  return value
}

function readObject(
  source: Record<string, unknown>,
  key: string
): Record<string, unknown> | undefined {
  const value = source[key]
  if (value === undefined || value === null) return undefined
  if (!isRecord(value)) {
    throw new ConfigError(`'${key}' debe ser un objeto`, key)
  }
  return value
}

/**
 * Valida la forma de una entrada sin tipar (JSON de fichero o body de la API).
 * Sólo comprueba tipos; los valores se validan en `resolveAuditConfig`.
 */
export function parseConfigInput(value: unknown): AuditConfigInput {
  if (!isRecord(value)) {
    throw new ConfigError('La configuración debe ser un objeto JSON')
  }
  const input: AuditConfigInput = {
    targetUrl: readString(value, 'targetUrl', 'targetUrl'),
    reportType: readString(value, 'reportType', 'reportType'),
    reportDir: readString(value, 'reportDir', 'reportDir'),
  }
  for (const key of NUMERIC_KEYS) input[key] = readNumeric(value, key)

  const scanners = readObject(value, 'scanners')
  if (scanners) {
    const toggles: Partial<ScannerToggles> = {}
    for (const key of TOGGLE_KEYS) {
      const toggle = scanners[key]
      if (toggle === undefined) continue
      if (typeof toggle !== 'boolean') {
        throw new ConfigError(`'scanners.${key}' debe ser booleano`, `scanners.${key}`)
      }
      toggles[key] = toggle
    }
    input.scanners = toggles
  }

  const login = readObject(value, 'login')
  if (login) {
    const fields: Partial<LoginConfig> = {}
    for (const key of LOGIN_KEYS) {
      const field = readString(login, key, `login.${key}`)
      if (field !== undefined) fields[key] = field
    }
    input.login = fields
  }

  const templates = value.nucleiTemplates
  if (templates !== undefined && templates !== null) {
    if (!Array.isArray(templates) || !templates.every((t): t is string => typeof t === 'string')) {
      throw new ConfigError("'nucleiTemplates' debe ser una lista de rutas", 'nucleiTemplates')
    }
    input.nucleiTemplates = templates
  }
  return input
}
