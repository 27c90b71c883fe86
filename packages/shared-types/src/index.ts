export type Severity = 'Critical' | 'High' | 'Medium' | 'Low' | 'Info'

export type ReportType = 'performance' | 'security'

/** Configuración del flujo de login. Contiene credenciales: nunca se persiste tal cual. */
export interface LoginConfig {
  loginUrl: string
  usernameField: string
  passwordField: string
  username: string
  password: string
  protectedUrl?: string
  successIndicator?: string // Texto esperado en la respuesta tras un login correcto
}

export interface AuditTarget {
  url: string // URL semilla, normalizada
  origin: string // scheme://host[:port]
  login?: LoginConfig
}

/** Vista del target apta para el reporte (sin credenciales) */
export interface TargetSummary {
  url: string
  origin: string
  login?: {
    loginUrl: string
    usernameField: string
    passwordField: string
    protectedUrl?: string
  }
}

export interface CrawlSkip {
  url: string
  reason: string
}

export interface CrawlResult {
  seed: string
  urls: string[] // Orden de descubrimiento, la semilla siempre primero
  skipped: CrawlSkip[]
}

export type ScannerId =
  | 'security-headers'
  | 'js-vulnerabilities'
  | 'lighthouse'
  | 'ssl'
  | 'nuclei'

export type ScanStatus = 'ok' | `skipped:${string}` | `error:${string}`

export interface Finding {
  severity: Severity
  detail: string
  evidence?: Record<string, unknown>
}

export type Findings = Record<string, Finding>

export interface ScanResult {
  scanner: ScannerId
  url: string // URL de la página, o el origin para escáneres de granularidad origin
  status: ScanStatus
  findings: Findings
  metrics?: Record<string, number | null>
  raw?: string
  durationMs: number
}

export type AuthOutcome = 'pass' | 'fail' | 'inconclusive'

export interface AuthCheckResult {
  name: string
  outcome: AuthOutcome
  evidence: string
}

export type RunPhase =
  | 'created'
  | 'crawling'
  | 'scanning'
  | 'auth-checking'
  | 'aggregating'
  | 'persisted'
  | 'failed'

export type RunStatus = 'running' | 'complete' | 'partial' | 'failed'

export interface AuditRun {
  id: string // Timestamp de inicio YYYYMMDD_HHMMSS, también clave de almacenamiento
  reportType: ReportType
  target: TargetSummary
  phase: RunPhase
  status: RunStatus
  startedAt: string
  completedAt?: string
  crawl: CrawlResult | null
  surface: string[] // URLs sobre las que se ejecutaron los escáneres
  scans: ScanResult[]
  authChecks?: AuthCheckResult[]
  error?: string
}

export interface ScannerToggles {
  securityHeaders: boolean
  jsVulnerabilities: boolean
  lighthouse: boolean
  ssl: boolean
  nuclei: boolean
}

export interface AuditConfig {
  targetUrl: string
  reportType: ReportType
  scanners: ScannerToggles
  login?: LoginConfig
  maxPages: number
  concurrency: number
  requestTimeoutMs: number
  toolTimeoutMs: number
  lighthousePages: number
  jsPages: number
  nucleiTemplates: string[]
  reportDir: string
}

export interface RunSummary {
  target: string
  reportType: ReportType
  status: RunStatus
  pagesScanned: number
  checks: string[]
  findingsBySeverity: Record<Severity, number>
  startedAt: string
  completedAt?: string
}

export interface AuditOutcome {
  status: Exclude<RunStatus, 'running'>
  run: AuditRun
  summary: RunSummary
  preview: string
  location?: string // Directorio del reporte, si se persistió
}
