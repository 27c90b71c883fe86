export { runAudit, buildScanSurface, planScans } from './orchestrator'
export type { RunAuditOptions } from './orchestrator'
export { resolveAuditConfig, parseConfigInput, auditEnv, DEFAULT_SCANNERS } from './config'
export type { AuditConfigInput } from './config'
export { crawl, extractLinks } from './crawler'
export { runAuthChecks, AUTH_CHECKS } from './authTester'
export { createScanners } from './registry'
export { writeReport, serializeRun, REPORT_TITLES, REPORT_JSON, REPORT_HTML } from './reportWriter'
export { renderReportHtml } from './reportHtml'
export { summarizeRun, formatPreview, SEVERITIES, isSeverity } from './summary'
export { RunRecorder, formatRunId, aggregateStatus } from './runRecorder'
export { createHttpClient } from './http'
export type { HttpClient } from './http'
export { createLogger, silentLogger } from './logger'
export type { AuditLogger } from './logger'
export type { Scanner, ScanContext, ScanGranularity } from './scanner'
export { SecurityHeadersScanner } from './securityHeadersScanner'
export { JsVulnerabilityScanner } from './jsVulnerabilityScanner'
export { LighthouseScanner } from './lighthouseScanner'
export { SslScanner } from './sslScanner'
export { NucleiScanner } from './nucleiScanner'
export { findExecutable, runCommand } from './toolRunner'
export type { CommandRunner, ToolLocator } from './toolRunner'
export {
  AuditError,
  NetworkError,
  ToolUnavailableError,
  ToolExecutionError,
  ReportIOError,
  ConfigError,
  AuditCancelledError,
} from './errors'
export { getErrorMessage, toSafeInt } from './utils'
