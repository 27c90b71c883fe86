import type { AuditConfig } from '@site-auditor/shared-types'
import type { HttpClient } from './http'
import { JsVulnerabilityScanner } from './jsVulnerabilityScanner'
import { LighthouseScanner } from './lighthouseScanner'
import { NucleiScanner } from './nucleiScanner'
import type { Scanner } from './scanner'
import { SecurityHeadersScanner } from './securityHeadersScanner'
import { SslScanner } from './sslScanner'
import type { CommandRunner, ToolLocator } from './toolRunner'

export interface ScannerDependencies {
  http: HttpClient
  locate?: ToolLocator
  run?: CommandRunner
}

/**
 * Escáneres activos en orden de registro fijo:
 * securityHeaders, jsVulnerabilities, lighthouse, ssl, nuclei.
 */
export function createScanners(
  config: AuditConfig,
  { http, locate, run }: ScannerDependencies
): Scanner[] {
  const tool = { timeoutMs: config.toolTimeoutMs, locate, run }
  const scanners: Scanner[] = []
  if (config.scanners.securityHeaders) {
    scanners.push(new SecurityHeadersScanner({ http }))
  }
  if (config.scanners.jsVulnerabilities) {
    scanners.push(new JsVulnerabilityScanner({ http, pageLimit: config.jsPages }))
  }
  if (config.scanners.lighthouse) {
    scanners.push(new LighthouseScanner({ ...tool, pageLimit: config.lighthousePages }))
  }
  if (config.scanners.ssl) {
    scanners.push(new SslScanner(tool))
  }
  if (config.scanners.nuclei) {
    scanners.push(new NucleiScanner({ ...tool, templates: config.nucleiTemplates }))
  }
  return scanners
}
