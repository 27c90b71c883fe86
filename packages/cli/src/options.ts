import { Command, Option } from 'commander'
import fs from 'fs'
import path from 'path'
import {
  ConfigError,
  SEVERITIES,
  isSeverity,
  parseConfigInput,
  resolveAuditConfig,
} from '@site-auditor/audit-engine'
import type { AuditConfigInput } from '@site-auditor/audit-engine'
import type {
  AuditConfig,
  AuditOutcome,
  ScannerToggles,
  Severity,
} from '@site-auditor/shared-types'

export const EXIT_OK = 0
export const EXIT_FINDINGS = 1
export const EXIT_FAILED = 2
export const EXIT_CANCELLED = 130

/** Flags tal como los entrega commander (los números llegan como texto) */
export type CliFlags = {
  config?: string
  type?: string
  maxPages?: string
  concurrency?: string
  requestTimeout?: string
  toolTimeout?: string
  lighthousePages?: string
  jsPages?: string
  enable?: string
  disable?: string
  template?: string[]
  loginUrl?: string
  usernameField?: string
  passwordField?: string
  protectedUrl?: string
  successIndicator?: string
  reportDir?: string
  failOn: string
}

const SCANNER_FLAGS: Record<string, keyof ScannerToggles> = {
  'security-headers': 'securityHeaders',
  'js-vulnerabilities': 'jsVulnerabilities',
  lighthouse: 'lighthouse',
  ssl: 'ssl',
  nuclei: 'nuclei',
}

export function createProgram(): Command {
  return new Command()
    .name('site-audit')
    .description('Auditoría de rendimiento y seguridad de un sitio web')
    .version('0.1.0')
    .argument('[url]', 'URL objetivo (tiene prioridad sobre el fichero de configuración)')
    .option('-c, --config <path>', 'Ruta al archivo de configuración JSON de la auditoría')
    .addOption(
      new Option('--type <type>', 'Tipo de reporte').choices(['performance', 'security'])
    )
    .option('--max-pages <n>', 'Máximo de páginas a recorrer')
    .option('--concurrency <n>', 'Escaneos simultáneos')
    .option('--request-timeout <ms>', 'Timeout de cada petición HTTP')
    .option('--tool-timeout <ms>', 'Timeout de cada herramienta externa')
    .option('--lighthouse-pages <n>', 'Páginas auditadas con Lighthouse')
    .option('--js-pages <n>', 'Páginas analizadas por el escáner de librerías JS')
    .option('--enable <scanners>', `Activa escáneres (${Object.keys(SCANNER_FLAGS).join(',')})`)
    .option('--disable <scanners>', 'Desactiva escáneres, separados por comas')
    .option('-t, --template <paths...>', 'Templates de nuclei')
    .option('--login-url <url>', 'URL del formulario de login')
    .option('--username-field <name>', 'Nombre del campo de usuario')
    .option('--password-field <name>', 'Nombre del campo de contraseña')
    .option('--protected-url <url>', 'Página que requiere sesión')
    .option('--success-indicator <text>', 'Texto esperado tras un login correcto')
    .option('-o, --report-dir <dir>', 'Directorio de reportes')
    .option(
      '--fail-on <severity>',
      `Sale con código ${EXIT_FINDINGS} si hay hallazgos de esta gravedad o mayor (${SEVERITIES.join(' | ')} | none)`,
      'High'
    )
}

/** Lee y valida el fichero JSON de configuración */
export function loadConfigFile(configPath: string): AuditConfigInput {
  const resolved = path.resolve(configPath)
  if (!fs.existsSync(resolved)) {
    throw new ConfigError(`El archivo de configuración no existe en: ${resolved}`, 'config')
  }
  let content: unknown
  try {
    content = JSON.parse(fs.readFileSync(resolved, 'utf-8'))
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`JSON inválido en ${resolved}: ${reason}`, 'config')
  }
  return parseConfigInput(content)
}

function parseScannerList(list: string, flag: string): (keyof ScannerToggles)[] {
  return list
    .split(',')
    .map((name) => name.trim())
    .filter(Boolean)
    .map((name) => {
      const key = SCANNER_FLAGS[name]
      if (!key) {
        throw new ConfigError(`Escáner desconocido en --${flag}: '${name}'`, flag)
      }
      return key
    })
}

function scannerOverrides(
  base: Partial<ScannerToggles> | undefined,
  flags: CliFlags
): Partial<ScannerToggles> | undefined {
  if (!flags.enable && !flags.disable) return base
  const toggles: Partial<ScannerToggles> = { ...base }
  for (const key of parseScannerList(flags.enable ?? '', 'enable')) toggles[key] = true
  for (const key of parseScannerList(flags.disable ?? '', 'disable')) toggles[key] = false
  return toggles
}

/**
 * Combina fichero, flags y entorno. Los flags pisan al fichero; las credenciales
 * sólo llegan por fichero o por AUDIT_USERNAME / AUDIT_PASSWORD, nunca por argumentos.
 */
export function buildConfigInput(
  url: string | undefined,
  flags: CliFlags,
  file: AuditConfigInput,
  env: NodeJS.ProcessEnv
): AuditConfigInput {
  const login = {
    ...file.login,
    ...(flags.loginUrl ? { loginUrl: flags.loginUrl } : {}),
    ...(flags.usernameField ? { usernameField: flags.usernameField } : {}),
    ...(flags.passwordField ? { passwordField: flags.passwordField } : {}),
    ...(flags.protectedUrl ? { protectedUrl: flags.protectedUrl } : {}),
    ...(flags.successIndicator ? { successIndicator: flags.successIndicator } : {}),
    ...(env.AUDIT_USERNAME ? { username: env.AUDIT_USERNAME } : {}),
    ...(env.AUDIT_PASSWORD ? { password: env.AUDIT_PASSWORD } : {}),
  }

  return {
    ...file,
    targetUrl: url ?? file.targetUrl,
    reportType: flags.type ?? file.reportType,
    scanners: scannerOverrides(file.scanners, flags),
    login,
    maxPages: flags.maxPages ?? file.maxPages,
    concurrency: flags.concurrency ?? file.concurrency,
    requestTimeoutMs: flags.requestTimeout ?? file.requestTimeoutMs,
    toolTimeoutMs: flags.toolTimeout ?? file.toolTimeoutMs,
    lighthousePages: flags.lighthousePages ?? file.lighthousePages,
    jsPages: flags.jsPages ?? file.jsPages,
    nucleiTemplates: flags.template ?? file.nucleiTemplates,
    reportDir: flags.reportDir ?? file.reportDir,
  }
}

export function parseFailOn(value: string): Severity | null {
  if (value.toLowerCase() === 'none') return null
  const normalized = value.charAt(0).toUpperCase() + value.slice(1).toLowerCase()
  if (!isSeverity(normalized)) {
    throw new ConfigError(`Gravedad desconocida en --fail-on: '${value}'`, 'failOn')
  }
  return normalized
}

export function resolveCliConfig(
  url: string | undefined,
  flags: CliFlags,
  env: NodeJS.ProcessEnv = process.env
): { config: AuditConfig; failOn: Severity | null } {
  const file = flags.config ? loadConfigFile(flags.config) : {}
  return {
    config: resolveAuditConfig(buildConfigInput(url, flags, file, env), env),
    failOn: parseFailOn(flags.failOn),
  }
}

/** 0 sin hallazgos sobre el umbral, 1 con hallazgos, 2 si el run falló */
export function exitCodeFor(outcome: AuditOutcome, failOn: Severity | null): number {
  if (outcome.status === 'failed') return EXIT_FAILED
  if (!failOn) return EXIT_OK
  const threshold = SEVERITIES.indexOf(failOn)
  const blocking = SEVERITIES.slice(0, threshold + 1).some(
    (severity) => outcome.summary.findingsBySeverity[severity] > 0
  )
  return blocking ? EXIT_FINDINGS : EXIT_OK
}
