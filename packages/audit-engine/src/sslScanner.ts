import type { Findings, Severity } from '@site-auditor/shared-types'
import { ExternalToolScanner } from './externalToolScanner'
import type { ExternalToolOptions, ParsedToolOutput } from './externalToolScanner'
import { createLogger } from './logger'
import type { AuditLogger } from './logger'
import type { CommandResult } from './toolRunner'
import { createFinding } from './utils'

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g
const PROTOCOL_LINE = /^(SSLv2|SSLv3|TLSv1\.[0-3])\s+(enabled|disabled)/
const CIPHER_LINE = /^(Preferred|Accepted)\s+(\S+)\s+(\d+)\s+bits\s+(\S+)/
const WEAK_CIPHER = /RC4|DES|NULL|EXP|anon|MD5/i
const BROKEN_CIPHER = /NULL|EXP|anon/i
const MIN_RSA_BITS = 2048

const PROTOCOL_SEVERITY: Record<string, Severity> = {
  SSLv2: 'High',
  SSLv3: 'High',
  'TLSv1.0': 'Medium',
  'TLSv1.1': 'Medium',
}

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '')
}

/** `host:port` para sslscan; el puerto por defecto depende del esquema */
export function sslTarget(target: string): string {
  const url = new URL(target)
  const port = url.port || (url.protocol === 'https:' ? '443' : '80')
  return `${url.hostname}:${port}`
}

/**
 * Convierte la salida de texto de sslscan en findings.
 * Devuelve null si no aparece ninguna línea de protocolo ni de cipher.
 */
export function parseSslscanOutput(
  output: string,
  now: Date = new Date()
): Findings | null {
  const findings: Findings = {}
  let recognised = false

  for (const rawLine of stripAnsi(output).split(/\r?\n/)) {
    const line = rawLine.trim()
    if (!line) continue

    const protocol = PROTOCOL_LINE.exec(line)
    if (protocol) {
      recognised = true
      const [, name, state] = protocol
      const severity = PROTOCOL_SEVERITY[name]
      if (state === 'enabled' && severity) {
        findings[`protocol:${name}`] = createFinding(
          severity,
          `Protocolo obsoleto habilitado: ${name}`,
          { line }
        )
      }
      continue
    }

    const cipher = CIPHER_LINE.exec(line)
    if (cipher) {
      recognised = true
      const [, , proto, bitsText, name] = cipher
      const bits = parseInt(bitsText, 10)
      if (WEAK_CIPHER.test(name)) {
        findings[`cipher:${name}`] = createFinding(
          BROKEN_CIPHER.test(name) ? 'High' : 'Medium',
          `Cipher débil aceptado (${proto}): ${name}`,
          { line }
        )
      } else if (bits < 128) {
        findings[`cipher:${name}`] = createFinding(
          'Medium',
          `Cipher con clave corta (${bits} bits, ${proto}): ${name}`,
          { line }
        )
      }
      continue
    }

    if (/vulnerable to heartbleed/i.test(line) && !/not vulnerable/i.test(line)) {
      findings['heartbleed'] = createFinding(
        'Critical',
        'El servidor es vulnerable a Heartbleed',
        { line }
      )
    } else if (/insecure session renegotiation supported/i.test(line)) {
      findings['renegotiation'] = createFinding(
        'Medium',
        'Renegociación de sesión insegura soportada',
        { line }
      )
    } else if (/^compression enabled/i.test(line)) {
      findings['compression'] = createFinding(
        'Medium',
        'Compresión TLS habilitada (CRIME)',
        { line }
      )
    } else if (/server does not support tls fallback scsv/i.test(line)) {
      findings['fallback-scsv'] = createFinding(
        'Low',
        'El servidor no soporta TLS Fallback SCSV',
        { line }
      )
    } else if (/^signature algorithm:/i.test(line) && /sha1|md5/i.test(line)) {
      findings['certificate:signature'] = createFinding(
        'Medium',
        'Certificado firmado con un algoritmo débil',
        { line }
      )
    } else if (/^rsa key strength:/i.test(line)) {
      const bits = parseInt(line.replace(/^rsa key strength:/i, ''), 10)
      if (bits < MIN_RSA_BITS) {
        findings['certificate:key-strength'] = createFinding(
          'Medium',
          `Clave RSA del certificado demasiado corta (${bits} bits)`,
          { line }
        )
      }
    } else if (/^not valid after:/i.test(line)) {
      const notAfter = new Date(line.replace(/^not valid after:/i, '').trim())
      if (!Number.isNaN(notAfter.getTime()) && notAfter < now) {
        findings['certificate:expired'] = createFinding(
          'High',
          `Certificado caducado desde ${notAfter.toISOString()}`,
          { line }
        )
      }
    }
  }

  return recognised ? findings : null
}

export interface SslScannerOptions extends ExternalToolOptions {
  logger?: AuditLogger
  now?: () => Date
}

/** Configuración TLS del origin vía sslscan (una ejecución por origin) */
export class SslScanner extends ExternalToolScanner {
  readonly id = 'ssl' as const
  readonly granularity = 'origin' as const
  protected readonly binary = 'sslscan'
  protected readonly logger: AuditLogger
  private readonly now: () => Date

  constructor(options: SslScannerOptions) {
    super(options)
    this.logger = options.logger ?? createLogger('SslScanner')
    this.now = options.now ?? (() => new Date())
  }

  protected preflight(target: string): ParsedToolOutput | null {
    if (new URL(target).protocol === 'https:') return null
    return {
      findings: {
        'protocol:no-tls': createFinding(
          'High',
          'El origin se sirve sin TLS (http)',
          { target }
        ),
      },
    }
  }

  protected buildArgs(target: string): string[] {
    return ['--no-colour', sslTarget(target)]
  }

  protected parseOutput(result: CommandResult): ParsedToolOutput {
    const findings = parseSslscanOutput(result.stdout, this.now())
    if (!findings) {
      throw this.malformed('La salida de sslscan no contiene protocolos ni ciphers')
    }
    return { findings, raw: stripAnsi(result.stdout).trim() }
  }
}
