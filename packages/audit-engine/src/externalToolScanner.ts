import type {
  Findings,
  ScanResult,
  ScannerId,
} from '@site-auditor/shared-types'
import { ToolExecutionError, ToolUnavailableError } from './errors'
import type { ToolFailureReason } from './errors'
import type { AuditLogger } from './logger'
import type { ScanContext, ScanGranularity, Scanner } from './scanner'
import { TOOL_NOT_INSTALLED, errorResult, okResult, skippedResult } from './scanner'
import { findExecutable, runCommand } from './toolRunner'
import type { CommandResult, CommandRunner, ToolLocator } from './toolRunner'

const ERROR_EXCERPT_CHARS = 2000

export interface ExternalToolOptions {
  timeoutMs: number
  pageLimit?: number
  locate?: ToolLocator
  run?: CommandRunner
}

export interface ParsedToolOutput {
  findings: Findings
  metrics?: Record<string, number | null>
  raw?: string
}

function reasonLabel(reason: ToolFailureReason, result: CommandResult): string {
  return reason === 'exit-code' ? `exit-code-${result.exitCode}` : reason
}

function excerpt(text: string): string | undefined {
  const trimmed = text.trim()
  if (!trimmed) return undefined
  return trimmed.length > ERROR_EXCERPT_CHARS
    ? trimmed.slice(-ERROR_EXCERPT_CHARS)
    : trimmed
}

/**
 * Base de los escáneres respaldados por un ejecutable externo.
 * Binario ausente → `skipped:tool-not-installed`; timeout, caída o salida ilegible → `error:<motivo>`.
 * La salida nunca se parsea parcialmente.
 */
export abstract class ExternalToolScanner implements Scanner {
  abstract readonly id: ScannerId
  abstract readonly granularity: ScanGranularity
  readonly pageLimit?: number
  protected abstract readonly binary: string
  protected abstract readonly logger: AuditLogger
  protected readonly timeoutMs: number
  private readonly locate: ToolLocator
  private readonly run: CommandRunner

  protected constructor(options: ExternalToolOptions) {
    this.timeoutMs = options.timeoutMs
    this.pageLimit = options.pageLimit
    this.locate = options.locate ?? findExecutable
    this.run = options.run ?? runCommand
  }

  protected abstract buildArgs(target: string, context: ScanContext): string[]

  /** Lanza ToolExecutionError('malformed-output') si la salida no es válida */
  protected abstract parseOutput(
    result: CommandResult,
    target: string
  ): ParsedToolOutput

  /** Permite resolver el target sin ejecutar la herramienta (ej. origin sin TLS) */
  protected preflight(_target: string): ParsedToolOutput | null {
    return null
  }

  async isAvailable(): Promise<boolean> {
    return (await this.locate(this.binary)) !== null
  }

  async scan(target: string, context: ScanContext = {}): Promise<ScanResult> {
    const startedAt = Date.now()
    let executable: string
    try {
      executable = await this.requireExecutable()
    } catch (error) {
      if (!(error instanceof ToolUnavailableError)) throw error
      this.logger.warn(error.message)
      return skippedResult(this.id, target, TOOL_NOT_INSTALLED)
    }

    const early = this.preflight(target)
    if (early) return this.toResult(target, early, startedAt)

    this.logger.info(`Ejecutando ${this.binary} contra ${target}`)
    const result = await this.run({
      command: executable,
      args: this.buildArgs(target, context),
      timeoutMs: this.timeoutMs,
      signal: context.signal,
    })

    try {
      this.assertCompleted(result)
      return this.toResult(target, this.parseOutput(result, target), startedAt)
    } catch (error) {
      if (!(error instanceof ToolExecutionError)) throw error
      this.logger.warn(`${this.binary} falló contra ${target}: ${error.message}`)
      return errorResult(
        this.id,
        target,
        reasonLabel(error.reason, result),
        startedAt,
        excerpt(result.stderr) ?? error.message
      )
    }
  }

  private async requireExecutable(): Promise<string> {
    const executable = await this.locate(this.binary)
    if (!executable) throw new ToolUnavailableError(this.binary)
    return executable
  }

  private toResult(
    target: string,
    parsed: ParsedToolOutput,
    startedAt: number
  ): ScanResult {
    return okResult(this.id, target, parsed.findings, startedAt, {
      ...(parsed.metrics ? { metrics: parsed.metrics } : {}),
      ...(parsed.raw ? { raw: parsed.raw } : {}),
    })
  }

  protected malformed(message: string): ToolExecutionError {
    return new ToolExecutionError(this.binary, 'malformed-output', message)
  }

  private assertCompleted(result: CommandResult): void {
    if (result.aborted) {
      throw new ToolExecutionError(this.binary, 'cancelled', 'Ejecución cancelada')
    }
    if (result.timedOut) {
      throw new ToolExecutionError(
        this.binary,
        'timeout',
        `Timeout tras ${this.timeoutMs}ms`
      )
    }
    if (result.error) {
      throw new ToolExecutionError(this.binary, 'spawn-failed', result.error)
    }
    if (result.exitCode !== 0) {
      throw new ToolExecutionError(
        this.binary,
        'exit-code',
        `Código de salida ${result.exitCode}`,
        { exitCode: result.exitCode }
      )
    }
    if (result.truncated) {
      throw this.malformed('Salida truncada: supera el límite de captura')
    }
  }
}
