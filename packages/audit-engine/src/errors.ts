export type AuditErrorCode =
  | 'NETWORK_ERROR'
  | 'TOOL_UNAVAILABLE'
  | 'TOOL_EXECUTION_ERROR'
  | 'REPORT_IO_ERROR'
  | 'CONFIG_ERROR'
  | 'AUDIT_CANCELLED'

/** Error base del motor. `context` nunca debe contener credenciales. */
export class AuditError extends Error {
  readonly code: AuditErrorCode
  readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: AuditErrorCode,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = new.target.name
    this.code = code
    this.context = context
  }
}

/** La URL semilla no respondió: fatal sólo para el crawl */
export class NetworkError extends AuditError {
  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super(message, 'NETWORK_ERROR', { url }, options)
  }
}

export class ToolUnavailableError extends AuditError {
  constructor(tool: string) {
    super(`La herramienta '${tool}' no está instalada`, 'TOOL_UNAVAILABLE', {
      tool,
    })
  }
}

export type ToolFailureReason =
  | 'timeout'
  | 'exit-code'
  | 'malformed-output'
  | 'spawn-failed'
  | 'cancelled'

export class ToolExecutionError extends AuditError {
  readonly reason: ToolFailureReason

  constructor(
    tool: string,
    reason: ToolFailureReason,
    message: string,
    context: Record<string, unknown> = {}
  ) {
    super(message, 'TOOL_EXECUTION_ERROR', { tool, reason, ...context })
    this.reason = reason
  }
}

export class ReportIOError extends AuditError {
  constructor(message: string, location: string, options?: { cause?: unknown }) {
    super(message, 'REPORT_IO_ERROR', { location }, options)
  }
}

export class ConfigError extends AuditError {
  constructor(message: string, field?: string) {
    super(message, 'CONFIG_ERROR', field ? { field } : {})
  }
}

export class AuditCancelledError extends AuditError {
  constructor(phase: string) {
    super(`Auditoría cancelada durante la fase '${phase}'`, 'AUDIT_CANCELLED', {
      phase,
    })
  }
}

export function assertNotAborted(
  signal: AbortSignal | undefined,
  phase: string
): void {
  if (signal?.aborted) throw new AuditCancelledError(phase)
}
