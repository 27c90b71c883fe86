export interface AuditLogger {
  info(message: string, meta?: Record<string, unknown>): void
  warn(message: string, meta?: Record<string, unknown>): void
  error(message: string, meta?: Record<string, unknown>): void
}

/** Logger de consola con prefijo de componente, ej. `[Crawler] ...` */
export function createLogger(scope: string): AuditLogger {
  const prefix = `[${scope}]`
  return {
    info: (message, meta) =>
      meta ? console.log(prefix, message, meta) : console.log(prefix, message),
    warn: (message, meta) =>
      meta ? console.warn(prefix, message, meta) : console.warn(prefix, message),
    error: (message, meta) =>
      meta
        ? console.error(prefix, message, meta)
        : console.error(prefix, message),
  }
}

export const silentLogger: AuditLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
}
