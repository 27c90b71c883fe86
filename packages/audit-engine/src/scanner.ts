import type {
  Findings,
  ScanResult,
  ScannerId,
} from '@site-auditor/shared-types'

/** `page`: una ejecución por URL descubierta. `origin`: una sola contra el origin del target. */
export type ScanGranularity = 'page' | 'origin'

export interface ScanContext {
  signal?: AbortSignal
  /** Superficie de escaneo completa, para escáneres de origin que recorren páginas */
  surface?: readonly string[]
}

/**
 * Capacidad común de todos los escáneres. El orquestador llama a `isAvailable()`
 * antes de `scan()` y registra `skipped:tool-not-installed` si devuelve false.
 */
export interface Scanner {
  readonly id: ScannerId
  readonly granularity: ScanGranularity
  /** Máximo de URLs cubiertas (sólo granularidad `page`); sin valor = todas */
  readonly pageLimit?: number
  isAvailable(): Promise<boolean>
  scan(target: string, context?: ScanContext): Promise<ScanResult>
}

export const TOOL_NOT_INSTALLED = 'tool-not-installed'

export function okResult(
  scanner: ScannerId,
  url: string,
  findings: Findings,
  startedAt: number,
  extra: Pick<ScanResult, 'metrics' | 'raw'> = {}
): ScanResult {
  return {
    scanner,
    url,
    status: 'ok',
    findings,
    ...extra,
    durationMs: Date.now() - startedAt,
  }
}

export function errorResult(
  scanner: ScannerId,
  url: string,
  reason: string,
  startedAt: number,
  raw?: string
): ScanResult {
  return {
    scanner,
    url,
    status: `error:${reason}`,
    findings: {},
    ...(raw ? { raw } : {}),
    durationMs: Date.now() - startedAt,
  }
}

export function skippedResult(
  scanner: ScannerId,
  url: string,
  reason: string
): ScanResult {
  return {
    scanner,
    url,
    status: `skipped:${reason}`,
    findings: {},
    durationMs: 0,
  }
}

export function isErrorStatus(status: ScanResult['status']): boolean {
  return status.startsWith('error:')
}
