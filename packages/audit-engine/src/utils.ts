import { AxiosError } from 'axios'
import type { Finding, Severity } from '@site-auditor/shared-types'

/** Helper para crear objetos de hallazgo */
export function createFinding(
  severity: Severity,
  detail: string,
  evidence?: Record<string, unknown>
): Finding {
  return evidence ? { severity, detail, evidence } : { severity, detail }
}

/** Helper para obtener un mensaje de error legible */
export function getErrorMessage(error: unknown): string {
  if (error instanceof AxiosError) {
    if (error.code === AxiosError.ERR_CANCELED) return 'Petición cancelada'
    if (
      error.code === 'ECONNABORTED' ||
      error.code === 'ETIMEDOUT' ||
      error.message.toLowerCase().includes('timeout')
    ) {
      return 'Timeout de la petición'
    }
    if (error.response) {
      const statusText = error.response.statusText
        ? `: ${error.response.statusText}`
        : ''
      return `HTTP Error ${error.response.status}${statusText}`
    }
    if (error.code) return `Network Error: ${error.code}`
  }
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return 'Error desconocido'
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Pausa la ejecución por un número de milisegundos */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/** Convierte a entero acotado; devuelve `fallback` si el valor no es numérico */
export function toSafeInt(
  value: number | string | undefined,
  fallback: number,
  min: number,
  max: number
): number {
  const parsed = typeof value === 'string' ? Number(value) : value
  if (typeof parsed !== 'number' || Number.isNaN(parsed)) {
    return fallback
  }
  return Math.min(max, Math.max(min, Math.floor(parsed)))
}

/** Ejecuta `processor` sobre los elementos en lotes de tamaño `batchSize` */
export async function runInBatches<T>(
  items: T[],
  batchSize: number,
  processor: (item: T, index: number) => Promise<void>
): Promise<void> {
  for (let i = 0; i < items.length; i += batchSize) {
    const batch = items.slice(i, i + batchSize)
    await Promise.all(batch.map((item, offset) => processor(item, i + offset)))
  }
}

/** Elimina el fragmento y devuelve la forma canónica de la URL */
export function normalizeUrl(rawUrl: string, base?: string): string | null {
  let parsed: URL
  try {
    parsed = base ? new URL(rawUrl, base) : new URL(rawUrl)
  } catch {
    return null
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return null
  parsed.hash = ''
  return parsed.toString()
}

export function originOf(url: string): string | null {
  try {
    return new URL(url).origin
  } catch {
    return null
  }
}

export function isSameOrigin(url: string, origin: string): boolean {
  return originOf(url) === origin
}
