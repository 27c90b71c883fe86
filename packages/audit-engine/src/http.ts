import axios, { AxiosError, AxiosHeaders } from 'axios'
import type { AxiosInstance, AxiosResponse } from 'axios'
import { isRecord, normalizeUrl } from './utils'

export const USER_AGENT = 'site-auditor/0.1 (+same-origin audit)'
const MAX_BODY_BYTES = 5 * 1024 * 1024

export type HttpClient = AxiosInstance
export type HttpResponse = AxiosResponse<unknown>

/**
 * Cliente Axios compartido por crawler, escáneres HTTP y AuthTester.
 * No lanza por status HTTP: cada componente interpreta el código.
 */
export function createHttpClient(timeoutMs: number): HttpClient {
  return axios.create({
    timeout: timeoutMs,
    maxRedirects: 5,
    responseType: 'text',
    maxContentLength: MAX_BODY_BYTES,
    validateStatus: () => true,
    headers: { 'User-Agent': USER_AGENT },
  })
}

function readHeader(headers: HttpResponse['headers'], name: string): unknown {
  if (headers instanceof AxiosHeaders) return headers.get(name)
  return headers[name.toLowerCase()]
}

export function getHeader(
  headers: HttpResponse['headers'],
  name: string
): string | undefined {
  const value = readHeader(headers, name)
  if (typeof value === 'string') return value
  if (Array.isArray(value)) return value.join(', ')
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }
  return undefined
}

export function getSetCookies(headers: HttpResponse['headers']): string[] {
  const value = readHeader(headers, 'set-cookie')
  if (Array.isArray(value)) {
    return value.filter((entry): entry is string => typeof entry === 'string')
  }
  if (typeof value === 'string') return [value]
  return []
}

export function readBody(response: HttpResponse): string {
  if (typeof response.data === 'string') return response.data
  if (Buffer.isBuffer(response.data)) return response.data.toString('utf8')
  return ''
}

/** URL final tras las redirecciones que siguió axios (follow-redirects la deja en `res.responseUrl`) */
export function responseUrl(response: HttpResponse, requested: string): string {
  const request: unknown = response.request
  if (
    isRecord(request) &&
    isRecord(request.res) &&
    typeof request.res.responseUrl === 'string'
  ) {
    return normalizeUrl(request.res.responseUrl) ?? requested
  }
  return requested
}

/** La respuesta llegó pero superó `maxContentLength` */
export function isSizeLimitError(error: unknown): boolean {
  return error instanceof AxiosError && error.message.includes('maxContentLength')
}

export function isHtmlResponse(response: HttpResponse): boolean {
  const contentType = getHeader(response.headers, 'content-type')
  // Sin content-type se asume HTML (servidores mínimos)
  if (!contentType) return true
  const normalized = contentType.toLowerCase()
  return normalized.includes('text/html') || normalized.includes('xhtml')
}

export interface ParsedCookie {
  name: string
  value: string
  secure: boolean
  httpOnly: boolean
  sameSite?: string
}

/** Parsea una cabecera Set-Cookie (nombre, valor y flags de seguridad) */
export function parseSetCookie(header: string): ParsedCookie | null {
  const [pair, ...attributes] = header.split(';')
  const separator = pair.indexOf('=')
  if (separator <= 0) return null
  const cookie: ParsedCookie = {
    name: pair.slice(0, separator).trim(),
    value: pair.slice(separator + 1).trim(),
    secure: false,
    httpOnly: false,
  }
  for (const attribute of attributes) {
    const [rawKey, ...rest] = attribute.split('=')
    const key = rawKey.trim().toLowerCase()
    if (key === 'secure') cookie.secure = true
    else if (key === 'httponly') cookie.httpOnly = true
    else if (key === 'samesite') cookie.sameSite = rest.join('=').trim()
  }
  return cookie
}
