import axios, { AxiosError, AxiosHeaders } from 'axios'
import type { AxiosAdapter } from 'axios'
import type { HttpClient } from './http'

export interface StubResponse {
  status?: number
  headers?: Record<string, string | string[]>
  body?: string
  /** URL final tras redirecciones, como la expone follow-redirects */
  finalUrl?: string
}

export interface StubRequest {
  method: string
  url: string
  cookie?: string
  body: string
}

export type StubRoute = StubResponse | ((request: StubRequest) => StubResponse)

/**
 * Cliente HTTP en memoria para tests. Claves: `"GET https://..."` o sólo la URL
 * (cualquier método). Una URL sin ruta responde como red caída (ECONNREFUSED).
 */
export function createStubHttp(routes: Record<string, StubRoute>): {
  http: HttpClient
  requests: StubRequest[]
} {
  const requests: StubRequest[] = []
  const adapter: AxiosAdapter = async (config) => {
    const url = new URL(config.url ?? '', config.baseURL).toString()
    const method = (config.method ?? 'get').toUpperCase()
    const cookie = config.headers.get('Cookie')
    const request: StubRequest = {
      method,
      url,
      cookie: typeof cookie === 'string' ? cookie : undefined,
      body: typeof config.data === 'string' ? config.data : '',
    }
    requests.push(request)

    const route = routes[`${method} ${url}`] ?? routes[url]
    if (!route) {
      throw new AxiosError(
        `connect ECONNREFUSED ${url}`,
        'ECONNREFUSED',
        config
      )
    }
    const response = typeof route === 'function' ? route(request) : route
    return {
      data: response.body ?? '',
      status: response.status ?? 200,
      statusText: '',
      headers: new AxiosHeaders({
        'content-type': 'text/html; charset=utf-8',
        ...response.headers,
      }),
      config,
      request: response.finalUrl ? { res: { responseUrl: response.finalUrl } } : {},
    }
  }

  const http = axios.create({
    adapter,
    responseType: 'text',
    validateStatus: () => true,
  })
  return { http, requests }
}

export function html(body: string): string {
  return `<!DOCTYPE html><html><head><title>t</title></head><body>${body}</body></html>`
}
