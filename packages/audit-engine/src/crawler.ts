import * as cheerio from 'cheerio'
import type { CrawlResult, CrawlSkip } from '@site-auditor/shared-types'
import { AuditCancelledError, ConfigError, NetworkError } from './errors'
import type { HttpClient, HttpResponse } from './http'
import { isHtmlResponse, isSizeLimitError, readBody, responseUrl } from './http'
import { createLogger } from './logger'
import type { AuditLogger } from './logger'
import { getErrorMessage, normalizeUrl } from './utils'

export interface CrawlOptions {
  http: HttpClient
  logger?: AuditLogger
  signal?: AbortSignal
}

/** Extrae los enlaces `<a href>` absolutos en orden de documento */
export function extractLinks(html: string, pageUrl: string): string[] {
  const $ = cheerio.load(html)
  const baseHref = $('base[href]').first().attr('href')
  const base = (baseHref && normalizeUrl(baseHref, pageUrl)) || pageUrl
  const links: string[] = []
  for (const element of $('a[href]').toArray()) {
    const href = $(element).attr('href')?.trim()
    if (!href) continue
    const absolute = normalizeUrl(href, base)
    if (absolute) links.push(absolute)
  }
  return links
}

/**
 * Recorrido BFS de páginas same-origin a partir de `seedUrl`.
 * Sólo es fatal que la semilla no responda; el resto de fallos se registran en `skipped`.
 */
export async function crawl(
  seedUrl: string,
  maxPages: number,
  options: CrawlOptions
): Promise<CrawlResult> {
  const logger = options.logger ?? createLogger('Crawler')
  const { http, signal } = options
  const seed = normalizeUrl(seedUrl)
  if (!seed) {
    throw new ConfigError(`URL semilla inválida: ${seedUrl}`, 'targetUrl')
  }
  const origin = new URL(seed).origin
  const limit = Math.max(1, maxPages)

  const urls: string[] = []
  const skipped: CrawlSkip[] = []
  const seen = new Set<string>([seed])
  const queue: string[] = [seed]

  logger.info(`Iniciando crawl de ${seed} (máximo ${limit} páginas)`)

  while (queue.length > 0 && urls.length < limit) {
    if (signal?.aborted) throw new AuditCancelledError('crawling')
    const url = queue.shift()
    if (!url) break
    const isSeed = url === seed

    let response: HttpResponse
    try {
      response = await http.get<unknown>(url, { signal })
    } catch (error) {
      if (signal?.aborted) throw new AuditCancelledError('crawling')
      const reason = getErrorMessage(error)
      if (isSeed && isSizeLimitError(error)) {
        // La semilla respondió: se incluye sin extraer enlaces
        logger.warn(`La semilla supera el tamaño máximo de respuesta: ${reason}`)
        urls.push(url)
        continue
      }
      if (isSeed) {
        throw new NetworkError(
          `No se pudo conectar a ${seed}. Verifica la URL y la red. Error: ${reason}`,
          seed,
          { cause: error }
        )
      }
      logger.warn(`Página omitida ${url}: ${reason}`)
      skipped.push({ url, reason })
      continue
    }

    const finalUrl = responseUrl(response, url)
    if (new URL(finalUrl).origin !== origin) {
      if (!isSeed) {
        skipped.push({ url, reason: `Redirigido fuera del origin: ${finalUrl}` })
        continue
      }
      logger.warn(`La semilla redirige fuera del origin: ${finalUrl}`)
    } else {
      seen.add(finalUrl)
    }
    const html = isHtmlResponse(response)
    if (!isSeed && response.status >= 400) {
      skipped.push({ url, reason: `HTTP ${response.status}` })
      continue
    }
    if (!isSeed && !html) {
      skipped.push({ url, reason: 'Contenido no HTML' })
      continue
    }
    if (isSeed && response.status >= 400) {
      logger.warn(`La semilla respondió con HTTP ${response.status}`)
    }

    urls.push(url)
    if (!html) continue

    for (const link of extractLinks(readBody(response), finalUrl)) {
      if (seen.has(link)) continue
      if (new URL(link).origin !== origin) continue
      seen.add(link)
      queue.push(link)
    }
  }

  logger.info(
    `Crawl finalizado: ${urls.length} páginas, ${skipped.length} omitidas.`
  )
  return { seed, urls, skipped }
}
