import * as cheerio from 'cheerio'
import type {
  AuditTarget,
  AuthCheckResult,
  AuthOutcome,
  LoginConfig,
} from '@site-auditor/shared-types'
import { AuditCancelledError } from './errors'
import type { HttpClient, HttpResponse, ParsedCookie } from './http'
import { getHeader, getSetCookies, parseSetCookie, readBody } from './http'
import { createLogger } from './logger'
import type { AuditLogger } from './logger'
import { getErrorMessage, isSameOrigin, normalizeUrl } from './utils'

const INVALID_ATTEMPTS = 5
const MAX_REDIRECTS = 5
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308])
const SYNTHETIC_USERNAME = 'site-audit-invalid-user'
const SYNTHETIC_PASSWORD = 'site-audit-invalid-password'
const REFLECTION_MARKER = 'sa7marker'
const REDACTED = '[redactado]'

const CSRF_NAME = /csrf|xsrf|authenticity_token|requestverificationtoken|^_token$/i
const SESSION_COOKIE_NAME = /sess|sid|auth|token|jwt|login|remember/i
const LOCKOUT_MESSAGE =
  /[^.<>\n]*(too many|locked|lockout|try again later|demasiados intentos|bloquead)[^.<>\n]*/i

export const AUTH_CHECKS = [
  'csrf-token',
  'rate-limiting',
  'protected-page-before-login',
  'session-cookie-secure',
  'session-cookie-httponly',
  'session-cookie-samesite',
  'protected-page-after-login',
  'reflected-input-markup',
  'reflected-input-quote',
] as const

export type AuthCheckName = (typeof AUTH_CHECKS)[number]

const REFLECTION_PAYLOADS: { name: AuthCheckName; payload: string }[] = [
  { name: 'reflected-input-markup', payload: `<${REFLECTION_MARKER}>` },
  { name: 'reflected-input-quote', payload: `"'${REFLECTION_MARKER}` },
]

export interface SessionResponse {
  status: number
  url: string // URL final tras seguir redirecciones
  redirects: string[]
  /** Redirección no seguida: otro origin o límite alcanzado */
  unfollowedRedirect?: string
  headers: HttpResponse['headers']
  body: string
  setCookies: ParsedCookie[]
}

/**
 * Sesión HTTP con cookie jar propio. Sigue redirecciones a mano (sólo same-origin)
 * para capturar las cookies que se fijan en respuestas 3xx.
 */
export class SessionClient {
  private readonly jar = new Map<string, string>()

  constructor(
    private readonly http: HttpClient,
    private readonly origin: string,
    private readonly signal?: AbortSignal
  ) {}

  get(url: string): Promise<SessionResponse> {
    return this.send('GET', url)
  }

  post(url: string, form: Record<string, string>): Promise<SessionResponse> {
    return this.send('POST', url, new URLSearchParams(form).toString())
  }

  private async send(
    method: 'GET' | 'POST',
    url: string,
    body?: string
  ): Promise<SessionResponse> {
    const redirects: string[] = []
    const setCookies: ParsedCookie[] = []
    let current: { method: 'GET' | 'POST'; url: string; body?: string } = {
      method,
      url,
      body,
    }

    for (;;) {
      const response = await this.http.request<unknown>({
        method: current.method,
        url: current.url,
        data: current.body,
        headers: this.headersFor(current.body),
        maxRedirects: 0,
        signal: this.signal,
      })
      setCookies.push(...this.store(response))

      const location = getHeader(response.headers, 'location')
      const next =
        location && REDIRECT_STATUSES.has(response.status)
          ? normalizeUrl(location, current.url)
          : null
      if (
        !next ||
        !isSameOrigin(next, this.origin) ||
        redirects.length >= MAX_REDIRECTS
      ) {
        return {
          status: response.status,
          url: current.url,
          redirects,
          ...(next ? { unfollowedRedirect: next } : {}),
          headers: response.headers,
          body: readBody(response),
          setCookies,
        }
      }

      redirects.push(next)
      current =
        response.status === 307 || response.status === 308
          ? { ...current, url: next }
          : { method: 'GET', url: next }
    }
  }

  private headersFor(body: string | undefined): Record<string, string> {
    const headers: Record<string, string> = {}
    const cookie = [...this.jar]
      .map(([name, value]) => `${name}=${value}`)
      .join('; ')
    if (cookie) headers.Cookie = cookie
    if (body !== undefined) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded'
    }
    return headers
  }

  private store(response: HttpResponse): ParsedCookie[] {
    const cookies: ParsedCookie[] = []
    for (const header of getSetCookies(response.headers)) {
      const cookie = parseSetCookie(header)
      if (!cookie) continue
      cookies.push(cookie)
      if (cookie.value) this.jar.set(cookie.name, cookie.value)
      else this.jar.delete(cookie.name)
    }
    return cookies
  }
}

export interface CsrfToken {
  source: 'hidden-input' | 'meta' | 'header' | 'cookie'
  name: string
  value?: string
}

/** Busca un token con forma de CSRF en el formulario, meta tags, cabeceras o cookies */
export function findCsrfToken(response: SessionResponse): CsrfToken | null {
  const $ = cheerio.load(response.body)
  for (const element of $('input[type="hidden"][name]').toArray()) {
    const name = $(element).attr('name') ?? ''
    if (CSRF_NAME.test(name)) {
      return { source: 'hidden-input', name, value: $(element).attr('value') ?? '' }
    }
  }
  for (const element of $('meta[name]').toArray()) {
    const name = $(element).attr('name') ?? ''
    if (CSRF_NAME.test(name)) return { source: 'meta', name }
  }
  for (const name of ['X-CSRF-Token', 'X-XSRF-Token']) {
    if (getHeader(response.headers, name)) return { source: 'header', name }
  }
  const cookie = response.setCookies.find((c) => CSRF_NAME.test(c.name))
  return cookie ? { source: 'cookie', name: cookie.name } : null
}

/** Cookie de sesión fijada durante el login: por nombre, o la primera que no sea CSRF */
export function pickSessionCookie(cookies: ParsedCookie[]): ParsedCookie | null {
  const candidates = cookies.filter((c) => c.value && !CSRF_NAME.test(c.name))
  return (
    candidates.find((c) => SESSION_COOKIE_NAME.test(c.name)) ??
    candidates[0] ??
    null
  )
}

/**
 * Ámbito de vida corta para las credenciales: construye el formulario de login
 * y redacta cualquier aparición en la evidencia. `clear()` las descarta.
 */
class CredentialScope {
  private secrets: string[]
  private credentials: { username: string; password: string } | null

  constructor(login: LoginConfig) {
    this.credentials = { username: login.username, password: login.password }
    this.secrets = [login.username, login.password].filter(Boolean)
  }

  loginForm(login: LoginConfig): Record<string, string> {
    if (!this.credentials) return {}
    return {
      [login.usernameField]: this.credentials.username,
      [login.passwordField]: this.credentials.password,
    }
  }

  redact(text: string): string {
    return this.secrets.reduce(
      (result, secret) => result.split(secret).join(REDACTED),
      text
    )
  }

  clear(): void {
    this.credentials = null
    this.secrets = []
  }
}

export interface AuthTesterOptions {
  http: HttpClient
  attempts?: number
  logger?: AuditLogger
  signal?: AbortSignal
}

function withToken(
  form: Record<string, string>,
  token: CsrfToken | null
): Record<string, string> {
  return token?.source === 'hidden-input' && token.value !== undefined
    ? { ...form, [token.name]: token.value }
    : form
}

function isDenied(response: SessionResponse, loginUrl: string): string | null {
  if (response.unfollowedRedirect) {
    return `Redirigido a ${response.unfollowedRedirect}`
  }
  if (response.redirects.length > 0) {
    return `Redirigido a ${response.url}`
  }
  if (response.status >= 400) return `HTTP ${response.status}`
  if (response.url === loginUrl) return 'Servida la página de login'
  return null
}

function loginSucceeded(response: SessionResponse, login: LoginConfig): boolean {
  if (login.successIndicator) {
    return response.body.includes(login.successIndicator)
  }
  if (response.status >= 400) return false
  return cheerio.load(response.body)('input[type="password"]').length === 0
}

/**
 * Batería fija de comprobaciones sobre el flujo de login. Cada paso es
 * independiente: un fallo de red da `inconclusive` sólo para ese paso.
 * Las credenciales nunca llegan a la evidencia ni a los logs.
 */
export async function runAuthChecks(
  target: AuditTarget,
  login: LoginConfig,
  options: AuthTesterOptions
): Promise<AuthCheckResult[]> {
  const logger = options.logger ?? createLogger('AuthTester')
  const attempts = options.attempts ?? INVALID_ATTEMPTS
  const { signal } = options
  const scope = new CredentialScope(login)
  const results: AuthCheckResult[] = []
  const session = () => new SessionClient(options.http, target.origin, signal)

  const record = (name: AuthCheckName, outcome: AuthOutcome, evidence: string) => {
    results.push({ name, outcome, evidence: scope.redact(evidence) })
  }

  /** Ejecuta un paso; los errores de red se registran como inconclusive en `names` */
  const step = async (names: AuthCheckName[], body: () => Promise<void>) => {
    try {
      await body()
    } catch (error) {
      if (signal?.aborted) throw new AuditCancelledError('auth-checking')
      const message = getErrorMessage(error)
      logger.warn(`Paso '${names.join(', ')}' sin resultado: ${message}`)
      for (const name of names) {
        record(name, 'inconclusive', `Error de red: ${message}`)
      }
    }
  }

  logger.info(`Iniciando comprobaciones de autenticación en ${login.loginUrl}`)
  try {
    // 1. Token CSRF en la página de login
    await step(['csrf-token'], async () => {
      const page = await session().get(login.loginUrl)
      if (page.status >= 400) {
        record('csrf-token', 'inconclusive', `La página de login respondió HTTP ${page.status}`)
        return
      }
      const token = findCsrfToken(page)
      if (token) {
        record('csrf-token', 'pass', `Token CSRF encontrado (${token.source}: ${token.name})`)
      } else {
        record('csrf-token', 'fail', 'No se encontró token CSRF en la página de login')
      }
    })

    // 2. Rate limiting ante credenciales inválidas (usuario sintético)
    await step(['rate-limiting'], async () => {
      const client = session()
      const token = findCsrfToken(await client.get(login.loginUrl))
      const form = withToken(
        {
          [login.usernameField]: SYNTHETIC_USERNAME,
          [login.passwordField]: SYNTHETIC_PASSWORD,
        },
        token
      )
      const lockoutMessages = new Map<string, number>()
      for (let attempt = 1; attempt <= attempts; attempt++) {
        const response = await client.post(login.loginUrl, form)
        if (response.status === 429) {
          record('rate-limiting', 'pass', `HTTP 429 tras ${attempt} intentos fallidos`)
          return
        }
        if (getHeader(response.headers, 'retry-after')) {
          record('rate-limiting', 'pass', `Cabecera Retry-After tras ${attempt} intentos fallidos`)
          return
        }
        const lockout = LOCKOUT_MESSAGE.exec(response.body)?.[0].trim()
        if (lockout) {
          const seen = (lockoutMessages.get(lockout) ?? 0) + 1
          lockoutMessages.set(lockout, seen)
          if (seen >= 2) {
            record('rate-limiting', 'pass', `Mensaje de bloqueo repetido: "${lockout}"`)
            return
          }
        }
      }
      record(
        'rate-limiting',
        'fail',
        `Sin señal de rate limiting tras ${attempts} intentos fallidos (orientativo)`
      )
    })

    // 3. Página protegida sin autenticar
    const protectedUrl = login.protectedUrl
    await step(['protected-page-before-login'], async () => {
      if (!protectedUrl) {
        record('protected-page-before-login', 'inconclusive', 'No hay URL protegida configurada')
        return
      }
      const response = await session().get(protectedUrl)
      const denial = isDenied(response, login.loginUrl)
      if (denial) {
        record('protected-page-before-login', 'pass', denial)
      } else {
        record(
          'protected-page-before-login',
          'fail',
          `Página protegida servida sin autenticación (HTTP ${response.status})`
        )
      }
    })

    // 4 y 5. Login válido, flags de la cookie de sesión y acceso autenticado
    const authenticated = session()
    let loggedIn = false
    const cookieChecks: AuthCheckName[] = [
      'session-cookie-secure',
      'session-cookie-httponly',
      'session-cookie-samesite',
    ]
    await step(cookieChecks, async () => {
      const token = findCsrfToken(await authenticated.get(login.loginUrl))
      const response = await authenticated.post(
        login.loginUrl,
        withToken(scope.loginForm(login), token)
      )
      loggedIn = loginSucceeded(response, login)
      if (!loggedIn) {
        for (const name of cookieChecks) {
          record(name, 'inconclusive', `El login no se completó (HTTP ${response.status})`)
        }
        return
      }
      const cookie = pickSessionCookie(response.setCookies)
      if (!cookie) {
        for (const name of cookieChecks) {
          record(name, 'inconclusive', 'No se detectó cookie de sesión tras el login')
        }
        return
      }
      record(
        'session-cookie-secure',
        cookie.secure ? 'pass' : 'fail',
        `Cookie '${cookie.name}' ${cookie.secure ? 'con' : 'sin'} Secure`
      )
      record(
        'session-cookie-httponly',
        cookie.httpOnly ? 'pass' : 'fail',
        `Cookie '${cookie.name}' ${cookie.httpOnly ? 'con' : 'sin'} HttpOnly`
      )
      const sameSite = cookie.sameSite?.toLowerCase()
      record(
        'session-cookie-samesite',
        sameSite === 'lax' || sameSite === 'strict' ? 'pass' : 'fail',
        cookie.sameSite
          ? `Cookie '${cookie.name}' con SameSite=${cookie.sameSite}`
          : `Cookie '${cookie.name}' sin SameSite`
      )
    })
    scope.clear()

    await step(['protected-page-after-login'], async () => {
      if (!protectedUrl) {
        record('protected-page-after-login', 'inconclusive', 'No hay URL protegida configurada')
        return
      }
      if (!loggedIn) {
        record('protected-page-after-login', 'inconclusive', 'El login no se completó')
        return
      }
      const response = await authenticated.get(protectedUrl)
      if (response.status < 300 && response.url !== login.loginUrl) {
        record(
          'protected-page-after-login',
          'pass',
          `HTTP ${response.status} con sesión autenticada`
        )
      } else {
        record(
          'protected-page-after-login',
          'fail',
          response.url === login.loginUrl
            ? 'Redirigido a la página de login con sesión autenticada'
            : `HTTP ${response.status} con sesión autenticada`
        )
      }
    })

    // 6. Sondas de reflexión en los campos del formulario
    const reflectionSession = session()
    for (const attempt of REFLECTION_PAYLOADS) {
      await step([attempt.name], async () => {
        const token = findCsrfToken(await reflectionSession.get(login.loginUrl))
        const response = await reflectionSession.post(
          login.loginUrl,
          withToken(
            {
              [login.usernameField]: attempt.payload,
              [login.passwordField]: attempt.payload,
            },
            token
          )
        )
        if (response.body.includes(attempt.payload)) {
          record(
            attempt.name,
            'inconclusive',
            `Marcador ${attempt.payload} reflejado sin escapar (HTTP ${response.status}); revisar manualmente`
          )
        } else {
          record(attempt.name, 'pass', 'El marcador no se refleja sin escapar')
        }
      })
    }
  } finally {
    scope.clear()
  }

  logger.info(`Comprobaciones de autenticación completadas (${results.length})`)
  return results
}
