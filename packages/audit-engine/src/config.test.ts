import { parseConfigInput, resolveAuditConfig } from './config'
import { ConfigError } from './errors'

const LOGIN = {
  loginUrl: '/login',
  usernameField: 'user',
  passwordField: 'pass',
  username: 'alice',
  password: 'test-secret',
}

describe('resolveAuditConfig', () => {
  it('fills defaults for a security audit', () => {
    expect(resolveAuditConfig({ targetUrl: 'https://example.test' }, {})).toEqual({
      targetUrl: 'https://example.test/',
      reportType: 'security',
      scanners: {
        securityHeaders: true,
        jsVulnerabilities: true,
        lighthouse: false,
        ssl: false,
        nuclei: false,
      },
      maxPages: 50,
      concurrency: 4,
      requestTimeoutMs: 15000,
      toolTimeoutMs: 180000,
      lighthousePages: 1,
      jsPages: 30,
      nucleiTemplates: [],
      reportDir: 'reports',
    })
  })

  it('enables Lighthouse for performance audits and honours toggles', () => {
    const config = resolveAuditConfig(
      {
        targetUrl: 'https://example.test',
        reportType: 'performance',
        scanners: { jsVulnerabilities: false, ssl: true },
      },
      {}
    )

    expect(config.scanners).toEqual({
      securityHeaders: true,
      jsVulnerabilities: false,
      lighthouse: true,
      ssl: true,
      nuclei: false,
    })
  })

  it('reads numeric defaults from the environment and coerces strings', () => {
    const config = resolveAuditConfig(
      { targetUrl: 'https://example.test', concurrency: '8' },
      {
        AUDIT_MAX_PAGES: '5',
        AUDIT_TOOL_TIMEOUT_MS: '60000',
        AUDIT_REPORT_DIR: '/tmp/audits',
        AUDIT_CONCURRENCY: 'many',
      }
    )

    expect(config.maxPages).toBe(5)
    expect(config.toolTimeoutMs).toBe(60000)
    expect(config.reportDir).toBe('/tmp/audits')
    expect(config.concurrency).toBe(8)
  })

  it('resolves login URLs against the target origin', () => {
    const config = resolveAuditConfig(
      {
        targetUrl: 'https://example.test/app',
        login: { ...LOGIN, protectedUrl: '/account' },
      },
      {}
    )

    expect(config.login).toEqual({
      ...LOGIN,
      loginUrl: 'https://example.test/login',
      protectedUrl: 'https://example.test/account',
    })
  })

  it('rejects invalid input with ConfigError', () => {
    expect(() => resolveAuditConfig({ targetUrl: 'ftp://example.test' }, {})).toThrow(
      ConfigError
    )
    expect(() =>
      resolveAuditConfig({ targetUrl: 'https://example.test', reportType: 'full' }, {})
    ).toThrow("Tipo de reporte desconocido: 'full' (performance | security)")
    expect(() =>
      resolveAuditConfig({ targetUrl: 'https://example.test', maxPages: 0 }, {})
    ).toThrow("'maxPages' debe ser un entero positivo")
    expect(() =>
      resolveAuditConfig(
        {
          targetUrl: 'https://example.test',
          login: { ...LOGIN, loginUrl: 'https://other.test/login' },
        },
        {}
      )
    ).toThrow("'login.loginUrl' debe pertenecer al origin https://example.test")
    expect(() =>
      resolveAuditConfig(
        { targetUrl: 'https://example.test', login: { loginUrl: '/login' } },
        {}
      )
    ).toThrow('El login requiere loginUrl, usernameField, passwordField, username y password')
  })

  it('ignores an empty login section', () => {
    const config = resolveAuditConfig(
      { targetUrl: 'https://example.test', login: { username: '', password: undefined } },
      {}
    )
    expect(config.login).toBeUndefined()
  })
})

describe('parseConfigInput', () => {
  it('keeps the known fields of a JSON document', () => {
    const input = parseConfigInput({
      targetUrl: 'https://example.test',
      reportType: 'performance',
      maxPages: '10',
      scanners: { ssl: true },
      login: { loginUrl: '/login', username: 'alice' },
      nucleiTemplates: ['cves/'],
      extra: 'ignored',
    })

    expect(input).toEqual({
      targetUrl: 'https://example.test',
      reportType: 'performance',
      maxPages: '10',
      scanners: { ssl: true },
      login: { loginUrl: '/login', username: 'alice' },
      nucleiTemplates: ['cves/'],
    })
  })

  it('rejects values of the wrong type', () => {
    expect(() => parseConfigInput([])).toThrow('La configuración debe ser un objeto JSON')
    expect(() => parseConfigInput({ targetUrl: 42 })).toThrow("'targetUrl' debe ser un texto")
    expect(() => parseConfigInput({ scanners: { nuclei: 'yes' } })).toThrow(
      "'scanners.nuclei' debe ser booleano"
    )
    expect(() => parseConfigInput({ login: { password: 1 } })).toThrow(
      "'login.password' debe ser un texto"
    )
    expect(() => parseConfigInput({ nucleiTemplates: 'cves/' })).toThrow(ConfigError)
  })
})
