import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { ConfigError } from '@site-auditor/audit-engine'
import type { AuditOutcome, RunSummary } from '@site-auditor/shared-types'
import {
  buildConfigInput,
  createProgram,
  exitCodeFor,
  loadConfigFile,
  parseFailOn,
  resolveCliConfig,
} from './options'
import type { CliFlags } from './options'

describe('createProgram', () => {
  it('parses the target and flags', () => {
    const program = createProgram().parse(
      ['https://example.test', '--max-pages', '5', '--enable', 'ssl,nuclei', '-t', 'cves/', 'exposures/'],
      { from: 'user' }
    )

    expect(program.args).toEqual(['https://example.test'])
    expect(program.opts<CliFlags>()).toMatchObject({
      maxPages: '5',
      enable: 'ssl,nuclei',
      template: ['cves/', 'exposures/'],
      failOn: 'High',
    })
  })
})

describe('buildConfigInput', () => {
  const file = {
    targetUrl: 'https://file.test',
    reportType: 'performance',
    maxPages: 20,
    scanners: { lighthouse: false },
    login: { loginUrl: '/login', username: 'from-file', password: 'file-secret' },
  }

  it('lets flags override the file and takes credentials from the environment', () => {
    const input = buildConfigInput(
      'https://flag.test',
      { failOn: 'High', maxPages: '3', enable: 'lighthouse,ssl', disable: 'js-vulnerabilities' },
      file,
      { AUDIT_PASSWORD: 'test-secret' }
    )

    expect(input).toMatchObject({
      targetUrl: 'https://flag.test',
      reportType: 'performance',
      maxPages: '3',
      scanners: { lighthouse: true, ssl: true, jsVulnerabilities: false },
      login: { loginUrl: '/login', username: 'from-file', password: 'test-secret' },
    })
  })

  it('rejects unknown scanner names', () => {
    expect(() =>
      buildConfigInput(undefined, { failOn: 'High', enable: 'zap' }, {}, {})
    ).toThrow("Escáner desconocido en --enable: 'zap'")
  })
})

describe('loadConfigFile and resolveCliConfig', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'cli-options-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('builds a resolved config from a JSON file', async () => {
    const configPath = path.join(dir, 'audit.json')
    await writeFile(
      configPath,
      JSON.stringify({
        targetUrl: 'https://example.test',
        login: {
          loginUrl: '/login',
          usernameField: 'email',
          passwordField: 'pass',
        },
      })
    )

    const { config, failOn } = resolveCliConfig(
      undefined,
      { config: configPath, failOn: 'medium', reportDir: dir },
      { AUDIT_USERNAME: 'alice', AUDIT_PASSWORD: 'test-secret' }
    )

    expect(failOn).toBe('Medium')
    expect(config.targetUrl).toBe('https://example.test/')
    expect(config.reportDir).toBe(dir)
    expect(config.login).toEqual({
      loginUrl: 'https://example.test/login',
      usernameField: 'email',
      passwordField: 'pass',
      username: 'alice',
      password: 'test-secret',
    })
  })

  it('reports a missing or invalid file as ConfigError', async () => {
    const broken = path.join(dir, 'broken.json')
    await writeFile(broken, '{ nope')

    expect(() => loadConfigFile(path.join(dir, 'missing.json'))).toThrow(
      'El archivo de configuración no existe en:'
    )
    expect(() => loadConfigFile(broken)).toThrow(ConfigError)
  })

  it('requires a target URL', () => {
    expect(() => resolveCliConfig(undefined, { failOn: 'High' }, {})).toThrow(
      'La URL objetivo debe ser http(s) y válida'
    )
  })
})

describe('parseFailOn', () => {
  it('accepts severities in any case and none', () => {
    expect(parseFailOn('critical')).toBe('Critical')
    expect(parseFailOn('High')).toBe('High')
    expect(parseFailOn('none')).toBeNull()
    expect(() => parseFailOn('urgent')).toThrow("Gravedad desconocida en --fail-on: 'urgent'")
  })
})

describe('exitCodeFor', () => {
  function outcome(
    status: AuditOutcome['status'],
    counts: Partial<RunSummary['findingsBySeverity']> = {}
  ): AuditOutcome {
    const summary: RunSummary = {
      target: 'https://example.test/',
      reportType: 'security',
      status,
      pagesScanned: 1,
      checks: [],
      findingsBySeverity: { Critical: 0, High: 0, Medium: 0, Low: 0, Info: 0, ...counts },
      startedAt: '2024-05-01T10:20:30.000Z',
    }
    return {
      status,
      summary,
      preview: JSON.stringify(summary),
      run: {
        id: '20240501_102030',
        reportType: 'security',
        target: { url: 'https://example.test/', origin: 'https://example.test' },
        phase: status === 'failed' ? 'failed' : 'persisted',
        status,
        startedAt: summary.startedAt,
        crawl: null,
        surface: [],
        scans: [],
      },
    }
  }

  it('fails on findings at or above the threshold', () => {
    expect(exitCodeFor(outcome('complete', { Medium: 2 }), 'High')).toBe(0)
    expect(exitCodeFor(outcome('partial', { Critical: 1 }), 'High')).toBe(1)
    expect(exitCodeFor(outcome('complete', { Low: 1 }), 'Low')).toBe(1)
    expect(exitCodeFor(outcome('complete', { Critical: 1 }), null)).toBe(0)
    expect(exitCodeFor(outcome('failed'), null)).toBe(2)
  })
})
