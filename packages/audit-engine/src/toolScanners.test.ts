import { LighthouseScanner } from './lighthouseScanner'
import { silentLogger } from './logger'
import { NucleiScanner, parseNucleiOutput } from './nucleiScanner'
import { SslScanner, parseSslscanOutput, sslTarget } from './sslScanner'
import type { CommandRequest, CommandResult } from './toolRunner'

function commandResult(overrides: Partial<CommandResult> = {}): CommandResult {
  return {
    command: '/usr/bin/tool',
    args: [],
    exitCode: 0,
    stdout: '',
    stderr: '',
    timedOut: false,
    aborted: false,
    truncated: false,
    ...overrides,
  }
}

function fakeTool(result: Partial<CommandResult>) {
  const run = vi.fn(async (_request: CommandRequest) => commandResult(result))
  const locate = vi.fn(async (name: string) => `/usr/bin/${name}`)
  return { run, locate }
}

const LIGHTHOUSE_REPORT = {
  categories: {
    performance: { score: 0.95 },
    accessibility: { score: 0.6 },
    'best-practices': { score: 0.3 },
    seo: { score: 1 },
  },
  audits: {
    'first-contentful-paint': { numericValue: 1200 },
    'largest-contentful-paint': { numericValue: 2500 },
    interactive: { numericValue: 3100 },
    'total-blocking-time': { numericValue: 150 },
  },
}

describe('LighthouseScanner', () => {
  it('is skipped without invoking the tool when lighthouse is not installed', async () => {
    const run = vi.fn(async (_request: CommandRequest) => commandResult())
    const scanner = new LighthouseScanner({
      timeoutMs: 1000,
      locate: async () => null,
      run,
      logger: silentLogger,
    })

    expect(await scanner.isAvailable()).toBe(false)
    const result = await scanner.scan('https://example.test/')

    expect(result.status).toBe('skipped:tool-not-installed')
    expect(result.findings).toEqual({})
    expect(run).not.toHaveBeenCalled()
  })

  it('turns category scores into findings and keeps the metrics', async () => {
    const { run, locate } = fakeTool({
      stdout: JSON.stringify(LIGHTHOUSE_REPORT),
    })
    const scanner = new LighthouseScanner({
      timeoutMs: 5000,
      locate,
      run,
      logger: silentLogger,
    })

    const result = await scanner.scan('https://example.test/')

    expect(result.status).toBe('ok')
    expect(result.findings).toEqual({
      'category:performance': {
        severity: 'Info',
        detail: 'Puntuación de Performance: 95/100',
        evidence: { score: 0.95 },
      },
      'category:accessibility': {
        severity: 'Medium',
        detail: 'Puntuación de Accessibility: 60/100',
        evidence: { score: 0.6 },
      },
      'category:best-practices': {
        severity: 'High',
        detail: 'Puntuación de Best Practices: 30/100',
        evidence: { score: 0.3 },
      },
      'category:seo': {
        severity: 'Info',
        detail: 'Puntuación de SEO: 100/100',
        evidence: { score: 1 },
      },
    })
    expect(result.metrics).toEqual({
      FCP: 1200,
      LCP: 2500,
      TTI: 3100,
      TBT: 150,
      CLS: null,
    })

    const request = run.mock.calls[0][0]
    expect(request.command).toBe('/usr/bin/lighthouse')
    expect(request.args[0]).toBe('https://example.test/')
    expect(request.args).toContain('--output=json')
    expect(request.timeoutMs).toBe(5000)
  })

  it('reports a timeout as an error with no findings', async () => {
    const { run, locate } = fakeTool({
      exitCode: null,
      timedOut: true,
      stdout: '{"categories":',
    })
    const scanner = new LighthouseScanner({
      timeoutMs: 100,
      locate,
      run,
      logger: silentLogger,
    })

    const result = await scanner.scan('https://example.test/')

    expect(result.status).toBe('error:timeout')
    expect(result.findings).toEqual({})
    expect(result.metrics).toBeUndefined()
  })

  it('reports a non-zero exit with the stderr excerpt', async () => {
    const { run, locate } = fakeTool({
      exitCode: 1,
      stderr: 'Chrome no encontrado\n',
    })
    const scanner = new LighthouseScanner({
      timeoutMs: 1000,
      locate,
      run,
      logger: silentLogger,
    })

    const result = await scanner.scan('https://example.test/')

    expect(result.status).toBe('error:exit-code-1')
    expect(result.raw).toBe('Chrome no encontrado')
  })

  it('treats unparsable output as a full error', async () => {
    const { run, locate } = fakeTool({ stdout: 'not json' })
    const scanner = new LighthouseScanner({
      timeoutMs: 1000,
      locate,
      run,
      logger: silentLogger,
    })

    const result = await scanner.scan('https://example.test/')

    expect(result.status).toBe('error:malformed-output')
    expect(result.raw).toBe('La salida de Lighthouse no es JSON válido')
    expect(result.findings).toEqual({})
  })

  it('rejects a report with a category missing its score', async () => {
    const { run, locate } = fakeTool({
      stdout: JSON.stringify({
        ...LIGHTHOUSE_REPORT,
        categories: { ...LIGHTHOUSE_REPORT.categories, seo: { score: null } },
      }),
    })
    const scanner = new LighthouseScanner({
      timeoutMs: 1000,
      locate,
      run,
      logger: silentLogger,
    })

    const result = await scanner.scan('https://example.test/')

    expect(result.status).toBe('error:malformed-output')
    expect(result.raw).toBe("Categoría 'seo' sin puntuación")
  })

  it('rejects output cut off at the capture limit even if it parses', async () => {
    const { run, locate } = fakeTool({
      stdout: JSON.stringify(LIGHTHOUSE_REPORT),
      truncated: true,
    })
    const scanner = new LighthouseScanner({
      timeoutMs: 1000,
      locate,
      run,
      logger: silentLogger,
    })

    const result = await scanner.scan('https://example.test/')

    expect(result.status).toBe('error:malformed-output')
    expect(result.raw).toBe('Salida truncada: supera el límite de captura')
    expect(result.findings).toEqual({})
  })

  it('reports a cancelled run as an error', async () => {
    const { run, locate } = fakeTool({ exitCode: null, aborted: true })
    const scanner = new LighthouseScanner({
      timeoutMs: 1000,
      locate,
      run,
      logger: silentLogger,
    })

    const result = await scanner.scan('https://example.test/')

    expect(result.status).toBe('error:cancelled')
  })
})

const SSLSCAN_OUTPUT = [
  '  SSL/TLS Protocols:',
  'SSLv2     disabled',
  'SSLv3     disabled',
  'TLSv1.0   \u001b[33menabled\u001b[0m',
  'TLSv1.1   disabled',
  'TLSv1.2   enabled',
  'TLSv1.3   enabled',
  '',
  '  TLS Fallback SCSV:',
  'Server does not support TLS Fallback SCSV',
  '',
  '  TLS renegotiation:',
  'Session renegotiation not supported',
  '',
  '  TLS Compression:',
  'Compression disabled',
  '',
  '  Heartbleed:',
  'TLSv1.2 not vulnerable to heartbleed',
  '',
  '  Supported Server Cipher(s):',
  'Preferred TLSv1.2  256 bits  ECDHE-RSA-AES256-GCM-SHA384   Curve 25519 DHE 253',
  'Accepted  TLSv1.2  128 bits  RC4-SHA',
  'Accepted  TLSv1.0  56 bits   EXP-DES-CBC-SHA',
  '',
  '  SSL Certificate:',
  'Signature Algorithm: sha256WithRSAEncryption',
  'RSA Key Strength:    1024',
  'Not valid after:  Jan  1 00:00:00 2020 GMT',
].join('\n')

describe('parseSslscanOutput', () => {
  it('keys findings by protocol, cipher and certificate issue', () => {
    const findings = parseSslscanOutput(
      SSLSCAN_OUTPUT,
      new Date('2024-06-01T00:00:00Z')
    )

    expect(findings).not.toBeNull()
    expect(Object.keys(findings ?? {})).toEqual([
      'protocol:TLSv1.0',
      'fallback-scsv',
      'cipher:RC4-SHA',
      'cipher:EXP-DES-CBC-SHA',
      'certificate:key-strength',
      'certificate:expired',
    ])
    expect(findings?.['protocol:TLSv1.0']).toEqual({
      severity: 'Medium',
      detail: 'Protocolo obsoleto habilitado: TLSv1.0',
      evidence: { line: 'TLSv1.0   enabled' },
    })
    expect(findings?.['cipher:RC4-SHA'].severity).toBe('Medium')
    expect(findings?.['cipher:EXP-DES-CBC-SHA'].severity).toBe('High')
    expect(findings?.['certificate:key-strength'].detail).toBe(
      'Clave RSA del certificado demasiado corta (1024 bits)'
    )
    expect(findings?.['certificate:expired'].severity).toBe('High')
  })

  it('flags heartbleed and legacy protocols', () => {
    const findings = parseSslscanOutput(
      ['SSLv3     enabled', 'TLSv1.2 vulnerable to heartbleed'].join('\n')
    )

    expect(findings).toEqual({
      'protocol:SSLv3': {
        severity: 'High',
        detail: 'Protocolo obsoleto habilitado: SSLv3',
        evidence: { line: 'SSLv3     enabled' },
      },
      heartbleed: {
        severity: 'Critical',
        detail: 'El servidor es vulnerable a Heartbleed',
        evidence: { line: 'TLSv1.2 vulnerable to heartbleed' },
      },
    })
  })

  it('returns null when nothing recognisable is printed', () => {
    expect(parseSslscanOutput('ERROR: Could not resolve hostname')).toBeNull()
  })
})

describe('SslScanner', () => {
  it('targets host:port with the scheme default port', () => {
    expect(sslTarget('https://example.test')).toBe('example.test:443')
    expect(sslTarget('https://example.test:8443/login')).toBe('example.test:8443')
    expect(sslTarget('http://example.test')).toBe('example.test:80')
  })

  it('reports a plain http origin without running sslscan', async () => {
    const { run, locate } = fakeTool({})
    const scanner = new SslScanner({
      timeoutMs: 1000,
      locate,
      run,
      logger: silentLogger,
    })

    const result = await scanner.scan('http://example.test')

    expect(result.status).toBe('ok')
    expect(result.findings['protocol:no-tls'].severity).toBe('High')
    expect(run).not.toHaveBeenCalled()
  })

  it('passes host:port and keeps the cleaned output as raw', async () => {
    const { run, locate } = fakeTool({ stdout: SSLSCAN_OUTPUT })
    const scanner = new SslScanner({
      timeoutMs: 1000,
      locate,
      run,
      logger: silentLogger,
      now: () => new Date('2024-06-01T00:00:00Z'),
    })

    const result = await scanner.scan('https://example.test')

    expect(run.mock.calls[0][0].args).toEqual([
      '--no-colour',
      'example.test:443',
    ])
    expect(result.status).toBe('ok')
    expect(result.raw).toContain('TLSv1.0   enabled')
    expect(result.raw).not.toContain('\u001b[')
  })

  it('treats unrecognised output as malformed', async () => {
    const { run, locate } = fakeTool({ stdout: 'Segmentation fault' })
    const scanner = new SslScanner({
      timeoutMs: 1000,
      locate,
      run,
      logger: silentLogger,
    })

    const result = await scanner.scan('https://example.test')

    expect(result.status).toBe('error:malformed-output')
    expect(result.findings).toEqual({})
  })
})

function nucleiLine(fields: Record<string, unknown>): string {
  return JSON.stringify(fields)
}

describe('parseNucleiOutput', () => {
  it('maps each match to a finding with the reported severity', () => {
    const output = [
      nucleiLine({
        'template-id': 'git-config',
        info: { name: 'Git Config Disclosure', severity: 'medium' },
        'matched-at': 'https://example.test/.git/config',
      }),
      nucleiLine({
        'template-id': 'tech-detect',
        'matcher-name': 'nginx',
        info: { name: 'Wappalyzer Technology Detection', severity: 'info' },
        'matched-at': 'https://example.test',
      }),
      nucleiLine({
        'template-id': 'git-config',
        info: { name: 'Git Config Disclosure', severity: 'medium' },
        'matched-at': 'https://example.test/app/.git/config',
      }),
      '',
    ].join('\n')

    const findings = parseNucleiOutput(output)

    expect(Object.keys(findings ?? {})).toEqual([
      'git-config',
      'tech-detect:nginx',
      'git-config#2',
    ])
    expect(findings?.['git-config']).toEqual({
      severity: 'Medium',
      detail: 'Git Config Disclosure en https://example.test/.git/config',
      evidence: {
        templateId: 'git-config',
        matchedAt: 'https://example.test/.git/config',
      },
    })
    expect(findings?.['tech-detect:nginx'].severity).toBe('Info')
  })

  it('falls back to Info for unknown severities', () => {
    const findings = parseNucleiOutput(
      nucleiLine({
        'template-id': 'custom',
        info: { name: 'Custom', severity: 'unknown' },
        host: 'https://example.test',
      })
    )

    expect(findings?.custom).toEqual({
      severity: 'Info',
      detail: 'Custom en https://example.test',
      evidence: { templateId: 'custom', matchedAt: 'https://example.test' },
    })
  })

  it('rejects the whole output when a line is not valid JSON', () => {
    const output = [
      nucleiLine({ 'template-id': 'a', info: { name: 'A', severity: 'low' } }),
      '[INF] Using Nuclei Engine',
    ].join('\n')

    expect(parseNucleiOutput(output)).toBeNull()
  })
})

describe('NucleiScanner', () => {
  it('passes the configured templates and accepts an empty result', async () => {
    const { run, locate } = fakeTool({ stdout: '' })
    const scanner = new NucleiScanner({
      timeoutMs: 1000,
      templates: ['http/exposures/', 'ssl/'],
      locate,
      run,
      logger: silentLogger,
    })

    const result = await scanner.scan('https://example.test')

    expect(result.status).toBe('ok')
    expect(result.findings).toEqual({})
    expect(run.mock.calls[0][0].args).toEqual([
      '-u',
      'https://example.test',
      '-jsonl',
      '-silent',
      '-disable-update-check',
      '-no-color',
      '-t',
      'http/exposures/',
      '-t',
      'ssl/',
    ])
  })

  it('targets every surface page when one is given', async () => {
    const { run, locate } = fakeTool({ stdout: '' })
    const scanner = new NucleiScanner({
      timeoutMs: 1000,
      locate,
      run,
      logger: silentLogger,
    })

    const result = await scanner.scan('https://example.test', {
      surface: ['https://example.test/', 'https://example.test/login'],
    })

    expect(result.url).toBe('https://example.test')
    expect(run.mock.calls[0][0].args).toEqual([
      '-u',
      'https://example.test/',
      '-u',
      'https://example.test/login',
      '-jsonl',
      '-silent',
      '-disable-update-check',
      '-no-color',
    ])
  })

  it('reports malformed JSONL as an error', async () => {
    const { run, locate } = fakeTool({ stdout: '{"template-id":' })
    const scanner = new NucleiScanner({
      timeoutMs: 1000,
      locate,
      run,
      logger: silentLogger,
    })

    const result = await scanner.scan('https://example.test')

    expect(result.status).toBe('error:malformed-output')
  })
})
