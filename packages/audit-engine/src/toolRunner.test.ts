import { readFileSync } from 'node:fs'
import { chmod, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { MAX_OUTPUT_BYTES, findExecutable, runCommand } from './toolRunner'

// Un zombi sin recoger sigue respondiendo a kill(pid, 0)
function isRunning(pid: number): boolean {
  try {
    process.kill(pid, 0)
  } catch {
    return false
  }
  try {
    return !/^\d+ \(.*\) Z/.test(readFileSync(`/proc/${pid}/stat`, 'utf8'))
  } catch {
    return false
  }
}

const SPAWN_GRANDCHILD = [
  "const { spawn } = require('child_process')",
  "const child = spawn(process.execPath, ['-e', 'setTimeout(() => {}, 30000)'], { stdio: 'ignore' })",
  'process.stdout.write(String(child.pid))',
  'setTimeout(() => {}, 30000)',
].join('\n')

describe('findExecutable', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'tool-runner-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it.skipIf(process.platform === 'win32')(
    'finds an executable file on PATH',
    async () => {
      const file = path.join(dir, 'fake-tool')
      await writeFile(file, '#!/bin/sh\nexit 0\n')
      await chmod(file, 0o755)

      expect(await findExecutable('fake-tool', { PATH: dir })).toBe(file)
    }
  )

  it('returns null when the tool is not on PATH', async () => {
    expect(await findExecutable('missing-tool', { PATH: dir })).toBeNull()
  })

  it('ignores directories with the tool name', async () => {
    expect(await findExecutable(path.basename(dir), { PATH: tmpdir() })).toBeNull()
  })
})

describe('runCommand', () => {
  it('captures stdout, stderr and the exit code', async () => {
    const result = await runCommand({
      command: process.execPath,
      args: ['-e', 'process.stdout.write("hola"); process.stderr.write("aviso"); process.exit(3)'],
      timeoutMs: 10_000,
    })

    expect(result).toMatchObject({
      exitCode: 3,
      stdout: 'hola',
      stderr: 'aviso',
      timedOut: false,
      aborted: false,
    })
  })

  it('kills the process when the timeout expires', async () => {
    const result = await runCommand({
      command: process.execPath,
      args: ['-e', 'setTimeout(() => {}, 30000)'],
      timeoutMs: 200,
    })

    expect(result.timedOut).toBe(true)
    expect(result.exitCode).toBeNull()
  })

  it('kills the process when the signal aborts', async () => {
    const controller = new AbortController()
    const pending = runCommand({
      command: process.execPath,
      args: ['-e', 'setTimeout(() => {}, 30000)'],
      timeoutMs: 30_000,
      signal: controller.signal,
    })
    setTimeout(() => controller.abort(), 100)

    const result = await pending
    expect(result.aborted).toBe(true)
    expect(result.timedOut).toBe(false)
  })

  it.skipIf(process.platform !== 'linux')(
    'kills the processes spawned by the tool on timeout',
    async () => {
      const result = await runCommand({
        command: process.execPath,
        args: ['-e', SPAWN_GRANDCHILD],
        timeoutMs: 1500,
      })

      expect(result.timedOut).toBe(true)
      const grandchild = Number(result.stdout)
      expect(grandchild).toBeGreaterThan(0)
      await vi.waitFor(() => expect(isRunning(grandchild)).toBe(false), {
        timeout: 3000,
        interval: 50,
      })
    },
    10_000
  )

  it.skipIf(process.platform !== 'linux')(
    'kills the processes spawned by the tool on abort',
    async () => {
      const controller = new AbortController()
      const pending = runCommand({
        command: process.execPath,
        args: ['-e', SPAWN_GRANDCHILD],
        timeoutMs: 30_000,
        signal: controller.signal,
      })
      setTimeout(() => controller.abort(), 1500)

      const result = await pending
      expect(result.aborted).toBe(true)
      const grandchild = Number(result.stdout)
      expect(grandchild).toBeGreaterThan(0)
      await vi.waitFor(() => expect(isRunning(grandchild)).toBe(false), {
        timeout: 3000,
        interval: 50,
      })
    },
    10_000
  )

  it('flags output beyond the capture limit as truncated', async () => {
    const result = await runCommand({
      command: process.execPath,
      args: ['-e', `process.stdout.write('x'.repeat(${MAX_OUTPUT_BYTES + 1024}))`],
      timeoutMs: 20_000,
    })

    expect(result.exitCode).toBe(0)
    expect(result.truncated).toBe(true)
    expect(result.stdout.length).toBeLessThanOrEqual(MAX_OUTPUT_BYTES)
  }, 30_000)

  it('does not flag output within the limit', async () => {
    const result = await runCommand({
      command: process.execPath,
      args: ['-e', 'process.stdout.write("ok")'],
      timeoutMs: 10_000,
    })

    expect(result.truncated).toBe(false)
  })

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController()
    controller.abort()

    const result = await runCommand({
      command: process.execPath,
      args: ['-e', ''],
      timeoutMs: 1000,
      signal: controller.signal,
    })

    expect(result).toMatchObject({ aborted: true, exitCode: null, stdout: '' })
  })

  it('reports spawn failures as data', async () => {
    const result = await runCommand({
      command: path.join(tmpdir(), 'no-such-binary-for-tests'),
      args: [],
      timeoutMs: 1000,
    })

    expect(result.exitCode).toBeNull()
    expect(result.error).toContain('ENOENT')
  })
})
