import { spawn } from 'node:child_process'
import type { ChildProcess } from 'node:child_process'
import { constants } from 'node:fs'
import { access, stat } from 'node:fs/promises'
import path from 'node:path'

export const MAX_OUTPUT_BYTES = 32 * 1024 * 1024

export interface CommandRequest {
  command: string
  args: string[]
  timeoutMs: number
  signal?: AbortSignal
  cwd?: string
}

export interface CommandResult {
  command: string
  args: string[]
  exitCode: number | null
  stdout: string
  stderr: string
  timedOut: boolean
  aborted: boolean
  /** La salida superó el límite de captura y se descartó el resto */
  truncated: boolean
  error?: string
}

export type CommandRunner = (request: CommandRequest) => Promise<CommandResult>

/** Devuelve la ruta absoluta del ejecutable o null si no está en el PATH */
export type ToolLocator = (name: string) => Promise<string | null>

export async function findExecutable(
  name: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<string | null> {
  const dirs = (env.PATH ?? '').split(path.delimiter).filter(Boolean)
  const extensions =
    process.platform === 'win32'
      ? (env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';')
      : ['']
  for (const dir of dirs) {
    for (const extension of extensions) {
      const candidate = path.join(dir, `${name}${extension}`)
      try {
        await access(candidate, constants.X_OK)
        if ((await stat(candidate)).isFile()) return candidate
      } catch {
        continue
      }
    }
  }
  return null
}

// En POSIX el hijo encabeza su propio grupo: la señal alcanza también a sus descendientes
const OWN_PROCESS_GROUP = process.platform !== 'win32'

function killTree(child: ChildProcess): void {
  if (OWN_PROCESS_GROUP && child.pid !== undefined) {
    try {
      process.kill(-child.pid, 'SIGKILL')
      return
    } catch {
      // El grupo ya no existe: queda el hijo directo
      child.kill('SIGKILL')
      return
    }
  }
  child.kill('SIGKILL')
}

/**
 * Lanza un proceso propio por invocación (sin pool) y captura su salida.
 * Nunca rechaza: timeout, cancelación y errores de spawn se devuelven como datos.
 */
export const runCommand: CommandRunner = async ({
  command,
  args,
  timeoutMs,
  signal,
  cwd,
}) => {
  return await new Promise<CommandResult>((resolve) => {
    const base = { command, args }
    if (signal?.aborted) {
      resolve({
        ...base,
        exitCode: null,
        stdout: '',
        stderr: '',
        timedOut: false,
        aborted: true,
        truncated: false,
      })
      return
    }

    let child: ChildProcess
    try {
      child = spawn(command, args, {
        cwd,
        detached: OWN_PROCESS_GROUP,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
        shell: false,
      })
    } catch (error) {
      resolve({
        ...base,
        exitCode: null,
        stdout: '',
        stderr: '',
        timedOut: false,
        aborted: false,
        truncated: false,
        error: error instanceof Error ? error.message : String(error),
      })
      return
    }

    const stdoutChunks: Buffer[] = []
    const stderrChunks: Buffer[] = []
    let outputBytes = 0
    const collect = (chunks: Buffer[]) => (chunk: Buffer) => {
      outputBytes += chunk.length
      if (outputBytes <= MAX_OUTPUT_BYTES) chunks.push(chunk)
    }
    child.stdout?.on('data', collect(stdoutChunks))
    child.stderr?.on('data', collect(stderrChunks))

    let timedOut = false
    let aborted = false
    const timer = setTimeout(() => {
      timedOut = true
      killTree(child)
    }, timeoutMs)
    const onAbort = () => {
      aborted = true
      killTree(child)
    }
    signal?.addEventListener('abort', onAbort, { once: true })

    const finish = (exitCode: number | null, error?: string) => {
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
      resolve({
        ...base,
        exitCode,
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
        timedOut,
        aborted,
        truncated: outputBytes > MAX_OUTPUT_BYTES,
        ...(error ? { error } : {}),
      })
    }

    child.on('error', (error) => finish(null, error.message))
    child.on('close', (code) => finish(code))
  })
}
