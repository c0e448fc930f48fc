import { spawn, type SpawnOptions as NodeSpawnOptions } from 'node:child_process'
import { EOL } from 'node:os'

export interface ExecResult {
  readonly ok: boolean
  readonly code: number | null
  readonly stdout: string
  readonly stderr: string
}

export interface SpawnCtl {
  readonly done: Promise<ExecResult>
  cancel(reason?: string): void
}

export interface ExecOptions {
  readonly cwd?: string
  readonly env?: NodeJS.ProcessEnv
  readonly timeoutMs?: number
  readonly redactors?: readonly RegExp[]
  readonly signal?: AbortSignal
  readonly onStdout?: (chunk: string) => void
  readonly onStderr?: (chunk: string) => void
}

/** Command-runner capability: run a program in a directory, capture exit code and output. */
export interface ProcessRunner {
  exec(bin: string, args: readonly string[], opts?: ExecOptions): Promise<ExecResult>
}

/** Split a configured command line (`npm run build`) into bin + args. */
export function splitCommand(cmd: string): { readonly bin: string; readonly args: readonly string[] } {
  const parts: string[] = cmd.trim().split(/\s+/).filter((p) => p.length > 0)
  const [bin = '', ...args] = parts
  return { bin, args }
}

function redact(s: string, patterns?: readonly RegExp[]): string {
  if (!patterns || patterns.length === 0) return s
  let out = s
  for (const re of patterns) out = out.replace(re, '***')
  return out
}

export class NodeProcessRunner implements ProcessRunner {
  async exec(bin: string, args: readonly string[], opts?: ExecOptions): Promise<ExecResult> {
    const chunksOut: string[] = []
    const chunksErr: string[] = []
    const ctl = this.spawn(bin, args, {
      ...opts,
      onStdout: (c) => { chunksOut.push(c); opts?.onStdout?.(c) },
      onStderr: (c) => { chunksErr.push(c); opts?.onStderr?.(c) }
    })
    const res = await ctl.done
    return { ...res, stdout: chunksOut.join(''), stderr: chunksErr.join('') }
  }

  spawn(bin: string, args: readonly string[], opts?: ExecOptions): SpawnCtl {
    const nodeOpts: NodeSpawnOptions = { cwd: opts?.cwd, env: opts?.env, shell: false }
    const child = spawn(bin, [...args], nodeOpts)
    let stdout = ''
    let stderr = ''
    const apply = (s: string): string => redact(s, opts?.redactors)
    const onOut = (b: Buffer): void => { const s = b.toString(); stdout += s; opts?.onStdout?.(apply(s)) }
    const onErr = (b: Buffer): void => { const s = b.toString(); stderr += s; opts?.onStderr?.(apply(s)) }
    child.stdout?.on('data', onOut)
    child.stderr?.on('data', onErr)

    let timeoutTimer: NodeJS.Timeout | undefined
    const cancel = (reason?: string): void => {
      try { child.kill('SIGTERM') } catch { /* already exited */ }
      if (reason) {
        const note = `${EOL}cancelled: ${reason}${EOL}`
        stderr += note
        opts?.onStderr?.(note)
      }
    }
    const onAbort = (): void => { cancel('aborted') }

    const done = new Promise<ExecResult>((resolve) => {
      // spawn failures (ENOENT) surface as a failed result, not a throw
      child.on('error', (err: Error) => {
        const note = `${err.message}${EOL}`
        stderr += note
        opts?.onStderr?.(apply(note))
        if (child.pid === undefined) {
          if (timeoutTimer) clearTimeout(timeoutTimer)
          opts?.signal?.removeEventListener('abort', onAbort)
          resolve({ ok: false, code: null, stdout: apply(stdout), stderr: apply(stderr) })
        }
      })
      child.on('close', (code: number | null) => {
        if (timeoutTimer) clearTimeout(timeoutTimer)
        opts?.signal?.removeEventListener('abort', onAbort)
        resolve({ ok: code === 0, code, stdout: apply(stdout), stderr: apply(stderr) })
      })
    })

    if (opts?.timeoutMs && opts.timeoutMs > 0) {
      timeoutTimer = setTimeout(() => { cancel(`timeout after ${opts.timeoutMs}ms`) }, opts.timeoutMs)
    }
    if (opts?.signal) {
      if (opts.signal.aborted) onAbort()
      else opts.signal.addEventListener('abort', onAbort, { once: true })
    }

    return { done, cancel }
  }
}
