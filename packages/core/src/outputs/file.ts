import { readFile } from 'node:fs/promises'
import { sleep, throwIfAborted } from '../abort'
import type { OutputResolver, RemoteCallOptions } from '../contracts/capabilities'
import { DeployError, errorMessage } from '../errors'

export interface FileOutputResolverOptions {
  /** How long to wait for the output to appear (default 0: read once). */
  readonly timeoutMs?: number
  readonly pollIntervalMs?: number
}

type OutputsDocument = Readonly<Record<string, unknown>>

function isRecord(v: unknown): v is Readonly<Record<string, unknown>> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

/**
 * Pick `resource.key` out of an outputs document. Accepts plain values and
 * deployment-style `{ type, value }` entries.
 */
export function pickOutput(doc: OutputsDocument, resource: string, key: string): string | undefined {
  const res: unknown = doc[resource]
  if (!isRecord(res)) return undefined
  const entry: unknown = res[key]
  if (typeof entry === 'string') return entry
  if (isRecord(entry) && typeof entry.value === 'string') return entry.value
  return undefined
}

/**
 * Resolves outputs from a JSON document the provisioning engine writes,
 * polling until the value appears or the timeout elapses.
 */
export class FileOutputResolver implements OutputResolver {
  private readonly path: string
  private readonly timeoutMs: number
  private readonly pollIntervalMs: number

  public constructor(path: string, opts?: FileOutputResolverOptions) {
    this.path = path
    this.timeoutMs = Math.max(0, opts?.timeoutMs ?? 0)
    this.pollIntervalMs = Math.max(10, opts?.pollIntervalMs ?? 2000)
  }

  public async getOutputValue(resource: string, key: string, opts?: RemoteCallOptions): Promise<string> {
    const deadline: number = Date.now() + this.timeoutMs
    let lastProblem = 'not present'
    for (;;) {
      throwIfAborted(opts?.signal)
      try {
        const doc: unknown = JSON.parse(await readFile(this.path, 'utf8'))
        if (!isRecord(doc)) throw new Error('outputs file is not a JSON object')
        const value: string | undefined = pickOutput(doc, resource, key)
        if (value !== undefined && value.trim().length > 0) return value
        lastProblem = value === undefined ? 'not present' : 'empty'
      } catch (e) {
        lastProblem = errorMessage(e)
      }
      if (Date.now() >= deadline) break
      await sleep(Math.min(this.pollIntervalMs, Math.max(0, deadline - Date.now())), opts?.signal)
    }
    throw new DeployError('DependencyUnresolved', `Output ${resource}.${key} unavailable in ${this.path}: ${lastProblem}`)
  }
}
