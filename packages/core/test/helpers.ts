/**
 * In-process stand-ins for the pipeline's collaborators.
 */
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, join } from 'node:path'
import type { OutputResolver, RemoteCallOptions, StaticWebsiteSettings, StorageClient, UploadBlobArgs } from '../src/contracts/capabilities'
import type { ProgressEvent, ProgressSink } from '../src/events/types'
import type { ExecOptions, ExecResult, ProcessRunner } from '../src/process/runner'

/** Programmable runner keyed by the full command line (`npm run build`). */
export class FakeRunner implements ProcessRunner {
  public readonly calls: Array<{ readonly cmd: string; readonly cwd?: string }> = []
  private readonly results: Readonly<Record<string, { readonly code: number; readonly stderr?: string }>>

  public constructor(results: Readonly<Record<string, { readonly code: number; readonly stderr?: string }>> = {}) {
    this.results = results
  }

  public async exec(bin: string, args: readonly string[], opts?: ExecOptions): Promise<ExecResult> {
    const cmd: string = [bin, ...args].join(' ')
    this.calls.push({ cmd, cwd: opts?.cwd })
    const r = this.results[cmd] ?? { code: 0 }
    return { ok: r.code === 0, code: r.code, stdout: '', stderr: r.stderr ?? '' }
  }
}

export interface TestServiceProperties {
  readonly cors: ReadonlyArray<{ readonly allowedOrigins: string; readonly maxAgeInSeconds: number }>
  readonly defaultServiceVersion: string
  readonly deleteRetentionPolicy: { readonly enabled: boolean; readonly days: number }
  readonly staticWebsite?: StaticWebsiteSettings
}

export const INITIAL_PROPERTIES: TestServiceProperties = {
  cors: [{ allowedOrigins: 'https://example.test', maxAgeInSeconds: 60 }],
  defaultServiceVersion: '2021-08-06',
  deleteRetentionPolicy: { enabled: true, days: 7 },
  staticWebsite: { enabled: false }
}

const delay = (ms: number): Promise<void> => new Promise<void>((resolve) => { setTimeout(resolve, ms) })

/** Storage account held in memory; records every call in order. */
export class MemoryStorageClient implements StorageClient<TestServiceProperties> {
  public properties: TestServiceProperties
  public readonly calls: string[] = []
  public readonly containers: Set<string> = new Set()
  public readonly uploads: UploadBlobArgs[] = []
  public readonly signals: Array<AbortSignal | undefined> = []
  public uploadDelayMs = 0
  public failBlobs: ReadonlySet<string> = new Set()
  public startedUploads = 0
  public finishedUploads = 0
  public startedWhenFirstFinished = -1
  public inFlight = 0
  public maxInFlight = 0

  public constructor(initial: TestServiceProperties = INITIAL_PROPERTIES) {
    this.properties = initial
  }

  public async getServiceProperties(opts?: RemoteCallOptions): Promise<TestServiceProperties> {
    this.calls.push('getServiceProperties')
    this.signals.push(opts?.signal)
    return this.properties
  }

  public async setServiceProperties(props: TestServiceProperties, opts?: RemoteCallOptions): Promise<void> {
    this.calls.push('setServiceProperties')
    this.signals.push(opts?.signal)
    this.properties = props
  }

  public async createContainerIfNotExists(name: string, opts?: RemoteCallOptions): Promise<void> {
    this.calls.push(`createContainerIfNotExists:${name}`)
    this.signals.push(opts?.signal)
    this.containers.add(name)
  }

  public async uploadBlob(args: UploadBlobArgs, opts?: RemoteCallOptions): Promise<void> {
    this.calls.push(`uploadBlob:${args.blobName}`)
    this.signals.push(opts?.signal)
    this.startedUploads++
    this.inFlight++
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight)
    try {
      if (this.uploadDelayMs > 0) await delay(this.uploadDelayMs)
      if (this.failBlobs.has(args.blobName)) throw new Error(`upload rejected for ${args.blobName}`)
      this.uploads.push(args)
    } finally {
      this.inFlight--
      this.finishedUploads++
      if (this.startedWhenFirstFinished < 0) this.startedWhenFirstFinished = this.startedUploads
    }
  }
}

/** Resolver over a fixed map; values may be delayed or fail. */
export class MapResolver implements OutputResolver {
  public readonly calls: string[] = []
  private readonly values: Readonly<Record<string, string | Error>>

  public constructor(values: Readonly<Record<string, string | Error>>) {
    this.values = values
  }

  public async getOutputValue(resource: string, key: string): Promise<string> {
    const id = `${resource}.${key}`
    this.calls.push(id)
    const v = this.values[id]
    if (v instanceof Error) throw v
    if (v === undefined) throw new Error(`no output ${id}`)
    return v
  }
}

export class RecordingSink implements ProgressSink {
  public readonly events: ProgressEvent[] = []
  public onEvent(event: ProgressEvent): void {
    this.events.push(event)
  }
  /** `type:name:message` lines, compact for assertions. */
  public lines(): string[] {
    return this.events.map((e) => {
      if (e.type === 'publish-completed') return `${e.type}:${e.ok}:${e.message}`
      if (e.type === 'task-created' || e.type === 'task-completed' || e.type === 'task-failed') return `${e.type}:${e.taskName}${e.message ? `:${e.message}` : ''}`
      return `${e.type}:${e.stepName}${e.message ? `:${e.message}` : ''}`
    })
  }
}

/** Temp directory with `files` (relative path → content) written under it. */
export async function makeTree(files: Readonly<Record<string, string>>): Promise<string> {
  const root: string = await mkdtemp(join(tmpdir(), 'sd-test-'))
  for (const [rel, content] of Object.entries(files)) {
    const full = join(root, rel)
    await mkdir(dirname(full), { recursive: true })
    await writeFile(full, content, 'utf8')
  }
  return root
}

export async function removeTree(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true })
}
