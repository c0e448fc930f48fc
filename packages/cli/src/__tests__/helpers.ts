import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, join } from 'node:path'
import { vi } from 'vitest'
import type { ExecOptions, ExecResult, ProcessRunner, ServicePropertiesShape, StorageClient, UploadBlobArgs } from '@staticdeploy/core'
import { logger, setColorMode } from '../utils/logger'

export class StubRunner implements ProcessRunner {
  public readonly calls: Array<{ readonly cmd: string; readonly cwd?: string }> = []
  public constructor(private readonly failing: Readonly<Record<string, string>> = {}) {}

  public async exec(bin: string, args: readonly string[], opts?: ExecOptions): Promise<ExecResult> {
    const cmd: string = [bin, ...args].join(' ')
    this.calls.push({ cmd, cwd: opts?.cwd })
    const stderr: string | undefined = this.failing[cmd]
    return stderr === undefined
      ? { ok: true, code: 0, stdout: '', stderr: '' }
      : { ok: false, code: 1, stdout: '', stderr }
  }
}

export class StubStorage implements StorageClient {
  public properties: ServicePropertiesShape = { staticWebsite: { enabled: false } }
  public readonly uploads: UploadBlobArgs[] = []
  public readonly containers: string[] = []

  public async getServiceProperties(): Promise<ServicePropertiesShape> { return this.properties }
  public async setServiceProperties(props: ServicePropertiesShape): Promise<void> { this.properties = props }
  public async createContainerIfNotExists(name: string): Promise<void> { this.containers.push(name) }
  public async uploadBlob(args: UploadBlobArgs): Promise<void> { this.uploads.push(args) }
}

export async function makeTree(files: Readonly<Record<string, string>>): Promise<string> {
  const root: string = await mkdtemp(join(tmpdir(), 'sd-cli-'))
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

/** Captures console.log/console.error lines. */
export function captureConsole(): { readonly out: string[]; readonly err: string[] } {
  const out: string[] = []
  const err: string[] = []
  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => { out.push(args.map(String).join(' ')) })
  vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => { err.push(args.map(String).join(' ')) })
  return { out, err }
}

/** Logger state is module-wide; put it back between tests. */
export function resetLogger(): void {
  logger.setNdjson(false)
  logger.setJsonOnly(false)
  logger.setLevel('info')
  logger.setTimestamps(false)
  logger.setNoEmoji(false)
  logger.setRedactors([])
  setColorMode('auto')
}
