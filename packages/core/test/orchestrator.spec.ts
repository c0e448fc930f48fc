import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { getMaxListeners } from 'node:events'
import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { DeploymentOrchestrator } from '../src/pipeline/orchestrator'
import { DEFAULT_TARGET, type DeployTarget, type PipelineDeps } from '../src/pipeline/types'
import { ProgressReporter } from '../src/progress/reporter'
import { DeployError } from '../src/errors'
import type { StorageClient } from '../src/contracts/capabilities'
import { FakeRunner, INITIAL_PROPERTIES, MapResolver, MemoryStorageClient, RecordingSink, makeTree, removeTree } from './helpers'

const STORAGE_URL = 'https://acct.blob.example.test/'
const SITE_URL = 'https://site.example.test'
const OUTPUTS = { 'deploy-storage.blobEndpoint': STORAGE_URL, 'deploy-afd.endpointUrl': SITE_URL }

let root: string
let sitePath: string

beforeEach(async () => {
  root = await makeTree({
    'site/package.json': '{"name":"site"}',
    'site/dist/index.html': '<h1>hello</h1>',
    'site/dist/assets/app.js': 'console.log(1)'
  })
  sitePath = join(root, 'site')
})

afterEach(async () => {
  await removeTree(root)
})

function makeTarget(over?: Partial<DeployTarget>): DeployTarget {
  return { ...DEFAULT_TARGET, sitePath, ...over }
}

interface Harness {
  readonly orchestrator: DeploymentOrchestrator
  readonly reporter: ProgressReporter
  readonly sink: RecordingSink
  readonly runner: FakeRunner
  readonly storage: MemoryStorageClient
  readonly resolver: MapResolver
  readonly endpoints: string[]
}

function harness(args?: {
  readonly target?: Partial<DeployTarget>
  readonly runner?: FakeRunner
  readonly outputs?: Readonly<Record<string, string | Error>>
  readonly storage?: MemoryStorageClient
}): Harness {
  const sink = new RecordingSink()
  const reporter = new ProgressReporter([sink])
  const runner = args?.runner ?? new FakeRunner()
  const storage = args?.storage ?? new MemoryStorageClient()
  const resolver = new MapResolver(args?.outputs ?? OUTPUTS)
  const endpoints: string[] = []
  const deps: PipelineDeps = {
    runner,
    resolver,
    createStorageClient: (endpoint: string): StorageClient => { endpoints.push(endpoint); return storage }
  }
  const orchestrator = new DeploymentOrchestrator(makeTarget(args?.target), deps, reporter)
  return { orchestrator, reporter, sink, runner, storage, resolver, endpoints }
}

describe('DeploymentOrchestrator.deploy success', () => {
  it('builds, configures, uploads both files and reports the endpoint', async () => {
    const h = harness()
    const outcome = await h.orchestrator.deploy()
    expect(outcome).toEqual({ ok: true, summary: `Static site deployed successfully! Access it at: ${SITE_URL}`, endpoint: SITE_URL })
    expect(h.runner.calls).toEqual([{ cmd: 'npm install', cwd: sitePath }, { cmd: 'npm run build', cwd: sitePath }])
    expect(h.endpoints).toEqual([STORAGE_URL])
    expect(h.storage.calls).toEqual([
      'getServiceProperties',
      'setServiceProperties',
      'createContainerIfNotExists:$web',
      'uploadBlob:assets/app.js',
      'uploadBlob:index.html'
    ])
    expect([...h.storage.containers]).toEqual(['$web'])
    expect(h.storage.uploads.map((u) => [u.container, u.blobName, u.contentType])).toEqual([
      ['$web', 'assets/app.js', 'application/javascript'],
      ['$web', 'index.html', 'text/html']
    ])
    expect(h.storage.uploads.map((u) => u.filePath)).toEqual([
      join(sitePath, 'dist', 'assets', 'app.js'),
      join(sitePath, 'dist', 'index.html')
    ])
    expect(h.reporter.openSteps()).toEqual([])
  })

  it('reports every step and task transition in order', async () => {
    const h = harness()
    await h.orchestrator.deploy()
    expect(h.sink.lines()).toEqual([
      'step-created:Deploying static site',
      'task-created:Building static site',
      'task-completed:Building static site:Successfully built static site',
      'task-created:Configuring static website service',
      'task-completed:Configuring static website service:Successfully configured static website service',
      'task-created:Uploading static files to storage',
      'task-completed:Uploading static files to storage:Successfully uploaded 2 files to static website',
      'step-completed:Deploying static site:Successfully deployed static site',
      `publish-completed:true:Static site deployed successfully! Access it at: ${SITE_URL}`
    ])
  })

  it('changes only the static website settings of the service properties', async () => {
    const h = harness()
    await h.orchestrator.deploy()
    expect(h.storage.properties).toEqual({
      ...INITIAL_PROPERTIES,
      staticWebsite: { enabled: true, indexDocument: 'index.html', errorDocument404Path: 'index.html' }
    })
    expect(h.storage.properties.cors).toBe(INITIAL_PROPERTIES.cors)
    expect(h.storage.properties.deleteRetentionPolicy).toBe(INITIAL_PROPERTIES.deleteRetentionPolicy)
  })

  it('issues every upload before the first one finishes', async () => {
    const storage = new MemoryStorageClient()
    storage.uploadDelayMs = 20
    const h = harness({ storage })
    await h.orchestrator.deploy()
    expect(storage.startedWhenFirstFinished).toBe(2)
    expect(storage.maxInFlight).toBe(2)
  })

  it('honors an upload concurrency cap', async () => {
    const storage = new MemoryStorageClient()
    storage.uploadDelayMs = 5
    const h = harness({ storage, target: { uploadConcurrency: 1 } })
    const outcome = await h.orchestrator.deploy()
    expect(outcome.ok).toBe(true)
    expect(storage.maxInFlight).toBe(1)
    expect(storage.uploads).toHaveLength(2)
  })

  it('uploads a larger site without listener-leak warnings', async () => {
    for (let i = 0; i < 12; i++) await writeFile(join(sitePath, 'dist', `page-${i}.html`), `<p>${i}</p>`, 'utf8')
    const warnings: string[] = []
    const onWarning = (w: Error): void => { warnings.push(w.name) }
    process.on('warning', onWarning)
    try {
      const h = harness()
      const outcome = await h.orchestrator.deploy({ signal: new AbortController().signal })
      expect(outcome.ok).toBe(true)
      expect(h.storage.uploads).toHaveLength(14)
      const signal = h.storage.signals.find((s) => s !== undefined)
      expect(signal && getMaxListeners(signal)).toBe(0)
      await new Promise<void>((resolve) => { setImmediate(resolve) })
      expect(warnings).toEqual([])
    } finally {
      process.off('warning', onWarning)
    }
  })

  it('uses the configured commands, container and documents', async () => {
    const h = harness({
      target: { installCommand: 'pnpm install --frozen-lockfile', buildCommand: 'pnpm build', container: 'site', indexDocument: 'home.html', errorDocument404Path: '404.html' }
    })
    await h.orchestrator.deploy()
    expect(h.runner.calls.map((c) => c.cmd)).toEqual(['pnpm install --frozen-lockfile', 'pnpm build'])
    expect(h.storage.properties.staticWebsite).toEqual({ enabled: true, indexDocument: 'home.html', errorDocument404Path: '404.html' })
    expect([...h.storage.containers]).toEqual(['site'])
  })
})

describe('DeploymentOrchestrator.deploy failures', () => {
  it('stops at the build phase when the site directory is missing', async () => {
    const missing = join(root, 'missing')
    const h = harness({ target: { sitePath: missing } })
    const outcome = await h.orchestrator.deploy()
    expect(outcome.ok).toBe(false)
    if (outcome.ok) return
    expect(outcome.error.kind).toBe('NotFound')
    expect(outcome.error.message).toBe(`Static site directory not found: ${missing}`)
    expect(h.runner.calls).toEqual([])
    expect(h.endpoints).toEqual([])
    expect(h.storage.calls).toEqual([])
    expect(h.resolver.calls).toEqual(['deploy-storage.blobEndpoint'])
    expect(h.sink.lines().slice(-3)).toEqual([
      `task-failed:Building static site:Static site directory not found: ${missing}`,
      `step-failed:Deploying static site:Static site directory not found: ${missing}`,
      `publish-completed:false:Static site deployment failed: Static site directory not found: ${missing}`
    ])
  })

  it('stops when the build command exits non-zero', async () => {
    const runner = new FakeRunner({ 'npm run build': { code: 1, stderr: 'syntax error\n' } })
    const h = harness({ runner })
    const outcome = await h.orchestrator.deploy()
    expect(outcome.ok).toBe(false)
    if (outcome.ok) return
    expect(outcome.error.kind).toBe('ExternalProcessFailure')
    expect(outcome.error.message).toBe('npm run build failed with exit code 1: syntax error')
    expect(outcome.error.exitCode).toBe(1)
    expect(runner.calls.map((c) => c.cmd)).toEqual(['npm install', 'npm run build'])
    expect(h.endpoints).toEqual([])
    expect(h.storage.calls).toEqual([])
    const build = h.sink.events.find((e) => e.type === 'task-failed')
    expect(build?.message).toContain('exit code 1')
    expect(build?.message).toContain('syntax error')
  })

  it('does not run the build command when install fails', async () => {
    const runner = new FakeRunner({ 'npm install': { code: 2, stderr: 'ERESOLVE' } })
    const h = harness({ runner })
    const outcome = await h.orchestrator.deploy()
    expect(outcome.ok).toBe(false)
    expect(runner.calls.map((c) => c.cmd)).toEqual(['npm install'])
    expect(h.storage.calls).toEqual([])
  })

  it('stops at configure when the storage endpoint cannot be resolved', async () => {
    const h = harness({ outputs: { 'deploy-afd.endpointUrl': SITE_URL } })
    const outcome = await h.orchestrator.deploy()
    expect(outcome.ok).toBe(false)
    if (outcome.ok) return
    expect(outcome.error.kind).toBe('DependencyUnresolved')
    expect(outcome.error.message).toBe('Failed to configure static website: Failed to resolve output deploy-storage.blobEndpoint: no output deploy-storage.blobEndpoint')
    expect(h.endpoints).toEqual([])
    expect(h.storage.calls).toEqual([])
    expect(h.resolver.calls).toEqual(['deploy-storage.blobEndpoint'])
  })

  it('treats an empty storage endpoint as unresolved', async () => {
    const h = harness({ outputs: { 'deploy-storage.blobEndpoint': '  ', 'deploy-afd.endpointUrl': SITE_URL } })
    const outcome = await h.orchestrator.deploy()
    expect(outcome.ok).toBe(false)
    if (outcome.ok) return
    expect(outcome.error.message).toBe('Failed to configure static website: Output deploy-storage.blobEndpoint is empty')
  })

  it('stops at configure when reading service properties fails', async () => {
    const storage = new MemoryStorageClient()
    vi.spyOn(storage, 'getServiceProperties').mockRejectedValue(new Error('AuthorizationFailure'))
    const h = harness({ storage })
    const outcome = await h.orchestrator.deploy()
    expect(outcome.ok).toBe(false)
    if (outcome.ok) return
    expect(outcome.error.kind).toBe('RemoteOperationFailure')
    expect(outcome.error.message).toBe('Failed to configure static website: AuthorizationFailure')
    expect(storage.calls).toEqual([])
    expect(storage.uploads).toEqual([])
    expect(h.resolver.calls).not.toContain('deploy-afd.endpointUrl')
  })

  it('fails the upload phase when any upload fails, without rollback', async () => {
    const storage = new MemoryStorageClient()
    storage.failBlobs = new Set(['index.html'])
    const h = harness({ storage })
    const outcome = await h.orchestrator.deploy()
    expect(outcome.ok).toBe(false)
    if (outcome.ok) return
    expect(outcome.error.kind).toBe('AggregateUploadFailure')
    expect(outcome.error.message).toBe('Failed to upload files: 1 of 2 uploads failed (index.html: upload rejected for index.html)')
    expect(outcome.error.details).toEqual([{ item: 'index.html', message: 'upload rejected for index.html' }])
    expect(storage.uploads.map((u) => u.blobName)).toEqual(['assets/app.js'])
    expect(h.resolver.calls).not.toContain('deploy-afd.endpointUrl')
  })

  it('fails the upload phase when the build output is missing', async () => {
    await removeTree(join(sitePath, 'dist'))
    const h = harness()
    const outcome = await h.orchestrator.deploy()
    expect(outcome.ok).toBe(false)
    if (outcome.ok) return
    expect(outcome.error.kind).toBe('NotFound')
    expect(outcome.error.message).toBe(`Build output directory not found: ${join(sitePath, 'dist')}`)
    expect(h.storage.calls).toEqual(['getServiceProperties', 'setServiceProperties', 'createContainerIfNotExists:$web'])
  })

  it('reports a completed step but a failed outcome when the public endpoint is missing', async () => {
    const h = harness({ outputs: { 'deploy-storage.blobEndpoint': STORAGE_URL } })
    const outcome = await h.orchestrator.deploy()
    expect(outcome.ok).toBe(false)
    if (outcome.ok) return
    expect(outcome.error.kind).toBe('DependencyUnresolved')
    expect(h.storage.uploads).toHaveLength(2)
    expect(h.sink.lines().slice(-2)).toEqual([
      'step-completed:Deploying static site:Successfully deployed static site',
      'publish-completed:false:Static site deployed, but the public endpoint is unavailable: Failed to resolve output deploy-afd.endpointUrl: no output deploy-afd.endpointUrl'
    ])
  })
})

describe('DeploymentOrchestrator.deploy cancellation', () => {
  it('fails the upload task and skips finalize when cancelled mid-upload', async () => {
    const storage = new MemoryStorageClient()
    storage.uploadDelayMs = 500
    const h = harness({ storage })
    const ac = new AbortController()
    h.reporter.subscribe((e) => {
      if (e.type === 'task-created' && e.taskName === 'Uploading static files to storage') {
        setTimeout(() => ac.abort(new Error('user cancelled')), 20)
      }
    })
    const err: unknown = await h.orchestrator.deploy({ signal: ac.signal }).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(DeployError)
    expect(err instanceof DeployError ? err.kind : undefined).toBe('Cancelled')
    expect(storage.uploads).toEqual([])
    expect(h.resolver.calls).not.toContain('deploy-afd.endpointUrl')
    expect(h.sink.lines().slice(-2)).toEqual([
      'task-failed:Uploading static files to storage:Failed to upload files: Operation cancelled: user cancelled',
      'step-failed:Deploying static site:Failed to upload files: Operation cancelled: user cancelled'
    ])
    expect(h.sink.events.filter((e) => e.type === 'step-failed')).toHaveLength(1)
    expect(h.sink.events.some((e) => e.type === 'publish-completed')).toBe(false)
    expect(h.reporter.openSteps()).toEqual([])
  })

  it('passes the cancellation signal to remote calls', async () => {
    const h = harness()
    await h.orchestrator.deploy({ signal: new AbortController().signal })
    expect(h.storage.signals.length).toBeGreaterThan(0)
    expect(h.storage.signals.every((s) => s instanceof AbortSignal)).toBe(true)
  })

  it('refuses to start when already cancelled', async () => {
    const h = harness()
    const ac = new AbortController()
    ac.abort()
    await expect(h.orchestrator.deploy({ signal: ac.signal })).rejects.toThrow('Operation cancelled')
    expect(h.sink.events).toEqual([])
    expect(h.resolver.calls).toEqual([])
  })
})

describe('DeploymentOrchestrator.plan', () => {
  it('describes the run without side effects', () => {
    const h = harness({ target: { uploadConcurrency: 8 } })
    expect(h.orchestrator.plan()).toEqual({
      phases: ['build', 'configure', 'upload', 'finalize'],
      sitePath,
      outputPath: join(sitePath, 'dist'),
      commands: ['npm install', 'npm run build'],
      container: '$web',
      indexDocument: 'index.html',
      errorDocument404Path: 'index.html',
      storageOutput: { resource: 'deploy-storage', key: 'blobEndpoint' },
      endpointOutput: { resource: 'deploy-afd', key: 'endpointUrl' },
      uploadConcurrency: 8
    })
    expect(h.runner.calls).toEqual([])
    expect(h.storage.calls).toEqual([])
  })
})
