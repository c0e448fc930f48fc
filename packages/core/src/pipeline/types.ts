import type { OutputRef, OutputResolver, ProviderLog, StorageClientFactory } from '../contracts/capabilities'
import type { DeployError } from '../errors'
import type { ProcessRunner } from '../process/runner'
import type { StepHandle } from '../progress/reporter'

/** Everything one deployment run needs to know about its target. */
export interface DeployTarget {
  /** Absolute path of the static-site project. */
  readonly sitePath: string
  /** Build output directory, relative to `sitePath`. */
  readonly outputDir: string
  readonly container: string
  readonly indexDocument: string
  readonly errorDocument404Path: string
  readonly installCommand: string
  readonly buildCommand: string
  readonly commandTimeoutMs?: number
  readonly storageOutput: OutputRef
  readonly endpointOutput: OutputRef
  /** Cap on in-flight uploads; unbounded when absent. */
  readonly uploadConcurrency?: number
}

export const DEFAULT_TARGET: Omit<DeployTarget, 'sitePath'> = {
  outputDir: 'dist',
  container: '$web',
  indexDocument: 'index.html',
  errorDocument404Path: 'index.html',
  installCommand: 'npm install',
  buildCommand: 'npm run build',
  storageOutput: { resource: 'deploy-storage', key: 'blobEndpoint' },
  endpointOutput: { resource: 'deploy-afd', key: 'endpointUrl' }
}

/** External capabilities the pipeline drives. */
export interface PipelineDeps {
  readonly runner: ProcessRunner
  readonly resolver: OutputResolver
  readonly createStorageClient: StorageClientFactory
  readonly log?: ProviderLog
  /** Applied to captured command output before it reaches messages. */
  readonly redactors?: readonly RegExp[]
}

export type PhaseResult<T = void> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: DeployError }

export type PhaseFailure = Extract<PhaseResult<never>, { readonly ok: false }>

export type DeploymentOutcome =
  | { readonly ok: true; readonly summary: string; readonly endpoint: string }
  | { readonly ok: false; readonly error: DeployError }

/** Shared state handed to every phase of one run. */
export interface PhaseContext {
  readonly step: StepHandle
  readonly target: DeployTarget
  readonly deps: PipelineDeps
  readonly log: ProviderLog
  readonly signal?: AbortSignal
}

/** Side-effect-free description of what `deploy()` would do. */
export interface DeployPlan {
  readonly phases: readonly ['build', 'configure', 'upload', 'finalize']
  readonly sitePath: string
  readonly outputPath: string
  readonly commands: readonly string[]
  readonly container: string
  readonly indexDocument: string
  readonly errorDocument404Path: string
  readonly storageOutput: OutputRef
  readonly endpointOutput: OutputRef
  readonly uploadConcurrency: number | 'unbounded'
}
