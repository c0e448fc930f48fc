/**
 * Deployment orchestrator: one top-level step running the fixed
 * build → configure → upload → finalize pipeline, stopping at the first
 * failed phase.
 */
import { setMaxListeners } from 'node:events'
import { join } from 'node:path'
import { throwIfAborted } from '../abort'
import { silentLog, type ProviderLog } from '../contracts/capabilities'
import { errorMessage } from '../errors'
import { resolveOutput } from '../outputs/resolve'
import { withStep, type ProgressReporter } from '../progress/reporter'
import { tryBuildStaticSite } from './phases/build'
import { tryConfigureStaticWebsite } from './phases/configure'
import { tryUploadStaticFiles } from './phases/upload'
import type { DeployPlan, DeploymentOutcome, DeployTarget, PhaseContext, PhaseFailure, PipelineDeps } from './types'

export const DEPLOY_STEP_NAME = 'Deploying static site'

export interface DeployOptions {
  readonly signal?: AbortSignal
}

/** Abort controller that also follows `parent`. */
function linkedController(parent?: AbortSignal): { readonly controller: AbortController; readonly unlink: () => void } {
  const controller = new AbortController()
  if (!parent) return { controller, unlink: (): void => {} }
  const onAbort = (): void => { controller.abort(parent.reason) }
  if (parent.aborted) onAbort()
  else parent.addEventListener('abort', onAbort, { once: true })
  return { controller, unlink: (): void => { parent.removeEventListener('abort', onAbort) } }
}

export class DeploymentOrchestrator {
  private readonly log: ProviderLog

  public constructor(
    private readonly target: DeployTarget,
    private readonly deps: PipelineDeps,
    private readonly reporter: ProgressReporter
  ) {
    this.log = deps.log ?? silentLog
  }

  public plan(): DeployPlan {
    const t: DeployTarget = this.target
    return {
      phases: ['build', 'configure', 'upload', 'finalize'],
      sitePath: t.sitePath,
      outputPath: join(t.sitePath, t.outputDir),
      commands: [t.installCommand, t.buildCommand],
      container: t.container,
      indexDocument: t.indexDocument,
      errorDocument404Path: t.errorDocument404Path,
      storageOutput: t.storageOutput,
      endpointOutput: t.endpointOutput,
      uploadConcurrency: t.uploadConcurrency ?? 'unbounded'
    }
  }

  /**
   * Run the pipeline once.
   * Phase failures resolve to `{ ok: false }`; unexpected errors and
   * cancellation mark the step Failed and are re-thrown.
   */
  public async deploy(opts?: DeployOptions): Promise<DeploymentOutcome> {
    throwIfAborted(opts?.signal)
    const { controller, unlink } = linkedController(opts?.signal)
    const signal: AbortSignal = controller.signal
    // storage SDK calls each add their own abort listener
    setMaxListeners(0, signal)
    try {
      // started now so provisioning can finish while the site builds
      const storageEndpoint = resolveOutput(this.deps.resolver, this.target.storageOutput, signal)

      const failure = await withStep<PhaseFailure | undefined>(this.reporter, DEPLOY_STEP_NAME, async (step) => {
        try {
          const ctx: PhaseContext = { step, target: this.target, deps: this.deps, log: this.log, signal }

          const built = await tryBuildStaticSite(ctx)
          if (!built.ok) return built

          const configured = await tryConfigureStaticWebsite(ctx, storageEndpoint)
          if (!configured.ok) return configured

          const uploaded = await tryUploadStaticFiles(ctx, configured.value)
          if (!uploaded.ok) return uploaded

          step.complete('Successfully deployed static site')
          return undefined
        } catch (e) {
          step.fail(`Static site deployment failed: ${errorMessage(e)}`)
          throw e
        }
      })
      if (failure) {
        this.reporter.completePublish(`Static site deployment failed: ${failure.error.message}`, false)
        return failure
      }

      const endpoint = await resolveOutput(this.deps.resolver, this.target.endpointOutput, signal)
      if (!endpoint.ok) {
        if (endpoint.error.kind === 'Cancelled') throw endpoint.error
        this.reporter.completePublish(`Static site deployed, but the public endpoint is unavailable: ${endpoint.error.message}`, false)
        return endpoint
      }
      const summary = `Static site deployed successfully! Access it at: ${endpoint.value}`
      this.reporter.completePublish(summary, true)
      return { ok: true, summary, endpoint: endpoint.value }
    } finally {
      unlink()
      controller.abort('deployment finished')
    }
  }
}
