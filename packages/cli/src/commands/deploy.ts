import type { Command } from 'commander'
import {
  DeploymentOrchestrator,
  EnvOutputResolver,
  FileOutputResolver,
  NodeProcessRunner,
  ProgressReporter,
  summary,
  toErrorInfo,
  type DeploySummary,
  type OutputResolver,
  type ProcessRunner,
  type ProviderLog,
  type StorageClientFactory
} from '@staticdeploy/core'
import { azureStorageClientFactory } from '@staticdeploy/provider-azure-storage'
import { EnvLoader } from '../config/env'
import { loadConfig, type ConfigFlags, type ResolvedConfig } from '../config/load'
import { progressSinksFor } from '../progress/sinks'
import { logger } from '../utils/logger'
import { computeRedactors } from '../utils/redaction'
import { printSummary } from '../utils/summarize'

export interface DeployCommandOptions extends ConfigFlags {
  readonly json?: boolean
  readonly ndjson?: boolean
}

/** Process-level collaborators; tests swap them for in-process fakes. */
export interface DeployRuntime {
  readonly cwd: string
  readonly env: NodeJS.ProcessEnv
  readonly runner?: ProcessRunner
  readonly resolver?: OutputResolver
  readonly createStorageClient?: StorageClientFactory
  readonly signal?: AbortSignal
}

export const providerLog: ProviderLog = {
  info: (m: string): void => { logger.info(m) },
  warn: (m: string): void => { logger.warn(m) },
  error: (m: string): void => { logger.error(m) },
  success: (m: string): void => { logger.success(m) },
  note: (m: string): void => { logger.note(m) }
}

export function applyOutputMode(opts: { readonly json?: boolean; readonly ndjson?: boolean }): boolean {
  if (opts.ndjson === true) logger.setNdjson(true)
  else if (opts.json === true) logger.setJsonOnly(true)
  return logger.isJsonOnly()
}

function resolverFor(cfg: ResolvedConfig, env: NodeJS.ProcessEnv): OutputResolver {
  if (cfg.outputsFile !== undefined) {
    return new FileOutputResolver(cfg.outputsFile, cfg.outputsTimeoutMs !== undefined ? { timeoutMs: cfg.outputsTimeoutMs } : undefined)
  }
  return new EnvOutputResolver(env)
}

/** Load config, run one deployment and print its summary. */
export async function runDeploy(opts: DeployCommandOptions, rt: DeployRuntime): Promise<DeploySummary> {
  const started: number = Date.now()
  const machine: boolean = applyOutputMode(opts)
  new EnvLoader(rt.cwd).load(rt.env)
  logger.setRedactors(await computeRedactors({ cwd: rt.cwd, env: rt.env }))
  let result: DeploySummary
  try {
    const cfg = await loadConfig({ cwd: rt.cwd, flags: opts, env: rt.env })
    if (cfg.source !== undefined) logger.debug(`Using config ${cfg.source}`)
    const reporter = new ProgressReporter(progressSinksFor({ machine, ndjson: logger.isNdjson() }))
    const orchestrator = new DeploymentOrchestrator(cfg.target, {
      runner: rt.runner ?? new NodeProcessRunner(),
      resolver: rt.resolver ?? resolverFor(cfg, rt.env),
      createStorageClient: rt.createStorageClient ?? azureStorageClientFactory(),
      log: providerLog
    }, reporter)
    const outcome = await orchestrator.deploy(rt.signal !== undefined ? { signal: rt.signal } : undefined)
    result = outcome.ok
      ? summary({ ok: true, action: 'deploy', endpoint: outcome.endpoint, message: outcome.summary, durationMs: Date.now() - started })
      : summary({ ok: false, action: 'deploy', error: toErrorInfo(outcome.error), durationMs: Date.now() - started })
  } catch (e) {
    result = summary({ ok: false, action: 'deploy', error: toErrorInfo(e), durationMs: Date.now() - started })
  }
  printSummary(result)
  return result
}

/** Aborts the run on the first Ctrl+C; a second one exits immediately. */
function interruptSignal(): { readonly signal: AbortSignal; readonly dispose: () => void } {
  const ac = new AbortController()
  const onInt = (): void => {
    if (ac.signal.aborted) process.exit(130)
    ac.abort(new Error('interrupted'))
  }
  process.on('SIGINT', onInt)
  return { signal: ac.signal, dispose: (): void => { process.off('SIGINT', onInt) } }
}

export function registerDeployCommand(program: Command): void {
  program
    .command('deploy')
    .description('Build the static site and publish it to storage static website hosting')
    .option('--path <dir>', 'Path to the static site project')
    .option('--config <file>', 'Config file (default: staticdeploy.config.json)')
    .option('--outputs-file <file>', 'Read provisioning outputs from a JSON file instead of the environment')
    .option('--concurrency <n>', 'Maximum uploads in flight (default: unbounded)')
    .option('--json', 'Output JSON summary only')
    .option('--ndjson', 'Stream progress events as NDJSON')
    .action(async (opts: DeployCommandOptions): Promise<void> => {
      const interrupt = interruptSignal()
      try {
        const result = await runDeploy(opts, { cwd: process.cwd(), env: process.env, signal: interrupt.signal })
        if (!result.ok) process.exitCode = 1
      } finally {
        interrupt.dispose()
      }
    })
}
