import type { Command } from 'commander'
import { DeploymentOrchestrator, NodeProcessRunner, ProgressReporter, EnvOutputResolver, summary, toErrorInfo, type DeployPlan, type DeploySummary } from '@staticdeploy/core'
import { azureStorageClientFactory } from '@staticdeploy/provider-azure-storage'
import { EnvLoader } from '../config/env'
import { loadConfig, type ConfigFlags } from '../config/load'
import { logger } from '../utils/logger'
import { applyOutputMode } from './deploy'

export interface PlanCommandOptions extends ConfigFlags {
  readonly json?: boolean
}

export type PlanResult =
  | { readonly ok: true; readonly plan: DeployPlan }
  | { readonly ok: false; readonly summary: DeploySummary }

/** Resolve config and describe the run without touching anything. */
export async function runPlan(opts: PlanCommandOptions, rt: { readonly cwd: string; readonly env: NodeJS.ProcessEnv }): Promise<PlanResult> {
  const machine: boolean = applyOutputMode(opts)
  new EnvLoader(rt.cwd).load(rt.env)
  try {
    const cfg = await loadConfig({ cwd: rt.cwd, flags: opts, env: rt.env })
    // collaborators are never called by plan()
    const plan = new DeploymentOrchestrator(cfg.target, {
      runner: new NodeProcessRunner(),
      resolver: new EnvOutputResolver(rt.env),
      createStorageClient: azureStorageClientFactory()
    }, new ProgressReporter()).plan()
    if (machine) {
      logger.json({ ok: true, action: 'plan', plan, final: true })
    } else {
      logger.section('Deployment plan')
      logger.info(`Site:        ${plan.sitePath}`)
      logger.info(`Commands:    ${plan.commands.join(' && ')}`)
      logger.info(`Output:      ${plan.outputPath}`)
      logger.info(`Container:   ${plan.container} (index ${plan.indexDocument}, 404 ${plan.errorDocument404Path})`)
      logger.info(`Storage:     ${plan.storageOutput.resource}.${plan.storageOutput.key}`)
      logger.info(`Endpoint:    ${plan.endpointOutput.resource}.${plan.endpointOutput.key}`)
      logger.info(`Concurrency: ${plan.uploadConcurrency}`)
    }
    return { ok: true, plan }
  } catch (e) {
    const s = summary({ ok: false, action: 'plan', error: toErrorInfo(e) })
    if (machine) logger.json(s)
    else logger.error(s.error?.message ?? 'Plan failed')
    return { ok: false, summary: s }
  }
}

export function registerPlanCommand(program: Command): void {
  program
    .command('plan')
    .description('Show what deploy would do, without running anything')
    .option('--path <dir>', 'Path to the static site project')
    .option('--config <file>', 'Config file (default: staticdeploy.config.json)')
    .option('--concurrency <n>', 'Maximum uploads in flight')
    .option('--json', 'Output JSON')
    .action(async (opts: PlanCommandOptions): Promise<void> => {
      const res = await runPlan(opts, { cwd: process.cwd(), env: process.env })
      if (!res.ok) process.exitCode = 1
    })
}
