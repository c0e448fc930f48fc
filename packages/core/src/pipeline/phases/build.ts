import { raceAbort } from '../../abort'
import { DeployError } from '../../errors'
import { splitCommand } from '../../process/runner'
import { withTask } from '../../progress/reporter'
import { isDirectory } from '../../utils/fs'
import { failOrRethrow, failTask, succeeded } from '../result'
import type { PhaseContext, PhaseResult } from '../types'

/**
 * Phase 1: install dependencies and build the site in its project directory.
 * Commands run in order; the first non-zero exit fails the task.
 */
export async function tryBuildStaticSite(ctx: PhaseContext): Promise<PhaseResult> {
  return await withTask(ctx.step, 'Building static site', async (task) => {
    try {
      const sitePath: string = ctx.target.sitePath
      if (!(await isDirectory(sitePath))) {
        return failTask(task, new DeployError('NotFound', `Static site directory not found: ${sitePath}`))
      }
      for (const cmd of [ctx.target.installCommand, ctx.target.buildCommand]) {
        ctx.log.info(`Running ${cmd} in ${sitePath}`)
        const { bin, args } = splitCommand(cmd)
        const res = await raceAbort(ctx.deps.runner.exec(bin, args, {
          cwd: sitePath,
          signal: ctx.signal,
          timeoutMs: ctx.target.commandTimeoutMs,
          redactors: ctx.deps.redactors
        }), ctx.signal)
        if (res.code !== 0) {
          const stderr: string = res.stderr.trim()
          return failTask(task, new DeployError('ExternalProcessFailure', `${cmd} failed with exit code ${res.code ?? 'unknown'}: ${stderr}`, { exitCode: res.code }))
        }
      }
      task.complete('Successfully built static site')
      return succeeded(undefined)
    } catch (e) {
      return failOrRethrow(task, 'Build failed', e, 'ExternalProcessFailure')
    }
  })
}
