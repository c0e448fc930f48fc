import { raceAbort } from '../abort'
import type { OutputRef, OutputResolver } from '../contracts/capabilities'
import { DeployError, errorMessage, isDeployError } from '../errors'
import type { PhaseResult } from '../pipeline/types'

/**
 * Resolve an output into a phase result; never rejects.
 * Empty values and resolver errors become `DependencyUnresolved`; cancellation
 * keeps its own kind so callers can re-throw it.
 */
export async function resolveOutput(resolver: OutputResolver, ref: OutputRef, signal?: AbortSignal): Promise<PhaseResult<string>> {
  const what = `${ref.resource}.${ref.key}`
  try {
    const value: string = await raceAbort(resolver.getOutputValue(ref.resource, ref.key, { signal }), signal)
    if (value.trim().length === 0) {
      return { ok: false, error: new DeployError('DependencyUnresolved', `Output ${what} is empty`) }
    }
    return { ok: true, value: value.trim() }
  } catch (e) {
    if (isDeployError(e) && (e.kind === 'Cancelled' || e.kind === 'DependencyUnresolved')) return { ok: false, error: e }
    if (e instanceof Error && e.name === 'AbortError') return { ok: false, error: new DeployError('Cancelled', errorMessage(e), { cause: e }) }
    return { ok: false, error: new DeployError('DependencyUnresolved', `Failed to resolve output ${what}: ${errorMessage(e)}`, { cause: e }) }
  }
}
