import { raceAbort } from '../../abort'
import type { ServicePropertiesShape, StorageClient } from '../../contracts/capabilities'
import { withTask } from '../../progress/reporter'
import { failOrRethrow, succeeded } from '../result'
import type { PhaseContext, PhaseResult } from '../types'

/** Replace only the static-website settings; every other property is kept as read. */
export function withStaticWebsite<P extends ServicePropertiesShape>(props: P, indexDocument: string, errorDocument404Path: string): P {
  return { ...props, staticWebsite: { enabled: true, indexDocument, errorDocument404Path } }
}

/**
 * Phase 2: wait for the storage endpoint, then enable static website hosting
 * with a read-modify-write of the service properties.
 * Hands the storage client on to the upload phase.
 */
export async function tryConfigureStaticWebsite(ctx: PhaseContext, endpoint: Promise<PhaseResult<string>>): Promise<PhaseResult<StorageClient>> {
  return await withTask(ctx.step, 'Configuring static website service', async (task) => {
    try {
      const resolved = await raceAbort(endpoint, ctx.signal)
      if (!resolved.ok) throw resolved.error
      const client: StorageClient = ctx.deps.createStorageClient(resolved.value)
      const current = await raceAbort(client.getServiceProperties({ signal: ctx.signal }), ctx.signal)
      const next = withStaticWebsite(current, ctx.target.indexDocument, ctx.target.errorDocument404Path)
      await raceAbort(client.setServiceProperties(next, { signal: ctx.signal }), ctx.signal)
      task.complete('Successfully configured static website service')
      return succeeded(client)
    } catch (e) {
      return failOrRethrow(task, 'Failed to configure static website', e, 'RemoteOperationFailure')
    }
  })
}
