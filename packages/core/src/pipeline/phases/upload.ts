import { join } from 'node:path'
import { raceAbort } from '../../abort'
import { getContentType } from '../../content-type'
import type { StorageClient } from '../../contracts/capabilities'
import { DeployError } from '../../errors'
import { withTask } from '../../progress/reporter'
import { isDirectory, listFiles, toBlobName } from '../../utils/fs'
import { fanOut } from '../fan-out'
import { failOrRethrow, failTask, succeeded } from '../result'
import type { PhaseContext, PhaseResult } from '../types'

/**
 * Phase 3: upload every file of the build output to the website container.
 * Uploads start together and are joined; a failure leaves whatever already
 * landed in the container.
 */
export async function tryUploadStaticFiles(ctx: PhaseContext, client: StorageClient): Promise<PhaseResult<number>> {
  return await withTask(ctx.step, 'Uploading static files to storage', async (task) => {
    try {
      const container: string = ctx.target.container
      await raceAbort(client.createContainerIfNotExists(container, { signal: ctx.signal }), ctx.signal)

      const distPath: string = join(ctx.target.sitePath, ctx.target.outputDir)
      if (!(await isDirectory(distPath))) {
        return failTask(task, new DeployError('NotFound', `Build output directory not found: ${distPath}`))
      }

      const files: readonly string[] = await listFiles(distPath)
      ctx.log.info(`Uploading ${files.length} files to static website`)
      await fanOut(files, (file) => client.uploadBlob({
        container,
        blobName: toBlobName(distPath, file),
        filePath: file,
        contentType: getContentType(file)
      }, { signal: ctx.signal }), {
        signal: ctx.signal,
        concurrency: ctx.target.uploadConcurrency,
        label: (file) => toBlobName(distPath, file),
        noun: 'uploads'
      })

      task.complete(`Successfully uploaded ${files.length} files to static website`)
      return succeeded(files.length)
    } catch (e) {
      return failOrRethrow(task, 'Failed to upload files', e, 'RemoteOperationFailure')
    }
  })
}
