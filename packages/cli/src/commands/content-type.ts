import type { Command } from 'commander'
import { getContentType, knownContentTypes } from '@staticdeploy/core'
import { logger } from '../utils/logger'

export interface ContentTypeRow {
  readonly file: string
  readonly contentType: string
}

export function contentTypesFor(files: readonly string[]): ContentTypeRow[] {
  return files.map((file) => ({ file, contentType: getContentType(file) }))
}

/** Every known extension with its content type. */
export function contentTypeTable(): ContentTypeRow[] {
  return knownContentTypes().map(([ext, contentType]) => ({ file: ext, contentType }))
}

export function registerContentTypeCommand(program: Command): void {
  program
    .command('content-type')
    .description('Print the Content-Type each file would be uploaded with')
    .argument('[files...]', 'File paths')
    .option('--list', 'Print the whole extension table')
    .option('--json', 'Output JSON')
    .action((files: string[], opts: { readonly list?: boolean; readonly json?: boolean }): void => {
      if (opts.list !== true && files.length === 0) {
        logger.error('Pass at least one file, or --list')
        process.exitCode = 1
        return
      }
      const rows = opts.list === true ? contentTypeTable() : contentTypesFor(files)
      if (opts.json === true || logger.isJsonOnly()) {
        logger.json({ ok: true, rows, final: true })
        return
      }
      const width: number = Math.max(...rows.map((r) => r.file.length))
      // eslint-disable-next-line no-console
      for (const r of rows) console.log(`${r.file.padEnd(width)}  ${r.contentType}`)
    })
}
