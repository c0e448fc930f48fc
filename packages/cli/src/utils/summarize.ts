import type { DeploySummary } from '@staticdeploy/core'
import { logger } from './logger'

/** Print the final result: one JSON object in machine modes, otherwise the outcome and remedy. */
export function printSummary(s: DeploySummary): void {
  if (logger.isJsonOnly()) {
    logger.json(s)
    return
  }
  const secs: string = s.durationMs !== undefined ? ` (${(s.durationMs / 1000).toFixed(1)}s)` : ''
  if (s.ok) {
    logger.success(`Deployed${secs}`)
    if (s.endpoint) logger.info(`URL: ${logger.bold(s.endpoint)}`)
    return
  }
  if (s.error) {
    logger.error(`${s.error.code}: ${s.error.message}`)
    if (s.error.remedy) logger.note(s.error.remedy)
  }
}
