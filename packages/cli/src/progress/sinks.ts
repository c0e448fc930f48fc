import type { ProgressEvent, ProgressSink } from '@staticdeploy/core'
import { logger } from '../utils/logger'
import { spinner, type Spinner } from '../utils/ui'

/** Renders progress for a person: a spinner per running task, a line per result. */
export class HumanProgressSink implements ProgressSink {
  private readonly running = new Map<string, Spinner>()

  public onEvent(e: ProgressEvent): void {
    switch (e.type) {
      case 'step-created':
        logger.section(e.stepName)
        return
      case 'task-created':
        this.running.get(e.taskId)?.stop()
        this.running.set(e.taskId, spinner(e.taskName))
        logger.debug(`${e.taskName}...`)
        return
      case 'task-completed':
      case 'task-failed': {
        this.running.get(e.taskId)?.stop()
        this.running.delete(e.taskId)
        const text: string = e.message ?? e.taskName
        if (e.type === 'task-completed') logger.success(text)
        else logger.error(text)
        return
      }
      case 'step-completed':
        logger.success(e.message ?? `${e.stepName} completed`)
        return
      case 'step-failed':
        logger.error(e.message ?? `${e.stepName} failed`)
        return
      case 'publish-completed':
        if (e.ok) logger.success(e.message)
        else logger.warn(e.message)
        return
    }
  }
}

/** One JSON object per event on stdout. */
export class NdjsonProgressSink implements ProgressSink {
  public onEvent(e: ProgressEvent): void {
    logger.json({ event: e.type, ...e })
  }
}

/** NDJSON streams every event; plain JSON prints only the final summary. */
export function progressSinksFor(mode: { readonly machine: boolean; readonly ndjson: boolean }): ProgressSink[] {
  if (mode.ndjson) return [new NdjsonProgressSink()]
  return mode.machine ? [] : [new HumanProgressSink()]
}
