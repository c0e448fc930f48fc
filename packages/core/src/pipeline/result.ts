import { DeployError, errorMessage, isCancellation, isDeployError, type DeployErrorKind } from '../errors'
import type { TaskHandle } from '../progress/reporter'
import type { PhaseResult } from './types'

export function succeeded<T>(value: T): PhaseResult<T> {
  return { ok: true, value }
}

/** Fail `task` with the error's message and hand the error back as a phase result. */
export function failTask<T>(task: TaskHandle, error: DeployError): PhaseResult<T> {
  task.fail(error.message)
  return { ok: false, error }
}

/**
 * Report an error caught inside a phase.
 * Cancellation is reported then re-thrown so it reaches the top-level handler;
 * anything else becomes a failed phase result of `kind`.
 */
export function failOrRethrow<T>(task: TaskHandle, prefix: string, e: unknown, kind: DeployErrorKind): PhaseResult<T> {
  const message = `${prefix}: ${errorMessage(e)}`
  if (isCancellation(e)) {
    task.fail(message)
    throw e
  }
  const error: DeployError = isDeployError(e)
    ? new DeployError(e.kind, message, { cause: e, details: e.details, exitCode: e.exitCode })
    : new DeployError(kind, message, { cause: e })
  return failTask(task, error)
}
