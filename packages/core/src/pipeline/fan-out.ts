import { abortGate } from '../abort'
import { DeployError, errorMessage, isCancellation, type FailureDetail } from '../errors'
import { mapLimit } from '../utils/concurrency'

export interface FanOutOptions<T> {
  readonly signal?: AbortSignal
  /** Max in-flight operations; all start at once when absent. */
  readonly concurrency?: number
  /** Name of an item in failure details. */
  readonly label?: (item: T) => string
  /** Noun for the aggregate message, e.g. "uploads". */
  readonly noun?: string
}

/**
 * Start one operation per item and join on all of them.
 *
 * Rejects as soon as the first failure is observed. Operations already in
 * flight keep running, but their results are dropped. Failures are surfaced
 * as one `AggregateUploadFailure` carrying every failure seen by then;
 * cancellation passes through unchanged. One abort listener serves every item.
 */
export async function fanOut<T, R>(items: readonly T[], op: (item: T, index: number) => Promise<R>, opts?: FanOutOptions<T>): Promise<readonly R[]> {
  const failures: FailureDetail[] = []
  const label = opts?.label ?? ((item: T): string => String(item))
  const gate = abortGate(opts?.signal)
  const run = async (item: T, index: number): Promise<R> => {
    try {
      return await gate.race(op(item, index))
    } catch (e) {
      if (!isCancellation(e)) failures.push({ item: label(item), message: errorMessage(e) })
      throw e
    }
  }
  try {
    if (opts?.concurrency !== undefined && opts.concurrency > 0) {
      return await mapLimit(items, opts.concurrency, run)
    }
    return await Promise.all(items.map(run))
  } catch (e) {
    if (isCancellation(e)) throw e
    const noun: string = opts?.noun ?? 'operations'
    const first: FailureDetail | undefined = failures[0]
    const head: string = first ? `${first.item}: ${first.message}` : errorMessage(e)
    throw new DeployError('AggregateUploadFailure', `${failures.length || 1} of ${items.length} ${noun} failed (${head})`, { cause: e, details: [...failures] })
  } finally {
    gate.dispose()
  }
}
