import { DeployError } from './errors'

function cancelled(signal: AbortSignal): DeployError {
  const reason: unknown = signal.reason
  const detail: string = reason instanceof Error ? reason.message : (typeof reason === 'string' ? reason : '')
  return new DeployError('Cancelled', detail ? `Operation cancelled: ${detail}` : 'Operation cancelled', { cause: reason })
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw cancelled(signal)
}

/**
 * Await `p` but reject as soon as `signal` aborts.
 * The underlying operation is not stopped; its late result is dropped.
 */
export function raceAbort<T>(p: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return p
  if (signal.aborted) {
    p.catch(() => { /* settled after cancellation */ })
    return Promise.reject(cancelled(signal))
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => { reject(cancelled(signal)) }
    signal.addEventListener('abort', onAbort, { once: true })
    p.then(
      (v) => { signal.removeEventListener('abort', onAbort); resolve(v) },
      (e: unknown) => { signal.removeEventListener('abort', onAbort); reject(e) }
    )
  })
}

/**
 * One abort listener shared by many awaits. `race` rejects as soon as
 * `signal` aborts; `dispose` removes the listener.
 */
export interface AbortGate {
  readonly race: <T>(p: Promise<T>) => Promise<T>
  readonly dispose: () => void
}

export function abortGate(signal?: AbortSignal): AbortGate {
  if (!signal) return { race: (p) => p, dispose: (): void => {} }
  let onAbort = (): void => {}
  const aborted = new Promise<never>((_resolve, reject) => {
    onAbort = (): void => { reject(cancelled(signal)) }
  })
  aborted.catch(() => { /* observed through race */ })
  if (signal.aborted) onAbort()
  else signal.addEventListener('abort', onAbort, { once: true })
  return {
    race: <T>(p: Promise<T>): Promise<T> => Promise.race([p, aborted]),
    dispose: (): void => { signal.removeEventListener('abort', onAbort) }
  }
}

/** Resolve after `ms`, or reject early when `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) { reject(cancelled(signal)); return }
    const t: NodeJS.Timeout = setTimeout(() => { signal?.removeEventListener('abort', onAbort); resolve() }, ms)
    const onAbort = (): void => { clearTimeout(t); if (signal) reject(cancelled(signal)) }
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}
