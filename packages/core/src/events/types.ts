/**
 * Progress event types streamed to sinks (human renderer, NDJSON, tests)
 * and the final deployment summary.
 */
import type { ErrorInfo } from '../errors'

export type ProgressState = 'pending' | 'running' | 'completed' | 'failed'

export type ProgressEventType =
  | 'step-created'
  | 'step-completed'
  | 'step-failed'
  | 'task-created'
  | 'task-completed'
  | 'task-failed'
  | 'publish-completed'

interface ProgressEventBase {
  readonly stepId?: string
  readonly stepName?: string
  readonly message?: string
  readonly timestamp: string // ISO
}

export interface StepEvent extends ProgressEventBase {
  readonly type: 'step-created' | 'step-completed' | 'step-failed'
  readonly stepId: string
  readonly stepName: string
  readonly state: ProgressState
}

export interface TaskEvent extends ProgressEventBase {
  readonly type: 'task-created' | 'task-completed' | 'task-failed'
  readonly stepId: string
  readonly stepName: string
  readonly taskId: string
  readonly taskName: string
  readonly state: ProgressState
}

export interface PublishEvent extends ProgressEventBase {
  readonly type: 'publish-completed'
  readonly ok: boolean
  readonly message: string
}

/** Event pushed to every sink on each state transition. */
export type ProgressEvent = StepEvent | TaskEvent | PublishEvent

/** Consumer side of progress notifications. */
export interface ProgressSink {
  onEvent(event: ProgressEvent): void
}

/** Final JSON summary (one per command). */
export interface DeploySummary {
  readonly ok: boolean
  readonly action: 'deploy' | 'plan'
  readonly endpoint?: string
  readonly message?: string
  readonly error?: ErrorInfo
  readonly durationMs?: number
  readonly final: true
}
