import type { ErrorInfo } from '../errors'
import type { DeploySummary, ProgressState, PublishEvent, StepEvent, TaskEvent } from './types'

export function stepEvt(args: {
  readonly type: StepEvent['type']
  readonly stepId: string
  readonly stepName: string
  readonly state: ProgressState
  readonly message?: string
}): StepEvent {
  return { ...args, timestamp: new Date().toISOString() }
}

export function taskEvt(args: {
  readonly type: TaskEvent['type']
  readonly stepId: string
  readonly stepName: string
  readonly taskId: string
  readonly taskName: string
  readonly state: ProgressState
  readonly message?: string
}): TaskEvent {
  return { ...args, timestamp: new Date().toISOString() }
}

export function publishEvt(args: { readonly ok: boolean; readonly message: string }): PublishEvent {
  return { type: 'publish-completed', ...args, timestamp: new Date().toISOString() }
}

export function summary(args: {
  readonly ok: boolean
  readonly action: DeploySummary['action']
  readonly endpoint?: string
  readonly message?: string
  readonly error?: ErrorInfo
  readonly durationMs?: number
}): DeploySummary {
  return { ...args, final: true }
}
