/**
 * Step/task progress reporter.
 *
 * A reporter tracks the currently open steps. Each step owns an ordered list
 * of tasks; every state transition is pushed to the registered sinks and
 * listeners as a {@link ProgressEvent}. Handles are scoped: `release()` drops
 * them from the open set but never forces a terminal state, so callers must
 * `complete`/`fail` before the scope ends.
 */
import { publishEvt, stepEvt, taskEvt } from '../events/emit'
import type { ProgressEvent, ProgressSink, ProgressState } from '../events/types'

export type ProgressListener = (event: ProgressEvent) => void

/** Raised when a handle is used outside its contract (e.g. a task on a finished step). */
export class PipelineStateError extends Error {
  public constructor(message: string) {
    super(message)
    this.name = 'PipelineStateError'
  }
}

interface Notifier {
  emit(event: ProgressEvent): void
  nextId(prefix: string): string
  releaseStep(step: StepHandle): void
}

function isTerminal(state: ProgressState): boolean {
  return state === 'completed' || state === 'failed'
}

export class TaskHandle {
  public readonly id: string
  public readonly name: string
  /** Owning step (back-reference). */
  public readonly step: StepHandle
  private current: ProgressState = 'running'
  private text: string | undefined
  private released = false

  public constructor(step: StepHandle, id: string, name: string, private readonly notifier: Notifier) {
    this.step = step
    this.id = id
    this.name = name
  }

  public get state(): ProgressState { return this.current }
  public get message(): string | undefined { return this.text }
  public get isReleased(): boolean { return this.released }

  /** Mark Completed. Calling again after a terminal state is last-write-wins. */
  public complete(message: string): void {
    this.finish('completed', message)
  }

  /** Mark Failed; the owning step fails with the same message. */
  public fail(message: string): void {
    this.finish('failed', message)
    this.step.onTaskFailed(this)
  }

  public release(): void {
    if (this.released) return
    this.released = true
  }

  private finish(state: ProgressState, message: string): void {
    this.current = state
    this.text = message
    this.notifier.emit(taskEvt({
      type: state === 'completed' ? 'task-completed' : 'task-failed',
      stepId: this.step.id,
      stepName: this.step.name,
      taskId: this.id,
      taskName: this.name,
      state,
      message
    }))
  }
}

export class StepHandle {
  public readonly id: string
  public readonly name: string
  private current: ProgressState = 'running'
  private text: string | undefined
  private released = false
  private readonly children: TaskHandle[] = []

  public constructor(id: string, name: string, private readonly notifier: Notifier) {
    this.id = id
    this.name = name
  }

  public get state(): ProgressState { return this.current }
  public get message(): string | undefined { return this.text }
  public get isReleased(): boolean { return this.released }
  public get tasks(): readonly TaskHandle[] { return this.children }

  /** Allocate the next task. Rejected once the step is terminal or released. */
  public createTask(name: string): TaskHandle {
    if (this.released) throw new PipelineStateError(`Step "${this.name}" was released; cannot create task "${name}"`)
    if (isTerminal(this.current)) throw new PipelineStateError(`Step "${this.name}" is ${this.current}; cannot create task "${name}"`)
    const task = new TaskHandle(this, this.notifier.nextId('task'), name, this.notifier)
    this.children.push(task)
    this.notifier.emit(taskEvt({ type: 'task-created', stepId: this.id, stepName: this.name, taskId: task.id, taskName: name, state: task.state }))
    return task
  }

  /** Mark Completed. Only legal once every task has completed. */
  public complete(message: string): void {
    const pending = this.children.find((t) => t.state !== 'completed')
    if (pending) throw new PipelineStateError(`Step "${this.name}" cannot complete: task "${pending.name}" is ${pending.state}`)
    this.finish('completed', message)
  }

  /** Mark Failed. On an already failed step only the message changes; no second event is sent. */
  public fail(message: string): void {
    if (this.current === 'failed') {
      this.text = message
      return
    }
    this.finish('failed', message)
  }

  public release(): void {
    if (this.released) return
    this.released = true
    for (const t of this.children) t.release()
    this.notifier.releaseStep(this)
  }

  /** @internal */
  public onTaskFailed(task: TaskHandle): void {
    if (this.current === 'failed') return
    this.finish('failed', task.message ?? `Task "${task.name}" failed`)
  }

  private finish(state: ProgressState, message: string): void {
    this.current = state
    this.text = message
    this.notifier.emit(stepEvt({ type: state === 'completed' ? 'step-completed' : 'step-failed', stepId: this.id, stepName: this.name, state, message }))
  }
}

export class ProgressReporter {
  private readonly sinks: ProgressSink[]
  private readonly listeners: Set<ProgressListener> = new Set()
  private readonly open: Map<string, StepHandle> = new Map()
  private seq = 0
  private readonly notifier: Notifier

  public constructor(sinks: readonly ProgressSink[] = []) {
    this.sinks = [...sinks]
    this.notifier = {
      emit: (e) => { this.emit(e) },
      nextId: (prefix) => `${prefix}-${++this.seq}`,
      releaseStep: (step) => { this.open.delete(step.id) }
    }
  }

  public addSink(sink: ProgressSink): void {
    this.sinks.push(sink)
  }

  /** Listen to every event; returns an unsubscribe function. */
  public subscribe(listener: ProgressListener): () => void {
    this.listeners.add(listener)
    return (): void => { this.listeners.delete(listener) }
  }

  public createStep(name: string): StepHandle {
    const step = new StepHandle(this.notifier.nextId('step'), name, this.notifier)
    this.open.set(step.id, step)
    this.emit(stepEvt({ type: 'step-created', stepId: step.id, stepName: name, state: step.state }))
    return step
  }

  /** Final user-facing outcome of a publish/deploy run. */
  public completePublish(message: string, ok = true): void {
    this.emit(publishEvt({ ok, message }))
  }

  public openSteps(): readonly StepHandle[] {
    return [...this.open.values()]
  }

  private emit(event: ProgressEvent): void {
    for (const s of this.sinks) {
      try { s.onEvent(event) } catch { /* sink failure ignored */ }
    }
    for (const l of this.listeners) {
      try { l(event) } catch { /* listener failure ignored */ }
    }
  }
}

/** Run `body` inside a step scope; the step is released on every exit path. */
export async function withStep<T>(reporter: ProgressReporter, name: string, body: (step: StepHandle) => Promise<T>): Promise<T> {
  const step = reporter.createStep(name)
  try {
    return await body(step)
  } finally {
    step.release()
  }
}

/** Run `body` inside a task scope; the task is released on every exit path. */
export async function withTask<T>(step: StepHandle, name: string, body: (task: TaskHandle) => Promise<T>): Promise<T> {
  const task = step.createTask(name)
  try {
    return await body(task)
  } finally {
    task.release()
  }
}
