import { logger } from './logger'

/**
 * Minimal TTY spinner with safe fallbacks.
 * Auto-disables under JSON/NDJSON or when stdout is not a TTY.
 */
export interface Spinner {
  /** Clear the spinner line. */
  readonly stop: () => void
}

function canSpin(): boolean {
  if (logger.isJsonOnly()) return false
  return Boolean(process.stdout && process.stdout.isTTY)
}

const FRAMES: readonly string[] = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']

export function spinner(label: string): Spinner {
  if (!canSpin()) return { stop: (): void => {} }
  let i = 0
  const tick = (): void => {
    const frame = FRAMES[i = (i + 1) % FRAMES.length]
    process.stdout.write(`\r${frame} ${label}`)
  }
  const timer: NodeJS.Timeout = setInterval(tick, 120)
  tick()
  return {
    stop: (): void => {
      clearInterval(timer)
      process.stdout.write('\r\u001b[2K')
    }
  }
}
