export type LogLevel = 'error' | 'warn' | 'info' | 'debug'
export type ColorMode = 'auto' | 'always' | 'never'
type Paint = 'red' | 'yellow' | 'cyan' | 'green' | 'blue' | 'dim' | 'bold'

// [open, close] SGR codes; cyan is the bright variant
const SGR: Readonly<Record<Paint, readonly [string, string]>> = {
  red: ['31', '39'],
  yellow: ['33', '39'],
  cyan: ['96', '39'],
  green: ['32', '39'],
  blue: ['34', '39'],
  dim: ['2', '22'],
  bold: ['1', '22']
}

let colorMode: ColorMode = 'auto'

export function setColorMode(m: ColorMode): void { colorMode = m }

export function isColorMode(v: string): v is ColorMode {
  return v === 'auto' || v === 'always' || v === 'never'
}

function colorOn(): boolean {
  if (colorMode !== 'auto') return colorMode === 'always'
  if (process.env.NO_COLOR !== undefined || process.env.FORCE_COLOR === '0') return false
  return Boolean(process.stdout && process.stdout.isTTY)
}

function colorize(kind: Paint, s: string): string {
  if (!colorOn()) return s
  const [open, close] = SGR[kind]
  return `\u001b[${open}m${s}\u001b[${close}m`
}

interface Logger {
  readonly info: (msg: string) => void
  readonly warn: (msg: string) => void
  readonly error: (msg: string) => void
  readonly debug: (msg: string) => void
  readonly success: (msg: string) => void
  readonly note: (msg: string) => void
  readonly section: (title: string) => void
  readonly bold: (msg: string) => string
  readonly json: (val: unknown) => void
  readonly setLevel: (lvl: LogLevel) => void
  readonly setJsonOnly: (on: boolean) => void
  readonly setNoEmoji: (on: boolean) => void
  readonly setNdjson: (on: boolean) => void
  readonly setTimestamps: (on: boolean) => void
  readonly setRedactors: (patterns: readonly (string | RegExp)[]) => void
  readonly isJsonOnly: () => boolean
  readonly isNdjson: () => boolean
}

let level: LogLevel = 'info'
let jsonOnly = false
let noEmoji = false
let ndjson = false
let timestampsOn = false
let redactors: RegExp[] = []

const RANK: Readonly<Record<LogLevel, number>> = { error: 0, warn: 1, info: 2, debug: 3 }

function enabled(kind: LogLevel): boolean {
  return RANK[kind] <= RANK[level]
}

function applyRedaction(msg: string): string {
  if (redactors.length === 0) return msg
  let out = msg
  for (const r of redactors) out = out.replace(r, '******')
  return out
}

function write(kind: LogLevel, msg: string): void {
  if (jsonOnly || !enabled(kind)) return
  const prefix: string = noEmoji
    ? (kind === 'error' ? '[error]' : kind === 'warn' ? '[warn]' : kind === 'info' ? '[info]' : '[debug]')
    : (kind === 'error' ? '✖' : kind === 'warn' ? '⚠' : kind === 'info' ? 'ℹ' : '•')
  const ts: string = timestampsOn ? `${new Date().toISOString()} ` : ''
  const redacted: string = applyRedaction(msg)
  // leave already-colored text alone
  const hasAnsi: boolean = redacted.includes('\u001b[')
  const colored: string = hasAnsi ? redacted : (kind === 'error'
    ? colorize('red', redacted)
    : kind === 'warn'
      ? colorize('yellow', redacted)
      : kind === 'info'
        ? colorize('cyan', redacted)
        : colorize('dim', redacted))
  // eslint-disable-next-line no-console
  console[kind === 'error' ? 'error' : 'log'](`${ts}${prefix} ${colored}`)
}

function enrichJson(val: unknown): unknown {
  if (!timestampsOn) return val
  if (val !== null && typeof val === 'object' && !Array.isArray(val)) {
    const obj: Record<string, unknown> = { ...val }
    if (obj.ts === undefined) obj.ts = new Date().toISOString()
    return obj
  }
  return val
}

export const logger: Logger = {
  info: (msg: string): void => { write('info', msg) },
  warn: (msg: string): void => { write('warn', msg) },
  error: (msg: string): void => { write('error', msg) },
  debug: (msg: string): void => { write('debug', msg) },
  success: (msg: string): void => { write('info', colorize('green', `${noEmoji ? '[ok]' : '✓'} ${msg}`)) },
  note: (msg: string): void => { write('info', colorize('blue', `${noEmoji ? '[note]' : '✱'} ${msg}`)) },
  section: (title: string): void => {
    if (jsonOnly || !enabled('info')) return
    const bar = '─'.repeat(Math.max(12, Math.min(60, title.length + 10)))
    // eslint-disable-next-line no-console
    console.log(`${colorize('cyan', bar)}\n${colorize('bold', title)}\n${colorize('cyan', bar)}`)
  },
  bold: (msg: string): string => colorize('bold', msg),
  json: (val: unknown): void => {
    const v = enrichJson(val)
    const line: string = ndjson ? JSON.stringify(v) : JSON.stringify(v, null, 2)
    // eslint-disable-next-line no-console
    console.log(applyRedaction(line))
  },
  setLevel: (lvl: LogLevel): void => { level = lvl },
  setJsonOnly: (on: boolean): void => { jsonOnly = on },
  setNoEmoji: (on: boolean): void => { noEmoji = on },
  setNdjson: (on: boolean): void => { ndjson = on; if (on) jsonOnly = true },
  setTimestamps: (on: boolean): void => { timestampsOn = on },
  setRedactors: (patterns: readonly (string | RegExp)[]): void => {
    redactors = patterns.map((p) => p instanceof RegExp ? p : new RegExp(escapeRegExp(p), 'g'))
  },
  isJsonOnly: (): boolean => jsonOnly,
  isNdjson: (): boolean => ndjson
}

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}
