import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { parse } from 'dotenv'
import { escapeRegExp } from './logger'
import { fsx } from './fs'

/** Keys whose values are never secrets; skipped even when long enough. */
function isPublicKey(k: string): boolean {
  return k.startsWith('PUBLIC_') || k.startsWith('STATICDEPLOY_OUTPUT_') || k.startsWith('VITE_')
}

export function valueToPatterns(val: string): RegExp[] {
  const patterns: RegExp[] = []
  if (val.length < 4) return patterns
  const trivial = new Set(['true', 'false', 'null', 'undefined', 'on', 'off', 'yes', 'no'])
  if (trivial.has(val.toLowerCase())) return patterns
  patterns.push(new RegExp(escapeRegExp(val), 'g'))
  const b64 = Buffer.from(val, 'utf8').toString('base64')
  if (b64.length >= 8) patterns.push(new RegExp(escapeRegExp(b64), 'g'))
  const enc = encodeURIComponent(val)
  if (enc.length >= 8 && enc !== val) patterns.push(new RegExp(escapeRegExp(enc), 'g'))
  return patterns
}

/** Storage credentials that show up in SDK errors and command output. */
export const DEFAULT_REDACTORS: readonly RegExp[] = [
  // connection string account key
  /AccountKey=[A-Za-z0-9+/=]{20,}/g,
  // SAS signature
  /([?&]sig=)[A-Za-z0-9%+/=]{10,}/g,
  /SharedAccessSignature=[^;\s]+/g,
  // bearer tokens
  /eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g
]

/** Variables whose values are always treated as secrets when set. */
const SECRET_ENV_KEYS: readonly string[] = [
  'AZURE_CLIENT_SECRET',
  'AZURE_STORAGE_KEY',
  'AZURE_STORAGE_CONNECTION_STRING',
  'AZURE_STORAGE_SAS_TOKEN'
]

export async function computeRedactors(args: {
  readonly cwd: string
  readonly envFiles?: readonly string[]
  readonly env?: Readonly<Record<string, string | undefined>>
}): Promise<RegExp[]> {
  const patterns: RegExp[] = []
  const files: readonly string[] = args.envFiles && args.envFiles.length > 0 ? args.envFiles : ['.env', '.env.local']
  for (const name of files) {
    const p = join(args.cwd, name)
    if (!(await fsx.exists(p))) continue
    try {
      const kv = parse(await readFile(p, 'utf8'))
      for (const [k, v] of Object.entries(kv)) {
        if (!k || isPublicKey(k)) continue
        for (const re of valueToPatterns(v)) patterns.push(re)
      }
    } catch { /* ignore unreadable env file */ }
  }
  const env = args.env ?? process.env
  for (const k of SECRET_ENV_KEYS) {
    const v = env[k]
    if (typeof v === 'string') for (const re of valueToPatterns(v)) patterns.push(re)
  }
  for (const d of DEFAULT_REDACTORS) patterns.push(d)
  return patterns
}
