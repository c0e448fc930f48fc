import { readFile, stat } from 'node:fs/promises'

interface FSX {
  readonly exists: (path: string) => Promise<boolean>
  readonly readJson: (path: string) => Promise<unknown>
}

async function exists(path: string): Promise<boolean> {
  try { const s = await stat(path); return s.isFile() || s.isDirectory() } catch { return false }
}

/** Parsed JSON; read and parse errors propagate. */
async function readJson(path: string): Promise<unknown> {
  const buf = await readFile(path, 'utf8')
  const parsed: unknown = JSON.parse(buf)
  return parsed
}

export const fsx: FSX = { exists, readJson }
