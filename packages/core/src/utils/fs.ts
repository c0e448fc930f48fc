import { readdir, stat } from 'node:fs/promises'
import { join, relative, sep, type PlatformPath } from 'node:path'

export async function isDirectory(path: string): Promise<boolean> {
  try { const s = await stat(path); return s.isDirectory() } catch { return false }
}

/** All regular files under `root`, recursively, sorted for stable output. */
export async function listFiles(root: string): Promise<readonly string[]> {
  const out: string[] = []
  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true })
    for (const e of entries) {
      const full: string = join(dir, e.name)
      if (e.isDirectory()) await walk(full)
      else if (e.isFile()) out.push(full)
    }
  }
  await walk(root)
  return out.sort()
}

/** Blob name for `file` under `root`: relative path with forward slashes. */
export function toBlobName(root: string, file: string, paths: Pick<PlatformPath, 'relative' | 'sep'> = { relative, sep }): string {
  return paths.relative(root, file).split(paths.sep).join('/')
}
