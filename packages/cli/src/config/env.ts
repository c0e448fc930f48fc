import { config } from 'dotenv'
import { join } from 'node:path'

/**
 * Loads `.env` then `.env.local` (which wins) into the target environment.
 * Variables already set in the shell are never overwritten.
 */
export class EnvLoader {
  public constructor(private readonly cwd: string = process.cwd()) {}

  public load(env: NodeJS.ProcessEnv = process.env): Readonly<Record<string, string>> {
    const shell: ReadonlySet<string> = new Set(Object.keys(env))
    const merged: Record<string, string> = {}
    for (const name of ['.env', '.env.local']) {
      const res = config({ path: join(this.cwd, name), processEnv: {} })
      if (res.parsed) Object.assign(merged, res.parsed)
    }
    for (const [k, v] of Object.entries(merged)) {
      if (!shell.has(k)) env[k] = v
    }
    return merged
  }
}
