import type { OutputResolver, RemoteCallOptions } from '../contracts/capabilities'
import { throwIfAborted } from '../abort'
import { DeployError } from '../errors'

export const OUTPUT_ENV_PREFIX = 'STATICDEPLOY_OUTPUT_'

/** `deploy-storage` + `blobEndpoint` → `STATICDEPLOY_OUTPUT_DEPLOY_STORAGE_BLOBENDPOINT` */
export function outputEnvName(resource: string, key: string): string {
  const part = (s: string): string => s.toUpperCase().replace(/[^A-Z0-9]+/g, '_')
  return `${OUTPUT_ENV_PREFIX}${part(resource)}_${part(key)}`
}

/** Resolves outputs exported into the environment by the provisioning run. */
export class EnvOutputResolver implements OutputResolver {
  private readonly env: Readonly<Record<string, string | undefined>>

  public constructor(env: Readonly<Record<string, string | undefined>> = process.env) {
    this.env = env
  }

  public async getOutputValue(resource: string, key: string, opts?: RemoteCallOptions): Promise<string> {
    throwIfAborted(opts?.signal)
    const name: string = outputEnvName(resource, key)
    const value: string | undefined = this.env[name]
    if (typeof value !== 'string' || value.trim().length === 0) {
      throw new DeployError('DependencyUnresolved', `Output ${resource}.${key} is not set (expected ${name})`)
    }
    return value
  }
}
