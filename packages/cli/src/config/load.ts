import Ajv from 'ajv'
import { isAbsolute, resolve } from 'node:path'
import { DEFAULT_TARGET, type DeployTarget, type OutputRef } from '@staticdeploy/core'
import { deployConfigSchema } from '../schemas/deploy-config.schema'
import { fsx } from '../utils/fs'

export const CONFIG_FILE_NAME = 'staticdeploy.config.json'

/** Shape of `staticdeploy.config.json`. */
export interface DeployConfigFile {
  readonly sitePath?: string
  readonly outputDir?: string
  readonly container?: string
  readonly indexDocument?: string
  readonly errorDocument404Path?: string
  readonly installCommand?: string
  readonly buildCommand?: string
  readonly commandTimeoutMs?: number
  readonly uploadConcurrency?: number
  readonly storageOutput?: OutputRef
  readonly endpointOutput?: OutputRef
  readonly outputsFile?: string
  readonly outputsTimeoutMs?: number
}

/** Values given on the command line. */
export interface ConfigFlags {
  readonly path?: string
  readonly config?: string
  readonly outputsFile?: string
  readonly concurrency?: string
}

export interface ResolvedConfig {
  readonly target: DeployTarget
  readonly outputsFile?: string
  readonly outputsTimeoutMs?: number
  /** Config file that was read, if any. */
  readonly source?: string
}

export class ConfigError extends Error {
  public constructor(message: string, public readonly problems: readonly string[] = []) {
    super(problems.length > 0 ? `${message}: ${problems.join('; ')}` : message)
    this.name = 'ConfigError'
  }
}

const ajv = new Ajv({ allErrors: true, strict: false })
const validateConfig = ajv.compile<DeployConfigFile>(deployConfigSchema)

export function parseConfig(data: unknown, source: string): DeployConfigFile {
  if (validateConfig(data)) return data
  const problems: string[] = (validateConfig.errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
  throw new ConfigError(`Invalid config ${source}`, problems)
}

function positiveInt(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined
  const n = Number(raw)
  if (!Number.isInteger(n) || n < 1) throw new ConfigError(`${name} must be a positive integer, got "${raw}"`)
  return n
}

function nonEmpty(raw: string | undefined): string | undefined {
  return raw !== undefined && raw.trim() !== '' ? raw : undefined
}

async function readConfigFile(cwd: string, explicit: string | undefined): Promise<{ readonly file: DeployConfigFile; readonly source?: string }> {
  const path: string = resolve(cwd, explicit ?? CONFIG_FILE_NAME)
  if (!(await fsx.exists(path))) {
    if (explicit !== undefined) throw new ConfigError(`Config file not found: ${path}`)
    return { file: {} }
  }
  let data: unknown
  try {
    data = await fsx.readJson(path)
  } catch (e) {
    throw new ConfigError(`Could not read config ${path}: ${e instanceof Error ? e.message : String(e)}`)
  }
  return { file: parseConfig(data, path), source: path }
}

/**
 * Build the deploy target.
 * Precedence: flags, then `STATICDEPLOY_*` variables, then the config file,
 * then defaults.
 */
export async function loadConfig(args: {
  readonly cwd: string
  readonly flags?: ConfigFlags
  readonly env?: Readonly<Record<string, string | undefined>>
}): Promise<ResolvedConfig> {
  const flags: ConfigFlags = args.flags ?? {}
  const env = args.env ?? process.env
  const { file, source } = await readConfigFile(args.cwd, flags.config ?? nonEmpty(env.STATICDEPLOY_CONFIG))
  const sitePath: string = flags.path ?? nonEmpty(env.STATICDEPLOY_SITE_PATH) ?? file.sitePath ?? '.'
  const uploadConcurrency: number | undefined =
    positiveInt(flags.concurrency, '--concurrency') ??
    positiveInt(env.STATICDEPLOY_UPLOAD_CONCURRENCY, 'STATICDEPLOY_UPLOAD_CONCURRENCY') ??
    file.uploadConcurrency
  const commandTimeoutMs: number | undefined =
    positiveInt(env.STATICDEPLOY_COMMAND_TIMEOUT_MS, 'STATICDEPLOY_COMMAND_TIMEOUT_MS') ?? file.commandTimeoutMs
  const target: DeployTarget = {
    sitePath: isAbsolute(sitePath) ? sitePath : resolve(args.cwd, sitePath),
    outputDir: nonEmpty(env.STATICDEPLOY_DIST_DIR) ?? file.outputDir ?? DEFAULT_TARGET.outputDir,
    container: nonEmpty(env.STATICDEPLOY_CONTAINER) ?? file.container ?? DEFAULT_TARGET.container,
    indexDocument: file.indexDocument ?? DEFAULT_TARGET.indexDocument,
    errorDocument404Path: file.errorDocument404Path ?? DEFAULT_TARGET.errorDocument404Path,
    installCommand: nonEmpty(env.STATICDEPLOY_INSTALL_COMMAND) ?? file.installCommand ?? DEFAULT_TARGET.installCommand,
    buildCommand: nonEmpty(env.STATICDEPLOY_BUILD_COMMAND) ?? file.buildCommand ?? DEFAULT_TARGET.buildCommand,
    storageOutput: file.storageOutput ?? DEFAULT_TARGET.storageOutput,
    endpointOutput: file.endpointOutput ?? DEFAULT_TARGET.endpointOutput,
    ...(commandTimeoutMs !== undefined ? { commandTimeoutMs } : {}),
    ...(uploadConcurrency !== undefined ? { uploadConcurrency } : {})
  }
  const outputsFile: string | undefined = flags.outputsFile ?? nonEmpty(env.STATICDEPLOY_OUTPUTS_FILE) ?? file.outputsFile
  return {
    target,
    ...(outputsFile !== undefined ? { outputsFile: resolve(args.cwd, outputsFile) } : {}),
    ...(file.outputsTimeoutMs !== undefined ? { outputsTimeoutMs: file.outputsTimeoutMs } : {}),
    ...(source !== undefined ? { source } : {})
  }
}
