/**
 * Deployment error taxonomy and remedy mapping.
 */

export type DeployErrorKind =
  | 'NotFound'
  | 'ExternalProcessFailure'
  | 'DependencyUnresolved'
  | 'RemoteOperationFailure'
  | 'AggregateUploadFailure'
  | 'Cancelled'

/** Per-item failure carried by aggregate errors. */
export interface FailureDetail {
  readonly item: string
  readonly message: string
}

export interface DeployErrorOptions {
  readonly cause?: unknown
  readonly details?: readonly FailureDetail[]
  readonly exitCode?: number | null
}

export class DeployError extends Error {
  public readonly kind: DeployErrorKind
  public readonly details: readonly FailureDetail[]
  public readonly exitCode?: number | null

  public constructor(kind: DeployErrorKind, message: string, opts?: DeployErrorOptions) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause })
    this.name = 'DeployError'
    this.kind = kind
    this.details = opts?.details ?? []
    this.exitCode = opts?.exitCode
  }
}

export function isDeployError(e: unknown): e is DeployError {
  return e instanceof DeployError
}

export function isCancellation(e: unknown): boolean {
  if (e instanceof DeployError) return e.kind === 'Cancelled'
  return e instanceof Error && e.name === 'AbortError'
}

/** Message text of any thrown value. */
export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message
  if (typeof e === 'string') return e
  try { return JSON.stringify(e) } catch { return String(e) }
}

export interface ErrorInfo {
  readonly code: string
  readonly message: string
  readonly remedy?: string
}

function normalize(s: string): string {
  return (s || '').toLowerCase()
}

/** Map a pipeline error into a stable code with an optional remedy. */
export function toErrorInfo(e: unknown): ErrorInfo {
  const message: string = errorMessage(e).trim() || 'Unknown deployment error.'
  const kind: DeployErrorKind | undefined = isDeployError(e) ? e.kind : undefined
  if (kind === 'Cancelled' || isCancellation(e)) {
    return { code: 'CANCELLED', message, remedy: 'The deployment was cancelled; re-run it to finish uploading.' }
  }
  if (kind === 'NotFound') {
    return { code: 'PATH_NOT_FOUND', message, remedy: 'Check --path and the outputDir setting; run the build locally to confirm it writes the output directory.' }
  }
  if (kind === 'ExternalProcessFailure') {
    return { code: 'BUILD_FAILED', message, remedy: 'Run the install and build commands locally in the site directory and fix the reported errors.' }
  }
  if (kind === 'DependencyUnresolved') {
    return { code: 'OUTPUT_UNRESOLVED', message, remedy: 'Make sure provisioning finished and published the output (see --outputs-file or STATICDEPLOY_OUTPUT_* variables).' }
  }
  const txt: string = normalize(message)
  if (txt.includes('authorizationpermissionmismatch') || txt.includes('authorizationfailure') || txt.includes('403') || txt.includes('unauthorized') || txt.includes('credential')) {
    return { code: 'STORAGE_AUTH_FAILED', message, remedy: 'Sign in (az login) or set AZURE_CLIENT_ID/AZURE_TENANT_ID/AZURE_CLIENT_SECRET; the identity needs Storage Blob Data Contributor on the account.' }
  }
  if (txt.includes('enotfound') || txt.includes('etimedout') || txt.includes('econnreset') || txt.includes('network')) {
    return { code: 'NETWORK_ERROR', message, remedy: 'Retry the command. If it persists, check connectivity to the storage endpoint.' }
  }
  if (kind === 'AggregateUploadFailure') {
    return { code: 'UPLOAD_FAILED', message, remedy: 'Re-run the deployment; the container may hold a partial upload until it succeeds.' }
  }
  if (kind === 'RemoteOperationFailure') {
    return { code: 'STORAGE_OPERATION_FAILED', message }
  }
  return { code: 'UNKNOWN_ERROR', message }
}
