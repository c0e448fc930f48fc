/**
 * Capability contracts for the collaborators the deployment pipeline drives.
 * Implementations live outside core (storage providers, resolvers, runners)
 * so the orchestrator stays platform-agnostic.
 */

/** Options accepted by every remote call. */
export interface RemoteCallOptions {
  readonly signal?: AbortSignal
}

/** Static website hosting settings of a storage account. */
export interface StaticWebsiteSettings {
  readonly enabled: boolean
  readonly indexDocument?: string
  readonly errorDocument404Path?: string
  readonly defaultIndexDocumentPath?: string
}

/**
 * Service-level properties of a storage account.
 * Only `staticWebsite` is read or written by the pipeline; every other field
 * is carried through untouched.
 */
export interface ServicePropertiesShape {
  readonly staticWebsite?: StaticWebsiteSettings
}

/** Arguments for a single blob upload. */
export interface UploadBlobArgs {
  readonly container: string
  readonly blobName: string
  readonly filePath: string
  readonly contentType: string
}

/**
 * Object storage boundary.
 * `TProps` is the provider's own properties type, so a read-modify-write keeps
 * fields core knows nothing about.
 */
export interface StorageClient<TProps extends ServicePropertiesShape = ServicePropertiesShape> {
  getServiceProperties(opts?: RemoteCallOptions): Promise<TProps>
  setServiceProperties(props: TProps, opts?: RemoteCallOptions): Promise<void>
  createContainerIfNotExists(name: string, opts?: RemoteCallOptions): Promise<void>
  uploadBlob(args: UploadBlobArgs, opts?: RemoteCallOptions): Promise<void>
}

/** Creates a storage client bound to a resolved blob endpoint. */
export type StorageClientFactory = (endpoint: string) => StorageClient

/** Reference to a named output of a provisioned resource. */
export interface OutputRef {
  readonly resource: string
  readonly key: string
}

/**
 * Resource-output boundary. Resolves once the named resource has finished
 * provisioning; rejects when it never existed or has no such output.
 */
export interface OutputResolver {
  getOutputValue(resource: string, key: string, opts?: RemoteCallOptions): Promise<string>
}

/** Log surface handed to the pipeline; mirrors the CLI logger. */
export interface ProviderLog {
  readonly info: (msg: string) => void
  readonly warn: (msg: string) => void
  readonly error: (msg: string) => void
  readonly success: (msg: string) => void
  readonly note: (msg: string) => void
}

export const silentLog: ProviderLog = {
  info: (): void => {},
  warn: (): void => {},
  error: (): void => {},
  success: (): void => {},
  note: (): void => {}
}
