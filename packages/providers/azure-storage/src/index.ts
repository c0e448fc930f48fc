/**
 * @packageDocumentation
 * Azure Blob Storage provider implementing the @staticdeploy/core storage capability.
 * Static website hosting lives on the account's `$web` container.
 */

import { BlobServiceClient, type BlobServiceProperties } from '@azure/storage-blob'
import { DefaultAzureCredential, type TokenCredential } from '@azure/identity'
import type { RemoteCallOptions, StorageClient, StorageClientFactory, UploadBlobArgs } from '@staticdeploy/core'

export interface AzureStorageOptions {
  /** Defaults to `DefaultAzureCredential` (env, managed identity, az login). */
  readonly credential?: TokenCredential
}

/** Copy only the service properties; drops response headers and raw response. */
function pickServiceProperties(p: BlobServiceProperties): BlobServiceProperties {
  return {
    blobAnalyticsLogging: p.blobAnalyticsLogging,
    hourMetrics: p.hourMetrics,
    minuteMetrics: p.minuteMetrics,
    cors: p.cors,
    defaultServiceVersion: p.defaultServiceVersion,
    deleteRetentionPolicy: p.deleteRetentionPolicy,
    staticWebsite: p.staticWebsite
  }
}

/**
 * @public
 * Storage client bound to one blob endpoint.
 */
export class AzureBlobStorageClient implements StorageClient<BlobServiceProperties> {
  public readonly endpoint: string
  private readonly service: BlobServiceClient

  public constructor(endpoint: string, opts?: AzureStorageOptions) {
    this.endpoint = endpoint
    this.service = new BlobServiceClient(endpoint, opts?.credential ?? new DefaultAzureCredential())
  }

  /** @inheritdoc */
  public async getServiceProperties(opts?: RemoteCallOptions): Promise<BlobServiceProperties> {
    const res = await this.service.getProperties({ abortSignal: opts?.signal })
    return pickServiceProperties(res)
  }

  /** @inheritdoc */
  public async setServiceProperties(props: BlobServiceProperties, opts?: RemoteCallOptions): Promise<void> {
    await this.service.setProperties(props, { abortSignal: opts?.signal })
  }

  /** @inheritdoc */
  public async createContainerIfNotExists(name: string, opts?: RemoteCallOptions): Promise<void> {
    await this.service.getContainerClient(name).createIfNotExists({ abortSignal: opts?.signal })
  }

  /** @inheritdoc */
  public async uploadBlob(args: UploadBlobArgs, opts?: RemoteCallOptions): Promise<void> {
    const blob = this.service.getContainerClient(args.container).getBlockBlobClient(args.blobName)
    await blob.uploadFile(args.filePath, {
      blobHTTPHeaders: { blobContentType: args.contentType },
      abortSignal: opts?.signal
    })
  }
}

/** Factory handed to the orchestrator; one client per resolved endpoint. */
export function azureStorageClientFactory(opts?: AzureStorageOptions): StorageClientFactory {
  let credential: TokenCredential | undefined = opts?.credential
  return (endpoint: string) => {
    // created on first use so plan-only runs never touch the credential chain
    if (credential === undefined) credential = new DefaultAzureCredential()
    return new AzureBlobStorageClient(endpoint, { credential })
  }
}
