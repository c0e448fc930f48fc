/**
 * @packageDocumentation
 * Public API for @staticdeploy/core
 */
export type { RemoteCallOptions, StaticWebsiteSettings, ServicePropertiesShape, UploadBlobArgs, StorageClient, StorageClientFactory, OutputRef, OutputResolver, ProviderLog } from './contracts/capabilities'
export { silentLog } from './contracts/capabilities'
export type { DeployErrorKind, FailureDetail, ErrorInfo } from './errors'
export { DeployError, isDeployError, isCancellation, errorMessage, toErrorInfo } from './errors'
export type { ProgressEvent, ProgressEventType, ProgressSink, ProgressState, StepEvent, TaskEvent, PublishEvent, DeploySummary } from './events/types'
export { summary } from './events/emit'
export type { ProgressListener } from './progress/reporter'
export { ProgressReporter, StepHandle, TaskHandle, PipelineStateError, withStep, withTask } from './progress/reporter'
export type { ProcessRunner, ExecOptions, ExecResult, SpawnCtl } from './process/runner'
export { NodeProcessRunner, splitCommand } from './process/runner'
export type { DeployTarget, PipelineDeps, PhaseResult, PhaseFailure, DeploymentOutcome, DeployPlan } from './pipeline/types'
export { DEFAULT_TARGET } from './pipeline/types'
export type { DeployOptions } from './pipeline/orchestrator'
export { DeploymentOrchestrator, DEPLOY_STEP_NAME } from './pipeline/orchestrator'
export { fanOut } from './pipeline/fan-out'
export type { FanOutOptions } from './pipeline/fan-out'
export { EnvOutputResolver, outputEnvName, OUTPUT_ENV_PREFIX } from './outputs/env'
export { FileOutputResolver, pickOutput } from './outputs/file'
export type { FileOutputResolverOptions } from './outputs/file'
export { getContentType, knownContentTypes, DEFAULT_CONTENT_TYPE } from './content-type'
export { raceAbort } from './abort'
