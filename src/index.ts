export { encodeUserData, renderCloudInit } from "./cloud-init/cloud-init.js";
export type { CloudInitParams } from "./cloud-init/cloud-init.js";
export { ConfigError, loadConfig, parseConfig } from "./config/index.js";
export type { Config, ConfigLayer, LoadConfigOptions } from "./config/index.js";
export { openDatabase } from "./db/index.js";
export type { LedgerDatabase } from "./db/index.js";
export { DrizzleInstanceRecordRepository } from "./instances/drizzle-instance-record-repository.js";
export { LIVE_STATUSES } from "./instances/instance-record-repository.js";
export type {
  IInstanceRecordRepository,
  InstanceRecord,
  NewInstanceRecord,
} from "./instances/instance-record-repository.js";
export { LAMBDA_ERROR_CODES } from "./lambda/error-codes.js";
export type { LambdaErrorCode } from "./lambda/error-codes.js";
export { LambdaApiError, LambdaCloudClient } from "./lambda/lambda-client.js";
export type { LambdaCloudClientOptions } from "./lambda/lambda-client.js";
export { LambdaInstanceProvider } from "./lambda/lambda-instance-provider.js";
export { nextDelay, withJitter } from "./launch/backoff-policy.js";
export { CancelledError, systemClock } from "./launch/clock.js";
export type { Clock } from "./launch/clock.js";
export { classifyError, createClassifier, toRemoteError } from "./launch/error-classifier.js";
export type { ClassifierPolicy, ErrorClassifier } from "./launch/error-classifier.js";
export type { InstanceProvider } from "./launch/instance-provider.js";
export { InstanceLifecycle } from "./launch/instance-lifecycle.js";
export type { InstanceLifecycleOptions } from "./launch/instance-lifecycle.js";
export { fanOut, ignoreLaunchEvent, logLaunchEvent } from "./launch/launch-events.js";
export type { LaunchEvent, LaunchEventSink } from "./launch/launch-events.js";
export { LaunchOrchestrator } from "./launch/launch-orchestrator.js";
export type { LaunchAttemptResult } from "./launch/launch-orchestrator.js";
export { createLaunchRequest } from "./launch/launch-request.js";
export type { LaunchRequestInput } from "./launch/launch-request.js";
export { isReady, ReadinessPoller } from "./launch/readiness-poller.js";
export type { PollResult } from "./launch/readiness-poller.js";
export type {
  ClassifiedError,
  ErrorKind,
  InstanceHandle,
  InstanceStatus,
  LaunchFailure,
  LaunchOutcome,
  LaunchRequest,
  PollConfig,
  RemoteError,
  RetryConfig,
} from "./launch/types.js";
export { ERROR_KINDS, INSTANCE_STATUSES } from "./launch/types.js";
