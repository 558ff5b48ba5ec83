/**
 * Domain types for the launch engine.
 *
 * Everything here is plain data: the orchestrator, poller and facade pass
 * these values around and never mutate them once built.
 */

// ---------------------------------------------------------------------------
// Launch request
// ---------------------------------------------------------------------------

export interface LaunchRequest {
  readonly region: string;
  readonly instanceType: string;
  readonly sshKeyName: string;
  /** Persistent filesystem to attach (must live in `region`). */
  readonly filesystemName: string | null;
  readonly name: string | null;
  readonly imageId: string | null;
  /** Base64 boot script handed to the provider untouched. */
  readonly userData: string | null;
}

// ---------------------------------------------------------------------------
// Timing configuration
// ---------------------------------------------------------------------------

export interface RetryConfig {
  /** Retries allowed after the first attempt. 0 = fail on the first error. */
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly multiplier: number;
  /** 0 disables jitter. */
  readonly jitterRatio: number;
}

export interface PollConfig {
  readonly intervalMs: number;
  readonly timeoutMs: number;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export const ERROR_KINDS = ["capacity", "auth", "quota", "validation", "not_found", "unknown"] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

/** Structured failure as reported by the remote provisioning API. */
export interface RemoteError {
  code: string;
  message: string;
  suggestion?: string | null;
  /** HTTP status, when the failure came over HTTP. */
  status?: number;
}

export interface ClassifiedError {
  kind: ErrorKind;
  /** Remote discriminator, verbatim. */
  code: string;
  message: string;
  suggestion: string | null;
  retryable: boolean;
}

// ---------------------------------------------------------------------------
// Instances
// ---------------------------------------------------------------------------

export const INSTANCE_STATUSES = ["booting", "active", "unhealthy", "terminated", "unknown"] as const;

export type InstanceStatus = (typeof INSTANCE_STATUSES)[number];

export interface InstanceHandle {
  readonly id: string;
  readonly status: InstanceStatus;
  /** Null until the provider assigns an address. */
  readonly ip: string | null;
}

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

export type LaunchPhase = "launch" | "poll";

export interface FatalErrorFailure {
  reason: "fatal_error";
  phase: LaunchPhase;
  error: ClassifiedError;
  /** Set when the failure happened after the instance was created. */
  instanceId: string | null;
}

export interface RetriesExhaustedFailure {
  reason: "retries_exhausted";
  phase: "launch";
  error: ClassifiedError;
  /** Remote launch calls made, the first one included. */
  attempts: number;
}

export interface PollTimeoutFailure {
  reason: "poll_timeout";
  phase: "poll";
  instanceId: string;
  lastStatus: InstanceStatus;
  elapsedMs: number;
  timeoutMs: number;
}

export interface InstanceFailedFailure {
  reason: "instance_failed";
  phase: "poll";
  instanceId: string;
  status: "unhealthy" | "terminated";
}

export interface CancelledFailure {
  reason: "cancelled";
  phase: LaunchPhase;
  instanceId: string | null;
}

export type LaunchFailure =
  | FatalErrorFailure
  | RetriesExhaustedFailure
  | PollTimeoutFailure
  | InstanceFailedFailure
  | CancelledFailure;

export type LaunchOutcome =
  | { status: "ready"; instance: InstanceHandle; attempts: number }
  | { status: "failed"; failure: LaunchFailure; attempts: number };
