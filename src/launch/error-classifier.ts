/**
 * Remote error classification. Pure, never throws.
 *
 * Closed world: only a known capacity shortage is worth waiting out. Every
 * other code, including ones this table has never seen, stops the launch.
 */

import { isLambdaErrorCode, type LambdaErrorCode, UNKNOWN_ERROR_CODE } from "../lambda/error-codes.js";
import type { ClassifiedError, ErrorKind, RemoteError } from "./types.js";

export const ERROR_KIND_BY_CODE = {
  "instance-operations/launch/insufficient-capacity": "capacity",
  "global/invalid-api-key": "auth",
  "global/account-inactive": "auth",
  "global/quota-exceeded": "quota",
  "global/invalid-parameters": "validation",
  "global/invalid-address": "validation",
  "instance-operations/launch/file-system-in-wrong-region": "validation",
  "instance-operations/launch/file-systems-not-supported": "validation",
  "ssh-keys/key-in-use": "validation",
  "global/object-does-not-exist": "not_found",
  "global/unknown": "unknown",
} as const satisfies Record<LambdaErrorCode, ErrorKind>;

export const DEFAULT_RETRYABLE: Readonly<Record<ErrorKind, boolean>> = {
  capacity: true,
  auth: false,
  quota: false,
  validation: false,
  not_found: false,
  unknown: false,
};

/** Explicit per-kind overrides of the default retry verdict. */
export interface ClassifierPolicy {
  retryable?: Partial<Record<ErrorKind, boolean>>;
}

export type ErrorClassifier = (error: RemoteError) => ClassifiedError;

export function kindForCode(code: string): ErrorKind {
  return isLambdaErrorCode(code) ? ERROR_KIND_BY_CODE[code] : "unknown";
}

export function classifyError(error: RemoteError, policy: ClassifierPolicy = {}): ClassifiedError {
  const kind = kindForCode(error.code);
  return {
    kind,
    code: error.code,
    message: error.message,
    suggestion: error.suggestion ?? null,
    retryable: policy.retryable?.[kind] ?? DEFAULT_RETRYABLE[kind],
  };
}

/** Bind a policy once so callers can pass a plain `(error) => ClassifiedError`. */
export function createClassifier(policy: ClassifierPolicy = {}): ErrorClassifier {
  return (error) => classifyError(error, policy);
}

function isRemoteError(value: unknown): value is RemoteError {
  if (typeof value !== "object" || value === null) return false;
  return (
    "code" in value && typeof value.code === "string" && "message" in value && typeof value.message === "string"
  );
}

/**
 * Normalise anything a provider call rejected with.
 * Non-API throwables (bugs, network failures) become `global/unknown`.
 */
export function toRemoteError(err: unknown): RemoteError {
  if (isRemoteError(err)) {
    return {
      code: err.code,
      message: err.message,
      suggestion: err.suggestion ?? null,
      status: err.status,
    };
  }
  return {
    code: UNKNOWN_ERROR_CODE,
    message: err instanceof Error ? err.message : String(err),
    suggestion: null,
  };
}
