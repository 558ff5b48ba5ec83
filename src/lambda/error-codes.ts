/**
 * Error codes the Lambda Cloud API documents in `error.code`.
 * Anything else the API sends is treated as unrecognised.
 */
export const LAMBDA_ERROR_CODES = [
  "global/unknown",
  "global/invalid-api-key",
  "global/account-inactive",
  "global/invalid-address",
  "global/invalid-parameters",
  "global/object-does-not-exist",
  "global/quota-exceeded",
  "instance-operations/launch/insufficient-capacity",
  "instance-operations/launch/file-system-in-wrong-region",
  "instance-operations/launch/file-systems-not-supported",
  "ssh-keys/key-in-use",
] as const;

export type LambdaErrorCode = (typeof LAMBDA_ERROR_CODES)[number];

export const UNKNOWN_ERROR_CODE: LambdaErrorCode = "global/unknown";

export function isLambdaErrorCode(code: string): code is LambdaErrorCode {
  return LAMBDA_ERROR_CODES.some((known) => known === code);
}
