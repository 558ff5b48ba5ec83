import { z } from "zod";
import type { LaunchRequest } from "./types.js";

const requiredName = z.string().trim().min(1);
const optionalName = z
  .string()
  .trim()
  .min(1)
  .nullish()
  .transform((value) => value ?? null);

export const launchRequestSchema = z.object({
  region: requiredName,
  instanceType: requiredName,
  sshKeyName: requiredName,
  filesystemName: optionalName,
  name: optionalName,
  imageId: optionalName,
  userData: z
    .string()
    .min(1)
    .nullish()
    .transform((value) => value ?? null),
});

export type LaunchRequestInput = z.input<typeof launchRequestSchema>;

/** Validate and freeze; one request is reused unchanged for every retry. */
export function createLaunchRequest(input: LaunchRequestInput): LaunchRequest {
  return Object.freeze(launchRequestSchema.parse(input));
}
