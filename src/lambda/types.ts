import { z } from "zod";

/**
 * Lambda Cloud API response shapes (only what we read).
 *
 * Objects are not strict: the API adds fields over time and we ignore them.
 */

export const LAMBDA_INSTANCE_STATUSES = [
  "booting",
  "active",
  "unhealthy",
  "terminated",
  "terminating",
  "preempted",
] as const;

export type LambdaInstanceStatus = (typeof LAMBDA_INSTANCE_STATUSES)[number];

export const regionSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
});

export const instanceTypeSpecsSchema = z.object({
  vcpus: z.number(),
  memory_gib: z.number(),
  storage_gib: z.number(),
  gpus: z.number(),
});

export const instanceTypeSchema = z.object({
  name: z.string(),
  description: z.string(),
  gpu_description: z.string(),
  price_cents_per_hour: z.number(),
  specs: instanceTypeSpecsSchema,
});

export const instanceSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  ip: z.string().nullish(),
  private_ip: z.string().nullish(),
  /** Kept as a string: unrecognised values map to "unknown" downstream. */
  status: z.string(),
  hostname: z.string().nullish(),
  ssh_key_names: z.array(z.string()).default([]),
  file_system_names: z.array(z.string()).default([]),
  region: regionSchema,
  instance_type: instanceTypeSchema,
  is_reserved: z.boolean().optional(),
});

export const instanceTypeAvailabilitySchema = z.object({
  instance_type: instanceTypeSchema,
  regions_with_capacity_available: z.array(regionSchema),
});

/** Keyed by instance type name. */
export const instanceTypesSchema = z.record(z.string(), instanceTypeAvailabilitySchema);

export const launchResponseSchema = z.object({
  instance_ids: z.array(z.string()),
});

export const terminateResponseSchema = z.object({
  terminated_instances: z.array(instanceSchema),
});

export const sshKeySchema = z.object({
  id: z.string(),
  name: z.string(),
  public_key: z.string(),
});

export const filesystemSchema = z.object({
  id: z.string(),
  name: z.string(),
  mount_point: z.string(),
  created: z.string(),
  created_by: z.object({ email: z.string() }).partial().nullish(),
  is_in_use: z.boolean(),
  region: regionSchema,
  bytes_used: z.number().nullish(),
});

export const imageSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  family: z.string(),
  version: z.string(),
  architecture: z.string(),
  region: regionSchema,
  created_time: z.string(),
  updated_time: z.string(),
});

export const firewallRuleSchema = z.object({
  protocol: z.string(),
  /** [from, to]; absent for protocols without ports. */
  port_range: z.tuple([z.number(), z.number()]).nullish(),
  source_network: z.string(),
  description: z.string().default(""),
});

export const firewallRulesetSchema = z.object({
  id: z.string(),
  name: z.string(),
  region: regionSchema,
  rules: z.array(firewallRuleSchema),
  created: z.string(),
  instance_ids: z.array(z.string()).default([]),
});

export const apiErrorBodySchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    suggestion: z.string().nullish(),
  }),
});

export type LambdaRegion = z.infer<typeof regionSchema>;
export type LambdaInstanceType = z.infer<typeof instanceTypeSchema>;
export type LambdaInstance = z.infer<typeof instanceSchema>;
export type LambdaInstanceTypes = z.infer<typeof instanceTypesSchema>;
export type LambdaInstanceTypeAvailability = z.infer<typeof instanceTypeAvailabilitySchema>;
export type LambdaSshKey = z.infer<typeof sshKeySchema>;
export type LambdaFilesystem = z.infer<typeof filesystemSchema>;
export type LambdaImage = z.infer<typeof imageSchema>;
export type LambdaFirewallRule = z.infer<typeof firewallRuleSchema>;
export type LambdaFirewallRuleset = z.infer<typeof firewallRulesetSchema>;

/** Body of POST /instance-operations/launch. */
export interface LambdaLaunchParams {
  region_name: string;
  instance_type_name: string;
  ssh_key_names: string[];
  file_system_names?: string[];
  name?: string;
  image?: { id: string };
  user_data?: string;
}
