import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { MAX_TIMER_DELAY_MS } from "../launch/clock.js";
import { readConfigFile } from "./config-file.js";

export const DEFAULT_CONFIG_FILE = "devbox.yaml";
export const DEFAULT_API_BASE_URL = "https://cloud.lambda.ai/api/v1";

/** Delays are handed to Node timers, which cannot hold more than this. */
const delayMs = z.coerce.number().positive().max(MAX_TIMER_DELAY_MS);

/** Backoff between capacity-limited launch attempts. */
export const retryConfigSchema = z
  .object({
    /** Retries after the first attempt; 0 fails on the first error. */
    maxAttempts: z.coerce.number().int().min(0).default(20),
    initialDelayMs: delayMs.default(5_000),
    maxDelayMs: delayMs.default(60_000),
    /** 1 gives a constant delay. */
    multiplier: z.coerce.number().min(1).default(1.5),
    /** Fraction by which a delay may be stretched at random. 0 disables jitter. */
    jitterRatio: z.coerce.number().min(0).max(1).default(0),
  })
  .refine((retry) => retry.initialDelayMs <= retry.maxDelayMs, {
    message: "initialDelayMs must not exceed maxDelayMs",
    path: ["initialDelayMs"],
  });

/** Fixed-interval readiness polling. */
export const pollConfigSchema = z.object({
  intervalMs: delayMs.default(5_000),
  timeoutMs: delayMs.default(600_000),
});

const optionalName = z
  .string()
  .trim()
  .transform((value) => (value === "" ? null : value))
  .nullable()
  .default(null);

const configSchema = z.object({
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
  dbPath: z.string().min(1).default(join(homedir(), ".gpu-devbox", "instances.db")),

  api: z
    .object({
      baseUrl: z.string().url().default(DEFAULT_API_BASE_URL),
      apiKey: z.string().default(""),
      timeoutMs: z.coerce.number().int().positive().default(120_000),
    })
    .default({}),

  ssh: z
    .object({
      username: z.string().min(1).default("ubuntu"),
    })
    .default({}),

  wait: pollConfigSchema.default({}),

  retry: retryConfigSchema.default({}),

  /** Defaults for `up`; each can be overridden by a flag. */
  launch: z
    .object({
      region: optionalName,
      instanceType: optionalName,
      sshKeyName: optionalName,
      filesystemName: optionalName,
      imageId: optionalName,
      name: optionalName,
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;
export type RetryConfigInput = z.input<typeof retryConfigSchema>;

/** A partial, unvalidated configuration layer (file, env or flags). */
export type ConfigLayer = Record<string, unknown>;

export class ConfigError extends Error {
  readonly name = "ConfigError" as const;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Deep-merge `over` onto `base`; undefined values in `over` never replace anything. */
export function mergeLayers(base: ConfigLayer, over: ConfigLayer): ConfigLayer {
  const merged: ConfigLayer = { ...base };
  for (const [key, value] of Object.entries(over)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? mergeLayers(current, value) : value;
  }
  return merged;
}

/** An exported but empty variable counts as unset. */
function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Map the supported environment variables onto a config layer. */
export function envLayer(env: NodeJS.ProcessEnv): ConfigLayer {
  return {
    logLevel: nonEmpty(env.LOG_LEVEL)?.toLowerCase(),
    dbPath: nonEmpty(env.DEVBOX_DB_PATH),
    api: {
      apiKey: nonEmpty(env.LAMBDA_API_KEY),
      baseUrl: nonEmpty(env.LAMBDA_API_BASE_URL),
      timeoutMs: nonEmpty(env.LAMBDA_API_TIMEOUT_MS),
    },
    ssh: {
      username: nonEmpty(env.DEVBOX_SSH_USERNAME),
    },
    wait: {
      intervalMs: nonEmpty(env.DEVBOX_POLL_INTERVAL_MS),
      timeoutMs: nonEmpty(env.DEVBOX_WAIT_TIMEOUT_MS),
    },
    retry: {
      maxAttempts: nonEmpty(env.DEVBOX_RETRY_MAX_ATTEMPTS),
      initialDelayMs: nonEmpty(env.DEVBOX_RETRY_INITIAL_DELAY_MS),
      maxDelayMs: nonEmpty(env.DEVBOX_RETRY_MAX_DELAY_MS),
      multiplier: nonEmpty(env.DEVBOX_RETRY_MULTIPLIER),
      jitterRatio: nonEmpty(env.DEVBOX_RETRY_JITTER_RATIO),
    },
    launch: {
      region: nonEmpty(env.DEVBOX_REGION),
      instanceType: nonEmpty(env.DEVBOX_INSTANCE_TYPE),
      sshKeyName: nonEmpty(env.DEVBOX_SSH_KEY),
      filesystemName: nonEmpty(env.DEVBOX_FILESYSTEM),
      imageId: nonEmpty(env.DEVBOX_IMAGE_ID),
    },
  };
}

/**
 * Validate merged layers, lowest precedence first.
 * Throws ConfigError listing every offending path.
 */
export function parseConfig(...layers: ConfigLayer[]): Config {
  const merged = layers.reduce<ConfigLayer>((acc, layer) => mergeLayers(acc, layer), {});
  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${details.join("; ")}`);
  }
  return result.data;
}

export interface LoadConfigOptions {
  /** Explicit YAML file; when omitted `./devbox.yaml` is used if it exists. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence layer, built from CLI flags. */
  overrides?: ConfigLayer;
}

/** defaults → config file → environment → flags */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const env = options.env ?? process.env;
  const fileLayer = options.configPath
    ? await readConfigFile(options.configPath, { required: true })
    : await readConfigFile(DEFAULT_CONFIG_FILE, { required: false });

  return parseConfig(fileLayer ?? {}, envLayer(env), options.overrides ?? {});
}
