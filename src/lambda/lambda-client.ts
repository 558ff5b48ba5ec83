import { z } from "zod";
import { DEFAULT_API_BASE_URL } from "../config/index.js";
import { UNKNOWN_ERROR_CODE } from "./error-codes.js";
import {
  apiErrorBodySchema,
  filesystemSchema,
  firewallRulesetSchema,
  imageSchema,
  instanceSchema,
  instanceTypesSchema,
  type LambdaFilesystem,
  type LambdaFirewallRuleset,
  type LambdaImage,
  type LambdaInstance,
  type LambdaInstanceTypes,
  type LambdaLaunchParams,
  type LambdaSshKey,
  launchResponseSchema,
  sshKeySchema,
  terminateResponseSchema,
} from "./types.js";

/** Transport-level failures (timeouts, refused connections) carry status 0. */
export class LambdaApiError extends Error {
  readonly name = "LambdaApiError" as const;

  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
    readonly suggestion: string | null = null,
  ) {
    super(message);
  }
}

export interface LambdaCloudClientOptions {
  baseUrl?: string;
  /** Per-request budget; the caller's signal can still abort earlier. */
  timeoutMs?: number;
}

const envelopeSchema = z.object({ data: z.unknown() });

function unexpectedResponse(method: string, path: string, status: number, error: z.ZodError): LambdaApiError {
  const issues = error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
  return new LambdaApiError(status, UNKNOWN_ERROR_CODE, `Unexpected response from ${method} ${path}: ${issues.join("; ")}`);
}

export class LambdaCloudClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly apiKey: string,
    options: LambdaCloudClientOptions = {},
  ) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 120_000;
  }

  // ---------------------------------------------------------------------------
  // Instances
  // ---------------------------------------------------------------------------

  async listInstances(signal?: AbortSignal): Promise<LambdaInstance[]> {
    return this.request("GET", "/instances", z.array(instanceSchema), { signal });
  }

  async getInstance(id: string, signal?: AbortSignal): Promise<LambdaInstance> {
    return this.request("GET", `/instances/${encodeURIComponent(id)}`, instanceSchema, { signal });
  }

  /** Resolves with the new instance ids; the instances are still booting. */
  async launchInstance(params: LambdaLaunchParams, signal?: AbortSignal): Promise<string[]> {
    const data = await this.request("POST", "/instance-operations/launch", launchResponseSchema, {
      body: params,
      signal,
    });
    return data.instance_ids;
  }

  async terminateInstances(instanceIds: readonly string[], signal?: AbortSignal): Promise<LambdaInstance[]> {
    const data = await this.request("POST", "/instance-operations/terminate", terminateResponseSchema, {
      body: { instance_ids: instanceIds },
      signal,
    });
    return data.terminated_instances;
  }

  // ---------------------------------------------------------------------------
  // Catalog
  // ---------------------------------------------------------------------------

  async listInstanceTypes(signal?: AbortSignal): Promise<LambdaInstanceTypes> {
    return this.request("GET", "/instance-types", instanceTypesSchema, { signal });
  }

  async listSshKeys(signal?: AbortSignal): Promise<LambdaSshKey[]> {
    return this.request("GET", "/ssh-keys", z.array(sshKeySchema), { signal });
  }

  async listFilesystems(signal?: AbortSignal): Promise<LambdaFilesystem[]> {
    return this.request("GET", "/file-systems", z.array(filesystemSchema), { signal });
  }

  async listImages(signal?: AbortSignal): Promise<LambdaImage[]> {
    return this.request("GET", "/images", z.array(imageSchema), { signal });
  }

  async listFirewallRulesets(signal?: AbortSignal): Promise<LambdaFirewallRuleset[]> {
    return this.request("GET", "/firewall-rulesets", z.array(firewallRulesetSchema), { signal });
  }

  // ---------------------------------------------------------------------------
  // Transport
  // ---------------------------------------------------------------------------

  private headers(): Record<string, string> {
    return {
      Authorization: `Basic ${Buffer.from(`${this.apiKey}:`).toString("base64")}`,
      Accept: "application/json",
      "Content-Type": "application/json",
    };
  }

  private async request<S extends z.ZodTypeAny>(
    method: "GET" | "POST",
    path: string,
    schema: S,
    options: { body?: unknown; signal?: AbortSignal },
  ): Promise<z.infer<S>> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: this.headers(),
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal,
      });
    } catch (err) {
      if (options.signal?.aborted) throw err;
      if (timeout.aborted) {
        throw new LambdaApiError(0, UNKNOWN_ERROR_CODE, `${method} ${path} timed out after ${this.timeoutMs}ms`);
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new LambdaApiError(0, UNKNOWN_ERROR_CODE, `${method} ${path} failed: ${reason}`);
    }

    if (!res.ok) {
      const body: unknown = await res.json().catch(() => null);
      const parsed = apiErrorBodySchema.safeParse(body);
      if (parsed.success) {
        const { code, message, suggestion } = parsed.data.error;
        throw new LambdaApiError(res.status, code, message, suggestion ?? null);
      }
      throw new LambdaApiError(res.status, UNKNOWN_ERROR_CODE, `${method} ${path} -> ${res.status} ${res.statusText}`);
    }

    const envelope = envelopeSchema.safeParse(await res.json().catch(() => null));
    if (!envelope.success) throw unexpectedResponse(method, path, res.status, envelope.error);
    const result = schema.safeParse(envelope.data.data);
    if (!result.success) throw unexpectedResponse(method, path, res.status, result.error);
    return result.data;
  }
}
