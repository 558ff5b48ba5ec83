import { ConfigError } from "../config/index.js";
import type { InstanceRecord } from "../instances/instance-record-repository.js";
import { LambdaApiError } from "../lambda/lambda-client.js";
import type {
  LambdaFilesystem,
  LambdaFirewallRuleset,
  LambdaImage,
  LambdaInstance,
  LambdaInstanceTypeAvailability,
  LambdaSshKey,
} from "../lambda/types.js";
import { classifyError, toRemoteError } from "../launch/error-classifier.js";
import type { LaunchEventSink } from "../launch/launch-events.js";
import type { ClassifiedError, ErrorKind, InstanceStatus, LaunchFailure } from "../launch/types.js";

// ---------------------------------------------------------------------------
// Small helpers
// ---------------------------------------------------------------------------

/** 5000 → "5s", 7500 → "7.5s", 754000 → "12m 34s" */
export function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  if (seconds < 60) return `${Number(seconds.toFixed(2))}s`;
  const whole = Math.round(seconds);
  return `${Math.floor(whole / 60)}m ${whole % 60}s`;
}

export function sshCommand(ip: string, username: string): string {
  return `ssh ${username}@${ip}`;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

function formatEpochSeconds(seconds: number): string {
  return new Date(seconds * 1000).toISOString().replace("T", " ").slice(0, 19);
}

/** Left-aligned columns separated by two spaces; trailing padding trimmed. */
export function renderTable(headers: readonly string[], rows: readonly (readonly string[])[]): string[] {
  const widths = headers.map((header, col) => Math.max(header.length, ...rows.map((row) => (row[col] ?? "").length)));
  const line = (cells: readonly string[]) =>
    widths
      .map((width, col) => (cells[col] ?? "").padEnd(width))
      .join("  ")
      .trimEnd();
  return [line(headers), ...rows.map(line)];
}

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

const KIND_HINTS: Record<ErrorKind, string> = {
  capacity: "No capacity right now. Try another region: gpu-devbox list instance-types --available",
  auth: "Check LAMBDA_API_KEY (or api.apiKey in the config file).",
  quota: "The account quota is used up. Terminate unused instances or ask Lambda for a higher quota.",
  validation:
    "Check the region, instance type, SSH key and filesystem names: gpu-devbox list <instance-types|ssh-keys|filesystems>",
  not_found: "The resource does not exist. gpu-devbox list shows what does.",
  unknown: "Unexpected error from the API. Rerun with --log-level debug for details.",
};

/** Remote message, its suggestion if any, then what to do about it. */
export function describeError(error: ClassifiedError): string[] {
  const lines = [`${error.message} (${error.code})`];
  if (error.suggestion) lines.push(`Suggestion: ${error.suggestion}`);
  lines.push(KIND_HINTS[error.kind]);
  return lines;
}

/** Lines for an error that escaped a command. */
export function describeThrown(err: unknown): string[] {
  if (err instanceof LambdaApiError) return describeError(classifyError(toRemoteError(err)));
  if (err instanceof ConfigError) return [err.message, "Check devbox.yaml and the DEVBOX_* environment variables."];
  if (err instanceof Error) return [err.message];
  return [String(err)];
}

function stillRunning(instanceId: string): string {
  return `Instance ${instanceId} may still be running. Terminate it with: gpu-devbox down ${instanceId}`;
}

export function describeFailure(failure: LaunchFailure): string[] {
  switch (failure.reason) {
    case "fatal_error": {
      const what = failure.phase === "launch" ? "Launch failed" : `Status check for ${failure.instanceId} failed`;
      const [first, ...rest] = describeError(failure.error);
      const lines = [`${what}: ${first}`, ...rest];
      if (failure.instanceId) lines.push(stillRunning(failure.instanceId));
      return lines;
    }
    case "retries_exhausted":
      return [
        `Still no capacity after ${plural(failure.attempts, "attempt")}: ${failure.error.message}`,
        "Try another region or instance type (gpu-devbox list instance-types --available), or raise retry.maxAttempts.",
      ];
    case "poll_timeout":
      return [
        `Instance ${failure.instanceId} was not ready after ${formatDuration(failure.elapsedMs)} (last status: ${failure.lastStatus}).`,
        `It may still come up: gpu-devbox wait ${failure.instanceId}`,
        stillRunning(failure.instanceId),
      ];
    case "instance_failed":
      return failure.status === "unhealthy"
        ? [`Instance ${failure.instanceId} became unhealthy while booting.`, stillRunning(failure.instanceId)]
        : [`Instance ${failure.instanceId} was terminated while booting. Launch again with: gpu-devbox up`];
    case "cancelled":
      return failure.instanceId ? ["Cancelled.", stillRunning(failure.instanceId)] : ["Cancelled."];
  }
}

/** Status to record in the ledger for an instance whose wait failed. */
export function statusAfterFailure(failure: LaunchFailure): InstanceStatus {
  switch (failure.reason) {
    case "instance_failed":
      return failure.status;
    case "poll_timeout":
      return failure.lastStatus;
    default:
      return "unknown";
  }
}

// ---------------------------------------------------------------------------
// Progress
// ---------------------------------------------------------------------------

const RETRY_LABELS: Record<ErrorKind, string> = {
  capacity: "No capacity",
  auth: "Auth error",
  quota: "Quota exceeded",
  validation: "Rejected",
  not_found: "Not found",
  unknown: "Error",
};

/** User-facing progress lines: retries, the launch, and each status change while waiting. */
export function createProgressPrinter(write: (line: string) => void): LaunchEventSink {
  let lastStatus: InstanceStatus | null = null;
  return (event) => {
    switch (event.type) {
      case "retry_scheduled":
        write(
          `${RETRY_LABELS[event.error.kind]}: ${event.error.message}; retry ${event.retry}/${event.maxRetries} in ${formatDuration(event.delayMs)}`,
        );
        break;
      case "launched":
        write(`Launched ${event.instanceId} after ${plural(event.attempts, "attempt")}.`);
        break;
      case "poll_tick":
        if (event.status !== lastStatus) {
          lastStatus = event.status;
          write(`${event.instanceId}: ${event.status}${event.ip ? ` (${event.ip})` : ""}`);
        }
        break;
      default:
        break;
    }
  };
}

// ---------------------------------------------------------------------------
// Listings
// ---------------------------------------------------------------------------

export function formatInstances(instances: readonly LambdaInstance[]): string[] {
  if (instances.length === 0) return ["No instances found."];
  return renderTable(
    ["ID", "STATUS", "IP", "REGION", "TYPE", "NAME"],
    instances.map((inst) => [
      inst.id,
      inst.status,
      inst.ip ?? "-",
      inst.region.name,
      inst.instance_type.name,
      inst.name ?? "",
    ]),
  );
}

function formatPrice(centsPerHour: number): string {
  const dollars = centsPerHour / 100;
  return `$${dollars.toFixed(2)}/h`;
}

/** Types with capacity first, then by price (highest first), then by name. */
export function formatInstanceTypes(entries: readonly LambdaInstanceTypeAvailability[]): string[] {
  if (entries.length === 0) return ["No instance types found."];
  const sorted = [...entries].sort(
    (a, b) =>
      Number(a.regions_with_capacity_available.length === 0) -
        Number(b.regions_with_capacity_available.length === 0) ||
      b.instance_type.price_cents_per_hour - a.instance_type.price_cents_per_hour ||
      a.instance_type.name.localeCompare(b.instance_type.name),
  );
  const available = entries.filter((entry) => entry.regions_with_capacity_available.length > 0).length;
  return [
    ...renderTable(
      ["TYPE", "GPUS", "GPU", "VCPUS", "RAM", "PRICE", "AVAILABLE IN"],
      sorted.map(({ instance_type: type, regions_with_capacity_available: regions }) => [
        type.name,
        String(type.specs.gpus),
        type.gpu_description,
        String(type.specs.vcpus),
        `${type.specs.memory_gib} GiB`,
        formatPrice(type.price_cents_per_hour),
        regions.length > 0 ? regions.map((region) => region.name).join(", ") : "-",
      ]),
    ),
    "",
    `${available} of ${entries.length} instance types have capacity available.`,
  ];
}

export function formatImages(images: readonly LambdaImage[]): string[] {
  if (images.length === 0) return ["No images found."];
  const sorted = [...images].sort(
    (a, b) => a.family.localeCompare(b.family) || a.version.localeCompare(b.version) || a.region.name.localeCompare(b.region.name),
  );
  return renderTable(
    ["ID", "NAME", "VERSION", "ARCH", "REGION"],
    sorted.map((image) => [image.id, image.name, image.version, image.architecture, image.region.name]),
  );
}

export function formatBytes(bytes: number | null | undefined): string {
  if (bytes === null || bytes === undefined) return "unknown";
  const gib = bytes / 1024 ** 3;
  if (gib >= 1) return `${gib.toFixed(1)} GB`;
  return `${(bytes / 1024 ** 2).toFixed(1)} MB`;
}

export function formatFilesystems(filesystems: readonly LambdaFilesystem[]): string[] {
  if (filesystems.length === 0) return ["No filesystems found."];
  return renderTable(
    ["NAME", "REGION", "MOUNT POINT", "IN USE", "SIZE"],
    filesystems.map((fs) => [fs.name, fs.region.name, fs.mount_point, fs.is_in_use ? "yes" : "no", formatBytes(fs.bytes_used)]),
  );
}

export function formatSshKeys(keys: readonly LambdaSshKey[]): string[] {
  if (keys.length === 0) return ["No SSH keys found."];
  return renderTable(
    ["NAME", "ID", "PUBLIC KEY"],
    keys.map((key) => {
      const [type = "", body = ""] = key.public_key.split(" ");
      return [key.name, key.id, body.length > 16 ? `${type} ${body.slice(0, 8)}...${body.slice(-8)}` : key.public_key];
    }),
  );
}

function formatPorts(range: readonly [number, number] | null | undefined): string {
  if (!range) return "-";
  return range[0] === range[1] ? String(range[0]) : `${range[0]}-${range[1]}`;
}

export function formatFirewallRulesets(rulesets: readonly LambdaFirewallRuleset[]): string[] {
  if (rulesets.length === 0) return ["No firewall rulesets found."];
  const lines: string[] = [];
  for (const ruleset of rulesets) {
    if (lines.length > 0) lines.push("");
    const usage = ruleset.instance_ids.length > 0 ? `in use by ${plural(ruleset.instance_ids.length, "instance")}` : "not in use";
    lines.push(`${ruleset.name} (${ruleset.id}) ${ruleset.region.name}, ${usage}`);
    if (ruleset.rules.length === 0) {
      lines.push("  no rules");
      continue;
    }
    const table = renderTable(
      ["PROTOCOL", "PORTS", "SOURCE", "DESCRIPTION"],
      ruleset.rules.map((rule) => [rule.protocol, formatPorts(rule.port_range), rule.source_network, rule.description]),
    );
    lines.push(...table.map((row) => `  ${row}`));
  }
  return lines;
}

export function formatHistory(records: readonly InstanceRecord[]): string[] {
  if (records.length === 0) return ["No launches recorded."];
  return renderTable(
    ["ID", "STATUS", "IP", "REGION", "TYPE", "ATTEMPTS", "LAUNCHED", "LAST ERROR"],
    records.map((record) => [
      record.id,
      record.status,
      record.ip ?? "-",
      record.region,
      record.instanceType,
      String(record.attempts),
      formatEpochSeconds(record.launchedAt),
      record.lastError ?? "",
    ]),
  );
}
