import { encodeUserData, filesystemMount, PERSISTENT_DIRS, renderCloudInit } from "../cloud-init/cloud-init.js";
import type { Config } from "../config/index.js";
import {
  type IInstanceRecordRepository,
  LIVE_STATUSES,
  type NewInstanceRecord,
} from "../instances/instance-record-repository.js";
import type { LambdaCloudClient } from "../lambda/lambda-client.js";
import type { InstanceLifecycle } from "../launch/instance-lifecycle.js";
import { createLaunchRequest } from "../launch/launch-request.js";
import type { InstanceHandle, LaunchFailure, LaunchRequest } from "../launch/types.js";
import { type CliCommand, CliError, type ListResource } from "./args.js";
import {
  describeFailure,
  formatFilesystems,
  formatFirewallRulesets,
  formatHistory,
  formatImages,
  formatInstances,
  formatInstanceTypes,
  formatSshKeys,
  sshCommand,
  statusAfterFailure,
} from "./format.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 130;

export type CatalogClient = Pick<
  LambdaCloudClient,
  | "listInstances"
  | "getInstance"
  | "listInstanceTypes"
  | "listSshKeys"
  | "listFilesystems"
  | "listImages"
  | "listFirewallRulesets"
>;

export interface CommandContext {
  config: Config;
  client: CatalogClient;
  lifecycle: Pick<InstanceLifecycle, "bringUp" | "launch" | "waitReady" | "terminate">;
  records: IInstanceRecordRepository;
  /** Command output (stdout). */
  print: (line: string) => void;
  /** Progress and diagnostics (stderr). */
  error: (line: string) => void;
  signal?: AbortSignal;
}

/** Run one parsed command; resolves with the process exit code. */
export async function runCommand(command: Exclude<CliCommand, { name: "help" }>, ctx: CommandContext): Promise<number> {
  switch (command.name) {
    case "up":
      return up(command.wait, ctx);
    case "wait":
      return waitFor(await resolveInstanceId(command.instanceId, ctx), ctx);
    case "down":
      return down(await resolveInstanceId(command.instanceId, ctx), ctx);
    case "ssh":
      return ssh(await resolveInstanceId(command.instanceId, ctx), ctx);
    case "list":
      return list(command.resource, command.availableOnly, ctx);
  }
}

// ---------------------------------------------------------------------------
// up
// ---------------------------------------------------------------------------

function requireSetting(value: string | null, label: string, flag: string, key: string): string {
  if (value === null) throw new CliError(`Missing ${label}: pass ${flag} or set ${key} in devbox.yaml`);
  return value;
}

export function buildLaunchRequest(config: Config): LaunchRequest {
  const { launch } = config;
  const region = requireSetting(launch.region, "region", "--region", "launch.region");
  const instanceType = requireSetting(launch.instanceType, "instance type", "--instance-type", "launch.instanceType");
  const sshKeyName = requireSetting(launch.sshKeyName, "SSH key", "--ssh-key", "launch.sshKeyName");
  const userData = renderCloudInit({ sshUsername: config.ssh.username, filesystemName: launch.filesystemName });

  return createLaunchRequest({
    region,
    instanceType,
    sshKeyName,
    filesystemName: launch.filesystemName,
    name: launch.name,
    imageId: launch.imageId,
    userData: encodeUserData(userData),
  });
}

function newRecord(request: LaunchRequest, handle: InstanceHandle, attempts: number): NewInstanceRecord {
  return {
    id: handle.id,
    name: request.name,
    region: request.region,
    instanceType: request.instanceType,
    filesystemName: request.filesystemName,
    status: handle.status,
    ip: handle.ip,
    attempts,
  };
}

function failedInstanceId(failure: LaunchFailure): string | null {
  return failure.reason === "retries_exhausted" ? null : failure.instanceId;
}

function exitCodeFor(failure: LaunchFailure): number {
  return failure.reason === "cancelled" ? EXIT_CANCELLED : EXIT_FAILURE;
}

async function up(wait: boolean, ctx: CommandContext): Promise<number> {
  const { config } = ctx;
  const request = buildLaunchRequest(config);
  ctx.error(`Launching ${request.instanceType} in ${request.region}...`);

  if (!wait) {
    const result = await ctx.lifecycle.launch(request, config.retry, ctx.signal);
    if (!result.ok) {
      for (const line of describeFailure(result.failure)) ctx.error(line);
      return exitCodeFor(result.failure);
    }
    await ctx.records.insert(newRecord(request, result.handle, result.attempts));
    ctx.print(result.handle.id);
    ctx.error(`Not waiting. Run gpu-devbox wait ${result.handle.id} to wait until it is ready.`);
    return EXIT_OK;
  }

  const outcome = await ctx.lifecycle.bringUp(request, config.retry, config.wait, ctx.signal);
  if (outcome.status === "ready") {
    await ctx.records.insert(newRecord(request, outcome.instance, outcome.attempts));
    printReady(outcome.instance, request.filesystemName, ctx);
    return EXIT_OK;
  }

  const { failure } = outcome;
  const lines = describeFailure(failure);
  const instanceId = failedInstanceId(failure);
  if (instanceId !== null) {
    const handle: InstanceHandle = { id: instanceId, status: statusAfterFailure(failure), ip: null };
    await ctx.records.insert(newRecord(request, handle, outcome.attempts));
    await ctx.records.setError(instanceId, lines[0] ?? failure.reason);
  }
  for (const line of lines) ctx.error(line);
  return exitCodeFor(failure);
}

function printReady(instance: InstanceHandle, filesystemName: string | null, ctx: CommandContext): void {
  const ip = instance.ip ?? "(no address)";
  ctx.error(`Instance ${instance.id} is ready at ${ip}.`);
  if (filesystemName !== null) {
    ctx.error(`${PERSISTENT_DIRS.join(" and ")} are kept on ${filesystemName} (${filesystemMount(filesystemName)}).`);
  }
  ctx.print(sshCommand(ip, ctx.config.ssh.username));
}

// ---------------------------------------------------------------------------
// wait / down / ssh
// ---------------------------------------------------------------------------

/** The given id, or the newest instance recorded on this machine that may still be running. */
export async function resolveInstanceId(instanceId: string | null, ctx: CommandContext): Promise<string> {
  if (instanceId !== null) return instanceId;
  const latest = await ctx.records.latest(LIVE_STATUSES);
  if (!latest) {
    throw new CliError("No running instance recorded on this machine. Pass an instance id (see gpu-devbox list instances).");
  }
  return latest.id;
}

async function waitFor(instanceId: string, ctx: CommandContext): Promise<number> {
  ctx.error(`Waiting for ${instanceId}...`);
  const outcome = await ctx.lifecycle.waitReady(instanceId, ctx.config.wait, ctx.signal);
  if (outcome.status === "ready") {
    const { ip } = outcome.instance;
    if (ip !== null) await ctx.records.updateReady(instanceId, ip);
    printReady(outcome.instance, (await ctx.records.getById(instanceId))?.filesystemName ?? null, ctx);
    return EXIT_OK;
  }

  const { failure } = outcome;
  const lines = describeFailure(failure);
  if (failure.reason !== "cancelled") {
    await ctx.records.updateStatus(instanceId, statusAfterFailure(failure));
    await ctx.records.setError(instanceId, lines[0] ?? failure.reason);
  }
  for (const line of lines) ctx.error(line);
  return exitCodeFor(failure);
}

async function down(instanceId: string, ctx: CommandContext): Promise<number> {
  const terminated = await ctx.lifecycle.terminate([instanceId]);
  const ids = terminated.length > 0 ? terminated.map((handle) => handle.id) : [instanceId];
  await ctx.records.markTerminated(ids);
  for (const id of ids) ctx.print(`Terminated ${id}`);
  return EXIT_OK;
}

async function ssh(instanceId: string, ctx: CommandContext): Promise<number> {
  const instance = await ctx.client.getInstance(instanceId, ctx.signal);
  if (!instance.ip) {
    throw new CliError(`Instance ${instanceId} has no address yet (status: ${instance.status}). Try gpu-devbox wait ${instanceId}`);
  }
  ctx.print(sshCommand(instance.ip, ctx.config.ssh.username));
  return EXIT_OK;
}

// ---------------------------------------------------------------------------
// list
// ---------------------------------------------------------------------------

async function listLines(resource: ListResource, availableOnly: boolean, ctx: CommandContext): Promise<string[]> {
  const { client, signal } = ctx;
  switch (resource) {
    case "instances":
      return formatInstances(await client.listInstances(signal));
    case "instance-types": {
      const entries = Object.values(await client.listInstanceTypes(signal));
      return formatInstanceTypes(
        availableOnly ? entries.filter((entry) => entry.regions_with_capacity_available.length > 0) : entries,
      );
    }
    case "images":
      return formatImages(await client.listImages(signal));
    case "filesystems":
      return formatFilesystems(await client.listFilesystems(signal));
    case "ssh-keys":
      return formatSshKeys(await client.listSshKeys(signal));
    case "firewall-rulesets":
      return formatFirewallRulesets(await client.listFirewallRulesets(signal));
    case "history":
      return formatHistory(await ctx.records.list({ includeTerminated: true }));
  }
}

async function list(resource: ListResource, availableOnly: boolean, ctx: CommandContext): Promise<number> {
  for (const line of await listLines(resource, availableOnly, ctx)) ctx.print(line);
  return EXIT_OK;
}
