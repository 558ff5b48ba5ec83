import type { InstanceProvider } from "../launch/instance-provider.js";
import type { InstanceHandle, InstanceStatus, LaunchRequest } from "../launch/types.js";
import { UNKNOWN_ERROR_CODE } from "./error-codes.js";
import { LambdaApiError, type LambdaCloudClient } from "./lambda-client.js";
import type { LambdaInstance, LambdaInstanceStatus, LambdaLaunchParams } from "./types.js";

const STATUS_MAP: Record<LambdaInstanceStatus, InstanceStatus> = {
  booting: "booting",
  active: "active",
  unhealthy: "unhealthy",
  terminated: "terminated",
  // Both end with the instance gone; polling further cannot help.
  terminating: "terminated",
  preempted: "terminated",
};

function isLambdaInstanceStatus(status: string): status is LambdaInstanceStatus {
  return Object.hasOwn(STATUS_MAP, status);
}

export function toInstanceStatus(status: string): InstanceStatus {
  return isLambdaInstanceStatus(status) ? STATUS_MAP[status] : "unknown";
}

export function toInstanceHandle(instance: LambdaInstance): InstanceHandle {
  return { id: instance.id, status: toInstanceStatus(instance.status), ip: instance.ip ?? null };
}

export function toLaunchParams(request: LaunchRequest): LambdaLaunchParams {
  const params: LambdaLaunchParams = {
    region_name: request.region,
    instance_type_name: request.instanceType,
    ssh_key_names: [request.sshKeyName],
  };
  if (request.filesystemName) params.file_system_names = [request.filesystemName];
  if (request.name) params.name = request.name;
  if (request.imageId) params.image = { id: request.imageId };
  if (request.userData) params.user_data = request.userData;
  return params;
}

type ProviderClient = Pick<LambdaCloudClient, "launchInstance" | "getInstance" | "terminateInstances">;

/** Lambda Cloud behind the launch engine's provider port. One instance per launch. */
export class LambdaInstanceProvider implements InstanceProvider {
  constructor(private readonly client: ProviderClient) {}

  async launch(request: LaunchRequest, signal?: AbortSignal): Promise<InstanceHandle> {
    const [id] = await this.client.launchInstance(toLaunchParams(request), signal);
    if (id === undefined) {
      throw new LambdaApiError(200, UNKNOWN_ERROR_CODE, "Launch returned no instance IDs");
    }
    return { id, status: "booting", ip: null };
  }

  async getStatus(instanceId: string, signal?: AbortSignal): Promise<InstanceHandle> {
    return toInstanceHandle(await this.client.getInstance(instanceId, signal));
  }

  async terminate(instanceIds: readonly string[]): Promise<InstanceHandle[]> {
    const terminated = await this.client.terminateInstances(instanceIds);
    return terminated.map(toInstanceHandle);
  }
}
