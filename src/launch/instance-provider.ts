import type { InstanceHandle, LaunchRequest } from "./types.js";

/**
 * Port to the remote provisioning API.
 *
 * Every method rejects with a value carrying `code` and `message`
 * (see RemoteError) when the API refuses the call.
 */
export interface InstanceProvider {
  /** Resolves once the API has accepted the launch; the instance is usually still booting. */
  launch(request: LaunchRequest, signal?: AbortSignal): Promise<InstanceHandle>;
  getStatus(instanceId: string, signal?: AbortSignal): Promise<InstanceHandle>;
  /** Returns the instances the API reports as terminated. */
  terminate(instanceIds: readonly string[]): Promise<InstanceHandle[]>;
}
