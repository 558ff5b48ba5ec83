const USERNAME_PATTERN = /^[a-z_][a-z0-9_-]{0,31}$/;
const FILESYSTEM_NAME_PATTERN = /^[\w.-]+$/;

/** Where Lambda Cloud mounts an attached filesystem. */
export const NFS_ROOT = "/lambda/nfs";

/** Directories kept on the persistent filesystem and bind-mounted over the local disk. */
export const PERSISTENT_DIRS = ["/nix", "/home"] as const;

export interface CloudInitParams {
  sshUsername: string;
  filesystemName: string | null;
}

export function filesystemMount(filesystemName: string): string {
  return `${NFS_ROOT}/${filesystemName}`;
}

/**
 * Boot script for a devbox instance.
 *
 * With a filesystem attached, `/nix` and `/home` live on it so the
 * environment survives termination. The user's home is seeded from the
 * image on first boot only.
 */
export function renderCloudInit(params: CloudInitParams): string {
  if (!USERNAME_PATTERN.test(params.sshUsername)) {
    throw new Error(`Invalid sshUsername: ${params.sshUsername}`);
  }
  if (params.filesystemName === null) {
    return "#cloud-config\nruncmd: []\n";
  }
  if (!FILESYSTEM_NAME_PATTERN.test(params.filesystemName) || params.filesystemName.startsWith(".")) {
    throw new Error(`Invalid filesystemName: ${params.filesystemName}`);
  }

  const user = params.sshUsername;
  const mount = filesystemMount(params.filesystemName);

  const bindCommands = PERSISTENT_DIRS.flatMap((dir) => [
    `  - mkdir -p ${mount}${dir} ${dir}`,
    `  - mountpoint -q ${dir} || mount --bind ${mount}${dir} ${dir}`,
    `  - grep -qs " ${dir} none bind" /etc/fstab || echo "${mount}${dir} ${dir} none bind 0 0" >> /etc/fstab`,
  ]);

  return `#cloud-config
runcmd:
  - test -d ${mount}/home/${user} || (mkdir -p ${mount}/home && cp -a /home/${user} ${mount}/home/)
${bindCommands.join("\n")}
  - chown ${user}:${user} /nix
  - chown -R ${user}:${user} /home/${user}
`;
}

/** Base64 form expected by the launch API's `user_data`. */
export function encodeUserData(content: string): string {
  return Buffer.from(content, "utf-8").toString("base64");
}
